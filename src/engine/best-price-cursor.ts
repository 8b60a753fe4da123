import type { AggregateTrie } from './aggregate-trie.js';
import {
  ROOT_ID,
  bitIndex,
  highestDifferingBit,
  isWithinSubtree,
  levelOf,
  lowestSetBit,
  regionNode,
  type OrderId,
} from './identifiers.js';
import type { RecordStore } from './record-store.js';

export interface CursorRecord {
  bestOfferId: OrderId;
  successorBitmap: bigint;
}

export interface BestPathMatch {
  branchId: OrderId;
  exactMatch: boolean;
}

export const SENTINEL_BIT = 1n;

export function emptyCursor(): CursorRecord {
  return {
    bestOfferId: ROOT_ID,
    successorBitmap: 0n,
  };
}

/**
 * Minimum live id plus one bit per pending region above it: bit `k` is set while the trie node
 * `regionNode(best, k)` holds liquidity. Bit 0 is the sentinel marking a non-empty book.
 */
export class BestPriceCursor {
  constructor(
    private readonly slot: RecordStore<CursorRecord>,
    private readonly trie: AggregateTrie
  ) {}

  read(): CursorRecord {
    return this.slot.read(ROOT_ID);
  }

  get bestOfferId(): OrderId {
    return this.read().bestOfferId;
  }

  recordInsert(id: OrderId): void {
    const cursor = this.read();
    if (cursor.bestOfferId === ROOT_ID) {
      this.write({ bestOfferId: id, successorBitmap: SENTINEL_BIT });
      return;
    }

    const turn = 1n << BigInt(highestDifferingBit(id, cursor.bestOfferId));
    if (id > cursor.bestOfferId) {
      this.write({ ...cursor, successorBitmap: cursor.successorBitmap | turn });
      return;
    }

    // everything between the new best and the old one is empty, so only the old best's region is pending below the turn
    const belowTurn = (turn << 1n) - 1n;
    this.write({
      bestOfferId: id,
      successorBitmap: (cursor.successorBitmap & ~belowTurn) | turn | SENTINEL_BIT,
    });
  }

  /** Clears the pending bit of a region once it no longer holds liquidity. */
  releaseRegion(regionId: OrderId): void {
    if (this.trie.isOccupied(regionId)) {
      return;
    }

    const cursor = this.read();
    this.write({ ...cursor, successorBitmap: cursor.successorBitmap & ~lowestSetBit(regionId) });
  }

  advance(): OrderId {
    const cursor = this.read();
    const pending = cursor.successorBitmap & ~SENTINEL_BIT;
    if (pending === 0n) {
      this.write(emptyCursor());
      return ROOT_ID;
    }

    const turn = lowestSetBit(pending);
    const region = regionNode(cursor.bestOfferId, bitIndex(turn));
    let successorBitmap = cursor.successorBitmap & ~turn;

    const bestOfferId = this.trie.minLeafUnder(region, (nodeId, childId, branch) => {
      successorBitmap |= this.pendingSiblingBits(nodeId, childId, branch.rightChildId);
    });

    this.write({ bestOfferId, successorBitmap });
    return bestOfferId;
  }

  findAncestorOnBestPath(targetId: OrderId): BestPathMatch {
    const cursor = this.read();
    if (cursor.bestOfferId === ROOT_ID) {
      return { branchId: ROOT_ID, exactMatch: false };
    }

    if (targetId === cursor.bestOfferId) {
      return { branchId: targetId, exactMatch: true };
    }

    let pending = cursor.successorBitmap & ~SENTINEL_BIT;
    while (pending !== 0n) {
      const turn = lowestSetBit(pending);
      pending &= ~turn;

      const region = regionNode(cursor.bestOfferId, bitIndex(turn));
      if (isWithinSubtree(region, targetId)) {
        return { branchId: region, exactMatch: false };
      }
    }

    return { branchId: ROOT_ID, exactMatch: false };
  }

  private pendingSiblingBits(nodeId: OrderId, childId: OrderId, rightChildId: OrderId): bigint {
    let bits = 0n;
    for (let bit = bitIndex(childId - nodeId) + 1; bit < levelOf(nodeId); bit += 1) {
      const sibling = nodeId + (1n << BigInt(bit));
      if (sibling > rightChildId) {
        break;
      }
      if (this.trie.isOccupied(sibling)) {
        bits |= 1n << BigInt(bit);
      }
    }

    return bits;
  }

  private write(cursor: CursorRecord): void {
    this.slot.write(ROOT_ID, cursor);
  }
}
