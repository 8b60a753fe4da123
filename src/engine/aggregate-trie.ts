import { OrderIndexError, invariant } from './errors.js';
import {
  ID_WIDTH,
  ROOT_ID,
  ancestorsOf,
  bitIndex,
  checkedAdd,
  checkedSub,
  isBitSet,
  levelOf,
  parentOf,
  regionNode,
  type OrderId,
} from './identifiers.js';
import type { OrderStore } from './order-store.js';
import type { RecordStore } from './record-store.js';

export interface BranchRecord {
  leftChildId: OrderId;
  rightChildId: OrderId;
  subtreeTotalShares: bigint;
  subtreeTotalValue: bigint;
}

export function emptyBranch(): BranchRecord {
  return {
    leftChildId: ROOT_ID,
    rightChildId: ROOT_ID,
    subtreeTotalShares: 0n,
    subtreeTotalValue: 0n,
  };
}

export type DescentVisitor = (nodeId: OrderId, childId: OrderId, branch: BranchRecord) => void;

/**
 * Binary trie over order identifiers. Node `x` covers `[x, x + lowbit(x))` and its parent is
 * `x & (x - 1)`, so only aggregates and the lowest/highest occupied child are stored.
 * Odd ids are leaves and read their liquidity from the order store.
 */
export class AggregateTrie {
  constructor(
    private readonly branches: RecordStore<BranchRecord>,
    private readonly orders: OrderStore
  ) {}

  branchAt(id: OrderId): BranchRecord {
    return this.branches.read(id);
  }

  sharesUnder(nodeId: OrderId): bigint {
    if ((nodeId & 1n) === 1n) {
      return this.orders.remainingSharesOf(nodeId);
    }

    return this.branches.read(nodeId).subtreeTotalShares;
  }

  isOccupied(nodeId: OrderId): boolean {
    return this.sharesUnder(nodeId) > 0n;
  }

  attach(id: OrderId, shares: bigint, value: bigint): void {
    let child = id;
    while (child !== ROOT_ID) {
      const parent = parentOf(child);
      const branch = this.branches.read(parent);

      branch.subtreeTotalShares = checkedAdd(branch.subtreeTotalShares, shares);
      branch.subtreeTotalValue = checkedAdd(branch.subtreeTotalValue, value);
      if (branch.leftChildId === ROOT_ID || child < branch.leftChildId) {
        branch.leftChildId = child;
      }
      if (child > branch.rightChildId) {
        branch.rightChildId = child;
      }

      this.branches.write(parent, branch);
      child = parent;
    }
  }

  /** Removes liquidity that stays resting (a partial fill); no child becomes empty. */
  reduce(id: OrderId, shares: bigint, value: bigint): void {
    for (const ancestor of ancestorsOf(id)) {
      const branch = this.branches.read(ancestor);
      branch.subtreeTotalShares = checkedSub(branch.subtreeTotalShares, shares);
      branch.subtreeTotalValue = checkedSub(branch.subtreeTotalValue, value);
      this.branches.write(ancestor, branch);
    }
  }

  /** Removes a leaf that has already been cleared from the order store. */
  detach(id: OrderId, shares: bigint, value: bigint): void {
    invariant(!this.orders.isLive(id), 'leaf must be cleared before it is detached', { id: id.toString() });

    let child = id;
    while (child !== ROOT_ID) {
      const parent = parentOf(child);
      const branch = this.branches.read(parent);

      branch.subtreeTotalShares = checkedSub(branch.subtreeTotalShares, shares);
      branch.subtreeTotalValue = checkedSub(branch.subtreeTotalValue, value);
      if (!this.isOccupied(child)) {
        this.unlinkChild(parent, branch, child);
      }

      this.branches.write(parent, branch);
      child = parent;
    }
  }

  minLeafUnder(nodeId: OrderId, visit?: DescentVisitor): OrderId {
    let cursor = nodeId;
    while ((cursor & 1n) === 0n) {
      const branch = this.branches.read(cursor);
      const child = branch.leftChildId;
      invariant(child !== ROOT_ID, 'descent reached an empty node', { nodeId: cursor.toString() });

      visit?.(cursor, child, branch);
      cursor = child;
    }

    return cursor;
  }

  maxLeafUnder(nodeId: OrderId): OrderId {
    let cursor = nodeId;
    while ((cursor & 1n) === 0n) {
      const child = this.branches.read(cursor).rightChildId;
      if (child === ROOT_ID) {
        return ROOT_ID;
      }
      cursor = child;
    }

    return cursor;
  }

  /** Next live id strictly above `id` (odd), or 0 when there is none. */
  successorOf(id: OrderId): OrderId {
    for (let bit = 1; bit < ID_WIDTH; bit += 1) {
      if (isBitSet(id, bit)) {
        continue;
      }

      const region = regionNode(id, bit);
      if (this.isOccupied(region)) {
        return this.minLeafUnder(region);
      }
    }

    return ROOT_ID;
  }

  private unlinkChild(parent: OrderId, branch: BranchRecord, child: OrderId): void {
    if (branch.leftChildId === child && branch.rightChildId === child) {
      branch.leftChildId = ROOT_ID;
      branch.rightChildId = ROOT_ID;
      return;
    }

    if (branch.leftChildId === child) {
      branch.leftChildId = this.nextOccupiedChild(parent, child, branch.rightChildId);
      return;
    }

    if (branch.rightChildId === child) {
      branch.rightChildId = this.previousOccupiedChild(parent, child, branch.leftChildId);
    }
  }

  private nextOccupiedChild(parent: OrderId, child: OrderId, limit: OrderId): OrderId {
    for (let bit = bitIndex(child - parent) + 1; bit < levelOf(parent); bit += 1) {
      const candidate = parent + (1n << BigInt(bit));
      if (candidate > limit) {
        break;
      }
      if (this.isOccupied(candidate)) {
        return candidate;
      }
    }

    throw new OrderIndexError('invariant_violation', 'right child pointer does not lead to liquidity', {
      parent: parent.toString(),
      child: child.toString(),
    });
  }

  private previousOccupiedChild(parent: OrderId, child: OrderId, limit: OrderId): OrderId {
    for (let bit = bitIndex(child - parent) - 1; bit >= 0; bit -= 1) {
      const candidate = parent + (1n << BigInt(bit));
      if (candidate < limit) {
        break;
      }
      if (this.isOccupied(candidate)) {
        return candidate;
      }
    }

    throw new OrderIndexError('invariant_violation', 'left child pointer does not lead to liquidity', {
      parent: parent.toString(),
      child: child.toString(),
    });
  }
}
