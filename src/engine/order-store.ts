import type { OrderId } from './identifiers.js';
import type { RecordStore } from './record-store.js';

export interface LeafRecord {
  ownerTraderId: number;
  remainingShares: bigint;
  originalShares: bigint;
  originalValue: bigint;
}

export function emptyLeaf(): LeafRecord {
  return {
    ownerTraderId: 0,
    remainingShares: 0n,
    originalShares: 0n,
    originalValue: 0n,
  };
}

export function isLiveLeaf(leaf: LeafRecord): boolean {
  return leaf.ownerTraderId !== 0;
}

// truncating: dust stays with the basis, never with the remaining liquidity
export function remainingValueOf(leaf: LeafRecord): bigint {
  if (leaf.originalShares === 0n) {
    return 0n;
  }

  return (leaf.remainingShares * leaf.originalValue) / leaf.originalShares;
}

export function priceOfLeaf(leaf: LeafRecord): bigint {
  if (leaf.originalShares === 0n) {
    return 0n;
  }

  return leaf.originalValue / leaf.originalShares;
}

export class OrderStore {
  constructor(private readonly records: RecordStore<LeafRecord>) {}

  get(id: OrderId): LeafRecord {
    return this.records.read(id);
  }

  isLive(id: OrderId): boolean {
    return isLiveLeaf(this.records.read(id));
  }

  remainingSharesOf(id: OrderId): bigint {
    return this.records.read(id).remainingShares;
  }

  put(id: OrderId, leaf: LeafRecord): void {
    this.records.write(id, leaf);
  }

  clear(id: OrderId): void {
    this.records.erase(id);
  }
}
