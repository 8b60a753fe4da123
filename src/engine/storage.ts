import { zeroAddress, type Address } from 'viem';

import { emptyBranch, type BranchRecord } from './aggregate-trie.js';
import { emptyCursor, type CursorRecord } from './best-price-cursor.js';
import { emptyLeaf, type LeafRecord } from './order-store.js';
import { MemoryRecordStore, type RecordStore, type TransactionalStore } from './record-store.js';
import type { TraderIdRecord, TraderOwnerRecord } from './trader-registry.js';

export interface BookHeader {
  settlementAddress: Address;
  traderCount: number;
  liveOrders: number;
  // reserved for an identifier free-list; no operation reads or writes them
  highestAllocatedPointer: bigint;
  lastFreePointer: bigint;
}

export function emptyHeader(): BookHeader {
  return {
    settlementAddress: zeroAddress,
    traderCount: 0,
    liveOrders: 0,
    highestAllocatedPointer: 0n,
    lastFreePointer: 0n,
  };
}

export type TransactionalRecordStore<T extends object> = RecordStore<T> & TransactionalStore;

export interface OrderIndexStorage {
  header: TransactionalRecordStore<BookHeader>;
  cursor: TransactionalRecordStore<CursorRecord>;
  leaves: TransactionalRecordStore<LeafRecord>;
  branches: TransactionalRecordStore<BranchRecord>;
  traderIds: TransactionalRecordStore<TraderIdRecord>;
  traderOwners: TransactionalRecordStore<TraderOwnerRecord>;
}

export interface MemoryOrderIndexStorage extends OrderIndexStorage {
  header: MemoryRecordStore<BookHeader>;
  cursor: MemoryRecordStore<CursorRecord>;
  leaves: MemoryRecordStore<LeafRecord>;
  branches: MemoryRecordStore<BranchRecord>;
  traderIds: MemoryRecordStore<TraderIdRecord>;
  traderOwners: MemoryRecordStore<TraderOwnerRecord>;
}

export function createMemoryStorage(): MemoryOrderIndexStorage {
  return {
    header: new MemoryRecordStore(emptyHeader),
    cursor: new MemoryRecordStore(emptyCursor),
    leaves: new MemoryRecordStore(emptyLeaf),
    branches: new MemoryRecordStore(emptyBranch),
    traderIds: new MemoryRecordStore<TraderIdRecord>(() => ({ traderId: 0 })),
    traderOwners: new MemoryRecordStore<TraderOwnerRecord>(() => ({ owner: null })),
  };
}

export function transactionalStoresOf(storage: OrderIndexStorage): TransactionalStore[] {
  return [
    storage.header,
    storage.cursor,
    storage.leaves,
    storage.branches,
    storage.traderIds,
    storage.traderOwners,
  ];
}
