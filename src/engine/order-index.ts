import type { Address } from 'viem';

import type {
  BookEntry,
  ClaimResult,
  ExecutionFill,
  ExecutionPreview,
  ExecutionResult,
  OrderIndexState,
  OrderInfo,
  RemoveOrderResult,
} from '../types/order.js';
import { AggregateTrie } from './aggregate-trie.js';
import { BestPriceCursor, type BestPathMatch } from './best-price-cursor.js';
import { OrderIndexError, invariant } from './errors.js';
import { IdentifierAllocator } from './identifier-allocator.js';
import {
  MAX_UINT128,
  ROOT_ID,
  checkedAdd,
  checkedMul,
  checkedSub,
  parseOrderId,
  type OrderId,
} from './identifiers.js';
import { OrderStore, isLiveLeaf, priceOfLeaf, remainingValueOf, type LeafRecord } from './order-store.js';
import { createMemoryStorage, transactionalStoresOf, type OrderIndexStorage } from './storage.js';
import { TraderRegistry } from './trader-registry.js';

export interface OrderIndexOptions {
  maxProbeLength: number;
  settlementAddress?: Address;
}

function assertUint128(value: bigint, field: string): void {
  if (value < 0n || value > MAX_UINT128) {
    throw new OrderIndexError('arithmetic_overflow', `${field} does not fit 128 bits`, {
      [field]: value.toString(),
    });
  }
}

/**
 * One side of a book, ascending by price: the best offer is the lowest id. Every mutating
 * operation runs as a single storage transaction and either commits completely or not at all.
 */
export class OrderIndex {
  private readonly orders: OrderStore;
  private readonly trie: AggregateTrie;
  private readonly cursor: BestPriceCursor;
  private readonly allocator: IdentifierAllocator;
  private readonly traders: TraderRegistry;

  constructor(
    options: OrderIndexOptions,
    readonly storage: OrderIndexStorage = createMemoryStorage()
  ) {
    this.orders = new OrderStore(storage.leaves);
    this.trie = new AggregateTrie(storage.branches, this.orders);
    this.cursor = new BestPriceCursor(storage.cursor, this.trie);
    this.allocator = new IdentifierAllocator(this.orders, this.trie, {
      maxProbeLength: options.maxProbeLength,
    });
    this.traders = new TraderRegistry(storage.traderIds, storage.traderOwners, storage.header);

    if (!storage.header.has(ROOT_ID) && options.settlementAddress) {
      const settlementAddress = options.settlementAddress;
      this.mutate(() => {
        this.storage.header.write(ROOT_ID, { ...this.storage.header.read(ROOT_ID), settlementAddress });
      });
    }
  }

  get settlementAddress(): Address {
    return this.storage.header.read(ROOT_ID).settlementAddress;
  }

  get bestOfferId(): OrderId {
    return this.cursor.bestOfferId;
  }

  addOrder(price: bigint, amount: bigint, owner: string): OrderId {
    return this.mutate(() => {
      assertUint128(amount, 'amount');
      if (amount === 0n) {
        throw new OrderIndexError('invalid_amount', 'order amount must be positive');
      }

      const id = this.allocator.allocate(price);
      const ownerTraderId = this.traders.idFor(owner);
      const value = checkedMul(amount, price);

      this.orders.put(id, {
        ownerTraderId,
        remainingShares: amount,
        originalShares: amount,
        originalValue: value,
      });
      this.trie.attach(id, amount, value);
      this.cursor.recordInsert(id);
      this.adjustLiveOrders(1);

      return id;
    });
  }

  removeOrder(price: bigint, id: OrderId | string): RemoveOrderResult {
    const orderId = parseOrderId(id);

    return this.mutate(() => {
      const leaf = this.orders.get(orderId);
      if (!this.matches(leaf, price)) {
        return { originalShares: 0n, remainingShares: 0n, owner: null };
      }

      const location = this.locate(orderId);
      this.closeOrder(orderId, leaf, location);

      return {
        originalShares: leaf.originalShares,
        remainingShares: leaf.remainingShares,
        owner: this.traders.ownerFor(leaf.ownerTraderId),
      };
    });
  }

  /** Reports the shares filled since the order was placed or last claimed, and rebases the order on what rests. */
  claimExecuted(price: bigint, id: OrderId | string): ClaimResult {
    const orderId = parseOrderId(id);

    return this.mutate(() => {
      const leaf = this.orders.get(orderId);
      if (!this.matches(leaf, price)) {
        return { executedShares: 0n, executedValue: 0n, remainingShares: 0n };
      }

      this.locate(orderId);
      const executedShares = checkedSub(leaf.originalShares, leaf.remainingShares);
      if (executedShares === 0n) {
        return { executedShares, executedValue: 0n, remainingShares: leaf.remainingShares };
      }

      const remainingValue = remainingValueOf(leaf);
      const executedValue = checkedSub(leaf.originalValue, remainingValue);
      this.orders.put(orderId, {
        ...leaf,
        originalShares: leaf.remainingShares,
        originalValue: remainingValue,
      });

      return { executedShares, executedValue, remainingShares: leaf.remainingShares };
    });
  }

  executeRight(price: bigint, amount: bigint): ExecutionResult {
    assertUint128(price, 'price');
    assertUint128(amount, 'amount');

    return this.mutate(() => {
      const fills: ExecutionFill[] = [];
      let executedShares = 0n;
      let executedValue = 0n;
      let wanted = amount;

      while (wanted > 0n) {
        const bestId = this.cursor.bestOfferId;
        if (bestId === ROOT_ID) {
          break;
        }

        const leaf = this.orders.get(bestId);
        invariant(isLiveLeaf(leaf), 'best offer has no live leaf', { bestOfferId: bestId.toString() });
        if (priceOfLeaf(leaf) > price) {
          break;
        }

        const owner = this.requireOwner(leaf);

        if (wanted < leaf.remainingShares) {
          const resting = { ...leaf, remainingShares: leaf.remainingShares - wanted };
          const value = checkedSub(remainingValueOf(leaf), remainingValueOf(resting));

          this.orders.put(bestId, resting);
          this.trie.reduce(bestId, wanted, value);

          fills.push({
            orderId: bestId,
            owner,
            executedShares: wanted,
            executedValue: value,
            closed: false,
            settledShares: 0n,
            settledValue: 0n,
          });
          executedShares = checkedAdd(executedShares, wanted);
          executedValue = checkedAdd(executedValue, value);
          wanted = 0n;
          break;
        }

        const value = remainingValueOf(leaf);
        this.closeOrder(bestId, leaf, { branchId: bestId, exactMatch: true });

        fills.push({
          orderId: bestId,
          owner,
          executedShares: leaf.remainingShares,
          executedValue: value,
          closed: true,
          settledShares: leaf.originalShares,
          settledValue: leaf.originalValue,
        });
        executedShares = checkedAdd(executedShares, leaf.remainingShares);
        executedValue = checkedAdd(executedValue, value);
        wanted -= leaf.remainingShares;
      }

      const bestOfferId = this.cursor.bestOfferId;
      return {
        executedShares,
        executedValue,
        owner: this.ownerOfOrder(bestOfferId),
        bestOfferId,
        fills,
      };
    });
  }

  previewExecuteRight(price: bigint, amount: bigint): ExecutionPreview {
    assertUint128(price, 'price');
    assertUint128(amount, 'amount');

    const bestOfferId = this.cursor.bestOfferId;
    let executedShares = 0n;
    let executedValue = 0n;
    let wanted = amount;
    let id = bestOfferId;

    while (wanted > 0n && id !== ROOT_ID) {
      const leaf = this.orders.get(id);
      if (priceOfLeaf(leaf) > price) {
        break;
      }

      if (wanted < leaf.remainingShares) {
        const resting = { ...leaf, remainingShares: leaf.remainingShares - wanted };
        executedShares += wanted;
        executedValue += remainingValueOf(leaf) - remainingValueOf(resting);
        break;
      }

      executedShares += leaf.remainingShares;
      executedValue += remainingValueOf(leaf);
      wanted -= leaf.remainingShares;
      id = this.trie.successorOf(id);
    }

    return {
      executedShares,
      executedValue,
      owner: this.ownerOfOrder(bestOfferId),
    };
  }

  getOrderInfo(price: bigint, id: OrderId | string): OrderInfo {
    const orderId = parseOrderId(id);
    const leaf = this.orders.get(orderId);
    if (!this.matches(leaf, price)) {
      return { remainingShares: 0n, owner: null };
    }

    return {
      remainingShares: leaf.remainingShares,
      owner: this.traders.ownerFor(leaf.ownerTraderId),
    };
  }

  nextLeaf(id: OrderId | string): OrderId {
    return this.trie.successorOf(parseOrderId(id));
  }

  assembleOrderbookFromOrders(price: bigint, count: number): BookEntry[] {
    if (!Number.isSafeInteger(count) || count < 0) {
      throw new OrderIndexError('invalid_amount', 'count must be a non-negative integer', { count });
    }

    const entries: BookEntry[] = [];
    let id = this.cursor.bestOfferId;

    while (id !== ROOT_ID && entries.length < count) {
      const leaf = this.orders.get(id);
      const orderPrice = priceOfLeaf(leaf);
      if (orderPrice > price) {
        break;
      }

      entries.push({
        orderId: id,
        price: orderPrice,
        remainingShares: leaf.remainingShares,
        owner: this.requireOwner(leaf),
      });
      id = this.trie.successorOf(id);
    }

    return entries;
  }

  traderIdOf(owner: string): number {
    return this.traders.traderIdOf(owner);
  }

  inspect(): OrderIndexState {
    const header = this.storage.header.read(ROOT_ID);
    const cursor = this.cursor.read();
    const root = this.trie.branchAt(ROOT_ID);

    return {
      settlementAddress: header.settlementAddress,
      bestOfferId: cursor.bestOfferId,
      successorBitmap: cursor.successorBitmap,
      worstOfferId: this.trie.maxLeafUnder(ROOT_ID),
      liveOrders: header.liveOrders,
      traderCount: header.traderCount,
      totalShares: root.subtreeTotalShares,
      totalValue: root.subtreeTotalValue,
      highestAllocatedPointer: header.highestAllocatedPointer,
      lastFreePointer: header.lastFreePointer,
    };
  }

  private matches(leaf: LeafRecord, price: bigint): boolean {
    return isLiveLeaf(leaf) && priceOfLeaf(leaf) === price;
  }

  private locate(orderId: OrderId): BestPathMatch {
    const location = this.cursor.findAncestorOnBestPath(orderId);
    invariant(
      location.exactMatch || location.branchId !== ROOT_ID,
      'live order is not reachable from the best offer',
      { orderId: orderId.toString(), bestOfferId: this.cursor.bestOfferId.toString() }
    );

    return location;
  }

  private closeOrder(orderId: OrderId, leaf: LeafRecord, location: BestPathMatch): void {
    this.orders.clear(orderId);
    this.trie.detach(orderId, leaf.remainingShares, remainingValueOf(leaf));
    if (location.exactMatch) {
      this.cursor.advance();
    } else {
      this.cursor.releaseRegion(location.branchId);
    }
    this.adjustLiveOrders(-1);
  }

  private adjustLiveOrders(delta: number): void {
    const header = this.storage.header.read(ROOT_ID);
    this.storage.header.write(ROOT_ID, { ...header, liveOrders: header.liveOrders + delta });
  }

  private requireOwner(leaf: LeafRecord): Address {
    const owner = this.traders.ownerFor(leaf.ownerTraderId);
    invariant(owner !== null, 'live order has no registered owner', { traderId: leaf.ownerTraderId });
    return owner;
  }

  private ownerOfOrder(id: OrderId): Address | null {
    if (id === ROOT_ID) {
      return null;
    }

    return this.traders.ownerFor(this.orders.get(id).ownerTraderId);
  }

  private mutate<T>(operation: () => T): T {
    const stores = transactionalStoresOf(this.storage);
    for (const store of stores) {
      store.begin();
    }

    try {
      const result = operation();
      for (const store of stores) {
        store.commit();
      }
      return result;
    } catch (error) {
      for (const store of stores) {
        store.rollback();
      }
      throw error;
    }
  }
}
