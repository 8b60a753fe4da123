import type { Address } from 'viem';

import type { OrderId } from '../engine/identifiers.js';

export interface AddOrderRequest {
  price: bigint;
  amount: bigint;
  owner: string;
}

export interface OrderInfo {
  remainingShares: bigint;
  owner: Address | null;
}

export interface RemoveOrderResult {
  originalShares: bigint;
  remainingShares: bigint;
  owner: Address | null;
}

export interface ClaimResult {
  executedShares: bigint;
  executedValue: bigint;
  remainingShares: bigint;
}

export interface ExecutionFill {
  orderId: OrderId;
  owner: Address;
  executedShares: bigint;
  executedValue: bigint;
  /** the order left the book with this fill */
  closed: boolean;
  /** basis the maker is owed now; partial fills are settled later by claim or cancel */
  settledShares: bigint;
  settledValue: bigint;
}

export interface ExecutionResult {
  executedShares: bigint;
  executedValue: bigint;
  owner: Address | null;
  bestOfferId: OrderId;
  fills: ExecutionFill[];
}

export interface ExecutionPreview {
  executedShares: bigint;
  executedValue: bigint;
  owner: Address | null;
}

export interface BookEntry {
  orderId: OrderId;
  price: bigint;
  remainingShares: bigint;
  owner: Address;
}

export interface OrderIndexState {
  settlementAddress: Address;
  bestOfferId: OrderId;
  successorBitmap: bigint;
  worstOfferId: OrderId;
  liveOrders: number;
  traderCount: number;
  totalShares: bigint;
  totalValue: bigint;
  highestAllocatedPointer: bigint;
  lastFreePointer: bigint;
}

export interface BookSnapshot {
  market: string;
  sequence: number;
  timestampMs: number;
  bestOfferId: OrderId;
  bestPrice: bigint | null;
  totalShares: bigint;
  totalValue: bigint;
  liveOrders: number;
  orders: BookEntry[];
}
