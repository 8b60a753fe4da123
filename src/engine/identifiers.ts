import { OrderIndexError } from './errors.js';

export type OrderId = bigint;

export const ROOT_ID: OrderId = 0n;
export const ID_WIDTH = 64;
export const MAX_ORDER_ID: OrderId = (1n << BigInt(ID_WIDTH)) - 1n;
export const MAX_PRICE = (MAX_ORDER_ID - 1n) / 2n;
export const MAX_UINT128 = (1n << 128n) - 1n;

export function lowestSetBit(value: bigint): bigint {
  return value & -value;
}

export function bitIndex(power: bigint): number {
  return power.toString(2).length - 1;
}

/** Height of the node in the trie: index of its lowest set bit, or the id width for the root. */
export function levelOf(id: OrderId): number {
  if (id === ROOT_ID) {
    return ID_WIDTH;
  }

  return bitIndex(lowestSetBit(id));
}

export function parentOf(id: OrderId): OrderId {
  return id & (id - 1n);
}

export function ancestorsOf(id: OrderId): OrderId[] {
  const chain: OrderId[] = [];
  let cursor = id;
  while (cursor !== ROOT_ID) {
    cursor = parentOf(cursor);
    chain.push(cursor);
  }

  return chain;
}

export function isBitSet(value: bigint, bit: number): boolean {
  return ((value >> BigInt(bit)) & 1n) === 1n;
}

export function highestDifferingBit(left: OrderId, right: OrderId): number {
  return bitIndex(left ^ right);
}

/**
 * Trie node heading the ids above `id` that share its bits over `bit` and have `bit` set.
 * Only meaningful when `bit` is clear in `id`.
 */
export function regionNode(id: OrderId, bit: number): OrderId {
  const shift = BigInt(bit);
  return ((id >> shift) << shift) + (1n << shift);
}

export function isWithinSubtree(node: OrderId, target: OrderId): boolean {
  if (node === ROOT_ID) {
    return true;
  }

  const mask = ~(lowestSetBit(node) - 1n) & MAX_ORDER_ID;
  const key = node & mask;
  return (target & mask) === key;
}

export function baseIdForPrice(price: bigint): OrderId {
  if (price < 0n || price > MAX_PRICE) {
    throw new OrderIndexError('arithmetic_overflow', 'price does not fit the identifier width', {
      price: price.toString(),
    });
  }

  return 2n * price + 1n;
}

export function parseOrderId(raw: unknown): OrderId {
  let candidate: bigint | null = null;

  if (typeof raw === 'bigint') {
    candidate = raw;
  } else if (typeof raw === 'number' && Number.isSafeInteger(raw)) {
    candidate = BigInt(raw);
  } else if (typeof raw === 'string' && /^\d+$/.test(raw.trim())) {
    candidate = BigInt(raw.trim());
  }

  if (candidate === null || candidate <= ROOT_ID || candidate > MAX_ORDER_ID || (candidate & 1n) === 0n) {
    throw new OrderIndexError('malformed_identifier', 'order id must be an odd 64-bit integer', {
      id: String(raw),
    });
  }

  return candidate;
}

export function checkedAdd(left: bigint, right: bigint): bigint {
  const result = left + right;
  if (result > MAX_UINT128) {
    throw new OrderIndexError('arithmetic_overflow', 'uint128 addition overflow', {
      left: left.toString(),
      right: right.toString(),
    });
  }

  return result;
}

export function checkedSub(left: bigint, right: bigint): bigint {
  if (right > left) {
    throw new OrderIndexError('arithmetic_underflow', 'uint128 subtraction underflow', {
      left: left.toString(),
      right: right.toString(),
    });
  }

  return left - right;
}

export function checkedMul(left: bigint, right: bigint): bigint {
  const result = left * right;
  if (result > MAX_UINT128) {
    throw new OrderIndexError('arithmetic_overflow', 'uint128 multiplication overflow', {
      left: left.toString(),
      right: right.toString(),
    });
  }

  return result;
}
