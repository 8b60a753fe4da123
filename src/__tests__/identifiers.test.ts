import { describe, expect, it } from 'vitest';

import {
  MAX_ORDER_ID,
  MAX_PRICE,
  MAX_UINT128,
  ancestorsOf,
  baseIdForPrice,
  bitIndex,
  checkedAdd,
  checkedMul,
  checkedSub,
  highestDifferingBit,
  isWithinSubtree,
  levelOf,
  lowestSetBit,
  parentOf,
  parseOrderId,
  regionNode,
} from '../engine/identifiers.js';
import { errorCodeOf } from './test-helpers.js';

describe('identifier arithmetic', () => {
  it('derives levels and parents from the low bits', () => {
    expect(lowestSetBit(12n)).toBe(4n);
    expect(bitIndex(8n)).toBe(3);
    expect(levelOf(0n)).toBe(64);
    expect(levelOf(20n)).toBe(2);
    expect(levelOf(21n)).toBe(0);
    expect(parentOf(23n)).toBe(22n);
    expect(parentOf(32n)).toBe(0n);
  });

  it('walks the ancestor chain up to the root', () => {
    expect(ancestorsOf(21n)).toEqual([20n, 16n, 0n]);
    expect(ancestorsOf(23n)).toEqual([22n, 20n, 16n, 0n]);
    expect(ancestorsOf(41n)).toEqual([40n, 32n, 0n]);
    expect(ancestorsOf(0n)).toEqual([]);
  });

  it('locates the region node above a clear bit', () => {
    expect(highestDifferingBit(21n, 41n)).toBe(5);
    expect(highestDifferingBit(21n, 23n)).toBe(1);
    expect(regionNode(21n, 1)).toBe(22n);
    expect(regionNode(21n, 5)).toBe(32n);
    expect(regionNode(23n, 3)).toBe(24n);
  });

  it('tests subtree membership with the node mask', () => {
    expect(isWithinSubtree(32n, 41n)).toBe(true);
    expect(isWithinSubtree(22n, 23n)).toBe(true);
    expect(isWithinSubtree(22n, 21n)).toBe(false);
    expect(isWithinSubtree(22n, 25n)).toBe(false);
    expect(isWithinSubtree(23n, 23n)).toBe(true);
    expect(isWithinSubtree(0n, MAX_ORDER_ID)).toBe(true);
  });
});

describe('price and id validation', () => {
  it('maps a price to its base identifier', () => {
    expect(baseIdForPrice(0n)).toBe(1n);
    expect(baseIdForPrice(10n)).toBe(21n);
    expect(baseIdForPrice(MAX_PRICE)).toBe(MAX_ORDER_ID);
  });

  it('rejects prices outside the identifier width', () => {
    expect(errorCodeOf(() => baseIdForPrice(MAX_PRICE + 1n))).toBe('arithmetic_overflow');
    expect(errorCodeOf(() => baseIdForPrice(-1n))).toBe('arithmetic_overflow');
  });

  it('parses odd 64-bit identifiers from strings, numbers and bigints', () => {
    expect(parseOrderId('23')).toBe(23n);
    expect(parseOrderId(' 41 ')).toBe(41n);
    expect(parseOrderId(21)).toBe(21n);
    expect(parseOrderId(MAX_ORDER_ID)).toBe(MAX_ORDER_ID);
  });

  it('rejects even, zero, oversized and non-numeric identifiers', () => {
    for (const raw of ['22', '0', 'abc', '-3', 1.5, MAX_ORDER_ID + 2n, null, undefined]) {
      expect(errorCodeOf(() => parseOrderId(raw))).toBe('malformed_identifier');
    }
  });
});

describe('checked uint128 math', () => {
  it('returns exact results inside the range', () => {
    expect(checkedAdd(MAX_UINT128 - 1n, 1n)).toBe(MAX_UINT128);
    expect(checkedSub(5n, 5n)).toBe(0n);
    expect(checkedMul(1n << 64n, (1n << 64n) - 1n)).toBe((1n << 128n) - (1n << 64n));
  });

  it('aborts on overflow and underflow', () => {
    expect(errorCodeOf(() => checkedAdd(MAX_UINT128, 1n))).toBe('arithmetic_overflow');
    expect(errorCodeOf(() => checkedSub(1n, 2n))).toBe('arithmetic_underflow');
    expect(errorCodeOf(() => checkedMul(1n << 64n, 1n << 64n))).toBe('arithmetic_overflow');
  });
});
