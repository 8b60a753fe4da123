import { describe, expect, it } from 'vitest';

import { IdentifierAllocator } from '../engine/identifier-allocator.js';
import { MAX_ORDER_ID, MAX_PRICE } from '../engine/identifiers.js';
import { createTrieFixture, errorCodeOf } from './test-helpers.js';

function createAllocator(maxProbeLength = 64) {
  const fixture = createTrieFixture();
  const allocator = new IdentifierAllocator(fixture.orders, fixture.trie, { maxProbeLength });
  return { ...fixture, allocator };
}

describe('IdentifierAllocator', () => {
  it('starts at the base identifier of the price', () => {
    const { allocator } = createAllocator();

    expect(allocator.allocate(10n)).toBe(21n);
    expect(allocator.allocate(0n)).toBe(1n);
  });

  it('probes past live orders at the same price', () => {
    const { allocator, place } = createAllocator();
    place(21n, 5n, 10n);

    expect(allocator.allocate(10n)).toBe(23n);
  });

  it('takes a free slot that sits below a higher price', () => {
    const { allocator, place } = createAllocator();
    place(23n, 1n, 11n);

    expect(allocator.allocate(10n)).toBe(21n);
  });

  it('skips a freed slot that would jump the queue at its price', () => {
    const { allocator, place } = createAllocator();
    place(23n, 3n, 10n);

    expect(allocator.allocate(10n)).toBe(25n);
  });

  it('fails when the next price level blocks the probe', () => {
    const { allocator, place } = createAllocator();
    place(21n, 5n, 10n);
    place(23n, 1n, 11n);

    expect(errorCodeOf(() => allocator.allocate(10n))).toBe('price_level_full');
  });

  it('gives up after the configured number of probes', () => {
    const { allocator, place } = createAllocator(2);
    place(21n, 1n, 10n);
    place(23n, 1n, 10n);
    place(25n, 1n, 10n);

    expect(errorCodeOf(() => allocator.allocate(10n))).toBe('allocator_exhausted');
  });

  it('rejects prices and probes beyond the identifier width', () => {
    const { allocator, place } = createAllocator();
    expect(errorCodeOf(() => allocator.allocate(MAX_PRICE + 1n))).toBe('arithmetic_overflow');

    place(MAX_ORDER_ID, 1n, MAX_PRICE);
    expect(errorCodeOf(() => allocator.allocate(MAX_PRICE))).toBe('arithmetic_overflow');
  });
});
