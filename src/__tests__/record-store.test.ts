import { describe, expect, it } from 'vitest';

import { MemoryRecordStore } from '../engine/record-store.js';
import { errorCodeOf } from './test-helpers.js';

interface Counter {
  value: number;
}

function createStore(): MemoryRecordStore<Counter> {
  return new MemoryRecordStore<Counter>(() => ({ value: 0 }));
}

describe('MemoryRecordStore', () => {
  it('reads the zero record for absent keys', () => {
    const store = createStore();

    expect(store.read(7n)).toEqual({ value: 0 });
    expect(store.has(7n)).toBe(false);
    expect(store.size).toBe(0);
  });

  it('hands out copies so callers must write changes back', () => {
    const store = createStore();
    store.write(1n, { value: 3 });

    const record = store.read(1n);
    record.value = 99;

    expect(store.read(1n)).toEqual({ value: 3 });
  });

  it('commits pending writes and erasures together', () => {
    const store = createStore();
    store.write(1n, { value: 1 });
    store.write(2n, { value: 2 });

    store.begin();
    store.write(1n, { value: 10 });
    store.erase(2n);
    expect(store.read(1n)).toEqual({ value: 10 });
    expect(store.has(2n)).toBe(false);
    store.commit();

    expect(store.read(1n)).toEqual({ value: 10 });
    expect(store.has(2n)).toBe(false);
    expect(Array.from(store.entries())).toEqual([[1n, { value: 10 }]]);
  });

  it('discards pending changes on rollback', () => {
    const store = createStore();
    store.write(1n, { value: 1 });

    store.begin();
    store.write(1n, { value: 5 });
    store.write(3n, { value: 3 });
    store.erase(1n);
    store.rollback();

    expect(store.read(1n)).toEqual({ value: 1 });
    expect(store.has(3n)).toBe(false);
    expect(store.size).toBe(1);
  });

  it('refuses nested transactions and stray commits', () => {
    const store = createStore();

    expect(errorCodeOf(() => store.commit())).toBe('invariant_violation');

    store.begin();
    expect(errorCodeOf(() => store.begin())).toBe('invariant_violation');
    store.rollback();
  });
});
