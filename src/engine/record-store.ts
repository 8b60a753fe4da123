import { invariant } from './errors.js';

/**
 * Flat integer-keyed record storage. Reads of absent keys return the zero record,
 * and every record handed out is a copy, so callers write changes back explicitly.
 */
export interface RecordStore<T extends object> {
  read(key: bigint): T;
  has(key: bigint): boolean;
  write(key: bigint, record: T): void;
  erase(key: bigint): void;
}

export interface TransactionalStore {
  begin(): void;
  commit(): void;
  rollback(): void;
}

export class MemoryRecordStore<T extends object> implements RecordStore<T>, TransactionalStore {
  private readonly committed = new Map<bigint, T>();
  private pending: Map<bigint, T | null> | null = null;

  constructor(private readonly zero: () => T) {}

  read(key: bigint): T {
    const record = this.lookup(key);
    return record ? { ...record } : this.zero();
  }

  has(key: bigint): boolean {
    return this.lookup(key) !== undefined;
  }

  write(key: bigint, record: T): void {
    const copy = { ...record };
    if (this.pending) {
      this.pending.set(key, copy);
      return;
    }

    this.committed.set(key, copy);
  }

  erase(key: bigint): void {
    if (this.pending) {
      this.pending.set(key, null);
      return;
    }

    this.committed.delete(key);
  }

  begin(): void {
    invariant(this.pending === null, 'record store transaction already open');
    this.pending = new Map();
  }

  commit(): void {
    invariant(this.pending !== null, 'no record store transaction to commit');
    for (const [key, record] of this.pending) {
      if (record === null) {
        this.committed.delete(key);
      } else {
        this.committed.set(key, record);
      }
    }

    this.pending = null;
  }

  rollback(): void {
    this.pending = null;
  }

  get size(): number {
    return this.committed.size;
  }

  *entries(): Generator<[bigint, T], void, undefined> {
    for (const [key, record] of this.committed) {
      yield [key, { ...record }];
    }
  }

  private lookup(key: bigint): T | undefined {
    if (this.pending?.has(key)) {
      return this.pending.get(key) ?? undefined;
    }

    return this.committed.get(key);
  }
}
