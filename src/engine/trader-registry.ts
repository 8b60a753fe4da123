import { getAddress, isAddress, type Address } from 'viem';

import { OrderIndexError } from './errors.js';
import { ROOT_ID } from './identifiers.js';
import type { RecordStore } from './record-store.js';
import type { BookHeader } from './storage.js';

export interface TraderIdRecord {
  traderId: number;
}

export interface TraderOwnerRecord {
  owner: Address | null;
}

export function normalizeOwner(owner: string): Address {
  if (!isAddress(owner, { strict: false })) {
    throw new OrderIndexError('malformed_owner', 'owner must be a 20-byte hex address', { owner });
  }

  return getAddress(owner);
}

export class TraderRegistry {
  constructor(
    private readonly traderIds: RecordStore<TraderIdRecord>,
    private readonly owners: RecordStore<TraderOwnerRecord>,
    private readonly header: RecordStore<BookHeader>
  ) {}

  idFor(owner: string): number {
    const normalized = normalizeOwner(owner);
    const key = BigInt(normalized);

    const existing = this.traderIds.read(key).traderId;
    if (existing !== 0) {
      return existing;
    }

    const header = this.header.read(ROOT_ID);
    const traderId = header.traderCount + 1;
    this.header.write(ROOT_ID, { ...header, traderCount: traderId });
    this.traderIds.write(key, { traderId });
    this.owners.write(BigInt(traderId), { owner: normalized });

    return traderId;
  }

  /** 0 when the owner has never placed an order. */
  traderIdOf(owner: string): number {
    return this.traderIds.read(BigInt(normalizeOwner(owner))).traderId;
  }

  ownerFor(traderId: number): Address | null {
    if (traderId === 0) {
      return null;
    }

    return this.owners.read(BigInt(traderId)).owner;
  }
}
