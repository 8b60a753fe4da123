import type { AggregateTrie } from './aggregate-trie.js';
import { OrderIndexError } from './errors.js';
import { MAX_ORDER_ID, ROOT_ID, baseIdForPrice, type OrderId } from './identifiers.js';
import { isLiveLeaf, priceOfLeaf, type OrderStore } from './order-store.js';

export interface IdentifierAllocatorOptions {
  maxProbeLength: number;
}

export class IdentifierAllocator {
  constructor(
    private readonly orders: OrderStore,
    private readonly trie: AggregateTrie,
    private readonly options: IdentifierAllocatorOptions
  ) {}

  /**
   * Starts at `2 * price + 1` and probes upward. A free slot is only taken when every live
   * order above it is priced higher, which keeps ids ordered by price and then by arrival.
   */
  allocate(price: bigint): OrderId {
    let id = baseIdForPrice(price);

    for (let probes = 0; probes <= this.options.maxProbeLength; probes += 1) {
      const occupant = this.orders.get(id);
      if (isLiveLeaf(occupant)) {
        if (priceOfLeaf(occupant) > price) {
          throw new OrderIndexError('price_level_full', 'no identifier left between adjacent price levels', {
            price: price.toString(),
            blockedBy: id.toString(),
          });
        }

        id = this.step(id);
        continue;
      }

      const next = this.trie.successorOf(id);
      if (next === ROOT_ID || priceOfLeaf(this.orders.get(next)) > price) {
        return id;
      }

      id = this.step(next);
    }

    throw new OrderIndexError('allocator_exhausted', 'identifier probe limit reached', {
      price: price.toString(),
      maxProbeLength: this.options.maxProbeLength,
    });
  }

  private step(id: OrderId): OrderId {
    const next = id + 2n;
    if (next > MAX_ORDER_ID) {
      throw new OrderIndexError('arithmetic_overflow', 'identifier probe overflowed the id width', {
        id: id.toString(),
      });
    }

    return next;
  }
}
