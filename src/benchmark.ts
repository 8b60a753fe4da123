import { zeroAddress } from 'viem';

import { BookEngine } from './engine/book-engine.js';
import { OrderIndexError } from './engine/errors.js';
import type { OrderId } from './engine/identifiers.js';
import { MetricsRegistry } from './metrics/registry.js';
import { XorShift32 } from './utils/prng.js';

const MARKET = 'ETH-USD';
const ITERATIONS = 25_000;
const SEED_ORDERS = 2_000;
// ticks are spread so each price level has room for many resting orders
const TICK = 64n;
const MID_TICK = 3_000n;

interface RestingOrder {
  id: OrderId;
  price: bigint;
}

type BenchmarkOperation = 'add' | 'execute' | 'remove' | 'claim';

const OWNERS = Array.from(
  { length: 16 },
  (_, index) => `0x${(index + 1).toString(16).padStart(40, '0')}`
);

function chooseOperation(random: XorShift32): BenchmarkOperation {
  const roll = random.nextFloat();
  if (roll < 0.55) {
    return 'add';
  }
  if (roll < 0.75) {
    return 'execute';
  }
  if (roll < 0.95) {
    return 'remove';
  }
  return 'claim';
}

function benchmark(): void {
  process.env.LOG_LEVEL ??= 'error';

  const engine = new BookEngine({
    config: {
      markets: [MARKET],
      maxProbeLength: 4_096,
      defaultBookDepth: 50,
      maxBookDepth: 500,
      settlementAddress: zeroAddress,
    },
    metrics: new MetricsRegistry(),
  });

  const random = new XorShift32(123);
  const resting: RestingOrder[] = [];
  let rejected = 0;

  const addRandomOrder = (): void => {
    const price = (MID_TICK + BigInt(random.nextInt(-200, 200))) * TICK;
    const owner = random.pick(OWNERS) ?? OWNERS[0] ?? '';
    const id = engine.addOrder(MARKET, { price, amount: BigInt(random.nextInt(1, 50)), owner });
    resting.push({ id, price });
  };

  for (let i = 0; i < SEED_ORDERS; i += 1) {
    addRandomOrder();
  }

  const latencySamples: number[] = [];
  const startedAt = performance.now();

  for (let i = 0; i < ITERATIONS; i += 1) {
    const operation = chooseOperation(random);
    const now = performance.now();

    try {
      if (operation === 'add' || resting.length === 0) {
        addRandomOrder();
      } else if (operation === 'execute') {
        const limit = (MID_TICK + BigInt(random.nextInt(-50, 50))) * TICK;
        engine.executeRight(MARKET, limit, BigInt(random.nextInt(1, 200)));
      } else {
        const index = random.nextInt(0, resting.length - 1);
        const order = resting[index];
        if (order) {
          if (operation === 'remove') {
            engine.removeOrder(MARKET, order.price, order.id);
            resting.splice(index, 1);
          } else {
            engine.claimExecuted(MARKET, order.price, order.id);
          }
        }
      }
    } catch (error) {
      if (!(error instanceof OrderIndexError) || error.code === 'invariant_violation') {
        throw error;
      }
      rejected += 1;
    }

    latencySamples.push(performance.now() - now);
  }

  const elapsedMs = performance.now() - startedAt;
  const throughput = (ITERATIONS / elapsedMs) * 1_000;
  const sorted = latencySamples.sort((left, right) => left - right);
  const p50 = sorted[Math.floor(sorted.length * 0.5)] ?? 0;
  const p95 = sorted[Math.floor(sorted.length * 0.95)] ?? 0;
  const p99 = sorted[Math.floor(sorted.length * 0.99)] ?? 0;
  const state = engine.getState(MARKET);

  console.log(
    JSON.stringify(
      {
        benchmark: 'trie-order-index',
        iterations: ITERATIONS,
        elapsedMs,
        throughputOpsPerSec: Number(throughput.toFixed(2)),
        rejected,
        latencyMs: {
          p50: Number(p50.toFixed(3)),
          p95: Number(p95.toFixed(3)),
          p99: Number(p99.toFixed(3)),
        },
        book: {
          liveOrders: state.liveOrders,
          bestOfferId: state.bestOfferId.toString(),
          totalShares: state.totalShares.toString(),
        },
        finalStats: engine.getStats(),
      },
      null,
      2
    )
  );
}

try {
  benchmark();
} catch (error) {
  console.error(error);
  process.exit(1);
}
