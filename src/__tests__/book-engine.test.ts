import { describe, expect, it, vi } from 'vitest';
import { zeroAddress } from 'viem';

import { BookEngine } from '../engine/book-engine.js';
import { MetricsRegistry } from '../metrics/registry.js';
import type { EngineConfig } from '../types/config.js';
import type { BookEventPayload, ExecutionEventPayload } from '../types/engine.js';
import { OWNER_A, OWNER_B, errorCodeOf } from './test-helpers.js';

const config: EngineConfig = {
  markets: ['ETH-USD', 'BTC-USD'],
  maxProbeLength: 64,
  defaultBookDepth: 10,
  maxBookDepth: 100,
  settlementAddress: zeroAddress,
};

function createEngine() {
  const metrics = new MetricsRegistry();
  const engine = new BookEngine({ config, metrics });
  return { engine, metrics };
}

describe('BookEngine', () => {
  it('keeps one independent book per market', () => {
    const { engine } = createEngine();

    expect(engine.addOrder('ETH-USD', { price: 10n, amount: 5n, owner: OWNER_A })).toBe(21n);
    expect(engine.addOrder('BTC-USD', { price: 10n, amount: 5n, owner: OWNER_A })).toBe(21n);
    expect(engine.getMarkets()).toEqual([
      { market: 'ETH-USD', settlementAddress: zeroAddress, bestOfferId: 21n, liveOrders: 1 },
      { market: 'BTC-USD', settlementAddress: zeroAddress, bestOfferId: 21n, liveOrders: 1 },
    ]);
  });

  it('publishes a book snapshot after every mutation', () => {
    const { engine } = createEngine();
    const snapshots: BookEventPayload[] = [];
    engine.on('book', (payload: BookEventPayload) => snapshots.push(payload));

    engine.addOrder('ETH-USD', { price: 10n, amount: 5n, owner: OWNER_A });
    engine.addOrder('ETH-USD', { price: 12n, amount: 2n, owner: OWNER_B });
    engine.removeOrder('ETH-USD', 10n, 21n);
    engine.removeOrder('ETH-USD', 10n, 21n);

    expect(snapshots.map((payload) => payload.snapshot.sequence)).toEqual([1, 2, 3]);
    const last = snapshots[2]?.snapshot;
    expect(last?.bestOfferId).toBe(25n);
    expect(last?.bestPrice).toBe(12n);
    expect(last?.orders).toEqual([{ orderId: 25n, price: 12n, remainingShares: 2n, owner: OWNER_B }]);
  });

  it('emits executions only when something filled', () => {
    const { engine } = createEngine();
    const executions: ExecutionEventPayload[] = [];
    engine.on('execution', (payload: ExecutionEventPayload) => executions.push(payload));

    engine.addOrder('ETH-USD', { price: 10n, amount: 5n, owner: OWNER_A });
    engine.executeRight('ETH-USD', 9n, 5n);
    engine.executeRight('ETH-USD', 10n, 2n);

    expect(executions).toHaveLength(1);
    expect(executions[0]?.market).toBe('ETH-USD');
    expect(executions[0]?.execution.executedShares).toBe(2n);
    expect(engine.getStats().totalExecutions).toBe(1);
  });

  it('derives claims from fills regardless of the requested amount', () => {
    const { engine } = createEngine();
    engine.addOrder('ETH-USD', { price: 10n, amount: 5n, owner: OWNER_A });
    engine.executeRight('ETH-USD', 10n, 4n);

    expect(engine.claimExecuted('ETH-USD', 10n, 21n, 1n)).toEqual({
      executedShares: 4n,
      executedValue: 40n,
      remainingShares: 1n,
    });
    expect(engine.getStats().totalClaims).toBe(1);
  });

  it('builds snapshots at the requested depth', () => {
    const { engine } = createEngine();
    engine.addOrder('ETH-USD', { price: 10n, amount: 5n, owner: OWNER_A });
    engine.addOrder('ETH-USD', { price: 20n, amount: 1n, owner: OWNER_B });

    const snapshot = engine.getSnapshot('ETH-USD', 1);
    expect(snapshot.orders).toHaveLength(1);
    expect(snapshot.totalShares).toBe(6n);
    expect(snapshot.totalValue).toBe(70n);
    expect(engine.getSnapshot('ETH-USD', 0).bestPrice).toBe(10n);
    expect(engine.getSnapshot('BTC-USD').bestPrice).toBeNull();
  });

  it('rejects unknown markets', () => {
    const { engine } = createEngine();

    expect(errorCodeOf(() => engine.getSnapshot('DOGE-USD'))).toBe('unknown_market');
    expect(errorCodeOf(() => engine.addOrder('DOGE-USD', { price: 1n, amount: 1n, owner: OWNER_A }))).toBe(
      'unknown_market'
    );
  });

  it('counts failed operations and logs rejections', () => {
    const { engine } = createEngine();
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    expect(errorCodeOf(() => engine.addOrder('ETH-USD', { price: 1n, amount: 1n, owner: 'nobody' }))).toBe(
      'malformed_owner'
    );

    expect(engine.getStats().failedOperations).toBe(1);
    expect(write).toHaveBeenCalledTimes(1);
    const [line] = write.mock.calls[0] ?? [];
    expect(JSON.parse(String(line))).toMatchObject({
      level: 'warn',
      context: 'book-engine',
      message: 'order index operation rejected',
      market: 'ETH-USD',
      operation: 'add_order',
      code: 'malformed_owner',
    });

    write.mockRestore();
  });

  it('records operation metrics by outcome', async () => {
    const { engine, metrics } = createEngine();
    engine.addOrder('ETH-USD', { price: 10n, amount: 5n, owner: OWNER_A });
    engine.getOrderInfo('ETH-USD', 10n, 23n);
    engine.executeRight('ETH-USD', 10n, 3n);

    const operations = await metrics.operationsTotal.get();
    const count = (operation: string, outcome: string) =>
      operations.values.find((entry) => entry.labels.operation === operation && entry.labels.outcome === outcome)
        ?.value;

    expect(count('add_order', 'ok')).toBe(1);
    expect(count('get_order_info', 'not_found')).toBe(1);

    const executed = await metrics.executedSharesTotal.get();
    expect(executed.values[0]?.value).toBe(3);

    const live = await metrics.liveOrders.get();
    expect(live.values.find((entry) => entry.labels.market === 'ETH-USD')?.value).toBe(1);
  });
});
