import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

import type { BookOperation, OperationOutcome } from '../types/engine.js';

export class MetricsRegistry {
  readonly registry: Registry;

  readonly operationsTotal: Counter<'market' | 'operation' | 'outcome'>;
  readonly executedSharesTotal: Counter<'market'>;
  readonly operationLatencyMs: Histogram<'market' | 'operation'>;
  readonly liveOrders: Gauge<'market'>;
  readonly wsConnections: Gauge;

  constructor() {
    this.registry = new Registry();
    collectDefaultMetrics({ register: this.registry });

    this.operationsTotal = new Counter({
      name: 'order_index_operations_total',
      help: 'Total number of order index operations by market, operation and outcome',
      labelNames: ['market', 'operation', 'outcome'],
      registers: [this.registry],
    });

    this.executedSharesTotal = new Counter({
      name: 'order_index_executed_shares_total',
      help: 'Total number of shares executed against resting orders',
      labelNames: ['market'],
      registers: [this.registry],
    });

    this.operationLatencyMs = new Histogram({
      name: 'order_index_operation_latency_ms',
      help: 'Order index operation latency distribution in milliseconds',
      labelNames: ['market', 'operation'],
      buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10, 25, 50],
      registers: [this.registry],
    });

    this.liveOrders = new Gauge({
      name: 'order_index_live_orders',
      help: 'Current number of resting orders per market',
      labelNames: ['market'],
      registers: [this.registry],
    });

    this.wsConnections = new Gauge({
      name: 'order_index_ws_connections',
      help: 'Current number of websocket client connections',
      registers: [this.registry],
    });
  }

  recordOperation(market: string, operation: BookOperation, outcome: OperationOutcome, latencyMs: number): void {
    this.operationsTotal.inc({ market, operation, outcome });
    this.operationLatencyMs.observe({ market, operation }, latencyMs);
  }
}
