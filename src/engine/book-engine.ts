import { EventEmitter } from 'node:events';

import type { EngineConfig } from '../types/config.js';
import type { BookOperation, EngineStats, OperationOutcome } from '../types/engine.js';
import type {
  AddOrderRequest,
  BookEntry,
  BookSnapshot,
  ClaimResult,
  ExecutionPreview,
  ExecutionResult,
  OrderIndexState,
  OrderInfo,
  RemoveOrderResult,
} from '../types/order.js';
import { Logger } from '../logging/logger.js';
import type { MetricsRegistry } from '../metrics/registry.js';
import { OrderIndexError, asErrorPayload } from './errors.js';
import { MAX_UINT128, type OrderId } from './identifiers.js';
import { OrderIndex } from './order-index.js';

const logger = new Logger('book-engine');

interface BookEngineOptions {
  config: EngineConfig;
  metrics: MetricsRegistry;
}

interface ProcessingMetrics {
  lastLatencies: number[];
  maxSamples: number;
}

export interface MarketSummary {
  market: string;
  settlementAddress: string;
  bestOfferId: OrderId;
  liveOrders: number;
}

const FATAL_CODES = new Set(['invariant_violation', 'unexpected_error']);

export class BookEngine extends EventEmitter {
  private readonly books = new Map<string, OrderIndex>();
  private readonly sequences = new Map<string, number>();
  private readonly startedAtMs = Date.now();

  private readonly processingMetrics: ProcessingMetrics = {
    lastLatencies: [],
    maxSamples: 2000,
  };

  private totalOrdersAdded = 0;
  private totalOrdersRemoved = 0;
  private totalExecutions = 0;
  private totalClaims = 0;
  private failedOperations = 0;

  constructor(private readonly options: BookEngineOptions) {
    super();

    for (const market of options.config.markets) {
      this.books.set(
        market,
        new OrderIndex({
          maxProbeLength: options.config.maxProbeLength,
          settlementAddress: options.config.settlementAddress,
        })
      );
      this.sequences.set(market, 0);
      options.metrics.liveOrders.set({ market }, 0);
    }
  }

  addOrder(market: string, request: AddOrderRequest): OrderId {
    const orderId = this.run(
      market,
      'add_order',
      (book) => book.addOrder(request.price, request.amount, request.owner),
      true
    );

    this.totalOrdersAdded += 1;
    this.publishBook(market);
    return orderId;
  }

  removeOrder(market: string, price: bigint, orderId: OrderId | string): RemoveOrderResult {
    const result = this.run(
      market,
      'remove_order',
      (book) => book.removeOrder(price, orderId),
      (removed) => removed.owner !== null
    );

    if (result.owner !== null) {
      this.totalOrdersRemoved += 1;
      this.publishBook(market);
    }
    return result;
  }

  claimExecuted(market: string, price: bigint, orderId: OrderId | string, requestedShares?: bigint): ClaimResult {
    const result = this.run(
      market,
      'claim_executed',
      (book) => book.claimExecuted(price, orderId),
      (claim) => claim.executedShares > 0n || claim.remainingShares > 0n
    );

    if (requestedShares !== undefined && requestedShares !== result.executedShares) {
      logger.debug('claimed shares differ from the requested amount', {
        market,
        orderId: String(orderId),
        requestedShares: requestedShares.toString(),
        executedShares: result.executedShares.toString(),
      });
    }

    if (result.executedShares > 0n) {
      this.totalClaims += 1;
    }
    return result;
  }

  executeRight(market: string, price: bigint, amount: bigint): ExecutionResult {
    const result = this.run(market, 'execute_right', (book) => book.executeRight(price, amount), true);

    if (result.executedShares > 0n) {
      this.totalExecutions += 1;
      this.options.metrics.executedSharesTotal.inc({ market }, Number(result.executedShares));
      this.emit('execution', { market, execution: result });
      this.publishBook(market);
    }
    return result;
  }

  previewExecuteRight(market: string, price: bigint, amount: bigint): ExecutionPreview {
    return this.run(market, 'preview_execute_right', (book) => book.previewExecuteRight(price, amount), true);
  }

  getOrderInfo(market: string, price: bigint, orderId: OrderId | string): OrderInfo {
    return this.run(
      market,
      'get_order_info',
      (book) => book.getOrderInfo(price, orderId),
      (info) => info.owner !== null
    );
  }

  assembleOrderbook(market: string, price: bigint, count: number): BookEntry[] {
    return this.run(market, 'assemble_orderbook', (book) => book.assembleOrderbookFromOrders(price, count), true);
  }

  getSnapshot(market: string, depth = this.options.config.defaultBookDepth): BookSnapshot {
    const book = this.getBook(market);
    const state = book.inspect();
    const orders = book.assembleOrderbookFromOrders(MAX_UINT128, depth);
    const best = orders[0] ?? book.assembleOrderbookFromOrders(MAX_UINT128, 1)[0];

    return {
      market,
      sequence: this.sequences.get(market) ?? 0,
      timestampMs: Date.now(),
      bestOfferId: state.bestOfferId,
      bestPrice: best?.price ?? null,
      totalShares: state.totalShares,
      totalValue: state.totalValue,
      liveOrders: state.liveOrders,
      orders,
    };
  }

  getState(market: string): OrderIndexState {
    return this.getBook(market).inspect();
  }

  getMarkets(): MarketSummary[] {
    return Array.from(this.books.entries()).map(([market, book]) => {
      const state = book.inspect();
      return {
        market,
        settlementAddress: state.settlementAddress,
        bestOfferId: state.bestOfferId,
        liveOrders: state.liveOrders,
      };
    });
  }

  getSupportedMarkets(): string[] {
    return Array.from(this.books.keys());
  }

  getStats(): EngineStats {
    const liveOrders = Array.from(this.books.values()).reduce((sum, book) => sum + book.inspect().liveOrders, 0);

    return {
      startedAtMs: this.startedAtMs,
      totalOrdersAdded: this.totalOrdersAdded,
      totalOrdersRemoved: this.totalOrdersRemoved,
      totalExecutions: this.totalExecutions,
      totalClaims: this.totalClaims,
      failedOperations: this.failedOperations,
      liveOrders,
      avgProcessingLatencyMs: this.computeAvgLatency(),
      p95ProcessingLatencyMs: this.computeP95Latency(),
    };
  }

  private run<T>(
    market: string,
    operation: BookOperation,
    action: (book: OrderIndex) => T,
    found: boolean | ((result: T) => boolean)
  ): T {
    const book = this.getBook(market);
    const startedAt = performance.now();

    let result: T;
    try {
      result = action(book);
    } catch (error) {
      this.failedOperations += 1;
      this.options.metrics.recordOperation(market, operation, 'error', performance.now() - startedAt);

      const payload = asErrorPayload(error);
      const fields = { market, operation, code: payload.code, error: payload.message, ...payload.context };
      if (FATAL_CODES.has(payload.code)) {
        logger.error('order index operation aborted', fields);
      } else {
        logger.warn('order index operation rejected', fields);
      }
      throw error;
    }

    const latencyMs = performance.now() - startedAt;
    const isFound = typeof found === 'function' ? found(result) : found;
    const outcome: OperationOutcome = isFound ? 'ok' : 'not_found';

    this.recordProcessingLatency(latencyMs);
    this.options.metrics.recordOperation(market, operation, outcome, latencyMs);
    return result;
  }

  private publishBook(market: string): void {
    this.sequences.set(market, (this.sequences.get(market) ?? 0) + 1);

    const snapshot = this.getSnapshot(market);
    this.options.metrics.liveOrders.set({ market }, snapshot.liveOrders);
    this.emit('book', { market, snapshot });
  }

  private getBook(market: string): OrderIndex {
    const book = this.books.get(market);
    if (!book) {
      throw new OrderIndexError('unknown_market', `Unsupported market: ${market}`, { market });
    }
    return book;
  }

  private recordProcessingLatency(latencyMs: number): void {
    this.processingMetrics.lastLatencies.push(latencyMs);
    if (this.processingMetrics.lastLatencies.length > this.processingMetrics.maxSamples) {
      this.processingMetrics.lastLatencies.shift();
    }
  }

  private computeAvgLatency(): number {
    if (this.processingMetrics.lastLatencies.length === 0) {
      return 0;
    }

    const total = this.processingMetrics.lastLatencies.reduce((sum, latency) => sum + latency, 0);
    return total / this.processingMetrics.lastLatencies.length;
  }

  private computeP95Latency(): number {
    if (this.processingMetrics.lastLatencies.length === 0) {
      return 0;
    }

    const ordered = [...this.processingMetrics.lastLatencies].sort((left, right) => left - right);
    const p95Index = Math.min(ordered.length - 1, Math.floor(ordered.length * 0.95));
    return ordered[p95Index] ?? 0;
  }
}
