import type { BookSnapshot, ExecutionResult } from './order.js';

export type BookOperation =
  | 'add_order'
  | 'remove_order'
  | 'claim_executed'
  | 'execute_right'
  | 'preview_execute_right'
  | 'get_order_info'
  | 'assemble_orderbook';

export type OperationOutcome = 'ok' | 'not_found' | 'error';

export interface EngineStats {
  startedAtMs: number;
  totalOrdersAdded: number;
  totalOrdersRemoved: number;
  totalExecutions: number;
  totalClaims: number;
  failedOperations: number;
  liveOrders: number;
  avgProcessingLatencyMs: number;
  p95ProcessingLatencyMs: number;
}

export interface BookEventPayload {
  market: string;
  snapshot: BookSnapshot;
}

export interface ExecutionEventPayload {
  market: string;
  execution: ExecutionResult;
}
