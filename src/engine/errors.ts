export type OrderIndexErrorCode =
  | 'malformed_identifier'
  | 'malformed_owner'
  | 'invalid_amount'
  | 'arithmetic_overflow'
  | 'arithmetic_underflow'
  | 'allocator_exhausted'
  | 'price_level_full'
  | 'invariant_violation'
  | 'unknown_market';

export class OrderIndexError extends Error {
  readonly code: OrderIndexErrorCode;
  readonly context: Record<string, unknown> | undefined;

  constructor(code: OrderIndexErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'OrderIndexError';
    this.code = code;
    this.context = context;
  }
}

export function invariant(
  condition: unknown,
  message: string,
  context?: Record<string, unknown>
): asserts condition {
  if (!condition) {
    throw new OrderIndexError('invariant_violation', message, context);
  }
}

export function asErrorPayload(error: unknown): { code: string; message: string; context: Record<string, unknown> } {
  if (error instanceof OrderIndexError) {
    return {
      code: error.code,
      message: error.message,
      context: error.context ?? {},
    };
  }

  return {
    code: 'unexpected_error',
    message: error instanceof Error ? error.message : String(error),
    context: {},
  };
}
