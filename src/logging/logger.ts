export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogFields {
  traceId?: string;
  [key: string]: unknown;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

/** `LOG_LEVEL` is read on every write so it can be changed at runtime. */
function thresholdFromEnv(): LogLevel {
  const raw = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

function encodeValue(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export class Logger {
  constructor(
    private readonly context: string,
    private readonly minLevel?: LogLevel
  ) {}

  debug(message: string, fields: LogFields = {}): void {
    this.write('debug', message, fields);
  }

  info(message: string, fields: LogFields = {}): void {
    this.write('info', message, fields);
  }

  warn(message: string, fields: LogFields = {}): void {
    this.write('warn', message, fields);
  }

  error(message: string, fields: LogFields = {}): void {
    this.write('error', message, fields);
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.minLevel ?? thresholdFromEnv()];
  }

  private write(level: LogLevel, message: string, fields: LogFields): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const entry = {
      timestamp: new Date().toISOString(),
      level,
      context: this.context,
      message,
      ...fields,
    };

    process.stdout.write(`${JSON.stringify(entry, encodeValue)}\n`);
  }
}
