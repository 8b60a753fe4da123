import 'dotenv/config';

import { getAddress, isAddress, zeroAddress, type Address } from 'viem';

import type { AppConfig } from '../types/config.js';

function readEnv(name: string, fallback?: string): string {
  const value = process.env[name] ?? fallback;
  if (value === undefined) {
    throw new Error(`Missing required environment variable: ${name}`);
  }

  return value;
}

function readNumber(name: string, fallback?: number): number {
  const raw = process.env[name] ?? (fallback === undefined ? undefined : String(fallback));
  if (raw === undefined) {
    throw new Error(`Missing required numeric environment variable: ${name}`);
  }

  const parsed = Number(raw);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid numeric value for ${name}: ${raw}`);
  }

  return parsed;
}

function readOptional(name: string): string | undefined {
  const value = process.env[name];
  if (value === undefined || value === '') {
    return undefined;
  }

  return value;
}

function readAddress(name: string): Address {
  const raw = readOptional(name);
  if (raw === undefined) {
    return zeroAddress;
  }

  if (!isAddress(raw, { strict: false })) {
    throw new Error(`Invalid address value for ${name}: ${raw}`);
  }

  return getAddress(raw);
}

export function loadAppConfig(): AppConfig {
  const markets = readEnv('MARKETS', 'ETH-USD,BTC-USD')
    .split(',')
    .map((market) => market.trim())
    .filter((market) => market.length > 0);

  return {
    port: readNumber('PORT', 3010),
    wsPath: readEnv('WS_PATH', '/ws'),
    nodeEnv: readEnv('NODE_ENV', 'development'),
    engine: {
      markets,
      maxProbeLength: readNumber('MAX_PROBE_LENGTH', 4096),
      defaultBookDepth: readNumber('DEFAULT_BOOK_DEPTH', 50),
      maxBookDepth: readNumber('MAX_BOOK_DEPTH', 500),
      settlementAddress: readAddress('SETTLEMENT_ADDRESS'),
    },
    rateLimit: {
      windowMs: readNumber('API_RATE_LIMIT_WINDOW_MS', 60_000),
      maxRequests: readNumber('API_RATE_LIMIT_MAX_REQUESTS', 10_000),
    },
  };
}
