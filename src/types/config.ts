import type { Address } from 'viem';

export interface RateLimitConfig {
  windowMs: number;
  maxRequests: number;
}

export interface EngineConfig {
  markets: string[];
  maxProbeLength: number;
  defaultBookDepth: number;
  maxBookDepth: number;
  settlementAddress: Address;
}

export interface AppConfig {
  port: number;
  wsPath: string;
  nodeEnv: string;
  engine: EngineConfig;
  rateLimit: RateLimitConfig;
}
