import { randomUUID } from 'node:crypto';
import { createServer, type Server as HttpServer } from 'node:http';

import express, { type NextFunction, type Request, type Response } from 'express';

import type { AppConfig } from './types/config.js';
import { Logger } from './logging/logger.js';
import { MetricsRegistry } from './metrics/registry.js';
import { BookEngine } from './engine/book-engine.js';
import { OrderIndexError, asErrorPayload } from './engine/errors.js';
import { MAX_UINT128 } from './engine/identifiers.js';
import { RealtimeGateway } from './api/websocket.js';
import { parseUint, toWire } from './utils/serialize.js';

const logger = new Logger('order-index-app');

interface RequestRateState {
  count: number;
  resetAtMs: number;
}

declare module 'express-serve-static-core' {
  interface Request {
    traceId?: string;
  }
}

export interface OrderIndexRuntime {
  app: express.Express;
  server: HttpServer;
  engine: BookEngine;
  start: () => Promise<void>;
  stop: () => Promise<void>;
}

const STATUS_BY_CODE: Record<string, number> = {
  malformed_identifier: 400,
  malformed_owner: 400,
  invalid_amount: 400,
  arithmetic_overflow: 422,
  arithmetic_underflow: 422,
  allocator_exhausted: 422,
  price_level_full: 422,
  unknown_market: 404,
  invariant_violation: 500,
};

type RouteHandler = (req: Request, res: Response) => void;

export function createOrderIndexRuntime(config: AppConfig): OrderIndexRuntime {
  const metrics = new MetricsRegistry();
  const engine = new BookEngine({ config: config.engine, metrics });

  const app = express();
  const server = createServer(app);

  const wsGateway = new RealtimeGateway(server, config.wsPath, engine, metrics, config.engine.defaultBookDepth);

  const rateLimitState = new Map<string, RequestRateState>();

  app.use(express.json());

  app.use((req: Request, _res: Response, next: NextFunction) => {
    req.traceId = getTraceId(req);
    next();
  });

  app.use((req: Request, res: Response, next: NextFunction) => {
    const key = req.ip ?? req.socket.remoteAddress ?? 'unknown';
    const now = Date.now();
    const state = rateLimitState.get(key);

    if (!state || now >= state.resetAtMs) {
      rateLimitState.set(key, {
        count: 1,
        resetAtMs: now + config.rateLimit.windowMs,
      });
      next();
      return;
    }

    if (state.count >= config.rateLimit.maxRequests) {
      res.status(429).json({
        error: 'rate_limited',
        traceId: req.traceId,
      });
      return;
    }

    state.count += 1;
    next();
  });

  const handle =
    (handler: RouteHandler): RouteHandler =>
    (req, res) => {
      try {
        handler(req, res);
      } catch (error) {
        sendError(req, res, error);
      }
    };

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
    });
  });

  app.get('/markets', (_req, res) => {
    res.json({
      markets: toWire(engine.getMarkets()),
    });
  });

  app.post(
    '/markets/:market/orders',
    handle((req, res) => {
      const body: unknown = req.body;
      const owner = fieldOf(body, 'owner');
      if (typeof owner !== 'string') {
        throw new OrderIndexError('malformed_owner', 'owner must be an address string');
      }

      const orderId = engine.addOrder(req.params.market, {
        price: requireUint(fieldOf(body, 'price'), 'price'),
        amount: requireUint(fieldOf(body, 'amount'), 'amount'),
        owner,
      });

      res.status(201).json({
        traceId: req.traceId,
        market: req.params.market,
        orderId: orderId.toString(),
      });
    })
  );

  app.get(
    '/markets/:market/orders/:id',
    handle((req, res) => {
      const price = requireUint(req.query.price, 'price');
      const info = engine.getOrderInfo(req.params.market, price, req.params.id);
      if (info.owner === null) {
        sendNotFound(req, res, req.params.id);
        return;
      }

      res.json({
        traceId: req.traceId,
        orderId: req.params.id,
        ...toWire(info),
      });
    })
  );

  app.delete(
    '/markets/:market/orders/:id',
    handle((req, res) => {
      const price = requireUint(req.query.price, 'price');
      const removed = engine.removeOrder(req.params.market, price, req.params.id);
      if (removed.owner === null) {
        sendNotFound(req, res, req.params.id);
        return;
      }

      res.json({
        traceId: req.traceId,
        orderId: req.params.id,
        ...toWire(removed),
      });
    })
  );

  app.post(
    '/markets/:market/orders/:id/claim',
    handle((req, res) => {
      const body: unknown = req.body;
      const price = requireUint(fieldOf(body, 'price'), 'price');
      const rawAmount = fieldOf(body, 'amount');
      const requested = rawAmount === undefined ? undefined : requireUint(rawAmount, 'amount');

      const claim = engine.claimExecuted(req.params.market, price, req.params.id, requested);
      if (claim.executedShares === 0n && claim.remainingShares === 0n) {
        sendNotFound(req, res, req.params.id);
        return;
      }

      res.json({
        traceId: req.traceId,
        orderId: req.params.id,
        ...toWire(claim),
      });
    })
  );

  app.post(
    '/markets/:market/execute',
    handle((req, res) => {
      const body: unknown = req.body;
      const execution = engine.executeRight(
        req.params.market,
        requireUint(fieldOf(body, 'price'), 'price'),
        requireUint(fieldOf(body, 'amount'), 'amount')
      );

      res.json({
        traceId: req.traceId,
        ...toWire(execution),
      });
    })
  );

  app.post(
    '/markets/:market/execute/preview',
    handle((req, res) => {
      const body: unknown = req.body;
      const preview = engine.previewExecuteRight(
        req.params.market,
        requireUint(fieldOf(body, 'price'), 'price'),
        requireUint(fieldOf(body, 'amount'), 'amount')
      );

      res.json({
        traceId: req.traceId,
        ...toWire(preview),
      });
    })
  );

  app.get(
    '/markets/:market/book',
    handle((req, res) => {
      const price = req.query.price === undefined ? MAX_UINT128 : requireUint(req.query.price, 'price');
      const count = Math.min(
        readPositiveNumber(req.query.count, config.engine.defaultBookDepth),
        config.engine.maxBookDepth
      );

      res.json({
        market: req.params.market,
        orders: toWire(engine.assembleOrderbook(req.params.market, price, count)),
      });
    })
  );

  app.get('/status', (_req, res) => {
    res.json({
      engine: engine.getStats(),
      markets: engine.getSupportedMarkets(),
      memory: process.memoryUsage(),
      uptimeSec: process.uptime(),
      nowMs: Date.now(),
    });
  });

  app.get('/metrics', async (_req, res) => {
    res.setHeader('Content-Type', metrics.registry.contentType);
    res.end(await metrics.registry.metrics());
  });

  return {
    app,
    server,
    engine,
    start: async () => {
      wsGateway.start();

      await new Promise<void>((resolve) => {
        server.listen(config.port, () => {
          logger.info('order index service started', {
            port: config.port,
            wsPath: config.wsPath,
            markets: engine.getSupportedMarkets(),
          });
          resolve();
        });
      });
    },
    stop: async () => {
      wsGateway.stop();

      await new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      });
    },
  };
}

function sendError(req: Request, res: Response, error: unknown): void {
  const payload = asErrorPayload(error);
  const status = STATUS_BY_CODE[payload.code] ?? 500;

  if (status >= 500) {
    logger.error('request failed', {
      traceId: req.traceId,
      path: req.path,
      code: payload.code,
      error: payload.message,
    });
  }

  res.status(status).json({
    error: payload.code,
    message: payload.message,
    traceId: req.traceId,
  });
}

function sendNotFound(req: Request, res: Response, orderId: string): void {
  res.status(404).json({
    error: 'order_not_found',
    orderId,
    traceId: req.traceId,
  });
}

function fieldOf(body: unknown, key: string): unknown {
  if (typeof body !== 'object' || body === null) {
    return undefined;
  }

  return Object.getOwnPropertyDescriptor(body, key)?.value;
}

function requireUint(raw: unknown, field: string): bigint {
  const value = parseUint(raw);
  if (value === null) {
    throw new OrderIndexError('invalid_amount', `${field} must be an unsigned integer`, { field });
  }

  return value;
}

function readPositiveNumber(raw: unknown, fallback: number): number {
  if (typeof raw !== 'string' && typeof raw !== 'number') {
    return fallback;
  }

  const parsed = Number(raw);
  if (Number.isNaN(parsed) || parsed <= 0) {
    return fallback;
  }

  return Math.floor(parsed);
}

function getTraceId(req: Request): string {
  const headerValue = req.headers['x-trace-id'];
  if (typeof headerValue === 'string' && headerValue.length > 0) {
    return headerValue;
  }

  return `trace_${randomUUID()}`;
}
