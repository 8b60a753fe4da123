import type { Server as HttpServer } from 'node:http';

import WebSocket, { WebSocketServer } from 'ws';

import type { BookEngine } from '../engine/book-engine.js';
import type { MetricsRegistry } from '../metrics/registry.js';
import type { BookEventPayload, ExecutionEventPayload } from '../types/engine.js';
import { asErrorPayload } from '../engine/errors.js';
import { Logger } from '../logging/logger.js';
import { toWire } from '../utils/serialize.js';

const logger = new Logger('websocket-gateway');

const CHANNELS = ['book', 'executions', 'status'] as const;

type Channel = (typeof CHANNELS)[number];

interface SubscriptionMessage {
  method: 'subscribe' | 'unsubscribe' | 'ping';
  channel?: Channel;
  market?: string;
}

type SubscriptionKey = `${Channel}:${string}`;

function buildSubscriptionKey(channel: Channel, market = '*'): SubscriptionKey {
  return `${channel}:${market}`;
}

function isChannel(value: unknown): value is Channel {
  return CHANNELS.some((channel) => channel === value);
}

function parseMessage(raw: string): SubscriptionMessage | null {
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null) {
    return null;
  }

  const method = Object.getOwnPropertyDescriptor(parsed, 'method')?.value;
  const channel = Object.getOwnPropertyDescriptor(parsed, 'channel')?.value;
  const market = Object.getOwnPropertyDescriptor(parsed, 'market')?.value;

  if (method !== 'subscribe' && method !== 'unsubscribe' && method !== 'ping') {
    return null;
  }

  return {
    method,
    channel: isChannel(channel) ? channel : undefined,
    market: typeof market === 'string' && market.length > 0 ? market : undefined,
  };
}

export class RealtimeGateway {
  private readonly wsServer: WebSocketServer;
  private readonly clientSubscriptions = new Map<WebSocket, Set<SubscriptionKey>>();
  private statusInterval: NodeJS.Timeout | null = null;

  constructor(
    server: HttpServer,
    path: string,
    private readonly engine: BookEngine,
    private readonly metrics: MetricsRegistry,
    private readonly snapshotDepth: number
  ) {
    this.wsServer = new WebSocketServer({ server, path });

    this.wsServer.on('connection', (socket) => {
      this.onConnection(socket);
    });

    this.engine.on('execution', ({ market, execution }: ExecutionEventPayload) => {
      this.broadcast('executions', market, { channel: 'executions', market, data: toWire(execution) });
    });

    this.engine.on('book', ({ market, snapshot }: BookEventPayload) => {
      this.broadcast('book', market, { channel: 'book', market, data: toWire(snapshot) });
    });
  }

  start(): void {
    if (this.statusInterval) {
      return;
    }

    this.statusInterval = setInterval(() => {
      const statusPayload = {
        channel: 'status',
        data: {
          engine: this.engine.getStats(),
          markets: toWire(this.engine.getMarkets()),
          timestampMs: Date.now(),
        },
      };
      this.broadcast('status', '*', statusPayload);
    }, 1000);
  }

  stop(): void {
    if (this.statusInterval) {
      clearInterval(this.statusInterval);
      this.statusInterval = null;
    }

    for (const socket of this.clientSubscriptions.keys()) {
      socket.terminate();
    }
    this.wsServer.close();
  }

  private onConnection(socket: WebSocket): void {
    this.clientSubscriptions.set(socket, new Set());
    this.metrics.wsConnections.inc();

    socket.on('message', (data) => {
      this.onMessage(socket, data);
    });

    socket.on('close', () => {
      this.clientSubscriptions.delete(socket);
      this.metrics.wsConnections.dec();
    });

    socket.send(
      JSON.stringify({
        channel: 'system',
        data: {
          message: 'connected',
          markets: this.engine.getSupportedMarkets(),
        },
      })
    );
  }

  private onMessage(socket: WebSocket, data: WebSocket.RawData): void {
    let message: SubscriptionMessage | null;
    try {
      message = parseMessage(data.toString());
    } catch {
      socket.send(JSON.stringify({ channel: 'error', data: { error: 'invalid_json' } }));
      return;
    }

    if (!message) {
      socket.send(JSON.stringify({ channel: 'error', data: { error: 'invalid_message' } }));
      return;
    }

    if (message.method === 'ping') {
      socket.send(JSON.stringify({ channel: 'pong', data: { ts: Date.now() } }));
      return;
    }

    if (!message.channel) {
      socket.send(JSON.stringify({ channel: 'error', data: { error: 'missing_channel' } }));
      return;
    }

    const market = message.market ?? '*';
    const key = buildSubscriptionKey(message.channel, market);
    const subscriptions = this.clientSubscriptions.get(socket);
    if (!subscriptions) {
      return;
    }

    if (message.method === 'subscribe') {
      subscriptions.add(key);
      socket.send(
        JSON.stringify({
          channel: 'subscriptionResponse',
          data: {
            method: 'subscribe',
            channel: message.channel,
            market,
          },
        })
      );

      if (message.channel === 'book' && market !== '*') {
        try {
          const snapshot = this.engine.getSnapshot(market, this.snapshotDepth);
          socket.send(
            JSON.stringify({
              channel: 'book',
              market,
              isSnapshot: true,
              data: toWire(snapshot),
            })
          );
        } catch (error) {
          const payload = asErrorPayload(error);
          logger.warn('could not send book snapshot', {
            market,
            code: payload.code,
            error: payload.message,
          });
          socket.send(JSON.stringify({ channel: 'error', data: { error: payload.code, market } }));
        }
      }

      return;
    }

    subscriptions.delete(key);
    socket.send(
      JSON.stringify({
        channel: 'subscriptionResponse',
        data: {
          method: 'unsubscribe',
          channel: message.channel,
          market,
        },
      })
    );
  }

  broadcast(channel: Channel, market: string, payload: unknown): void {
    for (const [socket, subscriptions] of this.clientSubscriptions.entries()) {
      if (socket.readyState !== WebSocket.OPEN) {
        continue;
      }

      const marketSpecific = buildSubscriptionKey(channel, market);
      const wildcard = buildSubscriptionKey(channel, '*');
      if (!subscriptions.has(marketSpecific) && !subscriptions.has(wildcard)) {
        continue;
      }

      socket.send(JSON.stringify(payload));
    }
  }
}
