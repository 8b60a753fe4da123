import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import request from 'supertest';
import { zeroAddress } from 'viem';
import WebSocket from 'ws';

import type { AppConfig } from '../types/config.js';
import { createOrderIndexRuntime, type OrderIndexRuntime } from '../app.js';
import { OWNER_A, OWNER_B } from './test-helpers.js';

interface GatewayMessage {
  channel: string;
  market?: string;
  isSnapshot?: boolean;
  data?: Record<string, unknown>;
}

let runtime: OrderIndexRuntime;
let baseUrl: string;
let wsUrl: string;

const config: AppConfig = {
  port: 0,
  wsPath: '/ws',
  nodeEnv: 'test',
  engine: {
    markets: ['ETH-USD'],
    maxProbeLength: 64,
    defaultBookDepth: 10,
    maxBookDepth: 100,
    settlementAddress: zeroAddress,
  },
  rateLimit: {
    windowMs: 60_000,
    maxRequests: 10_000,
  },
};

function parseMessage(raw: WebSocket.RawData): GatewayMessage {
  const parsed: unknown = JSON.parse(raw.toString());
  if (typeof parsed !== 'object' || parsed === null || !('channel' in parsed) || typeof parsed.channel !== 'string') {
    throw new Error('unexpected websocket payload');
  }

  const data = 'data' in parsed && typeof parsed.data === 'object' && parsed.data !== null ? { ...parsed.data } : undefined;
  return {
    channel: parsed.channel,
    market: 'market' in parsed && typeof parsed.market === 'string' ? parsed.market : undefined,
    isSnapshot: 'isSnapshot' in parsed && parsed.isSnapshot === true,
    data,
  };
}

function waitForMessage(
  socket: WebSocket,
  predicate: (message: GatewayMessage) => boolean
): Promise<GatewayMessage> {
  return new Promise((resolve, reject) => {
    const timeout = setTimeout(() => {
      socket.off('message', onMessage);
      reject(new Error('timeout waiting for websocket message'));
    }, 3_000);

    function onMessage(raw: WebSocket.RawData): void {
      const message = parseMessage(raw);
      if (predicate(message)) {
        clearTimeout(timeout);
        socket.off('message', onMessage);
        resolve(message);
      }
    }

    socket.on('message', onMessage);
  });
}

async function connect(): Promise<WebSocket> {
  const socket = new WebSocket(wsUrl);
  await new Promise<void>((resolve, reject) => {
    socket.once('open', () => resolve());
    socket.once('error', reject);
  });
  return socket;
}

describe('RealtimeGateway', () => {
  beforeAll(async () => {
    runtime = createOrderIndexRuntime(config);
    await runtime.start();

    const address = runtime.server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
    wsUrl = `ws://127.0.0.1:${address.port}/ws`;
  });

  afterAll(async () => {
    await runtime.stop();
  });

  it('sends a book snapshot on subscribe and pushes updates', async () => {
    const socket = await connect();

    const snapshot = waitForMessage(socket, (message) => message.channel === 'book' && message.isSnapshot === true);
    socket.send(JSON.stringify({ method: 'subscribe', channel: 'book', market: 'ETH-USD' }));
    expect((await snapshot).data?.liveOrders).toBe(0);

    const update = waitForMessage(socket, (message) => message.channel === 'book' && message.isSnapshot !== true);
    await request(baseUrl).post('/markets/ETH-USD/orders').send({ price: '10', amount: '5', owner: OWNER_A });

    const pushed = await update;
    expect(pushed.market).toBe('ETH-USD');
    expect(pushed.data?.bestOfferId).toBe('21');
    expect(pushed.data?.liveOrders).toBe(1);

    socket.close();
  });

  it('pushes executions to market subscribers', async () => {
    const socket = await connect();

    const subscribed = waitForMessage(socket, (message) => message.channel === 'subscriptionResponse');
    socket.send(JSON.stringify({ method: 'subscribe', channel: 'executions', market: 'ETH-USD' }));
    await subscribed;

    const execution = waitForMessage(socket, (message) => message.channel === 'executions');
    await request(baseUrl).post('/markets/ETH-USD/orders').send({ price: '10', amount: '2', owner: OWNER_B });
    await request(baseUrl).post('/markets/ETH-USD/execute').send({ price: '10', amount: '6' });

    const pushed = await execution;
    expect(pushed.market).toBe('ETH-USD');
    expect(pushed.data?.executedShares).toBe('6');
    expect(pushed.data?.bestOfferId).toBe('23');

    socket.close();
  });

  it('answers pings and reports bad messages', async () => {
    const socket = await connect();

    const pong = waitForMessage(socket, (message) => message.channel === 'pong');
    socket.send(JSON.stringify({ method: 'ping' }));
    await pong;

    const invalidJson = waitForMessage(socket, (message) => message.channel === 'error');
    socket.send('{not json');
    expect((await invalidJson).data?.error).toBe('invalid_json');

    const missingChannel = waitForMessage(socket, (message) => message.channel === 'error');
    socket.send(JSON.stringify({ method: 'subscribe' }));
    expect((await missingChannel).data?.error).toBe('missing_channel');

    const unknownMarket = waitForMessage(socket, (message) => message.channel === 'error');
    socket.send(JSON.stringify({ method: 'subscribe', channel: 'book', market: 'DOGE-USD' }));
    expect((await unknownMarket).data?.error).toBe('unknown_market');

    socket.close();
  });
});
