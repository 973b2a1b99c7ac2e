import { describe, it, expect, afterEach } from 'vitest';
import { type AddressInfo } from 'node:net';
import WebSocket from 'ws';
import { SessionAdmissionController, type SessionRepository } from '@gatehouse/domain';
import {
  BurstLimiter,
  JoseTokenService,
  RateLimitRuleTable,
  RequestGate,
  SlidingWindowRateLimiter,
} from '@gatehouse/shared';
import { AdmissionGate } from '../admission';
import { createGateway, type Gateway } from '../server';
import { inlineTransaction, sequentialIds, session, silentLogger } from './fakes';
import { createHarness } from './harness';

const tokens = new JoseTokenService({
  activeKid: 'k1',
  keys: [{ kid: 'k1', secret: 'a'.repeat(32) }],
  accessTokenTtl: '3600',
});

const alice = { ...session('alice', 's1'), expiresAt: new Date(Date.now() + 3_600_000) };

const sessionRepo: SessionRepository = {
  create: async () => {
    throw new Error('not used');
  },
  findById: async (_tx, id) => (id === alice.id ? alice : null),
  touch: async () => {},
  listActiveForUser: async () => [alice],
  deactivate: async () => 0,
  deactivateAllForUser: async () => 0,
};

let gateway: Gateway | null = null;

async function start(rateLimitPerSecond = 30): Promise<string> {
  const h = createHarness({ clock: Date.now });
  const rules = new RateLimitRuleTable();
  const rule = rules.get('websocket');
  if (!rule) throw new Error('websocket rule missing');
  const gate = new RequestGate(
    rules,
    new SlidingWindowRateLimiter({ store: h.store, logger: silentLogger }),
    new BurstLimiter({ store: h.store, limit: 50, windowSeconds: 60, logger: silentLogger }),
  );
  const sessions = new SessionAdmissionController({
    sessionRepo,
    tokenService: tokens,
    withTransaction: inlineTransaction,
    maxSessionsPerUser: 5,
    logger: silentLogger,
  });

  gateway = createGateway({
    host: '127.0.0.1',
    port: 0,
    maxPayloadBytes: 65536,
    rateLimitPerSecond,
    sendTimeoutMs: 1000,
    heartbeatIntervalMs: 60_000,
    idGen: sequentialIds('conn'),
    admission: new AdmissionGate({ gate, rule, sessions, logger: silentLogger }),
    registry: h.registry,
    broadcaster: h.broadcaster,
    logger: silentLogger,
  });
  await gateway.listen();
  const { port }: AddressInfo = addressOf(gateway);
  return `127.0.0.1:${port}`;
}

function addressOf(g: Gateway): AddressInfo {
  const address = g.server.address();
  if (address === null || typeof address === 'string') throw new Error('gateway is not listening');
  return address;
}

function closed(ws: WebSocket): Promise<number> {
  return new Promise((resolve) => ws.on('close', (code: number) => resolve(code)));
}

function frames(ws: WebSocket, count: number): Promise<Array<Record<string, unknown>>> {
  const received: Array<Record<string, unknown>> = [];
  return new Promise((resolve) => {
    ws.on('message', (data) => {
      received.push(JSON.parse(data.toString()));
      if (received.length === count) resolve(received);
    });
  });
}

afterEach(async () => {
  await gateway?.close();
  gateway = null;
});

describe('gateway server', () => {
  it('reports health over plain HTTP', async () => {
    const host = await start();
    const res = await fetch(`http://${host}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok', connections: 0, rooms: 0 });
  });

  it('closes with 4002 when the credential is bad', async () => {
    const host = await start();
    const ws = new WebSocket(`ws://${host}/ws?token=garbage`);
    expect(await closed(ws)).toBe(4002);
  });

  it('joins the room named in the path after admission', async () => {
    const host = await start();
    const token = await tokens.signAccessToken('alice', 's1');
    const ws = new WebSocket(`ws://${host}/ws/chat:general:lobby`, {
      headers: { authorization: `Bearer ${token}` },
    });

    const [joined, history] = await frames(ws, 2);

    expect(joined).toMatchObject({ type: 'room_joined', room_id: 'chat:general:lobby', members: ['alice'] });
    expect(history).toMatchObject({ type: 'chat_history', messages: [], has_more: false });
    ws.close();
    await closed(ws);
  });

  it('answers unparseable frames with an error frame', async () => {
    const host = await start();
    const token = await tokens.signAccessToken('alice', 's1');
    const ws = new WebSocket(`ws://${host}/ws?token=${token}`);
    const replies = frames(ws, 3);
    await new Promise((resolve) => ws.once('open', resolve));

    ws.send('{not json');
    ws.send(JSON.stringify({ type: 'teleport' }));
    ws.send(JSON.stringify({ type: 'ping' }));

    expect(await replies).toMatchObject([
      { type: 'error', message: 'Invalid JSON format' },
      { type: 'error', message: 'Unknown message type: teleport' },
      { type: 'pong' },
    ]);
    ws.close();
    await closed(ws);
  });

  it('closes a connection that floods frames with 4005', async () => {
    const host = await start(2);
    const token = await tokens.signAccessToken('alice', 's1');
    const ws = new WebSocket(`ws://${host}/ws?token=${token}`);
    const code = closed(ws);
    await new Promise((resolve) => ws.once('open', resolve));

    for (let i = 0; i < 3; i++) ws.send(JSON.stringify({ type: 'ping' }));

    expect(await code).toBe(4005);
  });
});
