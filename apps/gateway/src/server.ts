import { createServer, type IncomingMessage, type Server } from 'node:http';
import { type Duplex } from 'node:stream';
import { WebSocketServer, type RawData, type WebSocket } from 'ws';
import { errorFrame, parseClientFrame } from '@gatehouse/proto';
import {
  AppError,
  ErrorCode,
  createLogger,
  errorMessage,
  isAppError,
  resolveClientIp,
  type SafeLogger,
} from '@gatehouse/shared';
import { parseUpgradePath, type AdmissionGate } from './admission';
import { type RoomBroadcaster } from './broadcaster';
import { Connection } from './connections';
import { startHeartbeat } from './heartbeat';
import { SerialLanes } from './lanes';
import { MessageRateLimiter } from './rate-limiter';
import { type ConnectionRegistry } from './registry';
import { type IdGenerator } from './rooms/types';
import { WsTransport } from './transport';

// 4005: same code admission uses, the client backs off either way.
const RATE_LIMITED_CLOSE = new AppError(ErrorCode.RATE_LIMITED, 'Message rate exceeded');

export interface GatewayOptions {
  port: number;
  host: string;
  maxPayloadBytes: number;
  rateLimitPerSecond: number;
  sendTimeoutMs: number;
  heartbeatIntervalMs: number;
  idGen: IdGenerator;
  admission: AdmissionGate;
  registry: ConnectionRegistry;
  broadcaster: RoomBroadcaster;
  logger?: SafeLogger;
}

export interface Gateway {
  server: Server;
  wss: WebSocketServer;
  /** Wires one accepted socket. Exposed so tests can drive it without a listener. */
  accept(socket: WebSocket, request: IncomingMessage): Promise<Connection | null>;
  listen(): Promise<void>;
  close(): Promise<void>;
}

function toText(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return Buffer.from(data).toString('utf8');
}

function rejectUpgrade(socket: Duplex, status: string): void {
  socket.write(`HTTP/1.1 ${status}\r\nConnection: close\r\n\r\n`);
  socket.destroy();
}

export function createGateway(options: GatewayOptions): Gateway {
  const { admission, registry, broadcaster, idGen } = options;
  const logger = options.logger ?? createLogger({ name: 'gateway' });
  const limiter = new MessageRateLimiter(options.rateLimitPerSecond);
  // Frames from one connection are handled in the order they arrived.
  const inbound = new SerialLanes();
  let stopHeartbeat: (() => void) | null = null;

  const server = createServer((req, res) => {
    const path = new URL(req.url ?? '/', 'http://gateway.invalid').pathname;
    if (req.method === 'GET' && path === '/health') {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(
        JSON.stringify({
          status: 'ok',
          connections: registry.size,
          rooms: registry.roomCount,
          timestamp: new Date().toISOString(),
        }),
      );
      return;
    }
    res.writeHead(404, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify({ error: 'Not found' }));
  });

  const wss = new WebSocketServer({ noServer: true, maxPayload: options.maxPayloadBytes });

  server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    const path = new URL(req.url ?? '/', 'http://gateway.invalid').pathname;
    if (!parseUpgradePath(path).ok) {
      rejectUpgrade(socket, '404 Not Found');
      return;
    }
    wss.handleUpgrade(req, socket, head, (ws) => {
      accept(ws, req).catch((err: unknown) => {
        logger.error({ err: errorMessage(err) }, 'Connection setup failed');
        ws.close(1011, 'Internal error');
      });
    });
  });

  function closeWith(connection: Connection, err: unknown): Promise<void> {
    const appError = isAppError(err) ? err : new AppError(ErrorCode.INTERNAL, 'Internal error');
    if (!isAppError(err)) connection.logger.error({ err: errorMessage(err) }, 'Connection setup failed');
    return registry.close(connection, appError.wsCloseCode, appError.closeReason);
  }

  function onFrame(connection: Connection, data: RawData, isBinary: boolean): void {
    if (connection.isClosed) return;
    if (!limiter.allow(connection)) {
      connection.logger.warn({ limit: options.rateLimitPerSecond }, 'Message rate exceeded, closing');
      closeWith(connection, RATE_LIMITED_CLOSE).catch((err: unknown) => {
        logger.error({ err: errorMessage(err) }, 'Close failed');
      });
      return;
    }

    inbound
      .run(connection.id, async () => {
        if (connection.isClosed) return;
        if (isBinary) {
          await broadcaster.reply(connection, errorFrame('Binary frames are not supported'));
          return;
        }
        const parsed = parseClientFrame(toText(data));
        if (!parsed.ok) {
          await broadcaster.reply(connection, errorFrame(parsed.message));
          return;
        }
        await broadcaster.receive(connection, parsed.frame);
      })
      .catch((err: unknown) => {
        connection.logger.error({ err: errorMessage(err) }, 'Inbound frame failed');
      });
  }

  async function accept(ws: WebSocket, request: IncomingMessage): Promise<Connection | null> {
    const id = idGen.generate();
    const transport = new WsTransport(ws, options.sendTimeoutMs);
    const ip = resolveClientIp(request.headers, request.socket.remoteAddress);
    const connection = new Connection(id, ip, transport, logger.child({ connectionId: id }));
    registry.track(connection);

    // Listeners go on before the first await so no frame or close is missed;
    // frames queue behind admission in the connection's lane.
    ws.on('pong', () => {
      connection.alive = true;
    });
    ws.on('close', (code: number) => {
      registry.close(connection, code).catch((err: unknown) => {
        logger.error({ connectionId: id, err: errorMessage(err) }, 'Close cleanup failed');
      });
    });
    ws.on('error', (err: Error) => {
      connection.logger.warn({ err: err.message }, 'Socket error');
    });

    let ready: () => void = () => {};
    const admitted = new Promise<void>((resolve) => {
      ready = resolve;
    });
    inbound
      .run(id, () => admitted)
      .catch((err: unknown) => {
        connection.logger.error({ err: errorMessage(err) }, 'Admission lane failed');
      });
    ws.on('message', (data: RawData, isBinary: boolean) => onFrame(connection, data, isBinary));

    try {
      const result = await admission.admit({
        url: request.url ?? '/',
        headers: request.headers,
        remoteAddress: request.socket.remoteAddress,
      });
      if (connection.isClosed) return null;
      connection.admit(result.session);
      connection.logger.info({ userId: result.session.userId }, 'Connection admitted');
      if (result.roomId !== null) await broadcaster.join(connection, result.roomId);
      return connection.isClosed ? null : connection;
    } catch (err) {
      await closeWith(connection, err);
      return null;
    } finally {
      ready();
    }
  }

  return {
    server,
    wss,
    accept,
    listen: () =>
      new Promise<void>((resolve, reject) => {
        server.once('error', reject);
        server.listen(options.port, options.host, () => {
          server.off('error', reject);
          stopHeartbeat = startHeartbeat(registry, options.heartbeatIntervalMs, logger);
          logger.info({ host: options.host, port: options.port }, 'Gateway listening');
          resolve();
        });
      }),
    close: async () => {
      stopHeartbeat?.();
      await registry.closeAll(1001, 'Server shutting down');
      await broadcaster.close();
      await new Promise<void>((resolve) => wss.close(() => resolve()));
      if (!server.listening) return;
      await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    },
  };
}
