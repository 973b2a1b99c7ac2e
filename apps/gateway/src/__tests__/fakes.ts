import { type Session, type WithTransaction } from '@gatehouse/domain';
import { parseClientFrame, type ClientFrame } from '@gatehouse/proto';
import { type SafeLogger } from '@gatehouse/shared';
import { Connection } from '../connections';
import { type ConnectionRegistry } from '../registry';
import { TransportError, type Transport } from '../transport';

export const T0 = 1_700_000_000_000;

export const silentLogger: SafeLogger = {
  info() {},
  warn() {},
  error() {},
  debug() {},
  fatal() {},
  child: () => silentLogger,
};

export type SentFrame = Record<string, unknown>;

export class FakeTransport implements Transport {
  readonly sent: string[] = [];
  isOpen = true;
  closedWith: { code: number; reason: string } | null = null;
  pings = 0;
  terminated = false;
  failWith: TransportError | null = null;

  async send(data: string): Promise<void> {
    if (this.failWith) throw this.failWith;
    if (!this.isOpen) throw new TransportError('closed', 'Socket is not open');
    this.sent.push(data);
  }

  ping(): void {
    this.pings++;
  }

  close(code: number, reason: string): void {
    this.isOpen = false;
    this.closedWith = { code, reason };
  }

  terminate(): void {
    this.isOpen = false;
    this.terminated = true;
  }

  frames(): SentFrame[] {
    return this.sent.map((raw): SentFrame => JSON.parse(raw));
  }

  types(): unknown[] {
    return this.frames().map((frame) => frame.type);
  }

  last(): SentFrame | undefined {
    return this.frames().at(-1);
  }
}

export function session(userId: string, id = `session-${userId}`): Session {
  return {
    id,
    userId,
    issuedAt: new Date(T0),
    expiresAt: new Date(T0 + 3_600_000),
    lastActivityAt: new Date(T0),
    deviceFingerprint: null,
    userAgent: null,
    active: true,
  };
}

/** An admitted, tracked connection with a recording transport. */
export function connect(
  registry: ConnectionRegistry,
  id: string,
  userId: string,
): { connection: Connection; transport: FakeTransport } {
  const transport = new FakeTransport();
  const connection = new Connection(id, '203.0.113.1', transport, silentLogger, T0);
  connection.admit(session(userId));
  registry.track(connection);
  return { connection, transport };
}

export function clientFrame(raw: Record<string, unknown>): ClientFrame {
  const result = parseClientFrame(JSON.stringify(raw));
  if (!result.ok) throw new Error(result.message);
  return result.frame;
}

export const inlineTransaction: WithTransaction = (fn) => fn(null);

export function sequentialIds(prefix = 'id'): { generate(): string } {
  let next = 0;
  return { generate: () => `${prefix}-${++next}` };
}

/** Lets fire-and-forget cleanup settle. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
