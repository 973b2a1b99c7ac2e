import { WebSocket } from 'ws';
import { TimeoutError, withTimeout } from '@gatehouse/shared';

// Slow consumers past this many queued bytes are treated as failed.
const DEFAULT_MAX_BUFFERED_BYTES = 1024 * 1024;

export type TransportFailure = 'closed' | 'backpressure' | 'timeout' | 'failed';

export class TransportError extends Error {
  constructor(
    public readonly reason: TransportFailure,
    message: string,
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

/** The socket side of a connection. Everything above it sees only this. */
export interface Transport {
  readonly isOpen: boolean;
  send(data: string): Promise<void>;
  ping(): void;
  close(code: number, reason: string): void;
  terminate(): void;
}

export class WsTransport implements Transport {
  private readonly maxBufferedBytes: number;

  constructor(
    private readonly socket: WebSocket,
    private readonly sendTimeoutMs: number,
    maxBufferedBytes = DEFAULT_MAX_BUFFERED_BYTES,
  ) {
    this.maxBufferedBytes = maxBufferedBytes;
  }

  get isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }

  async send(data: string): Promise<void> {
    if (!this.isOpen) {
      throw new TransportError('closed', 'Socket is not open');
    }
    if (this.socket.bufferedAmount > this.maxBufferedBytes) {
      throw new TransportError('backpressure', `Send buffer above ${this.maxBufferedBytes} bytes`);
    }

    const written = new Promise<void>((resolve, reject) => {
      this.socket.send(data, (err?: Error) => {
        if (err) reject(new TransportError('failed', err.message));
        else resolve();
      });
    });

    try {
      await withTimeout(written, this.sendTimeoutMs, 'send');
    } catch (err) {
      if (err instanceof TimeoutError) {
        throw new TransportError('timeout', err.message);
      }
      throw err;
    }
  }

  ping(): void {
    if (this.isOpen) this.socket.ping();
  }

  close(code: number, reason: string): void {
    if (this.socket.readyState === WebSocket.OPEN || this.socket.readyState === WebSocket.CONNECTING) {
      this.socket.close(code, reason);
    }
  }

  terminate(): void {
    this.socket.terminate();
  }
}
