import { type Connection } from './connections';

/** Inbound frames per connection per one-second window. */
export class MessageRateLimiter {
  constructor(
    private readonly maxPerSecond: number,
    private readonly clock: () => number = Date.now,
  ) {}

  allow(connection: Connection): boolean {
    const now = this.clock();
    if (now - connection.messageWindowStart >= 1000) {
      connection.messageCount = 0;
      connection.messageWindowStart = now;
    }
    connection.messageCount++;
    return connection.messageCount <= this.maxPerSecond;
  }
}
