import Redis from 'ioredis';
import { createLogger } from './logger';

const logger = createLogger({ name: 'redis' });

let client: Redis | null = null;

export interface RedisOptions {
  /** Per-command bound; a slow store fails the call instead of stalling admission. */
  commandTimeoutMs: number;
}

export function initRedis(url: string, opts: RedisOptions): Redis {
  if (client) return client;
  client = new Redis(url, {
    lazyConnect: false,
    maxRetriesPerRequest: 1,
    commandTimeout: opts.commandTimeoutMs,
  });
  client.on('error', (err: Error) => {
    logger.error({ err: err.message }, 'Redis connection error');
  });
  logger.info({ commandTimeoutMs: opts.commandTimeoutMs }, 'Redis client initialized');
  return client;
}

export async function closeRedis(): Promise<void> {
  if (client) {
    await client.quit();
    client = null;
    logger.info({}, 'Redis client closed');
  }
}
