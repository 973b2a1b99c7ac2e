import { errorMessage, type SafeLogger } from '@gatehouse/shared';
import { type ConnectionRegistry } from './registry';

/**
 * Pings every connection each interval. One that has not answered the
 * previous ping is terminated.
 */
export function startHeartbeat(
  registry: ConnectionRegistry,
  intervalMs: number,
  logger: SafeLogger,
): () => void {
  const timer = setInterval(() => {
    for (const connection of registry.all()) {
      if (!connection.alive) {
        connection.logger.info({}, 'Heartbeat missed, terminating');
        connection.transport.terminate();
        registry.close(connection, 1001, 'Heartbeat timeout').catch((err: unknown) => {
          logger.error({ connectionId: connection.id, err: errorMessage(err) }, 'Close after heartbeat failed');
        });
        continue;
      }
      connection.alive = false;
      connection.transport.ping();
    }
  }, intervalMs);
  timer.unref();
  return () => clearInterval(timer);
}
