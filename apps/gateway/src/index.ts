import { randomUUID } from 'node:crypto';
import { RoomAccessPolicy, SessionAdmissionController } from '@gatehouse/domain';
import {
  closePool,
  initPool,
  withTransaction,
  PgBoardRepository,
  PgOrganizationDirectory,
  PgSessionRepository,
} from '@gatehouse/db';
import {
  loadConfig,
  GatewayConfigSchema,
  createLogger,
  errorMessage,
  SnowflakeGenerator,
  JoseTokenService,
  initRedis,
  closeRedis,
  RedisCoordinationStore,
  RedisMessageHistoryStore,
  RateLimitRuleTable,
  SlidingWindowRateLimiter,
  BurstLimiter,
  RequestGate,
} from '@gatehouse/shared';
import { AdmissionGate } from './admission';
import { RoomBroadcaster } from './broadcaster';
import { SerialLanes } from './lanes';
import { ConnectionRegistry } from './registry';
import { createGateway } from './server';

const logger = createLogger({ name: 'gateway' });

async function main() {
  const config = loadConfig(GatewayConfigSchema);
  const idGen = new SnowflakeGenerator(config.NODE_ID);
  const instanceId = `${config.NODE_ID}-${randomUUID()}`;

  const tokenService = new JoseTokenService({
    activeKid: config.JWT_ACTIVE_KID,
    keys: config.JWT_KEYS,
    accessTokenTtl: config.JWT_ACCESS_TOKEN_TTL,
  });

  initPool({
    connectionString: config.DATABASE_URL,
    max: config.DATABASE_POOL_MAX,
    statementTimeoutMs: config.DATABASE_STATEMENT_TIMEOUT_MS,
  });
  const redis = initRedis(config.REDIS_URL, { commandTimeoutMs: config.REDIS_COMMAND_TIMEOUT_MS });
  const store = new RedisCoordinationStore(redis);

  const rules = new RateLimitRuleTable({ rules: config.RATE_LIMIT_RULES });
  const websocketRule = rules.get('websocket');
  if (!websocketRule) throw new Error("Rate limit rule 'websocket' is not defined");
  const gate = new RequestGate(
    rules,
    new SlidingWindowRateLimiter({ store, timeoutMs: config.REDIS_COMMAND_TIMEOUT_MS }),
    new BurstLimiter({
      store,
      timeoutMs: config.REDIS_COMMAND_TIMEOUT_MS,
      limit: config.BURST_LIMIT,
      windowSeconds: config.BURST_WINDOW_SECONDS,
    }),
  );

  const boards = new PgBoardRepository();
  const sessions = new SessionAdmissionController({
    sessionRepo: new PgSessionRepository(),
    tokenService,
    withTransaction,
    maxSessionsPerUser: config.MAX_SESSIONS_PER_USER,
    logger: logger.child({ component: 'sessions' }),
  });
  const access = new RoomAccessPolicy({
    boardRepo: boards,
    organizations: new PgOrganizationDirectory(),
    withTransaction,
  });

  const registry = new ConnectionRegistry({ historySize: config.ROOM_HISTORY_SIZE, logger });
  const broadcaster = new RoomBroadcaster({
    registry,
    lanes: new SerialLanes(),
    access,
    store,
    history: new RedisMessageHistoryStore(redis),
    boards,
    withTransaction,
    idGen,
    instanceId,
    logger,
  });

  const gateway = createGateway({
    port: config.GATEWAY_PORT,
    host: config.GATEWAY_HOST,
    maxPayloadBytes: config.MAX_PAYLOAD_BYTES,
    rateLimitPerSecond: config.RATE_LIMIT_PER_SECOND,
    sendTimeoutMs: config.SEND_TIMEOUT_MS,
    heartbeatIntervalMs: config.HEARTBEAT_INTERVAL_MS,
    idGen,
    admission: new AdmissionGate({ gate, rule: websocketRule, sessions, logger }),
    registry,
    broadcaster,
    logger,
  });

  await gateway.listen();

  const shutdown = async () => {
    logger.info({}, 'Shutting down gateway');
    await gateway.close();
    await store.close();
    await closeRedis();
    await closePool();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      logger.fatal({ err: errorMessage(err) }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err) => {
  logger.fatal({ err: errorMessage(err) }, 'Failed to start gateway');
  process.exit(1);
});
