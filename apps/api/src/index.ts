import { SessionAdmissionController, SessionService } from '@gatehouse/domain';
import { closePool, initPool, withTransaction, PgSessionRepository } from '@gatehouse/db';
import {
  loadConfig,
  ApiConfigSchema,
  createLogger,
  errorMessage,
  initRedis,
  closeRedis,
  SnowflakeGenerator,
  JoseTokenService,
  RedisCoordinationStore,
  RateLimitRuleTable,
  SlidingWindowRateLimiter,
  BurstLimiter,
  RequestGate,
} from '@gatehouse/shared';
import { buildServer } from './server';

const logger = createLogger({ name: 'api' });

async function main() {
  const config = loadConfig(ApiConfigSchema);

  initPool({
    connectionString: config.DATABASE_URL,
    max: config.DATABASE_POOL_MAX,
    statementTimeoutMs: config.DATABASE_STATEMENT_TIMEOUT_MS,
  });
  const redis = initRedis(config.REDIS_URL, { commandTimeoutMs: config.REDIS_COMMAND_TIMEOUT_MS });
  const store = new RedisCoordinationStore(redis);

  const idGen = new SnowflakeGenerator(config.NODE_ID);
  const tokenService = new JoseTokenService({
    activeKid: config.JWT_ACTIVE_KID,
    keys: config.JWT_KEYS,
    accessTokenTtl: config.JWT_ACCESS_TOKEN_TTL,
  });
  const sessionRepo = new PgSessionRepository();

  const gate = new RequestGate(
    new RateLimitRuleTable({ rules: config.RATE_LIMIT_RULES }),
    new SlidingWindowRateLimiter({ store, timeoutMs: config.REDIS_COMMAND_TIMEOUT_MS }),
    new BurstLimiter({
      store,
      timeoutMs: config.REDIS_COMMAND_TIMEOUT_MS,
      limit: config.BURST_LIMIT,
      windowSeconds: config.BURST_WINDOW_SECONDS,
    }),
  );

  const app = await buildServer({
    gate,
    tokenService,
    trustProxy: config.TRUST_PROXY,
    sessions: new SessionAdmissionController({
      sessionRepo,
      tokenService,
      withTransaction,
      maxSessionsPerUser: config.MAX_SESSIONS_PER_USER,
      logger: logger.child({ component: 'sessions' }),
    }),
    sessionService: new SessionService({
      sessionRepo,
      tokenService,
      withTransaction,
      generateId: () => idGen.generate(),
      sessionTtlDays: config.SESSION_TTL_DAYS,
    }),
  });

  await app.listen({ host: config.API_HOST, port: config.API_PORT });
  logger.info({ port: config.API_PORT }, 'API server started');

  const shutdown = async () => {
    logger.info({}, 'Shutting down API server');
    await app.close();
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
  logger.fatal({ err: errorMessage(err) }, 'Failed to start API');
  process.exit(1);
});
