export { createLogger, errorMessage, type SafeLogger } from './logger';
export { AppError, ErrorCode, isAppError } from './errors';
export {
  loadConfig,
  type BaseConfig,
  type GatewayConfig,
  type ApiConfig,
  BaseConfigSchema,
  DatabaseConfigSchema,
  RedisConfigSchema,
  JwtConfigSchema,
  SessionConfigSchema,
  RateLimitConfigSchema,
  ApiConfigSchema,
  GatewayConfigSchema,
} from './config';
export { SnowflakeGenerator } from './id';
export { withTimeout, TimeoutError } from './timeout';
export { JoseTokenService } from './auth/token-service';
export { type TokenService } from '@gatehouse/domain';
export { initRedis, closeRedis, type RedisOptions } from './redis';
export {
  RedisCoordinationStore,
  InMemoryCoordinationStore,
  CoordinationStoreUnavailableError,
  type CoordinationStore,
  type MessageListener,
  type SlidingWindowRequest,
  type SlidingWindowResult,
} from './coordination-store';
export {
  RateLimitRuleSchema,
  RateLimitRuleTable,
  DEFAULT_RATE_LIMIT_RULES,
  DEFAULT_ENDPOINT_RULES,
  DEFAULT_EXCLUDED_PATHS,
  rateLimitKey,
  burstLimitKey,
  type RateLimitRule,
  type NamedRule,
  type SubjectKind,
} from './rate-limit-rules';
export {
  SlidingWindowRateLimiter,
  BurstLimiter,
  RequestGate,
  resolveClientIp,
  resolveSubject,
  type RateLimitDecision,
  type BurstDecision,
  type GateDecision,
  type GateRequest,
} from './rate-limiter';
export {
  RedisMessageHistoryStore,
  InMemoryMessageHistoryStore,
  HistoryEntrySchema,
  HISTORY_MAX_ENTRIES,
  HISTORY_RETENTION_SECONDS,
  type HistoryEntry,
  type MessageHistoryStore,
} from './history-store';
export { InMemoryBoardRepository } from './board-store';
