import { z } from 'zod';
import { RateLimitRuleSchema } from './rate-limit-rules';

export const BaseConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  NODE_ID: z.coerce.number().int().min(0).max(1023).default(0),
});

export type BaseConfig = z.infer<typeof BaseConfigSchema>;

export const DatabaseConfigSchema = z.object({
  DATABASE_URL: z.string().min(1),
  DATABASE_POOL_MAX: z.coerce.number().int().positive().default(10),
  DATABASE_STATEMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
});

export const RedisConfigSchema = z.object({
  REDIS_URL: z.string().default('redis://localhost:6379'),
  REDIS_COMMAND_TIMEOUT_MS: z.coerce.number().int().positive().default(250),
});

const JwtKeysSchema = z
  .string()
  .transform((raw, ctx) => {
    try {
      const parsed: unknown = JSON.parse(raw);
      return parsed;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'JWT_KEYS must be valid JSON' });
      return z.NEVER;
    }
  })
  .pipe(
    z
      .array(z.object({ kid: z.string().min(1), secret: z.string().min(32) }))
      .min(1, 'At least one JWT key is required'),
  );

export const JwtConfigSchema = z.object({
  JWT_ACTIVE_KID: z.string().min(1),
  JWT_KEYS: JwtKeysSchema,
  JWT_ACCESS_TOKEN_TTL: z.string().regex(/^\d+$/, 'TTL is a number of seconds').default('3600'),
});

export const SessionConfigSchema = z.object({
  MAX_SESSIONS_PER_USER: z.coerce.number().int().min(1).default(5),
  SESSION_TTL_DAYS: z.coerce.number().int().min(1).default(30),
});

const RateLimitRulesSchema = z
  .string()
  .transform((raw, ctx) => {
    try {
      const parsed: unknown = JSON.parse(raw);
      return parsed;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'RATE_LIMIT_RULES must be valid JSON' });
      return z.NEVER;
    }
  })
  .pipe(z.record(RateLimitRuleSchema));

export const RateLimitConfigSchema = z.object({
  BURST_LIMIT: z.coerce.number().int().positive().default(50),
  BURST_WINDOW_SECONDS: z.coerce.number().int().positive().default(60),
  RATE_LIMIT_RULES: RateLimitRulesSchema.optional(),
});

export const GatewayConfigSchema = BaseConfigSchema.merge(DatabaseConfigSchema)
  .merge(RedisConfigSchema)
  .merge(JwtConfigSchema)
  .merge(SessionConfigSchema)
  .merge(RateLimitConfigSchema)
  .extend({
    GATEWAY_HOST: z.string().default('0.0.0.0'),
    GATEWAY_PORT: z.coerce.number().default(4000),
    MAX_PAYLOAD_BYTES: z.coerce.number().default(65536),
    RATE_LIMIT_PER_SECOND: z.coerce.number().default(30),
    SEND_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
    HEARTBEAT_INTERVAL_MS: z.coerce.number().int().positive().default(30000),
    ROOM_HISTORY_SIZE: z.coerce.number().int().positive().default(100),
  });

export const ApiConfigSchema = BaseConfigSchema.merge(DatabaseConfigSchema)
  .merge(RedisConfigSchema)
  .merge(JwtConfigSchema)
  .merge(SessionConfigSchema)
  .merge(RateLimitConfigSchema)
  .extend({
    API_HOST: z.string().default('0.0.0.0'),
    API_PORT: z.coerce.number().default(3000),
    TRUST_PROXY: z
      .enum(['true', 'false'])
      .default('false')
      .transform((v) => v === 'true'),
  });

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;
export type ApiConfig = z.infer<typeof ApiConfigSchema>;

export function loadConfig<T extends z.ZodType>(
  schema: T,
  env: Record<string, string | undefined> = process.env,
): z.infer<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const formatted = result.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Config validation failed:\n${formatted}`);
  }
  return result.data;
}
