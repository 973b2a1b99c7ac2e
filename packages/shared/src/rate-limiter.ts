import { randomUUID } from 'node:crypto';
import { type CoordinationStore } from './coordination-store';
import { createLogger, errorMessage, type SafeLogger } from './logger';
import {
  burstLimitKey,
  rateLimitKey,
  type NamedRule,
  type RateLimitRuleTable,
} from './rate-limit-rules';
import { withTimeout } from './timeout';

// Keys outlive their window so a reader at the boundary still sees the entries.
const WINDOW_TTL_SLACK_SECONDS = 10;
const DEFAULT_STORE_TIMEOUT_MS = 250;

export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** Epoch seconds at which the oldest counted entry leaves the window. */
  resetAt: number;
  /** Zero when allowed. */
  retryAfterSeconds: number;
  /** True when the store could not be consulted and the request was let through. */
  degraded: boolean;
}

export interface SubjectSource {
  ip: string;
  userId?: string | null;
  path?: string;
}

export function resolveSubject(rule: NamedRule, source: SubjectSource): string {
  switch (rule.per) {
    case 'ip':
      return `ip:${source.ip}`;
    case 'user':
      return source.userId ? `user:${source.userId}` : `ip:${source.ip}`;
    case 'endpoint':
      return `endpoint:${source.path ?? '/'}:ip:${source.ip}`;
  }
}

/**
 * First hop of X-Forwarded-For, then X-Real-IP, then the socket address.
 */
export function resolveClientIp(
  headers: Record<string, string | string[] | undefined>,
  remoteAddress: string | undefined,
): string {
  const forwarded = firstHeader(headers['x-forwarded-for']);
  if (forwarded) {
    const hop = forwarded.split(',')[0]?.trim();
    if (hop) return hop;
  }
  const realIp = firstHeader(headers['x-real-ip'])?.trim();
  if (realIp) return realIp;
  return remoteAddress ?? 'unknown';
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

interface LimiterOptions {
  store: CoordinationStore;
  clock?: () => number;
  timeoutMs?: number;
  logger?: SafeLogger;
}

export class SlidingWindowRateLimiter {
  private readonly store: CoordinationStore;
  private readonly clock: () => number;
  private readonly timeoutMs: number;
  private readonly logger: SafeLogger;

  constructor(opts: LimiterOptions) {
    this.store = opts.store;
    this.clock = opts.clock ?? Date.now;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_STORE_TIMEOUT_MS;
    this.logger = opts.logger ?? createLogger({ name: 'rate-limiter' });
  }

  async admit(subject: string, rule: NamedRule): Promise<RateLimitDecision> {
    const nowMs = this.clock();
    const windowMs = rule.windowSeconds * 1000;

    try {
      const result = await withTimeout(
        this.store.slidingWindow({
          key: rateLimitKey(rule.name, subject, rule.windowSeconds),
          nowMs,
          windowMs,
          limit: rule.requests,
          member: `${nowMs}-${randomUUID()}`,
          ttlSeconds: rule.windowSeconds + WINDOW_TTL_SLACK_SECONDS,
        }),
        this.timeoutMs,
        'rate limit window',
      );

      const resetMs = (result.oldestScore ?? nowMs) + windowMs;
      return {
        allowed: result.admitted,
        limit: rule.requests,
        remaining: Math.max(0, rule.requests - result.count),
        resetAt: Math.ceil(resetMs / 1000),
        retryAfterSeconds: result.admitted ? 0 : Math.max(1, Math.ceil((resetMs - nowMs) / 1000)),
        degraded: false,
      };
    } catch (err) {
      this.logger.error(
        { rule: rule.name, err: errorMessage(err) },
        'Rate limit store unavailable, failing open',
      );
      return {
        allowed: true,
        limit: rule.requests,
        remaining: rule.requests,
        resetAt: Math.ceil((nowMs + windowMs) / 1000),
        retryAfterSeconds: 0,
        degraded: true,
      };
    }
  }
}

export interface BurstDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  retryAfterSeconds: number;
}

/**
 * Fixed counter with an expiry set on the first hit. Guards short spikes
 * independently of the sliding window.
 */
export class BurstLimiter {
  private readonly store: CoordinationStore;
  private readonly timeoutMs: number;
  private readonly logger: SafeLogger;
  private readonly limit: number;
  private readonly windowSeconds: number;

  constructor(opts: Omit<LimiterOptions, 'clock'> & { limit: number; windowSeconds: number }) {
    this.limit = opts.limit;
    this.windowSeconds = opts.windowSeconds;
    this.store = opts.store;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_STORE_TIMEOUT_MS;
    this.logger = opts.logger ?? createLogger({ name: 'burst-limiter' });
  }

  /** `limit` overrides the configured ceiling for rules that carry their own burst. */
  async check(subject: string, limit: number = this.limit): Promise<BurstDecision> {
    const key = burstLimitKey(subject);
    try {
      const count = await withTimeout(this.store.incr(key), this.timeoutMs, 'burst incr');
      if (count === 1) {
        await withTimeout(this.store.expire(key, this.windowSeconds), this.timeoutMs, 'burst expire');
      }
      if (count <= limit) {
        return { allowed: true, limit, remaining: limit - count, retryAfterSeconds: 0 };
      }
      let ttl = await withTimeout(this.store.ttl(key), this.timeoutMs, 'burst ttl');
      if (ttl < 0) {
        // The first hit's expire never landed; without one the counter blocks forever.
        await withTimeout(this.store.expire(key, this.windowSeconds), this.timeoutMs, 'burst expire');
        ttl = this.windowSeconds;
      }
      return { allowed: false, limit, remaining: 0, retryAfterSeconds: ttl };
    } catch (err) {
      this.logger.error({ err: errorMessage(err) }, 'Burst limit store unavailable, failing open');
      return { allowed: true, limit, remaining: limit, retryAfterSeconds: 0 };
    }
  }
}

export interface GateRequest {
  path: string;
  ip: string;
  userId?: string | null;
}

export type GateDecision =
  | { kind: 'bypassed' }
  | {
      kind: 'admitted';
      rule: NamedRule;
      decision: RateLimitDecision;
      burst: BurstDecision;
    }
  | {
      kind: 'rejected';
      reason: 'burst' | 'window';
      rule: NamedRule;
      limit: number;
      remaining: number;
      resetAt: number;
      retryAfterSeconds: number;
    };

/**
 * Single admission decision for a request: rule resolution, then the burst
 * counter, then the rule's sliding window. A request must pass both limiters.
 */
export class RequestGate {
  constructor(
    private readonly rules: RateLimitRuleTable,
    private readonly limiter: SlidingWindowRateLimiter,
    private readonly burst: BurstLimiter,
    private readonly clock: () => number = Date.now,
  ) {}

  async check(req: GateRequest): Promise<GateDecision> {
    const rule = this.rules.resolve(req.path);
    if (!rule) return { kind: 'bypassed' };
    return this.checkRule(rule, req);
  }

  async checkRule(rule: NamedRule, req: GateRequest): Promise<GateDecision> {
    const burst = await this.burst.check(`ip:${req.ip}`, rule.burst);
    if (!burst.allowed) {
      return {
        kind: 'rejected',
        reason: 'burst',
        rule,
        limit: burst.limit,
        remaining: 0,
        resetAt: Math.ceil(this.clock() / 1000) + burst.retryAfterSeconds,
        retryAfterSeconds: burst.retryAfterSeconds,
      };
    }

    const decision = await this.limiter.admit(resolveSubject(rule, req), rule);
    if (!decision.allowed) {
      return {
        kind: 'rejected',
        reason: 'window',
        rule,
        limit: decision.limit,
        remaining: decision.remaining,
        resetAt: decision.resetAt,
        retryAfterSeconds: decision.retryAfterSeconds,
      };
    }
    return { kind: 'admitted', rule, decision, burst };
  }
}
