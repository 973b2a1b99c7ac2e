import { z } from 'zod';

export const RateLimitRuleSchema = z.object({
  requests: z.number().int().positive(),
  windowSeconds: z.number().int().positive(),
  per: z.enum(['ip', 'user', 'endpoint']),
  burst: z.number().int().positive().optional(),
});

export type RateLimitRule = z.infer<typeof RateLimitRuleSchema>;
export type SubjectKind = RateLimitRule['per'];

export interface NamedRule extends RateLimitRule {
  name: string;
}

export const DEFAULT_RATE_LIMIT_RULES: Readonly<Record<string, RateLimitRule>> = {
  global: { requests: 1000, windowSeconds: 3600, per: 'ip' },
  auth: { requests: 10, windowSeconds: 900, per: 'ip' },
  api: { requests: 100, windowSeconds: 300, per: 'user' },
  upload: { requests: 20, windowSeconds: 3600, per: 'user' },
  websocket: { requests: 5, windowSeconds: 60, per: 'ip' },
};

export const DEFAULT_ENDPOINT_RULES: ReadonlyArray<readonly [prefix: string, rule: string]> = [
  ['/api/v1/auth/login', 'auth'],
  ['/api/v1/auth/register', 'auth'],
  ['/api/v1/auth/refresh', 'auth'],
  ['/api/v1/files/upload', 'upload'],
  ['/ws', 'websocket'],
  ['/api', 'api'],
];

export const DEFAULT_EXCLUDED_PATHS: readonly string[] = [
  '/health',
  '/docs',
  '/redoc',
  '/openapi.json',
  '/metrics',
];

export const DEFAULT_RULE_NAME = 'global';

function matchesPrefix(path: string, prefix: string): boolean {
  if (path === prefix) return true;
  const base = prefix.endsWith('/') ? prefix : `${prefix}/`;
  return path.startsWith(base);
}

/**
 * Static endpoint → rule table. Built once per process; lookups pick the
 * longest matching prefix and fall back to the default rule.
 */
export class RateLimitRuleTable {
  private readonly rules: Map<string, RateLimitRule>;
  private readonly endpoints: Array<readonly [string, string]>;
  private readonly excluded: readonly string[];
  private readonly defaultRule: string;

  constructor(
    opts: {
      rules?: Record<string, RateLimitRule>;
      endpoints?: ReadonlyArray<readonly [string, string]>;
      excluded?: readonly string[];
      defaultRule?: string;
    } = {},
  ) {
    this.rules = new Map(Object.entries({ ...DEFAULT_RATE_LIMIT_RULES, ...opts.rules }));
    this.endpoints = [...(opts.endpoints ?? DEFAULT_ENDPOINT_RULES)].sort(
      (a, b) => b[0].length - a[0].length,
    );
    this.excluded = opts.excluded ?? DEFAULT_EXCLUDED_PATHS;
    this.defaultRule = opts.defaultRule ?? DEFAULT_RULE_NAME;

    for (const [prefix, name] of this.endpoints) {
      if (!this.rules.has(name)) {
        throw new Error(`Endpoint '${prefix}' references unknown rate limit rule '${name}'`);
      }
    }
    if (!this.rules.has(this.defaultRule)) {
      throw new Error(`Default rate limit rule '${this.defaultRule}' is not defined`);
    }
  }

  get(name: string): NamedRule | null {
    const rule = this.rules.get(name);
    return rule ? { name, ...rule } : null;
  }

  isExcluded(path: string): boolean {
    const clean = stripQuery(path);
    return this.excluded.some((prefix) => matchesPrefix(clean, prefix));
  }

  /** Returns null for excluded paths, which bypass limiting entirely. */
  resolve(path: string): NamedRule | null {
    const clean = stripQuery(path);
    if (this.isExcluded(clean)) return null;

    const match = this.endpoints.find(([prefix]) => matchesPrefix(clean, prefix));
    const name = match ? match[1] : this.defaultRule;
    return this.get(name);
  }
}

function stripQuery(path: string): string {
  const idx = path.indexOf('?');
  return idx === -1 ? path : path.slice(0, idx);
}

export function rateLimitKey(rule: string, subject: string, windowSeconds: number): string {
  return `rate_limit:${rule}:${subject}:${windowSeconds}`;
}

export function burstLimitKey(subject: string): string {
  return `burst_limit:${subject}`;
}
