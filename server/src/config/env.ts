import 'dotenv/config';
import { z } from 'zod';

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const positiveNumber = (fallback: number) => z.coerce.number().positive().default(fallback);

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform(v => v === 'true' || v === '1');

/**
 * Express 'trust proxy': true/false, a hop count, or addresses/subnets
 */
export type TrustProxySetting = boolean | number | string;

const trustProxy = z
  .string()
  .default('false')
  .transform((v): TrustProxySetting => {
    if (v === 'true') return true;
    if (v === 'false') return false;
    if (/^\d+$/.test(v)) return Number(v);
    return v;
  });

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().min(0).max(65535).default(8080),
    HOST: z.string().min(1).default('0.0.0.0'),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    ALLOWED_ORIGINS: z.string().default('*'),
    ADMIN_TOKEN: z.string().min(1).optional(),
    API_KEYS: z.string().default(''),
    TRUST_PROXY: trustProxy,

    MAX_SESSIONS: positiveInt(100),
    SESSION_TIMEOUT_SECONDS: positiveInt(3600),
    SESSION_CLEANUP_INTERVAL_SECONDS: positiveInt(60),

    SSE_HEARTBEAT_INTERVAL_SECONDS: positiveInt(30),
    SSE_RETRY_INTERVAL_MS: positiveInt(5000),
    SSE_POLL_INTERVAL_MS: positiveInt(100),

    RATE_LIMIT_REQUESTS: positiveInt(100),
    RATE_LIMIT_WINDOW_SECONDS: positiveInt(60),
    RATE_LIMIT_ADAPTIVE: booleanFlag,
    RATE_LIMIT_MIN_MULTIPLIER: positiveNumber(0.5),
    RATE_LIMIT_MAX_MULTIPLIER: positiveNumber(2.0),
  })
  .refine(env => env.RATE_LIMIT_MIN_MULTIPLIER <= env.RATE_LIMIT_MAX_MULTIPLIER, {
    message: 'RATE_LIMIT_MIN_MULTIPLIER must not exceed RATE_LIMIT_MAX_MULTIPLIER',
    path: ['RATE_LIMIT_MIN_MULTIPLIER'],
  });

export interface AppConfig {
  port: number;
  host: string;
  nodeEnv: 'development' | 'production' | 'test';
  allowedOrigins: string[];
  adminToken: string | undefined;
  /** Keys that earn their own rate-limit bucket */
  apiKeys: ReadonlySet<string>;
  trustProxy: TrustProxySetting;
  session: {
    maxSessions: number;
    sessionTimeoutSeconds: number;
    cleanupIntervalSeconds: number;
  };
  sse: {
    heartbeatIntervalSeconds: number;
    retryIntervalMs: number;
    pollIntervalMs: number;
  };
  rateLimit: {
    requests: number;
    windowSeconds: number;
    adaptive: boolean;
    minMultiplier: number;
    maxMultiplier: number;
  };
}

/**
 * Parse and validate an environment map. Throws ConfigError listing every issue.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    host: e.HOST,
    nodeEnv: e.NODE_ENV,
    allowedOrigins: e.ALLOWED_ORIGINS.split(',').map(o => o.trim()).filter(Boolean),
    adminToken: e.ADMIN_TOKEN,
    apiKeys: new Set(e.API_KEYS.split(',').map(k => k.trim()).filter(Boolean)),
    trustProxy: e.TRUST_PROXY,
    session: {
      maxSessions: e.MAX_SESSIONS,
      sessionTimeoutSeconds: e.SESSION_TIMEOUT_SECONDS,
      cleanupIntervalSeconds: e.SESSION_CLEANUP_INTERVAL_SECONDS,
    },
    sse: {
      heartbeatIntervalSeconds: e.SSE_HEARTBEAT_INTERVAL_SECONDS,
      retryIntervalMs: e.SSE_RETRY_INTERVAL_MS,
      pollIntervalMs: e.SSE_POLL_INTERVAL_MS,
    },
    rateLimit: {
      requests: e.RATE_LIMIT_REQUESTS,
      windowSeconds: e.RATE_LIMIT_WINDOW_SECONDS,
      adaptive: e.RATE_LIMIT_ADAPTIVE,
      minMultiplier: e.RATE_LIMIT_MIN_MULTIPLIER,
      maxMultiplier: e.RATE_LIMIT_MAX_MULTIPLIER,
    },
  };
}

let cached: AppConfig | undefined;

export function getConfig(): AppConfig {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}
