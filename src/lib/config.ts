/**
 * Application Configuration
 * Validates process environment once at startup
 */

import { z } from 'zod';

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value === '' ? undefined : value));

const envSchema = z
  .object({
    NODE_ENV: z
      .enum(['development', 'production', 'test'])
      .default('development'),
    PORT: positiveInt(3000),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

    STORAGE_DRIVER: z.enum(['supabase', 'memory']).default('supabase'),
    SUPABASE_URL: optionalString,
    SUPABASE_SERVICE_KEY: optionalString,
    UPSTASH_REDIS_URL: optionalString,
    UPSTASH_REDIS_TOKEN: optionalString,

    LICENSE_KEY_PREFIX: z
      .string()
      .regex(/^[A-Z0-9]+$/, 'must be uppercase alphanumeric')
      .default('FL'),
    LICENSE_KEY_SEGMENT_LENGTH: z.coerce.number().int().min(4).max(16).default(4),

    PRIVATE_KEY_PATH: z.string().min(1).default('keys/private_key.pem'),
    PUBLIC_KEY_PATH: z.string().min(1).default('keys/public_key.pem'),
    LICENSE_TOKEN_ISSUER: z.string().min(1).default('licensing-server'),
    LICENSE_TOKEN_AUDIENCE: z.string().min(1).default('licensed-app'),
    LICENSE_TOKEN_TTL_DAYS: positiveInt(30),

    ACCESS_TOKEN_SECRET: z
      .string()
      .min(32, 'must be at least 32 characters'),
    ACCESS_TOKEN_ISSUER: z.string().min(1).default('licensing-dashboard'),
    ACCESS_TOKEN_AUDIENCE: z.string().min(1).default('licensing-dashboard'),
    ACCESS_TOKEN_TTL_MINUTES: positiveInt(30),
    OPERATOR_API_KEY_HASH: z
      .string()
      .regex(/^[a-f0-9]{64}$/, 'must be a sha256 hex digest'),

    DEFAULT_GRACE_PERIOD_DAYS: z.coerce.number().int().min(0).default(7),
    MAX_DEVICES_PER_SUBSCRIPTION: positiveInt(10),
    ALLOWED_ORIGINS: z
      .string()
      .default('http://localhost:3000')
      .transform((value) =>
        value
          .split(',')
          .map((origin) => origin.trim())
          .filter((origin) => origin !== '')
      ),
  })
  .superRefine((env, ctx) => {
    if (env.STORAGE_DRIVER === 'supabase') {
      if (env.SUPABASE_URL === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['SUPABASE_URL'],
          message: 'is required when STORAGE_DRIVER=supabase',
        });
      }
      if (env.SUPABASE_SERVICE_KEY === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['SUPABASE_SERVICE_KEY'],
          message: 'is required when STORAGE_DRIVER=supabase',
        });
      }
    }
    if (
      (env.UPSTASH_REDIS_URL === undefined) !==
      (env.UPSTASH_REDIS_TOKEN === undefined)
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['UPSTASH_REDIS_TOKEN'],
        message: 'UPSTASH_REDIS_URL and UPSTASH_REDIS_TOKEN must be set together',
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  env: Env['NODE_ENV'];
  port: number;
  logLevel: Env['LOG_LEVEL'];
  storage:
    | { driver: 'memory' }
    | { driver: 'supabase'; url: string; serviceKey: string };
  redis: { url: string; token: string } | null;
  licenseKey: {
    prefix: string;
    segmentLength: number;
  };
  licenseToken: {
    privateKeyPath: string;
    publicKeyPath: string;
    issuer: string;
    audience: string;
    ttlDays: number;
  };
  accessToken: {
    secret: string;
    issuer: string;
    audience: string;
    ttlMinutes: number;
  };
  operatorApiKeyHash: string;
  subscriptions: {
    defaultGracePeriodDays: number;
    maxDevicesPerSubscription: number;
  };
  allowedOrigins: string[];
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Parse and validate configuration from an environment map
 * Throws ConfigError listing every invalid variable
 */
export function loadConfig(
  source: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
      )
    );
  }

  const env = parsed.data;

  let storage: AppConfig['storage'] = { driver: 'memory' };
  if (
    env.STORAGE_DRIVER === 'supabase' &&
    env.SUPABASE_URL !== undefined &&
    env.SUPABASE_SERVICE_KEY !== undefined
  ) {
    storage = {
      driver: 'supabase',
      url: env.SUPABASE_URL,
      serviceKey: env.SUPABASE_SERVICE_KEY,
    };
  }

  const redis =
    env.UPSTASH_REDIS_URL !== undefined && env.UPSTASH_REDIS_TOKEN !== undefined
      ? { url: env.UPSTASH_REDIS_URL, token: env.UPSTASH_REDIS_TOKEN }
      : null;

  return {
    env: env.NODE_ENV,
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    storage,
    redis,
    licenseKey: {
      prefix: env.LICENSE_KEY_PREFIX,
      segmentLength: env.LICENSE_KEY_SEGMENT_LENGTH,
    },
    licenseToken: {
      privateKeyPath: env.PRIVATE_KEY_PATH,
      publicKeyPath: env.PUBLIC_KEY_PATH,
      issuer: env.LICENSE_TOKEN_ISSUER,
      audience: env.LICENSE_TOKEN_AUDIENCE,
      ttlDays: env.LICENSE_TOKEN_TTL_DAYS,
    },
    accessToken: {
      secret: env.ACCESS_TOKEN_SECRET,
      issuer: env.ACCESS_TOKEN_ISSUER,
      audience: env.ACCESS_TOKEN_AUDIENCE,
      ttlMinutes: env.ACCESS_TOKEN_TTL_MINUTES,
    },
    operatorApiKeyHash: env.OPERATOR_API_KEY_HASH,
    subscriptions: {
      defaultGracePeriodDays: env.DEFAULT_GRACE_PERIOD_DAYS,
      maxDevicesPerSubscription: env.MAX_DEVICES_PER_SUBSCRIPTION,
    },
    allowedOrigins: env.ALLOWED_ORIGINS,
  };
}
