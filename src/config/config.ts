import { z } from 'zod';
import { ConfigError } from '../utils/errors';

const DURATION_UNITS: Record<string, number> = { s: 1, m: 60, h: 3600, d: 86400 };

/** Parses `90`, `90s`, `60m`, `12h` or `7d` into seconds. */
export function parseDurationSeconds(value: string): number | undefined {
  const match = /^(\d+)([smhd]?)$/.exec(value.trim());
  if (!match) return undefined;
  const amount = parseInt(match[1], 10);
  return amount > 0 ? amount * DURATION_UNITS[match[2] || 's'] : undefined;
}

const duration = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .superRefine((value, ctx) => {
      if (parseDurationSeconds(value) === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid duration "${value}"` });
      }
    });

const optionalNonEmptyString = () =>
  z
    .string()
    .min(1)
    .optional()
    .or(z.literal('').transform(() => undefined));

/**
 * Environment variable validation schema.
 * Every key has a development default except JWT_SECRET.
 */
export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(8000),
  SERVICE_NAME: z.string().default('socialconnect-api'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),

  JWT_SECRET: z.string({ required_error: 'JWT_SECRET is required' }).min(1, 'JWT_SECRET must not be empty'),
  JWT_ACCESS_TTL: duration('60m'),
  JWT_REFRESH_TTL: duration('7d'),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(10),

  DB_DIALECT: z.enum(['postgres', 'sqlite']).default('postgres'),
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_NAME: z.string().default('socialconnect'),
  DB_USER: z.string().default('postgres'),
  DB_PASSWORD: z.string().default(''),
  DB_STORAGE: z.string().default(':memory:'),

  REDIS_URL: optionalNonEmptyString(),

  KAFKA_BROKER: optionalNonEmptyString(),
  KAFKA_CLIENT_ID: z.string().default('socialconnect-api'),
  SOCIAL_EVENTS_TOPIC: z.string().default('social_events'),

  CORS_ORIGINS: z.string().default('*'),
  PUBLIC_BASE_URL: z.string().url().default('http://localhost:8000'),
  EMAIL_FROM: z.string().default('no-reply@socialconnect.local'),
});

export type Env = z.infer<typeof envSchema>;

export interface DatabaseConfig {
  dialect: 'postgres' | 'sqlite';
  host: string;
  port: number;
  name: string;
  user: string;
  password: string;
  storage: string;
}

export interface AppConfig {
  env: Env['NODE_ENV'];
  port: number;
  serviceName: string;
  logLevel: Env['LOG_LEVEL'];
  jwt: {
    secret: string;
    accessTtlSeconds: number;
    refreshTtlSeconds: number;
  };
  bcryptRounds: number;
  database: DatabaseConfig;
  redisUrl?: string;
  kafka: {
    broker?: string;
    clientId: string;
    topic: string;
  };
  corsOrigins: string[];
  publicBaseUrl: string;
  emailFrom: string;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`)
    );
  }
  const env = parsed.data;

  return {
    env: env.NODE_ENV,
    port: env.PORT,
    serviceName: env.SERVICE_NAME,
    logLevel: env.LOG_LEVEL,
    jwt: {
      secret: env.JWT_SECRET,
      accessTtlSeconds: parseDurationSeconds(env.JWT_ACCESS_TTL) ?? 3600,
      refreshTtlSeconds: parseDurationSeconds(env.JWT_REFRESH_TTL) ?? 604800,
    },
    bcryptRounds: env.BCRYPT_ROUNDS,
    database: {
      dialect: env.DB_DIALECT,
      host: env.DB_HOST,
      port: env.DB_PORT,
      name: env.DB_NAME,
      user: env.DB_USER,
      password: env.DB_PASSWORD,
      storage: env.DB_STORAGE,
    },
    redisUrl: env.REDIS_URL,
    kafka: {
      broker: env.KAFKA_BROKER,
      clientId: env.KAFKA_CLIENT_ID,
      topic: env.SOCIAL_EVENTS_TOPIC,
    },
    corsOrigins: env.CORS_ORIGINS.split(',').map(origin => origin.trim()).filter(Boolean),
    publicBaseUrl: env.PUBLIC_BASE_URL.replace(/\/+$/, ''),
    emailFrom: env.EMAIL_FROM,
  };
}
