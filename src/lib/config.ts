import { z } from 'zod';
import { ConfigError } from './errors';

const intFromEnv = (fallback: string, min: number, max: number = Number.MAX_SAFE_INTEGER) =>
  z.string().transform(Number).pipe(z.number().int().min(min).max(max)).default(fallback);

const booleanFromEnv = (fallback: string) =>
  z.string().transform(val => val.toLowerCase() === 'true').default(fallback);

// Environment validation schema
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Server configuration
  HOST: z.string().default('0.0.0.0'),
  PORT: intFromEnv('8000', 1, 65535),
  WEB_PORT: intFromEnv('8080', 1, 65535),

  // Logging
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  LOG_PRETTY: booleanFromEnv('true'),

  // CORS / rate limiting
  CORS_ORIGIN: z.string().default('*'),
  API_RATE_LIMIT_WINDOW_MS: intFromEnv('900000', 1000), // 15 minutes
  API_RATE_LIMIT_MAX: intFromEnv('100', 1),

  // GitHub
  GITHUB_API_URL: z.string().url('Invalid GitHub API URL').default('https://api.github.com'),
  GITHUB_TOKEN: z.string().optional(),
  GITHUB_TIMEOUT_MS: intFromEnv('30000', 100),
  GITHUB_MAX_COMMIT_PAGES: intFromEnv('10', 1, 100),

  // Chat completion endpoint
  COMPLETION_API_URL: z.string().url('Invalid completion API URL').default('https://api.mistral.ai/v1/chat/completions'),
  COMPLETION_API_KEY: z.string().optional(),
  MISTRAL_API_KEY: z.string().optional(),
  COMPLETION_MODEL: z.string().min(1).default('mistral-large-latest'),
  COMPLETION_TIMEOUT_MS: intFromEnv('110000', 100),

  // Storage
  DATABASE_PATH: z.string().min(1).default('./data/github_statistics.db'),

  // Front ends
  API_GATEWAY_URL: z.string().url('Invalid gateway URL').default('http://localhost:8000'),
  BOT_GATEWAY_TIMEOUT_MS: intFromEnv('180000', 100),
  WEB_GATEWAY_TIMEOUT_MS: intFromEnv('120000', 100),
  TELEGRAM_BOT_TOKEN: z.string().optional(),
  TELEGRAM_API_URL: z.string().url('Invalid Telegram API URL').default('https://api.telegram.org'),
});

export type Env = z.infer<typeof envSchema>;
export type LogLevel = Env['LOG_LEVEL'];

export interface AppConfig {
  env: Env['NODE_ENV'];
  server: { host: string; port: number };
  log: { level: LogLevel; pretty: boolean };
  cors: { origin: string };
  rateLimit: { windowMs: number; max: number };
  github: {
    apiUrl: string;
    token?: string;
    timeoutMs: number;
    maxCommitPages: number;
  };
  completion: {
    apiUrl: string;
    apiKey?: string;
    model: string;
    temperature: number;
    timeoutMs: number;
  };
  database: { path: string };
  web: { port: number; gatewayUrl: string; gatewayTimeoutMs: number };
  bot: {
    token?: string;
    apiUrl: string;
    gatewayUrl: string;
    gatewayTimeoutMs: number;
  };
}

// Empty strings in .env files mean "not set"
const blankToUndefined = (value?: string): string | undefined =>
  value && value.trim().length > 0 ? value.trim() : undefined;

/**
 * Validate the environment and build the configuration object handed to every
 * component at construction time.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const errorMessages = result.error.errors.map(err => `${err.path.join('.')}: ${err.message}`);
    throw new ConfigError('Environment validation failed', { errors: errorMessages });
  }

  const env = result.data;

  return {
    env: env.NODE_ENV,
    server: { host: env.HOST, port: env.PORT },
    log: {
      level: env.LOG_LEVEL,
      pretty: env.LOG_PRETTY && env.NODE_ENV === 'development',
    },
    cors: { origin: env.CORS_ORIGIN },
    rateLimit: { windowMs: env.API_RATE_LIMIT_WINDOW_MS, max: env.API_RATE_LIMIT_MAX },
    github: {
      apiUrl: env.GITHUB_API_URL,
      token: blankToUndefined(env.GITHUB_TOKEN),
      timeoutMs: env.GITHUB_TIMEOUT_MS,
      maxCommitPages: env.GITHUB_MAX_COMMIT_PAGES,
    },
    completion: {
      apiUrl: env.COMPLETION_API_URL,
      apiKey: blankToUndefined(env.COMPLETION_API_KEY) ?? blankToUndefined(env.MISTRAL_API_KEY),
      model: env.COMPLETION_MODEL,
      temperature: 0.2,
      timeoutMs: env.COMPLETION_TIMEOUT_MS,
    },
    database: { path: env.DATABASE_PATH },
    web: {
      port: env.WEB_PORT,
      gatewayUrl: env.API_GATEWAY_URL,
      gatewayTimeoutMs: env.WEB_GATEWAY_TIMEOUT_MS,
    },
    bot: {
      token: blankToUndefined(env.TELEGRAM_BOT_TOKEN),
      apiUrl: env.TELEGRAM_API_URL,
      gatewayUrl: env.API_GATEWAY_URL,
      gatewayTimeoutMs: env.BOT_GATEWAY_TIMEOUT_MS,
    },
  };
}

export const isProduction = (config: AppConfig): boolean => config.env === 'production';
export const isDevelopment = (config: AppConfig): boolean => config.env === 'development';
