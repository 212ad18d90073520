import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';

const booleanSchema = z
  .union([z.boolean(), z.string()])
  .transform((value: string | boolean): boolean => {
    if (typeof value === 'boolean') {
      return value;
    }

    const normalizedValue: string = value.trim().toLowerCase();

    return normalizedValue === 'true' || normalizedValue === '1' || normalizedValue === 'yes';
  });

const resolvePackageVersion = (): string => {
  try {
    const packageJsonPath: string = resolve(process.cwd(), 'package.json');
    const packageJsonRaw: string = readFileSync(packageJsonPath, 'utf8');
    const packageJsonParsed: unknown = JSON.parse(packageJsonRaw);

    if (
      typeof packageJsonParsed === 'object' &&
      packageJsonParsed !== null &&
      'version' in packageJsonParsed
    ) {
      const versionValue: unknown = packageJsonParsed.version;

      if (typeof versionValue === 'string' && versionValue.trim().length > 0) {
        return versionValue.trim();
      }
    }
  } catch {
    // Fallback is handled below.
  }

  return '0.0.0';
};

const DEFAULT_APP_VERSION: string = resolvePackageVersion();
const DEFAULT_PORT = 3000;
const DEFAULT_LEDGER_WS_URL = 'wss://test.finney.opentensor.ai:443';
const DEFAULT_LEDGER_QUERY_TIMEOUT_MS = 5000;
const DEFAULT_LEDGER_SUBMIT_TIMEOUT_MS = 30_000;
const DEFAULT_LEDGER_CONNECT_MAX_ATTEMPTS = 3;
const DEFAULT_LEDGER_CONNECT_BACKOFF_MS = 1000;
const DEFAULT_NETUID = 18;
const DEFAULT_HOTKEY = '5FFApaS75bv5pJHfAp2FVLBj9ZaXuFDjEypsaBNc1wCfe52v';
const DEFAULT_DIVIDEND_CACHE_TTL_SEC = 120;
const DEFAULT_DIVIDEND_CACHE_MAX_ENTRIES = 10_000;
const DEFAULT_HISTORY_LIMIT = 100;
const DEFAULT_HISTORY_MAX_LIMIT = 500;
const DEFAULT_SENTIMENT_SEARCH_URL = 'https://api.datura.ai/api/twitter/search';
const DEFAULT_SENTIMENT_MODEL_URL =
  'https://api.chutes.ai/api/v1/chute/20acffc0-0c5f-58e3-97af-21fc0b261ec4/predict';
const DEFAULT_SENTIMENT_TIMEOUT_MS = 10_000;
const DEFAULT_SENTIMENT_SEARCH_LIMIT = 20;
const DEFAULT_SENTIMENT_SCORE_LIMIT = 10;
const DEFAULT_TRADE_WORKER_CONCURRENCY = 2;
const DEFAULT_JWT_API_TOKEN_TTL_SEC = 2_592_000;
const DEFAULT_RATE_LIMIT_LEDGER_MIN_TIME_MS = 0;
const DEFAULT_RATE_LIMIT_LEDGER_MAX_CONCURRENT = 8;
const DEFAULT_RATE_LIMIT_SENTIMENT_MIN_TIME_MS = 500;
const DEFAULT_RATE_LIMIT_SENTIMENT_MAX_CONCURRENT = 1;

const optionalNonEmptyStringSchema = z
  .string()
  .trim()
  .optional()
  .transform((value: string | undefined): string | undefined => {
    if (typeof value !== 'string') {
      return undefined;
    }

    return value.length > 0 ? value : undefined;
  });

export const envSchema = z.object({
  APP_VERSION: z.string().trim().min(1).default(DEFAULT_APP_VERSION),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(DEFAULT_PORT),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  DATABASE_URL: z.url(),
  DATABASE_MIGRATIONS_ENABLED: booleanSchema.default(true),
  LEDGER_ENABLED: booleanSchema.default(true),
  LEDGER_WS_URL: z.url().default(DEFAULT_LEDGER_WS_URL),
  LEDGER_WALLET_MNEMONIC: optionalNonEmptyStringSchema,
  LEDGER_QUERY_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_LEDGER_QUERY_TIMEOUT_MS),
  LEDGER_SUBMIT_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_LEDGER_SUBMIT_TIMEOUT_MS),
  LEDGER_CONNECT_MAX_ATTEMPTS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_LEDGER_CONNECT_MAX_ATTEMPTS),
  LEDGER_CONNECT_BACKOFF_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_LEDGER_CONNECT_BACKOFF_MS),
  LEDGER_FALLBACK_HOTKEY: z.string().trim().min(1).default(DEFAULT_HOTKEY),
  DEFAULT_NETUID: z.coerce.number().int().min(0).default(DEFAULT_NETUID),
  DEFAULT_HOTKEY: z.string().trim().min(1).default(DEFAULT_HOTKEY),
  DIVIDEND_CACHE_TTL_SEC: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_DIVIDEND_CACHE_TTL_SEC),
  DIVIDEND_CACHE_MAX_ENTRIES: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_DIVIDEND_CACHE_MAX_ENTRIES),
  HISTORY_DEFAULT_LIMIT: z.coerce.number().int().positive().default(DEFAULT_HISTORY_LIMIT),
  HISTORY_MAX_LIMIT: z.coerce.number().int().positive().default(DEFAULT_HISTORY_MAX_LIMIT),
  SENTIMENT_SEARCH_URL: z.url().default(DEFAULT_SENTIMENT_SEARCH_URL),
  SENTIMENT_SEARCH_API_KEY: optionalNonEmptyStringSchema,
  SENTIMENT_MODEL_URL: z.url().default(DEFAULT_SENTIMENT_MODEL_URL),
  SENTIMENT_MODEL_API_KEY: optionalNonEmptyStringSchema,
  SENTIMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_SENTIMENT_TIMEOUT_MS),
  SENTIMENT_SEARCH_LIMIT: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_SENTIMENT_SEARCH_LIMIT),
  SENTIMENT_SCORE_LIMIT: z.coerce.number().positive().default(DEFAULT_SENTIMENT_SCORE_LIMIT),
  TRADE_WORKER_CONCURRENCY: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_TRADE_WORKER_CONCURRENCY),
  AUTH_LEGACY_TOKENS: optionalNonEmptyStringSchema,
  JWT_SECRET: optionalNonEmptyStringSchema,
  JWT_API_TOKEN_TTL_SEC: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_JWT_API_TOKEN_TTL_SEC),
  METRICS_ENABLED: booleanSchema.default(true),
  RATE_LIMIT_LEDGER_MIN_TIME_MS: z.coerce
    .number()
    .int()
    .min(0)
    .default(DEFAULT_RATE_LIMIT_LEDGER_MIN_TIME_MS),
  RATE_LIMIT_LEDGER_MAX_CONCURRENT: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_RATE_LIMIT_LEDGER_MAX_CONCURRENT),
  RATE_LIMIT_SENTIMENT_MIN_TIME_MS: z.coerce
    .number()
    .int()
    .min(0)
    .default(DEFAULT_RATE_LIMIT_SENTIMENT_MIN_TIME_MS),
  RATE_LIMIT_SENTIMENT_MAX_CONCURRENT: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_RATE_LIMIT_SENTIMENT_MAX_CONCURRENT),
});

export type ParsedEnv = z.infer<typeof envSchema>;
