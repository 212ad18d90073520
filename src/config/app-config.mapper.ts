import type { ParsedEnv } from './app-config.schema';
import type { AppConfig } from './app-config.types';

export const mapAppConfig = (parsedEnv: ParsedEnv): AppConfig => ({
  ...mapCoreConfig(parsedEnv),
  ...mapLedgerConfig(parsedEnv),
  ...mapDividendConfig(parsedEnv),
  ...mapSentimentConfig(parsedEnv),
  ...mapAuthConfig(parsedEnv),
  ...mapRateLimitConfig(parsedEnv),
});

const mapCoreConfig = (
  parsedEnv: ParsedEnv,
): Pick<
  AppConfig,
  | 'appVersion'
  | 'nodeEnv'
  | 'port'
  | 'logLevel'
  | 'databaseUrl'
  | 'databaseMigrationsEnabled'
  | 'metricsEnabled'
> => ({
  appVersion: parsedEnv.APP_VERSION,
  nodeEnv: parsedEnv.NODE_ENV,
  port: parsedEnv.PORT,
  logLevel: parsedEnv.LOG_LEVEL,
  databaseUrl: parsedEnv.DATABASE_URL,
  databaseMigrationsEnabled: parsedEnv.DATABASE_MIGRATIONS_ENABLED,
  metricsEnabled: parsedEnv.METRICS_ENABLED,
});

const mapLedgerConfig = (
  parsedEnv: ParsedEnv,
): Pick<
  AppConfig,
  | 'ledgerEnabled'
  | 'ledgerWsUrl'
  | 'ledgerWalletMnemonic'
  | 'ledgerQueryTimeoutMs'
  | 'ledgerSubmitTimeoutMs'
  | 'ledgerConnectMaxAttempts'
  | 'ledgerConnectBackoffMs'
  | 'ledgerFallbackHotkey'
> => ({
  ledgerEnabled: parsedEnv.LEDGER_ENABLED,
  ledgerWsUrl: parsedEnv.LEDGER_WS_URL,
  ledgerWalletMnemonic: parsedEnv.LEDGER_WALLET_MNEMONIC ?? null,
  ledgerQueryTimeoutMs: parsedEnv.LEDGER_QUERY_TIMEOUT_MS,
  ledgerSubmitTimeoutMs: parsedEnv.LEDGER_SUBMIT_TIMEOUT_MS,
  ledgerConnectMaxAttempts: parsedEnv.LEDGER_CONNECT_MAX_ATTEMPTS,
  ledgerConnectBackoffMs: parsedEnv.LEDGER_CONNECT_BACKOFF_MS,
  ledgerFallbackHotkey: parsedEnv.LEDGER_FALLBACK_HOTKEY,
});

const mapDividendConfig = (
  parsedEnv: ParsedEnv,
): Pick<
  AppConfig,
  | 'defaultNetuid'
  | 'defaultHotkey'
  | 'dividendCacheTtlSec'
  | 'dividendCacheMaxEntries'
  | 'historyDefaultLimit'
  | 'historyMaxLimit'
  | 'tradeWorkerConcurrency'
> => ({
  defaultNetuid: parsedEnv.DEFAULT_NETUID,
  defaultHotkey: parsedEnv.DEFAULT_HOTKEY,
  dividendCacheTtlSec: parsedEnv.DIVIDEND_CACHE_TTL_SEC,
  dividendCacheMaxEntries: parsedEnv.DIVIDEND_CACHE_MAX_ENTRIES,
  historyDefaultLimit: parsedEnv.HISTORY_DEFAULT_LIMIT,
  historyMaxLimit: parsedEnv.HISTORY_MAX_LIMIT,
  tradeWorkerConcurrency: parsedEnv.TRADE_WORKER_CONCURRENCY,
});

const mapSentimentConfig = (
  parsedEnv: ParsedEnv,
): Pick<
  AppConfig,
  | 'sentimentSearchUrl'
  | 'sentimentSearchApiKey'
  | 'sentimentModelUrl'
  | 'sentimentModelApiKey'
  | 'sentimentTimeoutMs'
  | 'sentimentSearchLimit'
  | 'sentimentScoreLimit'
> => ({
  sentimentSearchUrl: parsedEnv.SENTIMENT_SEARCH_URL,
  sentimentSearchApiKey: parsedEnv.SENTIMENT_SEARCH_API_KEY ?? null,
  sentimentModelUrl: parsedEnv.SENTIMENT_MODEL_URL,
  sentimentModelApiKey: parsedEnv.SENTIMENT_MODEL_API_KEY ?? null,
  sentimentTimeoutMs: parsedEnv.SENTIMENT_TIMEOUT_MS,
  sentimentSearchLimit: parsedEnv.SENTIMENT_SEARCH_LIMIT,
  sentimentScoreLimit: parsedEnv.SENTIMENT_SCORE_LIMIT,
});

const mapAuthConfig = (
  parsedEnv: ParsedEnv,
): Pick<AppConfig, 'authLegacyTokens' | 'jwtSecret' | 'jwtApiTokenTtlSec'> => ({
  authLegacyTokens: parseCsvList(parsedEnv.AUTH_LEGACY_TOKENS),
  jwtSecret: parsedEnv.JWT_SECRET ?? null,
  jwtApiTokenTtlSec: parsedEnv.JWT_API_TOKEN_TTL_SEC,
});

const mapRateLimitConfig = (
  parsedEnv: ParsedEnv,
): Pick<
  AppConfig,
  | 'rateLimitLedgerMinTimeMs'
  | 'rateLimitLedgerMaxConcurrent'
  | 'rateLimitSentimentMinTimeMs'
  | 'rateLimitSentimentMaxConcurrent'
> => ({
  rateLimitLedgerMinTimeMs: parsedEnv.RATE_LIMIT_LEDGER_MIN_TIME_MS,
  rateLimitLedgerMaxConcurrent: parsedEnv.RATE_LIMIT_LEDGER_MAX_CONCURRENT,
  rateLimitSentimentMinTimeMs: parsedEnv.RATE_LIMIT_SENTIMENT_MIN_TIME_MS,
  rateLimitSentimentMaxConcurrent: parsedEnv.RATE_LIMIT_SENTIMENT_MAX_CONCURRENT,
});

const parseCsvList = (rawValue: string | undefined): readonly string[] => {
  if (!rawValue) {
    return [];
  }

  return rawValue
    .split(',')
    .map((value: string): string => value.trim())
    .filter((value: string): boolean => value.length > 0);
};
