export type NodeEnv = 'development' | 'test' | 'production';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type AuthMode = 'legacy' | 'jwt' | 'legacy+jwt' | 'none';

export type AppConfig = {
  readonly appVersion: string;
  readonly nodeEnv: NodeEnv;
  readonly port: number;
  readonly logLevel: LogLevel;
  readonly databaseUrl: string;
  readonly databaseMigrationsEnabled: boolean;
  readonly ledgerEnabled: boolean;
  readonly ledgerWsUrl: string;
  readonly ledgerWalletMnemonic: string | null;
  readonly ledgerQueryTimeoutMs: number;
  readonly ledgerSubmitTimeoutMs: number;
  readonly ledgerConnectMaxAttempts: number;
  readonly ledgerConnectBackoffMs: number;
  readonly ledgerFallbackHotkey: string;
  readonly defaultNetuid: number;
  readonly defaultHotkey: string;
  readonly dividendCacheTtlSec: number;
  readonly dividendCacheMaxEntries: number;
  readonly historyDefaultLimit: number;
  readonly historyMaxLimit: number;
  readonly sentimentSearchUrl: string;
  readonly sentimentSearchApiKey: string | null;
  readonly sentimentModelUrl: string;
  readonly sentimentModelApiKey: string | null;
  readonly sentimentTimeoutMs: number;
  readonly sentimentSearchLimit: number;
  readonly sentimentScoreLimit: number;
  readonly tradeWorkerConcurrency: number;
  readonly authLegacyTokens: readonly string[];
  readonly jwtSecret: string | null;
  readonly jwtApiTokenTtlSec: number;
  readonly metricsEnabled: boolean;
  readonly rateLimitLedgerMinTimeMs: number;
  readonly rateLimitLedgerMaxConcurrent: number;
  readonly rateLimitSentimentMinTimeMs: number;
  readonly rateLimitSentimentMaxConcurrent: number;
};
