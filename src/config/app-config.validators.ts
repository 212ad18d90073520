import type { ParsedEnv } from './app-config.schema';

export function assertAppConfig(parsedEnv: ParsedEnv): void {
  assertLedgerConfig(parsedEnv);
  assertHistoryConfig(parsedEnv);
  assertAuthConfig(parsedEnv);
}

function assertLedgerConfig(parsedEnv: ParsedEnv): void {
  if (parsedEnv.LEDGER_SUBMIT_TIMEOUT_MS < parsedEnv.LEDGER_QUERY_TIMEOUT_MS) {
    throw new Error('LEDGER_SUBMIT_TIMEOUT_MS must be >= LEDGER_QUERY_TIMEOUT_MS');
  }
}

function assertHistoryConfig(parsedEnv: ParsedEnv): void {
  if (parsedEnv.HISTORY_DEFAULT_LIMIT > parsedEnv.HISTORY_MAX_LIMIT) {
    throw new Error('HISTORY_DEFAULT_LIMIT must be <= HISTORY_MAX_LIMIT');
  }
}

function assertAuthConfig(parsedEnv: ParsedEnv): void {
  if (parsedEnv.NODE_ENV !== 'production') {
    return;
  }

  if (parsedEnv.AUTH_LEGACY_TOKENS === undefined && parsedEnv.JWT_SECRET === undefined) {
    throw new Error('AUTH_LEGACY_TOKENS or JWT_SECRET is required when NODE_ENV=production');
  }
}
