import { type IBottleneckConfig, LimiterKey } from './bottleneck-rate-limiter.interfaces';
import type { AppConfigService } from '../config/app-config.service';

// Extrinsics from one signing key share a nonce sequence.
const LEDGER_SUBMIT_MAX_CONCURRENT = 1;

export function buildLimiterConfigs(
  config: AppConfigService,
): ReadonlyMap<LimiterKey, IBottleneckConfig> {
  const map = new Map<LimiterKey, IBottleneckConfig>();

  map.set(LimiterKey.LEDGER_QUERY, {
    minTime: config.rateLimitLedgerMinTimeMs,
    maxConcurrent: config.rateLimitLedgerMaxConcurrent,
  });

  map.set(LimiterKey.LEDGER_SUBMIT, {
    minTime: config.rateLimitLedgerMinTimeMs,
    maxConcurrent: LEDGER_SUBMIT_MAX_CONCURRENT,
  });

  map.set(LimiterKey.SENTIMENT_SEARCH, {
    minTime: config.rateLimitSentimentMinTimeMs,
    maxConcurrent: config.rateLimitSentimentMaxConcurrent,
  });

  map.set(LimiterKey.SENTIMENT_MODEL, {
    minTime: config.rateLimitSentimentMinTimeMs,
    maxConcurrent: config.rateLimitSentimentMaxConcurrent,
  });

  map.set(LimiterKey.TRADE_WORKER, {
    minTime: 0,
    maxConcurrent: config.tradeWorkerConcurrency,
  });

  return map;
}
