import { Injectable } from '@nestjs/common';
import { collectDefaultMetrics, Counter, Gauge, Histogram, Registry } from 'prom-client';

import { AppConfigService } from '../config/app-config.service';

// Histogram bucket boundaries in seconds for ledger query latency
/* eslint-disable no-magic-numbers */
const LEDGER_DURATION_BUCKETS: number[] = [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];
/* eslint-enable no-magic-numbers */

@Injectable()
export class MetricsService {
  private readonly registry: Registry;

  public readonly dividendRequestsTotal: Counter<'outcome'>;
  public readonly ledgerAttemptsTotal: Counter<'attempt' | 'status'>;
  public readonly ledgerRequestDurationSeconds: Histogram<'attempt'>;
  public readonly tradeJobsTotal: Counter<'status' | 'operation'>;
  public readonly historyWriteFailuresTotal: Counter;
  public readonly rateLimitQueueSize: Gauge<'limiter'>;

  public constructor(appConfigService: AppConfigService) {
    this.registry = new Registry();

    if (appConfigService.metricsEnabled) {
      collectDefaultMetrics({ register: this.registry });
    }

    this.dividendRequestsTotal = new Counter({
      name: 'dividend_requests_total',
      help: 'Dividend lookups by resolution outcome',
      labelNames: ['outcome'] as const,
      registers: [this.registry],
    });

    this.ledgerAttemptsTotal = new Counter({
      name: 'ledger_attempts_total',
      help: 'Ledger dividend queries by attempt kind and status',
      labelNames: ['attempt', 'status'] as const,
      registers: [this.registry],
    });

    this.ledgerRequestDurationSeconds = new Histogram({
      name: 'ledger_request_duration_seconds',
      help: 'Ledger dividend query duration in seconds',
      labelNames: ['attempt'] as const,
      buckets: LEDGER_DURATION_BUCKETS,
      registers: [this.registry],
    });

    this.tradeJobsTotal = new Counter({
      name: 'trade_jobs_total',
      help: 'Finished trade jobs by terminal status and operation',
      labelNames: ['status', 'operation'] as const,
      registers: [this.registry],
    });

    this.historyWriteFailuresTotal = new Counter({
      name: 'history_write_failures_total',
      help: 'Dividend history rows that could not be persisted',
      registers: [this.registry],
    });

    this.rateLimitQueueSize = new Gauge({
      name: 'rate_limit_queue_size',
      help: 'Current queue size for rate limiter',
      labelNames: ['limiter'] as const,
      registers: [this.registry],
    });
  }

  public async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  public getContentType(): string {
    return this.registry.contentType;
  }
}
