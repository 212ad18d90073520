import { Inject, Injectable, Logger } from '@nestjs/common';

import { LedgerNotInitializedError, LedgerUnavailableError } from '../../common/errors';
import {
  DividendSource,
  type DividendQuery,
  type DividendResult,
} from '../../common/interfaces/dividend.types';
import { withTimeout } from '../../common/utils/network/with-timeout.util';
import { AppConfigService } from '../../config/app-config.service';
import type { ILedgerClient } from '../../core/ports/ledger/ledger-client.interfaces';
import { LEDGER_CLIENT } from '../../core/ports/ports.tokens';
import { MetricsService } from '../../observability/metrics.service';
import { LimiterKey } from '../../rate-limiting/bottleneck-rate-limiter.interfaces';
import { BottleneckRateLimiterService } from '../../rate-limiting/bottleneck-rate-limiter.service';

type LedgerAttemptKind = 'live' | 'fallback';

type LedgerAttemptOutcome =
  | { readonly ok: true; readonly dividendValue: number }
  | { readonly ok: false; readonly reason: string };

@Injectable()
export class LedgerReaderService {
  private readonly logger: Logger = new Logger(LedgerReaderService.name);

  public constructor(
    @Inject(LEDGER_CLIENT) private readonly ledgerClient: ILedgerClient,
    private readonly rateLimiterService: BottleneckRateLimiterService,
    private readonly metricsService: MetricsService,
    private readonly appConfigService: AppConfigService,
  ) {}

  public async resolve(query: DividendQuery): Promise<DividendResult> {
    const liveOutcome: LedgerAttemptOutcome = await this.attempt(
      'live',
      query.subnetId,
      query.accountKey,
    );

    if (liveOutcome.ok) {
      return this.buildResult(query, liveOutcome.dividendValue, DividendSource.LIVE);
    }

    const fallbackAccountKey: string = this.appConfigService.ledgerFallbackHotkey;
    this.logger.warn(
      `Live ledger query failed netuid=${String(query.subnetId)} hotkey=${query.accountKey}: ${liveOutcome.reason}; trying fallback hotkey=${fallbackAccountKey}`,
    );

    const fallbackOutcome: LedgerAttemptOutcome = await this.attempt(
      'fallback',
      query.subnetId,
      fallbackAccountKey,
    );

    if (fallbackOutcome.ok) {
      return this.buildResult(query, fallbackOutcome.dividendValue, DividendSource.FALLBACK);
    }

    this.logger.error(
      `Ledger unavailable netuid=${String(query.subnetId)} hotkey=${query.accountKey}: ${fallbackOutcome.reason}`,
    );
    throw new LedgerUnavailableError(liveOutcome.reason, fallbackOutcome.reason);
  }

  private async attempt(
    kind: LedgerAttemptKind,
    subnetId: number,
    accountKey: string,
  ): Promise<LedgerAttemptOutcome> {
    const stopTimer: () => number = this.metricsService.ledgerRequestDurationSeconds.startTimer({
      attempt: kind,
    });

    try {
      if (!this.ledgerClient.isInitialized()) {
        throw new LedgerNotInitializedError(this.ledgerClient.getInitializationError());
      }

      const dividendValue: number = await withTimeout(
        this.rateLimiterService.schedule(
          LimiterKey.LEDGER_QUERY,
          async (): Promise<number> => this.ledgerClient.queryDividend(subnetId, accountKey),
        ),
        this.appConfigService.ledgerQueryTimeoutMs,
        `ledger ${kind} query`,
      );

      this.metricsService.ledgerAttemptsTotal.inc({ attempt: kind, status: 'success' });

      return { ok: true, dividendValue };
    } catch (error: unknown) {
      const reason: string = error instanceof Error ? error.message : String(error);
      this.metricsService.ledgerAttemptsTotal.inc({ attempt: kind, status: 'failure' });

      return { ok: false, reason };
    } finally {
      stopTimer();
    }
  }

  private buildResult(
    query: DividendQuery,
    dividendValue: number,
    source: DividendSource,
  ): DividendResult {
    return {
      subnetId: query.subnetId,
      accountKey: query.accountKey,
      dividendValue,
      observedAt: new Date().toISOString(),
      source,
    };
  }
}
