import { Injectable, Logger } from '@nestjs/common';

import { DividendCacheService } from './dividend-cache.service';
import { LedgerUnavailableError } from '../../../common/errors';
import {
  type DividendLookupRequest,
  type DividendLookupResponse,
  type DividendQuery,
  type DividendResult,
  ServedFrom,
} from '../../../common/interfaces/dividend.types';
import type { TradeJob } from '../../../common/interfaces/trade-job.types';
import { DividendHistoryRepository } from '../../../database/repositories/dividend-history.repository';
import { MetricsService } from '../../../observability/metrics.service';
import { LedgerReaderService } from '../../ledger/ledger-reader.service';
import { TradeJobDispatcherService } from '../../trading/services/trade-job-dispatcher.service';

const CACHE_HIT_MESSAGE = 'Dividend served from cache';
const CACHE_HIT_TRADE_SKIPPED_MESSAGE = 'Dividend served from cache; trading skipped';
const LEDGER_MESSAGE = 'Dividend resolved from ledger';
const TRADE_QUEUED_MESSAGE = 'Dividend resolved from ledger; trade job queued';

type TradeDispatchOutcome = {
  readonly jobId: string | null;
  readonly failureMessage: string | null;
};

@Injectable()
export class DividendResolverService {
  private readonly logger: Logger = new Logger(DividendResolverService.name);

  public constructor(
    private readonly dividendCacheService: DividendCacheService,
    private readonly ledgerReaderService: LedgerReaderService,
    private readonly dividendHistoryRepository: DividendHistoryRepository,
    private readonly tradeJobDispatcherService: TradeJobDispatcherService,
    private readonly metricsService: MetricsService,
  ) {}

  public async resolve(request: DividendLookupRequest): Promise<DividendLookupResponse> {
    const query: DividendQuery = { subnetId: request.subnetId, accountKey: request.accountKey };
    const cached: DividendResult | null = this.dividendCacheService.get(query);

    if (cached !== null) {
      this.metricsService.dividendRequestsTotal.inc({ outcome: 'cache_hit' });

      return this.buildResponse(cached, ServedFrom.CACHE, {
        tradeTriggered: false,
        jobId: null,
        status: 'success',
        message: request.trade ? CACHE_HIT_TRADE_SKIPPED_MESSAGE : CACHE_HIT_MESSAGE,
      });
    }

    const result: DividendResult = await this.readLedger(query);
    this.dividendCacheService.put(query, result);
    await this.recordHistory(result);

    if (!request.trade) {
      return this.buildResponse(result, ServedFrom.LEDGER, {
        tradeTriggered: false,
        jobId: null,
        status: 'success',
        message: LEDGER_MESSAGE,
      });
    }

    const dispatch: TradeDispatchOutcome = await this.dispatchTrade(query);

    if (dispatch.failureMessage !== null) {
      return this.buildResponse(result, ServedFrom.LEDGER, {
        tradeTriggered: false,
        jobId: null,
        status: 'partial_success',
        message: `Dividend resolved from ledger; trade job could not be created: ${dispatch.failureMessage}`,
      });
    }

    return this.buildResponse(result, ServedFrom.LEDGER, {
      tradeTriggered: true,
      jobId: dispatch.jobId,
      status: 'success',
      message: TRADE_QUEUED_MESSAGE,
    });
  }

  private async readLedger(query: DividendQuery): Promise<DividendResult> {
    try {
      const result: DividendResult = await this.ledgerReaderService.resolve(query);
      this.metricsService.dividendRequestsTotal.inc({ outcome: result.source });
      return result;
    } catch (error: unknown) {
      if (error instanceof LedgerUnavailableError) {
        this.metricsService.dividendRequestsTotal.inc({ outcome: 'unavailable' });
      }

      throw error;
    }
  }

  private async recordHistory(result: DividendResult): Promise<void> {
    try {
      await this.dividendHistoryRepository.append(result);
    } catch (error: unknown) {
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      this.metricsService.historyWriteFailuresTotal.inc();
      this.logger.error(
        `Failed to append dividend history netuid=${String(result.subnetId)} hotkey=${result.accountKey}: ${errorMessage}`,
      );
    }
  }

  private async dispatchTrade(query: DividendQuery): Promise<TradeDispatchOutcome> {
    try {
      const job: TradeJob = await this.tradeJobDispatcherService.dispatch(query);
      return { jobId: job.jobId, failureMessage: null };
    } catch (error: unknown) {
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `Failed to create trade job netuid=${String(query.subnetId)} hotkey=${query.accountKey}: ${errorMessage}`,
      );
      return { jobId: null, failureMessage: errorMessage };
    }
  }

  private buildResponse(
    result: DividendResult,
    servedFrom: ServedFrom,
    trade: Pick<DividendLookupResponse, 'tradeTriggered' | 'jobId' | 'status' | 'message'>,
  ): DividendLookupResponse {
    return {
      netuid: result.subnetId,
      hotkey: result.accountKey,
      dividendValue: result.dividendValue,
      observedAt: result.observedAt,
      source: result.source,
      servedFrom,
      ...trade,
    };
  }
}
