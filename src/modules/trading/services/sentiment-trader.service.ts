import { Inject, Injectable, Logger } from '@nestjs/common';

import {
  isTerminalTradeJobStatus,
  type TradeJob,
  type TradeJobPatch,
  type TradeJobResult,
  TradeJobStatus,
  TradeOperation,
} from '../../../common/interfaces/trade-job.types';
import { withTimeout } from '../../../common/utils/network/with-timeout.util';
import { AppConfigService } from '../../../config/app-config.service';
import type {
  ILedgerClient,
  ILedgerSubmissionReceipt,
} from '../../../core/ports/ledger/ledger-client.interfaces';
import { LEDGER_CLIENT, SENTIMENT_SOURCE } from '../../../core/ports/ports.tokens';
import type {
  ISentimentScore,
  ISentimentSource,
} from '../../../core/ports/sentiment/sentiment-source.interfaces';
import { TradeJobsRepository } from '../../../database/repositories/trade-jobs.repository';
import { MetricsService } from '../../../observability/metrics.service';
import { LimiterKey } from '../../../rate-limiting/bottleneck-rate-limiter.interfaces';
import { BottleneckRateLimiterService } from '../../../rate-limiting/bottleneck-rate-limiter.service';

export const STAKE_TAO_PER_SCORE_POINT = 0.01;

@Injectable()
export class SentimentTraderService {
  private readonly logger: Logger = new Logger(SentimentTraderService.name);

  public constructor(
    @Inject(SENTIMENT_SOURCE) private readonly sentimentSource: ISentimentSource,
    @Inject(LEDGER_CLIENT) private readonly ledgerClient: ILedgerClient,
    private readonly tradeJobsRepository: TradeJobsRepository,
    private readonly rateLimiterService: BottleneckRateLimiterService,
    private readonly metricsService: MetricsService,
    private readonly appConfigService: AppConfigService,
  ) {}

  public async execute(job: TradeJob): Promise<TradeJob> {
    if (isTerminalTradeJobStatus(job.status)) {
      this.logger.warn(`Trade job already finished jobId=${job.jobId} status=${job.status}`);
      return job;
    }

    const runningPatch: TradeJobPatch = {
      status: TradeJobStatus.RUNNING,
      updatedAt: new Date().toISOString(),
    };

    try {
      await this.tradeJobsRepository.update(job.jobId, runningPatch);
    } catch (error: unknown) {
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `Trade job not started, running state not stored jobId=${job.jobId}: ${errorMessage}`,
      );

      return this.finish(job, {
        status: TradeJobStatus.FAILED,
        result: null,
        error: `Running state could not be stored: ${errorMessage}`,
        updatedAt: new Date().toISOString(),
      });
    }

    const runningJob: TradeJob = applyPatch(job, runningPatch);
    let terminalPatch: TradeJobPatch;

    try {
      const result: TradeJobResult = await this.trade(runningJob);
      terminalPatch = {
        status: TradeJobStatus.SUCCEEDED,
        result,
        error: null,
        updatedAt: new Date().toISOString(),
      };
      this.logger.log(
        `Trade job succeeded jobId=${job.jobId} operation=${result.operation} stakeDelta=${String(result.stakeDelta)} txRef=${result.txRef ?? 'none'}`,
      );
    } catch (error: unknown) {
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      terminalPatch = {
        status: TradeJobStatus.FAILED,
        result: null,
        error: errorMessage,
        updatedAt: new Date().toISOString(),
      };
      this.logger.warn(`Trade job failed jobId=${job.jobId}: ${errorMessage}`);
    }

    return this.finish(runningJob, terminalPatch);
  }

  private async trade(job: TradeJob): Promise<TradeJobResult> {
    const sentiment: ISentimentScore = await withTimeout(
      this.sentimentSource.getScore(job.subnetId),
      this.appConfigService.sentimentTimeoutMs,
      'sentiment scoring',
    );
    const stakeDelta: number = STAKE_TAO_PER_SCORE_POINT * sentiment.score;

    if (stakeDelta === 0) {
      return {
        stakeDelta: 0,
        sentimentScore: sentiment.score,
        operation: TradeOperation.NONE,
        txRef: null,
      };
    }

    const operation: TradeOperation = stakeDelta > 0 ? TradeOperation.STAKE : TradeOperation.UNSTAKE;
    const receipt: ILedgerSubmissionReceipt = await this.rateLimiterService.schedule(
      LimiterKey.LEDGER_SUBMIT,
      async (): Promise<ILedgerSubmissionReceipt> => {
        const request = {
          subnetId: job.subnetId,
          accountKey: job.accountKey,
          amountTao: Math.abs(stakeDelta),
        };

        return operation === TradeOperation.STAKE
          ? this.ledgerClient.submitStake(request)
          : this.ledgerClient.submitUnstake(request);
      },
    );

    return {
      stakeDelta,
      sentimentScore: sentiment.score,
      operation,
      txRef: receipt.txRef,
    };
  }

  private async finish(job: TradeJob, patch: TradeJobPatch): Promise<TradeJob> {
    const finishedJob: TradeJob = applyPatch(job, patch);

    try {
      await this.tradeJobsRepository.update(job.jobId, patch);
    } catch (error: unknown) {
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `Terminal trade job state not stored jobId=${job.jobId} status=${patch.status}: ${errorMessage}`,
      );
    }

    this.metricsService.tradeJobsTotal.inc({
      status: finishedJob.status,
      operation: finishedJob.result?.operation ?? 'unknown',
    });

    return finishedJob;
  }
}

const applyPatch = (job: TradeJob, patch: TradeJobPatch): TradeJob => ({
  ...job,
  status: patch.status,
  result: patch.result === undefined ? job.result : patch.result,
  error: patch.error === undefined ? job.error : patch.error,
  updatedAt: patch.updatedAt,
});
