import { randomUUID } from 'node:crypto';

import { Injectable, Logger } from '@nestjs/common';

import { SentimentTraderService } from './sentiment-trader.service';
import type { DividendQuery } from '../../../common/interfaces/dividend.types';
import { type TradeJob, TradeJobStatus } from '../../../common/interfaces/trade-job.types';
import { TradeJobsRepository } from '../../../database/repositories/trade-jobs.repository';
import { LimiterKey } from '../../../rate-limiting/bottleneck-rate-limiter.interfaces';
import { BottleneckRateLimiterService } from '../../../rate-limiting/bottleneck-rate-limiter.service';

@Injectable()
export class TradeJobDispatcherService {
  private readonly logger: Logger = new Logger(TradeJobDispatcherService.name);

  public constructor(
    private readonly tradeJobsRepository: TradeJobsRepository,
    private readonly sentimentTraderService: SentimentTraderService,
    private readonly rateLimiterService: BottleneckRateLimiterService,
  ) {}

  public async dispatch(query: DividendQuery): Promise<TradeJob> {
    const requestedAt: string = new Date().toISOString();
    const job: TradeJob = {
      jobId: randomUUID(),
      subnetId: query.subnetId,
      accountKey: query.accountKey,
      requestedAt,
      status: TradeJobStatus.PENDING,
      result: null,
      error: null,
      updatedAt: requestedAt,
    };

    await this.tradeJobsRepository.create(job);
    this.logger.log(
      `Trade job queued jobId=${job.jobId} netuid=${String(job.subnetId)} hotkey=${job.accountKey}`,
    );

    void this.rateLimiterService
      .schedule(
        LimiterKey.TRADE_WORKER,
        async (): Promise<TradeJob> => this.sentimentTraderService.execute(job),
      )
      .catch((error: unknown): void => {
        const errorMessage: string = error instanceof Error ? error.message : String(error);
        this.logger.error(`Trade job worker error jobId=${job.jobId}: ${errorMessage}`);
      });

    return job;
  }

  public async getJob(jobId: string): Promise<TradeJob | null> {
    return this.tradeJobsRepository.findById(jobId);
  }
}
