import { Injectable, Logger, type OnModuleDestroy, type OnModuleInit } from '@nestjs/common';

import { MetricsService } from './metrics.service';
import { AppConfigService } from '../config/app-config.service';
import type {
  ILimiterBacklog,
  LimiterKey,
} from '../rate-limiting/bottleneck-rate-limiter.interfaces';
import { BottleneckRateLimiterService } from '../rate-limiting/bottleneck-rate-limiter.service';

const BACKLOG_SAMPLE_INTERVAL_MS = 10_000;

@Injectable()
export class MetricsCollectorService implements OnModuleInit, OnModuleDestroy {
  private readonly logger: Logger = new Logger(MetricsCollectorService.name);
  private sampleTimer: ReturnType<typeof setInterval> | null = null;

  public constructor(
    private readonly metricsService: MetricsService,
    private readonly rateLimiterService: BottleneckRateLimiterService,
    private readonly appConfigService: AppConfigService,
  ) {}

  public onModuleInit(): void {
    if (!this.appConfigService.metricsEnabled) {
      this.logger.log('METRICS_ENABLED=false; limiter backlog gauge not sampled');
      return;
    }

    this.sampleTimer = setInterval((): void => {
      this.sampleLimiterBacklog();
    }, BACKLOG_SAMPLE_INTERVAL_MS);
    this.sampleTimer.unref();
  }

  public onModuleDestroy(): void {
    if (this.sampleTimer !== null) {
      clearInterval(this.sampleTimer);
      this.sampleTimer = null;
    }
  }

  public sampleLimiterBacklog(): void {
    const keys: readonly LimiterKey[] = this.rateLimiterService.listKeys();

    for (const key of keys) {
      const backlog: ILimiterBacklog = this.rateLimiterService.getBacklog(key);
      this.metricsService.rateLimitQueueSize.set({ limiter: key }, backlog.waiting);
    }
  }
}
