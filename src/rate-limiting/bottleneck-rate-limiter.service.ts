import { Injectable, Logger, type OnModuleDestroy } from '@nestjs/common';
import Bottleneck from 'bottleneck';

import {
  type IBottleneckConfig,
  type ILimiterBacklog,
  LimiterKey,
} from './bottleneck-rate-limiter.interfaces';
import { buildLimiterConfigs } from './rate-limiter-config.factory';
import { AppConfigService } from '../config/app-config.service';

@Injectable()
export class BottleneckRateLimiterService implements OnModuleDestroy {
  private readonly logger: Logger = new Logger(BottleneckRateLimiterService.name);
  private readonly limiters: Map<LimiterKey, Bottleneck> = new Map<LimiterKey, Bottleneck>();

  public constructor(appConfigService: AppConfigService) {
    const configs: ReadonlyMap<LimiterKey, IBottleneckConfig> =
      buildLimiterConfigs(appConfigService);

    for (const [key, config] of configs) {
      const limiter: Bottleneck = new Bottleneck({
        minTime: config.minTime,
        maxConcurrent: config.maxConcurrent,
      });

      limiter.on('error', (error: unknown): void => {
        const message: string = error instanceof Error ? error.message : String(error);
        this.logger.error(`Limiter ${key} raised: ${message}`);
      });

      limiter.on('dropped', (): void => {
        this.logger.warn(`Limiter ${key} discarded a waiting call`);
      });

      this.limiters.set(key, limiter);
    }
  }

  public async schedule<T>(key: LimiterKey, operation: () => Promise<T>): Promise<T> {
    const limiter: Bottleneck | undefined = this.limiters.get(key);

    if (limiter === undefined) {
      throw new Error(`No rate limiter configured for key=${key}`);
    }

    return limiter.schedule(operation);
  }

  public getBacklog(key: LimiterKey): ILimiterBacklog {
    const limiter: Bottleneck | undefined = this.limiters.get(key);

    if (limiter === undefined) {
      return { waiting: 0, active: 0 };
    }

    const counts: Bottleneck.Counts = limiter.counts();

    return {
      waiting: counts.QUEUED + counts.RECEIVED,
      active: counts.RUNNING + counts.EXECUTING,
    };
  }

  public listKeys(): readonly LimiterKey[] {
    return [...this.limiters.keys()];
  }

  public async onModuleDestroy(): Promise<void> {
    const stops: Promise<void>[] = [];

    for (const [key, limiter] of this.limiters) {
      const backlog: ILimiterBacklog = this.getBacklog(key);

      if (backlog.waiting > 0) {
        this.logger.warn(
          `Shutting down limiter ${key}; discarding ${String(backlog.waiting)} waiting call(s)`,
        );
      }

      stops.push(
        limiter.stop({ dropWaitingJobs: true }).catch((error: unknown): void => {
          const message: string = error instanceof Error ? error.message : String(error);
          this.logger.error(`Limiter ${key} did not stop cleanly: ${message}`);
        }),
      );
    }

    await Promise.allSettled(stops);
  }
}
