import { Injectable } from '@nestjs/common';

import {
  buildDividendCacheKey,
  type DividendQuery,
  type DividendResult,
} from '../../../common/interfaces/dividend.types';
import { SimpleCacheImpl } from '../../../common/utils/cache';
import { AppConfigService } from '../../../config/app-config.service';

type DividendCacheEntry = {
  readonly value: DividendResult;
  readonly expiresAtEpochMs: number;
};

@Injectable()
export class DividendCacheService {
  private readonly cache: SimpleCacheImpl<DividendCacheEntry>;
  private readonly ttlMs: number;

  public constructor(private readonly appConfigService: AppConfigService) {
    this.ttlMs = this.appConfigService.dividendCacheTtlSec * 1000;
    this.cache = new SimpleCacheImpl<DividendCacheEntry>({
      // node-cache expiry is a backstop; freshness is decided by expiresAtEpochMs.
      ttlSec: this.appConfigService.dividendCacheTtlSec + 1,
      maxKeys: this.appConfigService.dividendCacheMaxEntries,
      checkperiod: 0,
    });
  }

  public get(query: DividendQuery): DividendResult | null {
    const key: string = buildDividendCacheKey(query);
    const entry: DividendCacheEntry | undefined = this.cache.get(key);

    if (entry === undefined) {
      return null;
    }

    if (Date.now() >= entry.expiresAtEpochMs) {
      this.cache.del(key);
      return null;
    }

    return entry.value;
  }

  public put(query: DividendQuery, result: DividendResult): void {
    this.cache.set(buildDividendCacheKey(query), {
      value: result,
      expiresAtEpochMs: Date.now() + this.ttlMs,
    });
  }
}
