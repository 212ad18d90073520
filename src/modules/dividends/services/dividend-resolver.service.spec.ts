import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { DividendCacheService } from './dividend-cache.service';
import { DividendResolverService } from './dividend-resolver.service';
import { LedgerUnavailableError } from '../../../common/errors';
import {
  type DividendLookupResponse,
  type DividendResult,
  DividendSource,
  ServedFrom,
} from '../../../common/interfaces/dividend.types';
import type { AppConfigService } from '../../../config/app-config.service';
import type { DividendHistoryRepository } from '../../../database/repositories/dividend-history.repository';
import { MetricsService } from '../../../observability/metrics.service';
import type { LedgerReaderService } from '../../ledger/ledger-reader.service';
import type { TradeJobDispatcherService } from '../../trading/services/trade-job-dispatcher.service';

const LIVE_RESULT: DividendResult = {
  subnetId: 18,
  accountKey: 'hotkey-a',
  dividendValue: 1.5,
  observedAt: '2026-01-01T00:00:00.000Z',
  source: DividendSource.LIVE,
};

const createConfigStub = (): AppConfigService =>
  ({
    dividendCacheTtlSec: 120,
    dividendCacheMaxEntries: 100,
    metricsEnabled: false,
  }) as unknown as AppConfigService;

describe('DividendResolverService', (): void => {
  let resolveLedger: ReturnType<typeof vi.fn>;
  let appendHistory: ReturnType<typeof vi.fn>;
  let dispatch: ReturnType<typeof vi.fn>;
  let metricsService: MetricsService;
  let service: DividendResolverService;

  beforeEach((): void => {
    resolveLedger = vi.fn().mockResolvedValue(LIVE_RESULT);
    appendHistory = vi.fn().mockResolvedValue(undefined);
    dispatch = vi.fn().mockResolvedValue({ jobId: 'job-1' });
    metricsService = new MetricsService(createConfigStub());

    service = new DividendResolverService(
      new DividendCacheService(createConfigStub()),
      { resolve: resolveLedger } as unknown as LedgerReaderService,
      { append: appendHistory } as unknown as DividendHistoryRepository,
      { dispatch } as unknown as TradeJobDispatcherService,
      metricsService,
    );
  });

  afterEach((): void => {
    vi.useRealTimers();
  });

  it('resolves from the ledger, caches and records history', async (): Promise<void> => {
    const response: DividendLookupResponse = await service.resolve({
      subnetId: 18,
      accountKey: 'hotkey-a',
      trade: false,
    });

    expect(response).toEqual({
      netuid: 18,
      hotkey: 'hotkey-a',
      dividendValue: 1.5,
      observedAt: '2026-01-01T00:00:00.000Z',
      source: DividendSource.LIVE,
      servedFrom: ServedFrom.LEDGER,
      tradeTriggered: false,
      jobId: null,
      status: 'success',
      message: 'Dividend resolved from ledger',
    });
    expect(resolveLedger).toHaveBeenCalledWith({ subnetId: 18, accountKey: 'hotkey-a' });
    expect(appendHistory).toHaveBeenCalledWith(LIVE_RESULT);
    expect(dispatch).not.toHaveBeenCalled();
  });

  it('serves a repeated lookup from cache without touching ledger or history', async (): Promise<void> => {
    await service.resolve({ subnetId: 18, accountKey: 'hotkey-a', trade: false });

    const response: DividendLookupResponse = await service.resolve({
      subnetId: 18,
      accountKey: 'hotkey-a',
      trade: false,
    });

    expect(response.servedFrom).toBe(ServedFrom.CACHE);
    expect(response.source).toBe(DividendSource.LIVE);
    expect(response.dividendValue).toBe(1.5);
    expect(response.observedAt).toBe('2026-01-01T00:00:00.000Z');
    expect(response.message).toBe('Dividend served from cache');
    expect(resolveLedger).toHaveBeenCalledTimes(1);
    expect(appendHistory).toHaveBeenCalledTimes(1);
  });

  it('reads the ledger again once the cached entry has expired', async (): Promise<void> => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00.000Z'));

    await service.resolve({ subnetId: 18, accountKey: 'hotkey-a', trade: false });
    vi.advanceTimersByTime(120_000);

    const response: DividendLookupResponse = await service.resolve({
      subnetId: 18,
      accountKey: 'hotkey-a',
      trade: false,
    });

    expect(response.servedFrom).toBe(ServedFrom.LEDGER);
    expect(resolveLedger).toHaveBeenCalledTimes(2);
    expect(appendHistory).toHaveBeenCalledTimes(2);
  });

  it('skips trading on a cache hit', async (): Promise<void> => {
    await service.resolve({ subnetId: 18, accountKey: 'hotkey-a', trade: false });

    const response: DividendLookupResponse = await service.resolve({
      subnetId: 18,
      accountKey: 'hotkey-a',
      trade: true,
    });

    expect(response.tradeTriggered).toBe(false);
    expect(response.jobId).toBeNull();
    expect(response.message).toBe('Dividend served from cache; trading skipped');
    expect(dispatch).not.toHaveBeenCalled();
  });

  it('dispatches a trade job on the ledger path', async (): Promise<void> => {
    const response: DividendLookupResponse = await service.resolve({
      subnetId: 18,
      accountKey: 'hotkey-a',
      trade: true,
    });

    expect(dispatch).toHaveBeenCalledWith({ subnetId: 18, accountKey: 'hotkey-a' });
    expect(response.tradeTriggered).toBe(true);
    expect(response.jobId).toBe('job-1');
    expect(response.status).toBe('success');
    expect(response.message).toBe('Dividend resolved from ledger; trade job queued');
  });

  it('reports partial success when the trade job cannot be created', async (): Promise<void> => {
    dispatch.mockRejectedValue(new Error('insert failed'));

    const response: DividendLookupResponse = await service.resolve({
      subnetId: 18,
      accountKey: 'hotkey-a',
      trade: true,
    });

    expect(response.status).toBe('partial_success');
    expect(response.tradeTriggered).toBe(false);
    expect(response.jobId).toBeNull();
    expect(response.dividendValue).toBe(1.5);
    expect(response.message).toBe(
      'Dividend resolved from ledger; trade job could not be created: insert failed',
    );
  });

  it('does not fail the lookup when history cannot be written', async (): Promise<void> => {
    appendHistory.mockRejectedValue(new Error('connection terminated'));

    const response: DividendLookupResponse = await service.resolve({
      subnetId: 18,
      accountKey: 'hotkey-a',
      trade: false,
    });

    expect(response.status).toBe('success');
    const metrics: string = await metricsService.getMetrics();
    expect(metrics).toContain('history_write_failures_total 1');
  });

  it('propagates ledger unavailability without side effects', async (): Promise<void> => {
    resolveLedger.mockRejectedValue(new LedgerUnavailableError('live down', 'fallback down'));

    await expect(
      service.resolve({ subnetId: 18, accountKey: 'hotkey-a', trade: true }),
    ).rejects.toBeInstanceOf(LedgerUnavailableError);
    expect(appendHistory).not.toHaveBeenCalled();
    expect(dispatch).not.toHaveBeenCalled();

    resolveLedger.mockResolvedValue(LIVE_RESULT);
    const retried: DividendLookupResponse = await service.resolve({
      subnetId: 18,
      accountKey: 'hotkey-a',
      trade: false,
    });
    expect(retried.servedFrom).toBe(ServedFrom.LEDGER);

    const metrics: string = await metricsService.getMetrics();
    expect(metrics).toContain('dividend_requests_total{outcome="unavailable"} 1');
    expect(metrics).toContain('dividend_requests_total{outcome="live"} 1');
  });

  it('counts fallback resolutions by source', async (): Promise<void> => {
    resolveLedger.mockResolvedValue({ ...LIVE_RESULT, source: DividendSource.FALLBACK });

    const response: DividendLookupResponse = await service.resolve({
      subnetId: 18,
      accountKey: 'hotkey-a',
      trade: false,
    });

    expect(response.source).toBe(DividendSource.FALLBACK);
    const metrics: string = await metricsService.getMetrics();
    expect(metrics).toContain('dividend_requests_total{outcome="fallback"} 1');
  });
});
