import { describe, expect, it, vi } from 'vitest';

import { LedgerReaderService } from './ledger-reader.service';
import { LedgerUnavailableError } from '../../common/errors';
import { DividendSource, type DividendResult } from '../../common/interfaces/dividend.types';
import type { AppConfigService } from '../../config/app-config.service';
import type { ILedgerClient } from '../../core/ports/ledger/ledger-client.interfaces';
import { MetricsService } from '../../observability/metrics.service';
import type { BottleneckRateLimiterService } from '../../rate-limiting/bottleneck-rate-limiter.service';

const FALLBACK_HOTKEY = 'fallback-hotkey';

type LedgerClientStub = {
  readonly isInitialized: ReturnType<typeof vi.fn>;
  readonly getInitializationError: ReturnType<typeof vi.fn>;
  readonly queryDividend: ReturnType<typeof vi.fn>;
  readonly submitStake: ReturnType<typeof vi.fn>;
  readonly submitUnstake: ReturnType<typeof vi.fn>;
};

const createLedgerClientStub = (): LedgerClientStub => ({
  isInitialized: vi.fn().mockReturnValue(true),
  getInitializationError: vi.fn().mockReturnValue(null),
  queryDividend: vi.fn(),
  submitStake: vi.fn(),
  submitUnstake: vi.fn(),
});

const createConfigStub = (): AppConfigService =>
  ({
    ledgerFallbackHotkey: FALLBACK_HOTKEY,
    ledgerQueryTimeoutMs: 50,
    metricsEnabled: false,
  }) as unknown as AppConfigService;

const createRateLimiterStub = (): BottleneckRateLimiterService =>
  ({
    schedule: async <T>(_key: string, operation: () => Promise<T>): Promise<T> => operation(),
  }) as unknown as BottleneckRateLimiterService;

const createReader = (
  ledgerClient: LedgerClientStub,
  metricsService: MetricsService = new MetricsService(createConfigStub()),
): LedgerReaderService =>
  new LedgerReaderService(
    ledgerClient as unknown as ILedgerClient,
    createRateLimiterStub(),
    metricsService,
    createConfigStub(),
  );

describe('LedgerReaderService', (): void => {
  it('returns a live result for the requested identity', async (): Promise<void> => {
    const ledgerClient: LedgerClientStub = createLedgerClientStub();
    ledgerClient.queryDividend.mockResolvedValue(1.5);
    const reader: LedgerReaderService = createReader(ledgerClient);

    const result: DividendResult = await reader.resolve({ subnetId: 18, accountKey: 'hotkey-a' });

    expect(result).toEqual({
      subnetId: 18,
      accountKey: 'hotkey-a',
      dividendValue: 1.5,
      observedAt: expect.any(String),
      source: DividendSource.LIVE,
    });
    expect(ledgerClient.queryDividend).toHaveBeenCalledTimes(1);
  });

  it('falls back to the fallback hotkey and keeps the requested identity', async (): Promise<void> => {
    const ledgerClient: LedgerClientStub = createLedgerClientStub();
    ledgerClient.queryDividend
      .mockRejectedValueOnce(new Error('socket closed'))
      .mockResolvedValueOnce(0.75);
    const reader: LedgerReaderService = createReader(ledgerClient);

    const result: DividendResult = await reader.resolve({ subnetId: 3, accountKey: 'hotkey-b' });

    expect(ledgerClient.queryDividend).toHaveBeenNthCalledWith(2, 3, FALLBACK_HOTKEY);
    expect(result.source).toBe(DividendSource.FALLBACK);
    expect(result.accountKey).toBe('hotkey-b');
    expect(result.subnetId).toBe(3);
    expect(result.dividendValue).toBe(0.75);
  });

  it('treats a live query timeout as a failed attempt', async (): Promise<void> => {
    const ledgerClient: LedgerClientStub = createLedgerClientStub();
    ledgerClient.queryDividend
      .mockReturnValueOnce(new Promise<number>((): void => undefined))
      .mockResolvedValueOnce(2);
    const reader: LedgerReaderService = createReader(ledgerClient);

    const result: DividendResult = await reader.resolve({ subnetId: 18, accountKey: 'hotkey-a' });

    expect(result.source).toBe(DividendSource.FALLBACK);
    expect(result.dividendValue).toBe(2);
  });

  it('throws LedgerUnavailableError carrying both causes when both attempts fail', async (): Promise<void> => {
    const ledgerClient: LedgerClientStub = createLedgerClientStub();
    ledgerClient.queryDividend
      .mockRejectedValueOnce(new Error('live down'))
      .mockRejectedValueOnce(new Error('fallback down'));
    const reader: LedgerReaderService = createReader(ledgerClient);

    const error: unknown = await reader
      .resolve({ subnetId: 18, accountKey: 'hotkey-a' })
      .catch((caught: unknown): unknown => caught);

    expect(error).toBeInstanceOf(LedgerUnavailableError);
    expect(error).toMatchObject({ liveCause: 'live down', fallbackCause: 'fallback down' });
  });

  it('fails both attempts without querying when the client is not initialized', async (): Promise<void> => {
    const ledgerClient: LedgerClientStub = createLedgerClientStub();
    ledgerClient.isInitialized.mockReturnValue(false);
    ledgerClient.getInitializationError.mockReturnValue('connect refused');
    const metricsService: MetricsService = new MetricsService(createConfigStub());
    const reader: LedgerReaderService = createReader(ledgerClient, metricsService);

    await expect(reader.resolve({ subnetId: 18, accountKey: 'hotkey-a' })).rejects.toThrow(
      'Ledger unavailable: live query failed (Ledger client is not initialized: connect refused); fallback query failed (Ledger client is not initialized: connect refused)',
    );
    expect(ledgerClient.queryDividend).not.toHaveBeenCalled();

    const output: string = await metricsService.getMetrics();
    expect(output).toContain('ledger_attempts_total{attempt="live",status="failure"} 1');
    expect(output).toContain('ledger_attempts_total{attempt="fallback",status="failure"} 1');
  });
});
