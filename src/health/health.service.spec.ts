import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { HealthService } from './health.service';
import type { AppHealthStatus } from './health.types';
import type { AppConfigService } from '../config/app-config.service';
import type { ILedgerClient } from '../core/ports/ledger/ledger-client.interfaces';
import type { DatabaseService } from '../database/kysely/database.service';

const createService = (databaseOk: boolean, ledgerClient: Partial<ILedgerClient>): HealthService =>
  new HealthService(
    { authMode: 'legacy+jwt' } as unknown as AppConfigService,
    { ping: vi.fn().mockResolvedValue(databaseOk) } as unknown as DatabaseService,
    ledgerClient as unknown as ILedgerClient,
  );

describe('HealthService', (): void => {
  beforeEach((): void => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-03-01T12:00:00.000Z'));
  });

  afterEach((): void => {
    vi.useRealTimers();
  });

  it('reports ok when ledger and database are up', async (): Promise<void> => {
    const service: HealthService = createService(true, {
      isInitialized: (): boolean => true,
      getInitializationError: (): string | null => null,
    });

    const status: AppHealthStatus = await service.getHealthStatus();

    expect(status).toEqual({
      status: 'ok',
      ledger: { initialized: true, details: 'connected' },
      database: { ok: true, details: 'reachable' },
      authMode: 'legacy+jwt',
      timestamp: '2026-03-01T12:00:00.000Z',
    });
  });

  it('reports degraded with the ledger initialization error', async (): Promise<void> => {
    const service: HealthService = createService(true, {
      isInitialized: (): boolean => false,
      getInitializationError: (): string | null => 'Ledger client is disabled by config',
    });

    const status: AppHealthStatus = await service.getHealthStatus();

    expect(status.status).toBe('degraded');
    expect(status.ledger).toEqual({
      initialized: false,
      details: 'not_initialized: Ledger client is disabled by config',
    });
  });

  it('reports degraded when the database is unreachable', async (): Promise<void> => {
    const service: HealthService = createService(false, {
      isInitialized: (): boolean => true,
      getInitializationError: (): string | null => null,
    });

    const status: AppHealthStatus = await service.getHealthStatus();

    expect(status.status).toBe('degraded');
    expect(status.database).toEqual({ ok: false, details: 'unreachable' });
  });
});
