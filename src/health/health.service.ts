import { Inject, Injectable } from '@nestjs/common';

import type { AppHealthStatus, ComponentHealth, LedgerHealth } from './health.types';
import { AppConfigService } from '../config/app-config.service';
import type { ILedgerClient } from '../core/ports/ledger/ledger-client.interfaces';
import { LEDGER_CLIENT } from '../core/ports/ports.tokens';
import { DatabaseService } from '../database/kysely/database.service';

@Injectable()
export class HealthService {
  public constructor(
    private readonly appConfigService: AppConfigService,
    private readonly databaseService: DatabaseService,
    @Inject(LEDGER_CLIENT) private readonly ledgerClient: ILedgerClient,
  ) {}

  public async getHealthStatus(): Promise<AppHealthStatus> {
    const databaseOk: boolean = await this.databaseService.ping();
    const database: ComponentHealth = {
      ok: databaseOk,
      details: databaseOk ? 'reachable' : 'unreachable',
    };
    const ledger: LedgerHealth = this.getLedgerHealth();

    return {
      status: database.ok && ledger.initialized ? 'ok' : 'degraded',
      ledger,
      database,
      authMode: this.appConfigService.authMode,
      timestamp: new Date().toISOString(),
    };
  }

  private getLedgerHealth(): LedgerHealth {
    if (this.ledgerClient.isInitialized()) {
      return { initialized: true, details: 'connected' };
    }

    const reason: string | null = this.ledgerClient.getInitializationError();

    return {
      initialized: false,
      details: reason === null ? 'not_initialized' : `not_initialized: ${reason}`,
    };
  }
}
