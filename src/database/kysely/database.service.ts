import { Injectable, Logger, type OnModuleDestroy } from '@nestjs/common';
import { Kysely, PostgresDialect, sql } from 'kysely';
import { Pool } from 'pg';

import { AppConfigService } from '../../config/app-config.service';
import type { IDatabase } from '../types/database.types';

@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger: Logger = new Logger(DatabaseService.name);
  private readonly kysely: Kysely<IDatabase>;
  private readonly pool: Pool;

  public constructor(private readonly appConfigService: AppConfigService) {
    this.pool = new Pool({
      connectionString: this.appConfigService.databaseUrl,
    });
    this.pool.on('error', (error: Error): void => {
      this.logger.error(`Postgres pool connection dropped: ${error.message}`);
    });

    this.kysely = new Kysely<IDatabase>({
      dialect: new PostgresDialect({ pool: this.pool }),
    });
  }

  public getKysely(): Kysely<IDatabase> {
    return this.kysely;
  }

  public async ping(): Promise<boolean> {
    try {
      await sql`select 1`.execute(this.kysely);
      return true;
    } catch (error: unknown) {
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Dividend store unreachable: ${errorMessage}`);
      return false;
    }
  }

  public async onModuleDestroy(): Promise<void> {
    await this.kysely.destroy();
  }
}
