import { Injectable, Logger, type OnModuleInit } from '@nestjs/common';
import { Migrator, type MigrationResult, type MigrationResultSet } from 'kysely';
import { resolve } from 'node:path';

import { SqlFileMigrationProvider } from './sql-file-migration.provider';
import { AppConfigService } from '../../config/app-config.service';
import { DatabaseService } from '../kysely/database.service';

export const MIGRATIONS_DIRECTORY: string = resolve(process.cwd(), 'database/migrations');

@Injectable()
export class MigrationService implements OnModuleInit {
  private readonly logger: Logger = new Logger(MigrationService.name);

  public constructor(
    private readonly appConfigService: AppConfigService,
    private readonly databaseService: DatabaseService,
  ) {}

  public async onModuleInit(): Promise<void> {
    if (!this.appConfigService.databaseMigrationsEnabled) {
      this.logger.log('Database migrations are disabled by config.');
      return;
    }

    const migrator: Migrator = new Migrator({
      db: this.databaseService.getKysely(),
      provider: new SqlFileMigrationProvider(MIGRATIONS_DIRECTORY),
      migrationTableName: 'schema_migrations',
      migrationLockTableName: 'schema_migrations_lock',
    });
    const resultSet: MigrationResultSet = await migrator.migrateToLatest();
    const results: readonly MigrationResult[] = resultSet.results ?? [];

    for (const result of results) {
      if (result.status === 'Error') {
        this.logger.error(`Migration ${result.migrationName} failed`);
      }
    }

    if (resultSet.error !== undefined) {
      const errorMessage: string =
        resultSet.error instanceof Error ? resultSet.error.message : String(resultSet.error);
      throw new Error(`Database migration failed: ${errorMessage}`);
    }

    const appliedCount: number = results.filter(
      (result: MigrationResult): boolean => result.status === 'Success',
    ).length;

    if (appliedCount > 0) {
      this.logger.log(`Applied ${String(appliedCount)} migration(s)`);
      return;
    }

    this.logger.log('Database schema is up to date');
  }
}
