import { Module } from '@nestjs/common';

import { DatabaseService } from './kysely/database.service';
import { MigrationService } from './migrations/migration.service';
import { DividendHistoryRepository } from './repositories/dividend-history.repository';
import { TradeJobsRepository } from './repositories/trade-jobs.repository';

@Module({
  providers: [DatabaseService, MigrationService, DividendHistoryRepository, TradeJobsRepository],
  exports: [DatabaseService, DividendHistoryRepository, TradeJobsRepository],
})
export class DatabaseModule {}
