import { Module } from '@nestjs/common';

import { HealthController } from './health.controller';
import { HealthService } from './health.service';
import { DatabaseModule } from '../database/database.module';
import { LedgerModule } from '../modules/ledger/ledger.module';

@Module({
  imports: [DatabaseModule, LedgerModule],
  controllers: [HealthController],
  providers: [HealthService],
})
export class HealthModule {}
