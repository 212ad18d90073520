import { Module } from '@nestjs/common';

import { DividendCacheService } from './services/dividend-cache.service';
import { DividendHistoryService } from './services/dividend-history.service';
import { DividendResolverService } from './services/dividend-resolver.service';
import { DatabaseModule } from '../../database/database.module';
import { LedgerModule } from '../ledger/ledger.module';
import { TradingModule } from '../trading/trading.module';

@Module({
  imports: [DatabaseModule, LedgerModule, TradingModule],
  providers: [DividendCacheService, DividendResolverService, DividendHistoryService],
  exports: [DividendResolverService, DividendHistoryService],
})
export class DividendsModule {}
