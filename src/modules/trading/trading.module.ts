import { Module } from '@nestjs/common';

import { SentimentTraderService } from './services/sentiment-trader.service';
import { TradeJobDispatcherService } from './services/trade-job-dispatcher.service';
import { DatabaseModule } from '../../database/database.module';
import { LedgerModule } from '../ledger/ledger.module';
import { SentimentModule } from '../sentiment/sentiment.module';

@Module({
  imports: [DatabaseModule, LedgerModule, SentimentModule],
  providers: [SentimentTraderService, TradeJobDispatcherService],
  exports: [TradeJobDispatcherService],
})
export class TradingModule {}
