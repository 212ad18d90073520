import { Module } from '@nestjs/common';

import { AppConfigModule } from './config/config.module';
import { DatabaseModule } from './database/database.module';
import { HealthModule } from './health/health.module';
import { ApiModule } from './modules/api/api.module';
import { DividendsModule } from './modules/dividends/dividends.module';
import { LedgerModule } from './modules/ledger/ledger.module';
import { SentimentModule } from './modules/sentiment/sentiment.module';
import { TradingModule } from './modules/trading/trading.module';
import { ObservabilityModule } from './observability/observability.module';
import { RateLimitingModule } from './rate-limiting/rate-limiting.module';

@Module({
  imports: [
    AppConfigModule,
    RateLimitingModule,
    ObservabilityModule,
    DatabaseModule,
    LedgerModule,
    SentimentModule,
    TradingModule,
    DividendsModule,
    ApiModule,
    HealthModule,
  ],
})
export class AppModule {}
