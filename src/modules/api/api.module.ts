import { Module } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';

import { ApiAuthGuard } from './auth/api-auth.guard';
import { AuthController } from './auth/auth.controller';
import { AuthService } from './auth/auth.service';
import { JwtTokenValidator } from './auth/jwt-token.validator';
import { LegacyTokenValidator } from './auth/legacy-token.validator';
import { DividendsController } from './controllers/dividends.controller';
import { TradeJobsController } from './controllers/trade-jobs.controller';
import { AppConfigService } from '../../config/app-config.service';
import { DividendsModule } from '../dividends/dividends.module';
import { TradingModule } from '../trading/trading.module';

@Module({
  imports: [
    JwtModule.registerAsync({
      useFactory: (config: AppConfigService) => ({
        signOptions: { algorithm: 'HS256', expiresIn: config.jwtApiTokenTtlSec },
      }),
      inject: [AppConfigService],
    }),
    DividendsModule,
    TradingModule,
  ],
  controllers: [AuthController, DividendsController, TradeJobsController],
  providers: [AuthService, LegacyTokenValidator, JwtTokenValidator, ApiAuthGuard],
})
export class ApiModule {}
