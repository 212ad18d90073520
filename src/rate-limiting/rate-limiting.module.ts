import { Global, Module } from '@nestjs/common';

import { BottleneckRateLimiterService } from './bottleneck-rate-limiter.service';

@Global()
@Module({
  providers: [BottleneckRateLimiterService],
  exports: [BottleneckRateLimiterService],
})
export class RateLimitingModule {}
