import { Module } from '@nestjs/common';

import { SocialSentimentAdapter } from './social-sentiment.adapter';
import { SENTIMENT_SOURCE } from '../../core/ports/ports.tokens';

@Module({
  providers: [SocialSentimentAdapter, { provide: SENTIMENT_SOURCE, useExisting: SocialSentimentAdapter }],
  exports: [SENTIMENT_SOURCE],
})
export class SentimentModule {}
