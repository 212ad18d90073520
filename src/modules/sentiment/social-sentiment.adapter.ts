import { Injectable, Logger } from '@nestjs/common';
import type { z } from 'zod';

import {
  type SentimentModelResponse,
  sentimentModelResponseSchema,
  type SocialSearchResponse,
  socialSearchResponseSchema,
} from './social-sentiment.schemas';
import { SentimentUnavailableError } from '../../common/errors';
import { AppConfigService } from '../../config/app-config.service';
import type {
  ISentimentScore,
  ISentimentSource,
} from '../../core/ports/sentiment/sentiment-source.interfaces';
import { LimiterKey } from '../../rate-limiting/bottleneck-rate-limiter.interfaces';
import { BottleneckRateLimiterService } from '../../rate-limiting/bottleneck-rate-limiter.service';

const SIGNED_NUMBER_PATTERN: RegExp = /[-+]?\d+(?:\.\d+)?/;

type JsonPostRequest = {
  readonly url: string;
  readonly apiKey: string;
  readonly body: Record<string, unknown>;
  readonly limiterKey: LimiterKey;
  readonly label: string;
};

@Injectable()
export class SocialSentimentAdapter implements ISentimentSource {
  private readonly logger: Logger = new Logger(SocialSentimentAdapter.name);

  public constructor(
    private readonly appConfigService: AppConfigService,
    private readonly rateLimiterService: BottleneckRateLimiterService,
  ) {}

  public async getScore(subnetId: number): Promise<ISentimentScore> {
    const searchApiKey: string = this.requireApiKey(
      this.appConfigService.sentimentSearchApiKey,
      'SENTIMENT_SEARCH_API_KEY',
    );
    const modelApiKey: string = this.requireApiKey(
      this.appConfigService.sentimentModelApiKey,
      'SENTIMENT_MODEL_API_KEY',
    );
    const searchQuery: string = `Bittensor netuid ${String(subnetId)}`;
    const posts: readonly string[] = await this.searchPosts(searchQuery, searchApiKey);

    if (posts.length === 0) {
      this.logger.warn(`No social posts found query="${searchQuery}"; sentiment is neutral`);
      return { score: 0, sampleSize: 0 };
    }

    const score: number = await this.scorePosts(posts, modelApiKey);
    this.logger.log(`Sentiment scored query="${searchQuery}" posts=${String(posts.length)} score=${String(score)}`);

    return { score, sampleSize: posts.length };
  }

  private async searchPosts(searchQuery: string, apiKey: string): Promise<readonly string[]> {
    const payload: SocialSearchResponse = await this.postJson(
      {
        url: this.appConfigService.sentimentSearchUrl,
        apiKey,
        body: { query: searchQuery, limit: this.appConfigService.sentimentSearchLimit },
        limiterKey: LimiterKey.SENTIMENT_SEARCH,
        label: 'Social search',
      },
      socialSearchResponseSchema,
    );

    return (payload.tweets ?? [])
      .map((tweet: { text?: string | undefined }): string => tweet.text?.trim() ?? '')
      .filter((text: string): boolean => text.length > 0);
  }

  private async scorePosts(posts: readonly string[], apiKey: string): Promise<number> {
    const payload: SentimentModelResponse = await this.postJson(
      {
        url: this.appConfigService.sentimentModelUrl,
        apiKey,
        body: { inputs: { prompt: this.buildPrompt(posts) } },
        limiterKey: LimiterKey.SENTIMENT_MODEL,
        label: 'Sentiment model',
      },
      sentimentModelResponseSchema,
    );

    return this.parseScore(payload.outputs.generation);
  }

  private buildPrompt(posts: readonly string[]): string {
    const limit: number = this.appConfigService.sentimentScoreLimit;

    return [
      'Analyze the sentiment of the following posts about the Bittensor network.',
      `Rate the overall sentiment from -${String(limit)} (extremely negative) through 0 (neutral) to +${String(limit)} (extremely positive).`,
      `Respond with a single number between -${String(limit)} and ${String(limit)} and nothing else.`,
      '',
      'Posts:',
      posts.join('\n'),
    ].join('\n');
  }

  private parseScore(generation: string): number {
    const match: RegExpMatchArray | null = SIGNED_NUMBER_PATTERN.exec(generation);

    if (match === null) {
      throw new SentimentUnavailableError(
        `Sentiment model returned no numeric score: ${generation.slice(0, 80)}`,
      );
    }

    const rawScore: number = Number.parseFloat(match[0]);
    const limit: number = this.appConfigService.sentimentScoreLimit;

    return Math.max(-limit, Math.min(limit, rawScore));
  }

  private async postJson<TSchema extends z.ZodType>(
    request: JsonPostRequest,
    schema: TSchema,
  ): Promise<z.infer<TSchema>> {
    const response: Response = await this.rateLimiterService
      .schedule(
        request.limiterKey,
        async (): Promise<Response> =>
          fetch(request.url, {
            method: 'POST',
            headers: {
              'Content-Type': 'application/json',
              Authorization: `Bearer ${request.apiKey}`,
            },
            body: JSON.stringify(request.body),
            signal: AbortSignal.timeout(this.appConfigService.sentimentTimeoutMs),
          }),
      )
      .catch((error: unknown): never => {
        const errorMessage: string = error instanceof Error ? error.message : String(error);
        throw new SentimentUnavailableError(`${request.label} request failed: ${errorMessage}`);
      });

    if (!response.ok) {
      throw new SentimentUnavailableError(
        `${request.label} responded with HTTP ${String(response.status)}`,
      );
    }

    const payload: unknown = await response.json().catch((): null => null);
    const parsed = schema.safeParse(payload);

    if (!parsed.success) {
      throw new SentimentUnavailableError(`${request.label} returned a malformed payload`);
    }

    return parsed.data;
  }

  private requireApiKey(apiKey: string | null, variableName: string): string {
    if (apiKey === null) {
      throw new SentimentUnavailableError(`${variableName} is not configured`);
    }

    return apiKey;
  }
}
