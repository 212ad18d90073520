import { Injectable } from '@nestjs/common';

import { mapAppConfig } from './app-config.mapper';
import { envSchema, type ParsedEnv } from './app-config.schema';
import type { AppConfig, AuthMode } from './app-config.types';
import { assertAppConfig } from './app-config.validators';

@Injectable()
export class AppConfigService {
  private readonly config: AppConfig;

  public constructor() {
    const parsedEnv: ParsedEnv = envSchema.parse(process.env);
    assertAppConfig(parsedEnv);
    this.config = mapAppConfig(parsedEnv);
  }

  public get appVersion(): string {
    return this.config.appVersion;
  }

  public get nodeEnv(): AppConfig['nodeEnv'] {
    return this.config.nodeEnv;
  }

  public get port(): number {
    return this.config.port;
  }

  public get logLevel(): AppConfig['logLevel'] {
    return this.config.logLevel;
  }

  public get databaseUrl(): string {
    return this.config.databaseUrl;
  }

  public get databaseMigrationsEnabled(): boolean {
    return this.config.databaseMigrationsEnabled;
  }

  public get ledgerEnabled(): boolean {
    return this.config.ledgerEnabled;
  }

  public get ledgerWsUrl(): string {
    return this.config.ledgerWsUrl;
  }

  public get ledgerWalletMnemonic(): string | null {
    return this.config.ledgerWalletMnemonic;
  }

  public get ledgerQueryTimeoutMs(): number {
    return this.config.ledgerQueryTimeoutMs;
  }

  public get ledgerSubmitTimeoutMs(): number {
    return this.config.ledgerSubmitTimeoutMs;
  }

  public get ledgerConnectMaxAttempts(): number {
    return this.config.ledgerConnectMaxAttempts;
  }

  public get ledgerConnectBackoffMs(): number {
    return this.config.ledgerConnectBackoffMs;
  }

  public get ledgerFallbackHotkey(): string {
    return this.config.ledgerFallbackHotkey;
  }

  public get defaultNetuid(): number {
    return this.config.defaultNetuid;
  }

  public get defaultHotkey(): string {
    return this.config.defaultHotkey;
  }

  public get dividendCacheTtlSec(): number {
    return this.config.dividendCacheTtlSec;
  }

  public get dividendCacheMaxEntries(): number {
    return this.config.dividendCacheMaxEntries;
  }

  public get historyDefaultLimit(): number {
    return this.config.historyDefaultLimit;
  }

  public get historyMaxLimit(): number {
    return this.config.historyMaxLimit;
  }

  public get sentimentSearchUrl(): string {
    return this.config.sentimentSearchUrl;
  }

  public get sentimentSearchApiKey(): string | null {
    return this.config.sentimentSearchApiKey;
  }

  public get sentimentModelUrl(): string {
    return this.config.sentimentModelUrl;
  }

  public get sentimentModelApiKey(): string | null {
    return this.config.sentimentModelApiKey;
  }

  public get sentimentTimeoutMs(): number {
    return this.config.sentimentTimeoutMs;
  }

  public get sentimentSearchLimit(): number {
    return this.config.sentimentSearchLimit;
  }

  public get sentimentScoreLimit(): number {
    return this.config.sentimentScoreLimit;
  }

  public get tradeWorkerConcurrency(): number {
    return this.config.tradeWorkerConcurrency;
  }

  public get authLegacyTokens(): readonly string[] {
    return this.config.authLegacyTokens;
  }

  public get jwtSecret(): string | null {
    return this.config.jwtSecret;
  }

  public get jwtApiTokenTtlSec(): number {
    return this.config.jwtApiTokenTtlSec;
  }

  public get metricsEnabled(): boolean {
    return this.config.metricsEnabled;
  }

  public get rateLimitLedgerMinTimeMs(): number {
    return this.config.rateLimitLedgerMinTimeMs;
  }

  public get rateLimitLedgerMaxConcurrent(): number {
    return this.config.rateLimitLedgerMaxConcurrent;
  }

  public get rateLimitSentimentMinTimeMs(): number {
    return this.config.rateLimitSentimentMinTimeMs;
  }

  public get rateLimitSentimentMaxConcurrent(): number {
    return this.config.rateLimitSentimentMaxConcurrent;
  }

  public get authMode(): AuthMode {
    const legacyEnabled: boolean = this.config.authLegacyTokens.length > 0;
    const jwtEnabled: boolean = this.config.jwtSecret !== null;

    if (legacyEnabled && jwtEnabled) {
      return 'legacy+jwt';
    }

    if (legacyEnabled) {
      return 'legacy';
    }

    return jwtEnabled ? 'jwt' : 'none';
  }
}
