import { createHash, timingSafeEqual } from 'node:crypto';

import { Injectable } from '@nestjs/common';

import type { ICredentialValidator } from './auth.interfaces';
import {
  ALL_AUTH_SCOPES,
  AuthScheme,
  type Principal,
} from '../../../common/interfaces/auth.types';
import { AppConfigService } from '../../../config/app-config.service';

const digest = (value: string): Buffer => createHash('sha256').update(value, 'utf8').digest();

@Injectable()
export class LegacyTokenValidator implements ICredentialValidator {
  public readonly scheme: AuthScheme = AuthScheme.LEGACY;
  private readonly tokenDigests: readonly Buffer[];

  public constructor(appConfigService: AppConfigService) {
    this.tokenDigests = appConfigService.authLegacyTokens.map(digest);
  }

  public isEnabled(): boolean {
    return this.tokenDigests.length > 0;
  }

  public validate(credential: string): Principal | null {
    const candidate: Buffer = digest(credential);
    const matchedIndex: number = this.tokenDigests.reduce(
      (matched: number, tokenDigest: Buffer, index: number): number =>
        timingSafeEqual(tokenDigest, candidate) && matched === -1 ? index : matched,
      -1,
    );

    if (matchedIndex === -1) {
      return null;
    }

    return {
      subject: `legacy-token-${String(matchedIndex + 1)}`,
      scopes: ALL_AUTH_SCOPES,
      scheme: AuthScheme.LEGACY,
    };
  }
}
