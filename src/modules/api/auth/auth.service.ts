import { ForbiddenException, Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';

import {
  API_TOKEN_TYPE,
  type IApiTokenPayload,
  type ICredentialValidator,
  type IIssuedApiToken,
} from './auth.interfaces';
import { JwtTokenValidator } from './jwt-token.validator';
import { LegacyTokenValidator } from './legacy-token.validator';
import type { AuthScope, Principal } from '../../../common/interfaces/auth.types';
import { AppConfigService } from '../../../config/app-config.service';

@Injectable()
export class AuthService {
  private readonly logger: Logger = new Logger(AuthService.name);
  private readonly validators: readonly ICredentialValidator[];

  public constructor(
    private readonly jwtService: JwtService,
    private readonly appConfigService: AppConfigService,
    private readonly legacyTokenValidator: LegacyTokenValidator,
    jwtTokenValidator: JwtTokenValidator,
  ) {
    this.validators = [legacyTokenValidator, jwtTokenValidator];
  }

  public authenticate(credential: string): Principal {
    for (const validator of this.validators) {
      if (!validator.isEnabled()) {
        continue;
      }

      const principal: Principal | null = validator.validate(credential);

      if (principal !== null) {
        return principal;
      }
    }

    throw new UnauthorizedException('Invalid or expired credential');
  }

  public issueApiToken(apiToken: string, requestedScopes?: readonly AuthScope[]): IIssuedApiToken {
    const secret: string | null = this.appConfigService.jwtSecret;

    if (secret === null) {
      throw new UnauthorizedException('Token issuance is not configured (JWT_SECRET)');
    }

    const principal: Principal | null = this.legacyTokenValidator.isEnabled()
      ? this.legacyTokenValidator.validate(apiToken)
      : null;

    if (principal === null) {
      throw new UnauthorizedException('Invalid API token');
    }

    const scopes: readonly AuthScope[] = requestedScopes ?? principal.scopes;
    const excessScopes: readonly AuthScope[] = scopes.filter(
      (scope: AuthScope): boolean => !principal.scopes.includes(scope),
    );

    if (excessScopes.length > 0) {
      throw new ForbiddenException(`Requested scopes are not granted: ${excessScopes.join(', ')}`);
    }

    const expiresIn: number = this.appConfigService.jwtApiTokenTtlSec;
    const payload: IApiTokenPayload = {
      sub: principal.subject,
      scopes: [...new Set(scopes)],
      typ: API_TOKEN_TYPE,
    };
    const accessToken: string = this.jwtService.sign(payload, {
      secret,
      expiresIn,
      algorithm: 'HS256',
    });

    this.logger.log(`Issued API token subject=${principal.subject} scopes=${payload.scopes.join(',')}`);

    return { accessToken, tokenType: 'bearer', expiresIn };
  }
}
