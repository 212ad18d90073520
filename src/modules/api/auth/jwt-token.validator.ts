import { Injectable } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';

import { apiTokenPayloadSchema, type ICredentialValidator } from './auth.interfaces';
import { AuthScheme, type Principal } from '../../../common/interfaces/auth.types';
import { AppConfigService } from '../../../config/app-config.service';

@Injectable()
export class JwtTokenValidator implements ICredentialValidator {
  public readonly scheme: AuthScheme = AuthScheme.JWT;

  public constructor(
    private readonly jwtService: JwtService,
    private readonly appConfigService: AppConfigService,
  ) {}

  public isEnabled(): boolean {
    return this.appConfigService.jwtSecret !== null;
  }

  public validate(credential: string): Principal | null {
    const secret: string | null = this.appConfigService.jwtSecret;

    if (secret === null) {
      return null;
    }

    let rawPayload: object;

    try {
      rawPayload = this.jwtService.verify<object>(credential, { secret, algorithms: ['HS256'] });
    } catch {
      return null;
    }

    const parsed = apiTokenPayloadSchema.safeParse(rawPayload);

    if (!parsed.success) {
      return null;
    }

    return {
      subject: parsed.data.sub,
      scopes: parsed.data.scopes,
      scheme: AuthScheme.JWT,
    };
  }
}
