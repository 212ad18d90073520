import {
  type CanActivate,
  type ExecutionContext,
  ForbiddenException,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import type { Request } from 'express';

import { AuthService } from './auth.service';
import { AuthScope, hasScope, type Principal } from '../../../common/interfaces/auth.types';

export type AuthenticatedRequest = Request & { principal?: Principal };

const BEARER_PREFIX = 'Bearer ';

@Injectable()
export class ApiAuthGuard implements CanActivate {
  public constructor(private readonly authService: AuthService) {}

  public canActivate(context: ExecutionContext): boolean {
    const request: AuthenticatedRequest = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const credential: string | null = this.extractCredential(request);

    if (credential === null) {
      throw new UnauthorizedException('Missing bearer credential');
    }

    const principal: Principal = this.authService.authenticate(credential);

    if (!hasScope(principal, AuthScope.READ)) {
      throw new ForbiddenException('Credential lacks the read scope');
    }

    request.principal = principal;

    return true;
  }

  private extractCredential(request: Request): string | null {
    const authHeader: string | undefined = request.headers.authorization;

    if (typeof authHeader !== 'string' || !authHeader.startsWith(BEARER_PREFIX)) {
      return null;
    }

    const credential: string = authHeader.slice(BEARER_PREFIX.length).trim();

    return credential.length > 0 ? credential : null;
  }
}
