import { createParamDecorator, type ExecutionContext } from '@nestjs/common';

import type { AuthenticatedRequest } from './api-auth.guard';
import type { Principal } from '../../../common/interfaces/auth.types';

// eslint-disable-next-line @typescript-eslint/naming-convention -- NestJS param decorator convention
export const CurrentPrincipal = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): Principal => {
    const request: AuthenticatedRequest = ctx.switchToHttp().getRequest<AuthenticatedRequest>();

    if (!request.principal) {
      throw new Error('Principal not found on request. Ensure ApiAuthGuard is applied.');
    }

    return request.principal;
  },
);
