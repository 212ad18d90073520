import { z } from 'zod';

import { AuthScope, type AuthScheme, type Principal } from '../../../common/interfaces/auth.types';

export const API_TOKEN_TYPE = 'api';

export const apiTokenPayloadSchema = z.object({
  sub: z.string().min(1),
  scopes: z.array(z.enum(AuthScope)),
  typ: z.literal(API_TOKEN_TYPE),
});

export type IApiTokenPayload = z.infer<typeof apiTokenPayloadSchema>;

export interface ICredentialValidator {
  readonly scheme: AuthScheme;
  isEnabled(): boolean;
  validate(credential: string): Principal | null;
}

export interface IIssuedApiToken {
  readonly accessToken: string;
  readonly tokenType: 'bearer';
  readonly expiresIn: number;
}
