export enum AuthScope {
  READ = 'read',
  STAKE = 'stake',
  ADMIN = 'admin',
}

export enum AuthScheme {
  LEGACY = 'legacy',
  JWT = 'jwt',
}

export const ALL_AUTH_SCOPES: readonly AuthScope[] = [AuthScope.READ, AuthScope.STAKE, AuthScope.ADMIN];

export type Principal = {
  readonly subject: string;
  readonly scopes: readonly AuthScope[];
  readonly scheme: AuthScheme;
};

export const hasScope = (principal: Principal, scope: AuthScope): boolean =>
  principal.scopes.includes(scope) || principal.scopes.includes(AuthScope.ADMIN);
