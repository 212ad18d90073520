import type { AuthMode } from '../config/app-config.types';

export type ComponentHealth = {
  readonly ok: boolean;
  readonly details: string;
};

export type LedgerHealth = {
  readonly initialized: boolean;
  readonly details: string;
};

export type AppHealthStatus = {
  readonly status: 'ok' | 'degraded';
  readonly ledger: LedgerHealth;
  readonly database: ComponentHealth;
  readonly authMode: AuthMode;
  readonly timestamp: string;
};
