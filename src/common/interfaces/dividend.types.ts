export enum DividendSource {
  LIVE = 'live',
  FALLBACK = 'fallback',
}

export enum ServedFrom {
  CACHE = 'cache',
  LEDGER = 'ledger',
}

export type DividendQuery = {
  readonly subnetId: number;
  readonly accountKey: string;
};

export type DividendResult = {
  readonly subnetId: number;
  readonly accountKey: string;
  readonly dividendValue: number;
  readonly observedAt: string;
  readonly source: DividendSource;
};

export type HistoryRecord = DividendResult & {
  readonly id: number;
};

export type HistoryFilter = {
  readonly subnetId?: number;
  readonly accountKey?: string;
  readonly limit: number;
};

export const buildDividendCacheKey = (query: DividendQuery): string =>
  `${String(query.subnetId)}:${query.accountKey}`;

export type DividendLookupStatus = 'success' | 'partial_success';

export type DividendLookupRequest = DividendQuery & {
  readonly trade: boolean;
};

export type DividendLookupResponse = {
  readonly netuid: number;
  readonly hotkey: string;
  readonly dividendValue: number;
  readonly observedAt: string;
  readonly source: DividendSource;
  readonly servedFrom: ServedFrom;
  readonly tradeTriggered: boolean;
  readonly jobId: string | null;
  readonly status: DividendLookupStatus;
  readonly message: string;
};
