export enum TradeJobStatus {
  PENDING = 'pending',
  RUNNING = 'running',
  SUCCEEDED = 'succeeded',
  FAILED = 'failed',
}

export enum TradeOperation {
  STAKE = 'stake',
  UNSTAKE = 'unstake',
  NONE = 'none',
}

export type TradeJobResult = {
  readonly stakeDelta: number;
  readonly sentimentScore: number;
  readonly operation: TradeOperation;
  readonly txRef: string | null;
};

export type TradeJob = {
  readonly jobId: string;
  readonly subnetId: number;
  readonly accountKey: string;
  readonly requestedAt: string;
  readonly status: TradeJobStatus;
  readonly result: TradeJobResult | null;
  readonly error: string | null;
  readonly updatedAt: string;
};

export type TradeJobPatch = {
  readonly status: TradeJobStatus;
  readonly result?: TradeJobResult | null;
  readonly error?: string | null;
  readonly updatedAt: string;
};

export const isTerminalTradeJobStatus = (status: TradeJobStatus): boolean =>
  status === TradeJobStatus.SUCCEEDED || status === TradeJobStatus.FAILED;
