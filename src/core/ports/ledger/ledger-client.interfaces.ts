export interface ILedgerStakeRequest {
  readonly subnetId: number;
  readonly accountKey: string;
  readonly amountTao: number;
}

export interface ILedgerSubmissionReceipt {
  readonly txRef: string;
}

export interface ILedgerClient {
  isInitialized(): boolean;
  getInitializationError(): string | null;
  queryDividend(subnetId: number, accountKey: string): Promise<number>;
  submitStake(request: ILedgerStakeRequest): Promise<ILedgerSubmissionReceipt>;
  submitUnstake(request: ILedgerStakeRequest): Promise<ILedgerSubmissionReceipt>;
}
