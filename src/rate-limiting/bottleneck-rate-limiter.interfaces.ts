export enum LimiterKey {
  LEDGER_QUERY = 'ledger_query',
  LEDGER_SUBMIT = 'ledger_submit',
  SENTIMENT_SEARCH = 'sentiment_search',
  SENTIMENT_MODEL = 'sentiment_model',
  TRADE_WORKER = 'trade_worker',
}

export interface IBottleneckConfig {
  readonly minTime: number;
  readonly maxConcurrent: number;
}

export interface ILimiterBacklog {
  readonly waiting: number;
  readonly active: number;
}
