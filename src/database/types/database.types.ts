import type { ColumnType, Generated, Insertable, Selectable, Updateable } from 'kysely';

type TimestampColumn = ColumnType<Date, Date | string, never>;
type DefaultedTimestampColumn = ColumnType<Date, Date | string | undefined, never>;
type UpdatableTimestampColumn = ColumnType<Date, Date | string, Date | string>;

export interface IDividendHistoryTable {
  id: Generated<string>;
  subnet_id: number;
  account_key: string;
  dividend_value: number;
  source: string;
  observed_at: TimestampColumn;
  created_at: DefaultedTimestampColumn;
}

export interface ITradeJobsTable {
  job_id: string;
  subnet_id: number;
  account_key: string;
  status: string;
  operation: string | null;
  stake_delta: number | null;
  sentiment_score: number | null;
  tx_ref: string | null;
  error: string | null;
  requested_at: TimestampColumn;
  updated_at: UpdatableTimestampColumn;
}

export interface IDatabase {
  dividend_history: IDividendHistoryTable;
  trade_jobs: ITradeJobsTable;
}

export type DividendHistoryRow = Selectable<IDividendHistoryTable>;
export type NewDividendHistoryRow = Insertable<IDividendHistoryTable>;
export type TradeJobRow = Selectable<ITradeJobsTable>;
export type NewTradeJobRow = Insertable<ITradeJobsTable>;
export type TradeJobRowUpdate = Updateable<ITradeJobsTable>;
