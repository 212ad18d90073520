import { Injectable } from '@nestjs/common';

import {
  type TradeJob,
  type TradeJobPatch,
  type TradeJobResult,
  TradeJobStatus,
  TradeOperation,
} from '../../common/interfaces/trade-job.types';
import { DatabaseService } from '../kysely/database.service';
import type { NewTradeJobRow, TradeJobRow, TradeJobRowUpdate } from '../types/database.types';

const TRADE_JOB_STATUSES: readonly TradeJobStatus[] = Object.values(TradeJobStatus);
const TRADE_OPERATIONS: readonly TradeOperation[] = Object.values(TradeOperation);

@Injectable()
export class TradeJobsRepository {
  public constructor(private readonly databaseService: DatabaseService) {}

  public async create(job: TradeJob): Promise<void> {
    const insertRow: NewTradeJobRow = {
      job_id: job.jobId,
      subnet_id: job.subnetId,
      account_key: job.accountKey,
      status: job.status,
      ...this.mapResultColumns(job.result),
      error: job.error,
      requested_at: job.requestedAt,
      updated_at: job.updatedAt,
    };

    await this.databaseService
      .getKysely()
      .insertInto('trade_jobs')
      .values(insertRow)
      .executeTakeFirst();
  }

  public async update(jobId: string, patch: TradeJobPatch): Promise<void> {
    const updateRow: TradeJobRowUpdate = {
      status: patch.status,
      updated_at: patch.updatedAt,
      ...(patch.result === undefined ? {} : this.mapResultColumns(patch.result)),
      ...(patch.error === undefined ? {} : { error: patch.error }),
    };

    await this.databaseService
      .getKysely()
      .updateTable('trade_jobs')
      .set(updateRow)
      .where('job_id', '=', jobId)
      .executeTakeFirst();
  }

  public async findById(jobId: string): Promise<TradeJob | null> {
    const row: TradeJobRow | undefined = await this.databaseService
      .getKysely()
      .selectFrom('trade_jobs')
      .selectAll()
      .where('job_id', '=', jobId)
      .executeTakeFirst();

    return row ? this.mapRowToJob(row) : null;
  }

  private mapResultColumns(
    result: TradeJobResult | null,
  ): Pick<NewTradeJobRow, 'operation' | 'stake_delta' | 'sentiment_score' | 'tx_ref'> {
    return {
      operation: result?.operation ?? null,
      stake_delta: result?.stakeDelta ?? null,
      sentiment_score: result?.sentimentScore ?? null,
      tx_ref: result?.txRef ?? null,
    };
  }

  private mapRowToJob(row: TradeJobRow): TradeJob {
    return {
      jobId: row.job_id,
      subnetId: row.subnet_id,
      accountKey: row.account_key,
      requestedAt: row.requested_at.toISOString(),
      status: this.parseStatus(row.status),
      result: this.mapRowToResult(row),
      error: row.error,
      updatedAt: row.updated_at.toISOString(),
    };
  }

  private mapRowToResult(row: TradeJobRow): TradeJobResult | null {
    const operation: TradeOperation | undefined = TRADE_OPERATIONS.find(
      (candidate: TradeOperation): boolean => candidate === row.operation,
    );

    if (operation === undefined || row.stake_delta === null || row.sentiment_score === null) {
      return null;
    }

    return {
      stakeDelta: Number(row.stake_delta),
      sentimentScore: Number(row.sentiment_score),
      operation,
      txRef: row.tx_ref,
    };
  }

  private parseStatus(rawStatus: string): TradeJobStatus {
    const status: TradeJobStatus | undefined = TRADE_JOB_STATUSES.find(
      (candidate: TradeJobStatus): boolean => candidate === rawStatus,
    );

    if (status === undefined) {
      throw new Error(`Unknown trade job status: ${rawStatus}`);
    }

    return status;
  }
}
