import { Injectable } from '@nestjs/common';

import {
  DividendSource,
  type DividendResult,
  type HistoryFilter,
  type HistoryRecord,
} from '../../common/interfaces/dividend.types';
import { DatabaseService } from '../kysely/database.service';
import type { DividendHistoryRow, NewDividendHistoryRow } from '../types/database.types';

@Injectable()
export class DividendHistoryRepository {
  public constructor(private readonly databaseService: DatabaseService) {}

  public async append(result: DividendResult): Promise<void> {
    const insertRow: NewDividendHistoryRow = {
      subnet_id: result.subnetId,
      account_key: result.accountKey,
      dividend_value: result.dividendValue,
      source: result.source,
      observed_at: result.observedAt,
    };

    await this.databaseService
      .getKysely()
      .insertInto('dividend_history')
      .values(insertRow)
      .executeTakeFirst();
  }

  public async list(filter: HistoryFilter): Promise<readonly HistoryRecord[]> {
    let query = this.databaseService.getKysely().selectFrom('dividend_history').selectAll();

    if (filter.subnetId !== undefined) {
      query = query.where('subnet_id', '=', filter.subnetId);
    }

    if (filter.accountKey !== undefined) {
      query = query.where('account_key', '=', filter.accountKey);
    }

    const rows: DividendHistoryRow[] = await query
      .orderBy('observed_at', 'desc')
      .orderBy('id', 'desc')
      .limit(filter.limit)
      .execute();

    return rows.map((row: DividendHistoryRow): HistoryRecord => this.mapRowToRecord(row));
  }

  private mapRowToRecord(row: DividendHistoryRow): HistoryRecord {
    return {
      id: Number(row.id),
      subnetId: row.subnet_id,
      accountKey: row.account_key,
      dividendValue: Number(row.dividend_value),
      observedAt: row.observed_at.toISOString(),
      source: row.source === 'fallback' ? DividendSource.FALLBACK : DividendSource.LIVE,
    };
  }
}
