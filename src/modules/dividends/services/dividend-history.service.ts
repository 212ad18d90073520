import { Injectable } from '@nestjs/common';

import type { HistoryFilter, HistoryRecord } from '../../../common/interfaces/dividend.types';
import { AppConfigService } from '../../../config/app-config.service';
import { DividendHistoryRepository } from '../../../database/repositories/dividend-history.repository';

export type DividendHistoryQuery = {
  readonly subnetId?: number;
  readonly accountKey?: string;
  readonly limit?: number;
};

export type DividendHistoryPage = {
  readonly items: readonly HistoryRecord[];
  readonly limit: number;
};

@Injectable()
export class DividendHistoryService {
  public constructor(
    private readonly dividendHistoryRepository: DividendHistoryRepository,
    private readonly appConfigService: AppConfigService,
  ) {}

  public async list(query: DividendHistoryQuery): Promise<DividendHistoryPage> {
    const limit: number = this.capLimit(query.limit);

    if (limit < 1) {
      return { items: [], limit: 0 };
    }

    const filter: HistoryFilter = {
      ...(query.subnetId === undefined ? {} : { subnetId: query.subnetId }),
      ...(query.accountKey === undefined ? {} : { accountKey: query.accountKey }),
      limit,
    };
    const items: readonly HistoryRecord[] = await this.dividendHistoryRepository.list(filter);

    return { items, limit: filter.limit };
  }

  private capLimit(requestedLimit: number | undefined): number {
    const limit: number = requestedLimit ?? this.appConfigService.historyDefaultLimit;

    return Math.min(Math.trunc(limit), this.appConfigService.historyMaxLimit);
  }
}
