import { ForbiddenException, ServiceUnavailableException } from '@nestjs/common';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import { DividendsController } from './dividends.controller';
import { LedgerUnavailableError } from '../../../common/errors';
import { AuthScheme, AuthScope, type Principal } from '../../../common/interfaces/auth.types';
import type { AppConfigService } from '../../../config/app-config.service';
import type { DividendHistoryService } from '../../dividends/services/dividend-history.service';
import type { DividendResolverService } from '../../dividends/services/dividend-resolver.service';

const DEFAULT_HOTKEY = '5FFApaS75bv5pJHfAp2FVLBj9ZaXuFDjEypsaBNc1wCfe52v';

const READER: Principal = {
  subject: 'reader',
  scopes: [AuthScope.READ],
  scheme: AuthScheme.JWT,
};

const STAKER: Principal = {
  subject: 'staker',
  scopes: [AuthScope.READ, AuthScope.STAKE],
  scheme: AuthScheme.JWT,
};

describe('DividendsController', (): void => {
  let resolve: ReturnType<typeof vi.fn>;
  let listHistory: ReturnType<typeof vi.fn>;
  let controller: DividendsController;

  beforeEach((): void => {
    resolve = vi.fn().mockResolvedValue({ netuid: 18 });
    listHistory = vi.fn().mockResolvedValue({ items: [], limit: 100 });
    controller = new DividendsController(
      { resolve } as unknown as DividendResolverService,
      { list: listHistory } as unknown as DividendHistoryService,
      { defaultNetuid: 18, defaultHotkey: DEFAULT_HOTKEY } as unknown as AppConfigService,
    );
  });

  it('fills in the default subnet and hotkey', async (): Promise<void> => {
    await controller.getTaoDividends(READER, { trade: false });

    expect(resolve).toHaveBeenCalledWith({
      subnetId: 18,
      accountKey: DEFAULT_HOTKEY,
      trade: false,
    });
  });

  it('passes explicit query params through', async (): Promise<void> => {
    await controller.getTaoDividends(STAKER, { netuid: 3, hotkey: DEFAULT_HOTKEY, trade: true });

    expect(resolve).toHaveBeenCalledWith({ subnetId: 3, accountKey: DEFAULT_HOTKEY, trade: true });
  });

  it('forbids trading without the stake scope', async (): Promise<void> => {
    await expect(controller.getTaoDividends(READER, { trade: true })).rejects.toBeInstanceOf(
      ForbiddenException,
    );
    expect(resolve).not.toHaveBeenCalled();
  });

  it('maps ledger unavailability to 503', async (): Promise<void> => {
    resolve.mockRejectedValue(new LedgerUnavailableError('timeout', 'timeout'));

    await expect(controller.getTaoDividends(READER, { trade: false })).rejects.toBeInstanceOf(
      ServiceUnavailableException,
    );
  });

  it('rethrows unexpected errors unchanged', async (): Promise<void> => {
    const failure: Error = new Error('boom');
    resolve.mockRejectedValue(failure);

    await expect(controller.getTaoDividends(READER, { trade: false })).rejects.toBe(failure);
  });

  it('forwards only the history filters that were given', async (): Promise<void> => {
    await controller.getDividendHistory({ hotkey: DEFAULT_HOTKEY, limit: 5 });

    expect(listHistory).toHaveBeenCalledWith({ accountKey: DEFAULT_HOTKEY, limit: 5 });
  });
});
