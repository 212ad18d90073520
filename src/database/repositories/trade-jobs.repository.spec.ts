import { describe, expect, it, vi } from 'vitest';

import { TradeJobsRepository } from './trade-jobs.repository';
import {
  type TradeJob,
  TradeJobStatus,
  TradeOperation,
} from '../../common/interfaces/trade-job.types';
import type { DatabaseService } from '../kysely/database.service';

type DatabaseStub = {
  readonly selectFrom?: ReturnType<typeof vi.fn>;
  readonly insertInto?: ReturnType<typeof vi.fn>;
  readonly updateTable?: ReturnType<typeof vi.fn>;
};

const createRepository = (dbStub: DatabaseStub): TradeJobsRepository =>
  new TradeJobsRepository({
    getKysely: vi.fn().mockReturnValue(dbStub),
  } as unknown as DatabaseService);

const JOB_ID = '5d6f1c1e-9a43-4d7a-8f0e-0a9c2b8e6f11';

describe('TradeJobsRepository', (): void => {
  it('creates a pending job row without result columns', async (): Promise<void> => {
    const executeTakeFirst = vi.fn().mockResolvedValue(undefined);
    const values = vi.fn().mockReturnValue({ executeTakeFirst });
    const insertInto = vi.fn().mockReturnValue({ values });
    const repository: TradeJobsRepository = createRepository({ insertInto });
    const job: TradeJob = {
      jobId: JOB_ID,
      subnetId: 18,
      accountKey: 'hotkey-a',
      requestedAt: '2026-03-01T10:00:00.000Z',
      status: TradeJobStatus.PENDING,
      result: null,
      error: null,
      updatedAt: '2026-03-01T10:00:00.000Z',
    };

    await repository.create(job);

    expect(insertInto).toHaveBeenCalledWith('trade_jobs');
    expect(values).toHaveBeenCalledWith({
      job_id: JOB_ID,
      subnet_id: 18,
      account_key: 'hotkey-a',
      status: 'pending',
      operation: null,
      stake_delta: null,
      sentiment_score: null,
      tx_ref: null,
      error: null,
      requested_at: '2026-03-01T10:00:00.000Z',
      updated_at: '2026-03-01T10:00:00.000Z',
    });
  });

  it('updates status and result columns by job id', async (): Promise<void> => {
    const executeTakeFirst = vi.fn().mockResolvedValue(undefined);
    const where = vi.fn().mockReturnValue({ executeTakeFirst });
    const set = vi.fn().mockReturnValue({ where });
    const updateTable = vi.fn().mockReturnValue({ set });
    const repository: TradeJobsRepository = createRepository({ updateTable });

    await repository.update(JOB_ID, {
      status: TradeJobStatus.SUCCEEDED,
      result: {
        stakeDelta: 0.05,
        sentimentScore: 5,
        operation: TradeOperation.STAKE,
        txRef: '0xabc',
      },
      error: null,
      updatedAt: '2026-03-01T10:01:00.000Z',
    });

    expect(updateTable).toHaveBeenCalledWith('trade_jobs');
    expect(set).toHaveBeenCalledWith({
      status: 'succeeded',
      updated_at: '2026-03-01T10:01:00.000Z',
      operation: 'stake',
      stake_delta: 0.05,
      sentiment_score: 5,
      tx_ref: '0xabc',
      error: null,
    });
    expect(where).toHaveBeenCalledWith('job_id', '=', JOB_ID);
  });

  it('leaves result columns untouched when patch only moves status', async (): Promise<void> => {
    const where = vi.fn().mockReturnValue({ executeTakeFirst: vi.fn().mockResolvedValue(undefined) });
    const set = vi.fn().mockReturnValue({ where });
    const repository: TradeJobsRepository = createRepository({
      updateTable: vi.fn().mockReturnValue({ set }),
    });

    await repository.update(JOB_ID, {
      status: TradeJobStatus.RUNNING,
      updatedAt: '2026-03-01T10:00:30.000Z',
    });

    expect(set).toHaveBeenCalledWith({
      status: 'running',
      updated_at: '2026-03-01T10:00:30.000Z',
    });
  });

  it('maps a stored row back into a trade job', async (): Promise<void> => {
    const executeTakeFirst = vi.fn().mockResolvedValue({
      job_id: JOB_ID,
      subnet_id: 18,
      account_key: 'hotkey-a',
      status: 'failed',
      operation: 'unstake',
      stake_delta: -0.03,
      sentiment_score: -3,
      tx_ref: null,
      error: 'ledger rejected extrinsic',
      requested_at: new Date('2026-03-01T10:00:00.000Z'),
      updated_at: new Date('2026-03-01T10:02:00.000Z'),
    });
    const where = vi.fn().mockReturnValue({ executeTakeFirst });
    const selectAll = vi.fn().mockReturnValue({ where });
    const selectFrom = vi.fn().mockReturnValue({ selectAll });
    const repository: TradeJobsRepository = createRepository({ selectFrom });

    const job: TradeJob | null = await repository.findById(JOB_ID);

    expect(job).toEqual({
      jobId: JOB_ID,
      subnetId: 18,
      accountKey: 'hotkey-a',
      requestedAt: '2026-03-01T10:00:00.000Z',
      status: TradeJobStatus.FAILED,
      result: {
        stakeDelta: -0.03,
        sentimentScore: -3,
        operation: TradeOperation.UNSTAKE,
        txRef: null,
      },
      error: 'ledger rejected extrinsic',
      updatedAt: '2026-03-01T10:02:00.000Z',
    });
  });

  it('returns null for an unknown job id', async (): Promise<void> => {
    const where = vi.fn().mockReturnValue({ executeTakeFirst: vi.fn().mockResolvedValue(undefined) });
    const repository: TradeJobsRepository = createRepository({
      selectFrom: vi.fn().mockReturnValue({ selectAll: vi.fn().mockReturnValue({ where }) }),
    });

    await expect(repository.findById(JOB_ID)).resolves.toBeNull();
  });
});
