import { describe, expect, it } from 'vitest';

import { withTimeout } from './with-timeout.util';
import { OperationTimeoutError } from '../../errors';

describe('withTimeout', (): void => {
  it('resolves with the operation result inside the deadline', async (): Promise<void> => {
    await expect(withTimeout(Promise.resolve(42), 50, 'lookup')).resolves.toBe(42);
  });

  it('rejects with OperationTimeoutError past the deadline', async (): Promise<void> => {
    const pending: Promise<never> = new Promise<never>((): void => undefined);

    await expect(withTimeout(pending, 10, 'lookup')).rejects.toBeInstanceOf(OperationTimeoutError);
    await expect(withTimeout(pending, 10, 'lookup')).rejects.toThrow('lookup timed out after 10ms');
  });

  it('passes the operation error through', async (): Promise<void> => {
    await expect(
      withTimeout(Promise.reject(new Error('socket closed')), 50, 'lookup'),
    ).rejects.toThrow('socket closed');
  });
});
