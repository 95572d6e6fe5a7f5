import { describe, it, expect } from 'vitest';
import { sleep, withTimeout } from '../../../src/utils/timeout.js';
import { deferred } from '../../helpers/fixtures.js';

describe('withTimeout', () => {
  it('resolves with the value of a prompt operation', async () => {
    await expect(withTimeout(Promise.resolve('done'), 100, 'fast op')).resolves.toBe('done');
  });

  it('propagates the operation failure', async () => {
    await expect(withTimeout(Promise.reject(new Error('boom')), 100, 'failing op')).rejects.toThrow('boom');
  });

  it('rejects with a Timeout error once the deadline passes', async () => {
    const never = deferred<string>();

    await expect(withTimeout(never.promise, 10, 'slow op')).rejects.toMatchObject({
      code: 'Timeout',
      message: 'Operation timed out after 10ms: slow op',
    });

    never.reject(new Error('late failure'));
  });
});

describe('sleep', () => {
  it('wakes early when aborted', async () => {
    const controller = new AbortController();
    const startedAt = Date.now();

    const sleeping = sleep(10_000, controller.signal);
    controller.abort();
    await sleeping;

    expect(Date.now() - startedAt).toBeLessThan(1000);
  });
});
