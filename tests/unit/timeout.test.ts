import { backoffDelay, withTimeout } from '../../src/resilience/timeout';
import { RetrievalUnavailableError } from '../../src/resilience/errors';

describe('withTimeout', () => {
  it('should resolve with the task result when it finishes in time', async () => {
    await expect(withTimeout(async () => 42, 1000, () => new Error('late'))).resolves.toBe(42);
  });

  it('should reject with the stage error and abort the signal on timeout', async () => {
    let seen: AbortSignal | undefined;
    const task = (signal: AbortSignal) => {
      seen = signal;
      return new Promise<number>(() => undefined);
    };

    await expect(
      withTimeout(task, 10, () => new RetrievalUnavailableError('retrieval timed out')),
    ).rejects.toBeInstanceOf(RetrievalUnavailableError);
    expect(seen?.aborted).toBe(true);
  });

  it('should pass task failures through unchanged', async () => {
    const failure = new Error('store offline');
    await expect(withTimeout(async () => { throw failure; }, 1000, () => new Error('late'))).rejects.toBe(failure);
  });
});

describe('backoffDelay', () => {
  it('should double from the base delay', () => {
    expect([1, 2, 3].map((n) => backoffDelay(n, 500, 8000))).toEqual([500, 1000, 2000]);
  });

  it('should cap at the maximum delay', () => {
    expect(backoffDelay(10, 500, 8000)).toBe(8000);
  });
});
