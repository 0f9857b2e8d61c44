import { StageTimeoutError } from '../errors/pipeline.errors';
import { PipelineStage } from '../../database/entities';
import { retryWithBackoff, sleep, withTimeout } from './async.utils';

describe('withTimeout', () => {
  it('should resolve with the value when the promise settles in time', async () => {
    await expect(withTimeout(Promise.resolve(42), 1000, () => new Error('late'))).resolves.toBe(42);
  });

  it('should reject with the timeout error when the promise is too slow', async () => {
    const never = new Promise<number>(() => undefined);

    await expect(
      withTimeout(never, 5, () => new StageTimeoutError(PipelineStage.ALIGN, 5)),
    ).rejects.toThrow('align timed out after 5ms');
  });

  it('should pass the original rejection through', async () => {
    await expect(withTimeout(Promise.reject(new Error('boom')), 1000, () => new Error('late'))).rejects.toThrow(
      'boom',
    );
  });

  it('should abort the controller with the timeout error', async () => {
    const controller = new AbortController();
    const never = new Promise<number>(() => undefined);

    await expect(
      withTimeout(never, 5, () => new StageTimeoutError(PipelineStage.REFINE, 5), controller),
    ).rejects.toThrow(StageTimeoutError);
    expect(controller.signal.aborted).toBe(true);
    expect(controller.signal.reason).toBeInstanceOf(StageTimeoutError);
  });

  it('should leave the controller alone when the promise settles in time', async () => {
    const controller = new AbortController();

    await withTimeout(Promise.resolve('ok'), 1000, () => new Error('late'), controller);

    expect(controller.signal.aborted).toBe(false);
  });

  it('should not apply a timeout when the limit is not positive', async () => {
    const slow = new Promise<string>((resolve) => setTimeout(() => resolve('done'), 10));

    await expect(withTimeout(slow, 0, () => new Error('late'))).resolves.toBe('done');
  });
});

describe('retryWithBackoff', () => {
  it('should retry with exponentially growing delays', async () => {
    const delays: number[] = [];
    let calls = 0;

    const result = await retryWithBackoff(
      async () => {
        calls++;
        if (calls < 3) throw new Error(`attempt ${calls}`);
        return 'ok';
      },
      { retries: 3, baseDelayMs: 1, onRetry: (_error, _attempt, delayMs) => delays.push(delayMs) },
    );

    expect(result).toBe('ok');
    expect(calls).toBe(3);
    expect(delays).toEqual([1, 2]);
  });

  it('should give up after the configured number of retries', async () => {
    let calls = 0;

    await expect(
      retryWithBackoff(
        async () => {
          calls++;
          throw new Error('always');
        },
        { retries: 2, baseDelayMs: 0 },
      ),
    ).rejects.toThrow('always');
    expect(calls).toBe(3);
  });

  it('should stop when the error is not retryable', async () => {
    let calls = 0;

    await expect(
      retryWithBackoff(
        async () => {
          calls++;
          throw new Error('fatal');
        },
        { retries: 5, baseDelayMs: 0, shouldRetry: () => false },
      ),
    ).rejects.toThrow('fatal');
    expect(calls).toBe(1);
  });
});

describe('sleep', () => {
  it('should return early when the signal aborts', async () => {
    const controller = new AbortController();
    const started = Date.now();

    const pending = sleep(10_000, controller.signal);
    controller.abort();
    await pending;

    expect(Date.now() - started).toBeLessThan(1000);
  });
});

describe('retryWithBackoff with a signal', () => {
  it('should not start another attempt after the signal aborts', async () => {
    const controller = new AbortController();
    let calls = 0;

    await expect(
      retryWithBackoff(
        async () => {
          calls++;
          controller.abort(new Error('stage deadline'));
          throw new Error('transient');
        },
        { retries: 3, baseDelayMs: 0, signal: controller.signal },
      ),
    ).rejects.toThrow('stage deadline');
    expect(calls).toBe(1);
  });

  it('should stop waiting for the next retry when the signal aborts', async () => {
    const controller = new AbortController();
    let calls = 0;

    const pending = retryWithBackoff(
      async () => {
        calls++;
        throw new Error('transient');
      },
      {
        retries: 3,
        baseDelayMs: 10_000,
        signal: controller.signal,
        onRetry: () => controller.abort(new Error('stage deadline')),
      },
    );

    await expect(pending).rejects.toThrow('stage deadline');
    expect(calls).toBe(1);
  });

  it('should reject right away when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    let calls = 0;

    await expect(
      retryWithBackoff(
        async () => {
          calls++;
          return 'ok';
        },
        { retries: 1, baseDelayMs: 0, signal: controller.signal },
      ),
    ).rejects.toThrow();
    expect(calls).toBe(0);
  });
});
