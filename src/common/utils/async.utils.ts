/**
 * 等待 ms 毫秒；signal 中止时提前返回
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}

/**
 * signal 已中止时抛出中止原因
 */
export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (!signal?.aborted) return;
  const reason: unknown = signal.reason;
  throw reason instanceof Error ? reason : new Error('Operation aborted');
}

/**
 * 为 Promise 附加超时
 * 超时后以 onTimeout() 的错误拒绝，并用同一个错误中止 controller；
 * 原操作需要自行响应中止信号，否则会在后台自然结束
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
  controller?: AbortController,
): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise;
  }

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      const error = onTimeout();
      controller?.abort(error);
      reject(error);
    }, timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}

export interface RetryOptions {
  /** 首次调用之后的最大重试次数 */
  retries: number;
  /** 第一次重试前的等待时间，之后按 2 的幂递增 */
  baseDelayMs: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** 中止后不再发起新的尝试 */
  signal?: AbortSignal;
}

/**
 * 指数退避重试
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const { retries, baseDelayMs, shouldRetry, onRetry, signal } = options;

  for (let attempt = 0; ; attempt++) {
    throwIfAborted(signal);
    try {
      return await fn(attempt);
    } catch (error) {
      throwIfAborted(signal);
      const canRetry = attempt < retries && (shouldRetry ? shouldRetry(error) : true);
      if (!canRetry) {
        throw error;
      }
      const delayMs = baseDelayMs * 2 ** attempt;
      onRetry?.(error, attempt + 1, delayMs);
      await sleep(delayMs, signal);
    }
  }
}
