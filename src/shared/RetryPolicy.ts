export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  isRetryable: (err: unknown) => boolean;
  onRetry?: (attempt: number, err: unknown) => void;
  /** 呼叫端放棄後不再重試，直接拋出最後一次錯誤 */
  signal?: AbortSignal;
}

/** 第 retry 次重試前的等待：base * 2^retry，再加上最多 base 的 jitter */
export function backoffDelay(retry: number, baseDelayMs: number, random: () => number = Math.random): number {
  return baseDelayMs * Math.pow(2, retry) + random() * baseDelayMs;
}

/** 等待 ms；signal 觸發時提早結束 */
function pause(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
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
 * 帶指數退避和 jitter 的重試策略
 * 總嘗試次數 = 1（初始） + maxRetries；operation 收到從 0 起算的嘗試序號
 */
export async function withRetry<T>(
  operation: (attempt: number) => T | Promise<T>,
  opts: RetryOptions,
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (err) {
      const canRetry = attempt < opts.maxRetries && opts.isRetryable(err) && !opts.signal?.aborted;
      if (!canRetry) throw err;

      opts.onRetry?.(attempt + 1, err);
      await pause(backoffDelay(attempt, opts.baseDelayMs), opts.signal);
      if (opts.signal?.aborted) throw err;
    }
  }
}
