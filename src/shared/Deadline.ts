/**
 * 在時間預算內執行 work；逾時即以 onTimeout() 的錯誤 reject，
 * 並透過 AbortSignal 通知 work 呼叫端已放棄（signal.reason 為同一個錯誤）。
 *
 * work 本身不會被強制中斷，會在背景跑完（結果丟棄）。
 */
export function withDeadline<T>(
  work: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      const error = onTimeout();
      controller.abort(error);
      reject(error);
    }, timeoutMs);

    work(controller.signal).then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}
