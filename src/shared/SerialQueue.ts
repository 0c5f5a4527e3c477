/**
 * 單一執行槽的 FIFO 佇列
 *
 * 同一時間只有一個 task 在跑；後到的 task 依到達順序排隊。
 * 前一個 task 失敗不會阻斷後續 task。
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  /** 排隊中 + 執行中的 task 數 */
  get pending(): number {
    return this.queued;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    this.queued++;
    const result = this.tail.then(async () => {
      try {
        return await task();
      } finally {
        this.queued--;
      }
    });
    this.tail = result.then(() => undefined, () => undefined);
    return result;
  }
}
