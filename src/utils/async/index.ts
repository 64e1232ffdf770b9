/**
 * 异步控制工具
 *
 * 功能/职责：
 * - createAsyncLock：按调用顺序串行执行异步临界区
 * - withTimeout：为外部调用加超时，超时以 TimeoutError 拒绝
 */

/**
 * 异步互斥锁
 */
export interface AsyncLock {
  /** 在锁内执行 task，返回其结果；task 抛错时锁仍会释放 */
  runExclusive<T>(task: () => Promise<T>): Promise<T>;
  /** 当前是否有任务持有锁 */
  isLocked(): boolean;
}

/**
 * 创建异步互斥锁。
 * 以 Promise 链作为队列：每个任务等待前一个任务结束后才开始，保证先到先执行。
 */
export function createAsyncLock(): AsyncLock {
  let tail: Promise<void> = Promise.resolve();
  let pending = 0;

  const runExclusive = async <T>(task: () => Promise<T>): Promise<T> => {
    const previous = tail;
    let releaseLock: () => void = () => {};
    tail = new Promise<void>((resolve) => {
      releaseLock = resolve;
    });
    pending += 1;

    try {
      await previous;
      return await task();
    } finally {
      pending -= 1;
      releaseLock();
    }
  };

  return {
    runExclusive,
    isLocked: () => pending > 0,
  };
}

/**
 * 创建超时错误
 */
export function createTimeoutError(label: string, timeoutMs: number): Error {
  return Object.assign(new Error(`${label} 超时（${timeoutMs}ms）`), {
    name: 'TimeoutError',
    timeoutMs,
  });
}

/**
 * 为 Promise 加超时保护。
 * 超时后以 TimeoutError 拒绝，原 Promise 不会被取消，其结果被丢弃。
 * timeoutMs <= 0 时不加超时。
 *
 * @param promise 原始 Promise
 * @param timeoutMs 超时时间（毫秒）
 * @param label 用于错误消息的调用描述
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  if (timeoutMs <= 0) {
    return promise;
  }

  return new Promise<T>((resolve, reject) => {
    const timeoutId = setTimeout(() => {
      reject(createTimeoutError(label, timeoutMs));
    }, timeoutMs);

    promise.then(
      (value) => {
        clearTimeout(timeoutId);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timeoutId);
        reject(err);
      },
    );
  });
}

/**
 * 等待指定毫秒数
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
