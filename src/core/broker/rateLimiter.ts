/**
 * Trade API 频率限制器
 *
 * 职责：
 * - 控制 LongPort Trade API 调用频率，防止触发限流
 * - 支持并发调用（内部锁机制串行化请求）
 *
 * 限流规则：
 * - 30 秒内最多 30 次调用
 * - 两次调用间隔不少于 20ms（实际使用 30ms 确保安全）
 */
import { API } from '../../constants/index.js';
import { sleep as defaultSleep } from '../../utils/async/index.js';
import { logger as defaultLogger } from '../../utils/logger/index.js';
import type { RateLimiter, RateLimiterConfig, RateLimiterDeps } from './types.js';

const DEFAULT_CONFIG: RateLimiterConfig = {
  maxCalls: API.RATE_LIMIT_MAX_CALLS,
  windowMs: API.RATE_LIMIT_WINDOW_MS,
  minIntervalMs: API.MIN_CALL_INTERVAL_MS,
};

/**
 * 创建频率限制器
 * @param deps 依赖配置（时钟与等待函数可注入，便于测试）
 * @returns RateLimiter 接口实例
 */
export const createRateLimiter = (deps: RateLimiterDeps = {}): RateLimiter => {
  const { maxCalls, windowMs, minIntervalMs } = deps.config ?? DEFAULT_CONFIG;
  const now = deps.now ?? Date.now;
  const sleep = deps.sleep ?? defaultSleep;
  const logger = deps.logger ?? defaultLogger;

  // 闭包捕获的私有状态
  let callTimestamps: number[] = [];
  let throttlePromise: Promise<void> | null = null;

  /**
   * 节流：在调用 API 前检查频率限制
   * 超限时自动等待，支持并发调用（内部锁串行化）
   */
  const throttle = async (): Promise<void> => {
    while (throttlePromise) {
      await throttlePromise;
    }

    let releaseLock: () => void = () => {};
    throttlePromise = new Promise<void>((resolve) => {
      releaseLock = resolve;
    });

    try {
      let current = now();

      // 1. 最小调用间隔
      const lastCallTime = callTimestamps.at(-1);
      if (lastCallTime !== undefined && current - lastCallTime < minIntervalMs) {
        await sleep(minIntervalMs - (current - lastCallTime));
        current = now();
      }

      // 2. 清理超出时间窗口的调用记录
      callTimestamps = callTimestamps.filter((timestamp) => current - timestamp < windowMs);

      // 3. 已达上限时等待最早的调用过期
      const oldestCall = callTimestamps[0];
      if (callTimestamps.length >= maxCalls && oldestCall !== undefined) {
        const waitTime = windowMs - (current - oldestCall) + API.RATE_LIMIT_BUFFER_MS;
        logger.warn(
          `[频率限制] Trade API 调用频率达到上限 (${maxCalls}次/${windowMs}ms)，等待 ${waitTime}ms`,
        );
        await sleep(waitTime);
        const afterWait = now();
        callTimestamps = callTimestamps.filter((timestamp) => afterWait - timestamp < windowMs);
      }

      // 4. 记录本次调用时间
      callTimestamps.push(now());
    } finally {
      throttlePromise = null;
      releaseLock();
    }
  };

  return {
    throttle,
  };
};
