/**
 * 配置验证模块
 *
 * 功能：
 * - 校验交易配置（网关地址、端口、仓位上限、超时、保证金比例）
 * - 实盘模式下校验 LongPort 凭证是否齐全
 * - 构造 ConfigValidationError
 */
import type { TradingConfig } from '../types/config.js';
import type { ConfigValidationError, TradingConfigValidationResult } from './types.js';

/**
 * 创建配置验证错误
 * @param message 错误消息
 * @param errors 全部校验错误
 * @param missingFields 缺失的字段列表
 * @returns ConfigValidationError 错误对象
 */
export const createConfigValidationError = (
  message: string,
  errors: ReadonlyArray<string> = [],
  missingFields: ReadonlyArray<string> = [],
): ConfigValidationError => {
  return Object.assign(new Error(message), {
    name: 'ConfigValidationError' as const,
    errors,
    missingFields,
  });
};

/**
 * 端口是否合法（1-65535 的整数）
 */
export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}

/**
 * 实盘模式缺失的凭证字段（模拟模式不要求凭证）
 */
export function findMissingCredentials(config: TradingConfig): ReadonlyArray<string> {
  if (config.dryRun) {
    return [];
  }
  const missing: string[] = [];
  if (!config.broker.appKey) {
    missing.push('LONGPORT_APP_KEY');
  }
  if (!config.broker.appSecret) {
    missing.push('LONGPORT_APP_SECRET');
  }
  if (!config.broker.accessToken) {
    missing.push('LONGPORT_ACCESS_TOKEN');
  }
  return missing;
}

/**
 * 验证交易配置
 * 数值比较写成 !(x > 0) 形式，使 NaN 同样判为无效。
 *
 * @param config 交易配置
 * @returns 验证结果（errors 为空即有效）
 */
export function validateTradingConfig(config: TradingConfig): TradingConfigValidationResult {
  const errors: string[] = [];

  if (config.broker.host.trim() === '') {
    errors.push('BROKER_HOST 不能为空');
  }
  if (!isValidPort(config.broker.port)) {
    errors.push(`BROKER_PORT 无效: ${config.broker.port}（必须为 1-65535 之间的整数）`);
  }
  if (!(config.maxPositionSize > 0)) {
    errors.push(`MAX_POSITION_SIZE 必须大于 0，当前值: ${config.maxPositionSize}`);
  }
  if (!(config.maxDailyTrades > 0)) {
    errors.push(`MAX_DAILY_TRADES 必须大于 0，当前值: ${config.maxDailyTrades}`);
  }
  if (Number.isNaN(config.maxOrderValue)) {
    errors.push('MAX_ORDER_VALUE 必须为数字');
  }
  if (!(config.brokerCallTimeoutMs > 0)) {
    errors.push(`BROKER_CALL_TIMEOUT_MS 必须大于 0，当前值: ${config.brokerCallTimeoutMs}`);
  }
  if (!(config.initialCash >= 0)) {
    errors.push(`INITIAL_CASH 不能为负数，当前值: ${config.initialCash}`);
  }
  if (!(config.marginRequirement > 0 && config.marginRequirement <= 1)) {
    errors.push(`MARGIN_REQUIREMENT 必须在 (0, 1] 范围内，当前值: ${config.marginRequirement}`);
  }

  const missingFields = findMissingCredentials(config);
  if (missingFields.length > 0) {
    errors.push(`实盘模式缺少 LongPort 凭证: ${missingFields.join(', ')}`);
  }

  return {
    valid: errors.length === 0,
    errors,
    missingFields,
  };
}
