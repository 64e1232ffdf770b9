/**
 * 交易配置模块
 *
 * 功能：
 * - 从环境变量读取交易配置（运行模式、网关、交易限制、日志）
 * - 构造后立即校验，无效时抛出 ConfigValidationError
 *
 * 环境变量：
 * - ENABLE_LIVE_TRADING：true 为实盘，默认 false（dry run）
 * - LONGPORT_REGION / BROKER_HOST / BROKER_PORT：网关区域与地址覆盖
 * - LONGPORT_APP_KEY / LONGPORT_APP_SECRET / LONGPORT_ACCESS_TOKEN / TRADING_ACCOUNT_ID
 * - MAX_POSITION_SIZE / MAX_DAILY_TRADES / MAX_ORDER_VALUE / ENABLE_SHORT_SELLING
 * - LOG_TRADES / LOG_LEVEL / BROKER_CALL_TIMEOUT_MS / INITIAL_CASH / MARGIN_REQUIREMENT
 */
import { API, EXECUTION, RISK_DEFAULTS, SIMULATION } from '../constants/index.js';
import type { TradingConfig } from '../types/config.js';
import { logger, parseLogLevel } from '../utils/logger/index.js';
import type { Logger } from '../utils/logger/index.js';
import { createConfigValidationError, validateTradingConfig } from './config.validator.js';
import {
  extractHost,
  getBooleanConfig,
  getRegionUrls,
  getStringConfig,
  normalizeRegion,
} from './utils.js';

const DEFAULT_MAX_ORDER_VALUE = 50_000;

/**
 * 读取数字配置：未设置返回默认值；已设置但无法解析时返回 NaN，交由校验报错。
 */
function readNumber(env: NodeJS.ProcessEnv, envKey: string, defaultValue: number): number {
  const raw = getStringConfig(env, envKey);
  return raw === null ? defaultValue : Number(raw);
}

/**
 * 从环境变量构造交易配置
 * @throws {ConfigValidationError} 配置无效时
 */
export function createTradingConfig({
  env,
  log = logger,
}: {
  env: NodeJS.ProcessEnv;
  log?: Logger;
}): TradingConfig {
  const region = normalizeRegion(getStringConfig(env, 'LONGPORT_REGION'));

  const rawLogLevel = getStringConfig(env, 'LOG_LEVEL');
  const logLevel = parseLogLevel(rawLogLevel ?? undefined);
  if (rawLogLevel !== null && logLevel === null) {
    log.warn(`[配置警告] LOG_LEVEL 值无效: ${rawLogLevel}，已使用默认值 INFO`);
  }

  const config: TradingConfig = {
    broker: {
      region,
      host: getStringConfig(env, 'BROKER_HOST') ?? extractHost(getRegionUrls(region).httpUrl),
      port: readNumber(env, 'BROKER_PORT', API.DEFAULT_GATEWAY_PORT),
      appKey: getStringConfig(env, 'LONGPORT_APP_KEY'),
      appSecret: getStringConfig(env, 'LONGPORT_APP_SECRET'),
      accessToken: getStringConfig(env, 'LONGPORT_ACCESS_TOKEN'),
      accountId: getStringConfig(env, 'TRADING_ACCOUNT_ID'),
    },
    dryRun: !getBooleanConfig(env, 'ENABLE_LIVE_TRADING', false),
    maxPositionSize: readNumber(env, 'MAX_POSITION_SIZE', RISK_DEFAULTS.MAX_POSITION_SIZE),
    maxDailyTrades: readNumber(env, 'MAX_DAILY_TRADES', RISK_DEFAULTS.MAX_TRADES_PER_DAY),
    maxOrderValue: readNumber(env, 'MAX_ORDER_VALUE', DEFAULT_MAX_ORDER_VALUE),
    enableShortSelling: getBooleanConfig(env, 'ENABLE_SHORT_SELLING', false),
    logTrades: getBooleanConfig(env, 'LOG_TRADES', true),
    logLevel: logLevel ?? 'INFO',
    brokerCallTimeoutMs: readNumber(
      env,
      'BROKER_CALL_TIMEOUT_MS',
      EXECUTION.DEFAULT_BROKER_CALL_TIMEOUT_MS,
    ),
    initialCash: readNumber(env, 'INITIAL_CASH', SIMULATION.INITIAL_CASH),
    marginRequirement: readNumber(env, 'MARGIN_REQUIREMENT', EXECUTION.DEFAULT_MARGIN_REQUIREMENT),
  };

  const result = validateTradingConfig(config);
  if (!result.valid) {
    for (const error of result.errors) {
      log.error(`[配置错误] ${error}`);
    }
    throw createConfigValidationError(
      `交易配置无效: ${result.errors.join('; ')}`,
      result.errors,
      result.missingFields,
    );
  }
  return config;
}
