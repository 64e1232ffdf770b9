/**
 * 风控配置模块
 *
 * 功能：
 * - 将键值对形式的风控配置解析为 RiskConfig，缺省项使用默认值
 * - 键名大小写与下划线不敏感（max_daily_loss 与 maxDailyLoss 等价），未知键忽略
 * - maxDailyTrades 为 maxTradesPerDay 的别名
 * - 从环境变量（RISK_* 及交易配置）组装风控配置输入
 */
import { RISK_DEFAULTS } from '../constants/index.js';
import type { RiskConfig, TradingConfig } from '../types/config.js';
import { logger } from '../utils/logger/index.js';
import type { Logger } from '../utils/logger/index.js';
import type { RawRiskConfig } from './types.js';
import { getStringConfig } from './utils.js';

type RiskConfigKey = keyof RiskConfig;

const DEFAULT_RISK_CONFIG: RiskConfig = {
  maxPositionSize: RISK_DEFAULTS.MAX_POSITION_SIZE,
  maxPortfolioValue: RISK_DEFAULTS.MAX_PORTFOLIO_VALUE,
  maxDailyLoss: RISK_DEFAULTS.MAX_DAILY_LOSS,
  maxPositionConcentration: RISK_DEFAULTS.MAX_POSITION_CONCENTRATION,
  maxSectorConcentration: RISK_DEFAULTS.MAX_SECTOR_CONCENTRATION,
  maxTradesPerDay: RISK_DEFAULTS.MAX_TRADES_PER_DAY,
  minCashReserve: RISK_DEFAULTS.MIN_CASH_RESERVE,
  maxLeverage: RISK_DEFAULTS.MAX_LEVERAGE,
  maxDrawdown: RISK_DEFAULTS.MAX_DRAWDOWN,
};

/** 规范化键名 → 配置字段 */
const KEY_LOOKUP: ReadonlyMap<string, RiskConfigKey> = new Map<string, RiskConfigKey>([
  ['maxpositionsize', 'maxPositionSize'],
  ['maxportfoliovalue', 'maxPortfolioValue'],
  ['maxdailyloss', 'maxDailyLoss'],
  ['maxpositionconcentration', 'maxPositionConcentration'],
  ['maxsectorconcentration', 'maxSectorConcentration'],
  ['maxtradesperday', 'maxTradesPerDay'],
  ['maxdailytrades', 'maxTradesPerDay'],
  ['mincashreserve', 'minCashReserve'],
  ['maxleverage', 'maxLeverage'],
  ['maxdrawdown', 'maxDrawdown'],
]);

/** 可通过 RISK_* 环境变量覆盖的字段 */
const ENV_OVERRIDE_KEYS = [
  'MAX_PORTFOLIO_VALUE',
  'MAX_DAILY_LOSS',
  'MAX_POSITION_CONCENTRATION',
  'MAX_SECTOR_CONCENTRATION',
  'MIN_CASH_RESERVE',
  'MAX_LEVERAGE',
  'MAX_DRAWDOWN',
] as const;

const normalizeKey = (key: string): string => key.replaceAll('_', '').toLowerCase();

function parseNumericValue(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * 解析风控配置
 * 非数值取值回退为默认值并记录警告。
 *
 * @param raw 键值对配置
 * @param log 日志器
 */
export function createRiskConfig(raw: RawRiskConfig = {}, log: Logger = logger): RiskConfig {
  const resolved: Record<RiskConfigKey, number> = { ...DEFAULT_RISK_CONFIG };

  for (const [key, value] of Object.entries(raw)) {
    const field = KEY_LOOKUP.get(normalizeKey(key));
    if (field === undefined || value === undefined || value === null) {
      continue;
    }
    const parsed = parseNumericValue(value);
    if (parsed === null) {
      log.warn(
        `[配置警告] 风控配置 ${key} 值无效: ${String(value)}，已使用默认值 ${DEFAULT_RISK_CONFIG[field]}`,
      );
      continue;
    }
    resolved[field] = parsed;
  }

  return resolved;
}

/**
 * 从环境变量组装风控配置输入
 * 仓位上限与每日交易次数沿用交易配置，其余字段读取 RISK_* 覆盖项。
 */
export function readRiskConfigInput(
  env: NodeJS.ProcessEnv,
  tradingConfig: TradingConfig,
): RawRiskConfig {
  const raw: Record<string, unknown> = {
    maxPositionSize: tradingConfig.maxPositionSize,
    maxDailyTrades: tradingConfig.maxDailyTrades,
  };
  for (const key of ENV_OVERRIDE_KEYS) {
    const value = getStringConfig(env, `RISK_${key}`);
    if (value !== null) {
      raw[key.toLowerCase()] = value;
    }
  }
  return raw;
}
