/**
 * 风控限额
 *
 * 限额在风险管理器构造时一次性建立；配置值 <= 0 或非有限数视为禁用，对应检查直接以 LOW 通过。
 * 利用率 = 当前值 / 限额：>= 1 拒绝（CRITICAL），>= 预警比例 HIGH，>= 0.5 MEDIUM，其余 LOW。
 */
import { RISK_THRESHOLDS } from '../../constants/index.js';
import type { RiskConfig } from '../../types/config.js';
import type { RiskLevel, RiskLimit, RiskLimitName } from '../../types/risk.js';
import type { RiskLimitState, RiskLimitTable } from './types.js';

export function createRiskLimit(
  name: RiskLimitName,
  maxValue: number,
  warningThreshold: number = RISK_THRESHOLDS.WARNING_RATIO,
): RiskLimitState {
  return {
    name,
    maxValue,
    currentValue: 0,
    warningThreshold,
    enabled: Number.isFinite(maxValue) && maxValue > 0,
  };
}

/**
 * 按配置建立全部限额
 */
export function createRiskLimitTable(config: RiskConfig): Map<RiskLimitName, RiskLimitState> {
  const entries: ReadonlyArray<[RiskLimitName, number]> = [
    ['maxPositionSize', config.maxPositionSize],
    ['maxPortfolioValue', config.maxPortfolioValue],
    ['maxDailyLoss', config.maxDailyLoss],
    ['maxPositionConcentration', config.maxPositionConcentration],
    ['maxSectorConcentration', config.maxSectorConcentration],
    ['maxTradesPerDay', config.maxTradesPerDay],
    ['minCashReserve', config.minCashReserve],
    ['maxLeverage', config.maxLeverage],
    ['maxDrawdown', config.maxDrawdown],
  ];
  return new Map(entries.map(([name, value]) => [name, createRiskLimit(name, value)]));
}

/**
 * 读取限额，表中不存在时返回禁用的占位限额
 */
export function getLimit(limits: RiskLimitTable, name: RiskLimitName): RiskLimitState {
  return limits.get(name) ?? createRiskLimit(name, 0);
}

/**
 * 按利用率评估限额
 */
export function evaluateLimitUtilization(
  limit: RiskLimitState,
  value: number,
): { readonly ok: boolean; readonly level: RiskLevel; readonly utilization: number } {
  if (!limit.enabled) {
    return { ok: true, level: 'LOW', utilization: 0 };
  }
  const utilization = value / limit.maxValue;
  if (utilization >= 1) {
    return { ok: false, level: 'CRITICAL', utilization };
  }
  if (utilization >= limit.warningThreshold) {
    return { ok: true, level: 'HIGH', utilization };
  }
  if (utilization >= RISK_THRESHOLDS.MEDIUM_RATIO) {
    return { ok: true, level: 'MEDIUM', utilization };
  }
  return { ok: true, level: 'LOW', utilization };
}

/**
 * 对外快照
 */
export function snapshotLimit(limit: RiskLimitState): RiskLimit {
  return {
    name: limit.name,
    maxValue: limit.maxValue,
    currentValue: limit.currentValue,
    warningThreshold: limit.warningThreshold,
    enabled: limit.enabled,
  };
}
