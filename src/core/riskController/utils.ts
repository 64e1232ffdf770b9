import { RISK_THRESHOLDS } from '../../constants/index.js';
import type { RiskLevel } from '../../types/risk.js';
import type { Order } from '../../types/trading.js';

const LEVEL_SEVERITY: Readonly<Record<RiskLevel, number>> = {
  LOW: 0,
  MEDIUM: 1,
  HIGH: 2,
  CRITICAL: 3,
};

/**
 * 取最高风险等级，空列表返回 LOW
 */
export function maxRiskLevel(levels: ReadonlyArray<RiskLevel>): RiskLevel {
  let result: RiskLevel = 'LOW';
  for (const level of levels) {
    if (LEVEL_SEVERITY[level] > LEVEL_SEVERITY[result]) {
      result = level;
    }
  }
  return result;
}

/**
 * 订单估算单价：有价格用价格，否则使用固定估算价
 */
export function estimateOrderPrice(order: Order): number {
  return order.price ?? RISK_THRESHOLDS.FALLBACK_PRICE_ESTIMATE;
}

/**
 * 订单估算金额
 */
export function estimateOrderValue(order: Order): number {
  return order.quantity * estimateOrderPrice(order);
}
