/**
 * 订单风控检查项
 *
 * 五项相互独立的检查，均为纯函数：
 * - checkPositionSize: 订单金额相对单笔持仓上限
 * - checkCashReserve: 买入后剩余现金相对最低保留额（卖出直接通过）
 * - checkDailyLoss: 当日盈亏相对日亏损上限，突破时要求触发熔断
 * - checkTradingFrequency: 当日交易次数相对上限
 * - checkConcentration: 成交后单标的市值占净资产比例
 */
import { RISK_THRESHOLDS } from '../../constants/index.js';
import type { RiskCheckOutcome } from '../../types/risk.js';
import { formatPercent } from '../../utils/primitives/index.js';
import { evaluateLimitUtilization, getLimit } from './riskLimit.js';
import type { DailyLossOutcome, OrderCheckContext } from './types.js';
import { estimateOrderPrice, estimateOrderValue } from './utils.js';

const pass = (message: string): RiskCheckOutcome => ({ ok: true, level: 'LOW', message });

export function checkPositionSize(ctx: OrderCheckContext): RiskCheckOutcome {
  const limit = getLimit(ctx.limits, 'maxPositionSize');
  const value = estimateOrderValue(ctx.order);
  const result = evaluateLimitUtilization(limit, value);
  const detail = `${value.toFixed(2)} / ${limit.maxValue.toFixed(2)}`;

  if (!result.ok) {
    return { ok: false, level: result.level, message: `持仓规模 ${detail} 超过单笔上限` };
  }
  if (result.level === 'LOW') {
    return pass('持仓规模检查通过');
  }
  return {
    ok: true,
    level: result.level,
    message: `持仓规模 ${detail} 已使用上限的 ${formatPercent(result.utilization)}`,
  };
}

export function checkCashReserve(ctx: OrderCheckContext): RiskCheckOutcome {
  if (ctx.order.side === 'SELL') {
    return pass('卖出订单无需检查现金保留');
  }
  const limit = getLimit(ctx.limits, 'minCashReserve');
  if (!limit.enabled) {
    return pass('现金保留检查未启用');
  }

  const remaining = ctx.accountInfo.cash - ctx.order.quantity * estimateOrderPrice(ctx.order);
  const detail = `${remaining.toFixed(2)}，最低保留 ${limit.maxValue.toFixed(2)}`;
  if (remaining < limit.maxValue) {
    return { ok: false, level: 'CRITICAL', message: `买入后剩余现金不足: ${detail}` };
  }
  if (remaining < limit.maxValue * RISK_THRESHOLDS.CASH_RESERVE_WARNING_MULTIPLIER) {
    return { ok: true, level: 'MEDIUM', message: `买入后剩余现金接近保留线: ${detail}` };
  }
  return pass('现金保留检查通过');
}

export function checkDailyLoss(ctx: OrderCheckContext): DailyLossOutcome {
  const limit = getLimit(ctx.limits, 'maxDailyLoss');
  if (!limit.enabled) {
    return { ...pass('日亏损检查未启用'), tripsCircuitBreaker: false };
  }

  const detail = `当日盈亏 ${ctx.dailyPnl.toFixed(2)}，上限 -${limit.maxValue.toFixed(2)}`;
  if (ctx.dailyPnl < -limit.maxValue) {
    return {
      ok: false,
      level: 'CRITICAL',
      message: `超过日亏损上限（${detail}），触发熔断`,
      tripsCircuitBreaker: true,
    };
  }
  if (ctx.dailyPnl < -limit.maxValue * limit.warningThreshold) {
    return {
      ok: true,
      level: 'HIGH',
      message: `接近日亏损上限（${detail}）`,
      tripsCircuitBreaker: false,
    };
  }
  return { ...pass('日亏损检查通过'), tripsCircuitBreaker: false };
}

export function checkTradingFrequency(ctx: OrderCheckContext): RiskCheckOutcome {
  const limit = getLimit(ctx.limits, 'maxTradesPerDay');
  if (!limit.enabled) {
    return pass('交易频率检查未启用');
  }

  const detail = `${ctx.dailyTrades} / ${limit.maxValue}`;
  if (ctx.dailyTrades >= limit.maxValue) {
    return { ok: false, level: 'CRITICAL', message: `当日交易次数已达上限 ${detail}` };
  }
  if (ctx.dailyTrades >= limit.maxValue * RISK_THRESHOLDS.FREQUENCY_WARNING_RATIO) {
    return { ok: true, level: 'MEDIUM', message: `当日交易次数接近上限 ${detail}` };
  }
  return pass('交易频率检查通过');
}

export function checkConcentration(ctx: OrderCheckContext): RiskCheckOutcome {
  const limit = getLimit(ctx.limits, 'maxPositionConcentration');
  if (!limit.enabled) {
    return pass('集中度检查未启用');
  }
  const portfolioValue = ctx.accountInfo.totalAssets;
  if (!(portfolioValue > 0)) {
    return pass('账户净资产不可用，跳过集中度检查');
  }

  const { order } = ctx;
  const position = ctx.positions.find((item) => item.symbol === order.symbol) ?? null;
  const currentQuantity = position?.quantity ?? 0;
  const newQuantity =
    order.side === 'BUY' ? currentQuantity + order.quantity : currentQuantity - order.quantity;

  let price = order.price;
  if (price === null && position !== null && position.quantity !== 0) {
    price = position.marketValue / Math.max(Math.abs(position.quantity), 1);
  }
  const estimatedPrice = price !== null && price > 0 ? price : estimateOrderPrice(order);

  const concentration = Math.abs(newQuantity * estimatedPrice) / portfolioValue;
  const detail = `持仓集中度 ${formatPercent(concentration)}`;
  if (concentration > limit.maxValue) {
    return {
      ok: false,
      level: 'HIGH',
      message: `${detail} 超过上限 ${formatPercent(limit.maxValue)}`,
    };
  }
  if (concentration > limit.maxValue * limit.warningThreshold) {
    return {
      ok: true,
      level: 'MEDIUM',
      message: `${detail} 接近上限 ${formatPercent(limit.maxValue)}`,
    };
  }
  return pass('集中度检查通过');
}
