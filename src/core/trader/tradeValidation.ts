/**
 * 下单前置检查
 *
 * 在风控通过后、提交券商前执行，dry run 模式同样生效：
 * - 网关连接状态
 * - 买入：估算金额不超过购买力
 * - 卖出：未启用做空时，卖出数量不超过可卖数量（券商持仓与本地多头取大；short 动作可卖数量为 0）
 * - 估算金额不超过单笔订单上限（上限 <= 0 不限制）
 */
import type { PreconditionInput, PreconditionResult } from './types.js';

export function validateTradePreconditions(input: PreconditionInput): PreconditionResult {
  const { order, action } = input;
  if (!input.isConnected) {
    return { ok: false, category: 'connection', reason: '未连接交易网关' };
  }

  const orderValue = order.quantity * input.estimatedPrice;

  if (order.side === 'BUY' && orderValue > input.accountInfo.buyingPower) {
    return {
      ok: false,
      category: 'validation',
      reason: `购买力不足：需要 ${orderValue.toFixed(2)}，可用 ${input.accountInfo.buyingPower.toFixed(2)}`,
    };
  }

  if (order.side === 'SELL' && !input.enableShortSelling) {
    if (action === 'short') {
      return { ok: false, category: 'validation', reason: '未启用做空，拒绝开空订单' };
    }
    const brokerQuantity =
      input.positions.find((position) => position.symbol === order.symbol)?.quantity ?? 0;
    const available = Math.max(input.localLongQuantity, brokerQuantity, 0);
    if (available < order.quantity) {
      return {
        ok: false,
        category: 'validation',
        reason: `可卖数量不足：需要 ${order.quantity}，可用 ${available}`,
      };
    }
  }

  if (input.maxOrderValue > 0 && orderValue > input.maxOrderValue) {
    return {
      ok: false,
      category: 'validation',
      reason: `订单金额 ${orderValue.toFixed(2)} 超过单笔上限 ${input.maxOrderValue.toFixed(2)}`,
    };
  }

  return { ok: true };
}
