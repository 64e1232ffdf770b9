/**
 * 订单翻译模块
 *
 * 职责：
 * - 将决策（ticker, action, quantity）转换为候选订单
 * - hold、非正数量返回 null，不产生订单
 * - 根据代码格式推断市场（启发式：5 位数字为港股，6 位数字为 A 股，其余为美股）
 *
 * 动作映射：buy → BUY，sell → SELL，short → SELL，cover → BUY。
 * short 与 sell 在订单方向上无法区分，由执行器按动作区分本地组合的处理方式。
 */
import type {
  ExecutableAction,
  MarketType,
  Order,
  TradeAction,
  TradeSide,
} from '../../types/trading.js';
import { logger } from '../../utils/logger/index.js';
import { createOrder } from '../order/index.js';

const HK_CODE_REGEX = /^\d{5}$/;
const CN_CODE_REGEX = /^\d{6}$/;

const ACTION_SIDE: Readonly<Record<ExecutableAction, TradeSide>> = {
  buy: 'BUY',
  sell: 'SELL',
  short: 'SELL',
  cover: 'BUY',
};

/**
 * 根据代码格式推断市场
 * @param symbol 标的代码，如 "00700"、"600519"、"AAPL"
 */
export function inferMarket(symbol: string): MarketType {
  const code = symbol.trim();
  if (HK_CODE_REGEX.test(code)) {
    return 'HK';
  }
  if (CN_CODE_REGEX.test(code)) {
    return 'CN';
  }
  return 'US';
}

/**
 * 动作对应的订单方向，hold 返回 null
 */
export function resolveSide(action: TradeAction): TradeSide | null {
  return action === 'hold' ? null : ACTION_SIDE[action];
}

/**
 * 将决策翻译为订单
 * 小数数量向下取整为整股；price 为正数时附带（市价单用于估值）。
 *
 * @param ticker 标的代码
 * @param action 决策动作
 * @param quantity 决策数量
 * @param price 当前价格（可选）
 * @returns 候选订单，不需要下单时返回 null
 */
export function translateDecision(
  ticker: string,
  action: TradeAction,
  quantity: number,
  price: number | null = null,
): Order | null {
  const side = resolveSide(action);
  if (side === null) {
    return null;
  }

  const shares = Number.isFinite(quantity) ? Math.floor(quantity) : 0;
  if (shares <= 0) {
    return null;
  }

  const symbol = ticker.trim();
  if (symbol === '') {
    logger.warn(`[订单翻译] 标的代码为空，忽略 ${action} ${shares} 股决策`);
    return null;
  }

  return createOrder({
    symbol,
    side,
    quantity: shares,
    market: inferMarket(symbol),
    orderType: 'MARKET',
    price: price !== null && Number.isFinite(price) && price > 0 ? price : null,
  });
}
