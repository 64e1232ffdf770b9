/**
 * 订单模型模块
 *
 * 功能/职责：
 * - createOrder：构造并冻结订单，数量非正整数或缺少必要价格时抛出 OrderValidationError
 * - createTradeResult：构造执行结果，统一维护成交数量、均价、错误信息的不变量
 * - createFailedTradeResult：券商调用失败时的 REJECTED / FAILED 结果
 */
import type {
  MarketType,
  Order,
  OrderStatus,
  OrderType,
  TradeResult,
  TradeSide,
} from '../../types/trading.js';

export type OrderParams = {
  readonly symbol: string;
  readonly side: TradeSide;
  readonly quantity: number;
  readonly market: MarketType;
  readonly orderType?: OrderType;
  readonly price?: number | null;
  readonly stopPrice?: number | null;
};

export type OrderValidationError = Error & {
  readonly name: 'OrderValidationError';
  readonly field: string;
};

const createOrderValidationError = (message: string, field: string): OrderValidationError => {
  return Object.assign(new Error(message), { name: 'OrderValidationError' as const, field });
};

const isPositivePrice = (value: number | null | undefined): value is number =>
  typeof value === 'number' && Number.isFinite(value) && value > 0;

/**
 * 构造订单
 * @throws {OrderValidationError} 参数不满足订单不变量时
 */
export function createOrder(params: OrderParams): Order {
  const symbol = params.symbol.trim();
  if (symbol === '') {
    throw createOrderValidationError('订单标的不能为空', 'symbol');
  }
  if (!Number.isInteger(params.quantity) || params.quantity <= 0) {
    throw createOrderValidationError(`订单数量必须为正整数: ${params.quantity}`, 'quantity');
  }

  const orderType = params.orderType ?? 'MARKET';
  const price = params.price ?? null;
  const stopPrice = params.stopPrice ?? null;

  if (price !== null && !isPositivePrice(price)) {
    throw createOrderValidationError(`订单价格无效: ${price}`, 'price');
  }
  if (stopPrice !== null && !isPositivePrice(stopPrice)) {
    throw createOrderValidationError(`触发价格无效: ${stopPrice}`, 'stopPrice');
  }
  if ((orderType === 'LIMIT' || orderType === 'STOP_LIMIT') && price === null) {
    throw createOrderValidationError(`${orderType} 订单必须指定价格`, 'price');
  }
  if ((orderType === 'STOP' || orderType === 'STOP_LIMIT') && stopPrice === null) {
    throw createOrderValidationError(`${orderType} 订单必须指定触发价格`, 'stopPrice');
  }

  return Object.freeze({
    symbol,
    side: params.side,
    quantity: params.quantity,
    orderType,
    price,
    stopPrice,
    market: params.market,
    timeInForce: 'DAY' as const,
  });
}

export type TradeResultParams = {
  readonly orderId: string;
  readonly symbol: string;
  readonly side: TradeSide;
  readonly quantity: number;
  readonly status: OrderStatus;
  readonly submitTime: Date;
  readonly filledQuantity?: number;
  readonly avgPrice?: number | null;
  readonly updateTime?: Date | null;
  readonly errorMsg?: string | null;
  readonly commission?: number;
};

const TERMINAL_ORDER_STATUSES: ReadonlySet<OrderStatus> = new Set([
  'FILLED',
  'CANCELLED',
  'REJECTED',
  'FAILED',
]);

/** 已结束的订单不可再撤销 */
export function isTerminalOrderStatus(status: OrderStatus): boolean {
  return TERMINAL_ORDER_STATUSES.has(status);
}

/**
 * 构造执行结果
 * 成交数量限制在 [0, quantity]；无成交时均价为 null，有成交但券商未回报均价时也为 null；
 * 仅 REJECTED / FAILED 保留错误信息（缺失时填「未知错误」）。
 */
export function createTradeResult(params: TradeResultParams): TradeResult {
  const rawFilled = params.filledQuantity ?? 0;
  const filledQuantity = Number.isFinite(rawFilled)
    ? Math.min(Math.max(rawFilled, 0), params.quantity)
    : 0;
  const avgPrice =
    filledQuantity > 0 && isPositivePrice(params.avgPrice) ? params.avgPrice : null;
  const isError = params.status === 'REJECTED' || params.status === 'FAILED';

  return {
    orderId: params.orderId,
    symbol: params.symbol,
    side: params.side,
    quantity: params.quantity,
    filledQuantity,
    avgPrice,
    status: params.status,
    submitTime: params.submitTime,
    updateTime: params.updateTime ?? null,
    errorMsg: isError ? (params.errorMsg ?? '未知错误') : null,
    commission: params.commission ?? 0,
  };
}

/**
 * 构造失败结果（未成交）
 */
export function createFailedTradeResult(
  order: Order,
  status: 'REJECTED' | 'FAILED',
  errorMsg: string,
  submitTime: Date,
  orderId: string = '',
): TradeResult {
  return createTradeResult({
    orderId,
    symbol: order.symbol,
    side: order.side,
    quantity: order.quantity,
    status,
    submitTime,
    errorMsg,
  });
}
