/**
 * LongPort SDK 适配层
 *
 * 职责：
 * - 创建 TradeContext / QuoteContext
 * - 在 SDK 的 Decimal、枚举与本地数值类型之间转换
 * - 将 LongPort 订单状态映射为本地订单状态
 *
 * 适配层不做异常处理，SDK 异常由 longportBroker 在每次调用边界转换为失败结果。
 */
import {
  Decimal,
  OrderSide,
  OrderStatus,
  OrderType,
  QuoteContext,
  TimeInForceType,
  TradeContext,
} from 'longport';
import type { Config, Order as LongportOrder } from 'longport';
import type {
  OrderStatus as LocalOrderStatus,
  OrderType as LocalOrderType,
} from '../../types/trading.js';
import { formatError } from '../../utils/error/index.js';
import { logger } from '../../utils/logger/index.js';
import type { GatewayOrder, LongportGateway, QuoteSource } from './types.js';
import { toLongportSymbol } from './utils.js';
import { inferMarket } from '../orderTranslator/index.js';

const ORDER_TYPE_TO_LONGPORT: Readonly<Record<LocalOrderType, OrderType>> = {
  MARKET: OrderType.MO,
  LIMIT: OrderType.LO,
  STOP: OrderType.MIT,
  STOP_LIMIT: OrderType.LIT,
};

const STATUS_FROM_LONGPORT: ReadonlyMap<OrderStatus, LocalOrderStatus> = new Map([
  [OrderStatus.Filled, 'FILLED'],
  [OrderStatus.PartialFilled, 'PARTIALLY_FILLED'],
  [OrderStatus.Canceled, 'CANCELLED'],
  [OrderStatus.PartialWithdrawal, 'CANCELLED'],
  [OrderStatus.Expired, 'CANCELLED'],
  [OrderStatus.Rejected, 'REJECTED'],
  [OrderStatus.NotReported, 'PENDING'],
  [OrderStatus.WaitToNew, 'PENDING'],
]);

const toDecimal = (value: number): Decimal => new Decimal(value.toString());

/**
 * Decimal 转 number；空值返回 NaN，由调用方按有限性判断
 */
const decimalToNumber = (value: Decimal | null | undefined): number =>
  value === null || value === undefined ? Number.NaN : value.toNumber();

/**
 * 映射订单状态，未列出的状态（New、WaitToReplace 等）视为已提交
 */
export function mapLongportStatus(status: OrderStatus): LocalOrderStatus {
  return STATUS_FROM_LONGPORT.get(status) ?? 'SUBMITTED';
}

function toGatewayOrder(order: LongportOrder): GatewayOrder {
  const executedQuantity = decimalToNumber(order.executedQuantity);
  const executedPrice = decimalToNumber(order.executedPrice);
  return {
    orderId: order.orderId,
    symbol: order.symbol,
    side: order.side === OrderSide.Buy ? 'BUY' : 'SELL',
    status: mapLongportStatus(order.status),
    quantity: decimalToNumber(order.quantity),
    executedQuantity: Number.isFinite(executedQuantity) ? executedQuantity : 0,
    executedPrice: Number.isFinite(executedPrice) && executedPrice > 0 ? executedPrice : null,
    submittedAt: order.submittedAt,
    updatedAt: order.updatedAt ?? null,
    message: order.msg,
  };
}

/**
 * 基于已创建的上下文构造交易网关
 */
export function createLongportGateway(tradeCtx: TradeContext, quoteCtx: QuoteContext): LongportGateway {
  return {
    async submitOrder(request) {
      const response = await tradeCtx.submitOrder({
        symbol: request.symbol,
        orderType: ORDER_TYPE_TO_LONGPORT[request.orderType],
        side: request.side === 'BUY' ? OrderSide.Buy : OrderSide.Sell,
        submittedQuantity: toDecimal(request.quantity),
        timeInForce: TimeInForceType.Day,
        ...(request.price === null ? {} : { submittedPrice: toDecimal(request.price) }),
        ...(request.triggerPrice === null ? {} : { triggerPrice: toDecimal(request.triggerPrice) }),
        remark: request.remark,
      });
      return response.orderId;
    },

    async cancelOrder(orderId) {
      await tradeCtx.cancelOrder(orderId);
    },

    async getOrder(orderId) {
      const orders = await tradeCtx.todayOrders({ orderId });
      const order = orders.find((item) => item.orderId === orderId);
      return order === undefined ? null : toGatewayOrder(order);
    },

    async getAccountBalance() {
      const balances = await tradeCtx.accountBalance();
      const primary = balances[0];
      if (primary === undefined) {
        return null;
      }
      return {
        currency: primary.currency,
        totalCash: decimalToNumber(primary.totalCash),
        netAssets: decimalToNumber(primary.netAssets),
        buyPower: decimalToNumber(primary.buyPower),
      };
    },

    async getStockPositions() {
      const response = await tradeCtx.stockPositions();
      return response.channels.flatMap((channel) =>
        channel.positions.map((position) => ({
          symbol: position.symbol,
          quantity: decimalToNumber(position.quantity),
          costPrice: decimalToNumber(position.costPrice),
        })),
      );
    },

    async getLastPrices(symbols) {
      const prices = new Map<string, number>();
      if (symbols.length === 0) {
        return prices;
      }
      const quotes = await quoteCtx.quote([...symbols]);
      for (const quote of quotes) {
        const lastDone = decimalToNumber(quote.lastDone);
        if (Number.isFinite(lastDone) && lastDone > 0) {
          prices.set(quote.symbol, lastDone);
        }
      }
      return prices;
    },
  };
}

/**
 * 建立 LongPort 连接并返回交易网关
 */
export async function connectLongportGateway(config: Config): Promise<LongportGateway> {
  const [tradeCtx, quoteCtx] = await Promise.all([TradeContext.new(config), QuoteContext.new(config)]);
  return createLongportGateway(tradeCtx, quoteCtx);
}

/**
 * 基于 LongPort 行情的取价来源（dry run 模式使用真实行情、模拟成交）
 * QuoteContext 在首次取价时创建；创建失败后下次取价重试。
 */
export function createLongportQuoteSource(config: Config): QuoteSource {
  let ctxPromise: Promise<QuoteContext> | null = null;

  return {
    async getLastPrice(symbol) {
      ctxPromise ??= QuoteContext.new(config);
      try {
        const ctx = await ctxPromise;
        const longportSymbol = toLongportSymbol(symbol, inferMarket(symbol));
        const quotes = await ctx.quote([longportSymbol]);
        const lastDone = decimalToNumber(quotes[0]?.lastDone);
        return Number.isFinite(lastDone) && lastDone > 0 ? lastDone : null;
      } catch (err) {
        ctxPromise = null;
        logger.warn(`[行情] 获取 ${symbol} 最新价失败: ${formatError(err)}`);
        return null;
      }
    },
  };
}
