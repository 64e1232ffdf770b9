/**
 * LongPort 券商
 *
 * 职责：
 * - 通过 LongPort 网关查询账户、持仓、行情并提交订单
 * - 本地代码与 LongPort 代码互转（700.HK ↔ 00700）
 * - 每次 Trade API 调用前经过频率限制器
 * - 提交后查询一次订单状态，映射为 TradeResult
 *
 * 错误处理：SDK 异常在每个方法边界捕获，查询类转换为带分类的失败结果，
 * 下单转换为 FAILED 结果；不做重试。
 */
import type { AccountInfo, Position } from '../../types/account.js';
import type { BrokerCapability, BrokerResult } from '../../types/services.js';
import type { Order, TradeResult } from '../../types/trading.js';
import { formatError } from '../../utils/error/index.js';
import { logger as defaultLogger } from '../../utils/logger/index.js';
import { createFailedTradeResult, createTradeResult } from '../order/index.js';
import { inferMarket } from '../orderTranslator/index.js';
import type { GatewayOrder, LongportBrokerDeps, LongportGateway } from './types.js';
import {
  createTradeCounter,
  fail,
  fromLongportSymbol,
  NOT_CONNECTED_REASON,
  ok,
  toLongportSymbol,
} from './utils.js';

const DEFAULT_ACCOUNT_ID = 'LONGPORT';

function toTradeResult(order: Order, detail: GatewayOrder): TradeResult {
  return createTradeResult({
    orderId: detail.orderId,
    symbol: order.symbol,
    side: order.side,
    quantity: order.quantity,
    filledQuantity: detail.executedQuantity,
    avgPrice: detail.executedPrice,
    status: detail.status,
    submitTime: detail.submittedAt,
    updateTime: detail.updatedAt,
    errorMsg: detail.message === '' ? null : detail.message,
  });
}

export function createLongportBroker(deps: LongportBrokerDeps): BrokerCapability {
  const { connectGateway, rateLimiter } = deps;
  const accountId = deps.accountId ?? DEFAULT_ACCOUNT_ID;
  const now = deps.now ?? (() => new Date());
  const logger = deps.logger ?? defaultLogger;

  let gateway: LongportGateway | null = null;
  const counter = createTradeCounter();

  async function connect(): Promise<boolean> {
    if (gateway !== null) {
      return true;
    }
    try {
      gateway = await connectGateway();
      logger.info('[LongPort] 交易与行情上下文已建立');
      return true;
    } catch (err) {
      logger.error(`[LongPort] 连接失败: ${formatError(err)}`);
      return false;
    }
  }

  async function disconnect(): Promise<boolean> {
    if (gateway !== null) {
      gateway = null;
      logger.info('[LongPort] 已断开');
    }
    return true;
  }

  async function getAccountInfo(): Promise<BrokerResult<AccountInfo>> {
    if (gateway === null) {
      return fail('connection', NOT_CONNECTED_REASON);
    }
    try {
      await rateLimiter.throttle();
      const balance = await gateway.getAccountBalance();
      if (balance === null) {
        return fail('data', '账户余额为空');
      }
      if (!Number.isFinite(balance.netAssets) || !Number.isFinite(balance.totalCash)) {
        return fail('data', '账户余额数据无效');
      }
      return ok({
        accountId,
        totalAssets: balance.netAssets,
        cash: balance.totalCash,
        marketValue: balance.netAssets - balance.totalCash,
        unrealizedPnl: 0,
        realizedPnl: 0,
        buyingPower: Number.isFinite(balance.buyPower) ? balance.buyPower : 0,
      });
    } catch (err) {
      logger.error(`[LongPort] 查询账户失败: ${formatError(err)}`);
      return fail('data', `查询账户失败: ${formatError(err)}`);
    }
  }

  async function getPositions(): Promise<BrokerResult<ReadonlyArray<Position>>> {
    if (gateway === null) {
      return fail('connection', NOT_CONNECTED_REASON);
    }
    try {
      await rateLimiter.throttle();
      const raw = (await gateway.getStockPositions()).filter(
        (position) => Number.isFinite(position.quantity) && position.quantity !== 0,
      );
      const prices = await gateway.getLastPrices(raw.map((position) => position.symbol));
      return ok(
        raw.map((position) => {
          const costPrice = Number.isFinite(position.costPrice) ? position.costPrice : 0;
          const marketPrice = prices.get(position.symbol) ?? costPrice;
          return {
            symbol: fromLongportSymbol(position.symbol),
            quantity: position.quantity,
            avgCost: costPrice,
            marketValue: position.quantity * marketPrice,
            unrealizedPnl: (marketPrice - costPrice) * position.quantity,
            marketPrice,
          };
        }),
      );
    } catch (err) {
      logger.error(`[LongPort] 查询持仓失败: ${formatError(err)}`);
      return fail('data', `查询持仓失败: ${formatError(err)}`);
    }
  }

  async function getMarketPrice(symbol: string): Promise<BrokerResult<number>> {
    if (gateway === null) {
      return fail('connection', NOT_CONNECTED_REASON);
    }
    const longportSymbol = toLongportSymbol(symbol, inferMarket(symbol));
    try {
      const prices = await gateway.getLastPrices([longportSymbol]);
      const price = prices.get(longportSymbol);
      return price === undefined ? fail('data', `无法获取 ${symbol} 的行情价格`) : ok(price);
    } catch (err) {
      logger.warn(`[LongPort] 获取 ${longportSymbol} 行情失败: ${formatError(err)}`);
      return fail('data', `获取行情失败: ${formatError(err)}`);
    }
  }

  /**
   * 有成交但券商未回报成交均价时，以最新行情价补齐；取价失败则保持均价为空
   */
  async function priceUnpricedFill(result: TradeResult, longportSymbol: string): Promise<TradeResult> {
    if (gateway === null || result.filledQuantity <= 0 || result.avgPrice !== null) {
      return result;
    }
    try {
      const price = (await gateway.getLastPrices([longportSymbol])).get(longportSymbol);
      if (price === undefined) {
        logger.warn(`[LongPort] 订单 ${result.orderId} 未回报成交均价，且无法获取 ${longportSymbol} 最新价`);
        return result;
      }
      logger.warn(`[LongPort] 订单 ${result.orderId} 未回报成交均价，按最新价 ${price} 记录`);
      return { ...result, avgPrice: price };
    } catch (err) {
      logger.warn(`[LongPort] 订单 ${result.orderId} 补取成交价失败: ${formatError(err)}`);
      return result;
    }
  }

  async function submitOrder(order: Order): Promise<TradeResult> {
    const submitTime = now();
    if (gateway === null) {
      counter.recordFailure();
      return createFailedTradeResult(order, 'FAILED', NOT_CONNECTED_REASON, submitTime);
    }

    const longportSymbol = toLongportSymbol(order.symbol, order.market);
    let orderId: string;
    try {
      await rateLimiter.throttle();
      orderId = await gateway.submitOrder({
        symbol: longportSymbol,
        side: order.side,
        orderType: order.orderType,
        quantity: order.quantity,
        price: order.orderType === 'LIMIT' || order.orderType === 'STOP_LIMIT' ? order.price : null,
        triggerPrice: order.stopPrice,
        remark: 'live-trading-executor',
      });
    } catch (err) {
      counter.recordFailure();
      logger.error(`[LongPort] ${order.side} ${longportSymbol} ${order.quantity} 提交失败: ${formatError(err)}`);
      return createFailedTradeResult(order, 'FAILED', `提交订单失败: ${formatError(err)}`, submitTime);
    }

    logger.info(`[LongPort] 订单已提交 ${orderId}: ${order.side} ${longportSymbol} ${order.quantity}`);
    let result: TradeResult;
    try {
      await rateLimiter.throttle();
      const detail = await gateway.getOrder(orderId);
      result =
        detail === null
          ? createTradeResult({
              orderId,
              symbol: order.symbol,
              side: order.side,
              quantity: order.quantity,
              status: 'SUBMITTED',
              submitTime,
            })
          : toTradeResult(order, detail);
    } catch (err) {
      logger.warn(`[LongPort] 查询订单 ${orderId} 状态失败，按已提交处理: ${formatError(err)}`);
      result = createTradeResult({
        orderId,
        symbol: order.symbol,
        side: order.side,
        quantity: order.quantity,
        status: 'SUBMITTED',
        submitTime,
      });
    }

    result = await priceUnpricedFill(result, longportSymbol);

    if (result.status === 'REJECTED' || result.status === 'FAILED') {
      counter.recordFailure();
    } else {
      counter.recordSuccess();
    }
    return result;
  }

  async function cancelOrder(orderId: string): Promise<boolean> {
    if (gateway === null) {
      return false;
    }
    try {
      await rateLimiter.throttle();
      await gateway.cancelOrder(orderId);
      logger.info(`[LongPort] 订单 ${orderId} 已撤销`);
      return true;
    } catch (err) {
      logger.warn(`[LongPort] 撤销订单 ${orderId} 失败: ${formatError(err)}`);
      return false;
    }
  }

  async function getOrderStatus(orderId: string): Promise<BrokerResult<TradeResult>> {
    if (gateway === null) {
      return fail('connection', NOT_CONNECTED_REASON);
    }
    try {
      await rateLimiter.throttle();
      const detail = await gateway.getOrder(orderId);
      if (detail === null) {
        return fail('data', `订单不存在: ${orderId}`);
      }
      const symbol = fromLongportSymbol(detail.symbol);
      return ok(
        createTradeResult({
          orderId: detail.orderId,
          symbol,
          side: detail.side,
          quantity: detail.quantity,
          filledQuantity: detail.executedQuantity,
          avgPrice: detail.executedPrice,
          status: detail.status,
          submitTime: detail.submittedAt,
          updateTime: detail.updatedAt,
          errorMsg: detail.message === '' ? null : detail.message,
        }),
      );
    } catch (err) {
      return fail('data', `查询订单失败: ${formatError(err)}`);
    }
  }

  return {
    name: 'longport',
    connect,
    disconnect,
    isConnected: () => gateway !== null,
    getAccountInfo,
    getPositions,
    getMarketPrice,
    submitOrder,
    cancelOrder,
    getOrderStatus,
    getTradeSummary: counter.summary,
  };
}
