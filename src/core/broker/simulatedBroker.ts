/**
 * 模拟券商（dry run）
 *
 * 职责：
 * - 以确定性规则模拟成交：按行情价加减固定滑点全部成交，不产生部分成交
 * - 佣金 = max(最低佣金, 成交额 × 佣金费率)
 * - 维护模拟账户的现金与持仓，账户与持仓查询反映历次模拟成交
 * - 本地生成订单号，可按订单号查询结果
 *
 * 取价顺序：注入的行情来源 → 订单自带价格 → 最近一次已知价格；均无时下单失败。
 */
import { SIMULATION } from '../../constants/index.js';
import type { AccountInfo, Position } from '../../types/account.js';
import type { BrokerCapability, BrokerResult } from '../../types/services.js';
import type { Order, TradeResult } from '../../types/trading.js';
import { formatError } from '../../utils/error/index.js';
import { logger as defaultLogger } from '../../utils/logger/index.js';
import { createFailedTradeResult, createTradeResult, isTerminalOrderStatus } from '../order/index.js';
import type { SimulatedBrokerDeps } from './types.js';
import { createTradeCounter, fail, NOT_CONNECTED_REASON, ok } from './utils.js';

type SimulatedHolding = {
  quantity: number;
  avgCost: number;
};

/**
 * 按成交更新带符号持仓：同向加仓加权平均成本，反向减仓保留成本，穿越零轴时以成交价为新成本
 */
function applyToHolding(holding: SimulatedHolding, signedQuantity: number, price: number): void {
  const next = holding.quantity + signedQuantity;
  const sameDirection = holding.quantity === 0 || Math.sign(holding.quantity) === Math.sign(signedQuantity);
  if (sameDirection) {
    holding.avgCost =
      (Math.abs(holding.quantity) * holding.avgCost + Math.abs(signedQuantity) * price) /
      Math.abs(next);
  } else if (next !== 0 && Math.sign(next) !== Math.sign(holding.quantity)) {
    holding.avgCost = price;
  }
  holding.quantity = next;
}

export function createSimulatedBroker(deps: SimulatedBrokerDeps = {}): BrokerCapability {
  const quoteSource = deps.quoteSource ?? null;
  const slippage = deps.slippage ?? SIMULATION.SLIPPAGE;
  const commissionRate = deps.commissionRate ?? SIMULATION.COMMISSION_RATE;
  const minCommission = deps.minCommission ?? SIMULATION.MIN_COMMISSION;
  const accountId = deps.accountId ?? SIMULATION.ACCOUNT_ID;
  const now = deps.now ?? (() => new Date());
  const logger = deps.logger ?? defaultLogger;

  let connected = false;
  let cash = deps.initialCash ?? SIMULATION.INITIAL_CASH;
  let orderSequence = 0;
  const holdings = new Map<string, SimulatedHolding>();
  const lastKnownPrices = new Map<string, number>();
  const orders = new Map<string, TradeResult>();
  const counter = createTradeCounter();

  const fetchQuote = async (symbol: string): Promise<number | null> => {
    if (quoteSource !== null) {
      try {
        const price = await quoteSource.getLastPrice(symbol);
        if (price !== null && Number.isFinite(price) && price > 0) {
          lastKnownPrices.set(symbol, price);
          return price;
        }
      } catch (err) {
        logger.warn(`[模拟券商] 获取 ${symbol} 行情失败: ${formatError(err)}`);
      }
    }
    return null;
  };

  const markPrice = (symbol: string, holding: SimulatedHolding): number =>
    lastKnownPrices.get(symbol) ?? holding.avgCost;

  const buildPositions = (): Position[] =>
    [...holdings.entries()]
      .filter(([, holding]) => holding.quantity !== 0)
      .map(([symbol, holding]) => {
        const marketPrice = markPrice(symbol, holding);
        return {
          symbol,
          quantity: holding.quantity,
          avgCost: holding.avgCost,
          marketValue: holding.quantity * marketPrice,
          unrealizedPnl: (marketPrice - holding.avgCost) * holding.quantity,
          marketPrice,
        };
      });

  async function connect(): Promise<boolean> {
    connected = true;
    logger.info('[模拟券商] 已连接（dry run 模式，不会向真实网关下单）');
    return true;
  }

  async function disconnect(): Promise<boolean> {
    if (connected) {
      connected = false;
      logger.info('[模拟券商] 已断开');
    }
    return true;
  }

  async function getAccountInfo(): Promise<BrokerResult<AccountInfo>> {
    if (!connected) {
      return fail('connection', NOT_CONNECTED_REASON);
    }
    const positions = buildPositions();
    const marketValue = positions.reduce((sum, position) => sum + position.marketValue, 0);
    const unrealizedPnl = positions.reduce((sum, position) => sum + position.unrealizedPnl, 0);
    return ok({
      accountId,
      totalAssets: cash + marketValue,
      cash,
      marketValue,
      unrealizedPnl,
      realizedPnl: 0,
      buyingPower: Math.max(cash, 0),
    });
  }

  async function getPositions(): Promise<BrokerResult<ReadonlyArray<Position>>> {
    if (!connected) {
      return fail('connection', NOT_CONNECTED_REASON);
    }
    return ok(buildPositions());
  }

  async function getMarketPrice(symbol: string): Promise<BrokerResult<number>> {
    if (!connected) {
      return fail('connection', NOT_CONNECTED_REASON);
    }
    const price = (await fetchQuote(symbol)) ?? lastKnownPrices.get(symbol) ?? null;
    if (price === null) {
      return fail('data', `无法获取 ${symbol} 的行情价格`);
    }
    return ok(price);
  }

  async function submitOrder(order: Order): Promise<TradeResult> {
    const submitTime = now();
    if (!connected) {
      counter.recordFailure();
      return createFailedTradeResult(order, 'FAILED', NOT_CONNECTED_REASON, submitTime);
    }

    const basePrice =
      (await fetchQuote(order.symbol)) ?? order.price ?? lastKnownPrices.get(order.symbol) ?? null;
    if (basePrice === null) {
      counter.recordFailure();
      logger.warn(`[模拟券商] ${order.symbol} 无可用价格，模拟下单失败`);
      return createFailedTradeResult(order, 'FAILED', `无法获取 ${order.symbol} 的模拟成交价格`, submitTime);
    }

    const fillPrice = order.side === 'BUY' ? basePrice * (1 + slippage) : basePrice * (1 - slippage);
    const notional = order.quantity * fillPrice;
    const commission = Math.max(minCommission, notional * commissionRate);

    const holding = holdings.get(order.symbol) ?? { quantity: 0, avgCost: 0 };
    applyToHolding(holding, order.side === 'BUY' ? order.quantity : -order.quantity, fillPrice);
    if (holding.quantity === 0) {
      holdings.delete(order.symbol);
    } else {
      holdings.set(order.symbol, holding);
    }
    cash += order.side === 'BUY' ? -notional - commission : notional - commission;
    lastKnownPrices.set(order.symbol, basePrice);

    orderSequence += 1;
    const result = createTradeResult({
      orderId: `DRY-${String(orderSequence).padStart(6, '0')}`,
      symbol: order.symbol,
      side: order.side,
      quantity: order.quantity,
      filledQuantity: order.quantity,
      avgPrice: fillPrice,
      status: 'FILLED',
      submitTime,
      updateTime: now(),
      commission,
    });
    orders.set(result.orderId, result);
    counter.recordSuccess();

    logger.info(
      `[模拟券商] ${result.orderId} ${order.side} ${order.symbol} ${order.quantity} 股 @ ${fillPrice.toFixed(4)}，佣金 ${commission.toFixed(2)}`,
    );
    return result;
  }

  async function cancelOrder(orderId: string): Promise<boolean> {
    if (!connected) {
      return false;
    }
    const result = orders.get(orderId);
    if (result === undefined || isTerminalOrderStatus(result.status)) {
      return false;
    }
    orders.set(orderId, { ...result, status: 'CANCELLED', updateTime: now() });
    logger.info(`[模拟券商] 订单 ${orderId} 已撤销`);
    return true;
  }

  async function getOrderStatus(orderId: string): Promise<BrokerResult<TradeResult>> {
    if (!connected) {
      return fail('connection', NOT_CONNECTED_REASON);
    }
    const result = orders.get(orderId);
    return result === undefined ? fail('data', `订单不存在: ${orderId}`) : ok(result);
  }

  return {
    name: 'simulated',
    connect,
    disconnect,
    isConnected: () => connected,
    getAccountInfo,
    getPositions,
    getMarketPrice,
    submitOrder,
    cancelOrder,
    getOrderStatus,
    getTradeSummary: counter.summary,
  };
}
