/**
 * 交易执行模块（门面模式）
 *
 * 职责：
 * - 将决策转换为订单，串联风控、前置检查、券商下单与成交回写
 * - 仅按券商确认的成交数量与成交价更新本地组合镜像与风控状态
 * - 统计执行情况，保留有上限的失败记录，可选写入交易日志
 *
 * 单笔执行流程：
 * 1. hold / 数量 <= 0 直接返回 0（不计入交易次数）
 * 2. 查询账户与持仓（带超时）
 * 3. 风控校验 → 前置检查（dry run 同样执行）
 * 4. 提交订单（带超时）
 * 5. 有成交：回写组合镜像、扣佣金、记录风控成交与盈亏；无成交：记录失败
 *
 * 并发：整个 execute 在异步锁内串行执行，同一执行器上的决策不会交错。
 * execute 永不拒绝，所有异常转换为失败记录并返回 0。
 */
import { EXECUTION } from '../../constants/index.js';
import type { AccountInfo, Position } from '../../types/account.js';
import type {
  AccountSummary,
  BrokerErrorKind,
  ExecutionRecord,
  ExecutionReport,
  FailedTradeRecord,
  FailureCategory,
  Portfolio,
  SessionReadiness,
  TradeExecutor,
  TradeJournal,
  TradeJournalEntry,
} from '../../types/services.js';
import type { ExecutableAction, Order, TradeAction, TradeResult } from '../../types/trading.js';
import { createAsyncLock, withTimeout } from '../../utils/async/index.js';
import { formatError, isNamedError } from '../../utils/error/index.js';
import { logger as defaultLogger } from '../../utils/logger/index.js';
import { translateDecision } from '../orderTranslator/index.js';
import { createTradeJournal } from './tradeLogger.js';
import { validateTradePreconditions } from './tradeValidation.js';
import type { TradeExecutorDeps } from './types.js';

export { createPortfolio } from './portfolio.js';
export { createTradeJournal } from './tradeLogger.js';

const toFailureCategory = (kind: BrokerErrorKind): FailureCategory =>
  kind === 'connection' ? 'connection' : kind === 'execution' ? 'execution' : 'data';

export function createTradeExecutor(deps: TradeExecutorDeps): TradeExecutor {
  const { broker, riskManager, config } = deps;
  const now = deps.now ?? (() => new Date());
  const logger = deps.logger ?? defaultLogger;
  const journal: TradeJournal | null =
    deps.journal === undefined ? (config.logTrades ? createTradeJournal({ logger }) : null) : deps.journal;

  const lock = createAsyncLock();
  const executionHistory: ExecutionRecord[] = [];
  const failedTrades: FailedTradeRecord[] = [];
  let totalTrades = 0;
  let successfulTrades = 0;
  let failedCount = 0;
  let totalExecutedValue = 0;
  let totalCommission = 0;

  const callBroker = <T>(label: string, call: () => Promise<T>): Promise<T> =>
    withTimeout(call(), config.brokerCallTimeoutMs, label);

  const writeJournal = (entry: Omit<TradeJournalEntry, 'dryRun'>): void => {
    journal?.record({ ...entry, dryRun: config.dryRun });
  };

  type FailureInput = {
    readonly ticker: string;
    readonly action: TradeAction;
    readonly quantity: number;
    readonly price: number;
    readonly category: FailureCategory;
    readonly error: string;
    readonly order: Order | null;
    readonly result: TradeResult | null;
  };

  const recordFailure = (input: FailureInput): void => {
    failedCount += 1;
    failedTrades.push({
      timestamp: now(),
      ticker: input.ticker,
      action: input.action,
      requestedQty: input.quantity,
      executedQty: 0,
      price: input.price,
      category: input.category,
      error: input.error,
    });
    if (failedTrades.length > EXECUTION.MAX_FAILED_TRADES) {
      failedTrades.splice(0, failedTrades.length - EXECUTION.MAX_FAILED_TRADES);
    }
    logger.warn(`[交易执行] ${input.action} ${input.ticker} ${input.quantity} 失败（${input.category}）：${input.error}`);
    writeJournal({
      orderId: input.result?.orderId === undefined || input.result.orderId === '' ? null : input.result.orderId,
      ticker: input.ticker,
      action: input.action,
      side: input.order?.side ?? null,
      quantity: input.quantity,
      filledQuantity: 0,
      price: input.order?.price ?? null,
      commission: 0,
      status: input.result?.status ?? 'FAILED',
      error: input.error,
    });
  };

  async function executeUnlocked(
    ticker: string,
    action: ExecutableAction,
    quantity: number,
    currentPrice: number,
    portfolio: Portfolio,
  ): Promise<number> {
    let order: Order | null;
    try {
      order = translateDecision(ticker, action, quantity, currentPrice);
    } catch (err) {
      totalTrades += 1;
      recordFailure({
        ticker,
        action,
        quantity,
        price: currentPrice,
        category: 'validation',
        error: `订单参数无效: ${formatError(err)}`,
        order: null,
        result: null,
      });
      return 0;
    }
    if (order === null) {
      return 0;
    }
    totalTrades += 1;
    const failure = (category: FailureCategory, error: string, result: TradeResult | null = null): number => {
      recordFailure({ ticker, action, quantity, price: currentPrice, category, error, order, result });
      return 0;
    };

    try {
      const accountResult = await callBroker('查询账户', () => broker.getAccountInfo());
      if (accountResult.status === 'error') {
        return failure(toFailureCategory(accountResult.kind), `无法获取账户信息: ${accountResult.reason}`);
      }
      const positionsResult = await callBroker('查询持仓', () => broker.getPositions());
      if (positionsResult.status === 'error') {
        return failure(toFailureCategory(positionsResult.kind), `无法获取持仓: ${positionsResult.reason}`);
      }
      const accountInfo = accountResult.value;
      const positions = positionsResult.value;

      const risk = riskManager.validateOrder(order, accountInfo, positions);
      if (!risk.approved) {
        return failure('validation', `风控拒绝: ${risk.reason}`);
      }

      const precondition = validateTradePreconditions({
        order,
        action,
        accountInfo,
        positions,
        localLongQuantity: portfolio.getPosition(ticker).long,
        isConnected: broker.isConnected(),
        estimatedPrice: order.price ?? 0,
        enableShortSelling: config.enableShortSelling,
        maxOrderValue: config.maxOrderValue,
      });
      if (!precondition.ok) {
        return failure(precondition.category, precondition.reason);
      }

      const result = await callBroker('提交订单', () => broker.submitOrder(order));
      if (result.filledQuantity <= 0) {
        const reason = result.errorMsg ?? `订单未成交（状态 ${result.status}）`;
        return failure('execution', reason, result);
      }

      const filled = result.filledQuantity;
      const fillPrice = result.avgPrice ?? currentPrice;
      const fill = portfolio.applyFill(action, ticker, filled, fillPrice);
      if (fill.appliedQuantity < filled) {
        logger.warn(
          `[交易执行] ${ticker} 成交 ${filled} 股，本地组合仅回写 ${fill.appliedQuantity} 股（本地持仓不足）`,
        );
      }
      portfolio.deductCommission(result.commission);
      riskManager.recordTrade(order, filled, fillPrice);
      riskManager.updatePnl(fill.realizedPnl - result.commission);

      successfulTrades += 1;
      totalExecutedValue += filled * fillPrice;
      totalCommission += result.commission;
      executionHistory.push({ ticker, action, result, realizedPnl: fill.realizedPnl });
      writeJournal({
        orderId: result.orderId,
        ticker,
        action,
        side: order.side,
        quantity,
        filledQuantity: filled,
        price: fillPrice,
        commission: result.commission,
        status: result.status,
        error: null,
      });
      logger.info(
        `[交易执行] ${action} ${ticker} 成交 ${filled}/${order.quantity} 股 @ ${fillPrice.toFixed(4)}，订单 ${result.orderId}`,
      );
      return filled;
    } catch (err) {
      const category: FailureCategory = isNamedError(err, 'TimeoutError') ? 'connection' : 'execution';
      return failure(category, formatError(err));
    }
  }

  function execute(
    ticker: string,
    action: TradeAction,
    quantity: number,
    currentPrice: number,
    portfolio: Portfolio,
  ): Promise<number> {
    if (action === 'hold') {
      return Promise.resolve(0);
    }
    return lock.runExclusive(() => executeUnlocked(ticker, action, quantity, currentPrice, portfolio));
  }

  async function connect(): Promise<boolean> {
    try {
      const connected = await callBroker('连接券商', () => broker.connect());
      logger.info(
        `[交易执行] ${config.dryRun ? 'DRY RUN 模式' : '实盘模式'}，券商 ${broker.name} ${connected ? '连接成功' : '连接失败'}`,
      );
      return connected;
    } catch (err) {
      logger.error(`[交易执行] 连接券商失败: ${formatError(err)}`);
      return false;
    }
  }

  async function disconnect(): Promise<boolean> {
    try {
      return await callBroker('断开券商', () => broker.disconnect());
    } catch (err) {
      logger.warn(`[交易执行] 断开券商失败: ${formatError(err)}`);
      return false;
    }
  }

  function getExecutionReport(): ExecutionReport {
    return {
      totalTrades,
      successfulTrades,
      failedTrades: failedCount,
      successRate: totalTrades > 0 ? successfulTrades / totalTrades : 0,
      totalExecutedValue,
      totalCommission,
      recentFailures: failedTrades.slice(-EXECUTION.RECENT_FAILURES_LIMIT),
    };
  }

  async function getAccountSummary(): Promise<AccountSummary> {
    let accountInfo: AccountInfo | null = null;
    let positions: ReadonlyArray<Position> = [];
    try {
      const accountResult = await callBroker('查询账户', () => broker.getAccountInfo());
      if (accountResult.status === 'ok') {
        accountInfo = accountResult.value;
      }
      const positionsResult = await callBroker('查询持仓', () => broker.getPositions());
      if (positionsResult.status === 'ok') {
        positions = positionsResult.value;
      }
    } catch (err) {
      logger.warn(`[交易执行] 获取账户汇总失败: ${formatError(err)}`);
    }
    return {
      dryRun: config.dryRun,
      accountInfo,
      positions,
      tradeSummary: broker.getTradeSummary(),
      executionStats: getExecutionReport(),
    };
  }

  async function validateTradingSession(): Promise<SessionReadiness> {
    if (!broker.isConnected()) {
      return { ready: false, message: '未连接交易网关' };
    }
    try {
      const accountResult = await callBroker('查询账户', () => broker.getAccountInfo());
      if (accountResult.status === 'error') {
        return { ready: false, message: `无法获取账户信息: ${accountResult.reason}` };
      }
      if (accountResult.value.buyingPower <= 0) {
        return { ready: false, message: '购买力不足，无法交易' };
      }
      return { ready: true, message: '交易会话就绪' };
    } catch (err) {
      return { ready: false, message: `会话检查失败: ${formatError(err)}` };
    }
  }

  return {
    connect,
    disconnect,
    isDryRun: () => config.dryRun,
    execute,
    getAccountSummary,
    validateTradingSession,
    getExecutionReport,
    getExecutionHistory: () => [...executionHistory],
    getFailedTrades: () => [...failedTrades],
  };
}
