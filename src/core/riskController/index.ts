/**
 * 风险管理模块（门面模式）
 *
 * 协调五项独立检查，提供统一的订单风控接口：
 * - 持仓规模、现金保留、日亏损、交易频率、持仓集中度
 *
 * 状态（仅本模块可修改）：
 * - 当日盈亏、当日交易次数、熔断标志
 * - 成交记录与风险事件（只追加）
 *
 * 交易日状态机：ACTIVE →（日亏损突破）→ HALTED →（香港日切或手动重置）→ ACTIVE。
 * 日切为惰性检查：每次 validateOrder 开始时比较日期键，同一天内重复检查无副作用。
 * 所有方法同步执行，在 Node.js 事件循环中天然原子。
 */
import { RISK_THRESHOLDS } from '../../constants/index.js';
import type { AccountInfo, Position } from '../../types/account.js';
import type {
  RiskCheckOutcome,
  RiskCheckResult,
  RiskEvent,
  RiskLimitName,
  RiskSummary,
  RiskTradeRecord,
} from '../../types/risk.js';
import type { RiskManager } from '../../types/services.js';
import type { Order } from '../../types/trading.js';
import { logger as defaultLogger } from '../../utils/logger/index.js';
import { resolveHongKongDayKey } from '../../utils/time/index.js';
import {
  checkCashReserve,
  checkConcentration,
  checkDailyLoss,
  checkPositionSize,
  checkTradingFrequency,
} from './orderChecks.js';
import { createRiskLimitTable, getLimit, snapshotLimit } from './riskLimit.js';
import type { RiskManagerDeps } from './types.js';
import { maxRiskLevel } from './utils.js';

const CIRCUIT_BREAKER_REASON = '熔断已触发，交易暂停';
const APPROVED_REASON = '所有风控检查通过';

/** 创建风险管理器 */
export function createRiskManager(deps: RiskManagerDeps): RiskManager {
  const now = deps.now ?? (() => new Date());
  const logger = deps.logger ?? defaultLogger;
  const limits = createRiskLimitTable(deps.config);

  // 闭包捕获的会话状态
  let dailyPnl = 0;
  let dailyTrades = 0;
  let dailyVolume = 0;
  let circuitBreakerActive = false;
  let trippedBy: RiskLimitName | null = null;
  let lastResetDay = resolveHongKongDayKey(now());
  const tradeHistory: RiskTradeRecord[] = [];
  const riskEvents: RiskEvent[] = [];

  const syncCounterLimits = (): void => {
    getLimit(limits, 'maxDailyLoss').currentValue = Math.max(0, -dailyPnl);
    getLimit(limits, 'maxTradesPerDay').currentValue = dailyTrades;
  };

  const activateCircuitBreaker = (name: RiskLimitName): void => {
    if (circuitBreakerActive) {
      return;
    }
    circuitBreakerActive = true;
    trippedBy = name;
    logger.error(
      `[风险管理] 触发熔断：当日盈亏 ${dailyPnl.toFixed(2)} 超过日亏损上限 ${getLimit(limits, name).maxValue}，当日停止交易`,
    );
  };

  /**
   * 日切检查：香港日期变化时重置当日计数并解除熔断
   */
  const checkDailyReset = (): void => {
    const today = resolveHongKongDayKey(now());
    if (today === lastResetDay) {
      return;
    }
    logger.info(
      `[风险管理] 交易日切换 ${lastResetDay} → ${today}，重置当日盈亏 ${dailyPnl.toFixed(2)} 与交易次数 ${dailyTrades}`,
    );
    dailyPnl = 0;
    dailyTrades = 0;
    dailyVolume = 0;
    circuitBreakerActive = false;
    trippedBy = null;
    lastResetDay = today;
    syncCounterLimits();
  };

  const recordRiskEvent = (order: Order, message: string, result: RiskCheckResult): void => {
    if (result.riskLevel === 'LOW') {
      return;
    }
    riskEvents.push({ order, message, riskLevel: result.riskLevel, timestamp: now() });
  };

  function validateOrder(
    order: Order,
    accountInfo: AccountInfo,
    positions: ReadonlyArray<Position>,
  ): RiskCheckResult {
    checkDailyReset();

    if (circuitBreakerActive) {
      const result: RiskCheckResult = {
        approved: false,
        reason: CIRCUIT_BREAKER_REASON,
        riskLevel: 'CRITICAL',
      };
      recordRiskEvent(order, CIRCUIT_BREAKER_REASON, result);
      logger.warn(`[风险管理] ${order.side} ${order.symbol} ${order.quantity} 被拒绝：${CIRCUIT_BREAKER_REASON}`);
      return result;
    }

    const ctx = { order, accountInfo, positions, limits, dailyPnl, dailyTrades };
    const dailyLoss = checkDailyLoss(ctx);
    const outcomes: ReadonlyArray<RiskCheckOutcome> = [
      checkPositionSize(ctx),
      checkCashReserve(ctx),
      dailyLoss,
      checkTradingFrequency(ctx),
      checkConcentration(ctx),
    ];
    if (dailyLoss.tripsCircuitBreaker) {
      activateCircuitBreaker('maxDailyLoss');
    }

    const failures = outcomes.filter((outcome) => !outcome.ok);
    const warnings = outcomes.filter((outcome) => outcome.ok && outcome.level !== 'LOW');
    const riskLevel = maxRiskLevel(outcomes.map((outcome) => outcome.level));
    const approved = failures.length === 0;
    const result: RiskCheckResult = {
      approved,
      reason: approved ? APPROVED_REASON : failures.map((outcome) => outcome.message).join('; '),
      riskLevel,
    };

    const eventMessage = approved
      ? warnings.map((outcome) => outcome.message).join('; ')
      : result.reason;
    recordRiskEvent(order, eventMessage, result);

    if (approved) {
      logger.debug(`[风险管理] ${order.side} ${order.symbol} ${order.quantity} 通过，风险等级 ${riskLevel}`);
    } else {
      logger.warn(`[风险管理] ${order.side} ${order.symbol} ${order.quantity} 被拒绝：${result.reason}`);
    }
    return result;
  }

  function recordTrade(order: Order, executedQuantity: number, executionPrice: number): void {
    dailyTrades += 1;
    dailyVolume += executedQuantity * executionPrice;
    syncCounterLimits();
    tradeHistory.push({
      timestamp: now(),
      symbol: order.symbol,
      side: order.side,
      quantity: executedQuantity,
      price: executionPrice,
    });
    logger.debug(`[风险管理] 记录成交 ${order.side} ${order.symbol} ${executedQuantity}@${executionPrice}，当日第 ${dailyTrades} 笔`);
  }

  function updatePnl(delta: number): void {
    if (!Number.isFinite(delta)) {
      logger.warn(`[风险管理] 忽略无效盈亏增量: ${delta}`);
      return;
    }
    dailyPnl += delta;
    syncCounterLimits();

    const dailyLossLimit = getLimit(limits, 'maxDailyLoss');
    if (dailyLossLimit.enabled && dailyPnl < -dailyLossLimit.maxValue) {
      activateCircuitBreaker('maxDailyLoss');
    }
  }

  function resetCircuitBreaker(): void {
    if (!circuitBreakerActive) {
      return;
    }
    circuitBreakerActive = false;
    trippedBy = null;
    logger.warn('[风险管理] 熔断已手动解除');
  }

  function getRiskSummary(): RiskSummary {
    return {
      circuitBreakerActive,
      emergencyStop: circuitBreakerActive,
      circuitBreakers: trippedBy === null ? [] : [trippedBy],
      currentSession: {
        tradesCount: dailyTrades,
        totalVolume: dailyVolume,
        pnl: dailyPnl,
        startDay: lastResetDay,
      },
      dailyPnl,
      dailyTrades,
      limits: [...limits.values()].map(snapshotLimit),
      recentRiskEvents: riskEvents.slice(-RISK_THRESHOLDS.RECENT_EVENTS_LIMIT),
      lastResetDay,
    };
  }

  return {
    validateOrder,
    recordTrade,
    updatePnl,
    resetCircuitBreaker,
    isCircuitBreakerActive: () => circuitBreakerActive,
    getRiskSummary,
    getTradeHistory: () => [...tradeHistory],
    getRiskEvents: () => [...riskEvents],
  };
}
