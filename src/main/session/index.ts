/**
 * 交易会话模块
 *
 * 功能/职责：
 * - 按决策顺序逐个标的执行：跳过 hold 与非正数量，取价后交由执行器下单
 * - 每个标的独立记录结果（executed / failed / error），单个标的异常不中断批次
 * - 汇总成交数量、成交金额、风控状态与最终账户
 *
 * 连接与断开由调用方负责。
 */
import { EXECUTION } from '../../constants/index.js';
import type { AccountSummary } from '../../types/services.js';
import { withTimeout } from '../../utils/async/index.js';
import { formatError } from '../../utils/error/index.js';
import { logger as defaultLogger } from '../../utils/logger/index.js';
import type { TickerOutcome, TradingSessionDeps, TradingSessionResult } from './types.js';

export type { TickerOutcome, TradingSessionResult } from './types.js';

export const NO_MARKET_PRICE_REASON = '无法获取行情价格';
export const EXECUTION_FAILED_REASON = '执行失败';

export async function runTradingSession(deps: TradingSessionDeps): Promise<TradingSessionResult> {
  const { executor, broker, riskManager, decisions, portfolio } = deps;
  const priceTimeoutMs = deps.priceTimeoutMs ?? EXECUTION.DEFAULT_BROKER_CALL_TIMEOUT_MS;
  const logger = deps.logger ?? defaultLogger;

  const executionResults = new Map<string, TickerOutcome>();
  let successfulTrades = 0;
  let totalValue = 0;

  for (const [ticker, decision] of decisions) {
    const { action, quantity } = decision;
    if (action === 'hold' || quantity <= 0) {
      continue;
    }

    try {
      const price = await withTimeout(broker.getMarketPrice(ticker), priceTimeoutMs, `获取 ${ticker} 行情`);
      if (price.status === 'error' || !(price.value > 0)) {
        logger.warn(`[交易会话] ${ticker}: ${NO_MARKET_PRICE_REASON}`);
        executionResults.set(ticker, { status: 'failed', reason: NO_MARKET_PRICE_REASON });
        continue;
      }
      const currentPrice = price.value;

      const executed = await executor.execute(ticker, action, quantity, currentPrice, portfolio);
      if (executed > 0) {
        const value = executed * currentPrice;
        successfulTrades += 1;
        totalValue += value;
        executionResults.set(ticker, { status: 'executed', quantity: executed, price: currentPrice, value });
        logger.info(`[交易会话] ${ticker}: ${action} ${executed} @ ${currentPrice.toFixed(2)}（${value.toFixed(2)}）`);
      } else {
        executionResults.set(ticker, { status: 'failed', reason: EXECUTION_FAILED_REASON });
        logger.warn(`[交易会话] ${ticker}: ${action} ${EXECUTION_FAILED_REASON}`);
      }
    } catch (err) {
      const reason = formatError(err);
      executionResults.set(ticker, { status: 'error', reason });
      logger.error(`[交易会话] ${ticker}: 处理异常 ${reason}`);
    }
  }

  const riskSummary = riskManager.getRiskSummary();
  let finalAccount: AccountSummary | null = null;
  try {
    finalAccount = await executor.getAccountSummary();
  } catch (err) {
    logger.warn(`[交易会话] 获取最终账户失败: ${formatError(err)}`);
  }

  logger.info(
    `[交易会话] 完成：成功 ${successfulTrades}/${decisions.size}，成交金额 ${totalValue.toFixed(2)}，熔断 ${riskSummary.emergencyStop ? '已触发' : '未触发'}`,
  );

  return {
    executionResults,
    executionSummary: {
      totalDecisions: decisions.size,
      successfulTrades,
      totalValue,
    },
    riskSummary,
    finalAccount,
  };
}
