/**
 * 交易会话测试
 *
 * 功能：
 * - 按决策顺序执行并逐个标的记录结果
 * - 取价失败、执行失败与处理异常互不影响
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createRiskManager } from '../../src/core/riskController/index.js';
import { createPortfolio, createTradeExecutor } from '../../src/core/trader/index.js';
import {
  EXECUTION_FAILED_REASON,
  NO_MARKET_PRICE_REASON,
  runTradingSession,
} from '../../src/main/session/index.js';
import type { BrokerCapability } from '../../src/types/services.js';
import type { TradeAction, TradingDecision } from '../../src/types/trading.js';
import {
  createBrokerDouble,
  createRecordingLogger,
  createRiskConfigDouble,
  createTradingConfigDouble,
} from '../helpers/testDoubles.js';

const decision = (action: TradeAction, quantity: number): TradingDecision => ({
  action,
  quantity,
  confidence: 80,
  reasoning: 'test',
});

async function runWith(broker: BrokerCapability, decisions: ReadonlyMap<string, TradingDecision>) {
  const logger = createRecordingLogger();
  const riskManager = createRiskManager({ config: createRiskConfigDouble(), logger });
  const executor = createTradeExecutor({
    broker,
    riskManager,
    config: createTradingConfigDouble(),
    journal: null,
    logger,
  });
  const portfolio = createPortfolio({ initialCash: 100_000, marginRequirement: 0.5 });
  const result = await runTradingSession({ executor, broker, riskManager, decisions, portfolio, logger });
  return { result, portfolio, executor };
}

describe('runTradingSession', () => {
  it('executes decisions and records an outcome per ticker', async () => {
    const broker = createBrokerDouble({ prices: { AAPL: 150, MSFT: 100, GOOG: 120 } });
    const decisions = new Map<string, TradingDecision>([
      ['AAPL', decision('buy', 10)],
      ['MSFT', decision('hold', 10)],
      ['TSLA', decision('buy', 5)],
      ['GOOG', decision('sell', 5)],
    ]);

    const { result, portfolio, executor } = await runWith(broker, decisions);

    assert.deepEqual(
      [...result.executionResults.entries()],
      [
        ['AAPL', { status: 'executed', quantity: 10, price: 150, value: 1_500 }],
        ['TSLA', { status: 'failed', reason: NO_MARKET_PRICE_REASON }],
        ['GOOG', { status: 'failed', reason: EXECUTION_FAILED_REASON }],
      ],
    );
    assert.deepEqual(result.executionSummary, { totalDecisions: 4, successfulTrades: 1, totalValue: 1_500 });
    assert.equal(result.riskSummary.dailyTrades, 1);
    assert.equal(result.finalAccount?.executionStats.totalTrades, 2);
    assert.equal(portfolio.getPosition('AAPL').long, 10);
    assert.equal(executor.getFailedTrades()[0]?.error, '可卖数量不足：需要 5，可用 0');
  });

  it('skips non-positive quantities without fetching a price', async () => {
    const broker = createBrokerDouble({ prices: { AAPL: 150 } });
    const { result } = await runWith(broker, new Map([['AAPL', decision('buy', 0)]]));

    assert.equal(result.executionResults.size, 0);
    assert.equal(broker.calls.includes('getMarketPrice:AAPL'), false);
  });

  it('records a thrown price lookup as an error and continues', async () => {
    const base = createBrokerDouble({ prices: { MSFT: 100 } });
    const broker: BrokerCapability = {
      ...base,
      getMarketPrice: async (symbol) => {
        if (symbol === 'AAPL') {
          throw new Error('quote service down');
        }
        return base.getMarketPrice(symbol);
      },
    };
    const decisions = new Map<string, TradingDecision>([
      ['AAPL', decision('buy', 1)],
      ['MSFT', decision('buy', 1)],
    ]);

    const { result } = await runWith(broker, decisions);

    assert.deepEqual(result.executionResults.get('AAPL'), { status: 'error', reason: 'quote service down' });
    assert.equal(result.executionResults.get('MSFT')?.status, 'executed');
  });
});
