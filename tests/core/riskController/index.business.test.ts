/**
 * 风险管理器业务测试
 *
 * 功能：
 * - 多项检查聚合后的审批结论与风险等级
 * - 日亏损熔断、手动解除与香港日切重置
 * - 成交记录、盈亏累计与限额快照
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createOrder } from '../../../src/core/order/index.js';
import { createRiskManager } from '../../../src/core/riskController/index.js';
import type { RiskConfig } from '../../../src/types/config.js';
import type { Order } from '../../../src/types/trading.js';
import {
  createAccountInfo,
  createMutableClock,
  createRecordingLogger,
  createRiskConfigDouble,
} from '../../helpers/testDoubles.js';

function buyOrder(quantity: number, price: number = 150): Order {
  return createOrder({ symbol: 'AAPL', side: 'BUY', quantity, market: 'US', price });
}

function createManager(overrides: Partial<RiskConfig> = {}, clock = createMutableClock(new Date('2024-03-15T02:00:00Z'))) {
  const logger = createRecordingLogger();
  const manager = createRiskManager({ config: createRiskConfigDouble(overrides), now: clock.now, logger });
  return { manager, logger, clock };
}

describe('riskManager.validateOrder', () => {
  it('approves a small order at LOW without recording an event', () => {
    const { manager } = createManager();
    const result = manager.validateOrder(buyOrder(10), createAccountInfo(), []);

    assert.deepEqual(result, { approved: true, reason: '所有风控检查通过', riskLevel: 'LOW' });
    assert.equal(manager.getRiskEvents().length, 0);
  });

  it('joins every failing check into one rejection reason', () => {
    const { manager } = createManager();
    const result = manager.validateOrder(buyOrder(1000), createAccountInfo(), []);

    assert.equal(result.approved, false);
    assert.equal(result.riskLevel, 'CRITICAL');
    assert.equal(
      result.reason,
      [
        '持仓规模 150000.00 / 100000.00 超过单笔上限',
        '买入后剩余现金不足: -50000.00，最低保留 10000.00',
        '持仓集中度 150.0% 超过上限 20.0%',
      ].join('; '),
    );
    const events = manager.getRiskEvents();
    assert.equal(events.length, 1);
    assert.equal(events[0]?.message, result.reason);
    assert.equal(events[0]?.riskLevel, 'CRITICAL');
  });

  it('rejects once the daily trade count reaches the limit', () => {
    const { manager } = createManager({ maxTradesPerDay: 2 });
    const order = buyOrder(10);
    manager.recordTrade(order, 10, 150);
    manager.recordTrade(order, 10, 150);

    assert.deepEqual(manager.validateOrder(order, createAccountInfo(), []), {
      approved: false,
      reason: '当日交易次数已达上限 2 / 2',
      riskLevel: 'CRITICAL',
    });
  });
});

describe('riskManager circuit breaker', () => {
  it('halts trading after the daily loss limit is exceeded', () => {
    const { manager, logger } = createManager();
    manager.updatePnl(-10_001);

    assert.equal(manager.isCircuitBreakerActive(), true);
    assert.deepEqual(manager.validateOrder(buyOrder(1), createAccountInfo(), []), {
      approved: false,
      reason: '熔断已触发，交易暂停',
      riskLevel: 'CRITICAL',
    });
    assert.deepEqual(manager.getRiskSummary().circuitBreakers, ['maxDailyLoss']);
    assert.equal(logger.messages.error.length, 1);
  });

  it('does not trip at exactly the limit', () => {
    const { manager } = createManager();
    manager.updatePnl(-10_000);
    assert.equal(manager.isCircuitBreakerActive(), false);
  });

  it('can be reset manually', () => {
    const { manager } = createManager();
    manager.updatePnl(-20_000);
    manager.resetCircuitBreaker();

    const summary = manager.getRiskSummary();
    assert.equal(summary.circuitBreakerActive, false);
    assert.deepEqual(summary.circuitBreakers, []);
    assert.equal(summary.dailyPnl, -20_000);
  });

  it('resets daily counters when the Hong Kong day changes', () => {
    const clock = createMutableClock(new Date('2024-03-15T02:00:00Z'));
    const { manager } = createManager({}, clock);
    manager.recordTrade(buyOrder(10), 10, 150);
    manager.updatePnl(-15_000);
    assert.equal(manager.getRiskSummary().lastResetDay, '2024-03-15');

    clock.set(new Date('2024-03-15T16:30:00Z'));
    const result = manager.validateOrder(buyOrder(10), createAccountInfo(), []);

    assert.equal(result.approved, true);
    const summary = manager.getRiskSummary();
    assert.equal(summary.lastResetDay, '2024-03-16');
    assert.equal(summary.dailyPnl, 0);
    assert.equal(summary.dailyTrades, 0);
    assert.equal(summary.circuitBreakerActive, false);
    assert.equal(manager.getTradeHistory().length, 1);
  });
});

describe('riskManager bookkeeping', () => {
  it('records trades and accumulates session volume', () => {
    const { manager } = createManager();
    manager.recordTrade(buyOrder(10), 10, 150);
    manager.recordTrade(buyOrder(5), 5, 200);

    const summary = manager.getRiskSummary();
    assert.equal(summary.dailyTrades, 2);
    assert.equal(summary.currentSession.tradesCount, 2);
    assert.equal(summary.currentSession.totalVolume, 2_500);
    assert.deepEqual(
      manager.getTradeHistory().map((trade) => [trade.symbol, trade.side, trade.quantity, trade.price]),
      [
        ['AAPL', 'BUY', 10, 150],
        ['AAPL', 'BUY', 5, 200],
      ],
    );
  });

  it('ignores non-finite pnl updates', () => {
    const { manager, logger } = createManager();
    manager.updatePnl(Number.NaN);
    manager.updatePnl(Number.NEGATIVE_INFINITY);

    assert.equal(manager.getRiskSummary().dailyPnl, 0);
    assert.equal(manager.isCircuitBreakerActive(), false);
    assert.equal(logger.messages.warn.length, 2);
  });

  it('exposes a snapshot of every limit with current usage', () => {
    const { manager } = createManager();
    manager.updatePnl(-500);
    manager.recordTrade(buyOrder(1), 1, 150);

    const limits = manager.getRiskSummary().limits;
    assert.equal(limits.length, 9);
    assert.equal(limits.find((limit) => limit.name === 'maxDailyLoss')?.currentValue, 500);
    assert.equal(limits.find((limit) => limit.name === 'maxTradesPerDay')?.currentValue, 1);
  });
});
