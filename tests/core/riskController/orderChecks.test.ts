/**
 * 订单风控检查项测试
 *
 * 功能：
 * - 逐项验证五个检查的通过、预警与拒绝边界及消息。
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createOrder } from '../../../src/core/order/index.js';
import {
  checkCashReserve,
  checkConcentration,
  checkDailyLoss,
  checkPositionSize,
  checkTradingFrequency,
} from '../../../src/core/riskController/orderChecks.js';
import { createRiskLimitTable } from '../../../src/core/riskController/riskLimit.js';
import type { OrderCheckContext } from '../../../src/core/riskController/types.js';
import type { RiskConfig } from '../../../src/types/config.js';
import type { TradeSide } from '../../../src/types/trading.js';
import {
  createAccountInfo,
  createPosition,
  createRiskConfigDouble,
} from '../../helpers/testDoubles.js';

type ContextOptions = {
  readonly side?: TradeSide;
  readonly quantity?: number;
  readonly price?: number | null;
  readonly cash?: number;
  readonly totalAssets?: number;
  readonly dailyPnl?: number;
  readonly dailyTrades?: number;
  readonly risk?: Partial<RiskConfig>;
  readonly positions?: OrderCheckContext['positions'];
};

function createContext(options: ContextOptions = {}): OrderCheckContext {
  return {
    order: createOrder({
      symbol: 'AAPL',
      side: options.side ?? 'BUY',
      quantity: options.quantity ?? 10,
      market: 'US',
      price: options.price === undefined ? 150 : options.price,
    }),
    accountInfo: createAccountInfo({
      cash: options.cash ?? 100_000,
      totalAssets: options.totalAssets ?? 100_000,
    }),
    positions: options.positions ?? [],
    limits: createRiskLimitTable(createRiskConfigDouble(options.risk)),
    dailyPnl: options.dailyPnl ?? 0,
    dailyTrades: options.dailyTrades ?? 0,
  };
}

describe('checkPositionSize', () => {
  it('passes small orders at LOW', () => {
    assert.deepEqual(checkPositionSize(createContext()), {
      ok: true,
      level: 'LOW',
      message: '持仓规模检查通过',
    });
  });

  it('uses the fallback price estimate when the order has no price', () => {
    assert.deepEqual(checkPositionSize(createContext({ quantity: 900, price: null })), {
      ok: true,
      level: 'HIGH',
      message: '持仓规模 90000.00 / 100000.00 已使用上限的 90.0%',
    });
  });

  it('fails at CRITICAL when the order reaches the limit', () => {
    assert.deepEqual(checkPositionSize(createContext({ quantity: 1000 })), {
      ok: false,
      level: 'CRITICAL',
      message: '持仓规模 150000.00 / 100000.00 超过单笔上限',
    });
  });
});

describe('checkCashReserve', () => {
  it('always passes sell orders', () => {
    assert.equal(checkCashReserve(createContext({ side: 'SELL', cash: 0 })).ok, true);
  });

  it('warns below one and a half times the reserve', () => {
    assert.deepEqual(checkCashReserve(createContext({ cash: 12_000 })), {
      ok: true,
      level: 'MEDIUM',
      message: '买入后剩余现金接近保留线: 10500.00，最低保留 10000.00',
    });
  });

  it('fails when remaining cash drops below the reserve', () => {
    assert.deepEqual(checkCashReserve(createContext({ cash: 11_000 })), {
      ok: false,
      level: 'CRITICAL',
      message: '买入后剩余现金不足: 9500.00，最低保留 10000.00',
    });
  });
});

describe('checkDailyLoss', () => {
  it('warns within eighty percent of the limit', () => {
    const outcome = checkDailyLoss(createContext({ dailyPnl: -8_500 }));
    assert.equal(outcome.ok, true);
    assert.equal(outcome.level, 'HIGH');
    assert.equal(outcome.tripsCircuitBreaker, false);
  });

  it('fails and asks for the circuit breaker past the limit', () => {
    assert.deepEqual(checkDailyLoss(createContext({ dailyPnl: -10_001 })), {
      ok: false,
      level: 'CRITICAL',
      message: '超过日亏损上限（当日盈亏 -10001.00，上限 -10000.00），触发熔断',
      tripsCircuitBreaker: true,
    });
  });
});

describe('checkTradingFrequency', () => {
  it('warns at ninety percent and fails at the limit', () => {
    assert.equal(checkTradingFrequency(createContext({ dailyTrades: 90 })).level, 'MEDIUM');
    assert.deepEqual(checkTradingFrequency(createContext({ dailyTrades: 100 })), {
      ok: false,
      level: 'CRITICAL',
      message: '当日交易次数已达上限 100 / 100',
    });
  });
});

describe('checkConcentration', () => {
  it('rejects a position above the limit naming both percentages', () => {
    const outcome = checkConcentration(
      createContext({ quantity: 100, price: 200, risk: { maxPositionConcentration: 0.15 } }),
    );
    assert.deepEqual(outcome, {
      ok: false,
      level: 'HIGH',
      message: '持仓集中度 20.0% 超过上限 15.0%',
    });
  });

  it('warns above eighty percent of the limit', () => {
    const outcome = checkConcentration(
      createContext({ quantity: 100, price: 130, risk: { maxPositionConcentration: 0.15 } }),
    );
    assert.deepEqual(outcome, {
      ok: true,
      level: 'MEDIUM',
      message: '持仓集中度 13.0% 接近上限 15.0%',
    });
  });

  it('projects the resulting position from the current holding', () => {
    const positions = [createPosition({ symbol: 'AAPL', quantity: 100, marketValue: 15_000 })];
    const selling = checkConcentration(createContext({ side: 'SELL', quantity: 100, price: null, positions }));
    assert.equal(selling.level, 'LOW');

    const buying = checkConcentration(createContext({ quantity: 50, price: null, positions }));
    assert.deepEqual(buying, {
      ok: false,
      level: 'HIGH',
      message: '持仓集中度 22.5% 超过上限 20.0%',
    });
  });
});
