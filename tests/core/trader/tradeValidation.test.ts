/**
 * 下单前置检查测试
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createOrder } from '../../../src/core/order/index.js';
import { validateTradePreconditions } from '../../../src/core/trader/tradeValidation.js';
import type { PreconditionInput } from '../../../src/core/trader/types.js';
import type { TradeSide } from '../../../src/types/trading.js';
import { createAccountInfo, createPosition } from '../../helpers/testDoubles.js';

function createInput(side: TradeSide, quantity: number, overrides: Partial<PreconditionInput> = {}): PreconditionInput {
  return {
    order: createOrder({ symbol: 'AAPL', side, quantity, market: 'US', price: 150 }),
    action: side === 'BUY' ? 'buy' : 'sell',
    accountInfo: createAccountInfo(),
    positions: [],
    localLongQuantity: 0,
    isConnected: true,
    estimatedPrice: 150,
    enableShortSelling: false,
    maxOrderValue: 50_000,
    ...overrides,
  };
}

describe('validateTradePreconditions', () => {
  it('passes an affordable buy', () => {
    assert.deepEqual(validateTradePreconditions(createInput('BUY', 10)), { ok: true });
  });

  it('rejects when the gateway is disconnected', () => {
    assert.deepEqual(validateTradePreconditions(createInput('BUY', 10, { isConnected: false })), {
      ok: false,
      category: 'connection',
      reason: '未连接交易网关',
    });
  });

  it('rejects a buy beyond buying power', () => {
    const input = createInput('BUY', 10, { accountInfo: createAccountInfo({ buyingPower: 1_000 }) });
    assert.deepEqual(validateTradePreconditions(input), {
      ok: false,
      category: 'validation',
      reason: '购买力不足：需要 1500.00，可用 1000.00',
    });
  });

  it('rejects a sell beyond the sellable quantity', () => {
    assert.deepEqual(validateTradePreconditions(createInput('SELL', 100)), {
      ok: false,
      category: 'validation',
      reason: '可卖数量不足：需要 100，可用 0',
    });
  });

  it('counts the larger of local and broker holdings as sellable', () => {
    const fromBroker = createInput('SELL', 10, { positions: [createPosition({ quantity: 10 })] });
    assert.deepEqual(validateTradePreconditions(fromBroker), { ok: true });

    const fromLocal = createInput('SELL', 12, {
      positions: [createPosition({ quantity: 10 })],
      localLongQuantity: 12,
    });
    assert.deepEqual(validateTradePreconditions(fromLocal), { ok: true });
  });

  it('rejects short orders unless short selling is enabled', () => {
    const input = createInput('SELL', 10, { action: 'short' });
    assert.deepEqual(validateTradePreconditions(input), {
      ok: false,
      category: 'validation',
      reason: '未启用做空，拒绝开空订单',
    });
    assert.deepEqual(validateTradePreconditions({ ...input, enableShortSelling: true }), { ok: true });
  });

  it('enforces the single order value cap when positive', () => {
    assert.deepEqual(validateTradePreconditions(createInput('BUY', 400)), {
      ok: false,
      category: 'validation',
      reason: '订单金额 60000.00 超过单笔上限 50000.00',
    });
    assert.deepEqual(validateTradePreconditions(createInput('BUY', 400, { maxOrderValue: 0 })), { ok: true });
  });
});
