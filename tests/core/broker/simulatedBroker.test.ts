/**
 * 模拟券商测试
 *
 * 功能：
 * - 滑点与佣金计算、模拟账户与持仓更新
 * - 取价顺序与无价格时的失败结果
 * - 未连接时的错误分类
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createSimulatedBroker } from '../../../src/core/broker/simulatedBroker.js';
import { createOrder } from '../../../src/core/order/index.js';
import type { Order, TradeSide } from '../../../src/types/trading.js';
import { createRecordingLogger } from '../../helpers/testDoubles.js';

const submitTime = new Date('2024-03-15T02:00:00Z');

function assertClose(actual: number | null | undefined, expected: number): void {
  assert.equal(typeof actual, 'number');
  assert.ok(Math.abs(Number(actual) - expected) < 1e-6, `${String(actual)} != ${expected}`);
}

function order(side: TradeSide, quantity: number, price: number | null = 150): Order {
  return createOrder({ symbol: 'AAPL', side, quantity, market: 'US', price });
}

async function createConnectedBroker(quotes: Readonly<Record<string, number>> | null = null) {
  const prices = quotes;
  const broker = createSimulatedBroker({
    quoteSource:
      prices === null ? null : { getLastPrice: async (symbol) => prices[symbol] ?? null },
    now: () => submitTime,
    logger: createRecordingLogger(),
  });
  await broker.connect();
  return broker;
}

describe('simulatedBroker.submitOrder', () => {
  it('fills a buy at the order price plus slippage with proportional commission', async () => {
    const broker = await createConnectedBroker();
    const result = await broker.submitOrder(order('BUY', 10));

    assert.equal(result.orderId, 'DRY-000001');
    assert.equal(result.status, 'FILLED');
    assert.equal(result.filledQuantity, 10);
    assertClose(result.avgPrice, 150.15);
    assertClose(result.commission, 1.5015);
    assert.equal(result.errorMsg, null);

    const account = await broker.getAccountInfo();
    assert.equal(account.status, 'ok');
    if (account.status === 'ok') {
      assertClose(account.value.cash, 100_000 - 1_501.5 - 1.5015);
      assertClose(account.value.marketValue, 1_500);
    }
  });

  it('fills a sell below the quote and charges the minimum commission', async () => {
    const broker = await createConnectedBroker({ AAPL: 100 });
    const result = await broker.submitOrder(order('SELL', 5, null));

    assertClose(result.avgPrice, 99.9);
    assert.equal(result.commission, 1);
  });

  it('prefers the quote source over the order price', async () => {
    const broker = await createConnectedBroker({ AAPL: 200 });
    const result = await broker.submitOrder(order('BUY', 1, 150));
    assertClose(result.avgPrice, 200.2);
  });

  it('fails without any available price', async () => {
    const broker = await createConnectedBroker();
    const result = await broker.submitOrder(order('BUY', 1, null));

    assert.equal(result.status, 'FAILED');
    assert.equal(result.filledQuantity, 0);
    assert.equal(result.errorMsg, '无法获取 AAPL 的模拟成交价格');
    assert.deepEqual(broker.getTradeSummary(), {
      totalTrades: 1,
      successfulTrades: 0,
      failedTrades: 1,
      successRate: 0,
    });
  });

  it('numbers orders sequentially and keeps them queryable', async () => {
    const broker = await createConnectedBroker();
    await broker.submitOrder(order('BUY', 1));
    const second = await broker.submitOrder(order('BUY', 2));

    assert.equal(second.orderId, 'DRY-000002');
    const status = await broker.getOrderStatus('DRY-000002');
    assert.equal(status.status, 'ok');
    assert.equal(await broker.cancelOrder('DRY-999999'), false);
    assert.deepEqual(await broker.getOrderStatus('DRY-999999'), {
      status: 'error',
      kind: 'data',
      reason: '订单不存在: DRY-999999',
    });
  });
});

describe('simulatedBroker positions', () => {
  it('averages cost across buys and removes flat positions', async () => {
    const broker = await createConnectedBroker();
    await broker.submitOrder(order('BUY', 10, 100));
    await broker.submitOrder(order('BUY', 10, 200));

    let positions = await broker.getPositions();
    assert.equal(positions.status, 'ok');
    if (positions.status === 'ok') {
      assert.equal(positions.value.length, 1);
      assert.equal(positions.value[0]?.quantity, 20);
      assertClose(positions.value[0]?.avgCost, 150.15);
    }

    await broker.submitOrder(order('SELL', 20, 180));
    positions = await broker.getPositions();
    assert.deepEqual(positions, { status: 'ok', value: [] });
  });

  it('reports the last known price after a fill', async () => {
    const broker = await createConnectedBroker();
    await broker.submitOrder(order('BUY', 1, 123));
    assert.deepEqual(await broker.getMarketPrice('AAPL'), { status: 'ok', value: 123 });
    assert.deepEqual(await broker.getMarketPrice('MSFT'), {
      status: 'error',
      kind: 'data',
      reason: '无法获取 MSFT 的行情价格',
    });
  });
});

describe('simulatedBroker connection', () => {
  it('returns connection errors before connect', async () => {
    const broker = createSimulatedBroker({ logger: createRecordingLogger(), now: () => submitTime });

    assert.equal(broker.isConnected(), false);
    assert.deepEqual(await broker.getAccountInfo(), {
      status: 'error',
      kind: 'connection',
      reason: '未连接交易网关',
    });
    const result = await broker.submitOrder(order('BUY', 1));
    assert.equal(result.status, 'FAILED');
    assert.equal(result.errorMsg, '未连接交易网关');
  });

  it('refuses to cancel an order that already filled', async () => {
    const broker = await createConnectedBroker();
    const filled = await broker.submitOrder(order('BUY', 1));

    assert.equal(filled.status, 'FILLED');
    assert.equal(await broker.cancelOrder(filled.orderId), false);
    const status = await broker.getOrderStatus(filled.orderId);
    assert.equal(status.status === 'ok' ? status.value.status : null, 'FILLED');
  });

  it('disconnects idempotently', async () => {
    const broker = await createConnectedBroker();
    assert.equal(await broker.disconnect(), true);
    assert.equal(await broker.disconnect(), true);
    assert.equal(broker.isConnected(), false);
  });
});
