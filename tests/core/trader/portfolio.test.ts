/**
 * 本地组合镜像测试
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createPortfolio } from '../../../src/core/trader/portfolio.js';

describe('createPortfolio', () => {
  it('pre-registers configured tickers', () => {
    const portfolio = createPortfolio({ tickers: ['AAPL', 'MSFT'], initialCash: 1_000, marginRequirement: 0.5 });
    const snapshot = portfolio.snapshot();

    assert.deepEqual(Object.keys(snapshot.positions), ['AAPL', 'MSFT']);
    assert.deepEqual(snapshot.realizedGains['MSFT'], { long: 0, short: 0 });
    assert.equal(snapshot.cash, 1_000);
    assert.equal(snapshot.marginUsed, 0);
  });

  it('returns an empty position for unknown tickers', () => {
    const portfolio = createPortfolio({ initialCash: 0, marginRequirement: 0.5 });
    assert.deepEqual(portfolio.getPosition('TSLA'), {
      long: 0,
      short: 0,
      longCostBasis: 0,
      shortCostBasis: 0,
      shortMarginUsed: 0,
    });
  });
});

describe('portfolio long fills', () => {
  it('averages the cost basis and realizes gains on sells', () => {
    const portfolio = createPortfolio({ initialCash: 100_000, marginRequirement: 0.5 });
    portfolio.applyFill('buy', 'AAPL', 10, 100);
    portfolio.applyFill('buy', 'AAPL', 10, 200);

    assert.equal(portfolio.getPosition('AAPL').long, 20);
    assert.equal(portfolio.getPosition('AAPL').longCostBasis, 150);
    assert.equal(portfolio.getCash(), 97_000);

    assert.deepEqual(portfolio.applyFill('sell', 'AAPL', 5, 180), { appliedQuantity: 5, realizedPnl: 150 });
    assert.equal(portfolio.getCash(), 97_900);
    assert.equal(portfolio.getPosition('AAPL').long, 15);
  });

  it('caps sells at the local holding', () => {
    const portfolio = createPortfolio({ initialCash: 10_000, marginRequirement: 0.5 });
    portfolio.applyFill('buy', 'AAPL', 15, 150);

    assert.deepEqual(portfolio.applyFill('sell', 'AAPL', 30, 100), { appliedQuantity: 15, realizedPnl: -750 });
    assert.equal(portfolio.getPosition('AAPL').long, 0);
    assert.equal(portfolio.getPosition('AAPL').longCostBasis, 0);
    assert.equal(portfolio.getCash(), 10_000 - 2_250 + 1_500);
    assert.deepEqual(portfolio.applyFill('sell', 'AAPL', 1, 100), { appliedQuantity: 0, realizedPnl: 0 });
  });
});

describe('portfolio short fills', () => {
  it('reserves margin on open and releases it proportionally on cover', () => {
    const portfolio = createPortfolio({ initialCash: 1_000, marginRequirement: 0.5 });

    portfolio.applyFill('short', 'TSLA', 10, 50);
    assert.equal(portfolio.getCash(), 1_250);
    assert.equal(portfolio.snapshot().marginUsed, 250);
    assert.equal(portfolio.getPosition('TSLA').shortCostBasis, 50);

    assert.deepEqual(portfolio.applyFill('cover', 'TSLA', 4, 40), { appliedQuantity: 4, realizedPnl: 40 });
    assert.equal(portfolio.getCash(), 1_190);
    assert.equal(portfolio.getPosition('TSLA').short, 6);
    assert.equal(portfolio.getPosition('TSLA').shortMarginUsed, 150);

    assert.deepEqual(portfolio.applyFill('cover', 'TSLA', 10, 40), { appliedQuantity: 6, realizedPnl: 60 });
    const snapshot = portfolio.snapshot();
    assert.equal(snapshot.marginUsed, 0);
    assert.deepEqual(snapshot.positions['TSLA'], {
      long: 0,
      short: 0,
      longCostBasis: 0,
      shortCostBasis: 0,
      shortMarginUsed: 0,
    });
    assert.deepEqual(snapshot.realizedGains['TSLA'], { long: 0, short: 100 });
  });
});

describe('portfolio guards', () => {
  it('ignores fills without a positive quantity or price', () => {
    const portfolio = createPortfolio({ initialCash: 500, marginRequirement: 0.5 });

    assert.deepEqual(portfolio.applyFill('buy', 'AAPL', 0, 100), { appliedQuantity: 0, realizedPnl: 0 });
    assert.deepEqual(portfolio.applyFill('buy', 'AAPL', 5, 0), { appliedQuantity: 0, realizedPnl: 0 });
    assert.deepEqual(portfolio.applyFill('buy', 'AAPL', Number.NaN, 10), { appliedQuantity: 0, realizedPnl: 0 });
    assert.equal(portfolio.getCash(), 500);
  });

  it('deducts only positive commissions', () => {
    const portfolio = createPortfolio({ initialCash: 500, marginRequirement: 0.5 });
    portfolio.deductCommission(-3);
    portfolio.deductCommission(0);
    portfolio.deductCommission(2.5);
    assert.equal(portfolio.getCash(), 497.5);
  });
});
