/**
 * 风控限额测试
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  createRiskLimit,
  createRiskLimitTable,
  evaluateLimitUtilization,
} from '../../../src/core/riskController/riskLimit.js';
import { createRiskConfigDouble } from '../../helpers/testDoubles.js';

describe('createRiskLimit', () => {
  it('disables non-positive and non-finite limits', () => {
    assert.equal(createRiskLimit('maxDailyLoss', 1000).enabled, true);
    assert.equal(createRiskLimit('maxDailyLoss', 0).enabled, false);
    assert.equal(createRiskLimit('maxDailyLoss', -5).enabled, false);
    assert.equal(createRiskLimit('maxDailyLoss', Number.NaN).enabled, false);
    assert.equal(createRiskLimit('maxDailyLoss', 1000).warningThreshold, 0.8);
  });

  it('builds one limit per configured name', () => {
    const table = createRiskLimitTable(createRiskConfigDouble({ minCashReserve: 0 }));
    assert.equal(table.size, 9);
    assert.equal(table.get('minCashReserve')?.enabled, false);
    assert.equal(table.get('maxPositionConcentration')?.maxValue, 0.2);
  });
});

describe('evaluateLimitUtilization', () => {
  const limit = createRiskLimit('maxPositionSize', 1000);

  it('grades utilization against the limit', () => {
    assert.deepEqual(evaluateLimitUtilization(limit, 1000), { ok: false, level: 'CRITICAL', utilization: 1 });
    assert.deepEqual(evaluateLimitUtilization(limit, 800), { ok: true, level: 'HIGH', utilization: 0.8 });
    assert.deepEqual(evaluateLimitUtilization(limit, 500), { ok: true, level: 'MEDIUM', utilization: 0.5 });
    assert.deepEqual(evaluateLimitUtilization(limit, 499), { ok: true, level: 'LOW', utilization: 0.499 });
  });

  it('passes at LOW when the limit is disabled', () => {
    assert.deepEqual(evaluateLimitUtilization(createRiskLimit('maxPositionSize', 0), 1e9), {
      ok: true,
      level: 'LOW',
      utilization: 0,
    });
  });
});
