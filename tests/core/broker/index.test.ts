/**
 * 券商工厂测试
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createBroker } from '../../../src/core/broker/index.js';
import {
  createBrokerConfigDouble,
  createRecordingLogger,
  createTradingConfigDouble,
} from '../../helpers/testDoubles.js';

describe('createBroker', () => {
  it('creates a simulated broker in dry run and warns without credentials', () => {
    const logger = createRecordingLogger();
    const broker = createBroker({ config: createTradingConfigDouble(), logger });

    assert.equal(broker.name, 'simulated');
    assert.equal(broker.isConnected(), false);
    assert.deepEqual(logger.messages.warn, ['[券商] 未配置 LongPort 凭证，模拟券商仅使用订单自带价格成交']);
  });

  it('creates a LongPort broker in live mode without connecting', () => {
    const config = createTradingConfigDouble({
      dryRun: false,
      broker: createBrokerConfigDouble({
        appKey: 'test-key',
        appSecret: 'test-secret',
        accessToken: 'test-token',
      }),
    });
    const broker = createBroker({ config, logger: createRecordingLogger() });

    assert.equal(broker.name, 'longport');
    assert.equal(broker.isConnected(), false);
  });
});
