/**
 * 交易配置业务测试
 *
 * 功能：
 * - 验证环境变量默认值、覆盖项与构造期校验。
 */
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createTradingConfig } from '../../src/config/config.trading.js';
import { resolveHttpUrl } from '../../src/config/config.index.js';
import { isNamedError } from '../../src/utils/error/index.js';
import { createBrokerConfigDouble, createRecordingLogger } from '../helpers/testDoubles.js';

describe('createTradingConfig', () => {
  it('defaults to dry run with region host and built-in limits', () => {
    const config = createTradingConfig({ env: {}, log: createRecordingLogger() });

    assert.equal(config.dryRun, true);
    assert.equal(config.broker.region, 'hk');
    assert.equal(config.broker.host, 'openapi.longportapp.com');
    assert.equal(config.broker.port, 443);
    assert.equal(config.broker.appKey, null);
    assert.equal(config.maxPositionSize, 100_000);
    assert.equal(config.maxDailyTrades, 100);
    assert.equal(config.maxOrderValue, 50_000);
    assert.equal(config.enableShortSelling, false);
    assert.equal(config.logTrades, true);
    assert.equal(config.logLevel, 'INFO');
    assert.equal(config.brokerCallTimeoutMs, 10_000);
    assert.equal(config.initialCash, 100_000);
    assert.equal(config.marginRequirement, 0.5);
  });

  it('reads overrides and treats placeholder credentials as missing', () => {
    const config = createTradingConfig({
      env: {
        LONGPORT_REGION: 'CN',
        BROKER_PORT: '8443',
        MAX_POSITION_SIZE: '5000',
        MAX_DAILY_TRADES: '10',
        ENABLE_SHORT_SELLING: 'TRUE',
        LOG_LEVEL: 'debug',
        LONGPORT_APP_KEY: 'your_longport_app_key_here',
        TRADING_ACCOUNT_ID: ' acct-1 ',
      },
      log: createRecordingLogger(),
    });

    assert.equal(config.broker.region, 'cn');
    assert.equal(config.broker.host, 'openapi.longportapp.cn');
    assert.equal(config.broker.port, 8443);
    assert.equal(config.broker.appKey, null);
    assert.equal(config.broker.accountId, 'acct-1');
    assert.equal(config.maxPositionSize, 5000);
    assert.equal(config.maxDailyTrades, 10);
    assert.equal(config.enableShortSelling, true);
    assert.equal(config.logLevel, 'DEBUG');
  });

  it('rejects a non-positive position size and an out-of-range port', () => {
    const log = createRecordingLogger();
    assert.throws(
      () => createTradingConfig({ env: { MAX_POSITION_SIZE: '0', BROKER_PORT: '70000' }, log }),
      (err: unknown) => {
        assert.ok(isNamedError(err, 'ConfigValidationError'));
        return true;
      },
    );
    assert.deepEqual(log.messages.error, [
      '[配置错误] BROKER_PORT 无效: 70000（必须为 1-65535 之间的整数）',
      '[配置错误] MAX_POSITION_SIZE 必须大于 0，当前值: 0',
    ]);
  });

  it('requires LongPort credentials only in live mode', () => {
    const log = createRecordingLogger();
    assert.throws(() => createTradingConfig({ env: { ENABLE_LIVE_TRADING: 'true' }, log }));
    assert.deepEqual(log.messages.error, [
      '[配置错误] 实盘模式缺少 LongPort 凭证: LONGPORT_APP_KEY, LONGPORT_APP_SECRET, LONGPORT_ACCESS_TOKEN',
    ]);

    const live = createTradingConfig({
      env: {
        ENABLE_LIVE_TRADING: 'true',
        LONGPORT_APP_KEY: 'test-key',
        LONGPORT_APP_SECRET: 'test-secret',
        LONGPORT_ACCESS_TOKEN: 'test-token',
      },
      log: createRecordingLogger(),
    });
    assert.equal(live.dryRun, false);
  });

  it('rejects a non-numeric number setting', () => {
    assert.throws(
      () => createTradingConfig({ env: { MAX_DAILY_TRADES: 'many' }, log: createRecordingLogger() }),
      /MAX_DAILY_TRADES 必须大于 0/,
    );
  });

  it('warns on an unknown log level and falls back to INFO', () => {
    const log = createRecordingLogger();
    const config = createTradingConfig({ env: { LOG_LEVEL: 'verbose' }, log });
    assert.equal(config.logLevel, 'INFO');
    assert.deepEqual(log.messages.warn, ['[配置警告] LOG_LEVEL 值无效: verbose，已使用默认值 INFO']);
  });
});

describe('resolveHttpUrl', () => {
  it('omits the default port', () => {
    assert.equal(resolveHttpUrl(createBrokerConfigDouble()), 'https://openapi.longportapp.com');
    assert.equal(
      resolveHttpUrl(createBrokerConfigDouble({ host: 'gateway.local', port: 8443 })),
      'https://gateway.local:8443',
    );
  });
});
