/**
 * 券商能力工厂
 *
 * dryRun 决定执行路径：
 * - true：模拟券商；配置了 LongPort 凭证时使用真实行情取价
 * - false：LongPort 券商（实盘）
 */
import { createLongportConfig } from '../../config/config.index.js';
import type { TradingConfig } from '../../types/config.js';
import type { BrokerCapability } from '../../types/services.js';
import { logger as defaultLogger } from '../../utils/logger/index.js';
import type { Logger } from '../../utils/logger/index.js';
import { createLongportBroker } from './longportBroker.js';
import { connectLongportGateway, createLongportQuoteSource } from './longportGateway.js';
import { createRateLimiter } from './rateLimiter.js';
import { createSimulatedBroker } from './simulatedBroker.js';

const hasCredentials = (config: TradingConfig): boolean =>
  config.broker.appKey !== null &&
  config.broker.appSecret !== null &&
  config.broker.accessToken !== null;

export function createBroker({
  config,
  logger = defaultLogger,
}: {
  config: TradingConfig;
  logger?: Logger;
}): BrokerCapability {
  if (config.dryRun) {
    const quoteSource = hasCredentials(config)
      ? createLongportQuoteSource(createLongportConfig(config.broker))
      : null;
    if (quoteSource === null) {
      logger.warn('[券商] 未配置 LongPort 凭证，模拟券商仅使用订单自带价格成交');
    }
    return createSimulatedBroker({
      quoteSource,
      initialCash: config.initialCash,
      logger,
    });
  }

  return createLongportBroker({
    connectGateway: () => connectLongportGateway(createLongportConfig(config.broker)),
    rateLimiter: createRateLimiter({ logger }),
    accountId: config.broker.accountId,
    logger,
  });
}
