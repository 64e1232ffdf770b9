/**
 * LongPort API 配置模块
 *
 * 功能：
 * - 根据交易配置中的凭证与区域创建 LongPort Config
 * - BROKER_HOST / BROKER_PORT 覆盖 HTTP 端点，行情与交易 WebSocket 端点沿用区域默认值
 */
import { Config } from 'longport';
import { API } from '../constants/index.js';
import type { BrokerConfig } from '../types/config.js';
import { getRegionUrls } from './utils.js';

/**
 * 根据网关配置拼接 HTTP 端点（443 端口省略）
 */
export function resolveHttpUrl(broker: BrokerConfig): string {
  const portSuffix = broker.port === API.DEFAULT_GATEWAY_PORT ? '' : `:${broker.port}`;
  return `https://${broker.host}${portSuffix}`;
}

/**
 * 创建 LongPort Config
 * 凭证缺失时以空串传入：实盘模式的凭证完整性已在 validateTradingConfig 中校验，
 * 模拟模式下仅用于行情，凭证无效时行情读取失败并按数据错误处理。
 */
export function createLongportConfig(broker: BrokerConfig): Config {
  const urls = getRegionUrls(broker.region);
  return new Config({
    appKey: broker.appKey ?? '',
    appSecret: broker.appSecret ?? '',
    accessToken: broker.accessToken ?? '',
    enablePrintQuotePackages: false,
    httpUrl: resolveHttpUrl(broker),
    quoteWsUrl: urls.quoteWsUrl,
    tradeWsUrl: urls.tradeWsUrl,
  });
}
