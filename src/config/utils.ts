import type { LongportRegion } from '../types/config.js';
import type { RegionUrls } from './types.js';

/**
 * 规范化区域标识，仅识别 cn，其余一律视为 hk。
 * @param region - 区域标识字符串（如 'cn'、'hk'）
 */
export function normalizeRegion(region: string | null | undefined): LongportRegion {
  return region?.trim().toLowerCase() === 'cn' ? 'cn' : 'hk';
}

/**
 * 根据区域返回对应的 LongPort API 端点 URL，cn 使用 .cn 域名，其他区域使用 .com 域名。
 * @param region - 区域标识
 * @returns 包含 httpUrl、quoteWsUrl、tradeWsUrl 的端点对象
 */
export function getRegionUrls(region: LongportRegion): RegionUrls {
  if (region === 'cn') {
    return {
      httpUrl: 'https://openapi.longportapp.cn',
      quoteWsUrl: 'wss://openapi-quote.longportapp.cn/v2',
      tradeWsUrl: 'wss://openapi-trade.longportapp.cn/v2',
    };
  }
  return {
    httpUrl: 'https://openapi.longportapp.com',
    quoteWsUrl: 'wss://openapi-quote.longportapp.com/v2',
    tradeWsUrl: 'wss://openapi-trade.longportapp.com/v2',
  };
}

/**
 * 读取字符串配置，未设置、空串或占位符（形如 your_xxx_here）时返回 null。
 * @param env - 进程环境变量对象
 * @param envKey - 环境变量键名
 * @returns 去除首尾空白后的字符串，或 null
 */
export function getStringConfig(env: NodeJS.ProcessEnv, envKey: string): string | null {
  const value = env[envKey];
  if (!value || value.trim() === '' || value.trim() === `your_${envKey.toLowerCase()}_here`) {
    return null;
  }
  return value.trim();
}

/**
 * 读取布尔配置，仅识别 'true'/'false'，其他值返回默认值。
 * @param env - 进程环境变量对象
 * @param envKey - 环境变量键名
 * @param defaultValue - 未设置或无法识别时的默认值，默认为 false
 * @returns 解析后的布尔值
 */
export function getBooleanConfig(
  env: NodeJS.ProcessEnv,
  envKey: string,
  defaultValue: boolean = false,
): boolean {
  const value = env[envKey];
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  const normalizedValue = value.trim().toLowerCase();
  if (normalizedValue === 'true') {
    return true;
  }
  if (normalizedValue === 'false') {
    return false;
  }
  return defaultValue;
}

/**
 * 从 URL 中提取主机名，无法解析时原样返回。
 */
export function extractHost(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    return url;
  }
}
