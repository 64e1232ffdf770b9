import type { BrokerErrorKind, BrokerResult, BrokerTradeSummary } from '../../types/services.js';
import type { MarketType } from '../../types/trading.js';

export const ok = <T>(value: T): BrokerResult<T> => ({ status: 'ok', value });

export const fail = <T>(kind: BrokerErrorKind, reason: string): BrokerResult<T> => ({
  status: 'error',
  kind,
  reason,
});

export const NOT_CONNECTED_REASON = '未连接交易网关';

/**
 * 券商侧交易计数
 */
export function createTradeCounter(): {
  recordSuccess(): void;
  recordFailure(): void;
  summary(): BrokerTradeSummary;
} {
  let successfulTrades = 0;
  let failedTrades = 0;
  return {
    recordSuccess: () => {
      successfulTrades += 1;
    },
    recordFailure: () => {
      failedTrades += 1;
    },
    summary: () => {
      const totalTrades = successfulTrades + failedTrades;
      return {
        totalTrades,
        successfulTrades,
        failedTrades,
        successRate: totalTrades > 0 ? successfulTrades / totalTrades : 0,
      };
    },
  };
}

/**
 * 转换为 LongPort 代码：港股去掉前导零加 .HK；A 股 6 开头为 .SH，其余 .SZ；美股加 .US。
 * 已带后缀的代码原样（大写）返回。
 *
 * @param symbol 本地代码，如 "00700"、"600519"、"aapl"
 * @param market 市场
 * @returns 如 "700.HK"、"600519.SH"、"AAPL.US"
 */
export function toLongportSymbol(symbol: string, market: MarketType): string {
  const code = symbol.trim().toUpperCase();
  if (code.includes('.')) {
    return code;
  }
  switch (market) {
    case 'HK':
      return `${Number.parseInt(code, 10)}.HK`;
    case 'CN':
      return code.startsWith('6') ? `${code}.SH` : `${code}.SZ`;
    case 'US':
      return `${code}.US`;
  }
}

/**
 * 将 LongPort 代码还原为本地代码（港股补足 5 位）
 *
 * @param symbol 如 "700.HK"
 * @returns 如 "00700"
 */
export function fromLongportSymbol(symbol: string): string {
  const dotIndex = symbol.lastIndexOf('.');
  if (dotIndex <= 0) {
    return symbol;
  }
  const code = symbol.slice(0, dotIndex);
  const region = symbol.slice(dotIndex + 1).toUpperCase();
  if (region === 'HK' && /^\d+$/.test(code)) {
    return code.padStart(5, '0');
  }
  return code;
}
