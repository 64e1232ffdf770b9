import type { LogLevelName } from '../utils/logger/types.js';

/**
 * 风控配置（已解析为数值，缺省项已填充默认值）
 */
export type RiskConfig = {
  readonly maxPositionSize: number;
  readonly maxPortfolioValue: number;
  readonly maxDailyLoss: number;
  readonly maxPositionConcentration: number;
  readonly maxSectorConcentration: number;
  readonly maxTradesPerDay: number;
  readonly minCashReserve: number;
  readonly maxLeverage: number;
  readonly maxDrawdown: number;
};

/** LongPort 区域 */
export type LongportRegion = 'hk' | 'cn';

/**
 * 券商网关配置
 */
export type BrokerConfig = {
  readonly region: LongportRegion;
  readonly host: string;
  readonly port: number;
  readonly appKey: string | null;
  readonly appSecret: string | null;
  readonly accessToken: string | null;
  readonly accountId: string | null;
};

/**
 * 交易配置
 */
export type TradingConfig = {
  readonly broker: BrokerConfig;
  /** true 时使用模拟券商，不向真实网关下单 */
  readonly dryRun: boolean;
  readonly maxPositionSize: number;
  readonly maxDailyTrades: number;
  /** 单笔订单金额上限，<= 0 表示不限制 */
  readonly maxOrderValue: number;
  readonly enableShortSelling: boolean;
  readonly logTrades: boolean;
  readonly logLevel: LogLevelName;
  /** 单次券商调用超时（毫秒） */
  readonly brokerCallTimeoutMs: number;
  /** 本地组合镜像初始现金 */
  readonly initialCash: number;
  /** 本地组合镜像做空保证金比例 */
  readonly marginRequirement: number;
};
