import type { Order, TradeSide } from './trading.js';

/** 风险等级（严重度递增） */
export type RiskLevel = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

/**
 * 风控校验结果
 */
export type RiskCheckResult = {
  readonly approved: boolean;
  readonly reason: string;
  readonly riskLevel: RiskLevel;
};

/**
 * 单项检查结果（聚合前）
 */
export type RiskCheckOutcome = {
  readonly ok: boolean;
  readonly level: RiskLevel;
  readonly message: string;
};

/** 风控限额名称 */
export type RiskLimitName =
  | 'maxPositionSize'
  | 'maxPortfolioValue'
  | 'maxDailyLoss'
  | 'maxPositionConcentration'
  | 'maxSectorConcentration'
  | 'maxTradesPerDay'
  | 'minCashReserve'
  | 'maxLeverage'
  | 'maxDrawdown';

/**
 * 风控限额快照
 */
export type RiskLimit = {
  readonly name: RiskLimitName;
  readonly maxValue: number;
  readonly currentValue: number;
  readonly warningThreshold: number;
  readonly enabled: boolean;
};

/**
 * 风险事件（等级高于 LOW 的每次校验）
 */
export type RiskEvent = {
  readonly order: Order;
  readonly message: string;
  readonly riskLevel: RiskLevel;
  readonly timestamp: Date;
};

/**
 * 已成交交易记录（风控视角）
 */
export type RiskTradeRecord = {
  readonly timestamp: Date;
  readonly symbol: string;
  readonly side: TradeSide;
  readonly quantity: number;
  readonly price: number;
};

/**
 * 风险摘要
 */
export type RiskSummary = {
  readonly circuitBreakerActive: boolean;
  readonly emergencyStop: boolean;
  readonly circuitBreakers: ReadonlyArray<RiskLimitName>;
  readonly currentSession: {
    readonly tradesCount: number;
    readonly totalVolume: number;
    readonly pnl: number;
    readonly startDay: string;
  };
  readonly dailyPnl: number;
  readonly dailyTrades: number;
  readonly limits: ReadonlyArray<RiskLimit>;
  readonly recentRiskEvents: ReadonlyArray<RiskEvent>;
  readonly lastResetDay: string;
};
