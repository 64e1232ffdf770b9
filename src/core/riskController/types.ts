import type { AccountInfo, Position } from '../../types/account.js';
import type { RiskConfig } from '../../types/config.js';
import type { RiskCheckOutcome, RiskLimitName } from '../../types/risk.js';
import type { Order } from '../../types/trading.js';
import type { Logger } from '../../utils/logger/index.js';

/**
 * 风控限额运行时状态（currentValue 随交易与盈亏更新）
 * 使用范围：仅 riskController 模块内部使用，对外只暴露快照。
 */
export type RiskLimitState = {
  readonly name: RiskLimitName;
  readonly maxValue: number;
  currentValue: number;
  readonly warningThreshold: number;
  readonly enabled: boolean;
};

export type RiskLimitTable = ReadonlyMap<RiskLimitName, RiskLimitState>;

/**
 * 单项检查上下文
 */
export type OrderCheckContext = {
  readonly order: Order;
  readonly accountInfo: AccountInfo;
  readonly positions: ReadonlyArray<Position>;
  readonly limits: RiskLimitTable;
  readonly dailyPnl: number;
  readonly dailyTrades: number;
};

/**
 * 日亏损检查结果，额外标记是否需要触发熔断
 */
export type DailyLossOutcome = RiskCheckOutcome & {
  readonly tripsCircuitBreaker: boolean;
};

/**
 * 风险管理器依赖
 */
export type RiskManagerDeps = {
  readonly config: RiskConfig;
  /** 时钟，用于日切判断与事件时间戳 */
  readonly now?: () => Date;
  readonly logger?: Logger;
};
