import type { RiskSummary } from '../../types/risk.js';
import type {
  AccountSummary,
  BrokerCapability,
  Portfolio,
  RiskManager,
  TradeExecutor,
} from '../../types/services.js';
import type { TradingDecision } from '../../types/trading.js';
import type { Logger } from '../../utils/logger/index.js';

/**
 * 单个标的的执行结果
 */
export type TickerOutcome =
  | {
      readonly status: 'executed';
      readonly quantity: number;
      readonly price: number;
      readonly value: number;
    }
  | { readonly status: 'failed'; readonly reason: string }
  | { readonly status: 'error'; readonly reason: string };

export type ExecutionSummary = {
  readonly totalDecisions: number;
  readonly successfulTrades: number;
  readonly totalValue: number;
};

export type TradingSessionResult = {
  readonly executionResults: ReadonlyMap<string, TickerOutcome>;
  readonly executionSummary: ExecutionSummary;
  readonly riskSummary: RiskSummary;
  readonly finalAccount: AccountSummary | null;
};

export type TradingSessionDeps = {
  readonly executor: TradeExecutor;
  /** 用于获取执行价格 */
  readonly broker: BrokerCapability;
  /** 与执行器共用的风险管理器 */
  readonly riskManager: RiskManager;
  readonly decisions: ReadonlyMap<string, TradingDecision>;
  readonly portfolio: Portfolio;
  /** 取价超时（毫秒），<= 0 不限制 */
  readonly priceTimeoutMs?: number;
  readonly logger?: Logger;
};
