/**
 * 服务接口类型
 *
 * 各核心模块以工厂函数创建、以接口对外暴露，便于依赖注入与测试替身替换。
 */
import type { AccountInfo, Position } from './account.js';
import type {
  RiskCheckResult,
  RiskEvent,
  RiskSummary,
  RiskTradeRecord,
} from './risk.js';
import type { ExecutableAction, Order, TradeAction, TradeResult } from './trading.js';

// ==================== 券商能力 ====================

/** 券商调用失败分类 */
export type BrokerErrorKind = 'connection' | 'data' | 'execution';

/**
 * 券商调用结果（标签联合）
 */
export type BrokerResult<T> =
  | { readonly status: 'ok'; readonly value: T }
  | { readonly status: 'error'; readonly kind: BrokerErrorKind; readonly reason: string };

/**
 * 券商侧交易统计
 */
export type BrokerTradeSummary = {
  readonly totalTrades: number;
  readonly successfulTrades: number;
  readonly failedTrades: number;
  readonly successRate: number;
};

/**
 * 券商能力接口
 * 实现：模拟券商（dry run）与 LongPort 网关券商。
 * 除 connect/disconnect 外，未连接时所有调用返回 connection 错误；不内置重试。
 */
export interface BrokerCapability {
  readonly name: 'simulated' | 'longport';
  connect(): Promise<boolean>;
  /** 幂等；已断开时同样返回 true */
  disconnect(): Promise<boolean>;
  isConnected(): boolean;
  getAccountInfo(): Promise<BrokerResult<AccountInfo>>;
  getPositions(): Promise<BrokerResult<ReadonlyArray<Position>>>;
  getMarketPrice(symbol: string): Promise<BrokerResult<number>>;
  /** 总是返回 TradeResult，失败时为 REJECTED / FAILED 并带 errorMsg */
  submitOrder(order: Order): Promise<TradeResult>;
  cancelOrder(orderId: string): Promise<boolean>;
  getOrderStatus(orderId: string): Promise<BrokerResult<TradeResult>>;
  getTradeSummary(): BrokerTradeSummary;
}

// ==================== 风控 ====================

/**
 * 风险管理器接口
 * 所有方法同步执行，在事件循环中天然原子。
 */
export interface RiskManager {
  validateOrder(
    order: Order,
    accountInfo: AccountInfo,
    positions: ReadonlyArray<Position>,
  ): RiskCheckResult;
  recordTrade(order: Order, executedQuantity: number, executionPrice: number): void;
  updatePnl(delta: number): void;
  resetCircuitBreaker(): void;
  isCircuitBreakerActive(): boolean;
  getRiskSummary(): RiskSummary;
  getTradeHistory(): ReadonlyArray<RiskTradeRecord>;
  getRiskEvents(): ReadonlyArray<RiskEvent>;
}

// ==================== 本地组合镜像 ====================

export type PortfolioPosition = {
  readonly long: number;
  readonly short: number;
  readonly longCostBasis: number;
  readonly shortCostBasis: number;
  readonly shortMarginUsed: number;
};

export type RealizedGains = {
  readonly long: number;
  readonly short: number;
};

export type PortfolioSnapshot = {
  readonly cash: number;
  readonly marginRequirement: number;
  readonly marginUsed: number;
  readonly positions: Readonly<Record<string, PortfolioPosition>>;
  readonly realizedGains: Readonly<Record<string, RealizedGains>>;
};

/**
 * 成交应用结果
 */
export type FillApplication = {
  readonly appliedQuantity: number;
  /** 本次成交实现的盈亏（开仓为 0） */
  readonly realizedPnl: number;
};

/**
 * 本地组合镜像
 * 只按实际成交数量与成交价更新，每笔成交恰好一次。
 */
export interface Portfolio {
  getCash(): number;
  getPosition(ticker: string): PortfolioPosition;
  applyFill(action: ExecutableAction, ticker: string, quantity: number, price: number): FillApplication;
  deductCommission(amount: number): void;
  snapshot(): PortfolioSnapshot;
}

// ==================== 交易执行 ====================

/** 失败分类 */
export type FailureCategory = 'validation' | 'data' | 'connection' | 'execution';

/**
 * 失败交易记录
 */
export type FailedTradeRecord = {
  readonly timestamp: Date;
  readonly ticker: string;
  readonly action: TradeAction;
  readonly requestedQty: number;
  readonly executedQty: number;
  readonly price: number;
  readonly category: FailureCategory;
  readonly error: string;
};

/**
 * 执行记录（成交的订单）
 */
export type ExecutionRecord = {
  readonly ticker: string;
  readonly action: ExecutableAction;
  readonly result: TradeResult;
  readonly realizedPnl: number;
};

/**
 * 执行统计报告
 */
export type ExecutionReport = {
  readonly totalTrades: number;
  readonly successfulTrades: number;
  readonly failedTrades: number;
  readonly successRate: number;
  readonly totalExecutedValue: number;
  readonly totalCommission: number;
  readonly recentFailures: ReadonlyArray<FailedTradeRecord>;
};

/**
 * 账户汇总
 */
export type AccountSummary = {
  readonly dryRun: boolean;
  readonly accountInfo: AccountInfo | null;
  readonly positions: ReadonlyArray<Position>;
  readonly tradeSummary: BrokerTradeSummary;
  readonly executionStats: ExecutionReport;
};

/**
 * 交易会话就绪检查结果
 */
export type SessionReadiness = {
  readonly ready: boolean;
  readonly message: string;
};

/**
 * 交易执行器接口
 */
export interface TradeExecutor {
  connect(): Promise<boolean>;
  /** 断开失败或超时返回 false */
  disconnect(): Promise<boolean>;
  isDryRun(): boolean;
  /**
   * 执行单个决策，返回实际成交数量；永不拒绝（失败返回 0 并记录原因）
   */
  execute(
    ticker: string,
    action: TradeAction,
    quantity: number,
    currentPrice: number,
    portfolio: Portfolio,
  ): Promise<number>;
  getAccountSummary(): Promise<AccountSummary>;
  validateTradingSession(): Promise<SessionReadiness>;
  getExecutionReport(): ExecutionReport;
  getExecutionHistory(): ReadonlyArray<ExecutionRecord>;
  getFailedTrades(): ReadonlyArray<FailedTradeRecord>;
}

// ==================== 交易日志 ====================

/**
 * 交易日志记录
 */
export type TradeJournalEntry = {
  readonly orderId: string | null;
  readonly ticker: string;
  readonly action: TradeAction;
  readonly side: string | null;
  readonly quantity: number;
  readonly filledQuantity: number;
  readonly price: number | null;
  readonly commission: number;
  readonly status: string;
  readonly error: string | null;
  readonly dryRun: boolean;
};

/**
 * 交易日志
 */
export interface TradeJournal {
  record(entry: TradeJournalEntry): void;
}
