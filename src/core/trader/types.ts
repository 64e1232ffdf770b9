import type { AccountInfo, Position } from '../../types/account.js';
import type { TradingConfig } from '../../types/config.js';
import type {
  BrokerCapability,
  FailureCategory,
  RiskManager,
  TradeJournal,
} from '../../types/services.js';
import type { Order, TradeAction } from '../../types/trading.js';
import type { Logger } from '../../utils/logger/index.js';

export type TradeExecutorConfig = Pick<
  TradingConfig,
  'dryRun' | 'enableShortSelling' | 'maxOrderValue' | 'brokerCallTimeoutMs' | 'logTrades'
>;

/**
 * 交易执行器依赖
 */
export type TradeExecutorDeps = {
  readonly broker: BrokerCapability;
  readonly riskManager: RiskManager;
  readonly config: TradeExecutorConfig;
  /** 未传入时按 config.logTrades 决定是否创建文件日志；传 null 显式关闭 */
  readonly journal?: TradeJournal | null;
  readonly now?: () => Date;
  readonly logger?: Logger;
};

export type PortfolioOptions = {
  readonly tickers?: ReadonlyArray<string>;
  readonly initialCash: number;
  readonly marginRequirement: number;
};

/**
 * 下单前置检查输入
 */
export type PreconditionInput = {
  readonly order: Order;
  readonly action: TradeAction;
  readonly accountInfo: AccountInfo;
  readonly positions: ReadonlyArray<Position>;
  /** 本地组合镜像中的多头数量 */
  readonly localLongQuantity: number;
  readonly isConnected: boolean;
  /** 用于估算订单金额的价格 */
  readonly estimatedPrice: number;
  readonly enableShortSelling: boolean;
  readonly maxOrderValue: number;
};

export type PreconditionResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly category: FailureCategory; readonly reason: string };

export type TradeJournalDeps = {
  /** 日志根目录，默认按运行时档位解析 */
  readonly logRootDir?: string;
  readonly now?: () => Date;
  readonly logger?: Logger;
};

/**
 * 交易日志文件中的单条记录
 */
export type TradeJournalRecord = {
  readonly orderId: string | null;
  readonly ticker: string;
  readonly action: string;
  readonly side: string | null;
  readonly quantity: number;
  readonly filledQuantity: number;
  readonly price: number | null;
  readonly commission: number;
  readonly status: string;
  readonly error: string | null;
  readonly dryRun: boolean;
  readonly timestamp: string;
};
