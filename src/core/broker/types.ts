import type { OrderStatus, OrderType, TradeSide } from '../../types/trading.js';
import type { Logger } from '../../utils/logger/index.js';

/**
 * 行情来源（模拟券商取价）
 */
export interface QuoteSource {
  /** 最新价，无法获取时返回 null */
  getLastPrice(symbol: string): Promise<number | null>;
}

/**
 * Trade API 频率限制器
 */
export interface RateLimiter {
  throttle(): Promise<void>;
}

export type RateLimiterConfig = {
  readonly maxCalls: number;
  readonly windowMs: number;
  readonly minIntervalMs: number;
};

export type RateLimiterDeps = {
  readonly config?: RateLimiterConfig;
  readonly now?: () => number;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly logger?: Logger;
};

export type SimulatedBrokerDeps = {
  readonly quoteSource?: QuoteSource | null;
  readonly initialCash?: number;
  readonly slippage?: number;
  readonly commissionRate?: number;
  readonly minCommission?: number;
  readonly accountId?: string;
  readonly now?: () => Date;
  readonly logger?: Logger;
};

// ==================== LongPort 网关端口 ====================
// 以数值表示的窄接口，SDK 的 Decimal 与枚举转换只发生在 longportGateway 适配层。

export type GatewayOrderRequest = {
  readonly symbol: string;
  readonly side: TradeSide;
  readonly orderType: OrderType;
  readonly quantity: number;
  readonly price: number | null;
  readonly triggerPrice: number | null;
  readonly remark: string;
};

export type GatewayOrder = {
  readonly orderId: string;
  readonly symbol: string;
  readonly side: TradeSide;
  readonly status: OrderStatus;
  readonly quantity: number;
  readonly executedQuantity: number;
  readonly executedPrice: number | null;
  readonly submittedAt: Date;
  readonly updatedAt: Date | null;
  readonly message: string;
};

export type GatewayAccountBalance = {
  readonly currency: string;
  readonly totalCash: number;
  readonly netAssets: number;
  readonly buyPower: number;
};

export type GatewayPosition = {
  readonly symbol: string;
  readonly quantity: number;
  readonly costPrice: number;
};

/**
 * LongPort 交易网关
 */
export interface LongportGateway {
  submitOrder(request: GatewayOrderRequest): Promise<string>;
  cancelOrder(orderId: string): Promise<void>;
  getOrder(orderId: string): Promise<GatewayOrder | null>;
  getAccountBalance(): Promise<GatewayAccountBalance | null>;
  getStockPositions(): Promise<ReadonlyArray<GatewayPosition>>;
  getLastPrices(symbols: ReadonlyArray<string>): Promise<ReadonlyMap<string, number>>;
}

export type LongportBrokerDeps = {
  /** 建立网关连接（创建 TradeContext / QuoteContext） */
  readonly connectGateway: () => Promise<LongportGateway>;
  readonly rateLimiter: RateLimiter;
  readonly accountId?: string | null;
  readonly now?: () => Date;
  readonly logger?: Logger;
};
