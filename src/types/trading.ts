/**
 * 订单与成交相关类型
 */

/** 交易方向 */
export type TradeSide = 'BUY' | 'SELL';

/** 订单类型 */
export type OrderType = 'MARKET' | 'LIMIT' | 'STOP' | 'STOP_LIMIT';

/** 订单状态 */
export type OrderStatus =
  | 'PENDING'
  | 'SUBMITTED'
  | 'FILLED'
  | 'PARTIALLY_FILLED'
  | 'CANCELLED'
  | 'REJECTED'
  | 'FAILED';

/** 市场（由代码格式推断） */
export type MarketType = 'HK' | 'US' | 'CN';

/** 订单有效期 */
export type TimeInForce = 'DAY';

/** 决策引擎给出的动作 */
export type TradeAction = 'buy' | 'sell' | 'short' | 'cover' | 'hold';

/** 会产生订单的动作 */
export type ExecutableAction = Exclude<TradeAction, 'hold'>;

/**
 * 候选订单
 * 用途：订单翻译器产出、风控与券商消费的不可变订单描述
 * 数据来源：createOrder 构造（冻结对象）
 */
export type Order = {
  readonly symbol: string;
  readonly side: TradeSide;
  /** 正整数股数 */
  readonly quantity: number;
  readonly orderType: OrderType;
  /** LIMIT / STOP_LIMIT 必填；MARKET 可附带当前价用于估值 */
  readonly price: number | null;
  /** STOP / STOP_LIMIT 必填 */
  readonly stopPrice: number | null;
  readonly market: MarketType;
  readonly timeInForce: TimeInForce;
};

/**
 * 订单执行结果
 * 不变量：0 <= filledQuantity <= quantity；avgPrice 仅在 filledQuantity > 0 时非空；
 * errorMsg 仅在 REJECTED / FAILED 时非空。
 */
export type TradeResult = {
  readonly orderId: string;
  readonly symbol: string;
  readonly side: TradeSide;
  readonly quantity: number;
  readonly filledQuantity: number;
  readonly avgPrice: number | null;
  readonly status: OrderStatus;
  readonly submitTime: Date;
  readonly updateTime: Date | null;
  readonly errorMsg: string | null;
  readonly commission: number;
};

/**
 * 决策引擎输出的单个标的决策
 */
export type TradingDecision = {
  readonly action: TradeAction;
  readonly quantity: number;
  /** 0-100 */
  readonly confidence: number;
  readonly reasoning: string;
};
