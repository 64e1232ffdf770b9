/**
 * 账户快照（某一时刻的只读数据，核心逻辑不修改）
 */
export type AccountInfo = {
  readonly accountId: string;
  /** 净资产 */
  readonly totalAssets: number;
  readonly cash: number;
  readonly marketValue: number;
  readonly unrealizedPnl: number;
  readonly realizedPnl: number;
  readonly buyingPower: number;
};

/**
 * 券商持仓
 */
export type Position = {
  readonly symbol: string;
  /** 有符号数量，负数表示空头 */
  readonly quantity: number;
  readonly avgCost: number;
  readonly marketValue: number;
  readonly unrealizedPnl: number;
  readonly marketPrice: number;
};
