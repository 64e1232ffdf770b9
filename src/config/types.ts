/**
 * LongPort API 区域端点 URL。
 * 类型用途：封装 HTTP、行情 WebSocket、交易 WebSocket 的 base URL，作为 getRegionUrls 返回类型及 LongPort 初始化入参。
 * 数据来源：getRegionUrls 根据区域返回。
 * 使用范围：仅 config 模块内部使用。
 */
export type RegionUrls = {
  readonly httpUrl: string;
  readonly quoteWsUrl: string;
  readonly tradeWsUrl: string;
};

/**
 * 配置验证错误（含缺失字段列表）。
 * 类型用途：封装配置验证失败时的错误信息，作为 createTradingConfig 抛出的错误类型。
 * 数据来源：由 createConfigValidationError 构造。
 */
export type ConfigValidationError = Error & {
  readonly name: 'ConfigValidationError';
  readonly missingFields: ReadonlyArray<string>;
  readonly errors: ReadonlyArray<string>;
};

/**
 * 交易配置验证结果。
 * 类型用途：validateTradingConfig 的返回值，供配置构造与系统验证共用。
 */
export type TradingConfigValidationResult = {
  readonly valid: boolean;
  readonly errors: ReadonlyArray<string>;
  readonly missingFields: ReadonlyArray<string>;
};

/**
 * 风控配置原始输入（键值对，未知键忽略）。
 */
export type RawRiskConfig = Readonly<Record<string, unknown>>;
