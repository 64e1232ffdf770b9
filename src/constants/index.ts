/**
 * 全局常量模块
 *
 * 统一管理项目中使用的常量，包括：
 * - 时间相关：毫秒换算、时区偏移
 * - 风控相关：默认限额、预警阈值、价格估算
 * - 模拟成交相关：滑点、佣金
 * - API 相关：频率限制、外部调用超时
 * - 日志相关：流超时、保留文件数
 */

/** 时间相关常量 */
export const TIME = {
  /** 每秒的毫秒数 */
  MILLISECONDS_PER_SECOND: 1000,
  /** 香港时区偏移量（毫秒），交易日按香港自然日切换 */
  HONG_KONG_TIMEZONE_OFFSET_MS: 8 * 60 * 60 * 1000,
} as const;

/** 风控默认限额（未配置时使用） */
export const RISK_DEFAULTS = {
  MAX_POSITION_SIZE: 100_000,
  MAX_PORTFOLIO_VALUE: 1_000_000,
  MAX_DAILY_LOSS: 10_000,
  MAX_POSITION_CONCENTRATION: 0.2,
  MAX_SECTOR_CONCENTRATION: 0.25,
  MAX_TRADES_PER_DAY: 100,
  MIN_CASH_RESERVE: 10_000,
  MAX_LEVERAGE: 1,
  MAX_DRAWDOWN: 0.1,
} as const;

/** 风控检查阈值 */
export const RISK_THRESHOLDS = {
  /** 限额默认预警比例 */
  WARNING_RATIO: 0.8,
  /** 持仓规模进入中风险的利用率 */
  MEDIUM_RATIO: 0.5,
  /** 剩余现金低于保留额该倍数时提示中风险 */
  CASH_RESERVE_WARNING_MULTIPLIER: 1.5,
  /** 交易次数达到上限该比例时提示中风险 */
  FREQUENCY_WARNING_RATIO: 0.9,
  /** 订单未带价格时的每股估算价 */
  FALLBACK_PRICE_ESTIMATE: 100,
  /** 风险摘要中展示的最近事件条数 */
  RECENT_EVENTS_LIMIT: 10,
} as const;

/** 模拟（dry run）成交参数 */
export const SIMULATION = {
  /** 固定滑点比例：买入上浮、卖出下浮 */
  SLIPPAGE: 0.001,
  /** 佣金费率（按成交额） */
  COMMISSION_RATE: 0.001,
  /** 单笔最低佣金 */
  MIN_COMMISSION: 1,
  /** 模拟账户初始现金 */
  INITIAL_CASH: 100_000,
  /** 模拟账户编号 */
  ACCOUNT_ID: 'DRY_RUN_ACCOUNT',
} as const;

/** 执行器相关常量 */
export const EXECUTION = {
  /** 失败交易记录保留上限 */
  MAX_FAILED_TRADES: 100,
  /** 报告中展示的最近失败条数 */
  RECENT_FAILURES_LIMIT: 10,
  /** 券商调用默认超时（毫秒） */
  DEFAULT_BROKER_CALL_TIMEOUT_MS: 10_000,
  /** 本地组合镜像默认保证金比例 */
  DEFAULT_MARGIN_REQUIREMENT: 0.5,
} as const;

/** API 相关常量 */
export const API = {
  /** Trade API 时间窗口内最大调用次数 */
  RATE_LIMIT_MAX_CALLS: 30,
  /** Trade API 频率限制时间窗口（毫秒） */
  RATE_LIMIT_WINDOW_MS: 30_000,
  /** 两次调用最小间隔（API 要求 20ms，加 10ms 缓冲） */
  MIN_CALL_INTERVAL_MS: 30,
  /** 时间窗口边界的安全余量（毫秒） */
  RATE_LIMIT_BUFFER_MS: 100,
  /** 默认网关端口 */
  DEFAULT_GATEWAY_PORT: 443,
} as const;

/** 系统验证相关常量 */
export const VALIDATION = {
  /** 连接耗时上限（毫秒） */
  MAX_CONNECTION_MS: 10_000,
  /** 数据获取耗时上限（毫秒） */
  MAX_DATA_RETRIEVAL_MS: 5_000,
  /** 行情与下单测试使用的标的 */
  PROBE_SYMBOL: 'AAPL',
} as const;

/** 日志级别 */
export const LOG_LEVELS = {
  DEBUG: 20,
  INFO: 30,
  WARN: 40,
  ERROR: 50,
} as const;

/** 日志相关常量 */
export const LOGGING = {
  /** 文件流 drain 超时时间（毫秒） */
  DRAIN_TIMEOUT_MS: 5000,
  /** 控制台流 drain 超时时间（毫秒） */
  CONSOLE_DRAIN_TIMEOUT_MS: 3000,
  /** 每个日志目录保留的最新文件数 */
  MAX_RETAINED_LOG_FILES: 30,
} as const;

/** 实盘确认口令 */
export const LIVE_TRADING_CONFIRMATION = 'CONFIRM LIVE TRADING';
