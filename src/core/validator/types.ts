import type { RiskConfig, TradingConfig } from '../../types/config.js';
import type { BrokerCapability } from '../../types/services.js';
import type { Logger } from '../../utils/logger/index.js';

/** 验证套件（按执行顺序） */
export type ValidationSuiteName =
  | 'configuration'
  | 'connections'
  | 'apiFunctionality'
  | 'riskControls'
  | 'orderManagement'
  | 'integration'
  | 'performance';

/**
 * 单项验证结果
 */
export type ValidationResult = {
  readonly testName: string;
  readonly passed: boolean;
  readonly message: string;
  readonly details: Readonly<Record<string, unknown>> | null;
  readonly timestamp: string;
};

/**
 * 验证报告（可直接序列化为 JSON）
 */
export type ValidationReport = {
  readonly summary: {
    readonly totalTests: number;
    readonly passed: number;
    readonly failed: number;
    readonly successRate: number;
    readonly timestamp: string;
  };
  readonly results: ReadonlyArray<ValidationResult>;
  readonly recommendations: ReadonlyArray<string>;
};

/**
 * 落盘的验证报告（对外 JSON 格式，键名为 snake_case）
 */
export type SerializedValidationReport = {
  readonly summary: {
    readonly total_tests: number;
    readonly passed: number;
    readonly failed: number;
    readonly success_rate: number;
    readonly timestamp: string;
  };
  readonly results: ReadonlyArray<{
    readonly test_name: string;
    readonly passed: boolean;
    readonly message: string;
    readonly details: Readonly<Record<string, unknown>> | null;
    readonly timestamp: string;
  }>;
  readonly recommendations: ReadonlyArray<string>;
};

export type TradingSystemValidatorDeps = {
  readonly config: TradingConfig;
  /** 每个套件创建一个新的券商实例，默认按配置选择模拟或 LongPort 券商 */
  readonly createBroker?: () => BrokerCapability;
  /** 集成验证使用的风控配置，默认按交易配置生成 */
  readonly riskConfig?: RiskConfig;
  readonly now?: () => Date;
  /** 单调时钟（毫秒），用于性能验证计时 */
  readonly clock?: () => number;
  readonly logger?: Logger;
};

export interface TradingSystemValidator {
  runFullValidation(): Promise<ValidationReport>;
  /** 仅运行指定套件（清空上一次结果） */
  runSuites(suites: ReadonlyArray<ValidationSuiteName>): Promise<ValidationReport>;
  getResults(): ReadonlyArray<ValidationResult>;
  generateReport(): ValidationReport;
  saveReport(filePath: string): void;
}
