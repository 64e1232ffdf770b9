/**
 * 交易系统验证模块
 *
 * 功能/职责：
 * - 端到端冒烟验证：配置、连接、API、风控、下单、集成、性能七个套件依次执行
 * - 每个套件独立捕获异常并记录为失败项，不中断后续套件
 * - 生成可序列化的验证报告与改进建议，可写入 JSON 文件
 *
 * 实盘模式下跳过下单验证，集成验证只检查连接。
 */
import fs from 'node:fs';
import path from 'node:path';
import { EXECUTION, VALIDATION } from '../../constants/index.js';
import { createRiskConfig } from '../../config/config.risk.js';
import { findMissingCredentials, isValidPort } from '../../config/config.validator.js';
import type { BrokerCapability } from '../../types/services.js';
import { formatError } from '../../utils/error/index.js';
import { logger as defaultLogger } from '../../utils/logger/index.js';
import { toHongKongTimeIso } from '../../utils/time/index.js';
import { createBroker } from '../broker/index.js';
import { createOrder } from '../order/index.js';
import { createRiskManager } from '../riskController/index.js';
import { createPortfolio, createTradeExecutor } from '../trader/index.js';
import type {
  SerializedValidationReport,
  TradingSystemValidator,
  TradingSystemValidatorDeps,
  ValidationReport,
  ValidationResult,
  ValidationSuiteName,
} from './types.js';

export type {
  SerializedValidationReport,
  TradingSystemValidator,
  ValidationReport,
  ValidationResult,
  ValidationSuiteName,
} from './types.js';

export const ALL_VALIDATION_SUITES: ReadonlyArray<ValidationSuiteName> = [
  'configuration',
  'connections',
  'apiFunctionality',
  'riskControls',
  'orderManagement',
  'integration',
  'performance',
];

const QUICK_VALIDATION_SUITES: ReadonlyArray<ValidationSuiteName> = ['configuration', 'connections'];

/** 快速验证中视为关键项的测试名关键字 */
const CRITICAL_TEST_KEYWORDS = ['Configuration', 'Connection'] as const;

const formatSeconds = (ms: number): string => (ms / 1000).toFixed(2);

export function createTradingSystemValidator(deps: TradingSystemValidatorDeps): TradingSystemValidator {
  const { config } = deps;
  const now = deps.now ?? (() => new Date());
  const clock = deps.clock ?? (() => performance.now());
  const logger = deps.logger ?? defaultLogger;
  const newBroker = deps.createBroker ?? (() => createBroker({ config, logger }));
  const riskConfig =
    deps.riskConfig ??
    createRiskConfig(
      { maxPositionSize: config.maxPositionSize, maxDailyTrades: config.maxDailyTrades },
      logger,
    );

  const results: ValidationResult[] = [];

  const addResult = (
    testName: string,
    passed: boolean,
    message: string,
    details: Readonly<Record<string, unknown>> | null = null,
  ): void => {
    results.push({ testName, passed, message, details, timestamp: toHongKongTimeIso(now()) });
    const line = `[系统验证] ${passed ? '通过' : '失败'} ${testName}: ${message}`;
    if (passed) {
      logger.info(line);
    } else {
      logger.warn(line);
    }
  };

  /**
   * 以新建券商执行套件，结束后断开连接
   */
  const withBroker = async (run: (broker: BrokerCapability) => Promise<void>): Promise<void> => {
    const broker = newBroker();
    try {
      await run(broker);
    } finally {
      await broker.disconnect();
    }
  };

  async function validateConfiguration(): Promise<void> {
    const missingFields = [
      ...(config.broker.host.trim() === '' ? ['BROKER_HOST'] : []),
      ...findMissingCredentials(config),
    ];
    if (missingFields.length > 0) {
      addResult('Configuration Completeness', false, `缺少必需配置: ${missingFields.join(', ')}`);
    } else {
      addResult('Configuration Completeness', true, '必需配置项齐全');
    }

    if (isValidPort(config.broker.port)) {
      addResult('Port Configuration', true, `端口配置有效: ${config.broker.port}`);
    } else {
      addResult('Port Configuration', false, `端口无效: ${config.broker.port}`);
    }

    if (config.maxPositionSize > 0 && config.maxDailyTrades > 0) {
      addResult('Risk Limits', true, '风控上限配置有效');
    } else {
      addResult(
        'Risk Limits',
        false,
        `风控上限无效: maxPositionSize=${config.maxPositionSize}, maxDailyTrades=${config.maxDailyTrades}`,
      );
    }
  }

  async function validateConnections(): Promise<void> {
    await withBroker(async (broker) => {
      const connected = await broker.connect();
      if (!connected) {
        addResult('Broker Connection', false, `无法连接券商 ${broker.name}`);
        return;
      }
      addResult('Broker Connection', true, `已连接券商 ${broker.name}`);

      const account = await broker.getAccountInfo();
      if (account.status === 'ok') {
        addResult('Account Info Retrieval', true, '账户信息获取成功', {
          accountId: account.value.accountId,
        });
      } else {
        addResult('Account Info Retrieval', false, `账户信息获取失败: ${account.reason}`);
      }
    });
  }

  async function validateApiFunctionality(): Promise<void> {
    await withBroker(async (broker) => {
      await broker.connect();

      const price = await broker.getMarketPrice(VALIDATION.PROBE_SYMBOL);
      if (price.status === 'ok' && price.value > 0) {
        addResult(
          'Market Data Retrieval',
          true,
          `${VALIDATION.PROBE_SYMBOL} 最新价 ${price.value.toFixed(2)}`,
        );
      } else {
        addResult(
          'Market Data Retrieval',
          false,
          price.status === 'error' ? `行情获取失败: ${price.reason}` : '行情价格无效',
        );
      }

      const positions = await broker.getPositions();
      if (positions.status === 'ok') {
        addResult('Position Retrieval', true, `持仓获取成功，共 ${positions.value.length} 个`);
      } else {
        addResult('Position Retrieval', false, `持仓获取失败: ${positions.reason}`);
      }
    });
  }

  async function validateRiskControls(): Promise<void> {
    const riskManager = createRiskManager({
      config: createRiskConfig(
        {
          max_portfolio_value: 100_000,
          max_daily_loss: 5_000,
          max_position_concentration: 0.2,
          max_daily_trades: 50,
          max_leverage: 2,
          max_drawdown: 0.1,
        },
        logger,
      ),
      now,
      logger,
    });

    const summary = riskManager.getRiskSummary();
    if (summary.limits.length > 0) {
      addResult('Risk Limits Initialization', true, `风控限额初始化完成，共 ${summary.limits.length} 项`);
    } else {
      addResult('Risk Limits Initialization', false, '风控限额初始化失败');
    }

    const mockOrder = createOrder({
      symbol: VALIDATION.PROBE_SYMBOL,
      side: 'BUY',
      quantity: 100,
      orderType: 'MARKET',
      market: 'US',
    });
    const verdict = riskManager.validateOrder(
      mockOrder,
      {
        accountId: 'test',
        totalAssets: 50_000,
        cash: 25_000,
        marketValue: 25_000,
        unrealizedPnl: 0,
        realizedPnl: 0,
        buyingPower: 25_000,
      },
      [],
    );
    addResult('Trade Risk Validation', true, `风控校验完成，风险等级 ${verdict.riskLevel}`, {
      approved: verdict.approved,
      reason: verdict.reason,
    });
  }

  async function validateOrderManagement(): Promise<void> {
    if (!config.dryRun) {
      addResult('Order Management', true, '实盘模式，为安全起见跳过下单验证');
      return;
    }
    await withBroker(async (broker) => {
      await broker.connect();
      const result = await broker.submitOrder(
        createOrder({
          symbol: VALIDATION.PROBE_SYMBOL,
          side: 'BUY',
          quantity: 1,
          orderType: 'MARKET',
          market: 'US',
        }),
      );
      if (result.status === 'FILLED' || result.status === 'SUBMITTED') {
        addResult('Order Submission', true, `订单提交成功: ${result.status}`, {
          orderId: result.orderId,
          symbol: result.symbol,
        });
      } else {
        addResult('Order Submission', false, `订单提交失败: ${result.status}`, {
          error: result.errorMsg,
        });
      }
    });
  }

  async function validateIntegration(): Promise<void> {
    const executor = createTradeExecutor({
      broker: newBroker(),
      riskManager: createRiskManager({ config: riskConfig, now, logger }),
      config,
      journal: null,
      now,
      logger,
    });
    try {
      const connected = await executor.connect();
      if (!connected) {
        addResult('Executor Integration', false, '交易执行器连接失败');
        return;
      }
      addResult('Executor Integration', true, '交易执行器连接成功');

      if (config.dryRun) {
        const portfolio = createPortfolio({
          tickers: [VALIDATION.PROBE_SYMBOL],
          initialCash: 10_000,
          marginRequirement: EXECUTION.DEFAULT_MARGIN_REQUIREMENT,
        });
        const executed = await executor.execute(VALIDATION.PROBE_SYMBOL, 'buy', 1, 150, portfolio);
        addResult('Portfolio Integration', executed > 0, `组合集成验证成交 ${executed} 股`);
      }
    } finally {
      await executor.disconnect();
    }
  }

  async function validatePerformance(): Promise<void> {
    await withBroker(async (broker) => {
      const connectStart = clock();
      const connected = await broker.connect();
      const connectMs = clock() - connectStart;
      if (!connected) {
        addResult('Connection Performance', false, '无法建立连接，跳过性能验证');
        return;
      }
      addResult(
        'Connection Performance',
        connectMs < VALIDATION.MAX_CONNECTION_MS,
        `连接耗时 ${formatSeconds(connectMs)} 秒`,
      );

      const priceStart = clock();
      await broker.getMarketPrice(VALIDATION.PROBE_SYMBOL);
      const priceMs = clock() - priceStart;
      addResult(
        'Data Retrieval Performance',
        priceMs < VALIDATION.MAX_DATA_RETRIEVAL_MS,
        `行情获取耗时 ${formatSeconds(priceMs)} 秒`,
      );
    });
  }

  const SUITES: Readonly<
    Record<ValidationSuiteName, { readonly fallbackName: string; readonly run: () => Promise<void> }>
  > = {
    configuration: { fallbackName: 'Configuration Validation', run: validateConfiguration },
    connections: { fallbackName: 'Connection Test', run: validateConnections },
    apiFunctionality: { fallbackName: 'API Functionality', run: validateApiFunctionality },
    riskControls: { fallbackName: 'Risk Controls', run: validateRiskControls },
    orderManagement: { fallbackName: 'Order Management', run: validateOrderManagement },
    integration: { fallbackName: 'System Integration', run: validateIntegration },
    performance: { fallbackName: 'Performance Validation', run: validatePerformance },
  };

  function generateRecommendations(): string[] {
    const failed = results.filter((result) => !result.passed);
    if (failed.length === 0) {
      return ['所有验证通过，系统可以开始交易'];
    }
    const recommendations = ['请先处理失败的验证项，再进行实盘交易'];
    const anyFailed = (keyword: string): boolean =>
      failed.some((result) => result.testName.includes(keyword));
    if (anyFailed('Connection')) {
      recommendations.push('请确认 LongPort 凭证有效且网络可访问交易网关');
    }
    if (anyFailed('Configuration')) {
      recommendations.push('请检查并修正交易配置');
    }
    if (anyFailed('Risk')) {
      recommendations.push('请检查风控参数设置');
    }
    return recommendations;
  }

  function generateReport(): ValidationReport {
    const totalTests = results.length;
    const passed = results.filter((result) => result.passed).length;
    return {
      summary: {
        totalTests,
        passed,
        failed: totalTests - passed,
        successRate: totalTests > 0 ? passed / totalTests : 0,
        timestamp: toHongKongTimeIso(now()),
      },
      results: [...results],
      recommendations: generateRecommendations(),
    };
  }

  async function runSuites(suites: ReadonlyArray<ValidationSuiteName>): Promise<ValidationReport> {
    results.length = 0;
    for (const name of suites) {
      const suite = SUITES[name];
      logger.info(`[系统验证] 开始验证: ${suite.fallbackName}`);
      try {
        await suite.run();
      } catch (err) {
        addResult(suite.fallbackName, false, `验证异常: ${formatError(err)}`);
      }
    }
    return generateReport();
  }

  function saveReport(filePath: string): void {
    const report = serializeValidationReport(generateReport());
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, JSON.stringify(report, null, 2), 'utf8');
    logger.info(`[系统验证] 验证报告已保存: ${filePath}`);
  }

  return {
    runFullValidation: () => runSuites(ALL_VALIDATION_SUITES),
    runSuites,
    getResults: () => [...results],
    generateReport,
    saveReport,
  };
}

/**
 * 转换为落盘格式
 */
export function serializeValidationReport(report: ValidationReport): SerializedValidationReport {
  return {
    summary: {
      total_tests: report.summary.totalTests,
      passed: report.summary.passed,
      failed: report.summary.failed,
      success_rate: report.summary.successRate,
      timestamp: report.summary.timestamp,
    },
    results: report.results.map((result) => ({
      test_name: result.testName,
      passed: result.passed,
      message: result.message,
      details: result.details,
      timestamp: result.timestamp,
    })),
    recommendations: [...report.recommendations],
  };
}

/**
 * 快速验证：仅运行配置与连接套件
 * @returns 配置与连接相关的验证项全部通过时为 true
 */
export async function runQuickValidation(deps: TradingSystemValidatorDeps): Promise<boolean> {
  const validator = createTradingSystemValidator(deps);
  const report = await validator.runSuites(QUICK_VALIDATION_SUITES);
  return report.results
    .filter((result) => CRITICAL_TEST_KEYWORDS.some((keyword) => result.testName.includes(keyword)))
    .every((result) => result.passed);
}
