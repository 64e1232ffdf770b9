/**
 * 风控交易执行系统 - 主入口模块
 *
 * 系统概述：
 * - 读取决策引擎输出的决策文件（ticker → {action, quantity, confidence, reasoning}）
 * - 每笔决策依次经过订单翻译、风控校验、前置检查后提交券商
 * - dry run 模式使用模拟券商成交；实盘模式通过 LongPort 网关下单，启动前需输入确认短语
 *
 * 用法：
 * - 执行决策：node dist/src/index.js <decisions.json>
 * - 系统验证：node dist/src/index.js --validate [报告路径]
 *
 * 相关模块：
 * - core/riskController/index.ts：风险管理（熔断、日切）
 * - core/trader/index.ts：交易执行（门面模式）
 * - core/broker/index.ts：券商能力（模拟 / LongPort）
 * - main/session/index.ts：交易会话
 * - core/validator/index.ts：系统验证
 */
import path from 'node:path';
import dotenv from 'dotenv';
import { createRiskConfig, readRiskConfigInput } from './config/config.risk.js';
import { createTradingConfig } from './config/config.trading.js';
import { createBroker } from './core/broker/index.js';
import { createRiskManager } from './core/riskController/index.js';
import { createPortfolio, createTradeExecutor } from './core/trader/index.js';
import { createTradingSystemValidator } from './core/validator/index.js';
import { loadDecisionsFile } from './main/decisions/index.js';
import { confirmLiveTrading } from './main/liveConfirmation/index.js';
import { runTradingSession } from './main/session/index.js';
import type { TradingConfig } from './types/config.js';
import type { TradingDecision } from './types/trading.js';
import { formatError, isNamedError } from './utils/error/index.js';
import { logger, setLogLevel } from './utils/logger/index.js';
import { formatPercent } from './utils/primitives/index.js';

dotenv.config({ path: '.env.local' });
dotenv.config();

const VALIDATE_FLAG = '--validate';
const DEFAULT_REPORT_PATH = path.join('logs', 'validation', 'validation-report.json');

function loadConfig(env: NodeJS.ProcessEnv): TradingConfig | null {
  try {
    return createTradingConfig({ env });
  } catch (err) {
    if (isNamedError(err, 'ConfigValidationError')) {
      logger.error('程序启动失败：配置验证未通过');
    } else {
      logger.error('配置加载过程中发生错误', formatError(err));
    }
    return null;
  }
}

async function runValidation(config: TradingConfig, reportPath: string): Promise<number> {
  const validator = createTradingSystemValidator({ config });
  const report = await validator.runFullValidation();
  validator.saveReport(reportPath);

  const { summary } = report;
  logger.info(
    `系统验证完成：${summary.passed}/${summary.totalTests} 通过（${formatPercent(summary.successRate)}）`,
  );
  for (const recommendation of report.recommendations) {
    logger.info(`建议：${recommendation}`);
  }
  return summary.failed === 0 ? 0 : 1;
}

async function runDecisions(
  config: TradingConfig,
  env: NodeJS.ProcessEnv,
  decisions: ReadonlyMap<string, TradingDecision>,
): Promise<number> {
  const riskManager = createRiskManager({ config: createRiskConfig(readRiskConfigInput(env, config)) });
  const broker = createBroker({ config });
  const executor = createTradeExecutor({ broker, riskManager, config });

  if (!(await executor.connect())) {
    logger.error('连接券商失败，程序退出');
    return 1;
  }

  try {
    const readiness = await executor.validateTradingSession();
    if (!readiness.ready) {
      logger.error(`交易会话未就绪：${readiness.message}`);
      return 1;
    }

    const portfolio = createPortfolio({
      tickers: [...decisions.keys()],
      initialCash: config.initialCash,
      marginRequirement: config.marginRequirement,
    });
    const result = await runTradingSession({
      executor,
      broker,
      riskManager,
      decisions,
      portfolio,
      priceTimeoutMs: config.brokerCallTimeoutMs,
    });

    const report = executor.getExecutionReport();
    logger.info(
      `执行统计：${report.successfulTrades}/${report.totalTrades} 成功，成交金额 ${report.totalExecutedValue.toFixed(2)}，佣金 ${report.totalCommission.toFixed(2)}`,
    );
    const account = result.finalAccount?.accountInfo ?? null;
    if (account !== null) {
      logger.info(`最终现金 ${account.cash.toFixed(2)}，总资产 ${account.totalAssets.toFixed(2)}`);
    }
    return 0;
  } finally {
    await executor.disconnect();
  }
}

/**
 * 程序主入口函数
 * @returns 进程退出码
 */
async function main(): Promise<number> {
  const env = process.env;
  const config = loadConfig(env);
  if (config === null) {
    return 1;
  }
  setLogLevel(config.logLevel);

  const args = process.argv.slice(2);
  if (args[0] === VALIDATE_FLAG) {
    return runValidation(config, args[1] ?? DEFAULT_REPORT_PATH);
  }

  const decisionsPath = args[0];
  if (decisionsPath === undefined) {
    logger.error(`用法: <decisions.json> | ${VALIDATE_FLAG} [报告路径]`);
    return 1;
  }

  let decisions: ReadonlyMap<string, TradingDecision>;
  try {
    decisions = loadDecisionsFile(decisionsPath);
  } catch (err) {
    logger.error(`读取决策文件失败: ${decisionsPath}`, formatError(err));
    return 1;
  }
  if (decisions.size === 0) {
    logger.warn('决策文件中没有可执行的决策');
    return 0;
  }

  if (!(await confirmLiveTrading(config))) {
    return 0;
  }
  return runDecisions(config, env, decisions);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.error('程序异常退出', formatError(err));
    process.exitCode = 1;
  });
