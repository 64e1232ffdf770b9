/**
 * 实盘确认模块
 *
 * 实盘模式下要求用户在终端完整输入确认短语，否则放弃启动。
 */
import { stdin, stdout } from 'node:process';
import { createInterface } from 'node:readline/promises';
import { LIVE_TRADING_CONFIRMATION } from '../../constants/index.js';
import type { TradingConfig } from '../../types/config.js';
import { logger } from '../../utils/logger/index.js';

/** 读取一行用户输入 */
export type PromptLine = (question: string) => Promise<string>;

const promptFromTerminal: PromptLine = async (question) => {
  const rl = createInterface({ input: stdin, output: stdout });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
};

/**
 * 确认是否继续：dry run 直接通过；实盘需输入确认短语（首尾空白忽略）
 */
export async function confirmLiveTrading(
  config: TradingConfig,
  prompt: PromptLine = promptFromTerminal,
): Promise<boolean> {
  if (config.dryRun) {
    logger.info('DRY RUN 模式：不会执行真实交易');
    return true;
  }

  logger.warn('实盘模式已启用，真实资金将承担风险');
  logger.warn(`账户: ${config.broker.accountId ?? '默认'}`);
  logger.warn(`单笔持仓上限: ${config.maxPositionSize.toFixed(2)}，单笔订单上限: ${config.maxOrderValue.toFixed(2)}`);

  const answer = await prompt(`输入 '${LIVE_TRADING_CONFIRMATION}' 以使用真实资金继续: `);
  if (answer.trim() !== LIVE_TRADING_CONFIRMATION) {
    logger.info('确认短语不匹配，已取消实盘交易');
    return false;
  }
  return true;
}
