/**
 * 决策解析模块
 *
 * 功能/职责：
 * - 将决策引擎输出（JSON 字符串或对象）解析为 ticker → TradingDecision 映射
 * - 支持 { decisions: {...} } 包裹格式
 * - 未知动作按 hold 处理，confidence 截断到 0-100，数量取整，非数值按 0
 *
 * 返回 Map 以保持决策在输入中的顺序（避免数字形式的键被对象重排）。
 */
import fs from 'node:fs';
import type { TradeAction, TradingDecision } from '../../types/trading.js';
import { formatError } from '../../utils/error/index.js';
import { logger } from '../../utils/logger/index.js';
import { isRecord } from '../../utils/primitives/index.js';

export type DecisionParseError = Error & {
  readonly name: 'DecisionParseError';
};

const createDecisionParseError = (message: string): DecisionParseError =>
  Object.assign(new Error(message), { name: 'DecisionParseError' as const });

const TRADE_ACTIONS: ReadonlySet<string> = new Set(['buy', 'sell', 'short', 'cover', 'hold']);

function isTradeAction(value: string): value is TradeAction {
  return TRADE_ACTIONS.has(value);
}

function readNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function parseAction(ticker: string, value: unknown): TradeAction {
  const normalized = typeof value === 'string' ? value.trim().toLowerCase() : '';
  if (isTradeAction(normalized)) {
    return normalized;
  }
  logger.warn(`[决策解析] ${ticker} 动作无效: ${String(value)}，按 hold 处理`);
  return 'hold';
}

function parseDecision(ticker: string, raw: Record<string, unknown>): TradingDecision {
  const quantity = readNumber(raw['quantity']);
  const confidence = readNumber(raw['confidence']);
  return {
    action: parseAction(ticker, raw['action']),
    quantity: quantity === null ? 0 : Math.trunc(quantity),
    confidence: confidence === null ? 0 : Math.min(100, Math.max(0, confidence)),
    reasoning: typeof raw['reasoning'] === 'string' ? raw['reasoning'] : '',
  };
}

/**
 * 解析决策
 * @param input JSON 字符串或已解析的对象
 * @throws DecisionParseError JSON 无法解析或顶层不是对象
 */
export function parseDecisions(input: unknown): Map<string, TradingDecision> {
  let parsed = input;
  if (typeof input === 'string') {
    try {
      parsed = JSON.parse(input);
    } catch (err) {
      throw createDecisionParseError(`决策 JSON 解析失败: ${formatError(err)}`);
    }
  }
  if (!isRecord(parsed) || Array.isArray(parsed)) {
    throw createDecisionParseError('决策格式错误：顶层必须为对象');
  }
  const nested = parsed['decisions'];
  const source = isRecord(nested) ? nested : parsed;

  const decisions = new Map<string, TradingDecision>();
  for (const [ticker, raw] of Object.entries(source)) {
    const symbol = ticker.trim();
    if (symbol === '' || !isRecord(raw)) {
      logger.warn(`[决策解析] 忽略无效决策: ${ticker}`);
      continue;
    }
    decisions.set(symbol, parseDecision(symbol, raw));
  }
  return decisions;
}

/**
 * 从文件读取决策
 */
export function loadDecisionsFile(filePath: string): Map<string, TradingDecision> {
  return parseDecisions(fs.readFileSync(filePath, 'utf8'));
}
