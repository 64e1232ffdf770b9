/**
 * 交易日志模块
 *
 * 职责：
 * - 将每次执行结果（成交或失败）追加到 JSON 文件（<logRootDir>/trades/YYYY-MM-DD.json，按香港日期分文件）
 * - 写入前校验已有文件结构，格式错误时重置为空数组
 * - 执行日志文件保留策略
 *
 * 写入失败只记录错误日志，不影响交易流程。
 */
import fs from 'node:fs';
import path from 'node:path';
import { LOGGING } from '../../constants/index.js';
import type { TradeJournal, TradeJournalEntry } from '../../types/services.js';
import { formatError } from '../../utils/error/index.js';
import { logger as defaultLogger, retainLatestLogFiles } from '../../utils/logger/index.js';
import { isRecord } from '../../utils/primitives/index.js';
import { resolveLogRootDir } from '../../utils/runtime/index.js';
import { resolveHongKongDayKey, toHongKongTimeIso } from '../../utils/time/index.js';
import type { TradeJournalDeps, TradeJournalRecord } from './types.js';

const isNullableString = (value: unknown): boolean => value === null || typeof value === 'string';
const isNullableNumber = (value: unknown): boolean => value === null || typeof value === 'number';

/**
 * 类型守卫：校验 unknown 是否为交易日志记录
 */
function isTradeJournalRecord(record: unknown): record is TradeJournalRecord {
  if (!isRecord(record)) {
    return false;
  }
  return (
    isNullableString(record['orderId']) &&
    typeof record['ticker'] === 'string' &&
    typeof record['action'] === 'string' &&
    isNullableString(record['side']) &&
    typeof record['quantity'] === 'number' &&
    typeof record['filledQuantity'] === 'number' &&
    isNullableNumber(record['price']) &&
    typeof record['commission'] === 'number' &&
    typeof record['status'] === 'string' &&
    isNullableString(record['error']) &&
    typeof record['dryRun'] === 'boolean' &&
    typeof record['timestamp'] === 'string'
  );
}

function isTradeJournalRecordArray(records: unknown): records is TradeJournalRecord[] {
  return Array.isArray(records) && records.every(isTradeJournalRecord);
}

/**
 * 交易日志文件路径：<logRootDir>/trades/YYYY-MM-DD.json
 */
export function buildTradeLogPath(logRootDir: string, date: Date): string {
  return path.join(logRootDir, 'trades', `${resolveHongKongDayKey(date)}.json`);
}

export function createTradeJournal(deps: TradeJournalDeps = {}): TradeJournal {
  const logRootDir = deps.logRootDir ?? resolveLogRootDir(process.env);
  const now = deps.now ?? (() => new Date());
  const logger = deps.logger ?? defaultLogger;

  function record(entry: TradeJournalEntry): void {
    try {
      const timestamp = now();
      const logDir = path.join(logRootDir, 'trades');
      if (!fs.existsSync(logDir)) {
        fs.mkdirSync(logDir, { recursive: true });
      }
      const logFile = buildTradeLogPath(logRootDir, timestamp);
      retainLatestLogFiles(logDir, LOGGING.MAX_RETAINED_LOG_FILES, 'json', path.basename(logFile));

      let records: TradeJournalRecord[] = [];
      if (fs.existsSync(logFile)) {
        try {
          const parsed: unknown = JSON.parse(fs.readFileSync(logFile, 'utf8'));
          // 信任边界：校验 JSON 解析结果
          if (isTradeJournalRecordArray(parsed)) {
            records = parsed;
          } else {
            logger.warn(`交易记录文件格式错误，重置为空数组: ${logFile}`);
          }
        } catch (err) {
          logger.warn(`解析交易记录文件失败，重置为空数组: ${logFile}`, formatError(err));
        }
      }

      records.push({
        orderId: entry.orderId,
        ticker: entry.ticker,
        action: entry.action,
        side: entry.side,
        quantity: entry.quantity,
        filledQuantity: entry.filledQuantity,
        price: entry.price,
        commission: entry.commission,
        status: entry.status,
        error: entry.error,
        dryRun: entry.dryRun,
        timestamp: toHongKongTimeIso(timestamp),
      });
      fs.writeFileSync(logFile, JSON.stringify(records, null, 2), 'utf8');
    } catch (err) {
      logger.error('写入交易记录失败', formatError(err));
    }
  }

  return { record };
}
