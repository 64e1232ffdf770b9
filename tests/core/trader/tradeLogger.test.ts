/**
 * 交易日志测试
 *
 * 功能：
 * - 按香港日期分文件追加记录
 * - 已有文件格式错误时重置
 */
import { afterEach, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { buildTradeLogPath, createTradeJournal } from '../../../src/core/trader/tradeLogger.js';
import type { TradeJournalEntry } from '../../../src/types/services.js';
import { createRecordingLogger } from '../../helpers/testDoubles.js';

const fixedTime = new Date('2024-03-15T02:00:00Z');

function readRecords(filePath: string): ReadonlyArray<Readonly<Record<string, unknown>>> {
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  assert.ok(Array.isArray(parsed));
  return parsed.filter(
    (item): item is Record<string, unknown> => typeof item === 'object' && item !== null,
  );
}

const entry: TradeJournalEntry = {
  orderId: 'DRY-000001',
  ticker: 'AAPL',
  action: 'buy',
  side: 'BUY',
  quantity: 10,
  filledQuantity: 10,
  price: 150.5,
  commission: 1.5,
  status: 'FILLED',
  error: null,
  dryRun: true,
};

describe('tradeLogger', () => {
  let rootDir = '';

  beforeEach(() => {
    rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'trade-journal-'));
  });

  afterEach(() => {
    fs.rmSync(rootDir, { recursive: true, force: true });
  });

  it('builds the path from the Hong Kong date', () => {
    assert.equal(
      buildTradeLogPath('/var/log/app', new Date('2024-03-15T16:30:00Z')),
      path.join('/var/log/app', 'trades', '2024-03-16.json'),
    );
  });

  it('appends records with a Hong Kong timestamp', () => {
    const journal = createTradeJournal({ logRootDir: rootDir, now: () => fixedTime, logger: createRecordingLogger() });
    journal.record(entry);
    journal.record({ ...entry, orderId: null, status: 'FAILED', filledQuantity: 0, error: '风控拒绝' });

    const records = readRecords(buildTradeLogPath(rootDir, fixedTime));
    assert.equal(records.length, 2);
    assert.deepEqual(records[0], { ...entry, timestamp: '2024-03-15T10:00:00.000+08:00' });
    assert.equal(records[1]?.error, '风控拒绝');
    assert.equal(records[1]?.orderId, null);
  });

  it('resets a malformed journal file', () => {
    const filePath = buildTradeLogPath(rootDir, fixedTime);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, '{"not":"an array"}', 'utf8');
    const logger = createRecordingLogger();

    createTradeJournal({ logRootDir: rootDir, now: () => fixedTime, logger }).record(entry);

    assert.equal(readRecords(filePath).length, 1);
    assert.deepEqual(logger.messages.warn, [`交易记录文件格式错误，重置为空数组: ${filePath}`]);
  });
});
