/**
 * 日志系统模块
 *
 * 功能：
 * - 基于 pino 的日志系统，自定义 DEBUG/INFO/WARN/ERROR 四级
 * - 双流输出：同时输出到控制台和文件
 * - 按香港日期自动分割日志文件，并保留最近 N 个文件
 * - 日志级别由 LOG_LEVEL 决定，运行中可通过 setLogLevel 调整
 *
 * 日志目录：
 * - <logRoot>/system/：系统日志（所有已启用级别）
 *
 * 特性：
 * - 控制台输出带颜色高亮，WARN/ERROR 写入 stderr
 * - 文件输出纯文本格式
 * - 进程信号处理和异常捕获（测试档位默认关闭）
 */
import fs from 'node:fs';
import path from 'node:path';
import { Writable } from 'node:stream';
import { inspect } from 'node:util';
import pino from 'pino';
import { LOG_LEVELS, LOGGING } from '../../constants/index.js';
import { isRecord } from '../primitives/index.js';
import { resolveLogRootDir, shouldInstallGlobalProcessHooks } from '../runtime/index.js';
import { resolveHongKongDayKey, toHongKongTimeLog } from '../time/index.js';
import type { LogLevelName, LogObject, Logger } from './types.js';

export type { Logger, LogLevelName } from './types.js';

// ANSI 颜色代码
const colors = {
  reset: '\x1b[0m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  gray: '\x1b[90m',
} as const;

const LEVEL_LABELS: Readonly<Record<number, { readonly name: string; readonly color: string }>> = {
  [LOG_LEVELS.DEBUG]: { name: 'DEBUG', color: colors.gray },
  [LOG_LEVELS.INFO]: { name: 'INFO', color: '' },
  [LOG_LEVELS.WARN]: { name: 'WARN', color: colors.yellow },
  [LOG_LEVELS.ERROR]: { name: 'ERROR', color: colors.red },
};

/**
 * 解析 LOG_LEVEL 取值，大小写不敏感，无法识别时返回 null。
 */
export function parseLogLevel(value: string | undefined): LogLevelName | null {
  const normalized = value?.trim().toUpperCase();
  if (
    normalized === 'DEBUG' ||
    normalized === 'INFO' ||
    normalized === 'WARN' ||
    normalized === 'ERROR'
  ) {
    return normalized;
  }
  return null;
}

const toPinoLevel = (level: LogLevelName): 'debug' | 'info' | 'warn' | 'error' => {
  switch (level) {
    case 'DEBUG':
      return 'debug';
    case 'INFO':
      return 'info';
    case 'WARN':
      return 'warn';
    case 'ERROR':
      return 'error';
  }
};

const formatExtra = (extra: unknown): string => {
  return inspect(extra, { depth: 5, maxArrayLength: 100 });
};

function isLogObject(value: unknown): value is LogObject {
  return (
    isRecord(value) &&
    typeof value['level'] === 'number' &&
    typeof value['time'] === 'number' &&
    typeof value['msg'] === 'string'
  );
}

/**
 * 仅保留目录中最新的 maxFiles 个指定扩展名文件（按文件名排序，文件名为日期）。
 * keepFileName 对应的文件即使尚未创建也计入保留名额。
 */
export function retainLatestLogFiles(
  dir: string,
  maxFiles: number,
  extension: string,
  keepFileName: string | null = null,
): void {
  if (!fs.existsSync(dir)) {
    return;
  }
  const suffix = `.${extension}`;
  const files = fs
    .readdirSync(dir)
    .filter((name) => name.endsWith(suffix) && name !== keepFileName)
    .sort();
  const budget = keepFileName === null ? maxFiles : maxFiles - 1;
  const excess = files.length - Math.max(budget, 0);
  for (const name of files.slice(0, Math.max(excess, 0))) {
    try {
      fs.unlinkSync(path.join(dir, name));
    } catch (err) {
      console.error(`[Logger] 删除过期日志文件失败: ${name}`, err);
    }
  }
}

/**
 * 按日期分割的文件流（用于 pino 传输）
 */
class DateRotatingStream extends Writable {
  private readonly _logDir: string;
  private _currentDate: string | null = null;
  private _fileStream: fs.WriteStream | null = null;

  constructor(logRootDir: string, logSubDir: string) {
    super();
    this._logDir = path.join(logRootDir, logSubDir);
    if (!fs.existsSync(this._logDir)) {
      fs.mkdirSync(this._logDir, { recursive: true });
    }
  }

  /**
   * 日期变化时关闭旧文件并打开新文件。
   * 旧流 end() 后由 Node 异步完成刷盘，新写入立即进入新文件。
   */
  private _rotateIfNeeded(): void {
    const today = resolveHongKongDayKey();
    if (this._currentDate === today && this._fileStream) {
      return;
    }

    this._fileStream?.end();
    this._currentDate = today;
    const fileName = `${today}.log`;
    retainLatestLogFiles(this._logDir, LOGGING.MAX_RETAINED_LOG_FILES, 'log', fileName);
    this._fileStream = fs.createWriteStream(path.join(this._logDir, fileName), {
      flags: 'a',
      encoding: 'utf8',
    });
    this._fileStream.on('error', (err) => {
      console.error('[DateRotatingStream] 文件流错误:', err);
    });
  }

  override _write(
    chunk: Buffer,
    encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    try {
      this._rotateIfNeeded();
      const stream = this._fileStream;
      if (!stream?.writable) {
        callback();
        return;
      }
      if (stream.write(chunk, encoding)) {
        callback();
        return;
      }
      writeAfterDrain(stream, LOGGING.DRAIN_TIMEOUT_MS, callback);
    } catch (err) {
      console.error('[DateRotatingStream] 写入失败:', err);
      callback();
    }
  }

  /**
   * 同步关闭文件流（进程退出时使用）
   */
  closeSync(): void {
    if (this._fileStream) {
      this._fileStream.end();
      this._fileStream = null;
    }
  }
}

/**
 * 等待 drain 事件，超时后仍调用 callback 避免阻塞日志系统
 */
function writeAfterDrain(
  stream: NodeJS.WritableStream,
  timeout: number,
  callback: () => void,
): void {
  let resolved = false;
  const onDrain = (): void => {
    if (resolved) return;
    resolved = true;
    clearTimeout(timeoutId);
    callback();
  };
  const timeoutId = setTimeout(() => {
    if (resolved) return;
    resolved = true;
    stream.removeListener('drain', onDrain);
    callback();
  }, timeout);
  stream.once('drain', onDrain);
}

/**
 * ANSI 颜色代码正则表达式（ESC[数字;...m）
 */
const ANSI_CODE_REGEX = new RegExp(String.fromCodePoint(27) + String.raw`\[[0-9;]*m`, 'g');

function appendExtra(line: string, extra: unknown, strip: boolean): string {
  if (extra === undefined || extra === null) {
    return line;
  }
  let text: string;
  if (typeof extra === 'object') {
    try {
      text = JSON.stringify(extra);
    } catch {
      text = formatExtra(extra);
    }
  } else {
    text = formatExtra(extra);
  }
  return `${line} ${strip ? text.replaceAll(ANSI_CODE_REGEX, '') : text}`;
}

/**
 * 格式化为文件输出（纯文本）
 */
function formatForFile(obj: LogObject): string {
  const label = LEVEL_LABELS[obj.level]?.name ?? 'INFO';
  const timestamp = toHongKongTimeLog(new Date(obj.time));
  const line = `[${label}] ${timestamp} ${obj.msg.replaceAll(ANSI_CODE_REGEX, '')}`;
  return `${appendExtra(line, obj.extra, true)}\n`;
}

/**
 * 格式化为控制台输出（带颜色）
 */
function formatForConsole(obj: LogObject): string {
  const config = LEVEL_LABELS[obj.level] ?? { name: 'INFO', color: '' };
  const reset = config.color ? colors.reset : '';
  const timestamp = toHongKongTimeLog(new Date(obj.time));
  const line = `${config.color}[${config.name}] ${timestamp} ${obj.msg}${reset}`;
  return `${appendExtra(line, obj.extra, false)}\n`;
}

function parseLogChunk(chunk: Buffer): LogObject | null {
  try {
    const parsed: unknown = JSON.parse(chunk.toString());
    return isLogObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

const systemFileStream = new DateRotatingStream(resolveLogRootDir(process.env), 'system');

// 控制台流：WARN/ERROR 写入 stderr，其他写入 stdout
const consoleStream = new Writable({
  write(chunk: Buffer, _encoding: BufferEncoding, callback: () => void): void {
    const obj = parseLogChunk(chunk);
    if (!obj) {
      callback();
      return;
    }
    const target = obj.level >= LOG_LEVELS.WARN ? process.stderr : process.stdout;
    if (target.write(formatForConsole(obj))) {
      callback();
      return;
    }
    writeAfterDrain(target, LOGGING.CONSOLE_DRAIN_TIMEOUT_MS, callback);
  },
});

// 文件流：转换为纯文本后交给按日期分割的文件流
const fileStream = new Writable({
  write(chunk: Buffer, _encoding: BufferEncoding, callback: () => void): void {
    const obj = parseLogChunk(chunk);
    if (!obj) {
      callback();
      return;
    }
    systemFileStream.write(formatForFile(obj), (err) => {
      if (err) {
        console.error('[FileStream] 系统日志写入失败:', err);
      }
      callback();
    });
  },
});

const initialLevel = toPinoLevel(parseLogLevel(process.env['LOG_LEVEL']) ?? 'INFO');

const pinoLogger = pino(
  {
    level: initialLevel,
    customLevels: {
      debug: LOG_LEVELS.DEBUG,
      info: LOG_LEVELS.INFO,
      warn: LOG_LEVELS.WARN,
      error: LOG_LEVELS.ERROR,
    },
    useOnlyCustomLevels: true,
  },
  pino.multistream([
    { level: 'debug', stream: consoleStream },
    { level: 'debug', stream: fileStream },
  ]),
);

/**
 * 调整日志级别（配置加载完成后由入口调用）
 */
export function setLogLevel(level: LogLevelName): void {
  pinoLogger.level = toPinoLevel(level);
}

/**
 * 导出的 logger 单例
 */
export const logger: Logger = {
  debug(msg: string, extra?: unknown): void {
    if (extra == null) {
      pinoLogger.debug(msg);
    } else {
      pinoLogger.debug({ extra }, msg);
    }
  },

  info(msg: string, extra?: unknown): void {
    if (extra == null) {
      pinoLogger.info(msg);
    } else {
      pinoLogger.info({ extra }, msg);
    }
  },

  warn(msg: string, extra?: unknown): void {
    if (extra == null) {
      pinoLogger.warn(msg);
    } else {
      pinoLogger.warn({ extra }, msg);
    }
  },

  error(msg: string, extra?: unknown): void {
    if (extra == null) {
      pinoLogger.error(msg);
    } else {
      pinoLogger.error({ extra }, msg);
    }
  },
};

let isSyncCleaningUp = false;

/**
 * 同步清理函数（用于进程退出）
 */
function cleanupSync(): void {
  if (isSyncCleaningUp) {
    return;
  }
  isSyncCleaningUp = true;
  try {
    pinoLogger.flush();
    systemFileStream.closeSync();
  } catch (err) {
    console.error('[Logger] 同步清理过程出错:', err);
  }
}

if (shouldInstallGlobalProcessHooks(process.env)) {
  process.on('beforeExit', () => {
    cleanupSync();
  });

  process.on('SIGINT', () => {
    cleanupSync();
    process.exit(0);
  });

  process.on('SIGTERM', () => {
    cleanupSync();
    process.exit(0);
  });

  process.on('uncaughtException', (err: Error) => {
    logger.error('未捕获的异常', err);
    cleanupSync();
    process.exit(1);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('未处理的 Promise 拒绝', reason);
  });
}
