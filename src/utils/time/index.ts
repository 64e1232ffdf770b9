import { TIME } from '../../constants/index.js';

/**
 * 将时间平移到香港时区（UTC+8），之后按 UTC 字段读取即为香港本地时间（内部使用）。
 */
function shiftToHongKong(date: Date): Date {
  return new Date(date.getTime() + TIME.HONG_KONG_TIMEZONE_OFFSET_MS);
}

function pad(value: number, length: number = 2): string {
  return String(value).padStart(length, '0');
}

/**
 * 香港时间日期键 YYYY-MM-DD。
 * 风控日切、交易日志文件名都以此为准。
 *
 * @param date 时间对象，默认当前时间
 * @returns 香港日期字符串，如 "2024-03-15"
 */
export function resolveHongKongDayKey(date: Date | null = null): string {
  const hkTime = shiftToHongKong(date ?? new Date());
  return `${hkTime.getUTCFullYear()}-${pad(hkTime.getUTCMonth() + 1)}-${pad(hkTime.getUTCDate())}`;
}

/**
 * 将时间转换为香港时间（UTC+8）的日志格式字符串。
 * 默认行为：date 为 null 时使用当前时间。
 *
 * @param date 时间对象，默认 null（当前时间）
 * @returns 香港时间字符串 YYYY-MM-DD HH:mm:ss.sss
 */
export function toHongKongTimeLog(date: Date | null = null): string {
  const hkTime = shiftToHongKong(date ?? new Date());
  const time = `${pad(hkTime.getUTCHours())}:${pad(hkTime.getUTCMinutes())}:${pad(hkTime.getUTCSeconds())}`;
  return `${resolveHongKongDayKey(date)} ${time}.${pad(hkTime.getUTCMilliseconds(), 3)}`;
}

/**
 * 将时间转换为带 +08:00 偏移的 ISO 字符串，用于交易记录与验证报告。
 *
 * @param date 时间对象，默认 null（当前时间）
 * @returns 如 "2024-03-15T09:30:00.000+08:00"
 */
export function toHongKongTimeIso(date: Date | null = null): string {
  return `${toHongKongTimeLog(date).replace(' ', 'T')}+08:00`;
}
