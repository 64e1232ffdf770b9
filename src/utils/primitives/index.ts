/**
 * 类型保护：判断 unknown 是否为可索引对象。
 * 默认行为：仅当 typeof value === 'object' 且 value !== null 时返回 true，否则返回 false。
 *
 * @param value 待判断值
 * @returns true 表示可按键读取字段，否则返回 false
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * 将比例格式化为一位小数的百分比字符串，如 0.2 → "20.0%"。
 */
export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}
