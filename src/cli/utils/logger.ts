/**
 * CLI 状态输出（带颜色的 ✓/✗/⚠/ℹ）。
 *
 * 全部写到 stderr：stdout 只留给树的调试文本或 JSON，便于重定向到文件。
 */

const enum AnsiColor {
  Reset = '\u001B[0m',
  Green = '\u001B[32m',
  Red = '\u001B[31m',
  Yellow = '\u001B[33m',
  Cyan = '\u001B[36m',
}

function colorize(symbol: string, message: string, color: AnsiColor): string {
  if (process.env.NO_COLOR) return `${symbol} ${message}`;
  return `${color}${symbol}${AnsiColor.Reset} ${message}`;
}

export function info(message: string): void {
  console.error(colorize('ℹ', message, AnsiColor.Cyan));
}

export function success(message: string): void {
  console.error(colorize('✓', message, AnsiColor.Green));
}

export function warn(message: string): void {
  console.warn(colorize('⚠', message, AnsiColor.Yellow));
}

export function error(message: string): void {
  console.error(colorize('✗', message, AnsiColor.Red));
}
