// Core type definitions shared by the syntax model, passes and diagnostics

/**
 * 源文本中的一个位置（全部为 0 起始）。
 */
export interface SourceLocation {
  readonly absoluteIndex: number;
  readonly lineIndex: number;
  readonly characterIndex: number;
}

/**
 * 源文本中的一段区间，用于诊断定位与基线输出。
 */
export interface SourceSpan extends SourceLocation {
  readonly filePath: string | null;
  readonly length: number;
}

/**
 * 解析/编译选项。designTime 为 true 时启用设计时降级（编辑器工具使用的编译模式）。
 */
export interface ParserOptions {
  readonly designTime: boolean;
}

export const DEFAULT_PARSER_OPTIONS: ParserOptions = Object.freeze({ designTime: false });
