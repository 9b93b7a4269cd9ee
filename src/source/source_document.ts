import type { SourceLocation, SourceSpan } from '../types.js';

function buildLineStarts(text: string): number[] {
  const starts: number[] = [0];
  for (let i = 0; i < text.length; i++) if (text[i] === '\n') starts.push(i + 1);
  return starts;
}

/**
 * 源文档：保存原始文本与行首偏移表，负责把绝对偏移换算为行列位置。
 */
export class SourceDocument {
  private readonly lineStarts: readonly number[];

  private constructor(
    readonly text: string,
    readonly filePath: string | null
  ) {
    this.lineStarts = buildLineStarts(text);
  }

  static create(text: string, filePath: string | null = null): SourceDocument {
    return new SourceDocument(text, filePath);
  }

  get length(): number {
    return this.text.length;
  }

  get lineCount(): number {
    return this.lineStarts.length;
  }

  getLocation(absoluteIndex: number): SourceLocation {
    const index = Math.max(0, Math.min(absoluteIndex, this.text.length));
    // 二分查找最后一个 <= index 的行首
    let lo = 0;
    let hi = this.lineStarts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if ((this.lineStarts[mid] ?? 0) <= index) lo = mid;
      else hi = mid - 1;
    }
    return {
      absoluteIndex: index,
      lineIndex: lo,
      characterIndex: index - (this.lineStarts[lo] ?? 0),
    };
  }

  createSpan(absoluteIndex: number, length: number): SourceSpan {
    return { ...this.getLocation(absoluteIndex), length: Math.max(0, length), filePath: this.filePath };
  }

  getText(start: number, end: number): string {
    return this.text.slice(start, end);
  }
}

/**
 * 不依赖源文档构造区间（行列未知时按单行处理）。
 */
export function createSourceSpan(
  absoluteIndex: number,
  length: number,
  filePath: string | null = null,
  lineIndex = 0,
  characterIndex = absoluteIndex
): SourceSpan {
  return { filePath, absoluteIndex, lineIndex, characterIndex, length };
}

// Baseline form: (abs:line,char [len]) with the file path appended when known.
export function formatSourceSpan(span: SourceSpan): string {
  const location = `${span.absoluteIndex}:${span.lineIndex},${span.characterIndex}`;
  const path = span.filePath ? ` ${span.filePath}` : '';
  return `(${location} [${span.length}]${path})`;
}
