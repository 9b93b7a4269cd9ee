/**
 * 编程契约类错误。
 *
 * 与 Diagnostic 不同，这些错误表示调用方用错了 API（遍历了不支持的树形、在错误的上下文中比较基线等），
 * 必须立即抛出，核心代码内部不捕获。
 */

/**
 * 访问器未实现的遍历分支（例如调试序列化器的 trivia 分支）。
 */
export class NotImplementedError extends Error {
  constructor(readonly capability: string) {
    super(`${capability} is not implemented`);
    this.name = 'NotImplementedError';
  }
}

export class BaselineUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BaselineUsageError';
  }
}

export class BaselineMismatchError extends Error {
  constructor(
    message: string,
    readonly baselineFile: string,
    readonly lineNumber: number | null = null
  ) {
    super(message);
    this.name = 'BaselineMismatchError';
  }
}

export class SyntaxTreeVerificationError extends Error {
  constructor(
    message: string,
    readonly nodeKind: string,
    readonly position: number
  ) {
    super(message);
    this.name = 'SyntaxTreeVerificationError';
  }
}

export class SyntaxTreeJsonError extends Error {
  constructor(
    message: string,
    readonly errors: readonly string[] = []
  ) {
    super(message);
    this.name = 'SyntaxTreeJsonError';
  }
}
