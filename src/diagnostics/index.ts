/**
 * @module diagnostics
 *
 * 诊断系统模块。
 *
 * 包含：
 * - 结构化诊断 (Diagnostic, DiagnosticBuilder)
 * - 诊断严重级别与代码 (DiagnosticSeverity, DiagnosticCode)
 * - 编程契约错误 (NotImplementedError, BaselineUsageError, ...)
 */

export {
  DiagnosticSeverity,
  DiagnosticCode,
  DiagnosticBuilder,
  Diagnostics,
  formatDiagnostic,
  serializeDiagnostic,
  type Diagnostic,
} from './diagnostics.js';

export {
  NotImplementedError,
  BaselineUsageError,
  BaselineMismatchError,
  SyntaxTreeVerificationError,
  SyntaxTreeJsonError,
} from './errors.js';
