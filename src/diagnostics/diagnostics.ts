// Structured diagnostics with stable ids and source spans

import { formatSourceSpan } from '../source/source_document.js';
import type { SourceSpan } from '../types.js';

export enum DiagnosticSeverity {
  Error = 'error',
  Warning = 'warning',
  Info = 'info',
}

export enum DiagnosticCode {
  // Parse errors (TF1001-TF1099)
  TF1001_MissingToken = 'TF1001',
  TF1002_UnexpectedToken = 'TF1002',
  TF1003_UnterminatedBlock = 'TF1003',
  TF1004_UnexpectedEndOfFile = 'TF1004',

  // Lowering errors (TF2001-TF2099)
  TF2001_MissingDirectiveToken = 'TF2001',
}

export interface Diagnostic {
  readonly id: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly span: SourceSpan;
}

export class DiagnosticBuilder {
  private severity: DiagnosticSeverity = DiagnosticSeverity.Error;
  private id?: DiagnosticCode;
  private message?: string;
  private span?: SourceSpan;

  static error(id: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withSeverity(DiagnosticSeverity.Error).withId(id);
  }

  static warning(id: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withSeverity(DiagnosticSeverity.Warning).withId(id);
  }

  static info(id: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withSeverity(DiagnosticSeverity.Info).withId(id);
  }

  withSeverity(severity: DiagnosticSeverity): DiagnosticBuilder {
    this.severity = severity;
    return this;
  }

  withId(id: DiagnosticCode): DiagnosticBuilder {
    this.id = id;
    return this;
  }

  withMessage(message: string): DiagnosticBuilder {
    this.message = message;
    return this;
  }

  withSpan(span: SourceSpan): DiagnosticBuilder {
    this.span = span;
    return this;
  }

  build(): Diagnostic {
    if (!this.id) throw new Error('Diagnostic id is required');
    if (!this.message) throw new Error('Diagnostic message is required');
    if (!this.span) throw new Error('Diagnostic span is required');

    return {
      id: this.id,
      severity: this.severity,
      message: this.message,
      span: this.span,
    };
  }
}

// Diagnostics reported by the passes; parse diagnostics arrive with the tree
export const Diagnostics = {
  missingDirectiveToken: (directiveName: string, span: SourceSpan): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.TF2001_MissingDirectiveToken)
      .withMessage(`The '${directiveName}' directive expects a value`)
      .withSpan(span),
};

/**
 * 基线文件使用的稳定序列化形式：`<id><span>`。
 */
export function serializeDiagnostic(diagnostic: Diagnostic): string {
  return `${diagnostic.id}${formatSourceSpan(diagnostic.span)}`;
}

// Utility to format diagnostics for display
export function formatDiagnostic(diagnostic: Diagnostic, source?: string): string {
  const { severity, id, message, span } = diagnostic;
  const line = span.lineIndex + 1;
  const col = span.characterIndex + 1;
  const file = span.filePath ? `${span.filePath}:` : '';

  let result = `${severity} ${id}: ${message} at ${file}${line}:${col}`;

  if (source) {
    const lines = source.split(/\r?\n/);
    const text = lines[span.lineIndex];
    if (text !== undefined) {
      const gutter = ' '.repeat(String(line).length);
      const underline = '^'.repeat(Math.max(1, span.length));
      result += `\n> ${line}| ${text}`;
      result += `\n> ${gutter}  ${' '.repeat(span.characterIndex)}${underline}`;
    }
  }

  return result;
}
