import { readFileSync } from 'node:fs';
import { formatDiagnostic } from '../../diagnostics/diagnostics.js';
import { deserializeSyntaxTreeJson } from '../../syntax/syntax_json.js';
import type { SyntaxTree } from '../../syntax/syntax_tree.js';
import { warn } from './logger.js';

/**
 * 读取外部解析器导出的 JSON 语法树。
 */
export function readSyntaxTreeFile(file: string): SyntaxTree {
  return deserializeSyntaxTreeJson(readFileSync(file, 'utf8'));
}

/**
 * 诊断与输出一起报告，不中断命令。
 */
export function reportDiagnostics(tree: SyntaxTree): number {
  const diagnostics = tree.collectDiagnostics();
  for (const diagnostic of diagnostics) {
    warn(formatDiagnostic(diagnostic, tree.source.text));
  }
  return diagnostics.length;
}

export function printDump(dump: string): void {
  console.log(dump.replace(/\n$/, ''));
}
