import type { Diagnostic } from '../diagnostics/diagnostics.js';
import { SourceDocument } from '../source/source_document.js';
import { DEFAULT_PARSER_OPTIONS, type ParserOptions } from '../types.js';
import { descendantsAndSelf, type SyntaxBlock } from './syntax_node.js';

/**
 * 解析结果：根节点、源文档、解析诊断与解析选项。
 *
 * 与节点一样不可变，遍历阶段通过 `withRoot`/`addDiagnostics` 产出新的树。
 */
export class SyntaxTree {
  private constructor(
    readonly root: SyntaxBlock,
    readonly source: SourceDocument,
    readonly diagnostics: readonly Diagnostic[],
    readonly options: ParserOptions
  ) {}

  static create(
    root: SyntaxBlock,
    source: SourceDocument = SourceDocument.create(root.toFullString()),
    diagnostics: readonly Diagnostic[] = [],
    options: ParserOptions = DEFAULT_PARSER_OPTIONS
  ): SyntaxTree {
    return new SyntaxTree(root, source, diagnostics, options);
  }

  withRoot(root: SyntaxBlock): SyntaxTree {
    if (root === this.root) return this;
    return new SyntaxTree(root, this.source, this.diagnostics, this.options);
  }

  withDiagnostics(diagnostics: readonly Diagnostic[]): SyntaxTree {
    return new SyntaxTree(this.root, this.source, diagnostics, this.options);
  }

  addDiagnostics(diagnostics: readonly Diagnostic[]): SyntaxTree {
    if (diagnostics.length === 0) return this;
    return new SyntaxTree(this.root, this.source, [...this.diagnostics, ...diagnostics], this.options);
  }

  /**
   * 树级诊断在前，随后按前序收集挂在节点上的诊断。
   */
  collectDiagnostics(): Diagnostic[] {
    const all = [...this.diagnostics];
    for (const node of descendantsAndSelf(this.root)) {
      all.push(...node.getDiagnostics());
    }
    return all;
  }
}
