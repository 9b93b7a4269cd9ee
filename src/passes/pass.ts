import type { SourceDocument } from '../source/source_document.js';
import type { SyntaxTree } from '../syntax/syntax_tree.js';
import type { ParserOptions } from '../types.js';

/**
 * 一次编译所处理的文档：源文本与编译选项。
 */
export interface CodeDocument {
  readonly source: SourceDocument;
  readonly options: ParserOptions;
}

export function createCodeDocument(tree: SyntaxTree, options: ParserOptions = tree.options): CodeDocument {
  return { source: tree.source, options };
}

/**
 * 语法树遍历阶段。`order` 越小越先执行；同一输入必须产出结构相同的输出。
 */
export interface SyntaxTreePass {
  readonly name: string;
  readonly order: number;
  execute(document: CodeDocument, tree: SyntaxTree): SyntaxTree;
}

export abstract class SyntaxTreePassBase implements SyntaxTreePass {
  abstract readonly order: number;

  get name(): string {
    return this.constructor.name;
  }

  execute(document: CodeDocument, tree: SyntaxTree): SyntaxTree {
    if (document.source !== tree.source) {
      throw new TypeError(`${this.name} was given a tree that does not belong to the document`);
    }
    return this.executeCore(document, tree);
  }

  protected abstract executeCore(document: CodeDocument, tree: SyntaxTree): SyntaxTree;
}
