import { serializeDiagnostic } from '../diagnostics/diagnostics.js';
import { NotImplementedError } from '../diagnostics/errors.js';
import { describeChunkGenerator, describeEditHandler, type SpanContext } from './span_context.js';
import type { SyntaxBlock, SyntaxElement, SyntaxToken, SyntaxTrivia } from './syntax_node.js';
import { SyntaxRewriter, type SyntaxRewriterOptions } from './syntax_rewriter.js';
import type { TextSink } from './text_sink.js';

const INDENT = '    ';
const LINE_BREAK_MARKER = 'LF';

/**
 * 只读的调试写出器：每次 visit 写出一个节点的单行描述，原样返回输入。
 *
 * 缩进深度 {@link depth} 由驱动遍历的一方维护；第一个写出的非终结节点会额外附带整段原文，
 * 便于对照源码阅读基线。trivia 分支未实现，驱动到带 trivia 的树时会抛出 NotImplementedError。
 */
export class SyntaxNodeWriter extends SyntaxRewriter {
  private visitedRoot = false;

  depth = 0;

  constructor(
    private readonly writer: TextSink,
    options: SyntaxRewriterOptions = {}
  ) {
    super(options);
  }

  override visit(node: SyntaxElement): SyntaxElement {
    if (node.isToken) {
      return this.visitToken(node);
    }

    this.writeNode(node);
    return node;
  }

  override visitToken(token: SyntaxToken): SyntaxElement {
    this.writeToken(token);
    return super.visitToken(token);
  }

  override visitTrivia(trivia: SyntaxTrivia): SyntaxTrivia {
    this.writeTrivia(trivia);
    return super.visitTrivia(trivia);
  }

  private writeNode(node: SyntaxBlock): void {
    this.writeIndent();
    this.write(node.kind);
    this.writeSeparator();
    this.write(`[${node.position}..${node.endPosition})`);
    this.writeSeparator();
    this.write(`FullWidth: ${node.fullWidth}`);

    const context = node.getSpanContext();
    if (context) {
      this.writeSpanContext(context);
    }

    if (!this.visitedRoot) {
      this.writeSeparator();
      this.write(`[${node.toFullString()}]`);
      this.visitedRoot = true;
    }
  }

  private writeToken(token: SyntaxToken): void {
    this.writeIndent();
    const content = token.isMissing ? '<Missing>' : token.content;
    const diagnostics = token.getDiagnostics().map(serializeDiagnostic).join(', ');
    this.write(`${token.kind};[${content}];${diagnostics}`);
  }

  private writeTrivia(_trivia: SyntaxTrivia): never {
    throw new NotImplementedError('SyntaxNodeWriter.visitTrivia');
  }

  private writeSpanContext(context: SpanContext): void {
    this.writeSeparator();
    this.write(`Gen<${describeChunkGenerator(context.chunkGenerator)}>`);
    this.writeSeparator();
    this.write(describeEditHandler(context.editHandler));
  }

  protected writeIndent(): void {
    this.writer.write(INDENT.repeat(this.depth));
  }

  protected writeSeparator(): void {
    this.write(' - ');
  }

  protected write(value: string): void {
    this.writer.write(value.replace(/\r\n|\r|\n/g, LINE_BREAK_MARKER));
  }
}
