import type { SyntaxBlock, SyntaxElement } from './syntax_node.js';
import { SyntaxNodeWriter } from './syntax_node_writer.js';
import { SyntaxRewriter } from './syntax_rewriter.js';
import { StringSink, type TextSink } from './text_sink.js';

/**
 * 前序驱动 SyntaxNodeWriter：每个节点一行，进入非终结节点的子节点时缩进加一。
 */
class SerializerWalker extends SyntaxRewriter {
  constructor(
    private readonly nodeWriter: SyntaxNodeWriter,
    private readonly sink: TextSink
  ) {
    super();
  }

  override visit(node: SyntaxElement): SyntaxElement {
    this.nodeWriter.visit(node);
    this.sink.writeLine();

    if (!node.isToken) {
      this.nodeWriter.depth++;
      this.visitDefault(node);
      this.nodeWriter.depth--;
    }

    return node;
  }

  override visitDefault(node: SyntaxBlock): SyntaxElement {
    for (const child of node.children) this.visit(child);
    return node;
  }
}

/**
 * 把整棵树渲染为确定性的调试文本（基线快照格式）。
 */
export function serializeSyntaxTree(root: SyntaxElement): string {
  const sink = new StringSink();
  writeSyntaxTree(root, sink);
  return sink.toString();
}

export function writeSyntaxTree(root: SyntaxElement, sink: TextSink): void {
  const walker = new SerializerWalker(new SyntaxNodeWriter(sink), sink);
  walker.visit(root);
}
