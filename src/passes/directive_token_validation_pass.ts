import { Diagnostics, type Diagnostic } from '../diagnostics/diagnostics.js';
import type { SourceDocument } from '../source/source_document.js';
import { SyntaxKind } from '../syntax/syntax_kind.js';
import type { SyntaxBlock, SyntaxElement, SyntaxToken } from '../syntax/syntax_node.js';
import { SyntaxRewriter } from '../syntax/syntax_rewriter.js';
import { getSourcePosition } from '../syntax/source_position.js';
import type { SyntaxTree } from '../syntax/syntax_tree.js';
import { SyntaxTreePassBase, type CodeDocument } from './pass.js';

const UNNAMED_DIRECTIVE = 'directive';

/**
 * 为每个缺失的指令 token 报告 TF2001；只追加诊断，不改动树。
 */
export class DirectiveTokenValidationPass extends SyntaxTreePassBase {
  override readonly order = 0;

  protected override executeCore(document: CodeDocument, tree: SyntaxTree): SyntaxTree {
    // 区间按原始源文本换算，与是否经过设计时降级无关
    const collector = new MissingDirectiveTokenCollector(document.source);
    collector.visit(tree.root);
    return tree.addDiagnostics(collector.diagnostics);
  }
}

class MissingDirectiveTokenCollector extends SyntaxRewriter {
  readonly diagnostics: Diagnostic[] = [];
  private readonly directiveNames: string[] = [];

  constructor(private readonly source: SourceDocument) {
    super();
  }

  override visitDirective(node: SyntaxBlock): SyntaxElement {
    this.directiveNames.push(directiveName(node) ?? UNNAMED_DIRECTIVE);
    try {
      return super.visitDirective(node);
    } finally {
      this.directiveNames.pop();
    }
  }

  override visitToken(token: SyntaxToken): SyntaxElement {
    if (token.kind === SyntaxKind.DirectiveToken && token.isMissing) {
      const name = directiveName(token) ?? this.directiveNames[this.directiveNames.length - 1] ?? UNNAMED_DIRECTIVE;
      const span = this.source.createSpan(getSourcePosition(token), 0);
      this.diagnostics.push(Diagnostics.missingDirectiveToken(name, span).build());
    }
    return token;
  }
}

function directiveName(node: SyntaxElement): string | undefined {
  const generator = node.getSpanContext()?.chunkGenerator;
  if (generator?.kind === 'Directive' || generator?.kind === 'DirectiveToken') {
    return generator.name;
  }
  return undefined;
}
