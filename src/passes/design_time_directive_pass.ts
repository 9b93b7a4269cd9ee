import { Syntax } from '../syntax/syntax_factory.js';
import { SyntaxKind } from '../syntax/syntax_kind.js';
import type { SyntaxBlock, SyntaxElement, SyntaxToken } from '../syntax/syntax_node.js';
import { SyntaxRewriter } from '../syntax/syntax_rewriter.js';
import { withSourcePosition } from '../syntax/source_position.js';
import type { SyntaxTree } from '../syntax/syntax_tree.js';
import { SyntaxTreePassBase, type CodeDocument } from './pass.js';

export const DESIGN_TIME_VARIABLE = '__o';

/**
 * 设计时降级：每个类声明的子节点变为
 * `[DesignTimeDirective(指令 token，按遇到顺序), FieldDeclaration(__o), ...其余子节点]`。
 *
 * 指令 token 归属最内层的类声明；类声明之外的指令 token 保持原位。
 * 被移动的 token 带上原始偏移（SourcePosition 注解），后续阶段据此定位诊断。
 * 必须先于其它处理指令 token 的阶段执行。
 */
export class DesignTimeDirectivePass extends SyntaxTreePassBase {
  override readonly order = -10;

  protected override executeCore(_document: CodeDocument, tree: SyntaxTree): SyntaxTree {
    const rewriter = new DesignTimeHelperRewriter();
    return tree.withRoot(rewriter.visitRoot(tree.root));
  }
}

export function createDesignTimeHelperDeclaration(): SyntaxBlock {
  return Syntax.fieldDeclaration([Syntax.codeText(`private static object ${DESIGN_TIME_VARIABLE} = null;`)]);
}

class DesignTimeHelperRewriter extends SyntaxRewriter {
  // one accumulator per enclosing class declaration, innermost last
  private readonly scopes: SyntaxToken[][] = [];

  override visitClassDeclaration(node: SyntaxBlock): SyntaxElement {
    const directives: SyntaxToken[] = [];
    this.scopes.push(directives);
    let children: readonly SyntaxElement[];
    try {
      children = this.visitChildren(node);
    } finally {
      this.scopes.pop();
    }
    const holder = Syntax.designTimeDirective(directives);
    return node.update([holder, createDesignTimeHelperDeclaration(), ...children]);
  }

  protected override visitChildren(node: SyntaxBlock): readonly SyntaxElement[] {
    const scope = this.scopes[this.scopes.length - 1];
    const children: SyntaxElement[] = [];
    for (const child of node.children) {
      if (scope && child.isToken && child.kind === SyntaxKind.DirectiveToken) {
        scope.push(withSourcePosition(child));
        continue;
      }
      children.push(this.visit(child));
    }
    return children;
  }
}
