import { SyntaxKind } from './syntax_kind.js';
import type { SyntaxBlock, SyntaxElement, SyntaxToken, SyntaxTrivia } from './syntax_node.js';

/**
 * 语法树重写器基类（双重分派）。
 *
 * - 入口：`visit(node)`；终结节点分派到 `visitToken`，非终结节点按 kind 分派到 `visitXxx`
 * - 每个 `visitXxx` 默认调用 `visitDefault`：依次访问子节点，只有某个子节点结果的引用发生变化时才重建
 * - `visitTrivia` 是独立分支，仅在构造时传入 `visitIntoTrivia: true` 才会被 `visitToken` 调用
 *
 * 子类覆写 visit 方法时应调用 super（或自行维持相同的子节点重建约定），框架不校验返回节点的形状。
 */
export interface SyntaxRewriterOptions {
  readonly visitIntoTrivia?: boolean;
}

export class SyntaxRewriter {
  protected readonly visitIntoTrivia: boolean;

  constructor(options: SyntaxRewriterOptions = {}) {
    this.visitIntoTrivia = options.visitIntoTrivia ?? false;
  }

  visit(node: SyntaxElement): SyntaxElement {
    if (node.isToken) return this.visitToken(node);
    return this.visitBlock(node);
  }

  /**
   * 访问根节点；重写结果必须仍是非终结节点。
   */
  visitRoot(root: SyntaxBlock): SyntaxBlock {
    const result = this.visit(root);
    if (result.isToken) {
      throw new TypeError(`${this.constructor.name} replaced the ${root.kind} root with a ${result.kind} token`);
    }
    return result;
  }

  visitToken(token: SyntaxToken): SyntaxElement {
    if (!this.visitIntoTrivia || !token.hasTrivia) return token;
    const leading = this.visitTriviaList(token.leadingTrivia);
    const trailing = this.visitTriviaList(token.trailingTrivia);
    return token.withTrivia(leading, trailing);
  }

  visitTrivia(trivia: SyntaxTrivia): SyntaxTrivia {
    return trivia;
  }

  protected visitBlock(block: SyntaxBlock): SyntaxElement {
    const kind = block.kind;
    switch (kind) {
      case SyntaxKind.Document:
        return this.visitDocument(block);
      case SyntaxKind.MarkupBlock:
        return this.visitMarkupBlock(block);
      case SyntaxKind.MarkupTagBlock:
        return this.visitMarkupTagBlock(block);
      case SyntaxKind.CodeBlock:
        return this.visitCodeBlock(block);
      case SyntaxKind.Statement:
        return this.visitStatement(block);
      case SyntaxKind.ExplicitExpression:
        return this.visitExplicitExpression(block);
      case SyntaxKind.ImplicitExpression:
        return this.visitImplicitExpression(block);
      case SyntaxKind.Comment:
        return this.visitComment(block);
      case SyntaxKind.Directive:
        return this.visitDirective(block);
      case SyntaxKind.DirectiveBody:
        return this.visitDirectiveBody(block);
      case SyntaxKind.NamespaceDeclaration:
        return this.visitNamespaceDeclaration(block);
      case SyntaxKind.ClassDeclaration:
        return this.visitClassDeclaration(block);
      case SyntaxKind.MethodDeclaration:
        return this.visitMethodDeclaration(block);
      case SyntaxKind.FieldDeclaration:
        return this.visitFieldDeclaration(block);
      case SyntaxKind.DesignTimeDirective:
        return this.visitDesignTimeDirective(block);
      default: {
        const _exhaustiveCheck: never = kind;
        return _exhaustiveCheck;
      }
    }
  }

  visitDocument(node: SyntaxBlock): SyntaxElement {
    return this.visitDefault(node);
  }

  visitMarkupBlock(node: SyntaxBlock): SyntaxElement {
    return this.visitDefault(node);
  }

  visitMarkupTagBlock(node: SyntaxBlock): SyntaxElement {
    return this.visitDefault(node);
  }

  visitCodeBlock(node: SyntaxBlock): SyntaxElement {
    return this.visitDefault(node);
  }

  visitStatement(node: SyntaxBlock): SyntaxElement {
    return this.visitDefault(node);
  }

  visitExplicitExpression(node: SyntaxBlock): SyntaxElement {
    return this.visitDefault(node);
  }

  visitImplicitExpression(node: SyntaxBlock): SyntaxElement {
    return this.visitDefault(node);
  }

  visitComment(node: SyntaxBlock): SyntaxElement {
    return this.visitDefault(node);
  }

  visitDirective(node: SyntaxBlock): SyntaxElement {
    return this.visitDefault(node);
  }

  visitDirectiveBody(node: SyntaxBlock): SyntaxElement {
    return this.visitDefault(node);
  }

  visitNamespaceDeclaration(node: SyntaxBlock): SyntaxElement {
    return this.visitDefault(node);
  }

  visitClassDeclaration(node: SyntaxBlock): SyntaxElement {
    return this.visitDefault(node);
  }

  visitMethodDeclaration(node: SyntaxBlock): SyntaxElement {
    return this.visitDefault(node);
  }

  visitFieldDeclaration(node: SyntaxBlock): SyntaxElement {
    return this.visitDefault(node);
  }

  visitDesignTimeDirective(node: SyntaxBlock): SyntaxElement {
    return this.visitDefault(node);
  }

  visitDefault(node: SyntaxBlock): SyntaxElement {
    return node.update(this.visitChildren(node));
  }

  protected visitChildren(node: SyntaxBlock): readonly SyntaxElement[] {
    return node.children.map(child => this.visit(child));
  }

  protected visitTriviaList(list: readonly SyntaxTrivia[]): readonly SyntaxTrivia[] {
    const visited = list.map(trivia => this.visitTrivia(trivia));
    return visited.every((trivia, i) => trivia === list[i]) ? list : visited;
  }
}
