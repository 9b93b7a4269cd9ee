/**
 * @module syntax/syntax_kind
 *
 * 语法树节点种类的封闭枚举。
 *
 * 前半部分为解析器产出的语法节点，后半部分为降级阶段使用的中间表示节点；
 * 二者共用同一套节点模型，使遍历器与调试序列化器可以同时处理两类树。
 */

export enum SyntaxKind {
  // ============================================================
  // 非终结节点（SyntaxBlock）
  // ============================================================

  Document = 'Document',
  MarkupBlock = 'MarkupBlock',
  MarkupTagBlock = 'MarkupTagBlock',
  CodeBlock = 'CodeBlock',
  Statement = 'Statement',
  ExplicitExpression = 'ExplicitExpression',
  ImplicitExpression = 'ImplicitExpression',
  Comment = 'Comment',
  Directive = 'Directive',
  DirectiveBody = 'DirectiveBody',
  NamespaceDeclaration = 'NamespaceDeclaration',
  ClassDeclaration = 'ClassDeclaration',
  MethodDeclaration = 'MethodDeclaration',
  FieldDeclaration = 'FieldDeclaration',
  /** 设计时降级合成的指令容器 */
  DesignTimeDirective = 'DesignTimeDirective',

  // ============================================================
  // 终结节点（SyntaxToken）
  // ============================================================

  Text = 'Text',
  Whitespace = 'Whitespace',
  NewLine = 'NewLine',
  Identifier = 'Identifier',
  Keyword = 'Keyword',
  Transition = 'Transition',
  LeftBrace = 'LeftBrace',
  RightBrace = 'RightBrace',
  LeftParenthesis = 'LeftParenthesis',
  RightParenthesis = 'RightParenthesis',
  Semicolon = 'Semicolon',
  StringLiteral = 'StringLiteral',
  CodeText = 'CodeText',
  DirectiveToken = 'DirectiveToken',
  Marker = 'Marker',
}

export type BlockKind =
  | SyntaxKind.Document
  | SyntaxKind.MarkupBlock
  | SyntaxKind.MarkupTagBlock
  | SyntaxKind.CodeBlock
  | SyntaxKind.Statement
  | SyntaxKind.ExplicitExpression
  | SyntaxKind.ImplicitExpression
  | SyntaxKind.Comment
  | SyntaxKind.Directive
  | SyntaxKind.DirectiveBody
  | SyntaxKind.NamespaceDeclaration
  | SyntaxKind.ClassDeclaration
  | SyntaxKind.MethodDeclaration
  | SyntaxKind.FieldDeclaration
  | SyntaxKind.DesignTimeDirective;

export type TokenKind = Exclude<SyntaxKind, BlockKind>;

const BLOCK_KINDS: ReadonlySet<SyntaxKind> = new Set<BlockKind>([
  SyntaxKind.Document,
  SyntaxKind.MarkupBlock,
  SyntaxKind.MarkupTagBlock,
  SyntaxKind.CodeBlock,
  SyntaxKind.Statement,
  SyntaxKind.ExplicitExpression,
  SyntaxKind.ImplicitExpression,
  SyntaxKind.Comment,
  SyntaxKind.Directive,
  SyntaxKind.DirectiveBody,
  SyntaxKind.NamespaceDeclaration,
  SyntaxKind.ClassDeclaration,
  SyntaxKind.MethodDeclaration,
  SyntaxKind.FieldDeclaration,
  SyntaxKind.DesignTimeDirective,
]);

const ALL_KINDS: ReadonlySet<string> = new Set<string>(Object.values(SyntaxKind));

export function isBlockKind(kind: SyntaxKind): kind is BlockKind {
  return BLOCK_KINDS.has(kind);
}

export function isTokenKind(kind: SyntaxKind): kind is TokenKind {
  return !BLOCK_KINDS.has(kind);
}

export function isSyntaxKind(value: string): value is SyntaxKind {
  return ALL_KINDS.has(value);
}

export enum TriviaKind {
  Whitespace = 'Whitespace',
  NewLine = 'NewLine',
  Comment = 'Comment',
}
