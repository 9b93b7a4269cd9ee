// Simple syntax node constructors; children are laid out from position 0

import type { Diagnostic } from '../diagnostics/diagnostics.js';
import { SyntaxKind, TriviaKind, type BlockKind, type TokenKind } from './syntax_kind.js';
import {
  SyntaxBlock,
  SyntaxToken,
  type SyntaxElement,
  type SyntaxMetadata,
  type SyntaxTokenOptions,
  type SyntaxTrivia,
} from './syntax_node.js';
import { SPAN_CONTEXT_KIND, type SpanContext } from './span_context.js';

function trivia(kind: TriviaKind, text: string): SyntaxTrivia {
  return Object.freeze({ kind, text });
}

function block(kind: BlockKind, children: readonly SyntaxElement[], metadata?: SyntaxMetadata): SyntaxBlock {
  return SyntaxBlock.create(kind, children, 0, metadata);
}

function token(kind: TokenKind, content: string, options?: SyntaxTokenOptions): SyntaxToken {
  return new SyntaxToken(kind, content, 0, options);
}

export const Syntax = {
  block,
  token,
  trivia,

  missing: (kind: TokenKind, diagnostics?: readonly Diagnostic[]): SyntaxToken =>
    token(kind, '', { isMissing: true, ...(diagnostics ? { diagnostics } : {}) }),

  whitespace: (text = ' '): SyntaxTrivia => trivia(TriviaKind.Whitespace, text),
  newLine: (text = '\n'): SyntaxTrivia => trivia(TriviaKind.NewLine, text),
  comment: (text: string): SyntaxTrivia => trivia(TriviaKind.Comment, text),

  // Markup / code
  document: (children: readonly SyntaxElement[]): SyntaxBlock => block(SyntaxKind.Document, children),
  markupBlock: (children: readonly SyntaxElement[]): SyntaxBlock => block(SyntaxKind.MarkupBlock, children),
  codeBlock: (children: readonly SyntaxElement[]): SyntaxBlock => block(SyntaxKind.CodeBlock, children),
  text: (content: string, options?: SyntaxTokenOptions): SyntaxToken => token(SyntaxKind.Text, content, options),
  codeText: (content: string, options?: SyntaxTokenOptions): SyntaxToken =>
    token(SyntaxKind.CodeText, content, options),
  transition: (): SyntaxToken => token(SyntaxKind.Transition, '@'),

  // Intermediate declarations
  namespaceDeclaration: (children: readonly SyntaxElement[]): SyntaxBlock =>
    block(SyntaxKind.NamespaceDeclaration, children),
  classDeclaration: (children: readonly SyntaxElement[]): SyntaxBlock =>
    block(SyntaxKind.ClassDeclaration, children),
  methodDeclaration: (children: readonly SyntaxElement[]): SyntaxBlock =>
    block(SyntaxKind.MethodDeclaration, children),
  fieldDeclaration: (children: readonly SyntaxElement[]): SyntaxBlock =>
    block(SyntaxKind.FieldDeclaration, children),
  designTimeDirective: (children: readonly SyntaxElement[]): SyntaxBlock =>
    block(SyntaxKind.DesignTimeDirective, children),
  directive: (children: readonly SyntaxElement[], metadata?: SyntaxMetadata): SyntaxBlock =>
    block(SyntaxKind.Directive, children, metadata),
  directiveToken: (content: string, options?: SyntaxTokenOptions): SyntaxToken =>
    token(SyntaxKind.DirectiveToken, content, options),
};

/**
 * 附加 SpanContext 注解（同种注解只保留一个）。
 */
export function withSpanContext(node: SyntaxBlock, context: SpanContext): SyntaxBlock;
export function withSpanContext(node: SyntaxToken, context: SpanContext): SyntaxToken;
export function withSpanContext(node: SyntaxElement, context: SpanContext): SyntaxElement {
  return node.withAnnotation(SPAN_CONTEXT_KIND, context);
}
