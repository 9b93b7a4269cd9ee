import type { Diagnostic } from '../diagnostics/diagnostics.js';
import type { BlockKind, SyntaxKind, TokenKind, TriviaKind } from './syntax_kind.js';
import { SPAN_CONTEXT_KIND, isSpanContext, type SpanContext } from './span_context.js';

/**
 * 语法树节点模型。
 *
 * - 树是不可变的值结构：所有 `withXxx`/`update` 方法都返回新节点（或在无变化时返回自身）
 * - 位置由结构推导：构建父节点时，子节点从父节点位置起首尾相接地排布
 * - 非终结节点为 {@link SyntaxBlock}，终结节点为 {@link SyntaxToken}，二者构成封闭联合 {@link SyntaxElement}
 */

export interface SyntaxAnnotation {
  readonly kind: string;
  readonly data: unknown;
}

export interface SyntaxTrivia {
  readonly kind: TriviaKind;
  readonly text: string;
}

export interface SyntaxMetadata {
  readonly annotations?: ReadonlyMap<string, unknown>;
  readonly diagnostics?: readonly Diagnostic[];
}

export type SyntaxElement = SyntaxBlock | SyntaxToken;

const EMPTY_ANNOTATIONS: ReadonlyMap<string, unknown> = new Map();
const EMPTY_DIAGNOSTICS: readonly Diagnostic[] = Object.freeze([]);
const EMPTY_CHILDREN: readonly SyntaxElement[] = Object.freeze([]);
const EMPTY_TRIVIA: readonly SyntaxTrivia[] = Object.freeze([]);

export abstract class SyntaxNode<K extends SyntaxKind = SyntaxKind> {
  readonly annotations: ReadonlyMap<string, unknown>;
  readonly diagnostics: readonly Diagnostic[];

  protected constructor(
    readonly kind: K,
    readonly position: number,
    metadata: SyntaxMetadata = {}
  ) {
    this.annotations = metadata.annotations ?? EMPTY_ANNOTATIONS;
    this.diagnostics = metadata.diagnostics ?? EMPTY_DIAGNOSTICS;
  }

  abstract readonly isToken: boolean;
  abstract readonly fullWidth: number;
  abstract readonly children: readonly SyntaxElement[];

  get endPosition(): number {
    return this.position + this.fullWidth;
  }

  /** 全部注解，按附加顺序 */
  getAnnotations(): readonly SyntaxAnnotation[] {
    return Array.from(this.annotations, ([kind, data]) => ({ kind, data }));
  }

  getAnnotation(kind: string): unknown {
    return this.annotations.get(kind);
  }

  getSpanContext(): SpanContext | undefined {
    const data = this.annotations.get(SPAN_CONTEXT_KIND);
    return isSpanContext(data) ? data : undefined;
  }

  getDiagnostics(): readonly Diagnostic[] {
    return this.diagnostics;
  }

  protected get metadata(): SyntaxMetadata {
    return { annotations: this.annotations, diagnostics: this.diagnostics };
  }

  /** 重建包含 trivia 在内的完整原文 */
  abstract toFullString(): string;

  abstract withPosition(position: number): SyntaxElement;
  abstract withMetadata(metadata: SyntaxMetadata): SyntaxElement;

  abstract withAnnotation(kind: string, data: unknown): SyntaxElement;
  abstract withDiagnostics(diagnostics: readonly Diagnostic[]): SyntaxElement;

  toString(): string {
    return this.toFullString();
  }
}

/**
 * 把子节点从 start 开始首尾相接排布；位置已正确的子节点原样复用。
 */
export function layoutChildren(children: readonly SyntaxElement[], start: number): readonly SyntaxElement[] {
  let offset = start;
  let changed = false;
  const laid = children.map(child => {
    const placed = child.withPosition(offset);
    if (placed !== child) changed = true;
    offset += placed.fullWidth;
    return placed;
  });
  return changed ? laid : children;
}

export class SyntaxBlock extends SyntaxNode<BlockKind> {
  override readonly isToken = false;
  override readonly fullWidth: number;
  override readonly children: readonly SyntaxElement[];

  constructor(kind: BlockKind, children: readonly SyntaxElement[], position = 0, metadata?: SyntaxMetadata) {
    super(kind, position, metadata);
    this.children = children.length === 0 ? EMPTY_CHILDREN : children;
    this.fullWidth = children.reduce((sum, child) => sum + child.fullWidth, 0);
  }

  /**
   * 创建块并从 position 开始排布子节点。
   */
  static create(
    kind: BlockKind,
    children: readonly SyntaxElement[],
    position = 0,
    metadata?: SyntaxMetadata
  ): SyntaxBlock {
    return new SyntaxBlock(kind, layoutChildren(children, position), position, metadata);
  }

  /**
   * 用新的子节点列表重建；所有子节点与原来同一引用时返回自身。
   */
  update(children: readonly SyntaxElement[]): SyntaxBlock {
    if (
      children.length === this.children.length &&
      children.every((child, i) => child === this.children[i])
    ) {
      return this;
    }
    return SyntaxBlock.create(this.kind, children, this.position, this.metadata);
  }

  override withPosition(position: number): SyntaxBlock {
    if (position === this.position) return this;
    return SyntaxBlock.create(this.kind, this.children, position, this.metadata);
  }

  override withMetadata(metadata: SyntaxMetadata): SyntaxBlock {
    return new SyntaxBlock(this.kind, this.children, this.position, metadata);
  }

  override withAnnotation(kind: string, data: unknown): SyntaxBlock {
    return this.withMetadata({ annotations: withEntry(this.annotations, kind, data), diagnostics: this.diagnostics });
  }

  override withDiagnostics(diagnostics: readonly Diagnostic[]): SyntaxBlock {
    return this.withMetadata({ annotations: this.annotations, diagnostics });
  }

  override toFullString(): string {
    return this.children.map(child => child.toFullString()).join('');
  }
}

export interface SyntaxTokenOptions extends SyntaxMetadata {
  readonly isMissing?: boolean;
  readonly leadingTrivia?: readonly SyntaxTrivia[];
  readonly trailingTrivia?: readonly SyntaxTrivia[];
}

export class SyntaxToken extends SyntaxNode<TokenKind> {
  override readonly isToken = true;
  override readonly children: readonly SyntaxElement[] = EMPTY_CHILDREN;
  readonly content: string;
  readonly isMissing: boolean;
  readonly leadingTrivia: readonly SyntaxTrivia[];
  readonly trailingTrivia: readonly SyntaxTrivia[];
  override readonly fullWidth: number;

  constructor(kind: TokenKind, content: string, position = 0, options: SyntaxTokenOptions = {}) {
    super(kind, position, options);
    this.isMissing = options.isMissing ?? false;
    // 缺失 token 为零宽合成节点，不携带内容
    this.content = this.isMissing ? '' : content;
    this.leadingTrivia = options.leadingTrivia ?? EMPTY_TRIVIA;
    this.trailingTrivia = options.trailingTrivia ?? EMPTY_TRIVIA;
    this.fullWidth = triviaWidth(this.leadingTrivia) + this.content.length + triviaWidth(this.trailingTrivia);
  }

  /** 不含 trivia 的宽度 */
  get width(): number {
    return this.content.length;
  }

  get hasTrivia(): boolean {
    return this.leadingTrivia.length > 0 || this.trailingTrivia.length > 0;
  }

  private get options(): SyntaxTokenOptions {
    return {
      ...this.metadata,
      isMissing: this.isMissing,
      leadingTrivia: this.leadingTrivia,
      trailingTrivia: this.trailingTrivia,
    };
  }

  override withPosition(position: number): SyntaxToken {
    if (position === this.position) return this;
    return new SyntaxToken(this.kind, this.content, position, this.options);
  }

  override withMetadata(metadata: SyntaxMetadata): SyntaxToken {
    return new SyntaxToken(this.kind, this.content, this.position, { ...this.options, ...metadata });
  }

  override withAnnotation(kind: string, data: unknown): SyntaxToken {
    return this.withMetadata({ annotations: withEntry(this.annotations, kind, data), diagnostics: this.diagnostics });
  }

  override withDiagnostics(diagnostics: readonly Diagnostic[]): SyntaxToken {
    return this.withMetadata({ annotations: this.annotations, diagnostics });
  }

  withTrivia(leadingTrivia: readonly SyntaxTrivia[], trailingTrivia: readonly SyntaxTrivia[]): SyntaxToken {
    if (leadingTrivia === this.leadingTrivia && trailingTrivia === this.trailingTrivia) return this;
    return new SyntaxToken(this.kind, this.content, this.position, {
      ...this.options,
      leadingTrivia,
      trailingTrivia,
    });
  }

  override toFullString(): string {
    return triviaText(this.leadingTrivia) + this.content + triviaText(this.trailingTrivia);
  }
}

function withEntry(map: ReadonlyMap<string, unknown>, kind: string, data: unknown): ReadonlyMap<string, unknown> {
  const next = new Map(map);
  next.set(kind, data);
  return next;
}

function triviaWidth(trivia: readonly SyntaxTrivia[]): number {
  return trivia.reduce((sum, t) => sum + t.text.length, 0);
}

function triviaText(trivia: readonly SyntaxTrivia[]): string {
  return trivia.map(t => t.text).join('');
}

export function isSyntaxToken(node: SyntaxElement): node is SyntaxToken {
  return node.isToken;
}

/** 前序遍历自身及所有后代 */
export function* descendantsAndSelf(root: SyntaxElement): IterableIterator<SyntaxElement> {
  const stack: SyntaxElement[] = [root];
  let node = stack.pop();
  while (node) {
    yield node;
    for (let i = node.children.length - 1; i >= 0; i--) {
      const child = node.children[i];
      if (child) stack.push(child);
    }
    node = stack.pop();
  }
}
