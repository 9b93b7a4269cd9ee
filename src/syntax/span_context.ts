/**
 * SpanContext 注解：记录某段源码由哪种代码生成策略产出（chunk generator），
 * 以及增量编辑时该段如何重新解析（edit handler）。附加后只读。
 */

export const SPAN_CONTEXT_KIND = 'SpanContext';

export enum AcceptedCharacters {
  None = 'None',
  NewLine = 'NewLine',
  WhiteSpace = 'WhiteSpace',
  NonWhiteSpace = 'NonWhiteSpace',
  AllWhiteSpace = 'AllWhiteSpace',
  Any = 'Any',
  AnyExceptNewline = 'AnyExceptNewline',
}

export type ChunkGenerator =
  | { readonly kind: 'None' }
  | { readonly kind: 'Markup' }
  | { readonly kind: 'Expression' }
  | { readonly kind: 'Statement' }
  | { readonly kind: 'Directive'; readonly name: string }
  | { readonly kind: 'DirectiveToken'; readonly name: string; readonly tokenKind: string };

export type EditHandler =
  | { readonly kind: 'Span'; readonly acceptedCharacters: AcceptedCharacters }
  | {
      readonly kind: 'ImplicitExpression';
      readonly acceptedCharacters: AcceptedCharacters;
      readonly keywords: readonly string[];
      readonly acceptTrailingDot: boolean;
    }
  | { readonly kind: 'DirectiveToken'; readonly acceptedCharacters: AcceptedCharacters };

export interface SpanContext {
  readonly chunkGenerator: ChunkGenerator;
  readonly editHandler: EditHandler;
}

export function createSpanContext(chunkGenerator: ChunkGenerator, editHandler: EditHandler): SpanContext {
  return Object.freeze({
    chunkGenerator: Object.freeze({ ...chunkGenerator }),
    editHandler: Object.freeze({ ...editHandler }),
  });
}

export function isSpanContext(value: unknown): value is SpanContext {
  if (typeof value !== 'object' || value === null) return false;
  if ('chunkGenerator' in value && 'editHandler' in value) {
    return isKinded(value.chunkGenerator) && isKinded(value.editHandler);
  }
  return false;
}

function isKinded(value: unknown): boolean {
  return typeof value === 'object' && value !== null && 'kind' in value && typeof value.kind === 'string';
}

export function describeChunkGenerator(generator: ChunkGenerator): string {
  switch (generator.kind) {
    case 'None':
      return 'None';
    case 'Markup':
      return 'Markup';
    case 'Expression':
      return 'Expr';
    case 'Statement':
      return 'Stmt';
    case 'Directive':
      return `Directive:{${generator.name}}`;
    case 'DirectiveToken':
      return `DirectiveToken {${generator.name};${generator.tokenKind}}`;
  }
}

export function describeEditHandler(handler: EditHandler): string {
  switch (handler.kind) {
    case 'Span':
      return `SpanEditHandler;Accepts:${handler.acceptedCharacters}`;
    case 'ImplicitExpression': {
      const trailingDot = handler.acceptTrailingDot ? 'ATD' : 'RTD';
      return `ImplicitExpressionEditHandler;Accepts:${handler.acceptedCharacters};ImplicitExpression[${trailingDot}];K${handler.keywords.length}`;
    }
    case 'DirectiveToken':
      return `DirectiveTokenEditHandler;Accepts:${handler.acceptedCharacters}`;
  }
}
