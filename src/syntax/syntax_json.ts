/**
 * 语法树 JSON 序列化封装（版本化）
 *
 * 外部解析器以此格式交付语法树；位置由结构推导，不写入 JSON。
 * 反序列化前使用 syntax-tree.schema.json 做结构校验。
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import AjvModule, { type ErrorObject, type SchemaObject, type ValidateFunction } from 'ajv';
import { DiagnosticCode, DiagnosticSeverity, type Diagnostic } from '../diagnostics/diagnostics.js';
import { SyntaxTreeJsonError } from '../diagnostics/errors.js';
import { SourceDocument } from '../source/source_document.js';
import type { SourceSpan } from '../types.js';
import { createSpanContext, isSpanContext, SPAN_CONTEXT_KIND } from './span_context.js';
import { TriviaKind, isBlockKind, isSyntaxKind, isTokenKind } from './syntax_kind.js';
import { SyntaxBlock, SyntaxToken, type SyntaxElement, type SyntaxMetadata, type SyntaxTrivia } from './syntax_node.js';
import { SyntaxTree } from './syntax_tree.js';

const Ajv = AjvModule.default;

export interface SyntaxTriviaJson {
  kind: string;
  text: string;
}

export interface SyntaxElementJson {
  kind: string;
  children?: SyntaxElementJson[];
  content?: string;
  missing?: boolean;
  leadingTrivia?: SyntaxTriviaJson[];
  trailingTrivia?: SyntaxTriviaJson[];
  annotations?: Record<string, unknown>;
  diagnostics?: DiagnosticJson[];
}

export interface DiagnosticJson {
  id: string;
  severity: string;
  message: string;
  span: {
    filePath?: string | null;
    absoluteIndex: number;
    lineIndex: number;
    characterIndex: number;
    length: number;
  };
}

/**
 * 语法树 JSON 封装接口
 */
export interface SyntaxTreeEnvelope {
  /** JSON schema 版本 */
  version: '1.0';
  /** 原始源文本；缺省时由根节点重建 */
  source?: { text: string; filePath?: string | null };
  options?: { designTime: boolean };
  /** 解析阶段的树级诊断 */
  diagnostics?: DiagnosticJson[];
  root: SyntaxElementJson;
}

// 从项目根目录加载 schema（源码运行与 dist 运行的相对层级不同）
function locateSchema(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  const candidates = [
    join(here, '..', '..', 'syntax-tree.schema.json'),
    join(here, '..', '..', '..', 'syntax-tree.schema.json'),
  ];
  const found = candidates.find(candidate => existsSync(candidate));
  if (!found) {
    throw new Error(`syntax-tree.schema.json not found (looked in ${candidates.join(', ')})`);
  }
  return found;
}

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

let validateEnvelope: ValidateFunction<SyntaxTreeEnvelope> | null = null;

function getValidator(): ValidateFunction<SyntaxTreeEnvelope> {
  if (validateEnvelope === null) {
    const schema: unknown = JSON.parse(readFileSync(locateSchema(), 'utf-8'));
    if (!isSchemaObject(schema)) {
      throw new Error('syntax-tree.schema.json must contain a JSON object');
    }
    const ajv = new Ajv({ strict: true, allErrors: true, allowUnionTypes: true });
    validateEnvelope = ajv.compile<SyntaxTreeEnvelope>(schema);
  }
  return validateEnvelope;
}

function formatAjvError(error: ErrorObject): string {
  const path = error.instancePath || '/';
  return `${path} ${error.message ?? error.keyword}`;
}

/**
 * 将语法树序列化为 JSON 字符串（2 空格缩进）
 *
 * @example
 * ```typescript
 * const json = serializeSyntaxTreeJson(tree);
 * fs.writeFileSync('page.tree.json', json);
 * ```
 */
export function serializeSyntaxTreeJson(tree: SyntaxTree): string {
  const envelope: SyntaxTreeEnvelope = {
    version: '1.0',
    source: { text: tree.source.text, filePath: tree.source.filePath },
    options: { designTime: tree.options.designTime },
    ...(tree.diagnostics.length > 0 ? { diagnostics: tree.diagnostics.map(diagnosticToJson) } : {}),
    root: elementToJson(tree.root),
  };
  return JSON.stringify(envelope, null, 2);
}

/**
 * 从 JSON 字符串反序列化语法树
 *
 * @throws {SyntaxTreeJsonError} 如果 JSON 无效、版本不支持或结构不符合 schema
 */
export function deserializeSyntaxTreeJson(json: string): SyntaxTree {
  let envelope: unknown;

  try {
    envelope = JSON.parse(json);
  } catch (e) {
    throw new SyntaxTreeJsonError(`Invalid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }

  if (typeof envelope === 'object' && envelope !== null && 'version' in envelope && envelope.version !== '1.0') {
    throw new SyntaxTreeJsonError(`Unsupported syntax tree JSON version: ${String(envelope.version)}. Expected: 1.0`);
  }

  const validate = getValidator();
  if (!validate(envelope)) {
    const errors = (validate.errors ?? []).map(formatAjvError);
    throw new SyntaxTreeJsonError(`Invalid syntax tree JSON: ${errors.join('; ')}`, errors);
  }

  const root = elementFromJson(envelope.root, '/root');
  if (root.isToken) {
    throw new SyntaxTreeJsonError(`Invalid syntax tree JSON: root must be a block, got ${root.kind}`);
  }

  const text = envelope.source?.text ?? root.toFullString();
  const source = SourceDocument.create(text, envelope.source?.filePath ?? null);
  const diagnostics = (envelope.diagnostics ?? []).map((d, i) => diagnosticFromJson(d, `/diagnostics/${i}`));
  const options = { designTime: envelope.options?.designTime ?? false };
  return SyntaxTree.create(root, source, diagnostics, options);
}

/**
 * 验证 JSON 字符串是否为有效的语法树格式
 */
export function isValidSyntaxTreeJson(json: string): boolean {
  try {
    deserializeSyntaxTreeJson(json);
    return true;
  } catch {
    return false;
  }
}

function elementToJson(node: SyntaxElement): SyntaxElementJson {
  const json: SyntaxElementJson = { kind: node.kind };
  if (node.isToken) {
    if (node.isMissing) json.missing = true;
    else json.content = node.content;
    if (node.leadingTrivia.length > 0) json.leadingTrivia = node.leadingTrivia.map(triviaToJson);
    if (node.trailingTrivia.length > 0) json.trailingTrivia = node.trailingTrivia.map(triviaToJson);
  } else {
    json.children = node.children.map(elementToJson);
  }
  if (node.annotations.size > 0) json.annotations = Object.fromEntries(node.annotations);
  if (node.diagnostics.length > 0) json.diagnostics = node.diagnostics.map(diagnosticToJson);
  return json;
}

function triviaToJson(trivia: SyntaxTrivia): SyntaxTriviaJson {
  return { kind: trivia.kind, text: trivia.text };
}

function diagnosticToJson(diagnostic: Diagnostic): DiagnosticJson {
  const { id, severity, message, span } = diagnostic;
  return { id, severity, message, span: { ...span } };
}

function elementFromJson(json: SyntaxElementJson, path: string): SyntaxElement {
  const kind = json.kind;
  if (!isSyntaxKind(kind)) {
    throw new SyntaxTreeJsonError(`${path}: unknown syntax kind '${kind}'`);
  }
  const metadata: SyntaxMetadata = {
    annotations: annotationsFromJson(json.annotations ?? {}, path),
    diagnostics: (json.diagnostics ?? []).map((d, i) => diagnosticFromJson(d, `${path}/diagnostics/${i}`)),
  };

  if (isBlockKind(kind)) {
    if (json.content !== undefined || json.missing !== undefined) {
      throw new SyntaxTreeJsonError(`${path}: block ${kind} cannot carry token content`);
    }
    const children = (json.children ?? []).map((child, i) => elementFromJson(child, `${path}/children/${i}`));
    return SyntaxBlock.create(kind, children, 0, metadata);
  }

  if (isTokenKind(kind)) {
    if (json.children !== undefined) {
      throw new SyntaxTreeJsonError(`${path}: token ${kind} cannot have children`);
    }
    return new SyntaxToken(kind, json.content ?? '', 0, {
      ...metadata,
      isMissing: json.missing ?? false,
      leadingTrivia: (json.leadingTrivia ?? []).map(t => triviaFromJson(t, path)),
      trailingTrivia: (json.trailingTrivia ?? []).map(t => triviaFromJson(t, path)),
    });
  }

  throw new SyntaxTreeJsonError(`${path}: unsupported syntax kind '${kind}'`);
}

function annotationsFromJson(json: Record<string, unknown>, path: string): ReadonlyMap<string, unknown> {
  const annotations = new Map<string, unknown>();
  for (const [kind, data] of Object.entries(json)) {
    if (kind === SPAN_CONTEXT_KIND) {
      if (!isSpanContext(data)) {
        throw new SyntaxTreeJsonError(`${path}/annotations: malformed ${SPAN_CONTEXT_KIND}`);
      }
      annotations.set(kind, createSpanContext(data.chunkGenerator, data.editHandler));
    } else {
      annotations.set(kind, data);
    }
  }
  return annotations;
}

const TRIVIA_KINDS: ReadonlyMap<string, TriviaKind> = new Map(Object.values(TriviaKind).map(k => [k, k]));
const DIAGNOSTIC_CODES: ReadonlyMap<string, DiagnosticCode> = new Map(
  Object.values(DiagnosticCode).map(code => [code, code])
);
const SEVERITIES: ReadonlyMap<string, DiagnosticSeverity> = new Map(
  Object.values(DiagnosticSeverity).map(severity => [severity, severity])
);

function triviaFromJson(json: SyntaxTriviaJson, path: string): SyntaxTrivia {
  const kind = TRIVIA_KINDS.get(json.kind);
  if (!kind) throw new SyntaxTreeJsonError(`${path}: unknown trivia kind '${json.kind}'`);
  return Object.freeze({ kind, text: json.text });
}

function diagnosticFromJson(json: DiagnosticJson, path: string): Diagnostic {
  const id = DIAGNOSTIC_CODES.get(json.id);
  if (!id) throw new SyntaxTreeJsonError(`${path}: unknown diagnostic id '${json.id}'`);
  const severity = SEVERITIES.get(json.severity);
  if (!severity) throw new SyntaxTreeJsonError(`${path}: unknown severity '${json.severity}'`);
  const span: SourceSpan = { ...json.span, filePath: json.span.filePath ?? null };
  return { id, severity, message: json.message, span };
}
