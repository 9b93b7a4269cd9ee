/**
 * @module treeform
 *
 * 编译器中间表示的树变换框架：不可变语法树模型、可覆写的重写器、
 * 用于基线快照的调试序列化器，以及设计时降级阶段。
 *
 * **处理流程**：
 * ```
 * 解析器（外部，JSON 树） → SyntaxTree → PassPipeline（DesignTimeDirectivePass → 校验） → 调试文本 / JSON
 * ```
 *
 * @example 基础用法
 * ```typescript
 * import { Syntax, SyntaxTree, DesignTimeDirectivePass, createCodeDocument, serializeSyntaxTree } from 'treeform';
 *
 * const root = Syntax.document([
 *   Syntax.classDeclaration([Syntax.directiveToken('Foo'), Syntax.codeText('void Run() {}')]),
 * ]);
 * const tree = SyntaxTree.create(root);
 * const lowered = new DesignTimeDirectivePass().execute(createCodeDocument(tree), tree);
 * console.log(serializeSyntaxTree(lowered.root));
 * ```
 */

// 语法树模型、重写器与序列化
export * from './syntax/index.js';

// 遍历阶段
export * from './passes/index.js';

// 源文档与诊断
export { SourceDocument, createSourceSpan, formatSourceSpan } from './source/source_document.js';
export * from './diagnostics/index.js';

// 基线比对
export {
  assertSyntaxTreeMatchesBaseline,
  baselineTest,
  changeExtension,
  createBaselineContext,
  verifyAgainstBaseline,
} from './testing/baseline.js';
export type { BaselineContext, BaselineResult, BaselineTestOptions } from './testing/baseline.js';

// 配置与日志
export { ConfigService } from './config/config-service.js';
export { Logger, LogLevel, createLogger, logPerformance } from './utils/logger.js';
export type { LogMetadata, LogSink, PerformanceMetrics } from './utils/logger.js';

// 类型定义重导出
export type * from './types.js';
export { DEFAULT_PARSER_OPTIONS } from './types.js';
