import { performance } from 'node:perf_hooks';
import type { SyntaxTree } from '../syntax/syntax_tree.js';
import type { ParserOptions } from '../types.js';
import { createLogger, logPerformance } from '../utils/logger.js';
import { DesignTimeDirectivePass } from './design_time_directive_pass.js';
import { DirectiveTokenValidationPass } from './directive_token_validation_pass.js';
import { createCodeDocument, type CodeDocument, type SyntaxTreePass } from './pass.js';

const pipelineLogger = createLogger('pipeline');

/**
 * 按 order 升序执行的阶段序列（order 相同时保持注册顺序）。
 */
export class PassPipeline {
  private readonly passes: SyntaxTreePass[] = [];

  constructor(passes: readonly SyntaxTreePass[] = []) {
    for (const pass of passes) this.register(pass);
  }

  register(pass: SyntaxTreePass): this {
    const index = this.passes.findIndex(existing => existing.order > pass.order);
    if (index === -1) this.passes.push(pass);
    else this.passes.splice(index, 0, pass);
    return this;
  }

  getPasses(): readonly SyntaxTreePass[] {
    return this.passes;
  }

  run(tree: SyntaxTree, document: CodeDocument = createCodeDocument(tree)): SyntaxTree {
    const startTime = performance.now();
    let current = tree;
    for (const pass of this.passes) {
      const passStart = performance.now();
      try {
        current = pass.execute(document, current);
      } catch (error) {
        pipelineLogger.error('阶段执行失败', error instanceof Error ? error : new Error(String(error)), {
          pass: pass.name,
        });
        throw error;
      }
      logPerformance(
        {
          component: 'pipeline',
          operation: pass.name,
          duration: performance.now() - passStart,
          metadata: { order: pass.order },
        },
        pipelineLogger
      );
    }
    pipelineLogger.debug('管道执行完成', {
      passCount: this.passes.length,
      diagnosticCount: current.diagnostics.length,
      duration_ms: performance.now() - startTime,
    });
    return current;
  }
}

/**
 * 默认管道：设计时模式下先执行 DesignTimeDirectivePass，随后总是执行指令 token 校验。
 */
export function createDefaultPipeline(options: ParserOptions): PassPipeline {
  const pipeline = new PassPipeline();
  if (options.designTime) pipeline.register(new DesignTimeDirectivePass());
  pipeline.register(new DirectiveTokenValidationPass());
  return pipeline;
}
