import { resolve } from 'node:path';
import { baselineTest, createBaselineContext } from '../../testing/baseline.js';
import { readSyntaxTreeFile } from '../utils/tree-file.js';
import { info, success } from '../utils/logger.js';

export interface BaselineOptions {
  name: string;
  generate?: boolean;
  root?: string;
  verify?: boolean;
}

/**
 * 将 JSON 树与 `<root>/<name>.syntaxtree.txt` 比对，或在 --generate 时写出基线。
 */
export async function baselineCommand(file: string, options: BaselineOptions): Promise<void> {
  const tree = readSyntaxTreeFile(file);
  const context = createBaselineContext(options.name, {
    ...(options.generate !== undefined ? { generateBaselines: options.generate } : {}),
    ...(options.root !== undefined ? { projectRoot: resolve(options.root) } : {}),
  });
  const result = baselineTest(context, tree, { verifySyntaxTree: options.verify ?? true });

  if (result.mode === 'generated') {
    success(`已写出基线 ${result.syntaxTreeFile}`);
    if (tree.diagnostics.length > 0) {
      info(`诊断基线 ${result.diagnosticsFile}（${tree.diagnostics.length} 条）`);
    }
  } else {
    success(`与基线一致：${result.syntaxTreeFile}`);
  }
}
