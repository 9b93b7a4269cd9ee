import { ConfigService } from '../../config/config-service.js';
import { createCodeDocument } from '../../passes/pass.js';
import { createDefaultPipeline } from '../../passes/pipeline.js';
import { serializeSyntaxTreeJson } from '../../syntax/syntax_json.js';
import { serializeSyntaxTree } from '../../syntax/syntax_tree_serializer.js';
import { printDump, readSyntaxTreeFile, reportDiagnostics } from '../utils/tree-file.js';

export interface LowerOptions {
  designTime?: boolean;
  json?: boolean;
}

/**
 * 执行默认管道并输出结果树。
 *
 * 设计时模式依次取自：命令行参数、树自带的选项、TREEFORM_DESIGN_TIME。
 */
export async function lowerCommand(file: string, options: LowerOptions = {}): Promise<void> {
  const tree = readSyntaxTreeFile(file);
  const designTime = options.designTime || tree.options.designTime || ConfigService.getInstance().designTime;
  const document = createCodeDocument(tree, { designTime });
  const lowered = createDefaultPipeline(document.options).run(tree, document);

  if (options.json) {
    console.log(serializeSyntaxTreeJson(lowered));
  } else {
    printDump(serializeSyntaxTree(lowered.root));
  }
  reportDiagnostics(lowered);
}
