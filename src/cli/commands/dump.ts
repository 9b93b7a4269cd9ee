import { serializeSyntaxTree } from '../../syntax/syntax_tree_serializer.js';
import { printDump, readSyntaxTreeFile, reportDiagnostics } from '../utils/tree-file.js';

export async function dumpCommand(file: string): Promise<void> {
  const tree = readSyntaxTreeFile(file);
  printDump(serializeSyntaxTree(tree.root));
  reportDiagnostics(tree);
}
