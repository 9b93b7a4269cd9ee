import { SyntaxTreeVerificationError } from '../diagnostics/errors.js';
import type { SyntaxElement } from './syntax_node.js';
import type { SyntaxTree } from './syntax_tree.js';

/**
 * 校验区间不变式：子节点从父节点位置开始首尾相接，且恰好覆盖父节点区间。
 *
 * 发现第一个违例即抛出 SyntaxTreeVerificationError。
 */
export function verifySyntaxTree(tree: SyntaxTree | SyntaxElement): void {
  const root = 'root' in tree ? tree.root : tree;
  verifyNode(root);
}

function verifyNode(node: SyntaxElement): void {
  if (node.position < 0) {
    fail(node, `${describe(node)} has a negative position`);
  }

  let expected = node.position;
  for (const child of node.children) {
    if (child.position !== expected) {
      fail(child, `${describe(child)} in ${describe(node)} starts at ${child.position}, expected ${expected}`);
    }
    expected = child.endPosition;
    verifyNode(child);
  }

  if (!node.isToken && node.children.length > 0 && expected !== node.endPosition) {
    fail(node, `Children of ${describe(node)} end at ${expected}, expected ${node.endPosition}`);
  }
}

function describe(node: SyntaxElement): string {
  return `${node.kind} [${node.position}..${node.endPosition})`;
}

function fail(node: SyntaxElement, message: string): never {
  throw new SyntaxTreeVerificationError(message, node.kind, node.position);
}
