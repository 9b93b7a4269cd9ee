import type { SyntaxElement, SyntaxToken } from './syntax_node.js';

/**
 * 节点在原始源文本中的偏移。移动节点的遍历阶段（设计时降级）在移动前记录，
 * 之后的阶段按它在源文档上换算诊断区间；未记录时节点仍在原位，直接使用 position。
 */
export const SOURCE_POSITION_KIND = 'SourcePosition';

export function getSourcePosition(node: SyntaxElement): number {
  const recorded = node.getAnnotation(SOURCE_POSITION_KIND);
  return typeof recorded === 'number' ? recorded : node.position;
}

/** 已记录过的偏移保持不变，重复移动不会覆盖 */
export function withSourcePosition(token: SyntaxToken): SyntaxToken {
  if (typeof token.getAnnotation(SOURCE_POSITION_KIND) === 'number') return token;
  return token.withAnnotation(SOURCE_POSITION_KIND, token.position);
}
