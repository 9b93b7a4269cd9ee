import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { DiagnosticCode } from '../../../src/diagnostics/diagnostics.js';
import { AcceptedCharacters, SPAN_CONTEXT_KIND, createSpanContext } from '../../../src/syntax/span_context.js';
import { Syntax, withSpanContext } from '../../../src/syntax/syntax_factory.js';
import { SyntaxKind } from '../../../src/syntax/syntax_kind.js';
import { SyntaxBlock, SyntaxToken, descendantsAndSelf, layoutChildren } from '../../../src/syntax/syntax_node.js';
import { makeDiagnostic } from '../../helpers/syntax-fixtures.js';

describe('SyntaxToken', () => {
  it('fullWidth 包含前后 trivia', () => {
    const token = new SyntaxToken(SyntaxKind.Text, 'abc', 0, {
      leadingTrivia: [Syntax.whitespace('  ')],
      trailingTrivia: [Syntax.newLine('\n')],
    });
    assert.equal(token.width, 3);
    assert.equal(token.fullWidth, 6);
    assert.equal(token.endPosition, 6);
    assert.equal(token.toFullString(), '  abc\n');
    assert.equal(token.hasTrivia, true);
  });

  it('缺失 token 为零宽且不携带内容', () => {
    const token = new SyntaxToken(SyntaxKind.RightBrace, '}', 4, { isMissing: true });
    assert.equal(token.isMissing, true);
    assert.equal(token.content, '');
    assert.equal(token.fullWidth, 0);
    assert.equal(token.endPosition, 4);
  });

  it('withPosition 位置不变时返回自身', () => {
    const token = Syntax.text('x');
    assert.equal(token.withPosition(0), token);
    const moved = token.withPosition(3);
    assert.notEqual(moved, token);
    assert.equal(moved.position, 3);
    assert.equal(moved.content, 'x');
  });

  it('withTrivia 保留注解与诊断', () => {
    const diagnostic = makeDiagnostic(DiagnosticCode.TF1002_UnexpectedToken, 0);
    const token = Syntax.text('x').withAnnotation('Note', 1).withDiagnostics([diagnostic]);
    const withTrivia = token.withTrivia([Syntax.whitespace()], []);
    assert.equal(withTrivia.fullWidth, 2);
    assert.equal(withTrivia.getAnnotation('Note'), 1);
    assert.deepEqual(withTrivia.getDiagnostics(), [diagnostic]);
  });
});

describe('SyntaxBlock', () => {
  it('子节点从父节点位置起首尾相接排布', () => {
    const root = Syntax.document([Syntax.text('ab'), Syntax.markupBlock([Syntax.text('c'), Syntax.text('de')])]);
    assert.equal(root.fullWidth, 5);
    assert.equal(root.toFullString(), 'abcde');

    const [first, markup] = root.children;
    assert.ok(first && markup);
    assert.equal(first.position, 0);
    assert.equal(markup.position, 2);
    assert.equal(markup.endPosition, 5);
    assert.deepEqual(
      markup.children.map(child => [child.position, child.endPosition]),
      [
        [2, 3],
        [3, 5],
      ]
    );
  });

  it('SyntaxBlock.create 支持非零起点', () => {
    const block = SyntaxBlock.create(SyntaxKind.CodeBlock, [Syntax.codeText('x'), Syntax.codeText('yz')], 10);
    assert.equal(block.position, 10);
    assert.equal(block.endPosition, 13);
    assert.deepEqual(
      block.children.map(child => child.position),
      [10, 11]
    );
  });

  it('update 在子节点引用全部相同时返回自身', () => {
    const block = Syntax.markupBlock([Syntax.text('a'), Syntax.text('b')]);
    assert.equal(block.update([...block.children]), block);
  });

  it('update 重建时保留位置与元数据', () => {
    const block = SyntaxBlock.create(SyntaxKind.MarkupBlock, [Syntax.text('a')], 7).withAnnotation('Note', 'kept');
    const updated = block.update([Syntax.text('hello')]);
    assert.notEqual(updated, block);
    assert.equal(updated.position, 7);
    assert.equal(updated.fullWidth, 5);
    assert.equal(updated.children[0]?.position, 7);
    assert.equal(updated.getAnnotation('Note'), 'kept');
  });

  it('withPosition 会重新排布子节点', () => {
    const block = Syntax.markupBlock([Syntax.text('a'), Syntax.text('b')]);
    const moved = block.withPosition(4);
    assert.deepEqual(
      moved.children.map(child => child.position),
      [4, 5]
    );
  });

  it('layoutChildren 在位置已正确时返回同一数组', () => {
    const children = [Syntax.text('a'), Syntax.text('b').withPosition(1)];
    assert.equal(layoutChildren(children, 0), children);
    assert.notEqual(layoutChildren(children, 1), children);
  });
});

describe('注解与诊断', () => {
  it('getAnnotations 按附加顺序返回，同种注解只保留一个', () => {
    const block = Syntax.codeBlock([])
      .withAnnotation('A', 1)
      .withAnnotation('B', 2)
      .withAnnotation('A', 3);
    assert.deepEqual(block.getAnnotations(), [
      { kind: 'A', data: 3 },
      { kind: 'B', data: 2 },
    ]);
  });

  it('withAnnotation 不修改原节点', () => {
    const token = Syntax.text('x');
    const annotated = token.withAnnotation('A', 1);
    assert.equal(token.getAnnotations().length, 0);
    assert.equal(annotated.getAnnotation('A'), 1);
  });

  it('getSpanContext 读取 SpanContext 注解', () => {
    const context = createSpanContext({ kind: 'Markup' }, { kind: 'Span', acceptedCharacters: AcceptedCharacters.Any });
    const block = withSpanContext(Syntax.markupBlock([Syntax.text('x')]), context);
    assert.deepEqual(block.getSpanContext(), context);
    assert.equal(block.getAnnotation(SPAN_CONTEXT_KIND), context);
    assert.equal(Syntax.text('x').getSpanContext(), undefined);
  });

  it('形状不符的 SpanContext 注解不会被当作 SpanContext', () => {
    const block = Syntax.markupBlock([]).withAnnotation(SPAN_CONTEXT_KIND, { chunkGenerator: 'Markup' });
    assert.equal(block.getSpanContext(), undefined);
  });

  it('withDiagnostics 替换诊断列表', () => {
    const diagnostic = makeDiagnostic(DiagnosticCode.TF1003_UnterminatedBlock, 2);
    const block = Syntax.codeBlock([Syntax.codeText('{')]).withDiagnostics([diagnostic]);
    assert.deepEqual(block.getDiagnostics(), [diagnostic]);
    assert.equal(block.withDiagnostics([]).getDiagnostics().length, 0);
  });
});

describe('descendantsAndSelf', () => {
  it('前序遍历', () => {
    const root = Syntax.document([
      Syntax.markupBlock([Syntax.text('a')]),
      Syntax.codeBlock([Syntax.transition(), Syntax.codeText('x')]),
    ]);
    assert.deepEqual(
      [...descendantsAndSelf(root)].map(node => node.kind),
      [
        SyntaxKind.Document,
        SyntaxKind.MarkupBlock,
        SyntaxKind.Text,
        SyntaxKind.CodeBlock,
        SyntaxKind.Transition,
        SyntaxKind.CodeText,
      ]
    );
  });
});
