import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  DESIGN_TIME_VARIABLE,
  DesignTimeDirectivePass,
  createDesignTimeHelperDeclaration,
} from '../../../src/passes/design_time_directive_pass.js';
import { createCodeDocument } from '../../../src/passes/pass.js';
import { SourceDocument } from '../../../src/source/source_document.js';
import { getSourcePosition } from '../../../src/syntax/source_position.js';
import { Syntax } from '../../../src/syntax/syntax_factory.js';
import { SyntaxKind } from '../../../src/syntax/syntax_kind.js';
import type { SyntaxBlock, SyntaxElement } from '../../../src/syntax/syntax_node.js';
import { SyntaxTree } from '../../../src/syntax/syntax_tree.js';
import { serializeSyntaxTree } from '../../../src/syntax/syntax_tree_serializer.js';
import { verifySyntaxTree } from '../../../src/syntax/syntax_tree_verifier.js';
import { injectClass } from '../../helpers/syntax-fixtures.js';

function lower(root: SyntaxBlock): SyntaxBlock {
  const tree = SyntaxTree.create(root);
  return new DesignTimeDirectivePass().execute(createCodeDocument(tree), tree).root;
}

function child(node: SyntaxElement, index: number): SyntaxElement {
  const result = node.children[index];
  assert.ok(result, `${node.kind} has no child ${index}`);
  return result;
}

function describeChildren(node: SyntaxElement): string[] {
  return node.children.map(c => (c.isToken ? `${c.kind}:${c.content}` : c.kind));
}

describe('DesignTimeDirectivePass', () => {
  it('order 为 -10', () => {
    assert.equal(new DesignTimeDirectivePass().order, -10);
    assert.equal(new DesignTimeDirectivePass().name, 'DesignTimeDirectivePass');
  });

  it('合成字段声明使用保留变量名', () => {
    const field = createDesignTimeHelperDeclaration();
    assert.equal(field.kind, SyntaxKind.FieldDeclaration);
    assert.equal(field.toFullString(), `private static object ${DESIGN_TIME_VARIABLE} = null;`);
    assert.equal(DESIGN_TIME_VARIABLE, '__o');
  });

  it('子节点顺序为 [holder, 字段, 其余子节点]', () => {
    const root = lower(Syntax.document([injectClass()]));
    const cls = child(root, 0);

    assert.deepEqual(describeChildren(cls), [
      SyntaxKind.DesignTimeDirective,
      SyntaxKind.FieldDeclaration,
      'CodeText:class C {',
      SyntaxKind.MethodDeclaration,
      'CodeText:}',
    ]);
    assert.deepEqual(describeChildren(child(cls, 0)), ['DirectiveToken:Foo x;', 'DirectiveToken:Bar y;']);
    assert.equal(child(cls, 1).toFullString(), 'private static object __o = null;');
    verifySyntaxTree(root);
  });

  it('没有指令 token 的类也会得到空 holder 与字段', () => {
    const body = Syntax.methodDeclaration([Syntax.codeText('void Run() {}')]);
    const cls = child(lower(Syntax.document([Syntax.classDeclaration([body])])), 0);

    assert.deepEqual(describeChildren(cls), [
      SyntaxKind.DesignTimeDirective,
      SyntaxKind.FieldDeclaration,
      SyntaxKind.MethodDeclaration,
    ]);
    assert.equal(child(cls, 0).children.length, 0);
    assert.equal(child(cls, 2).toFullString(), 'void Run() {}');
  });

  it('嵌套类的指令 token 归属最内层类', () => {
    const root = lower(
      Syntax.document([
        Syntax.classDeclaration([
          Syntax.directiveToken('A'),
          Syntax.codeText('x'),
          Syntax.classDeclaration([Syntax.directiveToken('B')]),
          Syntax.directive([Syntax.transition(), Syntax.directiveToken('C')]),
        ]),
      ])
    );
    const outer = child(root, 0);
    assert.deepEqual(describeChildren(outer), [
      SyntaxKind.DesignTimeDirective,
      SyntaxKind.FieldDeclaration,
      'CodeText:x',
      SyntaxKind.ClassDeclaration,
      SyntaxKind.Directive,
    ]);
    assert.deepEqual(describeChildren(child(outer, 0)), ['DirectiveToken:A', 'DirectiveToken:C']);

    const inner = child(outer, 3);
    assert.deepEqual(describeChildren(inner), [SyntaxKind.DesignTimeDirective, SyntaxKind.FieldDeclaration]);
    assert.deepEqual(describeChildren(child(inner, 0)), ['DirectiveToken:B']);

    // 指令块中的 token 被移走，其余部分保留
    assert.deepEqual(describeChildren(child(outer, 4)), ['Transition:@']);
  });

  it('被移动的 token 记录降级前的偏移', () => {
    const cls = child(lower(Syntax.document([Syntax.text('ab'), injectClass()])), 1);
    const holder = child(cls, 0);
    // 'ab' + 'class C {' 之后依次是两个指令 token
    assert.deepEqual(
      holder.children.map(token => [token.position, getSourcePosition(token)]),
      [
        [2, 11],
        [8, 17],
      ]
    );
  });

  it('重复执行保留第一次记录的偏移', () => {
    const twice = lower(lower(Syntax.document([injectClass()])));
    const holder = child(child(twice, 0), 0);
    assert.deepEqual(holder.children.map(getSourcePosition), [9, 15]);
  });

  it('类声明之外的指令 token 保持原位', () => {
    const root = lower(Syntax.document([Syntax.directiveToken('Z'), Syntax.classDeclaration([])]));
    assert.deepEqual(describeChildren(root), ['DirectiveToken:Z', SyntaxKind.ClassDeclaration]);
    assert.deepEqual(describeChildren(child(root, 1)), [SyntaxKind.DesignTimeDirective, SyntaxKind.FieldDeclaration]);
  });

  it('没有类声明时返回同一棵树', () => {
    const root = Syntax.document([Syntax.markupBlock([Syntax.text('x')])]);
    assert.equal(lower(root), root);
  });

  it('不修改输入树，相同输入产生相同输出', () => {
    const input = Syntax.document([injectClass()]);
    const before = serializeSyntaxTree(input);

    const first = lower(input);
    const second = lower(input);

    assert.equal(serializeSyntaxTree(input), before);
    assert.equal(child(input, 0).children.length, 5);
    assert.equal(serializeSyntaxTree(first), serializeSyntaxTree(second));
  });

  it('重复执行会再插入一组 holder 与字段', () => {
    const twice = lower(lower(Syntax.document([injectClass()])));
    const cls = child(twice, 0);
    assert.deepEqual(describeChildren(cls), [
      SyntaxKind.DesignTimeDirective,
      SyntaxKind.FieldDeclaration,
      SyntaxKind.DesignTimeDirective,
      SyntaxKind.FieldDeclaration,
      'CodeText:class C {',
      SyntaxKind.MethodDeclaration,
      'CodeText:}',
    ]);
    assert.equal(child(cls, 0).children.length, 2);
    assert.equal(child(cls, 2).children.length, 0);
  });

  it('文档与树不匹配时拒绝执行', () => {
    const tree = SyntaxTree.create(Syntax.document([]));
    const document = { source: SourceDocument.create('other'), options: { designTime: true } };
    assert.throws(() => new DesignTimeDirectivePass().execute(document, tree), {
      name: 'TypeError',
      message: 'DesignTimeDirectivePass was given a tree that does not belong to the document',
    });
  });
});
