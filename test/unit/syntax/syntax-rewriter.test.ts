import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Syntax } from '../../../src/syntax/syntax_factory.js';
import { SyntaxKind, TriviaKind } from '../../../src/syntax/syntax_kind.js';
import type { SyntaxBlock, SyntaxElement, SyntaxToken, SyntaxTrivia } from '../../../src/syntax/syntax_node.js';
import { SyntaxRewriter } from '../../../src/syntax/syntax_rewriter.js';
import { verifySyntaxTree } from '../../../src/syntax/syntax_tree_verifier.js';
import { injectClass } from '../../helpers/syntax-fixtures.js';

class UpperCaseText extends SyntaxRewriter {
  override visitToken(token: SyntaxToken): SyntaxElement {
    if (token.kind !== SyntaxKind.Text) return super.visitToken(token);
    return Syntax.text(token.content.toUpperCase() + '!');
  }
}

class KindRecorder extends SyntaxRewriter {
  readonly visited: string[] = [];

  override visitClassDeclaration(node: SyntaxBlock): SyntaxElement {
    this.visited.push(`class:${node.position}`);
    return super.visitClassDeclaration(node);
  }

  override visitMethodDeclaration(node: SyntaxBlock): SyntaxElement {
    this.visited.push(`method:${node.position}`);
    return super.visitMethodDeclaration(node);
  }

  override visitToken(token: SyntaxToken): SyntaxElement {
    this.visited.push(token.content);
    return super.visitToken(token);
  }
}

class CollapseWhitespace extends SyntaxRewriter {
  calls = 0;

  override visitTrivia(trivia: SyntaxTrivia): SyntaxTrivia {
    this.calls++;
    if (trivia.kind !== TriviaKind.Whitespace) return trivia;
    return Syntax.whitespace(' ');
  }
}

describe('SyntaxRewriter', () => {
  it('基础遍历返回同一棵树', () => {
    const root = Syntax.document([injectClass(), Syntax.markupBlock([Syntax.text('tail')])]);
    const result = new SyntaxRewriter().visitRoot(root);
    assert.equal(result, root);
    assert.equal(result.toFullString(), root.toFullString());
  });

  it('只重建发生变化的路径，未变化的子树保持引用', () => {
    const untouched = Syntax.codeBlock([Syntax.codeText('x = 1;')]);
    const root = Syntax.document([Syntax.markupBlock([Syntax.text('hi')]), untouched]);
    const result = new UpperCaseText().visitRoot(root);

    assert.notEqual(result, root);
    assert.equal(result.toFullString(), 'HI!x = 1;');
    // 后续兄弟节点被重新定位，但内容未变
    const second = result.children[1];
    assert.ok(second);
    assert.equal(second.position, 3);
    assert.equal(second.toFullString(), untouched.toFullString());
    verifySyntaxTree(result);
  });

  it('位置不变的未修改子树保持同一引用', () => {
    const untouched = Syntax.codeBlock([Syntax.codeText('x')]);
    const root = Syntax.document([untouched, Syntax.markupBlock([Syntax.text('a')])]);
    const result = new UpperCaseText().visitRoot(root);
    assert.equal(result.children[0], untouched);
    assert.equal(result.toFullString(), 'xA!');
  });

  it('按种类分派并保持从左到右的前序顺序', () => {
    const recorder = new KindRecorder();
    recorder.visit(Syntax.document([injectClass()]));
    assert.deepEqual(recorder.visited, [
      'class:0',
      'class C {',
      'Foo x;',
      'Bar y;',
      'method:21',
      'void Run() {}',
      '}',
    ]);
  });

  it('默认不访问 trivia', () => {
    const token = new CollapseWhitespace().visit(
      Syntax.text('a', { leadingTrivia: [Syntax.whitespace('    ')] })
    );
    assert.ok(token.isToken);
    assert.equal(token.toFullString(), '    a');
  });

  it('visitIntoTrivia 开启后访问并替换 trivia', () => {
    const rewriter = new CollapseWhitespace({ visitIntoTrivia: true });
    const root = Syntax.document([
      Syntax.text('a', { leadingTrivia: [Syntax.whitespace('    ')], trailingTrivia: [Syntax.newLine()] }),
      Syntax.text('b'),
    ]);
    const result = rewriter.visitRoot(root);
    assert.equal(rewriter.calls, 2);
    assert.equal(result.toFullString(), ' a\nb');
    assert.equal(result.children[1]?.position, 3);
  });

  it('trivia 未变化时 token 保持同一引用', () => {
    const token = Syntax.text('a', { trailingTrivia: [Syntax.newLine()] });
    const result = new SyntaxRewriter({ visitIntoTrivia: true }).visit(token);
    assert.equal(result, token);
  });

  it('visitRoot 拒绝把根替换为 token', () => {
    class ReplaceRoot extends SyntaxRewriter {
      override visitDocument(): SyntaxElement {
        return Syntax.text('x');
      }
    }
    assert.throws(() => new ReplaceRoot().visitRoot(Syntax.document([])), {
      name: 'TypeError',
      message: 'ReplaceRoot replaced the Document root with a Text token',
    });
  });
});
