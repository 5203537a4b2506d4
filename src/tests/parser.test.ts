import * as test from 'node:test';
import * as assert from 'node:assert';
import { parseMarkup, walkTree } from '../parser.js';
import { StructuralParseError } from '../errors.js';
import type { BlockNode, Diagnostic } from '../types.js';

const { describe, it } = test;

function admonitionTypes(nodes: BlockNode[]): string[] {
  const types: string[] = [];
  walkTree(nodes, node => {
    if (node.kind === 'admonition') types.push(node.admonitionType);
  });
  return types;
}

describe('parseMarkup', () => {

  it('should parse a fenced note as an admonition node', () => {
    const tree = parseMarkup('Intro\n\n```{note} Remember\nBody text\n```\n');

    assert.strictEqual(tree.children.length, 2);
    assert.strictEqual(tree.children[0].kind, 'block');
    assert.strictEqual(tree.children[0].line, 1);

    const note = tree.children[1];
    assert.strictEqual(note.kind, 'admonition');
    assert.strictEqual(note.line, 3);
    if (note.kind !== 'admonition') return;
    assert.strictEqual(note.admonitionType, 'note');
    assert.strictEqual(note.title, 'Remember');
    assert.strictEqual(note.syntax, 'fence');
    assert.strictEqual(note.children.length, 1);
    assert.strictEqual(note.children[0].line, 4);
  });

  it('should count lines from the top of the document', () => {
    const tree = parseMarkup('# Title\n\nOne\ntwo\n\n\n```{tip}\nx\n```\n');
    const tip = tree.children[2];

    assert.strictEqual(tip.kind, 'admonition');
    assert.strictEqual(tip.line, 7);
    assert.strictEqual(tree.lineCount, 10);
  });

  it('should keep line numbers exact after link definitions', () => {
    const tree = parseMarkup('[ref]: https://example.com\n\n```{note}\nx\n```\n');

    assert.strictEqual(tree.children[0].kind, 'block');
    assert.strictEqual(tree.children[1].kind, 'admonition');
    assert.strictEqual(tree.children[1].line, 3);
  });

  it('should read front matter as the first block', () => {
    const tree = parseMarkup('---\ntitle: x\n---\n\n```{tip}\ny\n```\n');

    const first = tree.children[0];
    assert.strictEqual(first.kind, 'block');
    if (first.kind !== 'block') return;
    assert.strictEqual(first.blockType, 'frontmatter');
    assert.strictEqual(tree.children[1].line, 5);
  });

  it('should only recognise colon fences with colon_fence enabled', () => {
    const text = ':::{note}\nHi\n:::\n';

    assert.deepStrictEqual(admonitionTypes(parseMarkup(text).children), ['note']);
    assert.deepStrictEqual(admonitionTypes(parseMarkup(text, { extensions: ['deflist'] }).children), []);
  });

  it('should start a directive directly under a text line', () => {
    const tree = parseMarkup('Some text.\n:::{note} Hi\nbody\n:::\n');

    assert.deepStrictEqual(tree.children.map(n => [n.kind, n.line]), [['block', 1], ['admonition', 2]]);
  });

  it('should keep a colon fence in the paragraph without colon_fence', () => {
    const tree = parseMarkup('Text\n:::{note}\nHi\n:::\n', { extensions: [] });

    assert.deepStrictEqual(tree.children.map(n => [n.kind, n.line]), [['block', 1]]);
  });

  it('should start a math block directly under a text line', () => {
    const tree = parseMarkup('Text\n$$\nx\n$$\nMore.\n');

    assert.deepStrictEqual(
      tree.children.map(n => (n.kind === 'block' ? [n.blockType, n.line] : [n.kind, n.line])),
      [['paragraph', 1], ['math', 2], ['paragraph', 5]]
    );
  });

  it('should nest admonitions inside admonition bodies', () => {
    const tree = parseMarkup('::::{note} Outer\n:::{tip} Inner\ntext\n:::\n::::\n');

    assert.strictEqual(tree.children.length, 1);
    assert.strictEqual(tree.children[0].children[0].line, 2);
    assert.deepStrictEqual(admonitionTypes(tree.children), ['note', 'tip']);
  });

  it('should read HTML admonitions', () => {
    const tree = parseMarkup('<div class="admonition tip">\n<p class="title">Careful</p>\n<p>Use it.</p>\n</div>\n');
    const node = tree.children[0];

    assert.strictEqual(node.kind, 'admonition');
    if (node.kind !== 'admonition') return;
    assert.strictEqual(node.admonitionType, 'tip');
    assert.strictEqual(node.title, 'Careful');
    assert.strictEqual(node.syntax, 'html');
  });

  it('should warn about HTML admonitions without a type class', () => {
    const tree = parseMarkup('<div class="admonition">\n<p>Plain.</p>\n</div>\n');

    assert.deepStrictEqual(tree.diagnostics, [
      { level: 'warning', message: 'HTML admonition has no type class', line: 1 },
    ]);
  });

  it('should treat HTML divs as plain blocks without html_admonition', () => {
    const tree = parseMarkup('<div class="admonition tip">\n<p>Use it.</p>\n</div>\n', { extensions: [] });

    assert.strictEqual(tree.children[0].kind, 'block');
  });

  it('should collect substitution references', () => {
    const tree = parseMarkup('Hello {{ name }} and {{other}}!\n');
    const node = tree.children[0];

    assert.strictEqual(node.kind, 'block');
    if (node.kind !== 'block') return;
    assert.deepStrictEqual(node.substitutions, ['name', 'other']);
  });

  it('should typeset prose with replacements and smartquotes', () => {
    const tree = parseMarkup('Wait... "yes" -- ok\n');
    const node = tree.children[0];

    assert.strictEqual(node.kind, 'block');
    if (node.kind !== 'block') return;
    assert.strictEqual(node.text, 'Wait… “yes” – ok');
  });

  it('should read definition lists', () => {
    const tree = parseMarkup('Series\n: A labelled array\n');
    const node = tree.children[0];

    assert.strictEqual(node.kind, 'block');
    if (node.kind !== 'block') return;
    assert.strictEqual(node.blockType, 'deflist');
    assert.strictEqual(node.text, 'Series');
  });

  it('should keep chunk bodies opaque', () => {
    const tree = parseMarkup('```{python}\n```{note}\n```\n');
    const node = tree.children[0];

    assert.strictEqual(tree.children.length, 1);
    assert.strictEqual(node.kind, 'directive');
    if (node.kind !== 'directive') return;
    assert.strictEqual(node.name, 'python');
    assert.strictEqual(node.body, '```{note}');
    assert.deepStrictEqual(admonitionTypes(tree.children), []);
  });

  it('should report unknown directives as errors', () => {
    const tree = parseMarkup('Text\n\n```{mystery}\nx\n```\n');

    assert.deepStrictEqual(tree.diagnostics, [
      { level: 'error', message: 'unknown directive type "mystery"', line: 3 },
    ]);
  });

  it('should know the exercise and solution directives', () => {
    const tree = parseMarkup('```{exercise}\nDo it.\n```\n\n```{solution} ex-1\nDone.\n```\n', { haltLevel: 'error' });

    assert.deepStrictEqual(tree.diagnostics, []);
    assert.deepStrictEqual(tree.children.map(n => n.kind), ['directive', 'directive']);
  });

  it('should raise diagnostics at or above the halt level', () => {
    assert.throws(
      () => parseMarkup('Text\n\n```{mystery}\nx\n```\n', { haltLevel: 'error' }),
      (err: unknown) => {
        assert.ok(err instanceof StructuralParseError);
        assert.strictEqual(err.message, 'unknown directive type "mystery" (line 3)');
        assert.strictEqual(err.line, 3);
        return true;
      }
    );
  });

  it('should warn about unclosed directives', () => {
    const received: Diagnostic[] = [];
    const tree = parseMarkup('```{note}\nstill open\n', { onDiagnostic: d => received.push(d) });

    assert.deepStrictEqual(received, [{ level: 'warning', message: 'directive {note} is not closed', line: 1 }]);
    assert.deepStrictEqual(tree.diagnostics, received);
    assert.throws(() => parseMarkup('```{note}\nstill open\n', { haltLevel: 'warning' }), StructuralParseError);
  });

  it('should normalize Windows line endings', () => {
    const tree = parseMarkup('Intro\r\n\r\n```{note}\r\nx\r\n```\r\n');

    assert.strictEqual(tree.children[1].kind, 'admonition');
    assert.strictEqual(tree.children[1].line, 3);
  });

  it('should treat a lone carriage return as a line break', () => {
    const tree = parseMarkup('Intro\r\r```{note}\rx\r```\r');

    assert.strictEqual(tree.children[1].kind, 'admonition');
    assert.strictEqual(tree.children[1].line, 3);
    assert.strictEqual(tree.lineCount, 6);
  });
});
