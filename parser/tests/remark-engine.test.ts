import { describe, expect, test } from 'vitest';
import { NodeKind } from '../ast-types.js';
import { createDocumentNode } from '../ast-factory.js';
import { findFirst } from '../ast-traversal.js';
import { EngineOptions } from '../parser-interfaces.js';
import { createRemarkEngine } from '../remark-engine.js';
import { treeOutline } from './tree-outline.js';

const engine = createRemarkEngine();

function outline(markdown: string, options: EngineOptions = {}): string {
  return treeOutline(createDocumentNode(engine.parse(markdown, options)));
}

describe('Remark engine: blocks', () => {

  test('ATX heading', () => {
    expect(outline('# Hi')).toBe(`
Document
  Heading level=1
    Text "Hi"`);
  });

  test('setext heading is marked', () => {
    const [heading] = engine.parse('Hi\n==', {});
    expect(heading.kind).toBe(NodeKind.Heading);
    if (heading.kind !== NodeKind.Heading) return;
    expect(heading.level).toBe(1);
    expect(heading.setext).toBe(true);
  });

  test('block quote and thematic break', () => {
    expect(outline('> quote\n\n***')).toBe(`
Document
  BlockQuote
    Paragraph
      Text "quote"
  ThematicBreak`);
  });

  test('bullet list', () => {
    expect(outline('- a\n- b')).toBe(`
Document
  List bullet
    ListItem
      Paragraph
        Text "a"
    ListItem
      Paragraph
        Text "b"`);

    const list = findFirst(createDocumentNode(engine.parse('* a', {})), NodeKind.List);
    expect(list?.kind === NodeKind.List && list.bulletChar).toBe('*');
    expect(list?.kind === NodeKind.List && list.tight).toBe(true);
  });

  test('ordered list keeps start and delimiter', () => {
    const [list] = engine.parse('3) x', {});
    expect(list.kind).toBe(NodeKind.List);
    if (list.kind !== NodeKind.List) return;
    expect(list.listType).toBe('ordered');
    expect(list.start).toBe(3);
    expect(list.delimiter).toBe('paren');
    expect(list.bulletChar).toBe('');
  });

  test('task list', () => {
    expect(outline('- [ ] todo\n- [x] done')).toBe(`
Document
  List bullet task
    TaskItem unchecked
      Paragraph
        Text "todo"
    TaskItem checked
      Paragraph
        Text "done"`);
  });

  test('fenced code', () => {
    expect(outline('```ts\nlet a\n```')).toBe(`
Document
  CodeBlock info=ts "let a\\n"`);

    const [block] = engine.parse('~~~~\nx\n~~~~', {});
    expect(block.kind === NodeKind.CodeBlock && [block.fenceChar, block.fenceLength]).toEqual(['~', 4]);
  });

  test('indented code', () => {
    const [block] = engine.parse('    indented', {});
    expect(block.kind).toBe(NodeKind.CodeBlock);
    if (block.kind !== NodeKind.CodeBlock) return;
    expect(block.fenced).toBe(false);
    expect(block.literal).toBe('indented\n');
  });

  test('html block', () => {
    expect(outline('<div>\nhi\n</div>')).toBe(`
Document
  HtmlBlock "<div>\\nhi\\n</div>"`);
  });

  test('table rows are padded to the column count', () => {
    expect(outline('| a | b |\n| :- | -: |\n| 1 |')).toBe(`
Document
  Table columns=2 rows=2
    TableRow header
      TableCell
        Text "a"
      TableCell
        Text "b"
    TableRow
      TableCell
        Text "1"
      TableCell`);

    const [table] = engine.parse('| a | b |\n| :- | -: |', {});
    expect(table.kind === NodeKind.Table && table.alignments).toEqual(['left', 'right']);
  });

  test('front matter', () => {
    expect(outline('---\ntitle: x\n---\n# H')).toBe(`
Document
  FrontMatter "title: x"
  Heading level=1
    Text "H"`);
  });

  test('footnotes', () => {
    expect(outline('Text[^1]\n\n[^1]: Note')).toBe(`
Document
  Paragraph
    Text "Text"
    FootnoteReference name=1
  FootnoteDefinition name=1
    Paragraph
      Text "Note"`);
  });

  test('display math block', () => {
    expect(outline('$$\ny\n$$')).toBe(`
Document
  MathBlock "y"`);
  });
});

describe('Remark engine: inlines', () => {

  test('emphasis, strong, strikethrough and code', () => {
    expect(outline('Some *em* and **strong** and ~~gone~~ and `code`')).toBe(`
Document
  Paragraph
    Text "Some "
    Emph
      Text "em"
    Text " and "
    Strong
      Text "strong"
    Text " and "
    Strikethrough
      Text "gone"
    Text " and "
    Code "code"`);
  });

  test('code span remembers its backtick run', () => {
    const [paragraph] = engine.parse('``a`b``', {});
    const code = findFirst(paragraph, NodeKind.Code);
    expect(code?.kind === NodeKind.Code && [code.literal, code.numBackticks]).toEqual(['a`b', 2]);
  });

  test('links and images', () => {
    expect(outline('[site](https://example.com "Home") ![alt text](pic.png)')).toBe(`
Document
  Paragraph
    Link url="https://example.com"
      Text "site"
    Text " "
    Image url="pic.png"
      Text "alt text"`);

    const link = findFirst(createDocumentNode(engine.parse('[site](https://example.com "Home")', {})), NodeKind.Link);
    expect(link?.kind === NodeKind.Link && link.title).toBe('Home');
  });

  test('reference links resolve through definitions', () => {
    expect(outline('[a][ref]\n\n[ref]: /url')).toBe(`
Document
  Paragraph
    Link url="/url"
      Text "a"`);
  });

  test('autolink literals', () => {
    expect(outline('see https://example.com')).toBe(`
Document
  Paragraph
    Text "see "
    Link url="https://example.com"
      Text "https://example.com"`);
  });

  test('soft and hard breaks', () => {
    expect(outline('a\nb')).toBe(`
Document
  Paragraph
    Text "a"
    SoftBreak
    Text "b"`);
    expect(outline('line  \nnext')).toBe(`
Document
  Paragraph
    Text "line"
    LineBreak
    Text "next"`);
  });

  test('inline html', () => {
    expect(outline('a <b>x</b>')).toBe(`
Document
  Paragraph
    Text "a "
    HtmlInline "<b>"
    Text "x"
    HtmlInline "</b>"`);
  });

  test('inline math', () => {
    expect(outline('$x$ and $$y$$')).toBe(`
Document
  Paragraph
    Math "x"
    Text " and "
    Math display "y"`);
  });
});

describe('Remark engine: options', () => {

  test('extensions can be switched off per call', () => {
    expect(outline('~~x~~', { gfm: false })).toBe(`
Document
  Paragraph
    Text "~~x~~"`);
    expect(outline('$x$', { math: false })).toBe(`
Document
  Paragraph
    Text "$x$"`);
  });

  test('engine defaults sit beneath per-call options', () => {
    const plain = createRemarkEngine({ math: false });
    expect(treeOutline(createDocumentNode(plain.parse('$x$', {})))).toBe(`
Document
  Paragraph
    Text "$x$"`);
    expect(treeOutline(createDocumentNode(plain.parse('$x$', { math: true })))).toBe(`
Document
  Paragraph
    Math "x"`);
  });
});
