import { describe, expect, test } from 'vitest';
import { DocumentNode, Node, NodeKind } from '../ast-types.js';
import {
  createBlockQuoteNode,
  createCodeBlockNode,
  createDescriptionDetailsNode,
  createDescriptionItemNode,
  createDescriptionTermNode,
  createDocumentNode,
  createEmphNode,
  createHeadingNode,
  createLinkNode,
  createListItemNode,
  createListNode,
  createParagraphNode,
  createTableCellNode,
  createTableNode,
  createTableRowNode,
  createTaskItemNode,
  createTextNode,
  createThematicBreakNode
} from '../ast-factory.js';
import { findAll } from '../ast-traversal.js';
import { findContentModelViolations } from '../content-model.js';
import { InvalidNodeError } from '../errors.js';
import { DiagnosticCode, DiagnosticSeverity, MergeOptions, StreamDiagnostic } from '../parser-interfaces.js';
import { appendNode, appendNodes, isFragment, mergeDocuments, wrapDocument } from '../tree-merge.js';
import { treeOutline } from './tree-outline.js';

function collect(): { diagnostics: StreamDiagnostic[]; options: MergeOptions } {
  const diagnostics: StreamDiagnostic[] = [];
  return { diagnostics, options: { onDiagnostic: (diagnostic) => { diagnostics.push(diagnostic); } } };
}

const paragraph = (text: string) => createParagraphNode([createTextNode(text)]);

describe('Tree merge: accepting parents', () => {

  test('block onto an empty document', () => {
    const doc = appendNode(createDocumentNode(), paragraph('a'));
    expect(treeOutline(doc)).toBe(`
Document
  Paragraph
    Text "a"`);
  });

  test('inline continues the trailing paragraph', () => {
    const original = createDocumentNode([paragraph('a')]);
    const doc = appendNode(original, createTextNode('b'));
    expect(treeOutline(doc)).toBe(`
Document
  Paragraph
    Text "a"
    Text "b"`);
    expect(treeOutline(original)).toBe(`
Document
  Paragraph
    Text "a"`);
  });

  test('only the rightmost path is copied', () => {
    const first = paragraph('first');
    const original = createDocumentNode([first, createBlockQuoteNode([paragraph('quoted')])]);
    const doc = appendNode(original, createTextNode('!'));

    expect(doc.children[0]).toBe(first);
    expect(treeOutline(doc)).toBe(`
Document
  Paragraph
    Text "first"
  BlockQuote
    Paragraph
      Text "quoted"
      Text "!"`);
  });

  test('inline text continues the last table cell', () => {
    const table = createTableNode([createTableRowNode([createTableCellNode([createTextNode('a')])], true)]);
    const doc = appendNode(createDocumentNode([table]), createTextNode('b'));
    expect(treeOutline(doc)).toBe(`
Document
  Table columns=1 rows=1
    TableRow header
      TableCell
        Text "a"
        Text "b"`);
  });

  test('table row updates the table counters', () => {
    const table = createTableNode([
      createTableRowNode([createTableCellNode(), createTableCellNode()], true)
    ], ['left', 'right']);
    const row = createTableRowNode([createTableCellNode(), createTableCellNode(), createTableCellNode()]);
    const doc = appendNode(createDocumentNode([table]), row);

    const merged = doc.children[0];
    expect(merged.kind).toBe(NodeKind.Table);
    if (merged.kind !== NodeKind.Table) return;
    expect(merged.numRows).toBe(2);
    expect(merged.numColumns).toBe(3);
    expect(merged.alignments).toEqual(['left', 'right', 'none']);
  });
});

describe('Tree merge: merging siblings', () => {

  test('adjacent lists of one type merge', () => {
    const doc = appendNodes(createDocumentNode(), [
      createListNode([createListItemNode([paragraph('a')])]),
      createListNode([createListItemNode([paragraph('b')])])
    ]);
    expect(treeOutline(doc)).toBe(`
Document
  List bullet
    ListItem
      Paragraph
        Text "a"
    ListItem
      Paragraph
        Text "b"`);
  });

  test('lists of different types stay apart', () => {
    const doc = appendNodes(createDocumentNode(), [
      createListNode([createListItemNode()]),
      createListNode([createListItemNode([], { listType: 'ordered' })], { listType: 'ordered', start: 3 })
    ]);
    expect(treeOutline(doc)).toBe(`
Document
  List bullet
    ListItem
  List ordered start=3
    ListItem`);
  });

  test('merged list becomes a task list when a task item joins', () => {
    const doc = appendNodes(createDocumentNode(), [
      createListNode([createListItemNode()]),
      createListNode([createTaskItemNode(true)], { isTaskList: true })
    ]);
    expect(treeOutline(doc)).toBe(`
Document
  List bullet task
    ListItem
    TaskItem checked`);
  });

  test('mergeDocuments appends the children of the source', () => {
    const target = createDocumentNode([createListNode([createListItemNode([paragraph('a')])])]);
    const source = createDocumentNode([createListNode([createListItemNode([paragraph('b')])]), paragraph('after')]);
    expect(treeOutline(mergeDocuments(target, source))).toBe(`
Document
  List bullet
    ListItem
      Paragraph
        Text "a"
    ListItem
      Paragraph
        Text "b"
  Paragraph
    Text "after"`);
  });
});

describe('Tree merge: wrapping', () => {

  test('list item is wrapped in a synthetic list', () => {
    const { diagnostics, options } = collect();
    let doc = appendNode(createDocumentNode([paragraph('intro')]), createListItemNode([paragraph('one')]), options);
    doc = appendNode(doc, createListItemNode([paragraph('two')]), options);

    expect(treeOutline(doc)).toBe(`
Document
  Paragraph
    Text "intro"
  List bullet [synthetic]
    ListItem
      Paragraph
        Text "one"
    ListItem
      Paragraph
        Text "two"`);
    expect(diagnostics.map((diagnostic) => diagnostic.code)).toEqual([DiagnosticCode.NODE_GRAFTED]);
    expect(diagnostics[0].message).toBe('Wrapped ListItem in List');
  });

  test('list item of another type starts its own list', () => {
    const { diagnostics, options } = collect();
    let doc = appendNode(
      createDocumentNode([createListNode([createListItemNode([paragraph('a')])])]),
      createListItemNode([paragraph('b')], { listType: 'ordered', start: 2 }),
      options
    );
    doc = appendNode(doc, createListItemNode([paragraph('c')], { listType: 'ordered' }), options);

    expect(treeOutline(doc)).toBe(`
Document
  List bullet
    ListItem
      Paragraph
        Text "a"
  List ordered start=2 [synthetic]
    ListItem
      Paragraph
        Text "b"
    ListItem
      Paragraph
        Text "c"`);
    expect(diagnostics.map((diagnostic) => diagnostic.message)).toEqual(['Wrapped ListItem in List']);
  });

  test('task item gets a task list', () => {
    expect(treeOutline(appendNode(createDocumentNode(), createTaskItemNode(false)))).toBe(`
Document
  List bullet task [synthetic]
    TaskItem unchecked`);
  });

  test('table cell is wrapped twice', () => {
    const { diagnostics, options } = collect();
    let doc = appendNode(createDocumentNode([createParagraphNode()]), createTableCellNode([createTextNode('x')]), options);
    doc = appendNode(doc, createTableCellNode([createTextNode('y')]), options);

    expect(treeOutline(doc)).toBe(`
Document
  Paragraph
  Table columns=2 rows=1 [synthetic]
    TableRow [synthetic]
      TableCell
        Text "x"
      TableCell
        Text "y"`);
    expect(diagnostics.map((diagnostic) => diagnostic.message)).toEqual([
      'Wrapped TableCell in TableRow',
      'Wrapped TableRow in Table'
    ]);
  });

  test('description parts', () => {
    const doc = appendNodes(createDocumentNode(), [
      createDescriptionTermNode([paragraph('term')]),
      createDescriptionDetailsNode([paragraph('details')])
    ]);
    expect(treeOutline(doc)).toBe(`
Document
  DescriptionList [synthetic]
    DescriptionItem [synthetic]
      DescriptionTerm
        Paragraph
          Text "term"
      DescriptionDetails
        Paragraph
          Text "details"`);
  });
});

describe('Tree merge: fallback and validation', () => {

  test('inline without an accepting parent goes to the root', () => {
    const { diagnostics, options } = collect();
    const doc = appendNode(createDocumentNode([createThematicBreakNode()]), createTextNode('loose'), options);

    expect(treeOutline(doc)).toBe(`
Document
  ThematicBreak
  Text "loose"`);
    expect(diagnostics).toEqual([{
      severity: DiagnosticSeverity.Warning,
      category: 'structure',
      code: DiagnosticCode.CONTENT_MODEL_FALLBACK,
      message: 'No container accepts Text; appended to the document root',
      context: { node: 'Text' }
    }]);
  });

  test('nested documents stay opaque', () => {
    let doc: DocumentNode = createDocumentNode([createCodeBlockNode('x\n')]);
    doc = appendNode(doc, createDocumentNode([paragraph('inner')]));
    doc = appendNode(doc, createTextNode('after'));

    expect(treeOutline(doc)).toBe(`
Document
  CodeBlock "x\\n"
  Document
    Paragraph
      Text "inner"
  Text "after"`);
  });

  test('non-nodes are rejected', () => {
    const doc = createDocumentNode();
    expect(() => appendNode(doc, JSON.parse('{"kind": 999, "flags": 0}'))).toThrow(InvalidNodeError);
    expect(() => appendNodes(doc, [paragraph('ok'), JSON.parse('"text"')])).toThrow(InvalidNodeError);
  });
});

describe('Tree merge: content model holds after every append', () => {

  const shapes: Record<string, () => DocumentNode> = {
    'empty': () => createDocumentNode(),
    'trailing paragraph': () => createDocumentNode([paragraph('p')]),
    'trailing bullet list': () => createDocumentNode([createListNode([createListItemNode([paragraph('a')])])]),
    'trailing ordered list': () => createDocumentNode([
      createListNode([createListItemNode([paragraph('1')], { listType: 'ordered' })], { listType: 'ordered' })
    ]),
    'trailing table': () => createDocumentNode([
      createTableNode([createTableRowNode([createTableCellNode([createTextNode('h')])], true)])
    ]),
    'trailing block quote': () => createDocumentNode([createBlockQuoteNode([paragraph('q')])])
  };

  const nodes: Record<string, () => Node> = {
    'text': () => createTextNode('t'),
    'emphasis': () => createEmphNode([createTextNode('e')]),
    'link': () => createLinkNode('https://example.com', [createTextNode('l')]),
    'paragraph': () => paragraph('p'),
    'heading': () => createHeadingNode(2, [createTextNode('h')]),
    'code block': () => createCodeBlockNode('x\n'),
    'thematic break': () => createThematicBreakNode(),
    'bullet list item': () => createListItemNode([paragraph('i')]),
    'ordered list item': () => createListItemNode([paragraph('i')], { listType: 'ordered' }),
    'task item': () => createTaskItemNode(true, [paragraph('t')]),
    'table row': () => createTableRowNode([createTableCellNode(), createTableCellNode()]),
    'table cell': () => createTableCellNode([createTextNode('c')]),
    'description term': () => createDescriptionTermNode([paragraph('d')]),
    'description details': () => createDescriptionDetailsNode([paragraph('d')]),
    'description item': () => createDescriptionItemNode([createDescriptionTermNode()]),
    'nested document': () => createDocumentNode([paragraph('inner')])
  };

  /** List items sitting in a list of another type */
  function listTypeMismatches(root: Node): Node[] {
    return findAll(root, (node) => {
      if (node.kind !== NodeKind.List) return false;
      const { listType } = node;
      return node.children.some((child) => child.kind === NodeKind.ListItem && child.listType !== listType);
    });
  }

  for (const [shapeName, shape] of Object.entries(shapes)) {
    test(`appending onto a document with ${shapeName === 'empty' ? 'no children' : `a ${shapeName}`}`, () => {
      for (const [nodeName, node] of Object.entries(nodes)) {
        const doc = appendNode(shape(), node());
        expect(findContentModelViolations(doc), nodeName).toEqual([]);
        expect(listTypeMismatches(doc), nodeName).toEqual([]);
      }
    });
  }
});

describe('Fragments', () => {

  test('wrapDocument', () => {
    const doc = createDocumentNode();
    expect(wrapDocument(doc)).toBe(doc);
    expect(treeOutline(wrapDocument([createHeadingNode(1), paragraph('a')]))).toBe(`
Document
  Heading level=1
  Paragraph
    Text "a"`);
    expect(wrapDocument(paragraph('b')).children).toHaveLength(1);
  });

  test('isFragment', () => {
    expect(isFragment(paragraph('a'))).toBe(true);
    expect(isFragment([createTextNode('a')])).toBe(true);
    expect(isFragment(createDocumentNode())).toBe(false);
    expect(isFragment([createDocumentNode()])).toBe(false);
    expect(isFragment([])).toBe(false);
    expect(isFragment('text')).toBe(false);
  });
});
