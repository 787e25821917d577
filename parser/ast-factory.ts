/**
 * AST Factory Utilities
 *
 * Helper functions for creating AST nodes with their default attributes.
 */

import {
  NodeKind,
  NodeFlags,
  Node,
  DocumentNode,
  FrontMatterNode,
  ParagraphNode,
  HeadingNode,
  BlockQuoteNode,
  ListNode,
  ListItemNode,
  TaskItemNode,
  CodeBlockNode,
  HtmlBlockNode,
  ThematicBreakNode,
  TableNode,
  TableRowNode,
  TableCellNode,
  DescriptionListNode,
  DescriptionItemNode,
  DescriptionTermNode,
  DescriptionDetailsNode,
  FootnoteDefinitionNode,
  MathBlockNode,
  TextNode,
  CodeNode,
  EmphNode,
  StrongNode,
  StrikethroughNode,
  LinkNode,
  ImageNode,
  HtmlInlineNode,
  SoftBreakNode,
  LineBreakNode,
  MathNode,
  FootnoteReferenceNode,
  RawNode,
  ColumnAlignment
} from './ast-types.js';

/**
 * Creates the shared part of every node
 */
export function createNode<K extends NodeKind>(kind: K, flags: NodeFlags = NodeFlags.None): { kind: K; flags: NodeFlags } {
  return { kind, flags };
}

/**
 * Marks a node as synthesized (returns a copy)
 */
export function markSynthetic<T extends Node>(node: T): T {
  return { ...node, flags: node.flags | NodeFlags.Synthetic };
}

// =============================================================================
// Specific Node Creation Functions
// =============================================================================

export function createDocumentNode(children: Node[] = []): DocumentNode {
  return { ...createNode(NodeKind.Document), children };
}

export function createFrontMatterNode(literal: string): FrontMatterNode {
  return { ...createNode(NodeKind.FrontMatter), literal };
}

export function createParagraphNode(children: Node[] = []): ParagraphNode {
  return { ...createNode(NodeKind.Paragraph), children };
}

export function createHeadingNode(
  level: HeadingNode['level'],
  children: Node[] = [],
  setext: boolean = false
): HeadingNode {
  return { ...createNode(NodeKind.Heading), level, setext, children };
}

export function createBlockQuoteNode(children: Node[] = []): BlockQuoteNode {
  return { ...createNode(NodeKind.BlockQuote), children };
}

/**
 * Creates a list node; attributes not given fall back to a tight `-` bullet list
 */
export function createListNode(
  children: Node[] = [],
  attributes: Partial<Pick<ListNode, 'listType' | 'start' | 'delimiter' | 'bulletChar' | 'tight' | 'isTaskList'>> = {}
): ListNode {
  return {
    ...createNode(NodeKind.List),
    listType: 'bullet',
    start: 1,
    delimiter: 'period',
    bulletChar: '-',
    tight: true,
    isTaskList: false,
    ...attributes,
    children
  };
}

export function createListItemNode(
  children: Node[] = [],
  attributes: Partial<Pick<ListItemNode, 'listType' | 'start' | 'bulletChar'>> = {}
): ListItemNode {
  return {
    ...createNode(NodeKind.ListItem),
    listType: 'bullet',
    start: 1,
    bulletChar: '-',
    ...attributes,
    children
  };
}

export function createTaskItemNode(checked: boolean, children: Node[] = []): TaskItemNode {
  return {
    ...createNode(NodeKind.TaskItem),
    checked,
    marker: checked ? 'x' : '',
    children
  };
}

/**
 * Creates a code block node; an empty fence char means an indented block
 */
export function createCodeBlockNode(
  literal: string,
  info: string = '',
  fenceChar: string = '`',
  fenceLength: number = 3
): CodeBlockNode {
  return {
    ...createNode(NodeKind.CodeBlock),
    fenced: fenceChar !== '',
    fenceChar,
    fenceLength: fenceChar === '' ? 0 : fenceLength,
    info,
    literal
  };
}

export function createHtmlBlockNode(literal: string): HtmlBlockNode {
  return { ...createNode(NodeKind.HtmlBlock), literal };
}

export function createThematicBreakNode(): ThematicBreakNode {
  return createNode(NodeKind.ThematicBreak);
}

/**
 * Creates a table node; counters are derived from the rows given
 */
export function createTableNode(
  children: TableRowNode[] = [],
  alignments?: ColumnAlignment[]
): TableNode {
  const numColumns = alignments?.length ??
    children.reduce((max, row) => Math.max(max, row.children.length), 0);
  return {
    ...createNode(NodeKind.Table),
    alignments: alignments ?? new Array<ColumnAlignment>(numColumns).fill('none'),
    numColumns,
    numRows: children.length,
    children
  };
}

export function createTableRowNode(children: Node[] = [], header: boolean = false): TableRowNode {
  return { ...createNode(NodeKind.TableRow), header, children };
}

export function createTableCellNode(children: Node[] = []): TableCellNode {
  return { ...createNode(NodeKind.TableCell), children };
}

export function createDescriptionListNode(children: Node[] = []): DescriptionListNode {
  return { ...createNode(NodeKind.DescriptionList), children };
}

export function createDescriptionItemNode(children: Node[] = []): DescriptionItemNode {
  return { ...createNode(NodeKind.DescriptionItem), children };
}

export function createDescriptionTermNode(children: Node[] = []): DescriptionTermNode {
  return { ...createNode(NodeKind.DescriptionTerm), children };
}

export function createDescriptionDetailsNode(children: Node[] = []): DescriptionDetailsNode {
  return { ...createNode(NodeKind.DescriptionDetails), children };
}

export function createFootnoteDefinitionNode(name: string, children: Node[] = []): FootnoteDefinitionNode {
  return { ...createNode(NodeKind.FootnoteDefinition), name, children };
}

export function createMathBlockNode(literal: string): MathBlockNode {
  return { ...createNode(NodeKind.MathBlock), literal };
}

export function createTextNode(literal: string): TextNode {
  return { ...createNode(NodeKind.Text), literal };
}

export function createCodeNode(literal: string, numBackticks: number = 1): CodeNode {
  return { ...createNode(NodeKind.Code), numBackticks, literal };
}

export function createEmphNode(children: Node[] = []): EmphNode {
  return { ...createNode(NodeKind.Emph), children };
}

export function createStrongNode(children: Node[] = []): StrongNode {
  return { ...createNode(NodeKind.Strong), children };
}

export function createStrikethroughNode(children: Node[] = []): StrikethroughNode {
  return { ...createNode(NodeKind.Strikethrough), children };
}

export function createLinkNode(url: string, children: Node[] = [], title: string = ''): LinkNode {
  return { ...createNode(NodeKind.Link), url, title, children };
}

export function createImageNode(url: string, children: Node[] = [], title: string = ''): ImageNode {
  return { ...createNode(NodeKind.Image), url, title, children };
}

export function createHtmlInlineNode(literal: string): HtmlInlineNode {
  return { ...createNode(NodeKind.HtmlInline), literal };
}

export function createSoftBreakNode(): SoftBreakNode {
  return createNode(NodeKind.SoftBreak);
}

export function createLineBreakNode(): LineBreakNode {
  return createNode(NodeKind.LineBreak);
}

export function createMathNode(literal: string, displayMath: boolean = false): MathNode {
  return { ...createNode(NodeKind.Math), displayMath, literal };
}

export function createFootnoteReferenceNode(name: string): FootnoteReferenceNode {
  return { ...createNode(NodeKind.FootnoteReference), name };
}

export function createRawNode(literal: string): RawNode {
  return { ...createNode(NodeKind.Raw), literal };
}
