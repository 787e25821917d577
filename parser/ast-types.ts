/**
 * AST Node Types for mdstream
 *
 * Closed node hierarchy discriminated on `kind`. Container kinds own an
 * ordered `children` array; leaf kinds carry their payload only.
 */

/**
 * Node kinds - each node type gets a unique identifier
 */
export enum NodeKind {
  // Root node
  Document,

  // Block-level nodes
  FrontMatter,
  Paragraph,
  Heading,
  BlockQuote,
  List,
  CodeBlock,
  HtmlBlock,
  ThematicBreak,
  Table,
  DescriptionList,
  FootnoteDefinition,
  MathBlock,

  // Structural parts (only legal inside their own container)
  ListItem,
  TaskItem,
  TableRow,
  TableCell,
  DescriptionItem,
  DescriptionTerm,
  DescriptionDetails,

  // Inline-level nodes
  Text,
  Code,
  Emph,
  Strong,
  Strikethrough,
  Link,
  Image,
  HtmlInline,
  SoftBreak,
  LineBreak,
  Math,
  FootnoteReference,
  Raw,
}

/**
 * Node flags for additional metadata
 */
export enum NodeFlags {
  None = 0,
  Synthetic = 1 << 0,         // Wrapper created by the tree merge engine
  Speculative = 1 << 1,       // Derived from text that is still being completed
}

/**
 * Base interface for all AST nodes
 */
export interface NodeBase {
  kind: NodeKind;
  flags: NodeFlags;
}

// =============================================================================
// Specific Node Interfaces
// =============================================================================

/**
 * Document root node
 */
export interface DocumentNode extends NodeBase {
  kind: NodeKind.Document;
  children: Node[];
}

/**
 * Front matter block (YAML between `---` fences)
 */
export interface FrontMatterNode extends NodeBase {
  kind: NodeKind.FrontMatter;
  literal: string;
}

export interface ParagraphNode extends NodeBase {
  kind: NodeKind.Paragraph;
  children: Node[];
}

/**
 * Heading node (ATX and Setext)
 */
export interface HeadingNode extends NodeBase {
  kind: NodeKind.Heading;
  level: 1 | 2 | 3 | 4 | 5 | 6;
  setext: boolean;
  children: Node[];
}

export interface BlockQuoteNode extends NodeBase {
  kind: NodeKind.BlockQuote;
  children: Node[];
}

export type ListType = 'bullet' | 'ordered';

export type ListDelimiter = 'period' | 'paren';

/**
 * List node (ordered/unordered)
 */
export interface ListNode extends NodeBase {
  kind: NodeKind.List;
  listType: ListType;
  start: number;                  // Start number for ordered lists
  delimiter: ListDelimiter;
  bulletChar: string;
  tight: boolean;                 // Tight vs loose list semantics
  isTaskList: boolean;
  children: Node[];
}

/**
 * List item node
 */
export interface ListItemNode extends NodeBase {
  kind: NodeKind.ListItem;
  listType: ListType;
  start: number;
  bulletChar: string;
  children: Node[];
}

/**
 * Task list item (`- [ ]` / `- [x]`)
 */
export interface TaskItemNode extends NodeBase {
  kind: NodeKind.TaskItem;
  checked: boolean;
  marker: string;
  children: Node[];
}

/**
 * Code block node (fenced/indented)
 */
export interface CodeBlockNode extends NodeBase {
  kind: NodeKind.CodeBlock;
  fenced: boolean;
  fenceChar: string;
  fenceLength: number;
  info: string;                   // Info string for fenced blocks
  literal: string;                // Code content
}

export interface HtmlBlockNode extends NodeBase {
  kind: NodeKind.HtmlBlock;
  literal: string;
}

export interface ThematicBreakNode extends NodeBase {
  kind: NodeKind.ThematicBreak;
}

export type ColumnAlignment = 'none' | 'left' | 'center' | 'right';

/**
 * Table node (GFM extension)
 */
export interface TableNode extends NodeBase {
  kind: NodeKind.Table;
  alignments: ColumnAlignment[];
  numColumns: number;
  numRows: number;
  children: Node[];
}

/**
 * Table row node
 */
export interface TableRowNode extends NodeBase {
  kind: NodeKind.TableRow;
  header: boolean;                // Header row vs data row
  children: Node[];
}

export interface TableCellNode extends NodeBase {
  kind: NodeKind.TableCell;
  children: Node[];
}

export interface DescriptionListNode extends NodeBase {
  kind: NodeKind.DescriptionList;
  children: Node[];
}

export interface DescriptionItemNode extends NodeBase {
  kind: NodeKind.DescriptionItem;
  children: Node[];
}

export interface DescriptionTermNode extends NodeBase {
  kind: NodeKind.DescriptionTerm;
  children: Node[];
}

export interface DescriptionDetailsNode extends NodeBase {
  kind: NodeKind.DescriptionDetails;
  children: Node[];
}

export interface FootnoteDefinitionNode extends NodeBase {
  kind: NodeKind.FootnoteDefinition;
  name: string;
  children: Node[];
}

/**
 * Math block node (`$$` on its own lines)
 */
export interface MathBlockNode extends NodeBase {
  kind: NodeKind.MathBlock;
  literal: string;
}

/**
 * Inline text content node
 */
export interface TextNode extends NodeBase {
  kind: NodeKind.Text;
  literal: string;
}

/**
 * Inline code node
 */
export interface CodeNode extends NodeBase {
  kind: NodeKind.Code;
  numBackticks: number;
  literal: string;
}

/**
 * Emphasis node (* or _)
 */
export interface EmphNode extends NodeBase {
  kind: NodeKind.Emph;
  children: Node[];
}

/**
 * Strong node (** or __)
 */
export interface StrongNode extends NodeBase {
  kind: NodeKind.Strong;
  children: Node[];
}

/**
 * Strikethrough node (~~)
 */
export interface StrikethroughNode extends NodeBase {
  kind: NodeKind.Strikethrough;
  children: Node[];
}

export interface LinkNode extends NodeBase {
  kind: NodeKind.Link;
  url: string;
  title: string;
  children: Node[];
}

export interface ImageNode extends NodeBase {
  kind: NodeKind.Image;
  url: string;
  title: string;
  children: Node[];
}

export interface HtmlInlineNode extends NodeBase {
  kind: NodeKind.HtmlInline;
  literal: string;
}

export interface SoftBreakNode extends NodeBase {
  kind: NodeKind.SoftBreak;
}

/**
 * Hard line break node (<br/> semantics)
 */
export interface LineBreakNode extends NodeBase {
  kind: NodeKind.LineBreak;
}

/**
 * Inline math node (`$...$`, or `$$...$$` inside a line)
 */
export interface MathNode extends NodeBase {
  kind: NodeKind.Math;
  displayMath: boolean;
  literal: string;
}

export interface FootnoteReferenceNode extends NodeBase {
  kind: NodeKind.FootnoteReference;
  name: string;
}

/**
 * Verbatim output; only ever created programmatically
 */
export interface RawNode extends NodeBase {
  kind: NodeKind.Raw;
  literal: string;
}

// =============================================================================
// Type Unions for Category Safety
// =============================================================================

/**
 * All possible node types
 */
export type Node =
  | DocumentNode
  | FrontMatterNode
  | ParagraphNode
  | HeadingNode
  | BlockQuoteNode
  | ListNode
  | ListItemNode
  | TaskItemNode
  | CodeBlockNode
  | HtmlBlockNode
  | ThematicBreakNode
  | TableNode
  | TableRowNode
  | TableCellNode
  | DescriptionListNode
  | DescriptionItemNode
  | DescriptionTermNode
  | DescriptionDetailsNode
  | FootnoteDefinitionNode
  | MathBlockNode
  | TextNode
  | CodeNode
  | EmphNode
  | StrongNode
  | StrikethroughNode
  | LinkNode
  | ImageNode
  | HtmlInlineNode
  | SoftBreakNode
  | LineBreakNode
  | MathNode
  | FootnoteReferenceNode
  | RawNode;

/**
 * Nodes that own children
 */
export type ContainerNode = Extract<Node, { children: Node[] }>;

/**
 * Nodes without children
 */
export type LeafNode = Exclude<Node, ContainerNode>;

// =============================================================================
// Accessors
// =============================================================================

export function hasChildren(node: Node): node is ContainerNode {
  return 'children' in node;
}

export function getChildren(node: Node): readonly Node[] {
  return hasChildren(node) ? node.children : [];
}

export function lastChild(node: Node): Node | undefined {
  const children = getChildren(node);
  return children.length ? children[children.length - 1] : undefined;
}

export function hasNodeFlag(node: Node, flag: NodeFlags): boolean {
  return (node.flags & flag) !== 0;
}

/**
 * Shallow copy of a container with a replaced child list
 */
export function withChildren<T extends ContainerNode>(node: T, children: Node[]): T {
  return { ...node, children };
}

const nodeKindValues = new Set<unknown>(
  Object.values(NodeKind).filter((value) => typeof value === 'number')
);

/**
 * Runtime guard for values coming from untyped callers
 */
export function isNode(value: unknown): value is Node {
  if (typeof value !== 'object' || value === null) return false;
  if (!('kind' in value) || !nodeKindValues.has(value.kind)) return false;
  if (!('flags' in value) || typeof value.flags !== 'number') return false;
  return !('children' in value) || Array.isArray(value.children);
}
