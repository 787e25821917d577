/**
 * Remark engine
 *
 * Default `MarkdownEngine`: parses with unified + remark-parse and the GFM,
 * math and front matter extensions, then maps mdast onto mdstream nodes.
 */

import { unified } from 'unified';
import type { PluggableList } from 'unified';
import remarkParse from 'remark-parse';
import remarkGfm from 'remark-gfm';
import remarkMath from 'remark-math';
import remarkFrontmatter from 'remark-frontmatter';
import type {
  Code,
  Definition,
  Heading,
  InlineCode,
  List,
  ListItem,
  Root,
  RootContent,
  Table
} from 'mdast';
import type { InlineMath, Math as DisplayMath } from 'mdast-util-math';

import { ColumnAlignment, Node, TableRowNode } from './ast-types.js';
import {
  createBlockQuoteNode,
  createCodeBlockNode,
  createCodeNode,
  createEmphNode,
  createFootnoteDefinitionNode,
  createFootnoteReferenceNode,
  createFrontMatterNode,
  createHeadingNode,
  createHtmlBlockNode,
  createHtmlInlineNode,
  createImageNode,
  createLineBreakNode,
  createLinkNode,
  createListItemNode,
  createListNode,
  createMathBlockNode,
  createMathNode,
  createParagraphNode,
  createSoftBreakNode,
  createStrikethroughNode,
  createStrongNode,
  createTableCellNode,
  createTableNode,
  createTableRowNode,
  createTaskItemNode,
  createTextNode,
  createThematicBreakNode
} from './ast-factory.js';
import { EngineOptions, MarkdownEngine, defaultEngineOptions } from './parser-interfaces.js';

type Processor = ReturnType<typeof createProcessor>;

interface ConversionContext {
  source: string;
  definitions: Map<string, Definition>;
  /** `html` nodes inside phrasing content are inline HTML */
  inline: boolean;
}

/**
 * Creates the default engine. `defaults` apply beneath the per-call options.
 */
export function createRemarkEngine(defaults: EngineOptions = {}): MarkdownEngine {
  const processors = new Map<string, Processor>();

  return {
    parse(text: string, options: EngineOptions): Node[] {
      const resolved = { ...defaultEngineOptions, ...defaults, ...options };
      const key = `${resolved.gfm}:${resolved.math}:${resolved.frontmatter}`;
      let processor = processors.get(key);
      if (!processor) {
        processor = createProcessor(resolved);
        processors.set(key, processor);
      }
      return convertRoot(processor.parse(text), text);
    }
  };
}

function createProcessor(options: Required<EngineOptions>) {
  const plugins: PluggableList = [];
  if (options.gfm) plugins.push(remarkGfm);
  if (options.math) plugins.push(remarkMath);
  if (options.frontmatter) plugins.push([remarkFrontmatter, ['yaml']]);
  return unified().use(remarkParse).use(plugins);
}

/**
 * Maps an mdast root onto the block nodes of a document
 */
export function convertRoot(root: Root, source: string): Node[] {
  const definitions = new Map<string, Definition>();
  collectDefinitions(root.children, definitions);
  const context: ConversionContext = { source, definitions, inline: false };
  return root.children.flatMap((child) => convertNode(child, context));
}

function collectDefinitions(nodes: readonly RootContent[], definitions: Map<string, Definition>): void {
  for (const node of nodes) {
    if (node.type === 'definition') {
      if (!definitions.has(node.identifier)) definitions.set(node.identifier, node);
    } else if ('children' in node) {
      collectDefinitions(node.children, definitions);
    }
  }
}

function convertChildren(children: readonly RootContent[], context: ConversionContext, inline: boolean): Node[] {
  const childContext = inline === context.inline ? context : { ...context, inline };
  return children.flatMap((child) => convertNode(child, childContext));
}

function convertNode(node: RootContent, context: ConversionContext): Node[] {
  switch (node.type) {
    // Blocks
    case 'paragraph':
      return [createParagraphNode(convertChildren(node.children, context, true))];
    case 'heading':
      return [createHeadingNode(node.depth, convertChildren(node.children, context, true), isSetext(node, context))];
    case 'thematicBreak':
      return [createThematicBreakNode()];
    case 'blockquote':
      return [createBlockQuoteNode(convertChildren(node.children, context, false))];
    case 'list':
      return [convertList(node, context)];
    case 'code':
      return [convertCode(node, context)];
    case 'html':
      return [context.inline ? createHtmlInlineNode(node.value) : createHtmlBlockNode(node.value)];
    case 'table':
      return [convertTable(node, context)];
    case 'footnoteDefinition':
      return [createFootnoteDefinitionNode(node.label ?? node.identifier, convertChildren(node.children, context, false))];
    case 'yaml':
      return [createFrontMatterNode(node.value)];
    case 'math':
      return [convertMathBlock(node)];
    case 'definition':
      return [];

    // Inlines
    case 'text':
      return convertText(node.value);
    case 'emphasis':
      return [createEmphNode(convertChildren(node.children, context, true))];
    case 'strong':
      return [createStrongNode(convertChildren(node.children, context, true))];
    case 'delete':
      return [createStrikethroughNode(convertChildren(node.children, context, true))];
    case 'inlineCode':
      return [convertInlineCode(node, context)];
    case 'break':
      return [createLineBreakNode()];
    case 'link':
      return [createLinkNode(node.url, convertChildren(node.children, context, true), node.title ?? '')];
    case 'image':
      return [createImageNode(node.url, node.alt ? [createTextNode(node.alt)] : [], node.title ?? '')];
    case 'linkReference': {
      const definition = context.definitions.get(node.identifier);
      return [createLinkNode(definition?.url ?? '', convertChildren(node.children, context, true), definition?.title ?? '')];
    }
    case 'imageReference': {
      const definition = context.definitions.get(node.identifier);
      return [createImageNode(definition?.url ?? '', node.alt ? [createTextNode(node.alt)] : [], definition?.title ?? '')];
    }
    case 'footnoteReference':
      return [createFootnoteReferenceNode(node.label ?? node.identifier)];
    case 'inlineMath':
      return [convertInlineMath(node, context)];

    default:
      return [];
  }
}

/**
 * Line endings inside text become soft breaks
 */
function convertText(value: string): Node[] {
  const nodes: Node[] = [];
  value.split('\n').forEach((line, index) => {
    if (index > 0) nodes.push(createSoftBreakNode());
    if (line) nodes.push(createTextNode(line));
  });
  return nodes;
}

function sourceOf(node: RootContent, context: ConversionContext): string {
  const start = node.position?.start.offset;
  const end = node.position?.end.offset;
  return start === undefined || end === undefined ? '' : context.source.slice(start, end);
}

function isSetext(node: Heading, context: ConversionContext): boolean {
  const text = sourceOf(node, context);
  return text !== '' && !text.trimStart().startsWith('#');
}

function convertList(node: List, context: ConversionContext): Node {
  const ordered = node.ordered === true;
  const start = node.start ?? 1;
  const marker = node.children.length ? listMarkerOf(node.children[0], context) : '';
  const bulletChar = ordered ? '' : marker.charAt(0) || '-';

  const children = node.children.map((item) => {
    const content = convertChildren(item.children, context, false);
    if (typeof item.checked === 'boolean') {
      return createTaskItemNode(item.checked, content);
    }
    return createListItemNode(content, { listType: ordered ? 'ordered' : 'bullet', start, bulletChar });
  });

  return createListNode(children, {
    listType: ordered ? 'ordered' : 'bullet',
    start,
    delimiter: marker.endsWith(')') ? 'paren' : 'period',
    bulletChar,
    tight: node.spread !== true,
    isTaskList: node.children.some((item) => typeof item.checked === 'boolean')
  });
}

function listMarkerOf(item: ListItem, context: ConversionContext): string {
  const match = /^[ \t]*([-+*]|\d{1,9}[.)])/.exec(sourceOf(item, context));
  return match ? match[1] : '';
}

function convertCode(node: Code, context: ConversionContext): Node {
  const text = sourceOf(node, context).trimStart();
  const fence = /^(`{3,}|~{3,})/.exec(text);
  const info = node.lang ? (node.meta ? `${node.lang} ${node.meta}` : node.lang) : '';
  const literal = node.value ? node.value + '\n' : '';
  return fence
    ? createCodeBlockNode(literal, info, fence[1].charAt(0), fence[1].length)
    : createCodeBlockNode(literal, '', '');
}

function convertInlineCode(node: InlineCode, context: ConversionContext): Node {
  const run = /^`+/.exec(sourceOf(node, context));
  return createCodeNode(node.value, run ? run[0].length : 1);
}

/**
 * Rows shorter than the header are padded with empty cells
 */
function convertTable(node: Table, context: ConversionContext): Node {
  const widest = node.children.reduce((max, row) => Math.max(max, row.children.length), 0);
  const alignments: ColumnAlignment[] = (node.align ?? []).map((align) => align ?? 'none');
  while (alignments.length < widest) alignments.push('none');

  const rows: TableRowNode[] = node.children.map((row, index) => {
    const cells: Node[] = row.children.map((cell) => createTableCellNode(convertChildren(cell.children, context, true)));
    while (cells.length < alignments.length) cells.push(createTableCellNode());
    return createTableRowNode(cells, index === 0);
  });

  return createTableNode(rows, alignments);
}

function convertMathBlock(node: DisplayMath): Node {
  return createMathBlockNode(node.value);
}

function convertInlineMath(node: InlineMath, context: ConversionContext): Node {
  return createMathNode(node.value, sourceOf(node, context).startsWith('$$'));
}
