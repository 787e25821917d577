/**
 * Tree Merge
 *
 * Grafts nodes onto the end of a document. A node goes to the shallowest
 * node on the rightmost path whose content model accepts it; structural
 * parts without an accepting parent are wrapped in their container first.
 * Only the rightmost path is copied, the rest of the tree is shared.
 */

import {
  ContainerNode,
  DocumentNode,
  Node,
  NodeKind,
  ColumnAlignment,
  getChildren,
  hasChildren,
  isNode,
  lastChild,
  withChildren
} from './ast-types.js';
import {
  createDescriptionItemNode,
  createDescriptionListNode,
  createDocumentNode,
  createListNode,
  createTableNode,
  createTableRowNode,
  markSynthetic
} from './ast-factory.js';
import { accepts } from './content-model.js';
import { InvalidNodeError } from './errors.js';
import {
  DiagnosticCategory,
  DiagnosticCode,
  DiagnosticSeverity,
  MergeOptions
} from './parser-interfaces.js';

/**
 * Appends one node to the document
 */
export function appendNode(document: DocumentNode, node: Node, options: MergeOptions = {}): DocumentNode {
  assertNode(document);
  assertNode(node);
  return graft(document, node, options);
}

/**
 * Appends nodes in order
 */
export function appendNodes(document: DocumentNode, nodes: readonly Node[], options: MergeOptions = {}): DocumentNode {
  assertNode(document);
  return nodes.reduce<DocumentNode>((current, node) => {
    assertNode(node);
    return graft(current, node, options);
  }, document);
}

/**
 * Appends the children of `source` to `target`
 */
export function mergeDocuments(target: DocumentNode, source: DocumentNode, options: MergeOptions = {}): DocumentNode {
  assertNode(source);
  return appendNodes(target, source.children, options);
}

/**
 * A document holding the given node or nodes; a document is returned as is
 */
export function wrapDocument(nodes: Node | readonly Node[]): DocumentNode {
  if (!isNodeList(nodes)) {
    assertNode(nodes);
    return nodes.kind === NodeKind.Document ? nodes : createDocumentNode([nodes]);
  }
  nodes.forEach(assertNode);
  return createDocumentNode([...nodes]);
}

/**
 * True for a node that is not a document, or a list starting with one
 */
export function isFragment(value: unknown): boolean {
  if (Array.isArray(value)) {
    return value.length > 0 && isFragment(value[0]);
  }
  return isNode(value) && value.kind !== NodeKind.Document;
}

// =============================================================================
// Grafting
// =============================================================================

function graft(document: DocumentNode, node: Node, options: MergeOptions): DocumentNode {
  const path = rightmostContainerPath(document);

  for (let depth = 0; depth < path.length; depth++) {
    if (fits(path[depth], node)) {
      return insertAt(document, path, depth, node);
    }
  }

  const wrapper = wrapperFor(node);
  if (wrapper) {
    options.onDiagnostic?.({
      severity: DiagnosticSeverity.Info,
      category: DiagnosticCategory.Structure,
      code: DiagnosticCode.NODE_GRAFTED,
      message: `Wrapped ${NodeKind[node.kind]} in ${NodeKind[wrapper.kind]}`,
      context: { node: NodeKind[node.kind], wrapper: NodeKind[wrapper.kind] }
    });
    return graft(document, wrapper, options);
  }

  options.onDiagnostic?.({
    severity: DiagnosticSeverity.Warning,
    category: DiagnosticCategory.Structure,
    code: DiagnosticCode.CONTENT_MODEL_FALLBACK,
    message: `No container accepts ${NodeKind[node.kind]}; appended to the document root`,
    context: { node: NodeKind[node.kind] }
  });
  return insertAt(document, path, 0, node);
}

/**
 * Content model check; list items also need a list of their own type
 */
function fits(parent: ContainerNode, node: Node): boolean {
  if (!accepts(parent.kind, node.kind)) return false;
  if (parent.kind === NodeKind.List && node.kind === NodeKind.ListItem) {
    return parent.listType === node.listType;
  }
  return true;
}

/**
 * The document followed by each last child that is a container.
 * Nested documents are not entered.
 */
function rightmostContainerPath(document: DocumentNode): ContainerNode[] {
  const path: ContainerNode[] = [document];
  let current: ContainerNode = document;
  for (;;) {
    const last = lastChild(current);
    if (!last || !hasChildren(last) || last.kind === NodeKind.Document) break;
    path.push(last);
    current = last;
  }
  return path;
}

function insertAt(document: DocumentNode, path: readonly ContainerNode[], depth: number, node: Node): DocumentNode {
  if (depth === 0) {
    return withChildren(document, appendChild(document.children, node));
  }

  let updated: Node = refreshCounters(withChildren(path[depth], appendChild(path[depth].children, node)));
  for (let i = depth - 1; i > 0; i--) {
    updated = refreshCounters(withChildren(path[i], replaceLast(path[i].children, updated)));
  }
  return withChildren(document, replaceLast(document.children, updated));
}

function appendChild(children: readonly Node[], node: Node): Node[] {
  const last = children[children.length - 1];
  const merged = last ? mergeContainers(last, node) : undefined;
  return merged ? replaceLast(children, merged) : [...children, node];
}

function replaceLast(children: readonly Node[], node: Node): Node[] {
  return [...children.slice(0, -1), node];
}

/**
 * Joins compatible adjacent containers: lists of one type, tables of one
 * width, description lists
 */
function mergeContainers(existing: Node, incoming: Node): Node | undefined {
  if (existing.kind === NodeKind.List && incoming.kind === NodeKind.List) {
    if (existing.listType !== incoming.listType) return undefined;
    return {
      ...existing,
      isTaskList: existing.isTaskList || incoming.isTaskList,
      children: [...existing.children, ...incoming.children]
    };
  }

  if (existing.kind === NodeKind.Table && incoming.kind === NodeKind.Table) {
    if (existing.numColumns !== incoming.numColumns) return undefined;
    return refreshCounters({ ...existing, children: [...existing.children, ...incoming.children] });
  }

  if (existing.kind === NodeKind.DescriptionList && incoming.kind === NodeKind.DescriptionList) {
    return { ...existing, children: [...existing.children, ...incoming.children] };
  }

  return undefined;
}

/**
 * Keeps a table's row and column counts in step with its rows
 */
function refreshCounters(node: ContainerNode): ContainerNode {
  if (node.kind !== NodeKind.Table) return node;

  const widest = node.children.reduce((max, row) => Math.max(max, getChildren(row).length), 0);
  const numColumns = Math.max(node.numColumns, widest);
  const alignments: ColumnAlignment[] = [...node.alignments];
  while (alignments.length < numColumns) alignments.push('none');

  return { ...node, numColumns, numRows: node.children.length, alignments };
}

/**
 * Container a structural part needs when nothing on the path accepts it
 */
function wrapperFor(node: Node): Node | undefined {
  switch (node.kind) {
    case NodeKind.ListItem:
      return markSynthetic(createListNode([node], {
        listType: node.listType,
        start: node.start,
        bulletChar: node.bulletChar
      }));
    case NodeKind.TaskItem:
      return markSynthetic(createListNode([node], { isTaskList: true }));
    case NodeKind.TableRow:
      return markSynthetic(createTableNode([node]));
    case NodeKind.TableCell:
      return markSynthetic(createTableRowNode([node]));
    case NodeKind.DescriptionTerm:
    case NodeKind.DescriptionDetails:
      return markSynthetic(createDescriptionItemNode([node]));
    case NodeKind.DescriptionItem:
      return markSynthetic(createDescriptionListNode([node]));
    default:
      return undefined;
  }
}

function isNodeList(value: Node | readonly Node[]): value is readonly Node[] {
  return Array.isArray(value);
}

function assertNode(value: unknown): asserts value is Node {
  if (!isNode(value)) {
    throw new InvalidNodeError(value);
  }
}
