/**
 * AST Traversal Infrastructure
 *
 * Visitor pattern and utility functions for walking, querying and
 * comparing AST trees.
 */

import {
  Node,
  NodeKind,
  ContainerNode,
  getChildren,
  hasChildren,
  withChildren
} from './ast-types.js';

/**
 * Visit result controls traversal flow
 */
export enum VisitResult {
  /** Continue normal traversal (visit children) */
  Continue,

  /** Skip children but continue with siblings */
  Skip,

  /** Stop traversal entirely */
  Stop
}

/**
 * Visitor with an optional generic callback and optional per-kind callbacks.
 * A per-kind callback takes precedence over `visitNode`.
 */
export interface Visitor {
  visitNode?(node: Node, parent?: Node): VisitResult | void;
  kinds?: Partial<Record<NodeKind, (node: Node, parent?: Node) => VisitResult | void>>;
}

/**
 * Something that picks nodes: a kind, or a predicate
 */
export type NodeSelector = NodeKind | ((node: Node) => boolean);

/**
 * Walk AST tree using visitor pattern (top-down)
 */
export function walkAST(root: Node, visitor: Visitor): void {
  walkASTRecursive(root, visitor, undefined);
}

/**
 * Walk AST tree bottom-up (children first, then parent)
 */
export function walkASTBottomUp(root: Node, visitor: Visitor): void {
  walkASTBottomUpRecursive(root, visitor, undefined);
}

function walkASTRecursive(node: Node, visitor: Visitor, parent?: Node): VisitResult {
  const result = callVisitorMethod(node, visitor, parent);

  if (result === VisitResult.Stop) {
    return VisitResult.Stop;
  }

  if (result === VisitResult.Skip) {
    return VisitResult.Continue;
  }

  for (const child of getChildren(node)) {
    if (walkASTRecursive(child, visitor, node) === VisitResult.Stop) {
      return VisitResult.Stop;
    }
  }

  return VisitResult.Continue;
}

function walkASTBottomUpRecursive(node: Node, visitor: Visitor, parent?: Node): VisitResult {
  for (const child of getChildren(node)) {
    if (walkASTBottomUpRecursive(child, visitor, node) === VisitResult.Stop) {
      return VisitResult.Stop;
    }
  }

  return callVisitorMethod(node, visitor, parent);
}

function callVisitorMethod(node: Node, visitor: Visitor, parent?: Node): VisitResult {
  const specific = visitor.kinds?.[node.kind];
  const result = specific ? specific(node, parent) : visitor.visitNode?.(node, parent);
  return result ?? VisitResult.Continue;
}

function matches(node: Node, selector: NodeSelector): boolean {
  return typeof selector === 'function' ? selector(node) : node.kind === selector;
}

// =============================================================================
// Query Functions
// =============================================================================

/**
 * All nodes below and including `root` matching the selector, in document order
 */
export function findAll(root: Node, selector: NodeSelector): Node[] {
  const result: Node[] = [];
  walkAST(root, {
    visitNode(node) {
      if (matches(node, selector)) result.push(node);
    }
  });
  return result;
}

/**
 * First node in document order matching the selector
 */
export function findFirst(root: Node, selector: NodeSelector): Node | undefined {
  let found: Node | undefined;
  walkAST(root, {
    visitNode(node) {
      if (!matches(node, selector)) return VisitResult.Continue;
      found = node;
      return VisitResult.Stop;
    }
  });
  return found;
}

/**
 * Get the path from root to a specific node (identity match)
 */
export function getNodePath(root: Node, target: Node): Node[] {
  const path: Node[] = [];

  function findPath(node: Node): boolean {
    path.push(node);
    if (node === target) return true;
    for (const child of getChildren(node)) {
      if (findPath(child)) return true;
    }
    path.pop();
    return false;
  }

  return findPath(root) ? path : [];
}

/**
 * Get the parent node of a target node
 */
export function getParent(root: Node, target: Node): Node | undefined {
  const path = getNodePath(root, target);
  return path.length > 1 ? path[path.length - 2] : undefined;
}

/**
 * Nodes from the root down through each last child
 */
export function getRightmostPath(root: Node): Node[] {
  const path: Node[] = [root];
  let current: Node = root;
  while (hasChildren(current) && current.children.length) {
    current = current.children[current.children.length - 1];
    path.push(current);
  }
  return path;
}

/**
 * Concatenated literal text of a subtree
 */
export function textContent(node: Node): string {
  switch (node.kind) {
    case NodeKind.Text:
    case NodeKind.Code:
    case NodeKind.CodeBlock:
    case NodeKind.Math:
    case NodeKind.MathBlock:
    case NodeKind.HtmlInline:
    case NodeKind.HtmlBlock:
    case NodeKind.Raw:
      return node.literal;
    case NodeKind.SoftBreak:
    case NodeKind.LineBreak:
      return '\n';
    default:
      return getChildren(node).map(textContent).join('');
  }
}

// =============================================================================
// Transformation
// =============================================================================

/**
 * Rebuilds the tree bottom-up, replacing every node matching the selector
 * with the result of `update`. Untouched subtrees keep their identity.
 */
export function updateNodes(root: Node, selector: NodeSelector, update: (node: Node) => Node): Node {
  let next: Node = root;
  if (hasChildren(root)) {
    let changed = false;
    const children = root.children.map((child) => {
      const updated = updateNodes(child, selector, update);
      if (updated !== child) changed = true;
      return updated;
    });
    if (changed) next = withChildren<ContainerNode>(root, children);
  }
  return matches(next, selector) ? update(next) : next;
}

// =============================================================================
// Structural Comparison
// =============================================================================

/**
 * Structural equality ignoring node flags
 */
export function nodesEqual(a: Node, b: Node): boolean {
  if (a === b) return true;
  if (a.kind !== b.kind) return false;

  const aEntries = Object.entries(a).filter(([key]) => key !== 'flags' && key !== 'children');
  const bValues = new Map<string, unknown>(
    Object.entries(b).filter(([key]) => key !== 'flags' && key !== 'children')
  );
  if (aEntries.length !== bValues.size) return false;
  for (const [key, value] of aEntries) {
    if (!valuesEqual(value, bValues.get(key))) return false;
  }

  const aChildren = getChildren(a);
  const bChildren = getChildren(b);
  return aChildren.length === bChildren.length &&
    aChildren.every((child, index) => nodesEqual(child, bChildren[index]));
}

function valuesEqual(a: unknown, b: unknown): boolean {
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, index) => item === b[index]);
  }
  return a === b;
}
