/**
 * One-shot parsing helpers on top of the engine
 */

import { DocumentNode, Node, NodeKind } from './ast-types.js';
import { createDocumentNode } from './ast-factory.js';
import { completeFragment } from './fragment-completion.js';
import { EngineOptions, MarkdownEngine } from './parser-interfaces.js';
import { createRemarkEngine } from './remark-engine.js';

export interface ParseOptions {
  /** Engine to parse with (default: remark engine) */
  engine?: MarkdownEngine;

  engineOptions?: EngineOptions;

  /** Complete the text as a truncated fragment before parsing (default: false) */
  streaming?: boolean;
}

const defaultParseOptions = {
  streaming: false,
  engineOptions: {}
};

let sharedEngine: MarkdownEngine | undefined;

export function parseDocument(markdown: string, options: ParseOptions = {}): DocumentNode {
  const { engine, engineOptions, streaming } = { ...defaultParseOptions, ...options };
  sharedEngine ??= createRemarkEngine();
  const text = streaming ? completeFragment(markdown) : markdown;
  return createDocumentNode((engine ?? sharedEngine).parse(text, engineOptions));
}

/**
 * The single node a snippet parses to: a lone block, or the lone inline
 * inside a lone paragraph. Undefined when the snippet is more than that.
 */
export function parseFragment(markdown: string, options: ParseOptions = {}): Node | undefined {
  const { children } = parseDocument(markdown, options);
  if (children.length !== 1) return undefined;

  const [node] = children;
  if (node.kind === NodeKind.Paragraph && node.children.length === 1) {
    return node.children[0];
  }
  return node;
}
