/**
 * Streaming Buffer
 *
 * Accumulates markdown chunks and keeps a document that is valid after every
 * chunk. Text is completed, parsed and reconciled with the previous parse of
 * the same text run; node chunks are grafted onto the document as they come.
 * Sessions are immutable: each ingest returns a new session.
 */

import {
  DocumentNode,
  Node,
  NodeFlags,
  NodeKind,
  hasNodeFlag,
  isNode,
  withChildren
} from './ast-types.js';
import { createDocumentNode } from './ast-factory.js';
import { nodesEqual } from './ast-traversal.js';
import { InvalidChunkError } from './errors.js';
import { completeFragmentDetailed } from './fragment-completion.js';
import {
  DiagnosticCategory,
  DiagnosticCode,
  DiagnosticSeverity,
  EngineOptions,
  MarkdownEngine,
  MergeOptions,
  StreamDiagnostic,
  StreamOptions
} from './parser-interfaces.js';
import { createRemarkEngine } from './remark-engine.js';
import { appendNode } from './tree-merge.js';

/**
 * Anything `ingest` takes: text, a node, or a (nested) list of those
 */
export type Chunk = string | Node | readonly Chunk[];

/**
 * Consecutive text chunks, with the nodes committed for them
 */
export interface TextSegment {
  readonly kind: 'text';
  readonly text: string;
  readonly nodes: readonly Node[];
}

export interface NodeSegment {
  readonly kind: 'node';
  readonly node: Node;
}

export type RawSegment = TextSegment | NodeSegment;

interface ResolvedStreamOptions {
  engine: MarkdownEngine;
  engineOptions: EngineOptions;
  onDiagnostic: ((diagnostic: StreamDiagnostic) => void) | undefined;
}

export interface StreamSession {
  /** Ingested chunks in order; the last text segment is still open */
  readonly segments: readonly RawSegment[];
  /** Document of everything before the open text run */
  readonly base: DocumentNode;
  /** Committed document */
  readonly document: DocumentNode;
  readonly options: Readonly<ResolvedStreamOptions>;
}

let sharedEngine: MarkdownEngine | undefined;

function defaultEngine(): MarkdownEngine {
  sharedEngine ??= createRemarkEngine();
  return sharedEngine;
}

export function createStreamSession(options: StreamOptions = {}): StreamSession {
  const document = createDocumentNode();
  return {
    segments: [],
    base: document,
    document,
    options: {
      engine: options.engine ?? defaultEngine(),
      engineOptions: { ...options.engineOptions },
      onDiagnostic: options.onDiagnostic
    }
  };
}

/**
 * Adds a chunk. The chunk is validated as a whole before anything is applied;
 * an engine failure propagates and leaves the given session untouched.
 */
export function ingest(session: StreamSession, chunk: Chunk): StreamSession {
  const pieces: Array<string | Node> = [];
  flattenChunk(chunk, pieces);
  return pieces.reduce<StreamSession>(
    (current, piece) => typeof piece === 'string' ? ingestText(current, piece) : ingestNode(current, piece),
    session
  );
}

export function ingestAll(session: StreamSession, chunks: readonly Chunk[]): StreamSession {
  return chunks.reduce<StreamSession>(ingest, session);
}

export function materialize(session: StreamSession): DocumentNode {
  return session.document;
}

/**
 * All text ingested so far, exactly as received
 */
export function bufferedText(session: StreamSession): string {
  return session.segments.map((segment) => segment.kind === 'text' ? segment.text : '').join('');
}

function flattenChunk(chunk: unknown, pieces: Array<string | Node>): void {
  if (typeof chunk === 'string') {
    pieces.push(chunk);
  } else if (Array.isArray(chunk)) {
    for (const item of chunk) flattenChunk(item, pieces);
  } else if (isNode(chunk)) {
    pieces.push(chunk);
  } else {
    throw new InvalidChunkError(chunk);
  }
}

// =============================================================================
// Text
// =============================================================================

function ingestText(session: StreamSession, text: string): StreamSession {
  const last = session.segments[session.segments.length - 1];
  const open = last?.kind === 'text' ? last : undefined;
  if (!text && open) return session;

  const runText = (open?.text ?? '') + text;
  const { completed, suffix } = completeFragmentDetailed(runText);
  const speculative = suffix !== '';
  if (speculative) {
    report(session, {
      severity: DiagnosticSeverity.Info,
      category: DiagnosticCategory.Completion,
      code: DiagnosticCode.COMPLETION_APPLIED,
      message: `Completed open constructs with ${JSON.stringify(suffix)}`,
      context: { suffix }
    });
  }

  const parsed = session.options.engine.parse(completed, session.options.engineOptions);
  const nodes = reconcile(session, open?.nodes ?? [], parsed, speculative);

  const segment: TextSegment = { kind: 'text', text: runText, nodes };
  const segments = open
    ? [...session.segments.slice(0, -1), segment]
    : [...session.segments, segment];

  return {
    ...session,
    segments,
    document: followBase(session, nodes)
  };
}

/**
 * Places the nodes of the open text run after the base document. Only the
 * first one is grafted, so it can join a container left by a node chunk;
 * the rest stay the separate blocks the engine parsed.
 */
function followBase(session: StreamSession, nodes: readonly Node[]): DocumentNode {
  if (nodes.length === 0) return session.base;
  const [first, ...rest] = nodes;
  const grafted = appendNode(session.base, first, mergeOptions(session));
  return withChildren(grafted, [...grafted.children, ...rest]);
}

/**
 * Keeps the leading nodes that did not change (same objects), takes the rest
 * from the new parse. Only the last node can hold completion text.
 */
function reconcile(session: StreamSession, previous: readonly Node[], parsed: readonly Node[], speculative: boolean): Node[] {
  const flagFor = (index: number): boolean => speculative && index === parsed.length - 1;

  let reused = 0;
  while (
    reused < previous.length &&
    reused < parsed.length &&
    hasNodeFlag(previous[reused], NodeFlags.Speculative) === flagFor(reused) &&
    nodesEqual(previous[reused], parsed[reused])
  ) {
    reused++;
  }

  const replaced = parsed.slice(reused).map((node, offset) =>
    flagFor(reused + offset) ? { ...node, flags: node.flags | NodeFlags.Speculative } : node
  );

  if (reused > 0) {
    report(session, {
      severity: DiagnosticSeverity.Info,
      category: DiagnosticCategory.Reconciliation,
      code: DiagnosticCode.NODES_REUSED,
      message: `Reused ${reused} unchanged node(s)`,
      context: { count: reused }
    });
  }
  if (replaced.length > 0) {
    report(session, {
      severity: DiagnosticSeverity.Info,
      category: DiagnosticCategory.Reconciliation,
      code: DiagnosticCode.NODES_REPLACED,
      message: `Replaced ${replaced.length} node(s)`,
      context: { count: replaced.length, dropped: previous.length - reused }
    });
  }

  return [...previous.slice(0, reused), ...replaced];
}

// =============================================================================
// Nodes
// =============================================================================

function ingestNode(session: StreamSession, node: Node): StreamSession {
  if (node.kind === NodeKind.Document) {
    return node.children.reduce<StreamSession>(ingestNode, session);
  }

  const document = appendNode(session.document, node, mergeOptions(session));
  return {
    ...session,
    segments: [...session.segments, { kind: 'node', node }],
    base: document,
    document
  };
}

function mergeOptions(session: StreamSession): MergeOptions {
  return { onDiagnostic: session.options.onDiagnostic };
}

function report(session: StreamSession, diagnostic: StreamDiagnostic): void {
  session.options.onDiagnostic?.(diagnostic);
}
