// Node model
export * from './ast-types.js';
export * from './ast-factory.js';
export * from './ast-traversal.js';
export * from './content-model.js';
export * from './parser-interfaces.js';
export * from './errors.js';

// Fragment completion
export {
  completeFragment,
  completeFragmentDetailed,
  completeFragmentWithState,
  scanFragment,
  defaultCompletionOptions
} from './fragment-completion.js';
export type { CompletionDetails, CompletionResult, CompletionState } from './fragment-completion.js';
export { ConstructKind, INCOMPLETE_LINK_URL } from './scanner/completion-scanner.js';
export type { FragmentScanResult, OpenConstruct, OpenFence } from './scanner/completion-scanner.js';

// Tree merge
export { appendNode, appendNodes, mergeDocuments, wrapDocument, isFragment } from './tree-merge.js';

// Streaming
export {
  createStreamSession,
  ingest,
  ingestAll,
  materialize,
  bufferedText
} from './streaming-buffer.js';
export type { Chunk, RawSegment, StreamSession, TextSegment, NodeSegment } from './streaming-buffer.js';

// Engine
export { createRemarkEngine, convertRoot } from './remark-engine.js';
export { parseDocument, parseFragment } from './document.js';
export type { ParseOptions } from './document.js';
