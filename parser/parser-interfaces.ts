/**
 * Parser Interfaces and Types
 *
 * Options, diagnostics and the contract of the external markdown engine.
 */

import { Node } from './ast-types.js';

/**
 * Markdown engine configuration options
 */
export interface EngineOptions {
  /** Enable GFM extensions (tables, strikethrough, task lists, autolinks, footnotes) */
  gfm?: boolean;

  /** Enable math extensions (inline and block math) */
  math?: boolean;

  /** Recognize YAML front matter */
  frontmatter?: boolean;
}

export const defaultEngineOptions: Required<EngineOptions> = {
  gfm: true,
  math: true,
  frontmatter: true
};

/**
 * External markdown engine: turns complete markdown text into block nodes.
 * Implementations are expected to be reentrant.
 */
export interface MarkdownEngine {
  parse(text: string, options: EngineOptions): Node[];
}

/**
 * Options of `completeFragment`
 */
export interface CompletionOptions {
  /** Context carried over from an earlier fragment, scanned before the text (default: '') */
  prefix?: string;
}

/**
 * Options of the tree merge operations
 */
export interface MergeOptions {
  /** Receives a diagnostic whenever a node is wrapped or falls back to the root */
  onDiagnostic?: (diagnostic: StreamDiagnostic) => void;
}

/**
 * Stream session configuration options
 */
export interface StreamOptions {
  /** Engine used to parse completed text (default: remark engine) */
  engine?: MarkdownEngine;

  /** Options forwarded verbatim to the engine */
  engineOptions?: EngineOptions;

  /** Receives diagnostics about completion and reconciliation */
  onDiagnostic?: (diagnostic: StreamDiagnostic) => void;
}

/**
 * Diagnostic severity levels
 */
export enum DiagnosticSeverity {
  Error = 'error',
  Warning = 'warning',
  Info = 'info'
}

/**
 * Diagnostic categories for structured reporting
 */
export enum DiagnosticCategory {
  Completion = 'completion',
  Reconciliation = 'reconciliation',
  Structure = 'structure'
}

/**
 * Diagnostic codes for machine-readable reporting
 */
export enum DiagnosticCode {
  COMPLETION_APPLIED = 'completion-applied',
  NODES_REUSED = 'nodes-reused',
  NODES_REPLACED = 'nodes-replaced',
  NODE_GRAFTED = 'node-grafted',
  CONTENT_MODEL_FALLBACK = 'content-model-fallback',
  CONTENT_MODEL_VIOLATION = 'content-model-violation'
}

/**
 * Stream diagnostic information
 */
export interface StreamDiagnostic {
  severity: DiagnosticSeverity;
  category: DiagnosticCategory;
  code: DiagnosticCode;

  /** Human-readable message */
  message: string;

  /** Additional context information */
  context?: Record<string, unknown>;
}
