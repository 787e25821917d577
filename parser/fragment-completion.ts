/**
 * Fragment completion
 *
 * Closes every construct left open in a truncated markdown fragment so the
 * result parses the way the finished text is expected to.
 */

import { CompletionOptions } from './parser-interfaces.js';
import {
  ConstructKind,
  FragmentScanResult,
  OpenConstruct,
  createCompletionScanner,
  openerFor
} from './scanner/completion-scanner.js';
import { CharacterCodes, isAsciiWhiteSpace } from './scanner/character-codes.js';

export const defaultCompletionOptions: Required<CompletionOptions> = {
  prefix: ''
};

/**
 * Carried between calls of `completeFragmentWithState`
 */
export interface CompletionState {
  /** Openers left unclosed by the previous fragment */
  lastUnclosed?: string;
}

export interface CompletionResult {
  completed: string;
  state: CompletionState;
}

export interface CompletionDetails {
  completed: string;
  /** Closers appended after the text; empty when nothing was open */
  suffix: string;
}

interface FragmentParts {
  leading: string;
  core: string;
  trailing: string;
}

const LIST_MARKER = /^(?:[-+*]|\d{1,9}[.)])(?:[ \t]|$)/;

const scanner = createCompletionScanner();

/**
 * Scans a fragment as given and reports what is left open
 */
export function scanFragment(text: string): FragmentScanResult {
  return scanner.scan(text);
}

/**
 * Completes a markdown fragment by appending the closers of every construct
 * it leaves open. Idempotent: completing a completed fragment changes nothing.
 */
export function completeFragment(text: string, options: CompletionOptions = {}): string {
  return completeWithScan(text, options).completed;
}

/**
 * Like `completeFragment`, also reporting what was appended
 */
export function completeFragmentDetailed(text: string, options: CompletionOptions = {}): CompletionDetails {
  const { completed, scan } = completeWithScan(text, options);
  return { completed, suffix: scan ? scan.suffix : '' };
}

/**
 * Completes fragments displayed one after another, carrying the openers a
 * fragment leaves unclosed into the next call
 */
export function completeFragmentWithState(fragment: string, state: CompletionState = {}): CompletionResult {
  const { completed, scan } = completeWithScan(fragment, { prefix: state.lastUnclosed ?? '' });
  const lastUnclosed = scan ? scan.open.filter(carriesOver).map(openerFor).join('') : '';
  return {
    completed,
    state: lastUnclosed ? { lastUnclosed } : {}
  };
}

function completeWithScan(text: string, options: CompletionOptions): { completed: string; scan: FragmentScanResult | undefined } {
  const { prefix } = { ...defaultCompletionOptions, ...options };
  const { leading, core, trailing } = splitFragment(text);

  if (!core && !prefix) {
    return { completed: text, scan: undefined };
  }

  const keptLeading = isStructuralWhitespace(leading, core) ? leading : '';
  const scan = scanner.scan(prefix + core, trailing.startsWith('\n') || trailing.startsWith('\r\n'));

  let rest = trailing;
  if (scan.suffixStartsLine) {
    rest = trailing.replace(/^\r?\n/, '');
  }

  return {
    completed: keptLeading + prefix + core + scan.suffix + rest,
    scan
  };
}

function splitFragment(text: string): FragmentParts {
  let start = 0;
  while (start < text.length && isAsciiWhiteSpace(text.charCodeAt(start))) start++;
  let end = text.length;
  while (end > start && isAsciiWhiteSpace(text.charCodeAt(end - 1))) end--;

  return {
    leading: text.slice(0, start),
    core: text.slice(start, end),
    trailing: text.slice(end)
  };
}

/**
 * Leading whitespace that changes how the core parses: a line break, a code
 * indent, or the indent of a list item
 */
function isStructuralWhitespace(leading: string, core: string): boolean {
  if (!leading) return false;
  for (let i = 0; i < leading.length; i++) {
    const ch = leading.charCodeAt(i);
    if (ch === CharacterCodes.lineFeed || ch === CharacterCodes.carriageReturn || ch === CharacterCodes.tab) {
      return true;
    }
  }
  return leading.length >= 4 || LIST_MARKER.test(core);
}

function carriesOver(construct: OpenConstruct): boolean {
  return construct.kind === ConstructKind.Delimiter ||
    construct.kind === ConstructKind.CodeSpan ||
    (construct.kind === ConstructKind.Math && !construct.display);
}
