import {
  CharacterCodes,
  isAsciiWhiteSpace,
  isDigit,
  isMarkdownPunctuation,
  isShortcodeCharacter,
  isWhiteSpaceSingleLine
} from './character-codes.js';
import {
  CharClass,
  DelimiterMarker,
  classifyCharacter,
  flankingRules
} from './flanking-rules.js';

/**
 * Placeholder destination given to links whose URL has not arrived yet
 */
export const INCOMPLETE_LINK_URL = 'mdex:incomplete-link';

export const enum ConstructKind {
  Delimiter = 0,
  CodeSpan = 1,
  Math = 2,
  LinkLabel = 3,
  LinkDestination = 4,
}

export type EmphasisMarker = Exclude<DelimiterMarker, '$' | '$$'>;

export interface DelimiterConstruct {
  kind: ConstructKind.Delimiter;
  marker: EmphasisMarker;
}

export interface CodeSpanConstruct {
  kind: ConstructKind.CodeSpan;
  /** Backtick count of the opening run; only a run of the same length closes */
  run: number;
}

export interface MathConstruct {
  kind: ConstructKind.Math;
  display: boolean;
  /** `$$` stood alone on its line, so the closer goes on a line of its own */
  ownLine: boolean;
}

export interface LinkLabelConstruct {
  kind: ConstructKind.LinkLabel;
  image: boolean;
  footnote: boolean;
}

export interface LinkDestinationConstruct {
  kind: ConstructKind.LinkDestination;
  depth: number;
}

/**
 * Inline construct opened and not yet closed
 */
export type OpenConstruct =
  | DelimiterConstruct
  | CodeSpanConstruct
  | MathConstruct
  | LinkLabelConstruct
  | LinkDestinationConstruct;

/**
 * Fenced code block still open at the end of input
 */
export interface OpenFence {
  char: '`' | '~';
  length: number;
  /** Columns between the block quote markers and the fence */
  indent: number;
  quoteDepth: number;
  /** Container prefix a closing fence line needs to stay in the same block */
  prefix: string;
  hasBody: boolean;
  /** Length of a closing fence typed partially on the last line */
  partialClose: number;
}

export interface FragmentScanResult {
  /** Inline constructs left open, outermost first */
  open: OpenConstruct[];
  fence: OpenFence | undefined;
  /** Text that closes everything left open, innermost first */
  suffix: string;
  /** The suffix begins with a line break */
  suffixStartsLine: boolean;
}

export interface CompletionScanner {
  /**
   * Scans a fragment. `trailingLineBreak` tells whether the fragment is
   * followed by a line break that is not part of the text given.
   */
  scan(text: string, trailingLineBreak?: boolean): FragmentScanResult;
}

interface ContainerPrefix {
  contentStart: number;
  quoteDepth: number;
  listItem: boolean;
}

const THEMATIC_BREAK = /^ {0,3}(?:(?:\*[ \t]*){3,}|(?:-[ \t]*){3,}|(?:_[ \t]*){3,})$/;
const TABLE_SEPARATOR = /^\|?[ \t]*:?-+:?[ \t]*(?:\|[ \t]*:?-+:?[ \t]*)*\|?$/;
const TASK_MARKER = /^\[[ xX]\]$/;
const PARTIAL_TASK_MARKER = /^\[[ xX]?$/;

export function createCompletionScanner(): CompletionScanner {
  let source = '';
  let end = 0;
  let stack: OpenConstruct[] = [];
  let fence: OpenFence | undefined;
  let partialCloser = '';
  let labelClosedAtEnd = false;

  return { scan };

  function scan(text: string, trailingLineBreak: boolean = false): FragmentScanResult {
    initText(text);

    let lineStart = 0;
    let previousLineStart = -1;
    for (;;) {
      let lineEnd = source.indexOf('\n', lineStart);
      if (lineEnd < 0) lineEnd = end;
      scanLine(lineStart, trimCarriageReturn(lineStart, lineEnd));
      if (lineEnd === end) break;
      previousLineStart = lineStart;
      lineStart = lineEnd + 1;
    }

    if (fence) {
      return { open: [], fence: { ...fence }, ...fenceCloser(fence) };
    }

    if (trailingLineBreak) {
      const separator = tableSeparatorFor(lineStart, previousLineStart);
      if (separator) {
        return { open: [], fence: undefined, suffix: '\n' + separator, suffixStartsLine: true };
      }
    }

    let suffix = partialCloser;
    if (labelClosedAtEnd) suffix += '(' + INCOMPLETE_LINK_URL + ')';
    for (let i = stack.length - 1; i >= 0; i--) {
      suffix += closerFor(stack[i]);
    }

    return {
      open: stack.map((construct) => ({ ...construct })),
      fence: undefined,
      suffix,
      suffixStartsLine: suffix.startsWith('\n')
    };
  }

  // ===========================================================================
  // Lines
  // ===========================================================================

  function scanLine(lineStart: number, lineEnd: number): void {
    if (fence) {
      scanFenceLine(fence, lineStart, lineEnd);
      return;
    }

    if (THEMATIC_BREAK.test(source.slice(lineStart, lineEnd))) {
      resetInline();
      return;
    }

    const container = scanContainerPrefix(lineStart, lineEnd);
    const contentStart = skipSpaces(container.contentStart, lineEnd, 3);

    if (contentStart >= lineEnd || isBlank(contentStart, lineEnd)) {
      resetInline();
      return;
    }

    if (tryOpenFence(lineStart, lineEnd, contentStart, container)) {
      resetInline();
      return;
    }

    const heading = isAtxHeading(contentStart, lineEnd);
    if (container.listItem || heading) {
      resetInline();
    }

    scanInline(container.contentStart, lineEnd, contentStart, container.listItem ? contentStart : -1);

    if (lineEnd < end && (heading || isPipeRow(lineStart, lineEnd))) {
      resetInline();
    }
  }

  function scanContainerPrefix(lineStart: number, lineEnd: number): ContainerPrefix {
    let pos = lineStart;
    let quoteDepth = 0;
    let listItem = false;

    for (;;) {
      const p = skipSpaces(pos, lineEnd, 3);
      if (p < lineEnd && source.charCodeAt(p) === CharacterCodes.greaterThan) {
        pos = p + 1;
        if (pos < lineEnd && source.charCodeAt(pos) === CharacterCodes.space) pos++;
        quoteDepth++;
        continue;
      }

      const markerEnd = scanListMarker(p, lineEnd);
      if (markerEnd < 0) break;
      pos = skipSpaces(markerEnd, lineEnd, 4);
      listItem = true;
    }

    return { contentStart: pos, quoteDepth, listItem };
  }

  /** End of a bullet or ordered list marker at `pos`, or -1 */
  function scanListMarker(pos: number, lineEnd: number): number {
    if (pos >= lineEnd) return -1;
    const ch = source.charCodeAt(pos);
    let markerEnd = -1;

    if (ch === CharacterCodes.minus || ch === CharacterCodes.plus || ch === CharacterCodes.asterisk) {
      markerEnd = pos + 1;
    } else if (isDigit(ch)) {
      let p = pos;
      while (p < lineEnd && p - pos < 9 && isDigit(source.charCodeAt(p))) p++;
      const delimiter = source.charCodeAt(p);
      if (p < lineEnd && (delimiter === CharacterCodes.dot || delimiter === CharacterCodes.closeParen)) {
        markerEnd = p + 1;
      }
    }

    if (markerEnd < 0) return -1;
    if (markerEnd === lineEnd) return markerEnd;
    const next = source.charCodeAt(markerEnd);
    return next === CharacterCodes.space || next === CharacterCodes.tab ? markerEnd : -1;
  }

  function isAtxHeading(pos: number, lineEnd: number): boolean {
    let p = pos;
    while (p < lineEnd && source.charCodeAt(p) === CharacterCodes.hash) p++;
    const level = p - pos;
    return level >= 1 && level <= 6 && (p === lineEnd || isWhiteSpaceSingleLine(source.charCodeAt(p)));
  }

  function isPipeRow(lineStart: number, lineEnd: number): boolean {
    const line = source.slice(lineStart, lineEnd).trim();
    return line.length >= 2 && line.startsWith('|') && line.endsWith('|') && !line.endsWith('\\|');
  }

  /**
   * Separator row for a pipe row that starts a table and has just been
   * terminated by a line break
   */
  function tableSeparatorFor(lineStart: number, previousLineStart: number): string | undefined {
    if (!isPipeRow(lineStart, end)) return undefined;
    const line = source.slice(lineStart, end).trim();
    if (TABLE_SEPARATOR.test(line)) return undefined;

    if (previousLineStart >= 0) {
      const previous = source.slice(previousLineStart, lineStart - 1).trim();
      if (previous.startsWith('|')) return undefined;
    }

    let pipes = 0;
    for (let i = 0; i < line.length; i++) {
      const ch = line.charCodeAt(i);
      if (ch === CharacterCodes.backslash) {
        i++;
      } else if (ch === CharacterCodes.bar) {
        pipes++;
      }
    }
    return '|' + ' - |'.repeat(Math.max(1, pipes - 1));
  }

  // ===========================================================================
  // Fenced code
  // ===========================================================================

  function tryOpenFence(lineStart: number, lineEnd: number, fenceStart: number, container: ContainerPrefix): boolean {
    const ch = source.charCodeAt(fenceStart);
    if (ch !== CharacterCodes.backtick && ch !== CharacterCodes.tilde) return false;

    const length = runLength(fenceStart, lineEnd, ch);
    if (length < 3) return false;
    if (ch === CharacterCodes.backtick && source.slice(fenceStart + length, lineEnd).includes('`')) {
      return false;
    }

    const afterQuotes = skipQuoteMarkers(lineStart, lineEnd, container.quoteDepth);
    let prefix = '';
    for (let i = lineStart; i < fenceStart; i++) {
      const prefixChar = source.charAt(i);
      prefix += prefixChar === '>' || prefixChar === '\t' ? prefixChar : ' ';
    }

    fence = {
      char: ch === CharacterCodes.backtick ? '`' : '~',
      length,
      indent: fenceStart - afterQuotes,
      quoteDepth: container.quoteDepth,
      prefix,
      hasBody: false,
      partialClose: 0
    };
    return true;
  }

  function scanFenceLine(open: OpenFence, lineStart: number, lineEnd: number): void {
    const afterQuotes = skipQuoteMarkers(lineStart, lineEnd, open.quoteDepth);
    let p = afterQuotes;
    while (p < lineEnd && isWhiteSpaceSingleLine(source.charCodeAt(p))) p++;

    const fenceChar = open.char === '`' ? CharacterCodes.backtick : CharacterCodes.tilde;
    const run = runLength(p, lineEnd, fenceChar);
    const indented = p - afterQuotes <= open.indent + 3;

    if (run > 0 && indented) {
      if (run >= open.length && isBlank(p + run, lineEnd)) {
        fence = undefined;
        return;
      }
      if (lineEnd === end && p + run === lineEnd) {
        open.partialClose = run;
        return;
      }
    }

    open.hasBody = true;
  }

  function fenceCloser(open: OpenFence): { suffix: string; suffixStartsLine: boolean } {
    if (open.partialClose > 0) {
      return { suffix: open.char.repeat(open.length - open.partialClose), suffixStartsLine: false };
    }
    if (!open.hasBody) {
      return { suffix: '', suffixStartsLine: false };
    }
    return { suffix: '\n' + open.prefix + open.char.repeat(open.length), suffixStartsLine: true };
  }

  // ===========================================================================
  // Inline constructs
  // ===========================================================================

  function scanInline(pos: number, lineEnd: number, contentStart: number, listContentStart: number): void {
    while (pos < lineEnd) {
      const top = stack[stack.length - 1];
      if (top && isLiteral(top)) {
        pos = scanLiteral(top, pos, lineEnd);
        continue;
      }

      const ch = source.charCodeAt(pos);
      switch (ch) {
        case CharacterCodes.backslash:
          pos += pos + 1 < lineEnd && isMarkdownPunctuation(source.charCodeAt(pos + 1)) ? 2 : 1;
          break;
        case CharacterCodes.backtick:
          pos = scanBacktickRun(pos, lineEnd);
          break;
        case CharacterCodes.asterisk:
        case CharacterCodes.underscore:
        case CharacterCodes.tilde:
        case CharacterCodes.plus:
        case CharacterCodes.equals:
          pos = scanDelimiterRun(pos, lineEnd, ch);
          break;
        case CharacterCodes.dollar:
          pos = scanDollarRun(pos, lineEnd, contentStart);
          break;
        case CharacterCodes.openBracket:
          pos = scanOpenBracket(pos, lineEnd, listContentStart);
          break;
        case CharacterCodes.closeBracket:
          pos = scanCloseBracket(pos, lineEnd);
          break;
        case CharacterCodes.colon:
          pos = scanShortcode(pos, lineEnd);
          break;
        default:
          pos++;
      }
    }
  }

  function isLiteral(construct: OpenConstruct): construct is CodeSpanConstruct | MathConstruct | LinkDestinationConstruct {
    return construct.kind === ConstructKind.CodeSpan ||
      construct.kind === ConstructKind.Math ||
      construct.kind === ConstructKind.LinkDestination;
  }

  /** Inside code, math and link destinations only the matching closer counts */
  function scanLiteral(top: CodeSpanConstruct | MathConstruct | LinkDestinationConstruct, pos: number, lineEnd: number): number {
    const ch = source.charCodeAt(pos);

    switch (top.kind) {
      case ConstructKind.CodeSpan: {
        if (ch !== CharacterCodes.backtick) return pos + 1;
        const run = runLength(pos, lineEnd, ch);
        if (run === top.run) stack.pop();
        return pos + run;
      }

      case ConstructKind.Math: {
        if (ch === CharacterCodes.backslash) return pos + 2;
        if (ch !== CharacterCodes.dollar) return pos + 1;
        const run = runLength(pos, lineEnd, ch);
        if (top.display ? run === 2 : run === 1 && flankingRules['$'].canClose(prevClass(pos), nextClass(pos + run, lineEnd))) {
          stack.pop();
        }
        return pos + run;
      }

      case ConstructKind.LinkDestination: {
        if (ch === CharacterCodes.backslash) return pos + 2;
        if (ch === CharacterCodes.openParen) {
          top.depth++;
        } else if (ch === CharacterCodes.closeParen) {
          top.depth--;
          if (top.depth === 0) stack.pop();
        }
        return pos + 1;
      }
    }
  }

  function scanBacktickRun(pos: number, lineEnd: number): number {
    const run = runLength(pos, lineEnd, CharacterCodes.backtick);
    // a run ending the input may still grow, into a longer span opener or a fence
    if (pos + run === end) {
      return pos + run;
    }
    stack.push({ kind: ConstructKind.CodeSpan, run });
    return pos + run;
  }

  function scanDelimiterRun(pos: number, lineEnd: number, ch: number): number {
    const run = runLength(pos, lineEnd, ch);
    const pairOnly = ch === CharacterCodes.plus || ch === CharacterCodes.equals;
    if (pairOnly && run !== 2) return pos + run;
    if (ch === CharacterCodes.tilde && run > 2) return pos + run;

    const prev = prevClass(pos);
    const next = nextClass(pos + run, lineEnd);
    const rule = flankingRules[emphasisMarker(ch, 1)];
    const atEnd = pos + run === end;
    let remaining = run;

    if (rule.canClose(prev, next)) {
      while (remaining > 0) {
        const index = findOpener(ch);
        if (index < 0) break;
        const opener = stack[index];
        const length = opener.kind === ConstructKind.Delimiter ? opener.marker.length : 0;
        if (length <= remaining) {
          stack.length = index;
          remaining -= length;
        } else if (atEnd) {
          // closer typed partially: extend it rather than open a new run
          partialCloser = source.charAt(pos).repeat(length - remaining);
          stack.length = index;
          remaining = 0;
        } else {
          break;
        }
      }
    }

    if (remaining > 0 && rule.canOpen(prev, next)) {
      if (pairOnly || ch === CharacterCodes.tilde) {
        stack.push({ kind: ConstructKind.Delimiter, marker: emphasisMarker(ch, remaining === 1 ? 1 : 2) });
      } else {
        if (remaining % 2 === 1) {
          stack.push({ kind: ConstructKind.Delimiter, marker: emphasisMarker(ch, 1) });
        }
        for (let i = 0; i < Math.floor(remaining / 2); i++) {
          stack.push({ kind: ConstructKind.Delimiter, marker: emphasisMarker(ch, 2) });
        }
      }
    }

    return pos + run;
  }

  /** Nearest opener of the same character, never looking past a link label */
  function findOpener(ch: number): number {
    for (let i = stack.length - 1; i >= 0; i--) {
      const construct = stack[i];
      if (construct.kind === ConstructKind.LinkLabel) return -1;
      if (construct.kind === ConstructKind.Delimiter && construct.marker.charCodeAt(0) === ch) return i;
    }
    return -1;
  }

  function scanDollarRun(pos: number, lineEnd: number, contentStart: number): number {
    const run = runLength(pos, lineEnd, CharacterCodes.dollar);
    if (run > 2) return pos + run;

    const marker = run === 1 ? '$' : '$$';
    if (flankingRules[marker].canOpen(prevClass(pos), nextClass(pos + run, lineEnd))) {
      stack.push({
        kind: ConstructKind.Math,
        display: run === 2,
        ownLine: run === 2 && pos === contentStart && pos + run === lineEnd
      });
    }
    return pos + run;
  }

  function scanOpenBracket(pos: number, lineEnd: number, listContentStart: number): number {
    if (pos === listContentStart) {
      const marker = source.slice(pos, Math.min(pos + 3, lineEnd));
      if (TASK_MARKER.test(marker) && (pos + 3 === lineEnd || isWhiteSpaceSingleLine(source.charCodeAt(pos + 3)))) {
        return pos + 3;
      }
      if (lineEnd === end && PARTIAL_TASK_MARKER.test(source.slice(pos, lineEnd))) {
        return lineEnd;
      }
    }

    stack.push({
      kind: ConstructKind.LinkLabel,
      image: pos > 0 && source.charCodeAt(pos - 1) === CharacterCodes.exclamation && !isEscaped(pos - 1),
      footnote: pos + 1 < lineEnd && source.charCodeAt(pos + 1) === CharacterCodes.caret
    });
    return pos + 1;
  }

  function scanCloseBracket(pos: number, lineEnd: number): number {
    let index = stack.length - 1;
    while (index >= 0 && stack[index].kind !== ConstructKind.LinkLabel) index--;
    if (index < 0) return pos + 1;

    const label = stack[index];
    stack.length = index;
    if (label.kind !== ConstructKind.LinkLabel || label.footnote) return pos + 1;

    const next = pos + 1;
    if (next < lineEnd && source.charCodeAt(next) === CharacterCodes.openParen) {
      stack.push({ kind: ConstructKind.LinkDestination, depth: 1 });
      return next + 1;
    }
    if (next === end) {
      labelClosedAtEnd = true;
    }
    return next;
  }

  /** `:name:` is skipped whole so its underscores stay literal */
  function scanShortcode(pos: number, lineEnd: number): number {
    let p = pos + 1;
    while (p < lineEnd && isShortcodeCharacter(source.charCodeAt(p))) p++;
    if (p > pos + 1 && p < lineEnd && source.charCodeAt(p) === CharacterCodes.colon) {
      return p + 1;
    }
    return pos + 1;
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  function initText(text: string): void {
    source = text;
    end = text.length;
    fence = undefined;
    resetInline();
  }

  function resetInline(): void {
    stack = [];
    partialCloser = '';
    labelClosedAtEnd = false;
  }

  /** True when an odd number of backslashes precedes `pos` */
  function isEscaped(pos: number): boolean {
    let p = pos;
    while (p > 0 && source.charCodeAt(p - 1) === CharacterCodes.backslash) p--;
    return (pos - p) % 2 === 1;
  }

  function prevClass(pos: number): CharClass {
    return classifyCharacter(pos > 0 ? source.charCodeAt(pos - 1) : -1);
  }

  function nextClass(pos: number, lineEnd: number): CharClass {
    return classifyCharacter(pos < lineEnd ? source.charCodeAt(pos) : -1);
  }

  function runLength(pos: number, lineEnd: number, ch: number): number {
    let p = pos;
    while (p < lineEnd && source.charCodeAt(p) === ch) p++;
    return p - pos;
  }

  function skipSpaces(pos: number, lineEnd: number, max: number): number {
    let p = pos;
    while (p < lineEnd && p - pos < max && source.charCodeAt(p) === CharacterCodes.space) p++;
    return p;
  }

  function skipQuoteMarkers(pos: number, lineEnd: number, depth: number): number {
    let p = pos;
    for (let level = 0; level < depth; level++) {
      const q = skipSpaces(p, lineEnd, 3);
      if (q >= lineEnd || source.charCodeAt(q) !== CharacterCodes.greaterThan) break;
      p = q + 1;
      if (p < lineEnd && source.charCodeAt(p) === CharacterCodes.space) p++;
    }
    return p;
  }

  function isBlank(pos: number, lineEnd: number): boolean {
    for (let p = pos; p < lineEnd; p++) {
      if (!isAsciiWhiteSpace(source.charCodeAt(p))) return false;
    }
    return true;
  }

  function trimCarriageReturn(lineStart: number, lineEnd: number): number {
    return lineEnd > lineStart && source.charCodeAt(lineEnd - 1) === CharacterCodes.carriageReturn
      ? lineEnd - 1
      : lineEnd;
  }
}

function emphasisMarker(ch: number, length: 1 | 2): EmphasisMarker {
  switch (ch) {
    case CharacterCodes.asterisk: return length === 1 ? '*' : '**';
    case CharacterCodes.underscore: return length === 1 ? '_' : '__';
    case CharacterCodes.tilde: return length === 1 ? '~' : '~~';
    case CharacterCodes.plus: return '++';
    default: return '==';
  }
}

function closerFor(construct: OpenConstruct): string {
  switch (construct.kind) {
    case ConstructKind.Delimiter:
      return construct.marker;
    case ConstructKind.CodeSpan:
      return '`'.repeat(construct.run);
    case ConstructKind.Math:
      if (!construct.display) return '$';
      return construct.ownLine ? '\n$$' : '$$';
    case ConstructKind.LinkLabel:
      return construct.footnote ? ']' : '](' + INCOMPLETE_LINK_URL + ')';
    case ConstructKind.LinkDestination:
      return ')'.repeat(construct.depth);
  }
}

/**
 * Text that reopens a construct in a later fragment
 */
export function openerFor(construct: OpenConstruct): string {
  switch (construct.kind) {
    case ConstructKind.Delimiter:
      return construct.marker;
    case ConstructKind.CodeSpan:
      return '`'.repeat(construct.run);
    case ConstructKind.Math:
      return construct.display ? '$$' : '$';
    case ConstructKind.LinkLabel:
      return construct.image ? '![' : '[';
    case ConstructKind.LinkDestination:
      return '';
  }
}
