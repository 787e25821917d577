/**
 * Flanking rules for inline delimiter runs
 *
 * Whether a run may open or close is decided from the classes of the
 * characters directly before and after it. Each delimiter has its own row.
 */

import {
  isDigit,
  isPunctuation,
  isWhiteSpace
} from './character-codes.js';

/**
 * Adjacency class of the character next to a delimiter run.
 * Start and end of input count as whitespace.
 */
export const enum CharClass {
  Whitespace = 0,
  Punctuation = 1,
  Letter = 2,
  Digit = 3,
}

export type DelimiterMarker = '*' | '**' | '_' | '__' | '~' | '~~' | '++' | '==' | '$' | '$$';

export interface FlankingRule {
  canOpen(prev: CharClass, next: CharClass): boolean;
  canClose(prev: CharClass, next: CharClass): boolean;
}

export function classifyCharacter(ch: number): CharClass {
  if (ch < 0 || isWhiteSpace(ch)) return CharClass.Whitespace;
  if (isDigit(ch)) return CharClass.Digit;
  if (isPunctuation(ch)) return CharClass.Punctuation;
  return CharClass.Letter;
}

function isAlnumClass(cls: CharClass): boolean {
  return cls === CharClass.Letter || cls === CharClass.Digit;
}

export function isLeftFlanking(prev: CharClass, next: CharClass): boolean {
  return next !== CharClass.Whitespace &&
    (next !== CharClass.Punctuation || prev === CharClass.Whitespace || prev === CharClass.Punctuation);
}

export function isRightFlanking(prev: CharClass, next: CharClass): boolean {
  return prev !== CharClass.Whitespace &&
    (prev !== CharClass.Punctuation || next === CharClass.Whitespace || next === CharClass.Punctuation);
}

const asteriskRule: FlankingRule = {
  canOpen: isLeftFlanking,
  canClose: isRightFlanking
};

// intraword underscores are literal
const underscoreRule: FlankingRule = {
  canOpen: (prev, next) =>
    isLeftFlanking(prev, next) && (!isRightFlanking(prev, next) || prev === CharClass.Punctuation),
  canClose: (prev, next) =>
    isRightFlanking(prev, next) && (!isLeftFlanking(prev, next) || next === CharClass.Punctuation)
};

// `++` and `==` never touch a word on their outer side (C++17, x==1)
const pairRule: FlankingRule = {
  canOpen: (prev, next) => !isAlnumClass(prev) && next !== CharClass.Whitespace,
  canClose: (prev, next) => !isAlnumClass(next) && prev !== CharClass.Whitespace
};

// `$` before a digit is a currency sign
const inlineMathRule: FlankingRule = {
  canOpen: (_prev, next) => next !== CharClass.Whitespace && next !== CharClass.Digit,
  canClose: (prev) => prev !== CharClass.Whitespace
};

const displayMathRule: FlankingRule = {
  canOpen: () => true,
  canClose: () => true
};

export const flankingRules: Readonly<Record<DelimiterMarker, FlankingRule>> = {
  '*': asteriskRule,
  '**': asteriskRule,
  '_': underscoreRule,
  '__': underscoreRule,
  '~': asteriskRule,
  '~~': asteriskRule,
  '++': pairRule,
  '==': pairRule,
  '$': inlineMathRule,
  '$$': displayMathRule
};
