/**
 * Character code constants and classification functions
 * Following TypeScript's character code pattern for consistent character handling
 */

export const enum CharacterCodes {
  lineFeed = 0x0A,              // \n
  carriageReturn = 0x0D,        // \r
  lineSeparator = 0x2028,
  paragraphSeparator = 0x2029,
  nextLine = 0x0085,

  // Control characters
  tab = 0x09,
  verticalTab = 0x0B,
  formFeed = 0x0C,

  // ASCII printable characters
  space = 0x20,
  exclamation = 0x21,           // !
  hash = 0x23,                  // #
  dollar = 0x24,                // $
  openParen = 0x28,             // (
  closeParen = 0x29,            // )
  asterisk = 0x2A,              // *
  plus = 0x2B,                  // +
  minus = 0x2D,                 // -
  dot = 0x2E,                   // .

  digit0 = 0x30,                // 0
  digit9 = 0x39,                // 9

  colon = 0x3A,                 // :
  equals = 0x3D,                // =
  greaterThan = 0x3E,           // >

  A = 0x41,
  Z = 0x5A,

  openBracket = 0x5B,           // [
  backslash = 0x5C,             // \
  closeBracket = 0x5D,          // ]
  caret = 0x5E,                 // ^
  underscore = 0x5F,            // _
  backtick = 0x60,              // `

  a = 0x61,
  z = 0x7A,

  bar = 0x7C,                   // |
  tilde = 0x7E,                 // ~

  // Unicode categories
  nonBreakingSpace = 0x00A0,
  enQuad = 0x2000,
  zeroWidthSpace = 0x200B,
  narrowNoBreakSpace = 0x202F,
  ideographicSpace = 0x3000,
  mathematicalSpace = 0x205F,
  ogham = 0x1680,
}

/**
 * Check if character is a line break
 */
export function isLineBreak(ch: number): boolean {
  return ch === CharacterCodes.lineFeed ||
         ch === CharacterCodes.carriageReturn ||
         ch === CharacterCodes.lineSeparator ||
         ch === CharacterCodes.paragraphSeparator ||
         ch === CharacterCodes.nextLine;
}

/**
 * Check if character is whitespace (excluding line breaks)
 */
export function isWhiteSpaceSingleLine(ch: number): boolean {
  return ch === CharacterCodes.space ||
         ch === CharacterCodes.tab ||
         ch === CharacterCodes.verticalTab ||
         ch === CharacterCodes.formFeed ||
         ch === CharacterCodes.nonBreakingSpace ||
         ch === CharacterCodes.ogham ||
         ch === CharacterCodes.narrowNoBreakSpace ||
         ch === CharacterCodes.mathematicalSpace ||
         ch === CharacterCodes.ideographicSpace ||
         (ch >= CharacterCodes.enQuad && ch <= CharacterCodes.zeroWidthSpace);
}

/**
 * Check if character is any whitespace (including line breaks)
 */
export function isWhiteSpace(ch: number): boolean {
  return isWhiteSpaceSingleLine(ch) || isLineBreak(ch);
}

/**
 * Whitespace as trimmed off fragment edges: tab, line feed, vertical tab,
 * form feed, carriage return and space
 */
export function isAsciiWhiteSpace(ch: number): boolean {
  return ch === CharacterCodes.space ||
         (ch >= CharacterCodes.tab && ch <= CharacterCodes.carriageReturn);
}

/**
 * Check if character is an ASCII digit
 */
export function isDigit(ch: number): boolean {
  return ch >= CharacterCodes.digit0 && ch <= CharacterCodes.digit9;
}

/**
 * Check if character is ASCII punctuation that can be escaped in Markdown
 */
export function isMarkdownPunctuation(ch: number): boolean {
  return (ch >= 0x21 && ch <= 0x2F) ||
         (ch >= 0x3A && ch <= 0x40) ||
         (ch >= 0x5B && ch <= 0x60) ||
         (ch >= 0x7B && ch <= 0x7E);
}

/**
 * Punctuation for flanking purposes: ASCII punctuation plus the common
 * general punctuation block
 */
export function isPunctuation(ch: number): boolean {
  return isMarkdownPunctuation(ch) || isUnicodePunctuation(ch);
}

function isUnicodePunctuation(ch: number): boolean {
  return (ch >= 0x2010 && ch <= 0x2027) ||
         (ch >= 0x2030 && ch <= 0x205E) ||
         (ch >= 0x3001 && ch <= 0x3003) ||
         (ch >= 0x3008 && ch <= 0x3011) ||
         ch === 0x00A1 || ch === 0x00A7 || ch === 0x00AB || ch === 0x00B6 ||
         ch === 0x00B7 || ch === 0x00BB || ch === 0x00BF;
}

/**
 * Characters allowed inside an emoji shortcode name
 */
export function isShortcodeCharacter(ch: number): boolean {
  return isDigit(ch) ||
         (ch >= CharacterCodes.A && ch <= CharacterCodes.Z) ||
         (ch >= CharacterCodes.a && ch <= CharacterCodes.z) ||
         ch === CharacterCodes.underscore ||
         ch === CharacterCodes.plus ||
         ch === CharacterCodes.minus;
}
