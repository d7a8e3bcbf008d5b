/**
 * Character code constants and classification functions
 * shared by the escapers and unescapers of every format.
 */

export const enum CharacterCodes {
  nullCharacter = 0,
  maxAsciiCharacter = 0x7F,

  backspace = 0x08,             // \b
  tab = 0x09,                   // \t
  lineFeed = 0x0A,              // \n
  verticalTab = 0x0B,           // \v
  formFeed = 0x0C,              // \f
  carriageReturn = 0x0D,        // \r

  space = 0x20,
  doubleQuote = 0x22,           // "
  hash = 0x23,                  // #
  ampersand = 0x26,             // &
  singleQuote = 0x27,           // '
  slash = 0x2F,                 // /

  _0 = 0x30,                    // 0
  _3 = 0x33,                    // 3
  _7 = 0x37,                    // 7
  _9 = 0x39,                    // 9

  semicolon = 0x3B,             // ;
  lessThan = 0x3C,              // <
  greaterThan = 0x3E,           // >

  A = 0x41, F = 0x46, X = 0x58, Z = 0x5A,

  backslash = 0x5C,             // \

  a = 0x61, b = 0x62, f = 0x66, n = 0x6E, r = 0x72, t = 0x74, u = 0x75,
  v = 0x76, x = 0x78, z = 0x7A,

  openBrace = 0x7B,             // {
  closeBrace = 0x7D,            // }

  c1ControlEnd = 0x9F,
  nonBreakingSpace = 0x00A0,

  // UTF-16 surrogate ranges
  highSurrogateStart = 0xD800,
  highSurrogateEnd = 0xDBFF,
  lowSurrogateStart = 0xDC00,
  lowSurrogateEnd = 0xDFFF,

  replacementCharacter = 0xFFFD,
  maxBmpCharacter = 0xFFFF,
  maxCodepoint = 0x10FFFF,
}

/**
 * Check if character is an ASCII letter
 */
export function isLetter(ch: number): boolean {
  return (ch >= CharacterCodes.A && ch <= CharacterCodes.Z) ||
         (ch >= CharacterCodes.a && ch <= CharacterCodes.z);
}

/**
 * Check if character is an ASCII digit
 */
export function isDigit(ch: number): boolean {
  return ch >= CharacterCodes._0 && ch <= CharacterCodes._9;
}

export function isOctalDigit(ch: number): boolean {
  return ch >= CharacterCodes._0 && ch <= CharacterCodes._7;
}

/**
 * Check if character is a hexadecimal digit
 */
export function isHexDigit(ch: number): boolean {
  return isDigit(ch) ||
         (ch >= CharacterCodes.A && ch <= CharacterCodes.F) ||
         (ch >= CharacterCodes.a && ch <= CharacterCodes.f);
}

/**
 * Check if character is an alphanumeric character
 */
export function isAlphaNumeric(ch: number): boolean {
  return isLetter(ch) || isDigit(ch);
}

/** Value of a hex digit, or -1. */
export function hexDigitValue(ch: number): number {
  if (isDigit(ch)) return ch - CharacterCodes._0;
  if (ch >= CharacterCodes.A && ch <= CharacterCodes.F) return ch - CharacterCodes.A + 10;
  if (ch >= CharacterCodes.a && ch <= CharacterCodes.f) return ch - CharacterCodes.a + 10;
  return -1;
}

export function isHighSurrogate(ch: number): boolean {
  return ch >= CharacterCodes.highSurrogateStart && ch <= CharacterCodes.highSurrogateEnd;
}

export function isLowSurrogate(ch: number): boolean {
  return ch >= CharacterCodes.lowSurrogateStart && ch <= CharacterCodes.lowSurrogateEnd;
}

export function isSurrogate(ch: number): boolean {
  return ch >= CharacterCodes.highSurrogateStart && ch <= CharacterCodes.lowSurrogateEnd;
}

export function combineSurrogates(high: number, low: number): number {
  return ((high - CharacterCodes.highSurrogateStart) << 10) +
    (low - CharacterCodes.lowSurrogateStart) + 0x10000;
}
