import { checkBounds, checkEnumArgument, checkSink } from '../arguments.js';
import { escapeBackslash, escapeBackslashTo } from '../backslash/backslash-escaper.js';
import {
  createBackslashEscapeLevels,
  invertSingleEscapes,
  type BackslashEscapeFormat,
  type BackslashEscapeOptions,
  type BackslashUnescapeFormat,
} from '../backslash/backslash-format.js';
import { unescapeBackslash, unescapeBackslashTo } from '../backslash/backslash-unescaper.js';
import type { TextSink } from '../output/text-output.js';
import { CharacterCodes } from '../scanner/character-codes.js';

export enum JavaScriptEscapeType {
  /** Single escape characters, then `\xHH` up to 0xFF, then `\uHHHH`. */
  SingleEscapeCharsDefaultToXHexaAndUHexa = 0,
  SingleEscapeCharsDefaultToUHexa = 1,
  XHexaDefaultToUHexa = 2,
  UHexa = 3,
}

export enum JavaScriptEscapeLevel {
  /** Single escape characters, `&`, C0 and C1 controls. */
  BasicEscapeSet = 1,
  AllNonAsciiPlusBasicEscapeSet = 2,
  AllNonAlphanumeric = 3,
  AllCharacters = 4,
}

const javaScriptSingleEscapes: ReadonlyMap<number, string> = new Map<number, string>([
  [CharacterCodes.nullCharacter, '0'],
  [CharacterCodes.backspace, 'b'],
  [CharacterCodes.tab, 't'],
  [CharacterCodes.lineFeed, 'n'],
  [CharacterCodes.formFeed, 'f'],
  [CharacterCodes.carriageReturn, 'r'],
  [CharacterCodes.doubleQuote, '"'],
  [CharacterCodes.singleQuote, '\''],
  [CharacterCodes.backslash, '\\'],
  [CharacterCodes.slash, '/'],
]);

export const javaScriptEscapeFormat: BackslashEscapeFormat = {
  levels: createBackslashEscapeLevels([
    CharacterCodes.doubleQuote,
    CharacterCodes.singleQuote,
    CharacterCodes.backslash,
    CharacterCodes.slash,
    CharacterCodes.ampersand,
  ]),
  singleEscapes: javaScriptSingleEscapes,
  slashAfterLessThanBelowLevel: JavaScriptEscapeLevel.AllNonAlphanumeric,
  zeroEscapeNeedsNonDigit: true,
};

// `\0` is read through the octal branch
const javaScriptUnescapes = invertSingleEscapes(javaScriptSingleEscapes);
javaScriptUnescapes.delete(CharacterCodes._0);
javaScriptUnescapes.set(CharacterCodes.v, CharacterCodes.verticalTab);

export const javaScriptUnescapeFormat: BackslashUnescapeFormat = {
  singleEscapes: javaScriptUnescapes,
  octal: true,
  xHexa: true,
  uHexa: true,
  uHexaBraces: true,
  lineContinuation: true,
  unknownEscape: 'dropBackslash',
};

function escapeOptions(type: JavaScriptEscapeType, level: JavaScriptEscapeLevel): BackslashEscapeOptions {
  return {
    level,
    useSingleEscapes: type === JavaScriptEscapeType.SingleEscapeCharsDefaultToXHexaAndUHexa ||
      type === JavaScriptEscapeType.SingleEscapeCharsDefaultToUHexa,
    useXHexa: type === JavaScriptEscapeType.SingleEscapeCharsDefaultToXHexaAndUHexa ||
      type === JavaScriptEscapeType.XHexaDefaultToUHexa,
  };
}

/**
 * Escapes `text` for a JavaScript string literal, quoted either way.
 */
export function escapeJavaScript(text: string, type: JavaScriptEscapeType, level: JavaScriptEscapeLevel): string;
export function escapeJavaScript(text: string | null | undefined, type: JavaScriptEscapeType, level: JavaScriptEscapeLevel): string | null | undefined;
export function escapeJavaScript(text: string | null | undefined, type: JavaScriptEscapeType, level: JavaScriptEscapeLevel): string | null | undefined {
  checkEnumArgument('escapeJavaScript', 'type', type, JavaScriptEscapeType);
  checkEnumArgument('escapeJavaScript', 'level', level, JavaScriptEscapeLevel);
  if (text === null || text === undefined) return text;
  return escapeBackslash(text, javaScriptEscapeFormat, escapeOptions(type, level)).text;
}

export function escapeJavaScriptMinimal(text: string): string;
export function escapeJavaScriptMinimal(text: string | null | undefined): string | null | undefined;
export function escapeJavaScriptMinimal(text: string | null | undefined): string | null | undefined {
  return escapeJavaScript(text, JavaScriptEscapeType.SingleEscapeCharsDefaultToXHexaAndUHexa,
    JavaScriptEscapeLevel.BasicEscapeSet);
}

export function escapeJavaScriptDefault(text: string): string;
export function escapeJavaScriptDefault(text: string | null | undefined): string | null | undefined;
export function escapeJavaScriptDefault(text: string | null | undefined): string | null | undefined {
  return escapeJavaScript(text, JavaScriptEscapeType.SingleEscapeCharsDefaultToXHexaAndUHexa,
    JavaScriptEscapeLevel.AllNonAsciiPlusBasicEscapeSet);
}

export function escapeJavaScriptTo(
  text: string | null | undefined,
  offset: number,
  length: number,
  sink: TextSink,
  type: JavaScriptEscapeType,
  level: JavaScriptEscapeLevel): void {
  checkSink('escapeJavaScriptTo', sink);
  checkEnumArgument('escapeJavaScriptTo', 'type', type, JavaScriptEscapeType);
  checkEnumArgument('escapeJavaScriptTo', 'level', level, JavaScriptEscapeLevel);
  if (text === null || text === undefined) return;
  checkBounds('escapeJavaScriptTo', text.length, offset, length);
  escapeBackslashTo(text, offset, offset + length, javaScriptEscapeFormat, escapeOptions(type, level), sink);
}

/**
 * Resolves every escape a string literal may hold: single escape
 * characters, `\v`, octal, `\xHH`, `\uHHHH`, `\u{...}` and line
 * continuations. An unknown escape stands for the escaped character.
 */
export function unescapeJavaScript(text: string): string;
export function unescapeJavaScript(text: string | null | undefined): string | null | undefined;
export function unescapeJavaScript(text: string | null | undefined): string | null | undefined {
  if (text === null || text === undefined) return text;
  if (text.indexOf('\\') < 0) return text;
  return unescapeBackslash(text, javaScriptUnescapeFormat).text;
}

export function unescapeJavaScriptTo(
  text: string | null | undefined,
  offset: number,
  length: number,
  sink: TextSink): void {
  checkSink('unescapeJavaScriptTo', sink);
  if (text === null || text === undefined) return;
  checkBounds('unescapeJavaScriptTo', text.length, offset, length);
  unescapeBackslashTo(text, offset, offset + length, javaScriptUnescapeFormat, sink);
}
