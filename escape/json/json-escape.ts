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

export enum JsonEscapeType {
  /** `\n`, `\"` and friends where they exist, `\uHHHH` otherwise. */
  SingleEscapeCharsDefaultToUHexa = 0,
  UHexa = 1,
}

export enum JsonEscapeLevel {
  /** Single escape characters, `&`, C0 and C1 controls. */
  BasicEscapeSet = 1,
  AllNonAsciiPlusBasicEscapeSet = 2,
  AllNonAlphanumeric = 3,
  AllCharacters = 4,
}

const jsonSingleEscapes: ReadonlyMap<number, string> = new Map<number, string>([
  [CharacterCodes.backspace, 'b'],
  [CharacterCodes.tab, 't'],
  [CharacterCodes.lineFeed, 'n'],
  [CharacterCodes.formFeed, 'f'],
  [CharacterCodes.carriageReturn, 'r'],
  [CharacterCodes.doubleQuote, '"'],
  [CharacterCodes.backslash, '\\'],
  [CharacterCodes.slash, '/'],
]);

export const jsonEscapeFormat: BackslashEscapeFormat = {
  levels: createBackslashEscapeLevels([
    CharacterCodes.doubleQuote,
    CharacterCodes.backslash,
    CharacterCodes.slash,
    CharacterCodes.ampersand,
  ]),
  singleEscapes: jsonSingleEscapes,
  slashAfterLessThanBelowLevel: JsonEscapeLevel.AllNonAlphanumeric,
  zeroEscapeNeedsNonDigit: false,
};

export const jsonUnescapeFormat: BackslashUnescapeFormat = {
  singleEscapes: invertSingleEscapes(jsonSingleEscapes),
  octal: false,
  xHexa: false,
  uHexa: true,
  uHexaBraces: false,
  lineContinuation: false,
  unknownEscape: 'keep',
};

function escapeOptions(type: JsonEscapeType, level: JsonEscapeLevel): BackslashEscapeOptions {
  return { level, useSingleEscapes: type === JsonEscapeType.SingleEscapeCharsDefaultToUHexa, useXHexa: false };
}

/**
 * Escapes `text` for a JSON string literal. Returns `text` itself when
 * nothing needed escaping.
 */
export function escapeJson(text: string, type: JsonEscapeType, level: JsonEscapeLevel): string;
export function escapeJson(text: string | null | undefined, type: JsonEscapeType, level: JsonEscapeLevel): string | null | undefined;
export function escapeJson(text: string | null | undefined, type: JsonEscapeType, level: JsonEscapeLevel): string | null | undefined {
  checkEnumArgument('escapeJson', 'type', type, JsonEscapeType);
  checkEnumArgument('escapeJson', 'level', level, JsonEscapeLevel);
  if (text === null || text === undefined) return text;
  return escapeBackslash(text, jsonEscapeFormat, escapeOptions(type, level)).text;
}

export function escapeJsonMinimal(text: string): string;
export function escapeJsonMinimal(text: string | null | undefined): string | null | undefined;
export function escapeJsonMinimal(text: string | null | undefined): string | null | undefined {
  return escapeJson(text, JsonEscapeType.SingleEscapeCharsDefaultToUHexa, JsonEscapeLevel.BasicEscapeSet);
}

/** Basic escape set plus all non-ASCII. */
export function escapeJsonDefault(text: string): string;
export function escapeJsonDefault(text: string | null | undefined): string | null | undefined;
export function escapeJsonDefault(text: string | null | undefined): string | null | undefined {
  return escapeJson(text, JsonEscapeType.SingleEscapeCharsDefaultToUHexa, JsonEscapeLevel.AllNonAsciiPlusBasicEscapeSet);
}

export function escapeJsonTo(
  text: string | null | undefined,
  offset: number,
  length: number,
  sink: TextSink,
  type: JsonEscapeType,
  level: JsonEscapeLevel): void {
  checkSink('escapeJsonTo', sink);
  checkEnumArgument('escapeJsonTo', 'type', type, JsonEscapeType);
  checkEnumArgument('escapeJsonTo', 'level', level, JsonEscapeLevel);
  if (text === null || text === undefined) return;
  checkBounds('escapeJsonTo', text.length, offset, length);
  escapeBackslashTo(text, offset, offset + length, jsonEscapeFormat, escapeOptions(type, level), sink);
}

/**
 * Resolves single escape characters and `\uHHHH`. Anything else after a
 * backslash is kept as it is.
 */
export function unescapeJson(text: string): string;
export function unescapeJson(text: string | null | undefined): string | null | undefined;
export function unescapeJson(text: string | null | undefined): string | null | undefined {
  if (text === null || text === undefined) return text;
  if (text.indexOf('\\') < 0) return text;
  return unescapeBackslash(text, jsonUnescapeFormat).text;
}

export function unescapeJsonTo(
  text: string | null | undefined,
  offset: number,
  length: number,
  sink: TextSink): void {
  checkSink('unescapeJsonTo', sink);
  if (text === null || text === undefined) return;
  checkBounds('unescapeJsonTo', text.length, offset, length);
  unescapeBackslashTo(text, offset, offset + length, jsonUnescapeFormat, sink);
}
