import { checkBounds, checkEnumArgument, checkSink } from '../arguments.js';
import { escapeBackslash, escapeBackslashTo } from '../backslash/backslash-escaper.js';
import {
  createBackslashEscapeLevels,
  invertSingleEscapes,
  type BackslashEscapeFormat,
  type BackslashEscapeOptions,
  type BackslashUnescapeFormat,
} from '../backslash/backslash-format.js';
import { readHexDigits, unescapeBackslash, unescapeBackslashTo } from '../backslash/backslash-unescaper.js';
import { transformToString, type EscapeOutput, type TextSink, type TransformResult } from '../output/text-output.js';
import { CharacterCodes } from '../scanner/character-codes.js';

export enum JavaEscapeLevel {
  /** Single escape characters except `\'`, C0 and C1 controls. */
  BasicEscapeSet = 1,
  AllNonAsciiPlusBasicEscapeSet = 2,
  /** Also brings in `\'`. */
  AllNonAlphanumeric = 3,
  AllCharacters = 4,
}

const javaSingleEscapes: ReadonlyMap<number, string> = new Map<number, string>([
  [CharacterCodes.backspace, 'b'],
  [CharacterCodes.tab, 't'],
  [CharacterCodes.lineFeed, 'n'],
  [CharacterCodes.formFeed, 'f'],
  [CharacterCodes.carriageReturn, 'r'],
  [CharacterCodes.doubleQuote, '"'],
  [CharacterCodes.singleQuote, '\''],
  [CharacterCodes.backslash, '\\'],
]);

// `'` only matters in character literals, so it keeps the default level 3
export const javaEscapeFormat: BackslashEscapeFormat = {
  levels: createBackslashEscapeLevels([CharacterCodes.doubleQuote, CharacterCodes.backslash]),
  singleEscapes: javaSingleEscapes,
  slashAfterLessThanBelowLevel: 0,
  zeroEscapeNeedsNonDigit: false,
};

/** Second pass, after unicode escapes are gone. */
export const javaUnescapeFormat: BackslashUnescapeFormat = {
  singleEscapes: invertSingleEscapes(javaSingleEscapes),
  octal: true,
  xHexa: false,
  uHexa: false,
  uHexaBraces: false,
  lineContinuation: false,
  unknownEscape: 'keep',
};

const escapeOptions = (level: JavaEscapeLevel): BackslashEscapeOptions =>
  ({ level, useSingleEscapes: true, useXHexa: false });

/**
 * Replaces `\uHHHH` (with any number of `u`s) in `text[start, end)`. A
 * backslash that is itself escaped does not start a unicode escape, so
 * `\\u0041` is left alone.
 */
export function unescapeUnicodeEscapesInto(text: string, start: number, end: number, output: EscapeOutput): boolean {
  let readOffset = start;
  let changed = false;

  for (let i = start; i < end; i++) {
    if (text.charCodeAt(i) !== CharacterCodes.backslash || i + 1 >= end) continue;

    if (text.charCodeAt(i + 1) !== CharacterCodes.u) {
      // The escaped character is never the start of another escape
      i++;
      continue;
    }

    let f = i + 1;
    while (f < end && text.charCodeAt(f) === CharacterCodes.u) f++;
    const value = readHexDigits(text, f, end, 4);
    if (value < 0) {
      i = f - 1;
      continue;
    }

    if (i > readOffset) output.addSpan(readOffset, i);
    output.addText(String.fromCharCode(value));
    readOffset = f + 4;
    i = f + 3;
    changed = true;
  }

  if (end > readOffset) output.addSpan(readOffset, end);
  return changed;
}

function unescapeUnicodeEscapes(text: string, start: number, end: number): TransformResult {
  return transformToString(text, start, end,
    output => unescapeUnicodeEscapesInto(text, start, end, output));
}

/**
 * Escapes `text` for a Java string or character literal. Characters without
 * a single escape character become `\uHHHH`, never octal.
 */
export function escapeJava(text: string, level: JavaEscapeLevel): string;
export function escapeJava(text: string | null | undefined, level: JavaEscapeLevel): string | null | undefined;
export function escapeJava(text: string | null | undefined, level: JavaEscapeLevel): string | null | undefined {
  checkEnumArgument('escapeJava', 'level', level, JavaEscapeLevel);
  if (text === null || text === undefined) return text;
  return escapeBackslash(text, javaEscapeFormat, escapeOptions(level)).text;
}

export function escapeJavaMinimal(text: string): string;
export function escapeJavaMinimal(text: string | null | undefined): string | null | undefined;
export function escapeJavaMinimal(text: string | null | undefined): string | null | undefined {
  return escapeJava(text, JavaEscapeLevel.BasicEscapeSet);
}

export function escapeJavaDefault(text: string): string;
export function escapeJavaDefault(text: string | null | undefined): string | null | undefined;
export function escapeJavaDefault(text: string | null | undefined): string | null | undefined {
  return escapeJava(text, JavaEscapeLevel.AllNonAsciiPlusBasicEscapeSet);
}

export function escapeJavaTo(
  text: string | null | undefined,
  offset: number,
  length: number,
  sink: TextSink,
  level: JavaEscapeLevel): void {
  checkSink('escapeJavaTo', sink);
  checkEnumArgument('escapeJavaTo', 'level', level, JavaEscapeLevel);
  if (text === null || text === undefined) return;
  checkBounds('escapeJavaTo', text.length, offset, length);
  escapeBackslashTo(text, offset, offset + length, javaEscapeFormat, escapeOptions(level), sink);
}

/**
 * Unescapes a Java literal the way the compiler reads it: unicode escapes
 * first, then single escape characters and octal escapes.
 */
export function unescapeJava(text: string): string;
export function unescapeJava(text: string | null | undefined): string | null | undefined;
export function unescapeJava(text: string | null | undefined): string | null | undefined {
  if (text === null || text === undefined) return text;
  if (text.indexOf('\\') < 0) return text;

  const unicode = unescapeUnicodeEscapes(text, 0, text.length);
  const result = unescapeBackslash(unicode.text, javaUnescapeFormat);
  return unicode.changed || result.changed ? result.text : text;
}

export function unescapeJavaTo(
  text: string | null | undefined,
  offset: number,
  length: number,
  sink: TextSink): void {
  checkSink('unescapeJavaTo', sink);
  if (text === null || text === undefined) return;
  checkBounds('unescapeJavaTo', text.length, offset, length);

  const unicode = unescapeUnicodeEscapes(text, offset, offset + length);
  unescapeBackslashTo(unicode.text, 0, unicode.text.length, javaUnescapeFormat, sink);
}
