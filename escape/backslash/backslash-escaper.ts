import { CharacterCodes, isDigit } from '../scanner/character-codes.js';
import { createCodepointScanner } from '../scanner/codepoint-scanner.js';
import {
  transformToSink,
  transformToString,
  type EscapeOutput,
  type TextSink,
  type TransformResult,
} from '../output/text-output.js';
import type { BackslashEscapeFormat, BackslashEscapeOptions } from './backslash-format.js';

function hex(value: number, width: number): string {
  return value.toString(16).toUpperCase().padStart(width, '0');
}

/** `\uHHHH`, or a surrogate pair of them above U+FFFF. */
export function uHexaEscape(codepoint: number): string {
  if (codepoint <= CharacterCodes.maxBmpCharacter) return '\\u' + hex(codepoint, 4);
  const offset = codepoint - 0x10000;
  return '\\u' + hex(CharacterCodes.highSurrogateStart + (offset >> 10), 4) +
    '\\u' + hex(CharacterCodes.lowSurrogateStart + (offset & 0x3FF), 4);
}

export function xHexaEscape(codepoint: number): string {
  return '\\x' + hex(codepoint, 2);
}

/**
 * Escapes `text[start, end)` into `output`.
 * Returns whether anything was replaced.
 */
export function escapeBackslashInto(
  text: string,
  start: number,
  end: number,
  format: BackslashEscapeFormat,
  options: BackslashEscapeOptions,
  output: EscapeOutput): boolean {
  const { levels, singleEscapes, slashAfterLessThanBelowLevel, zeroEscapeNeedsNonDigit } = format;
  const { level, useSingleEscapes, useXHexa } = options;
  const scanner = createCodepointScanner();
  scanner.initText(text, start, end - start);

  let readOffset = start;
  let changed = false;

  while (scanner.scan()) {
    const codepoint = scanner.codepoint;
    if (!levels.mustEscape(codepoint, level)) continue;

    // `</` must not appear inside a script block; a lone `/` is harmless
    if (codepoint === CharacterCodes.slash && level < slashAfterLessThanBelowLevel &&
      (scanner.offset === start || text.charCodeAt(scanner.offset - 1) !== CharacterCodes.lessThan))
      continue;

    if (scanner.offset > readOffset) output.addSpan(readOffset, scanner.offset);
    readOffset = scanner.offsetNext;
    changed = true;

    if (useSingleEscapes) {
      const escape = singleEscapes.get(codepoint);
      const blocked = zeroEscapeNeedsNonDigit && codepoint === CharacterCodes.nullCharacter &&
        scanner.offsetNext < end && isDigit(text.charCodeAt(scanner.offsetNext));
      if (escape !== undefined && !blocked) {
        output.addText('\\' + escape);
        continue;
      }
    }

    output.addText(useXHexa && codepoint <= 0xFF ? xHexaEscape(codepoint) : uHexaEscape(codepoint));
  }

  if (end > readOffset) output.addSpan(readOffset, end);
  return changed;
}

export function escapeBackslash(
  text: string,
  format: BackslashEscapeFormat,
  options: BackslashEscapeOptions,
  start = 0,
  end = text.length): TransformResult {
  return transformToString(text, start, end,
    output => escapeBackslashInto(text, start, end, format, options, output));
}

export function escapeBackslashTo(
  text: string,
  start: number,
  end: number,
  format: BackslashEscapeFormat,
  options: BackslashEscapeOptions,
  sink: TextSink): void {
  transformToSink(text, sink,
    output => escapeBackslashInto(text, start, end, format, options, output));
}
