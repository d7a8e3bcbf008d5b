import {
  CharacterCodes,
  hexDigitValue,
  isOctalDigit,
} from '../scanner/character-codes.js';
import { codepointAt, codepointWidth } from '../scanner/codepoint-scanner.js';
import {
  transformToSink,
  transformToString,
  type EscapeOutput,
  type TextSink,
  type TransformResult,
} from '../output/text-output.js';
import type { BackslashUnescapeFormat } from './backslash-format.js';

export interface ResolvedEscape {
  /** Text the escape stands for, possibly empty. */
  value: string;
  /** Offset right after the consumed escape. */
  next: number;
}

/** Value of exactly `count` hex digits at `pos`, or -1. */
export function readHexDigits(text: string, pos: number, end: number, count: number): number {
  if (pos + count > end) return -1;
  let value = 0;
  for (let i = pos; i < pos + count; i++) {
    const digit = hexDigitValue(text.charCodeAt(i));
    if (digit < 0) return -1;
    value = value * 16 + digit;
  }
  return value;
}

function resolveOctal(text: string, pos: number, end: number): ResolvedEscape {
  // \0..\377: a leading 0-3 allows three digits, 4-7 only two
  const maxDigits = text.charCodeAt(pos) <= CharacterCodes._3 ? 3 : 2;
  let value = 0;
  let f = pos;
  while (f < end && f - pos < maxDigits && isOctalDigit(text.charCodeAt(f))) {
    value = value * 8 + (text.charCodeAt(f) - CharacterCodes._0);
    f++;
  }
  return { value: String.fromCharCode(value), next: f };
}

function resolveBracedHexa(text: string, pos: number, end: number): ResolvedEscape | null {
  // pos is at '{'
  let value = 0;
  let f = pos + 1;
  while (f < end) {
    const digit = hexDigitValue(text.charCodeAt(f));
    if (digit < 0) break;
    value = value * 16 + digit;
    if (value > CharacterCodes.maxCodepoint) return null;
    f++;
  }
  if (f === pos + 1 || f >= end || text.charCodeAt(f) !== CharacterCodes.closeBrace) return null;
  return { value: String.fromCodePoint(value), next: f + 1 };
}

function lineTerminatorLength(text: string, pos: number, end: number): number {
  const ch = text.charCodeAt(pos);
  if (ch === CharacterCodes.carriageReturn)
    return pos + 1 < end && text.charCodeAt(pos + 1) === CharacterCodes.lineFeed ? 2 : 1;
  return ch === CharacterCodes.lineFeed || ch === 0x2028 || ch === 0x2029 ? 1 : 0;
}

/**
 * Reads the escape whose backslash sits at `pos`.
 * Returns null when the format does not know it.
 */
export function resolveEscape(
  text: string,
  pos: number,
  end: number,
  format: BackslashUnescapeFormat): ResolvedEscape | null {
  const escaped = pos + 1;
  const ch = text.charCodeAt(escaped);

  if (format.octal && isOctalDigit(ch))
    return resolveOctal(text, escaped, end);

  const single = format.singleEscapes.get(ch);
  if (single !== undefined)
    return { value: String.fromCharCode(single), next: escaped + 1 };

  if (format.xHexa && ch === CharacterCodes.x) {
    const value = readHexDigits(text, escaped + 1, end, 2);
    return value < 0 ? null : { value: String.fromCharCode(value), next: escaped + 3 };
  }

  if (format.uHexa && ch === CharacterCodes.u) {
    if (format.uHexaBraces && escaped + 1 < end && text.charCodeAt(escaped + 1) === CharacterCodes.openBrace)
      return resolveBracedHexa(text, escaped + 1, end);
    const value = readHexDigits(text, escaped + 1, end, 4);
    return value < 0 ? null : { value: String.fromCharCode(value), next: escaped + 5 };
  }

  if (format.lineContinuation) {
    const length = lineTerminatorLength(text, escaped, end);
    if (length) return { value: '', next: escaped + length };
  }

  return null;
}

/**
 * Unescapes `text[start, end)` into `output`.
 * Returns whether anything was replaced.
 */
export function unescapeBackslashInto(
  text: string,
  start: number,
  end: number,
  format: BackslashUnescapeFormat,
  output: EscapeOutput): boolean {
  let readOffset = start;
  let changed = false;

  for (let i = start; i < end; i++) {
    if (text.charCodeAt(i) !== CharacterCodes.backslash || i + 1 >= end) continue;

    let resolved = resolveEscape(text, i, end, format);
    if (!resolved) {
      if (format.unknownEscape === 'keep') {
        // Skip the escaped character too, so `\\` pairs stay paired
        i++;
        continue;
      }
      const codepoint = codepointAt(text, i + 1, end);
      resolved = { value: String.fromCodePoint(codepoint), next: i + 1 + codepointWidth(codepoint) };
    }

    if (i > readOffset) output.addSpan(readOffset, i);
    output.addText(resolved.value);
    readOffset = resolved.next;
    i = resolved.next - 1;
    changed = true;
  }

  if (end > readOffset) output.addSpan(readOffset, end);
  return changed;
}

export function unescapeBackslash(
  text: string,
  format: BackslashUnescapeFormat,
  start = 0,
  end = text.length): TransformResult {
  return transformToString(text, start, end,
    output => unescapeBackslashInto(text, start, end, format, output));
}

export function unescapeBackslashTo(
  text: string,
  start: number,
  end: number,
  format: BackslashUnescapeFormat,
  sink: TextSink): void {
  transformToSink(text, sink,
    output => unescapeBackslashInto(text, start, end, format, output));
}
