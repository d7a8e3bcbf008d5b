import {
  CharacterCodes,
  hexDigitValue,
  isAlphaNumeric,
  isDigit,
} from '../scanner/character-codes.js';
import {
  transformToSink,
  transformToString,
  type EscapeOutput,
  type TextSink,
  type TransformResult,
} from '../output/text-output.js';
import {
  isExactMatch,
  isPartialMatch,
  partialMatchIndex,
  searchReference,
} from '../references/reference-search.js';
import type { MarkupUnescapeFormat } from './markup-format.js';

/** Stand-in value for numeric references too large to be a codepoint. */
export const NUMERIC_OVERFLOW = CharacterCodes.maxCodepoint + 1;

export interface ResolvedReference {
  /** Text the reference stands for. */
  value: string;
  /** Offset right after the consumed reference. */
  next: number;
}

/**
 * Tries to read a reference whose marker sits at `pos`.
 * Returns null when the text there is not a reference.
 */
export function resolveReference(
  text: string,
  pos: number,
  end: number,
  format: MarkupUnescapeFormat): ResolvedReference | null {
  if (pos + 1 >= end) return null;

  const next = text.charCodeAt(pos + 1);
  if (format.isReferenceBreak?.(next)) return null;

  if (next === CharacterCodes.hash)
    return resolveNumericReference(text, pos, end, format);

  return resolveNamedReference(text, pos, end, format);
}

function resolveNumericReference(
  text: string,
  pos: number,
  end: number,
  format: MarkupUnescapeFormat): ResolvedReference | null {
  if (pos + 2 >= end) return null;

  const terminator = format.table.terminator.charCodeAt(0);
  const radixChar = text.charCodeAt(pos + 2);
  const hexadecimal = radixChar === CharacterCodes.x ||
    (format.acceptUppercaseHexMarker && radixChar === CharacterCodes.X);
  const digitsStart = hexadecimal ? pos + 3 : pos + 2;

  let value = 0;
  let f = digitsStart;
  while (f < end) {
    const ch = text.charCodeAt(f);
    const digit = hexadecimal ? hexDigitValue(ch) : isDigit(ch) ? ch - CharacterCodes._0 : -1;
    if (digit < 0) break;
    // Saturate; the whole digit run is still consumed
    if (value < NUMERIC_OVERFLOW) {
      value = value * (hexadecimal ? 16 : 10) + digit;
      if (value > NUMERIC_OVERFLOW) value = NUMERIC_OVERFLOW;
    }
    f++;
  }

  if (f === digitsStart) return null;

  if (f < end && text.charCodeAt(f) === terminator) f++;
  else if (format.requireNumericTerminator) return null;

  const codepoint = format.translateNumeric(value);
  if (codepoint < 0) return null;

  return { value: String.fromCodePoint(codepoint), next: f };
}

function resolveNamedReference(
  text: string,
  pos: number,
  end: number,
  format: MarkupUnescapeFormat): ResolvedReference | null {
  const { table } = format;

  let f = pos + 1;
  while (f < end && isAlphaNumeric(text.charCodeAt(f))) f++;
  if (f === pos + 1) return null;

  if (f < end && text.charCodeAt(f) === table.terminator.charCodeAt(0)) f++;

  const result = searchReference(table.sortedNames, text, pos, f, table.shortestNameLength);
  if (isExactMatch(result))
    return { value: table.textAt(result), next: f };

  if (format.allowPartialNames && isPartialMatch(result)) {
    const index = partialMatchIndex(result);
    return { value: table.textAt(index), next: pos + table.sortedNames[index].length };
  }

  return null;
}

/**
 * Unescapes `text[start, end)` into `output`, leaving anything that is not a
 * well-formed reference as it is. Returns whether anything was replaced.
 */
export function unescapeMarkupInto(
  text: string,
  start: number,
  end: number,
  format: MarkupUnescapeFormat,
  output: EscapeOutput): boolean {
  const marker = format.table.marker.charCodeAt(0);
  let readOffset = start;
  let changed = false;

  for (let i = start; i < end; i++) {
    if (text.charCodeAt(i) !== marker) continue;

    const resolved = resolveReference(text, i, end, format);
    if (!resolved) continue;

    if (i > readOffset) output.addSpan(readOffset, i);
    output.addText(resolved.value);
    readOffset = resolved.next;
    i = resolved.next - 1;
    changed = true;
  }

  if (end > readOffset) output.addSpan(readOffset, end);
  return changed;
}

export function unescapeMarkup(
  text: string,
  format: MarkupUnescapeFormat,
  start = 0,
  end = text.length): TransformResult {
  return transformToString(text, start, end,
    output => unescapeMarkupInto(text, start, end, format, output));
}

export function unescapeMarkupTo(
  text: string,
  start: number,
  end: number,
  format: MarkupUnescapeFormat,
  sink: TextSink): void {
  transformToSink(text, sink,
    output => unescapeMarkupInto(text, start, end, format, output));
}
