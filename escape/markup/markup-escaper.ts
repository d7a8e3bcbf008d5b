import { createCodepointScanner } from '../scanner/codepoint-scanner.js';
import {
  transformToSink,
  transformToString,
  type EscapeOutput,
  type TextSink,
  type TransformResult,
} from '../output/text-output.js';
import type { MarkupEscapeFormat, MarkupEscapeOptions } from './markup-format.js';

/**
 * Escapes `text[start, end)` into `output`.
 * Returns whether anything was replaced or dropped.
 */
export function escapeMarkupInto(
  text: string,
  start: number,
  end: number,
  format: MarkupEscapeFormat,
  options: MarkupEscapeOptions,
  output: EscapeOutput): boolean {
  const { table, levels, isValidCodepoint } = format;
  const { level, useNamedReferences, useHexadecimal } = options;
  const scanner = createCodepointScanner();
  scanner.initText(text, start, end - start);

  let readOffset = start;
  let changed = false;

  while (scanner.scan()) {
    const codepoint = scanner.codepoint;
    const valid = !isValidCodepoint || isValidCodepoint(codepoint);
    if (valid && !levels.mustEscape(codepoint, level)) continue;

    if (scanner.offset > readOffset) output.addSpan(readOffset, scanner.offset);
    readOffset = scanner.offsetNext;
    changed = true;

    if (!valid) continue;

    if (useNamedReferences) {
      const nameIndex = table.nameIndexOf(codepoint);
      if (nameIndex >= 0) {
        output.addText(table.sortedNames[nameIndex]);
        continue;
      }
    }

    output.addText(numericReference(codepoint, useHexadecimal, table.marker, table.terminator));
  }

  if (end > readOffset) output.addSpan(readOffset, end);
  return changed;
}

export function escapeMarkup(
  text: string,
  format: MarkupEscapeFormat,
  options: MarkupEscapeOptions,
  start = 0,
  end = text.length): TransformResult {
  return transformToString(text, start, end,
    output => escapeMarkupInto(text, start, end, format, options, output));
}

export function escapeMarkupTo(
  text: string,
  start: number,
  end: number,
  format: MarkupEscapeFormat,
  options: MarkupEscapeOptions,
  sink: TextSink): void {
  transformToSink(text, sink,
    output => escapeMarkupInto(text, start, end, format, options, output));
}

/** `&#DD;` or `&#xhh;` (lowercase hex digits). */
export function numericReference(codepoint: number, hexadecimal: boolean, marker = '&', terminator = ';'): string {
  return hexadecimal ?
    marker + '#x' + codepoint.toString(16) + terminator :
    marker + '#' + codepoint + terminator;
}
