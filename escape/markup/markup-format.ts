import type { EscapeLevelPolicy } from '../levels/escape-levels.js';
import type { ReferenceTable } from '../references/reference-table.js';

/** What the markup escaper needs to know about a format. */
export interface MarkupEscapeFormat {
  readonly table: ReferenceTable;
  readonly levels: EscapeLevelPolicy;
  /**
   * Codepoints the format cannot carry at all. These are dropped from the
   * escaped output, neither copied nor turned into references.
   */
  isValidCodepoint?(codepoint: number): boolean;
}

export interface MarkupEscapeOptions {
  /** Escape every codepoint whose level is at most this. */
  level: number;
  /** Prefer `&name;` where the table has a name for the codepoint. */
  useNamedReferences: boolean;
  /** Numeric references as `&#xHH;` instead of `&#DD;`. */
  useHexadecimal: boolean;
}

/** What the markup unescaper needs to know about a format. */
export interface MarkupUnescapeFormat {
  readonly table: ReferenceTable;
  /** Accept `&#X..` as well as `&#x..`. */
  readonly acceptUppercaseHexMarker: boolean;
  /** Numeric references must end in the terminator. */
  readonly requireNumericTerminator: boolean;
  /** Resolve `&notit;` to the longest name that prefixes it. */
  readonly allowPartialNames: boolean;
  /** Characters that, right after the marker, mean no reference starts here. */
  isReferenceBreak?(ch: number): boolean;
  /**
   * Maps a parsed numeric value to the codepoint to emit, or -1 when the
   * reference must be left as it is. Values that overflow arrive as 0x110000.
   */
  translateNumeric(value: number): number;
}
