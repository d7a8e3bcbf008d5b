import { CharacterCodes } from '../scanner/character-codes.js';
import {
  alphanumericRanges,
  createEscapeLevelPolicy,
  type EscapeLevelPolicy,
} from '../levels/escape-levels.js';

/** Levels shared by the backslash formats: 1 basic set, 2 non-ASCII, 3 non-alphanumeric, 4 all. */
export const enum BackslashLevel {
  BasicEscapeSet = 1,
  AllNonAsciiPlusBasicEscapeSet = 2,
  AllNonAlphanumeric = 3,
  AllCharacters = 4,
}

/** What the backslash escaper needs to know about a format. */
export interface BackslashEscapeFormat {
  readonly levels: EscapeLevelPolicy;
  /** Codepoint to the character written after the backslash, e.g. 0x0A to `n`. */
  readonly singleEscapes: ReadonlyMap<number, string>;
  /** Below this level `/` is only escaped right after `<`. 0 disables the rule. */
  readonly slashAfterLessThanBelowLevel: number;
  /** `\0` cannot be followed by a digit, which would read as octal. */
  readonly zeroEscapeNeedsNonDigit: boolean;
}

export interface BackslashEscapeOptions {
  level: number;
  useSingleEscapes: boolean;
  /** `\xHH` for codepoints up to 0xFF. */
  useXHexa: boolean;
}

/** What the backslash unescaper needs to know about a format. */
export interface BackslashUnescapeFormat {
  /** Character after the backslash to the codepoint it stands for. */
  readonly singleEscapes: ReadonlyMap<number, number>;
  readonly octal: boolean;
  readonly xHexa: boolean;
  readonly uHexa: boolean;
  /** `\u{1F600}` */
  readonly uHexaBraces: boolean;
  /** Backslash before a line terminator produces nothing. */
  readonly lineContinuation: boolean;
  /**
   * Unknown escapes either stay as they are, or lose the backslash and
   * keep the escaped character.
   */
  readonly unknownEscape: 'keep' | 'dropBackslash';
}

/**
 * Level policy indexed up to the C1 controls. `basicSet` lists codepoints
 * always escaped, on top of the C0 and C1 controls.
 */
export function createBackslashEscapeLevels(basicSet: readonly number[]): EscapeLevelPolicy {
  return createEscapeLevelPolicy({
    indexedLength: CharacterCodes.nonBreakingSpace,
    defaultLevel: BackslashLevel.AllNonAlphanumeric,
    beyondLevel: BackslashLevel.AllNonAsciiPlusBasicEscapeSet,
    ranges: [
      ...alphanumericRanges(BackslashLevel.AllCharacters),
      { from: 0x00, to: 0x1F, level: BackslashLevel.BasicEscapeSet },
      { from: CharacterCodes.maxAsciiCharacter, to: CharacterCodes.c1ControlEnd, level: BackslashLevel.BasicEscapeSet },
      ...basicSet.map(from => ({ from, level: BackslashLevel.BasicEscapeSet })),
    ],
  });
}

/** Builds the unescape map from an escape map. */
export function invertSingleEscapes(singleEscapes: ReadonlyMap<number, string>): Map<number, number> {
  const inverted = new Map<number, number>();
  for (const [codepoint, escape] of singleEscapes)
    inverted.set(escape.charCodeAt(0), codepoint);
  return inverted;
}
