import { CharacterCodes, isSurrogate } from '../scanner/character-codes.js';
import {
  alphanumericRanges,
  createEscapeLevelPolicy,
  type EscapeLevelPolicy,
  type EscapeLevelRange,
} from '../levels/escape-levels.js';
import type { MarkupEscapeFormat, MarkupUnescapeFormat } from '../markup/markup-format.js';
import { buildReferenceTable, type ReferenceTable } from '../references/reference-table.js';

export enum XmlEscapeType {
  /** The five predefined entities, other codepoints as `&#DD;`. */
  CharacterEntityReferencesDefaultToDecimal = 0,
  /** The five predefined entities, other codepoints as `&#xhh;`. */
  CharacterEntityReferencesDefaultToHexa = 1,
  DecimalReferences = 2,
  HexadecimalReferences = 3,
}

export enum XmlEscapeLevel {
  OnlyMarkupSignificant = 1,
  AllNonAsciiPlusMarkupSignificant = 2,
  AllNonAlphanumeric = 3,
  AllCharacters = 4,
}

export const xmlReferenceTable: ReferenceTable = buildReferenceTable([
  { names: ['&quot;'], codepoints: [CharacterCodes.doubleQuote] },
  { names: ['&amp;'], codepoints: [CharacterCodes.ampersand] },
  { names: ['&apos;'], codepoints: [CharacterCodes.singleQuote] },
  { names: ['&lt;'], codepoints: [CharacterCodes.lessThan] },
  { names: ['&gt;'], codepoints: [CharacterCodes.greaterThan] },
]);

const markupSignificantRanges: EscapeLevelRange[] = [
  CharacterCodes.singleQuote,
  CharacterCodes.doubleQuote,
  CharacterCodes.lessThan,
  CharacterCodes.greaterThan,
  CharacterCodes.ampersand,
].map(from => ({ from, level: XmlEscapeLevel.OnlyMarkupSignificant }));

// Control characters that must always be written as references
const xml10ControlRanges: EscapeLevelRange[] = [
  { from: 0x7F, to: 0x84, level: XmlEscapeLevel.OnlyMarkupSignificant },
  { from: 0x86, to: CharacterCodes.c1ControlEnd, level: XmlEscapeLevel.OnlyMarkupSignificant },
];

const xml11ControlRanges: EscapeLevelRange[] = [
  { from: 0x01, to: 0x08, level: XmlEscapeLevel.OnlyMarkupSignificant },
  { from: CharacterCodes.verticalTab, to: CharacterCodes.formFeed, level: XmlEscapeLevel.OnlyMarkupSignificant },
  { from: 0x0E, to: 0x1F, level: XmlEscapeLevel.OnlyMarkupSignificant },
  ...xml10ControlRanges,
];

function createXmlEscapeLevels(controlRanges: readonly EscapeLevelRange[]): EscapeLevelPolicy {
  return createEscapeLevelPolicy({
    indexedLength: CharacterCodes.nonBreakingSpace,
    defaultLevel: XmlEscapeLevel.AllNonAlphanumeric,
    beyondLevel: XmlEscapeLevel.AllNonAsciiPlusMarkupSignificant,
    ranges: [
      { from: 0x80, to: CharacterCodes.c1ControlEnd, level: XmlEscapeLevel.AllNonAsciiPlusMarkupSignificant },
      ...alphanumericRanges(XmlEscapeLevel.AllCharacters),
      ...markupSignificantRanges,
      ...controlRanges,
    ],
  });
}

function isNonCharacter(codepoint: number): boolean {
  return codepoint === 0xFFFE || codepoint === CharacterCodes.maxBmpCharacter;
}

/** XML 1.0 `Char` production. */
export function isValidXml10Codepoint(codepoint: number): boolean {
  if (codepoint < CharacterCodes.space)
    return codepoint === CharacterCodes.tab ||
      codepoint === CharacterCodes.lineFeed ||
      codepoint === CharacterCodes.carriageReturn;
  return !isSurrogate(codepoint) && !isNonCharacter(codepoint);
}

/** XML 1.1 `Char` production: everything but NUL, surrogates and U+FFFE/U+FFFF. */
export function isValidXml11Codepoint(codepoint: number): boolean {
  return codepoint !== CharacterCodes.nullCharacter && !isSurrogate(codepoint) && !isNonCharacter(codepoint);
}

export const xml10EscapeFormat: MarkupEscapeFormat = {
  table: xmlReferenceTable,
  levels: createXmlEscapeLevels(xml10ControlRanges),
  isValidCodepoint: isValidXml10Codepoint,
};

export const xml11EscapeFormat: MarkupEscapeFormat = {
  table: xmlReferenceTable,
  levels: createXmlEscapeLevels(xml11ControlRanges),
  isValidCodepoint: isValidXml11Codepoint,
};

/** Strict unescaping: lowercase `x`, mandatory `;`, exact names. */
export const xmlUnescapeFormat: MarkupUnescapeFormat = {
  table: xmlReferenceTable,
  acceptUppercaseHexMarker: false,
  requireNumericTerminator: true,
  allowPartialNames: false,
  translateNumeric: value => value > CharacterCodes.maxCodepoint ? -1 : value,
};
