import { CharacterCodes } from '../scanner/character-codes.js';
import { alphanumericRanges, createEscapeLevelPolicy, type EscapeLevelPolicy } from '../levels/escape-levels.js';
import type { MarkupEscapeFormat, MarkupUnescapeFormat } from '../markup/markup-format.js';
import { loadReferenceData } from '../references/reference-data.js';
import { buildReferenceTable, type ReferenceTable } from '../references/reference-table.js';
import { translateIllFormedCodepoint } from './ill-formed-codepoints.js';

export enum HtmlEscapeType {
  /** HTML 4 named references, other codepoints as `&#DD;`. */
  Html4NamedReferencesDefaultToDecimal = 0,
  /** HTML 4 named references, other codepoints as `&#xhh;`. */
  Html4NamedReferencesDefaultToHexa = 1,
  /** HTML5 named references, other codepoints as `&#DD;`. */
  Html5NamedReferencesDefaultToDecimal = 2,
  /** HTML5 named references, other codepoints as `&#xhh;`. */
  Html5NamedReferencesDefaultToHexa = 3,
  DecimalReferences = 4,
  HexadecimalReferences = 5,
}

export enum HtmlEscapeLevel {
  /** `<`, `>`, `&` and `"`. */
  OnlyMarkupSignificantExceptApos = 0,
  /** Level 0 plus `'`. */
  OnlyMarkupSignificant = 1,
  AllNonAsciiPlusMarkupSignificant = 2,
  AllNonAlphanumeric = 3,
  AllCharacters = 4,
}

/**
 * ASCII gets a slot each; every non-ASCII codepoint is escaped from level 2.
 */
export const htmlEscapeLevels: EscapeLevelPolicy = createEscapeLevelPolicy({
  indexedLength: CharacterCodes.maxAsciiCharacter + 1,
  defaultLevel: HtmlEscapeLevel.AllNonAlphanumeric,
  beyondLevel: HtmlEscapeLevel.AllNonAsciiPlusMarkupSignificant,
  ranges: [
    ...alphanumericRanges(HtmlEscapeLevel.AllCharacters),
    { from: CharacterCodes.singleQuote, level: HtmlEscapeLevel.OnlyMarkupSignificant },
    { from: CharacterCodes.doubleQuote, level: HtmlEscapeLevel.OnlyMarkupSignificantExceptApos },
    { from: CharacterCodes.lessThan, level: HtmlEscapeLevel.OnlyMarkupSignificantExceptApos },
    { from: CharacterCodes.greaterThan, level: HtmlEscapeLevel.OnlyMarkupSignificantExceptApos },
    { from: CharacterCodes.ampersand, level: HtmlEscapeLevel.OnlyMarkupSignificantExceptApos },
  ],
});

let html4Table: ReferenceTable | undefined;
let html5Table: ReferenceTable | undefined;

/** HTML 4 named references, built on first use. */
export function getHtml4Table(): ReferenceTable {
  if (!html4Table) html4Table = buildReferenceTable(loadReferenceData('html4'));
  return html4Table;
}

/** HTML5 named references, built on first use. */
export function getHtml5Table(): ReferenceTable {
  if (!html5Table) html5Table = buildReferenceTable(loadReferenceData('html5'));
  return html5Table;
}

export function getHtmlEscapeFormat(type: HtmlEscapeType): MarkupEscapeFormat {
  const isHtml4 = type === HtmlEscapeType.Html4NamedReferencesDefaultToDecimal ||
    type === HtmlEscapeType.Html4NamedReferencesDefaultToHexa;
  return { table: isHtml4 ? getHtml4Table() : getHtml5Table(), levels: htmlEscapeLevels };
}

export function usesNamedReferences(type: HtmlEscapeType): boolean {
  return type !== HtmlEscapeType.DecimalReferences && type !== HtmlEscapeType.HexadecimalReferences;
}

export function usesHexadecimal(type: HtmlEscapeType): boolean {
  return type === HtmlEscapeType.Html4NamedReferencesDefaultToHexa ||
    type === HtmlEscapeType.Html5NamedReferencesDefaultToHexa ||
    type === HtmlEscapeType.HexadecimalReferences;
}

function isHtmlReferenceBreak(ch: number): boolean {
  return ch === CharacterCodes.space ||
    ch === CharacterCodes.lineFeed ||
    ch === CharacterCodes.tab ||
    ch === CharacterCodes.formFeed ||
    ch === CharacterCodes.lessThan ||
    ch === CharacterCodes.ampersand;
}

let htmlUnescapeFormat: MarkupUnescapeFormat | undefined;

/** Browser-lenient unescaping over the HTML5 table. */
export function getHtmlUnescapeFormat(): MarkupUnescapeFormat {
  if (!htmlUnescapeFormat) {
    htmlUnescapeFormat = {
      table: getHtml5Table(),
      acceptUppercaseHexMarker: true,
      requireNumericTerminator: false,
      allowPartialNames: true,
      isReferenceBreak: isHtmlReferenceBreak,
      translateNumeric: translateIllFormedCodepoint,
    };
  }
  return htmlUnescapeFormat;
}
