export { InvalidArgumentError, ReferenceTableError } from './errors.js';

export {
  isAlphaNumeric,
  isDigit,
  isHexDigit,
  isLetter,
} from './scanner/character-codes.js';
export {
  codepointAt,
  createCodepointScanner,
  type CodepointScanner,
  type CodepointScannerDebugState,
} from './scanner/codepoint-scanner.js';

export {
  createEscapeLevelPolicy,
  type EscapeLevelPolicy,
  type EscapeLevelPolicyOptions,
  type EscapeLevelRange,
} from './levels/escape-levels.js';

export {
  buildReferenceTable,
  type ReferenceRecord,
  type ReferenceTable,
  type ReferenceTableDebugState,
  type ReferenceTableOptions,
} from './references/reference-table.js';
export {
  isExactMatch,
  isPartialMatch,
  partialMatchIndex,
  REFERENCE_NOT_FOUND,
  searchReference,
} from './references/reference-search.js';
export { loadReferenceData, parseReferenceData, type ReferenceDataSet } from './references/reference-data.js';

export { createSpanBuffer, type SpanBuffer, type SpanBufferDebugState } from './output/span-buffer.js';
export {
  createSinkOutput,
  createStringSink,
  type EscapeOutput,
  type TextSink,
  type TransformResult,
} from './output/text-output.js';

export type { MarkupEscapeFormat, MarkupEscapeOptions, MarkupUnescapeFormat } from './markup/markup-format.js';
export { escapeMarkup, escapeMarkupInto, escapeMarkupTo, numericReference } from './markup/markup-escaper.js';
export {
  resolveReference,
  unescapeMarkup,
  unescapeMarkupInto,
  unescapeMarkupTo,
  type ResolvedReference,
} from './markup/markup-unescaper.js';

export { HtmlEscapeLevel, HtmlEscapeType, getHtml4Table, getHtml5Table } from './html/html-formats.js';
export {
  escapeHtml,
  escapeHtml4,
  escapeHtml4Xml,
  escapeHtml5,
  escapeHtml5Xml,
  escapeHtmlTo,
  unescapeHtml,
  unescapeHtmlTo,
} from './html/html-escape.js';

export { XmlEscapeLevel, XmlEscapeType, isValidXml10Codepoint, isValidXml11Codepoint } from './xml/xml-formats.js';
export {
  escapeXml10,
  escapeXml10Default,
  escapeXml10Minimal,
  escapeXml10To,
  escapeXml11,
  escapeXml11Default,
  escapeXml11Minimal,
  escapeXml11To,
  unescapeXml,
  unescapeXmlTo,
} from './xml/xml-escape.js';

export {
  escapeJson,
  escapeJsonDefault,
  escapeJsonMinimal,
  escapeJsonTo,
  JsonEscapeLevel,
  JsonEscapeType,
  unescapeJson,
  unescapeJsonTo,
} from './json/json-escape.js';

export {
  escapeJavaScript,
  escapeJavaScriptDefault,
  escapeJavaScriptMinimal,
  escapeJavaScriptTo,
  JavaScriptEscapeLevel,
  JavaScriptEscapeType,
  unescapeJavaScript,
  unescapeJavaScriptTo,
} from './javascript/javascript-escape.js';

export {
  escapeJava,
  escapeJavaDefault,
  escapeJavaMinimal,
  escapeJavaTo,
  JavaEscapeLevel,
  unescapeJava,
  unescapeJavaTo,
} from './java/java-escape.js';
