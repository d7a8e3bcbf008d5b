import { checkBounds, checkEnumArgument, checkSink } from '../arguments.js';
import { escapeMarkup, escapeMarkupTo } from '../markup/markup-escaper.js';
import type { MarkupEscapeOptions } from '../markup/markup-format.js';
import { unescapeMarkup, unescapeMarkupTo } from '../markup/markup-unescaper.js';
import type { TextSink } from '../output/text-output.js';
import {
  getHtmlEscapeFormat,
  getHtmlUnescapeFormat,
  HtmlEscapeLevel,
  HtmlEscapeType,
  usesHexadecimal,
  usesNamedReferences,
} from './html-formats.js';

function escapeOptions(type: HtmlEscapeType, level: HtmlEscapeLevel): MarkupEscapeOptions {
  return {
    level,
    useNamedReferences: usesNamedReferences(type),
    useHexadecimal: usesHexadecimal(type),
  };
}

/**
 * Escapes `text` as HTML. Returns `text` itself when nothing needed escaping,
 * and passes null or undefined through.
 */
export function escapeHtml(text: string, type: HtmlEscapeType, level: HtmlEscapeLevel): string;
export function escapeHtml(text: string | null | undefined, type: HtmlEscapeType, level: HtmlEscapeLevel): string | null | undefined;
export function escapeHtml(text: string | null | undefined, type: HtmlEscapeType, level: HtmlEscapeLevel): string | null | undefined {
  checkEnumArgument('escapeHtml', 'type', type, HtmlEscapeType);
  checkEnumArgument('escapeHtml', 'level', level, HtmlEscapeLevel);
  if (text === null || text === undefined) return text;

  return escapeMarkup(text, getHtmlEscapeFormat(type), escapeOptions(type, level)).text;
}

/**
 * Escapes `text[offset, offset + length)` as HTML into `sink`.
 */
export function escapeHtmlTo(
  text: string | null | undefined,
  offset: number,
  length: number,
  sink: TextSink,
  type: HtmlEscapeType,
  level: HtmlEscapeLevel): void {
  checkSink('escapeHtmlTo', sink);
  checkEnumArgument('escapeHtmlTo', 'type', type, HtmlEscapeType);
  checkEnumArgument('escapeHtmlTo', 'level', level, HtmlEscapeLevel);
  if (text === null || text === undefined) return;
  checkBounds('escapeHtmlTo', text.length, offset, length);

  escapeMarkupTo(text, offset, offset + length, getHtmlEscapeFormat(type), escapeOptions(type, level), sink);
}

/** `< > & " '` and all non-ASCII, with HTML5 names where they exist. */
export function escapeHtml5(text: string): string;
export function escapeHtml5(text: string | null | undefined): string | null | undefined;
export function escapeHtml5(text: string | null | undefined): string | null | undefined {
  return escapeHtml(text, HtmlEscapeType.Html5NamedReferencesDefaultToDecimal,
    HtmlEscapeLevel.AllNonAsciiPlusMarkupSignificant);
}

/** `< > & " '` only, with HTML5 names. */
export function escapeHtml5Xml(text: string): string;
export function escapeHtml5Xml(text: string | null | undefined): string | null | undefined;
export function escapeHtml5Xml(text: string | null | undefined): string | null | undefined {
  return escapeHtml(text, HtmlEscapeType.Html5NamedReferencesDefaultToDecimal,
    HtmlEscapeLevel.OnlyMarkupSignificant);
}

export function escapeHtml4(text: string): string;
export function escapeHtml4(text: string | null | undefined): string | null | undefined;
export function escapeHtml4(text: string | null | undefined): string | null | undefined {
  return escapeHtml(text, HtmlEscapeType.Html4NamedReferencesDefaultToDecimal,
    HtmlEscapeLevel.AllNonAsciiPlusMarkupSignificant);
}

/** HTML 4 has no `&apos;`, so `'` comes out as `&#39;`. */
export function escapeHtml4Xml(text: string): string;
export function escapeHtml4Xml(text: string | null | undefined): string | null | undefined;
export function escapeHtml4Xml(text: string | null | undefined): string | null | undefined {
  return escapeHtml(text, HtmlEscapeType.Html4NamedReferencesDefaultToDecimal,
    HtmlEscapeLevel.OnlyMarkupSignificant);
}

/**
 * Resolves every named (HTML5), decimal and hexadecimal reference in `text`,
 * the way browsers read them: the `;` is optional, names may be cut short
 * and numeric references to control characters are mapped.
 */
export function unescapeHtml(text: string): string;
export function unescapeHtml(text: string | null | undefined): string | null | undefined;
export function unescapeHtml(text: string | null | undefined): string | null | undefined {
  if (text === null || text === undefined) return text;
  // Every reference starts with '&'
  if (text.indexOf('&') < 0) return text;

  return unescapeMarkup(text, getHtmlUnescapeFormat()).text;
}

export function unescapeHtmlTo(
  text: string | null | undefined,
  offset: number,
  length: number,
  sink: TextSink): void {
  checkSink('unescapeHtmlTo', sink);
  if (text === null || text === undefined) return;
  checkBounds('unescapeHtmlTo', text.length, offset, length);

  unescapeMarkupTo(text, offset, offset + length, getHtmlUnescapeFormat(), sink);
}
