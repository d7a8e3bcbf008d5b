import { checkBounds, checkEnumArgument, checkSink } from '../arguments.js';
import { escapeMarkup, escapeMarkupTo } from '../markup/markup-escaper.js';
import type { MarkupEscapeFormat, MarkupEscapeOptions } from '../markup/markup-format.js';
import { unescapeMarkup, unescapeMarkupTo } from '../markup/markup-unescaper.js';
import type { TextSink } from '../output/text-output.js';
import {
  xml10EscapeFormat,
  xml11EscapeFormat,
  XmlEscapeLevel,
  XmlEscapeType,
  xmlUnescapeFormat,
} from './xml-formats.js';

function escapeOptions(type: XmlEscapeType, level: XmlEscapeLevel): MarkupEscapeOptions {
  return {
    level,
    useNamedReferences: type === XmlEscapeType.CharacterEntityReferencesDefaultToDecimal ||
      type === XmlEscapeType.CharacterEntityReferencesDefaultToHexa,
    useHexadecimal: type === XmlEscapeType.CharacterEntityReferencesDefaultToHexa ||
      type === XmlEscapeType.HexadecimalReferences,
  };
}

function escapeXml(
  caller: string,
  format: MarkupEscapeFormat,
  text: string | null | undefined,
  type: XmlEscapeType,
  level: XmlEscapeLevel): string | null | undefined {
  checkEnumArgument(caller, 'type', type, XmlEscapeType);
  checkEnumArgument(caller, 'level', level, XmlEscapeLevel);
  if (text === null || text === undefined) return text;
  return escapeMarkup(text, format, escapeOptions(type, level)).text;
}

function escapeXmlTo(
  caller: string,
  format: MarkupEscapeFormat,
  text: string | null | undefined,
  offset: number,
  length: number,
  sink: TextSink,
  type: XmlEscapeType,
  level: XmlEscapeLevel): void {
  checkSink(caller, sink);
  checkEnumArgument(caller, 'type', type, XmlEscapeType);
  checkEnumArgument(caller, 'level', level, XmlEscapeLevel);
  if (text === null || text === undefined) return;
  checkBounds(caller, text.length, offset, length);
  escapeMarkupTo(text, offset, offset + length, format, escapeOptions(type, level), sink);
}

/**
 * Escapes `text` for an XML 1.0 document. Codepoints XML 1.0 cannot carry
 * (most C0 controls, lone surrogates, U+FFFE, U+FFFF) are removed.
 */
export function escapeXml10(text: string, type: XmlEscapeType, level: XmlEscapeLevel): string;
export function escapeXml10(text: string | null | undefined, type: XmlEscapeType, level: XmlEscapeLevel): string | null | undefined;
export function escapeXml10(text: string | null | undefined, type: XmlEscapeType, level: XmlEscapeLevel): string | null | undefined {
  return escapeXml('escapeXml10', xml10EscapeFormat, text, type, level);
}

/**
 * Escapes `text` for an XML 1.1 document, where C0 controls other than NUL
 * are allowed but always written as references.
 */
export function escapeXml11(text: string, type: XmlEscapeType, level: XmlEscapeLevel): string;
export function escapeXml11(text: string | null | undefined, type: XmlEscapeType, level: XmlEscapeLevel): string | null | undefined;
export function escapeXml11(text: string | null | undefined, type: XmlEscapeType, level: XmlEscapeLevel): string | null | undefined {
  return escapeXml('escapeXml11', xml11EscapeFormat, text, type, level);
}

export function escapeXml10Minimal(text: string): string;
export function escapeXml10Minimal(text: string | null | undefined): string | null | undefined;
export function escapeXml10Minimal(text: string | null | undefined): string | null | undefined {
  return escapeXml('escapeXml10Minimal', xml10EscapeFormat, text,
    XmlEscapeType.CharacterEntityReferencesDefaultToHexa, XmlEscapeLevel.OnlyMarkupSignificant);
}

export function escapeXml11Minimal(text: string): string;
export function escapeXml11Minimal(text: string | null | undefined): string | null | undefined;
export function escapeXml11Minimal(text: string | null | undefined): string | null | undefined {
  return escapeXml('escapeXml11Minimal', xml11EscapeFormat, text,
    XmlEscapeType.CharacterEntityReferencesDefaultToHexa, XmlEscapeLevel.OnlyMarkupSignificant);
}

/** Markup-significant characters plus all non-ASCII, hexadecimal where no entity exists. */
export function escapeXml10Default(text: string): string;
export function escapeXml10Default(text: string | null | undefined): string | null | undefined;
export function escapeXml10Default(text: string | null | undefined): string | null | undefined {
  return escapeXml('escapeXml10Default', xml10EscapeFormat, text,
    XmlEscapeType.CharacterEntityReferencesDefaultToHexa, XmlEscapeLevel.AllNonAsciiPlusMarkupSignificant);
}

export function escapeXml11Default(text: string): string;
export function escapeXml11Default(text: string | null | undefined): string | null | undefined;
export function escapeXml11Default(text: string | null | undefined): string | null | undefined {
  return escapeXml('escapeXml11Default', xml11EscapeFormat, text,
    XmlEscapeType.CharacterEntityReferencesDefaultToHexa, XmlEscapeLevel.AllNonAsciiPlusMarkupSignificant);
}

export function escapeXml10To(
  text: string | null | undefined,
  offset: number,
  length: number,
  sink: TextSink,
  type: XmlEscapeType,
  level: XmlEscapeLevel): void {
  escapeXmlTo('escapeXml10To', xml10EscapeFormat, text, offset, length, sink, type, level);
}

export function escapeXml11To(
  text: string | null | undefined,
  offset: number,
  length: number,
  sink: TextSink,
  type: XmlEscapeType,
  level: XmlEscapeLevel): void {
  escapeXmlTo('escapeXml11To', xml11EscapeFormat, text, offset, length, sink, type, level);
}

/**
 * Resolves the five predefined entities and numeric references. Anything
 * not well-formed (`&#X41;`, `&#65` without `;`, unknown names) is kept.
 */
export function unescapeXml(text: string): string;
export function unescapeXml(text: string | null | undefined): string | null | undefined;
export function unescapeXml(text: string | null | undefined): string | null | undefined {
  if (text === null || text === undefined) return text;
  if (text.indexOf('&') < 0) return text;
  return unescapeMarkup(text, xmlUnescapeFormat).text;
}

export function unescapeXmlTo(
  text: string | null | undefined,
  offset: number,
  length: number,
  sink: TextSink): void {
  checkSink('unescapeXmlTo', sink);
  if (text === null || text === undefined) return;
  checkBounds('unescapeXmlTo', text.length, offset, length);
  unescapeMarkupTo(text, offset, offset + length, xmlUnescapeFormat, sink);
}
