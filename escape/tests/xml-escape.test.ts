import { describe, expect, test } from 'vitest';
import { InvalidArgumentError } from '../errors.js';
import { createStringSink } from '../output/text-output.js';
import {
  escapeXml10,
  escapeXml10Default,
  escapeXml10Minimal,
  escapeXml10To,
  escapeXml11,
  escapeXml11Minimal,
  unescapeXml,
  unescapeXmlTo,
} from '../xml/xml-escape.js';
import { isValidXml10Codepoint, isValidXml11Codepoint, XmlEscapeLevel, XmlEscapeType } from '../xml/xml-formats.js';

describe('escapeXml', () => {
  test('the five predefined entities', () => {
    expect(escapeXml10Minimal('<a b="c" d=\'e\'>&'))
      .toBe('&lt;a b=&quot;c&quot; d=&apos;e&apos;&gt;&amp;');
  });

  test('non-ASCII is left alone at level 1 and escaped in hexadecimal at level 2', () => {
    const text = 'é';
    expect(escapeXml10Minimal(text)).toBe(text);
    expect(escapeXml10Default('é')).toBe('&#xe9;');
    expect(escapeXml10Default('😀')).toBe('&#x1f600;');
  });

  test('decimal fallback', () => {
    expect(escapeXml10('é', XmlEscapeType.CharacterEntityReferencesDefaultToDecimal,
      XmlEscapeLevel.AllNonAsciiPlusMarkupSignificant)).toBe('&#233;');
  });

  test('numeric-only types', () => {
    expect(escapeXml10('<', XmlEscapeType.DecimalReferences, XmlEscapeLevel.OnlyMarkupSignificant)).toBe('&#60;');
    expect(escapeXml11('<', XmlEscapeType.HexadecimalReferences, XmlEscapeLevel.OnlyMarkupSignificant)).toBe('&#x3c;');
  });

  test('XML 1.0 drops characters it cannot carry', () => {
    expect(escapeXml10Minimal('a\u0001b\u0000c')).toBe('abc');
    expect(escapeXml10Minimal('a\uD800b')).toBe('ab');
    expect(escapeXml10Minimal('a\uFFFEb\uFFFF')).toBe('ab');
  });

  test('XML 1.1 escapes C0 controls and drops only NUL', () => {
    expect(escapeXml11Minimal('a\u0001b\u0000c')).toBe('a&#x1;bc');
  });

  test('tab, line feed and carriage return are kept', () => {
    const text = 'a\tb\r\n';
    expect(escapeXml10Minimal(text)).toBe(text);
  });

  test('C1 controls other than NEL are always escaped', () => {
    expect(escapeXml10Minimal('\u007F\u0085\u0086')).toBe('&#x7f;\u0085&#x86;');
  });

  test('null input and unknown level', () => {
    expect(escapeXml10Minimal(null)).toBeNull();
    const unknown: number = 0;
    expect(() => escapeXml10('x', XmlEscapeType.DecimalReferences, unknown))
      .toThrow(new InvalidArgumentError('escapeXml10: \'level\' argument has unknown value 0'));
  });

  test('escapeXml10To writes a slice', () => {
    const sink = createStringSink();
    escapeXml10To('[a&b]', 1, 3, sink, XmlEscapeType.CharacterEntityReferencesDefaultToHexa,
      XmlEscapeLevel.OnlyMarkupSignificant);
    expect(sink.toString()).toBe('a&amp;b');
  });
});

describe('XML codepoint validity', () => {
  test('XML 1.0', () => {
    expect([0x00, 0x08, 0x09, 0x0A, 0x0D, 0x20, 0xD800, 0xFFFD, 0xFFFE, 0x10000].map(isValidXml10Codepoint))
      .toEqual([false, false, true, true, true, true, false, true, false, true]);
  });

  test('XML 1.1', () => {
    expect([0x00, 0x01, 0x1F, 0xDFFF, 0xFFFF, 0x10FFFF].map(isValidXml11Codepoint))
      .toEqual([false, true, true, false, false, true]);
  });
});

describe('unescapeXml', () => {
  test('predefined entities and numeric references', () => {
    expect(unescapeXml('&lt;&gt;&amp;&quot;&apos;')).toBe('<>&"\'');
    expect(unescapeXml('&#65;&#x42;&#x1f600;')).toBe('AB😀');
  });

  test('anything not well formed is kept', () => {
    expect(unescapeXml('&#X41;')).toBe('&#X41;');
    expect(unescapeXml('&#65')).toBe('&#65');
    expect(unescapeXml('&nbsp;')).toBe('&nbsp;');
    expect(unescapeXml('&amp')).toBe('&amp');
    expect(unescapeXml('&#1114112;')).toBe('&#1114112;');
  });

  test('returns the same string when there is nothing to unescape', () => {
    const text = 'no entities here';
    expect(unescapeXml(text)).toBe(text);
  });

  test('unescapeXmlTo writes a slice', () => {
    const sink = createStringSink();
    unescapeXmlTo('&lt;&gt;', 4, 4, sink);
    expect(sink.toString()).toBe('>');
  });
});
