import { describe, expect, test } from 'vitest';
import { checkEnumArgument } from '../arguments.js';
import { InvalidArgumentError } from '../errors.js';
import {
  escapeHtml,
  escapeHtml4,
  escapeHtml4Xml,
  escapeHtml5,
  escapeHtml5Xml,
  escapeHtmlTo,
  unescapeHtml,
  unescapeHtmlTo,
} from '../html/html-escape.js';
import { HtmlEscapeLevel, HtmlEscapeType } from '../html/html-formats.js';
import { createStringSink } from '../output/text-output.js';

describe('escapeHtml', () => {
  test('markup significant characters with named references', () => {
    expect(escapeHtml('<a href="x">', HtmlEscapeType.Html5NamedReferencesDefaultToDecimal,
      HtmlEscapeLevel.OnlyMarkupSignificant)).toBe('&lt;a href=&quot;x&quot;&gt;');
  });

  test('level 0 leaves the apostrophe alone', () => {
    expect(escapeHtml('it\'s <b>', HtmlEscapeType.Html5NamedReferencesDefaultToDecimal,
      HtmlEscapeLevel.OnlyMarkupSignificantExceptApos)).toBe('it\'s &lt;b&gt;');
  });

  test('HTML5 has &apos;, HTML 4 falls back to a numeric reference', () => {
    expect(escapeHtml5Xml('it\'s')).toBe('it&apos;s');
    expect(escapeHtml4Xml('it\'s')).toBe('it&#39;s');
  });

  test('non-ASCII at the default level', () => {
    expect(escapeHtml5('café ©')).toBe('caf&eacute; &copy;');
    expect(escapeHtml4('€5')).toBe('&euro;5');
    expect(escapeHtml5('😀')).toBe('&#128512;');
  });

  test('the Xml variants leave non-ASCII alone', () => {
    const text = 'café';
    expect(escapeHtml5Xml(text)).toBe(text);
  });

  test('fallback to hexadecimal', () => {
    expect(escapeHtml('a b', HtmlEscapeType.Html5NamedReferencesDefaultToHexa,
      HtmlEscapeLevel.AllNonAlphanumeric)).toBe('a&#x20;b');
    expect(escapeHtml('a b', HtmlEscapeType.Html5NamedReferencesDefaultToDecimal,
      HtmlEscapeLevel.AllNonAlphanumeric)).toBe('a&#32;b');
  });

  test('HTML5 names for whitespace at level 3', () => {
    expect(escapeHtml('\t\n', HtmlEscapeType.Html5NamedReferencesDefaultToDecimal,
      HtmlEscapeLevel.AllNonAlphanumeric)).toBe('&Tab;&NewLine;');
  });

  test('numeric-only types', () => {
    expect(escapeHtml('<é', HtmlEscapeType.DecimalReferences,
      HtmlEscapeLevel.AllNonAsciiPlusMarkupSignificant)).toBe('&#60;&#233;');
    expect(escapeHtml('<é', HtmlEscapeType.HexadecimalReferences,
      HtmlEscapeLevel.AllNonAsciiPlusMarkupSignificant)).toBe('&#x3c;&#xe9;');
  });

  test('level 4 escapes alphanumerics too', () => {
    expect(escapeHtml('Ab', HtmlEscapeType.HexadecimalReferences, HtmlEscapeLevel.AllCharacters))
      .toBe('&#x41;&#x62;');
  });

  test('returns the same string when nothing needs escaping', () => {
    const text = 'hello world';
    expect(escapeHtml5(text)).toBe(text);
  });

  test('null, undefined and empty input', () => {
    expect(escapeHtml5(null)).toBeNull();
    expect(escapeHtml(undefined, HtmlEscapeType.DecimalReferences, HtmlEscapeLevel.AllCharacters)).toBeUndefined();
    expect(escapeHtml5('')).toBe('');
  });

  test('unknown type or level', () => {
    const unknown: number = 42;
    expect(() => escapeHtml('x', unknown, HtmlEscapeLevel.AllCharacters))
      .toThrow(new InvalidArgumentError('escapeHtml: \'type\' argument has unknown value 42'));
    expect(() => escapeHtml('x', HtmlEscapeType.DecimalReferences, unknown))
      .toThrow(InvalidArgumentError);
  });

  test('missing enum arguments', () => {
    expect(() => checkEnumArgument('escapeHtml', 'level', null, HtmlEscapeLevel))
      .toThrow('escapeHtml: \'level\' argument cannot be null');
    expect(() => checkEnumArgument('escapeHtml', 'type', undefined, HtmlEscapeType))
      .toThrow('escapeHtml: \'type\' argument cannot be undefined');
  });
});

describe('escapeHtmlTo', () => {
  test('escapes a slice into the sink', () => {
    const sink = createStringSink();
    escapeHtmlTo('x<y>z', 1, 3, sink, HtmlEscapeType.Html5NamedReferencesDefaultToDecimal,
      HtmlEscapeLevel.OnlyMarkupSignificant);
    expect(sink.toString()).toBe('&lt;y&gt;');
  });

  test('copies an unchanged slice', () => {
    const sink = createStringSink();
    escapeHtmlTo('abc', 1, 2, sink, HtmlEscapeType.Html5NamedReferencesDefaultToDecimal,
      HtmlEscapeLevel.OnlyMarkupSignificant);
    expect(sink.toString()).toBe('bc');
  });

  test('null text writes nothing', () => {
    const sink = createStringSink();
    escapeHtmlTo(null, 0, 0, sink, HtmlEscapeType.DecimalReferences, HtmlEscapeLevel.AllCharacters);
    expect(sink.toString()).toBe('');
  });

  test('invalid bounds', () => {
    const sink = createStringSink();
    expect(() => escapeHtmlTo('abc', 2, 2, sink, HtmlEscapeType.DecimalReferences, HtmlEscapeLevel.AllCharacters))
      .toThrow('escapeHtmlTo: invalid (offset, length) values: offset is 2, length is 2, text length is 3');
    expect(() => escapeHtmlTo('abc', -1, 1, sink, HtmlEscapeType.DecimalReferences, HtmlEscapeLevel.AllCharacters))
      .toThrow(InvalidArgumentError);
    expect(() => escapeHtmlTo('abc', 0, -1, sink, HtmlEscapeType.DecimalReferences, HtmlEscapeLevel.AllCharacters))
      .toThrow(InvalidArgumentError);
  });
});

describe('unescapeHtml', () => {
  test('named references', () => {
    expect(unescapeHtml('&amp;&lt;&gt;')).toBe('&<>');
    expect(unescapeHtml('&notin;')).toBe('∉');
    expect(unescapeHtml('&fjlig;')).toBe('fj');
    expect(unescapeHtml('&NotEqualTilde;')).toBe('\u2242\u0338');
  });

  test('names without the semicolon', () => {
    expect(unescapeHtml('&copy2024')).toBe('©2024');
    expect(unescapeHtml('&notit;')).toBe('¬it;');
  });

  test('numeric references', () => {
    expect(unescapeHtml('&#65;&#x42;&#X43;&#68')).toBe('ABCD');
  });

  test('numeric references to Windows-1252 positions', () => {
    expect(unescapeHtml('&#x80;')).toBe('€');
    expect(unescapeHtml('&#128;')).toBe('€');
    expect(unescapeHtml('&#x97;')).toBe('\u2014');
    expect(unescapeHtml('&#x81;')).toBe('\u0081');
  });

  test('numeric references with no valid codepoint', () => {
    expect(unescapeHtml('&#0;')).toBe('\uFFFD');
    expect(unescapeHtml('&#xD800;')).toBe('\uFFFD');
    expect(unescapeHtml('&#x110000;')).toBe('\uFFFD');
  });

  test('malformed references pass through', () => {
    expect(unescapeHtml('&#zz;')).toBe('&#zz;');
    expect(unescapeHtml('AT&T')).toBe('AT&T');
    expect(unescapeHtml('a & b')).toBe('a & b');
    expect(unescapeHtml('&&amp;')).toBe('&&');
    expect(unescapeHtml('&<')).toBe('&<');
  });

  test('returns the same string when there is nothing to unescape', () => {
    const text = 'fish & chips';
    expect(unescapeHtml(text)).toBe(text);
  });

  test('null and empty input', () => {
    expect(unescapeHtml(null)).toBeNull();
    expect(unescapeHtml(undefined)).toBeUndefined();
    expect(unescapeHtml('')).toBe('');
  });

  test('unescapeHtmlTo writes a slice', () => {
    const sink = createStringSink();
    unescapeHtmlTo('x&lt;y', 1, 4, sink);
    expect(sink.toString()).toBe('<');
  });

  test('unescapeHtmlTo checks bounds', () => {
    expect(() => unescapeHtmlTo('abc', 4, 0, createStringSink()))
      .toThrow('unescapeHtmlTo: invalid (offset, length) values: offset is 4, length is 0, text length is 3');
  });
});
