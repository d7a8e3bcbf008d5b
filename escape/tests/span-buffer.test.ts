import { describe, expect, test } from 'vitest';
import { createSpanBuffer, type SpanBufferDebugState } from '../output/span-buffer.js';
import { createSinkOutput, createStringSink, transformToString } from '../output/text-output.js';

function debugState(): SpanBufferDebugState {
  return { spanCount: 0, spanCapacity: 0, injectedCount: 0 };
}

describe('SpanBuffer', () => {
  test('materialize returns empty string when no spans were added', () => {
    const sb = createSpanBuffer({ source: 'hello world' });
    expect(sb.materialize()).toBe('');
  });

  test('single span returns exact substring and exact debug state', () => {
    const sb = createSpanBuffer({ source: 'hello world' });
    sb.addSpan(0, 5);
    const dbg = debugState();
    sb.fillDebugState(dbg);
    expect(dbg).toEqual({ spanCount: 1, spanCapacity: 1, injectedCount: 0 });
    expect(sb.materialize()).toBe('hello');
  });

  test('contiguous spans merge into one', () => {
    const sb = createSpanBuffer({ source: 'hello world' });
    sb.addSpan(0, 3);
    sb.addSpan(3, 5);
    sb.addSpan(5, 11);
    const dbg = debugState();
    sb.fillDebugState(dbg);
    expect(dbg).toEqual({ spanCount: 1, spanCapacity: 1, injectedCount: 0 });
    expect(sb.materialize()).toBe('hello world');
  });

  test('gaps between spans are dropped', () => {
    const sb = createSpanBuffer({ source: 'abcdef' });
    sb.addSpan(0, 2);
    sb.addSpan(4, 6);
    expect(sb.materialize()).toBe('abef');
  });

  test('injected text sits between source spans', () => {
    const sb = createSpanBuffer({ source: 'a<b' });
    sb.addSpan(0, 1);
    sb.addText('&lt;');
    sb.addSpan(2, 3);
    const dbg = debugState();
    sb.fillDebugState(dbg);
    expect(dbg).toEqual({ spanCount: 3, spanCapacity: 3, injectedCount: 1 });
    expect(sb.materialize()).toBe('a&lt;b');
  });

  test('spans do not merge across injected text', () => {
    const sb = createSpanBuffer({ source: 'ab' });
    sb.addSpan(0, 1);
    sb.addText('-');
    sb.addSpan(1, 2);
    expect(sb.materialize()).toBe('a-b');
  });

  test('empty spans and empty text are ignored', () => {
    const sb = createSpanBuffer({ source: 'ab' });
    sb.addSpan(1, 1);
    sb.addText('');
    const dbg = debugState();
    sb.fillDebugState(dbg);
    expect(dbg).toEqual({ spanCount: 0, spanCapacity: 0, injectedCount: 0 });
  });

  test('clear resets counts but keeps capacity', () => {
    const sb = createSpanBuffer({ source: 'a<b' });
    sb.addSpan(0, 1);
    sb.addText('&lt;');
    sb.addSpan(2, 3);
    sb.clear();
    const dbg = debugState();
    sb.fillDebugState(dbg);
    expect(dbg).toEqual({ spanCount: 0, spanCapacity: 3, injectedCount: 0 });
    expect(sb.materialize()).toBe('');
  });

  test('rejects spans outside the source', () => {
    const sb = createSpanBuffer({ source: 'abc' });
    expect(() => sb.addSpan(0, 20)).toThrow('SpanBuffer: span 0..20 is outside the source');
  });
});

describe('sink output', () => {
  test('coalesces adjacent spans into one write', () => {
    const chunks: string[] = [];
    const output = createSinkOutput('abcdef', { write: (chunk: string) => chunks.push(chunk) });
    output.addSpan(0, 2);
    output.addSpan(2, 4);
    output.addText('X');
    output.addSpan(5, 6);
    output.flush();
    expect(chunks).toEqual(['abcd', 'X', 'f']);
  });

  test('string sink joins chunks', () => {
    const sink = createStringSink();
    sink.write('a');
    sink.write('b');
    expect(sink.toString()).toBe('ab');
  });
});

describe('transformToString', () => {
  test('returns the input itself when nothing changed', () => {
    const text = 'unchanged';
    const result = transformToString(text, 0, text.length, output => {
      output.addSpan(0, text.length);
      return false;
    });
    expect(result).toEqual({ text: 'unchanged', changed: false });
  });

  test('returns the slice when a range was unchanged', () => {
    const result = transformToString('abcdef', 1, 3, output => {
      output.addSpan(1, 3);
      return false;
    });
    expect(result).toEqual({ text: 'bc', changed: false });
  });

  test('materializes the output when something changed', () => {
    const result = transformToString('a<b', 0, 3, output => {
      output.addSpan(0, 1);
      output.addText('&lt;');
      output.addSpan(2, 3);
      return true;
    });
    expect(result).toEqual({ text: 'a&lt;b', changed: true });
  });
});
