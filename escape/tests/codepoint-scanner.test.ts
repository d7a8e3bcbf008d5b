import { describe, expect, test } from 'vitest';
import {
  codepointAt,
  createCodepointScanner,
  type CodepointScannerDebugState,
} from '../scanner/codepoint-scanner.js';

function scanAll(text: string, start?: number, length?: number): [number, number, number][] {
  const scanner = createCodepointScanner();
  scanner.initText(text, start, length);
  const result: [number, number, number][] = [];
  while (scanner.scan())
    result.push([scanner.codepoint, scanner.offset, scanner.width]);
  return result;
}

describe('CodepointScanner', () => {
  test('combines a surrogate pair into one codepoint', () => {
    expect(scanAll('a😀b')).toEqual([
      [0x61, 0, 1],
      [0x1F600, 1, 2],
      [0x62, 3, 1],
    ]);
  });

  test('lone high surrogate at the end is its own codepoint', () => {
    expect(scanAll('x\uD800')).toEqual([[0x78, 0, 1], [0xD800, 1, 1]]);
  });

  test('high surrogate followed by a non-surrogate', () => {
    expect(scanAll('\uD800x')).toEqual([[0xD800, 0, 1], [0x78, 1, 1]]);
  });

  test('lone low surrogate', () => {
    expect(scanAll('\uDC00')).toEqual([[0xDC00, 0, 1]]);
  });

  test('does not pair across the end of the range', () => {
    expect(scanAll('😀', 0, 1)).toEqual([[0xD83D, 0, 1]]);
  });

  test('scans only the requested range', () => {
    expect(scanAll('abcd', 1, 2)).toEqual([[0x62, 1, 1], [0x63, 2, 1]]);
  });

  test('empty text yields nothing', () => {
    expect(scanAll('')).toEqual([]);
  });

  test('reports -1 and the end offset once exhausted', () => {
    const scanner = createCodepointScanner();
    scanner.initText('a');
    expect(scanner.scan()).toBe(true);
    expect(scanner.offsetNext).toBe(1);
    expect(scanner.scan()).toBe(false);
    expect(scanner.codepoint).toBe(-1);
    expect(scanner.offset).toBe(1);
    expect(scanner.width).toBe(0);
  });

  test('fillDebugState reports position and current codepoint', () => {
    const scanner = createCodepointScanner();
    scanner.initText('😀z');
    scanner.scan();
    const state: CodepointScannerDebugState = { pos: 0, end: 0, codepoint: 0, width: 0 };
    scanner.fillDebugState(state);
    expect(state).toEqual({ pos: 2, end: 3, codepoint: 0x1F600, width: 2 });
  });

  test('codepointAt respects the end bound', () => {
    expect(codepointAt('😀', 0, 2)).toBe(0x1F600);
    expect(codepointAt('😀', 0, 1)).toBe(0xD83D);
    expect(codepointAt('😀', 1, 2)).toBe(0xDE00);
  });
});
