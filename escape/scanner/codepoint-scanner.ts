import { combineSurrogates, isHighSurrogate, isLowSurrogate } from './character-codes.js';

export interface CodepointScanner {
  /** Initialize scanner text and optional start/length. */
  initText(text: string, start?: number, length?: number): void;

  /**
   * Advances to the next codepoint and updates the public fields.
   * Returns false once the end of the range is reached.
   */
  scan(): boolean;

  /** Fill a zero-allocation diagnostics state object. */
  fillDebugState(state: CodepointScannerDebugState): void;

  /** Current codepoint. A lone surrogate is reported as itself. */
  readonly codepoint: number;

  /** Offset of the current codepoint in the text. */
  readonly offset: number;

  /** Number of UTF-16 units the current codepoint occupies (1 or 2). */
  readonly width: number;

  /** Where the next codepoint will start. */
  readonly offsetNext: number;
}

export interface CodepointScannerDebugState {
  pos: number;
  end: number;
  codepoint: number;
  width: number;
}

/**
 * Codepoint at `pos`, pairing surrogates only when both halves lie before `end`.
 */
export function codepointAt(text: string, pos: number, end: number): number {
  const ch = text.charCodeAt(pos);
  if (isHighSurrogate(ch) && pos + 1 < end) {
    const next = text.charCodeAt(pos + 1);
    if (isLowSurrogate(next)) return combineSurrogates(ch, next);
  }
  return ch;
}

export function codepointWidth(codepoint: number): number {
  return codepoint > 0xFFFF ? 2 : 1;
}

export function createCodepointScanner(): CodepointScanner {
  let source = '';
  let pos = 0;
  let end = 0;

  let codepoint = -1;
  let offset = 0;
  let width = 0;

  function initText(text: string, start = 0, length = text.length - start): void {
    source = text;
    pos = start;
    end = start + length;
    codepoint = -1;
    offset = start;
    width = 0;
  }

  function scan(): boolean {
    if (pos >= end) {
      codepoint = -1;
      offset = end;
      width = 0;
      return false;
    }

    offset = pos;
    codepoint = codepointAt(source, pos, end);
    width = codepointWidth(codepoint);
    pos += width;
    return true;
  }

  function fillDebugState(state: CodepointScannerDebugState): void {
    state.pos = pos;
    state.end = end;
    state.codepoint = codepoint;
    state.width = width;
  }

  return {
    initText,
    scan,
    fillDebugState,
    get codepoint() { return codepoint; },
    get offset() { return offset; },
    get width() { return width; },
    get offsetNext() { return pos; },
  };
}
