/**
 * SpanBuffer - grow-only accumulator of output pieces. Untouched runs of the
 * source are kept as [start, end) spans and only sliced on materialize().
 * Replacement strings are stored aside and referenced from the span list.
 */

export interface SpanBuffer {
  // second parameter is end index (exclusive)
  addSpan(start: number, end: number): void;
  addText(text: string): void;
  clear(): void;
  materialize(): string;
  fillDebugState(state: SpanBufferDebugState): void;
}

export interface SpanBufferDebugState {
  spanCount: number;
  spanCapacity: number;
  injectedCount: number;
}

const MAX_SPANS = 1 << 24; // safety cap (very large, 24 bit number)

// Reusable parts array for materialization to avoid allocating a new array
const stringParts: string[] = [];

export function createSpanBuffer({ source }: { source: string }): SpanBuffer {
  // Pairs of [start, end) for source spans, or [-1, index] for injected text
  const spans: number[] = [];
  let spanCount = 0;
  const injected: string[] = [];
  let injectedCount = 0;

  function reserve(): void {
    if (spanCount >= MAX_SPANS)
      throw new Error('SpanBuffer: exceeded maximum allowed spans');
  }

  function addSpan(start: number, end: number): void {
    if (start < 0 || end < start || end > source.length)
      throw new Error(`SpanBuffer: span ${start}..${end} is outside the source`);
    if (end === start) return;

    // Contiguous with the previous source span: extend it
    if (spanCount > 0) {
      const prevStart = spans[(spanCount - 1) * 2];
      if (prevStart >= 0 && spans[(spanCount - 1) * 2 + 1] === start) {
        spans[(spanCount - 1) * 2 + 1] = end;
        return;
      }
    }

    reserve();
    spans[spanCount * 2] = start;
    spans[spanCount * 2 + 1] = end;
    spanCount++;
  }

  function addText(text: string): void {
    if (!text.length) return;
    reserve();
    injected[injectedCount] = text;
    spans[spanCount * 2] = -1;
    spans[spanCount * 2 + 1] = injectedCount;
    injectedCount++;
    spanCount++;
  }

  function clear(): void {
    spanCount = 0;
    injectedCount = 0;
    // Do not shrink backing - grow-only
  }

  function partAt(i: number): string {
    const first = spans[i * 2];
    const second = spans[i * 2 + 1];
    return first >= 0 ? source.substring(first, second) : injected[second];
  }

  function materialize(): string {
    if (spanCount === 0) return '';
    if (spanCount === 1) return partAt(0);
    if (spanCount === 2) return partAt(0) + partAt(1);

    stringParts.length = 0;
    for (let i = 0; i < spanCount; i++)
      stringParts.push(partAt(i));
    const result = stringParts.join('');
    stringParts.length = 0;
    return result;
  }

  function fillDebugState(state: SpanBufferDebugState): void {
    state.spanCount = spanCount;
    state.spanCapacity = spans.length / 2;
    state.injectedCount = injectedCount;
  }

  return {
    addSpan,
    addText,
    clear,
    materialize,
    fillDebugState,
  };
}
