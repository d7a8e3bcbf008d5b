import { createSpanBuffer } from './span-buffer.js';

/**
 * Destination of the streaming variants. A Node `Writable` fits, as does
 * any object collecting chunks.
 */
export interface TextSink {
  write(chunk: string): unknown;
}

/** What the escape and unescape loops write into. */
export interface EscapeOutput {
  /** Copy `source[start, end)` unchanged. */
  addSpan(start: number, end: number): void;
  /** Emit a replacement. */
  addText(text: string): void;
}

export interface TransformResult {
  text: string;
  /** False when the output equals the input and `text` is the input itself. */
  changed: boolean;
}

export interface SinkOutput extends EscapeOutput {
  /** Writes the pending source span, if any. */
  flush(): void;
}

/**
 * Output forwarding to a sink. Adjacent source spans are coalesced into
 * one write.
 */
export function createSinkOutput(source: string, sink: TextSink): SinkOutput {
  let pendingStart = -1;
  let pendingEnd = -1;

  function flush(): void {
    if (pendingStart < 0) return;
    sink.write(source.substring(pendingStart, pendingEnd));
    pendingStart = pendingEnd = -1;
  }

  function addSpan(start: number, end: number): void {
    if (end <= start) return;
    if (pendingStart >= 0 && pendingEnd === start) {
      pendingEnd = end;
      return;
    }
    flush();
    pendingStart = start;
    pendingEnd = end;
  }

  function addText(text: string): void {
    if (!text.length) return;
    flush();
    sink.write(text);
  }

  return { addSpan, addText, flush };
}

/**
 * Runs `transform` over `text[start, end)` into a span buffer and returns the
 * input itself when nothing was replaced.
 */
export function transformToString(
  text: string,
  start: number,
  end: number,
  transform: (output: EscapeOutput) => boolean): TransformResult {
  const buffer = createSpanBuffer({ source: text });
  const changed = transform(buffer);
  if (!changed) {
    const unchanged = start === 0 && end === text.length ? text : text.substring(start, end);
    return { text: unchanged, changed: false };
  }
  return { text: buffer.materialize(), changed: true };
}

/** Runs `transform` over `text[start, end)` straight into `sink`. */
export function transformToSink(
  text: string,
  sink: TextSink,
  transform: (output: EscapeOutput) => boolean): void {
  const output = createSinkOutput(text, sink);
  transform(output);
  output.flush();
}

/** Collects written chunks in memory. */
export function createStringSink(): TextSink & { toString(): string } {
  const chunks: string[] = [];
  return {
    write(chunk: string) {
      chunks.push(chunk);
      return true;
    },
    toString() {
      return chunks.join('');
    },
  };
}
