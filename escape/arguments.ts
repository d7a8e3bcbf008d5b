import { InvalidArgumentError } from './errors.js';
import type { TextSink } from './output/text-output.js';

/**
 * Checks that `value` is a member of a numeric enum, reporting it under `name`.
 */
export function checkEnumArgument<T extends number>(
  caller: string,
  name: string,
  value: T | null | undefined,
  enumObject: Record<number, string>): T {
  if (value === null || value === undefined)
    throw new InvalidArgumentError(`${caller}: '${name}' argument cannot be ${value}`);
  if (enumObject[value] === undefined)
    throw new InvalidArgumentError(`${caller}: '${name}' argument has unknown value ${value}`);
  return value;
}

export function checkSink(caller: string, sink: TextSink | null | undefined): TextSink {
  if (!sink)
    throw new InvalidArgumentError(`${caller}: 'sink' argument cannot be ${sink}`);
  return sink;
}

/**
 * Checks a slice of a text of length `textLength`.
 */
export function checkBounds(caller: string, textLength: number, offset: number, length: number): void {
  if (!Number.isInteger(offset) || offset < 0 || offset > textLength)
    throw new InvalidArgumentError(
      `${caller}: invalid (offset, length) values: offset is ${offset}, length is ${length}, text length is ${textLength}`);
  if (!Number.isInteger(length) || length < 0 || offset + length > textLength)
    throw new InvalidArgumentError(
      `${caller}: invalid (offset, length) values: offset is ${offset}, length is ${length}, text length is ${textLength}`);
}
