import { readFileSync } from 'fs';
import { z } from 'zod';

import { ReferenceTableError } from '../errors.js';
import type { ReferenceRecord } from './reference-table.js';

const referenceRecordSchema = z.object({
  codepoints: z.array(z.number().int().min(0).max(0x10FFFF)).min(1).max(2),
  names: z.array(z.string().min(2)).min(1),
});

const referenceDataSchema = z.array(referenceRecordSchema).min(1);

export type ReferenceDataSet = 'html4' | 'html5';

/**
 * Parses and validates reference data in the `[{ codepoints, names }]` shape.
 * `source` only names the data in error messages.
 */
export function parseReferenceData(json: string, source: string): ReferenceRecord[] {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new ReferenceTableError(`ReferenceData: ${source} is not valid JSON`, { cause: error });
  }

  const parsed = referenceDataSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ReferenceTableError(
      `ReferenceData: ${source} is malformed at [${issue.path.join('.')}]: ${issue.message}`,
      { cause: parsed.error });
  }
  return parsed.data;
}

/** Reads one of the bundled reference data files. */
export function loadReferenceData(dataSet: ReferenceDataSet): ReferenceRecord[] {
  const url = new URL(`./data/${dataSet}.json`, import.meta.url);
  let json: string;
  try {
    json = readFileSync(url, 'utf8');
  } catch (error) {
    throw new ReferenceTableError(`ReferenceData: cannot read ${dataSet}.json`, { cause: error });
  }
  return parseReferenceData(json, `${dataSet}.json`);
}
