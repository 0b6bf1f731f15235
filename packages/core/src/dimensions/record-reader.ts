import { ValidationError } from '../shared/errors.js';
import { parseAsOfRecord } from './record-schema.js';
import type { AsOfRecord } from './types.js';

export interface MalformedLine {
  /** 1-based line number in the source. */
  line: number;
  message: string;
}

/**
 * As-of records from NDJSON lines. Blank lines are skipped. A line that is not
 * JSON, or not a record, is pushed onto `malformed` and reading carries on.
 */
export async function* readAsOfRecords(
  lines: AsyncIterable<string> | Iterable<string>,
  malformed: MalformedLine[],
): AsyncGenerator<AsOfRecord> {
  let lineNumber = 0;
  for await (const line of lines) {
    lineNumber++;
    if (line.trim() === '') continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      malformed.push({ line: lineNumber, message: `not valid JSON (${reason})` });
      continue;
    }

    let record: AsOfRecord;
    try {
      record = parseAsOfRecord(parsed);
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      malformed.push({ line: lineNumber, message: error.message });
      continue;
    }
    yield record;
  }
}
