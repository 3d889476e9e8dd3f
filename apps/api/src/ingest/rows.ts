import { FormatError, describeError } from '../errors';
import type { Row, Table } from '../types/table';
import { isRecord, toScalar } from '../utils/scalar';
import { decodeUtf8 } from '../utils/text';

const KIND = 'relational-rows' as const;

/** Wraps already-materialized row mappings; rows may be ragged until unified. */
export const tableFromRows = (records: Record<string, unknown>[]): Table => {
  const columns: string[] = [];
  const seen = new Set<string>();

  const rows = records.map(record => {
    const row: Row = {};
    for (const [key, value] of Object.entries(record)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
      row[key] = toScalar(value);
    }
    return row;
  });

  return { columns, rows };
};

/** Row mappings that arrive serialized, e.g. a query result exported as a JSON array. */
export const parseJsonRows = (bytes: Uint8Array, name: string): Table => {
  const text = decodeUtf8(bytes, KIND, name);
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new FormatError(KIND, name, describeError(err), { cause: err });
  }
  if (!Array.isArray(parsed)) throw new FormatError(KIND, name, 'expected a JSON array of rows');
  const records = parsed.filter(isRecord);
  if (records.length !== parsed.length) {
    throw new FormatError(KIND, name, 'each row must be a JSON object');
  }
  return tableFromRows(records);
};
