import Papa from 'papaparse';
import { FormatError } from '../errors';
import type { Row, Table } from '../types/table';
import { uniqueNames } from '../utils/scalar';
import { decodeUtf8 } from '../utils/text';

const KIND = 'delimited-text' as const;

export const DEFAULT_DELIMITER = ',';

export type DelimitedOptions = {
  delimiter?: string;
};

export const parseDelimited = (bytes: Uint8Array, name: string, options: DelimitedOptions = {}): Table => {
  const text = decodeUtf8(bytes, KIND, name);
  const parsed = Papa.parse<string[]>(text, {
    header: false,
    delimiter: options.delimiter || DEFAULT_DELIMITER,
    skipEmptyLines: true,
    dynamicTyping: false
  });

  if (parsed.errors.length) {
    throw new FormatError(KIND, name, parsed.errors[0].message);
  }

  const [header, ...records] = parsed.data;
  if (!header) throw new FormatError(KIND, name, 'missing header line');

  const columns = uniqueNames(header);
  const rows = records.map((fields, index) => {
    if (fields.length > columns.length) {
      throw new FormatError(
        KIND,
        name,
        `record ${index + 1} has ${fields.length} fields but the header has ${columns.length}`
      );
    }
    const row: Row = {};
    columns.forEach((column, i) => {
      const value = fields[i];
      row[column] = value === undefined || value === '' ? null : value;
    });
    return row;
  });

  return { columns, rows };
};
