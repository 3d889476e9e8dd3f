import * as XLSX from 'xlsx';
import { FormatError, describeError } from '../errors';
import type { Row, Table } from '../types/table';
import { toScalar, uniqueNames } from '../utils/scalar';

const KIND = 'spreadsheet' as const;

const ZIP_SIGNATURE = [0x50, 0x4b, 0x03, 0x04];
const OLE_SIGNATURE = [0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1];

export type WorkbookFormat = 'xlsx' | 'xls' | 'any';

const hasSignature = (bytes: Uint8Array, signature: number[]) =>
  bytes.length >= signature.length && signature.every((byte, i) => bytes[i] === byte);

const matchesFormat = (bytes: Uint8Array, format: WorkbookFormat) => {
  if (format === 'xlsx') return hasSignature(bytes, ZIP_SIGNATURE);
  if (format === 'xls') return hasSignature(bytes, OLE_SIGNATURE);
  return hasSignature(bytes, ZIP_SIGNATURE) || hasSignature(bytes, OLE_SIGNATURE);
};

const headerName = (cell: unknown) => {
  const value = toScalar(cell);
  return value === null ? '' : String(value);
};

const readWorkbook = (bytes: Uint8Array, name: string) => {
  try {
    return XLSX.read(Buffer.from(bytes), { type: 'buffer', cellDates: true });
  } catch (err) {
    throw new FormatError(KIND, name, describeError(err), { cause: err });
  }
};

/** Reads the first worksheet; its first row names the columns. */
export const parseSpreadsheet = (bytes: Uint8Array, name: string, format: WorkbookFormat = 'any'): Table => {
  if (!matchesFormat(bytes, format)) {
    throw new FormatError(KIND, name, `not a ${format === 'any' ? 'workbook' : `.${format} workbook`}`);
  }

  const workbook = readWorkbook(bytes, name);
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) throw new FormatError(KIND, name, 'workbook has no worksheets');

  const grid = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: null,
    blankrows: false,
    raw: true
  });
  if (!grid.length) return { columns: [], rows: [] };

  const [header, ...records] = grid;
  const width = grid.reduce((max, cells) => Math.max(max, cells.length), 0);
  const names = Array.from({ length: width }, (_, i) => (i < header.length ? headerName(header[i]) : ''));
  const columns = uniqueNames(names);

  const rows = records.map(cells => {
    const row: Row = {};
    columns.forEach((column, i) => {
      row[column] = toScalar(cells[i]);
    });
    return row;
  });

  return { columns, rows };
};
