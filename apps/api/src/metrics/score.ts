import type { Metrics, Row, Table } from '../types/table';
import { isNull, isTruthy } from '../utils/scalar';

export const VALID_COLUMN = 'valid';

const COMPLETENESS_WEIGHT = 0.6;
const CONSISTENCY_WEIGHT = 0.4;
// stand-in validity rate used when the table carries no "valid" column
const ASSUMED_VALID_RATIO = 0.9;

const EMPTY_METRICS: Metrics = Object.freeze({
  completeness: 0,
  consistency: 0,
  overallIntegrity: 0,
  validRecords: 0,
  invalidRecords: 0
});

const TIE = '5'.padEnd(28, '0');

/**
 * Rounds to two decimals, ties to even, judged on the exact binary value:
 * 3.125 becomes 3.12, while 2.675 (stored as 2.67499...) becomes 2.67.
 */
export const round2 = (value: number) => {
  // toFixed expands the double exactly, so a tie is a literal 5 followed by zeros
  const [whole, fraction] = Math.abs(value).toFixed(30).split('.');
  const kept = Number(whole + fraction.slice(0, 2));
  const rest = fraction.slice(2);
  const rounded = rest > TIE || (rest === TIE && kept % 2 === 1) ? kept + 1 : kept;
  return (Math.sign(value) * rounded) / 100 || 0;
};

const rowKey = (row: Row, columns: string[]) => JSON.stringify(columns.map(column => row[column] ?? null));

export const completenessRatio = (table: Table) => {
  const { columns, rows } = table;
  if (!rows.length || !columns.length) return 0;
  const perColumn = columns.map(column => rows.filter(row => !isNull(row[column])).length / rows.length);
  return perColumn.reduce((sum, ratio) => sum + ratio, 0) / columns.length;
};

/** Rows equal in every column to an earlier row. */
export const countDuplicateRows = (table: Table) => {
  const seen = new Set<string>();
  let duplicates = 0;
  for (const row of table.rows) {
    const key = rowKey(row, table.columns);
    if (seen.has(key)) duplicates += 1;
    else seen.add(key);
  }
  return duplicates;
};

export const countValidRecords = (table: Table) => {
  if (!table.columns.includes(VALID_COLUMN)) return Math.floor(ASSUMED_VALID_RATIO * table.rows.length);
  return table.rows.filter(row => isTruthy(row[VALID_COLUMN])).length;
};

export const score = (table: Table): Metrics => {
  const total = table.rows.length;
  if (total === 0) return EMPTY_METRICS;

  const completeness = completenessRatio(table) * 100;
  const consistency = 100 - (countDuplicateRows(table) / total) * 100;
  const overallIntegrity = COMPLETENESS_WEIGHT * completeness + CONSISTENCY_WEIGHT * consistency;
  const validRecords = countValidRecords(table);

  return Object.freeze({
    completeness: round2(completeness),
    consistency: round2(consistency),
    overallIntegrity: round2(overallIntegrity),
    validRecords,
    invalidRecords: total - validRecords
  });
};
