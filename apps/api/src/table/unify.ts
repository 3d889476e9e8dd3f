import type { Row, Table } from '../types/table';

/**
 * Concatenates tables into one. Columns are the union of every input's
 * columns in first-seen order; a row gets null for any column its table lacks.
 */
export const unify = (tables: Table[]): Table => {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const table of tables) {
    for (const column of table.columns) {
      if (seen.has(column)) continue;
      seen.add(column);
      columns.push(column);
    }
  }

  const rows: Row[] = [];
  for (const table of tables) {
    const present = new Set(table.columns);
    for (const source of table.rows) {
      const row: Row = {};
      for (const column of columns) {
        const value = present.has(column) ? source[column] : null;
        row[column] = value === undefined ? null : value;
      }
      rows.push(row);
    }
  }

  return { columns, rows };
};
