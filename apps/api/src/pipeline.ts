import { describeError } from './errors';
import { DATABASE_SOURCE, type RelationalCollaborator } from './ingest/db';
import { dispatch, type DispatchOptions } from './ingest/dispatch';
import { tableFromRows } from './ingest/rows';
import { score } from './metrics/score';
import { consoleChannel, type ErrorChannel } from './reporting';
import { unify } from './table/unify';
import type { Metrics, Row, Source, Table } from './types/table';

export type RunOptions = DispatchOptions & {
  includeDatabase?: boolean;
  database?: RelationalCollaborator;
};

export type PipelineResult = {
  metrics: Metrics;
  rowCount: number;
  columns: string[];
};

const loadDatabaseRows = async (channel: ErrorChannel, database?: RelationalCollaborator): Promise<Row[]> => {
  if (!database) {
    channel.report({ source: DATABASE_SOURCE, kind: 'relational-rows', message: 'no database configured' });
    return [];
  }
  try {
    return await database(channel);
  } catch (err) {
    channel.report({ source: DATABASE_SOURCE, kind: 'relational-rows', message: describeError(err) });
    return [];
  }
};

export const runPipeline = async (sources: Source[], options: RunOptions = {}): Promise<PipelineResult> => {
  const channel = options.channel ?? consoleChannel;
  const tables: Table[] = [];

  if (options.includeDatabase) {
    const rows = await loadDatabaseRows(channel, options.database);
    if (rows.length) tables.push(tableFromRows(rows));
  }
  tables.push(...(await dispatch(sources, { ...options, channel })));

  const unified = unify(tables);
  return {
    metrics: score(unified),
    rowCount: unified.rows.length,
    columns: unified.columns
  };
};

/** Ingests the sources (plus the database rows when asked) and scores the combined table. */
export const run = async (sources: Source[], options: RunOptions = {}): Promise<Metrics> =>
  (await runPipeline(sources, options)).metrics;
