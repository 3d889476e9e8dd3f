import pg from 'pg';
import mysql, { type RowDataPacket } from 'mysql2/promise';
import Database from 'better-sqlite3';
import { ConnectivityError, describeError } from '../errors';
import type { ErrorChannel } from '../reporting';
import type { Row } from '../types/table';
import { isRecord, toScalar } from '../utils/scalar';

export type DatabaseDialect = 'mysql' | 'postgres' | 'sqlite';

export type DatabaseConfig = {
  dialect: DatabaseDialect;
  connectionString: string; // file path for sqlite
  query: string;
};

/** Supplies the relational rows for a run; failures go to the channel, never to the caller. */
export type RelationalCollaborator = (channel: ErrorChannel) => Promise<Row[]>;

export const DATABASE_SOURCE = 'database';

const toRow = (record: Record<string, unknown>): Row => {
  const row: Row = {};
  for (const [key, value] of Object.entries(record)) row[key] = toScalar(value);
  return row;
};

const queryMySQL = async (connectionString: string, query: string) => {
  const conn = await mysql.createConnection(connectionString);
  try {
    const [rows] = await conn.query<RowDataPacket[]>(query);
    return rows.map(row => ({ ...row }));
  } finally {
    await conn.end();
  }
};

const queryPostgres = async (connectionString: string, query: string) => {
  const client = new pg.Client({ connectionString });
  await client.connect();
  try {
    const result = await client.query<Record<string, unknown>>(query);
    return result.rows;
  } finally {
    await client.end();
  }
};

const querySQLite = async (filePath: string, query: string) => {
  const db = new Database(filePath, { readonly: true, fileMustExist: true });
  try {
    return db.prepare(query).all().filter(isRecord);
  } finally {
    db.close();
  }
};

export const fetchRows = async ({ dialect, connectionString, query }: DatabaseConfig): Promise<Row[]> => {
  try {
    let records: Record<string, unknown>[] = [];
    if (dialect === 'mysql') records = await queryMySQL(connectionString, query);
    if (dialect === 'postgres') records = await queryPostgres(connectionString, query);
    if (dialect === 'sqlite') records = await querySQLite(connectionString, query);
    return records.map(toRow);
  } catch (err) {
    throw new ConnectivityError(dialect, err);
  }
};

export const createDatabaseCollaborator = (config: DatabaseConfig): RelationalCollaborator => {
  return async channel => {
    try {
      return await fetchRows(config);
    } catch (err) {
      channel.report({ source: DATABASE_SOURCE, kind: 'relational-rows', message: describeError(err) });
      return [];
    }
  };
};
