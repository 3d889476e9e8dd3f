import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import Database from 'better-sqlite3';
import { ConnectivityError } from '../errors';
import { createDatabaseCollaborator, fetchRows } from '../ingest/db';
import { createCollectingChannel } from '../reporting';

let dir = '';
let dbFile = '';

beforeAll(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'integrity-db-'));
  dbFile = path.join(dir, 'records.db');
  const db = new Database(dbFile);
  db.exec('CREATE TABLE records (id INTEGER, name TEXT, score REAL)');
  const insert = db.prepare('INSERT INTO records (id, name, score) VALUES (?, ?, ?)');
  insert.run(1, 'alpha', 0.5);
  insert.run(2, null, 1.5);
  db.close();
});

afterAll(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('fetchRows', () => {
  it('reads rows from a sqlite file', async () => {
    const rows = await fetchRows({ dialect: 'sqlite', connectionString: dbFile, query: 'SELECT * FROM records ORDER BY id' });
    expect(rows).toEqual([
      { id: 1, name: 'alpha', score: 0.5 },
      { id: 2, name: null, score: 1.5 }
    ]);
  });

  it('wraps driver failures in a connectivity error', async () => {
    await expect(
      fetchRows({ dialect: 'sqlite', connectionString: path.join(dir, 'missing.db'), query: 'SELECT 1' })
    ).rejects.toBeInstanceOf(ConnectivityError);
  });
});

describe('createDatabaseCollaborator', () => {
  it('returns no rows and reports when the store is unreachable', async () => {
    const channel = createCollectingChannel();
    const collaborator = createDatabaseCollaborator({
      dialect: 'sqlite',
      connectionString: path.join(dir, 'missing.db'),
      query: 'SELECT * FROM records'
    });

    await expect(collaborator(channel)).resolves.toEqual([]);
    expect(channel.issues).toHaveLength(1);
    expect(channel.issues[0]).toMatchObject({ source: 'database', kind: 'relational-rows' });
    expect(channel.issues[0].message).toMatch(/^could not read from sqlite database: /);
  });

  it('reports a failing query the same way', async () => {
    const channel = createCollectingChannel();
    const collaborator = createDatabaseCollaborator({ dialect: 'sqlite', connectionString: dbFile, query: 'SELECT * FROM nope' });

    await expect(collaborator(channel)).resolves.toEqual([]);
    expect(channel.issues[0].message).toMatch(/no such table: nope/);
  });
});
