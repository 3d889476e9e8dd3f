import { describe, it, expect, vi } from 'vitest';
import * as XLSX from 'xlsx';
import { dispatch } from '../ingest/dispatch';
import { run, runPipeline } from '../pipeline';
import { createCollectingChannel } from '../reporting';
import { unify } from '../table/unify';

const csv = (text: string, name: string) => ({ bytes: Buffer.from(text), name });

const workbook = (data: unknown[][], name: string) => {
  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet(data), 'Sheet1');
  return { bytes: Buffer.from(XLSX.write(wb, { type: 'buffer', bookType: 'xlsx' })), name };
};

describe('delimited and spreadsheet sources together', () => {
  const sources = () => [
    csv('a,b\n1,2\n3,', 'left.csv'),
    workbook(
      [
        ['b', 'c'],
        [4, 'x'],
        [5, null]
      ],
      'right.xlsx'
    )
  ];

  it('aligns columns by name and pads with nulls', async () => {
    const channel = createCollectingChannel();
    const unified = unify(await dispatch(sources(), { channel }));

    expect(channel.issues).toEqual([]);
    expect(unified.columns).toEqual(['a', 'b', 'c']);
    expect(unified.rows).toEqual([
      { a: '1', b: '2', c: null },
      { a: '3', b: null, c: null },
      { a: null, b: 4, c: 'x' },
      { a: null, b: 5, c: null }
    ]);
  });

  it('scores the combined table', async () => {
    const result = await runPipeline(sources(), { channel: createCollectingChannel() });
    expect(result.columns).toEqual(['a', 'b', 'c']);
    expect(result.rowCount).toBe(4);
    expect(result.metrics).toEqual({
      completeness: 50,
      consistency: 100,
      overallIntegrity: 70,
      validRecords: 3,
      invalidRecords: 1
    });
  });
});

describe('run', () => {
  it('returns all zeros when there is nothing to ingest', async () => {
    const metrics = await run([], { channel: createCollectingChannel() });
    expect(metrics).toEqual({ completeness: 0, consistency: 0, overallIntegrity: 0, validRecords: 0, invalidRecords: 0 });
  });

  it('scores a delimited source end to end', async () => {
    const metrics = await run([csv('a,b\n1,2\n1,', 'scenario.csv')]);
    expect(metrics.completeness).toBe(75);
    expect(metrics.validRecords + metrics.invalidRecords).toBe(2);
  });

  it('does not query the database unless asked', async () => {
    const database = vi.fn(async () => [{ id: 1 }]);
    const result = await runPipeline([csv('id\n2', 'ids.csv')], { database });
    expect(database).not.toHaveBeenCalled();
    expect(result.rowCount).toBe(1);
  });

  it('puts database rows ahead of uploaded sources', async () => {
    const channel = createCollectingChannel();
    const result = await runPipeline([csv('id,name\n2,Ann', 'people.csv')], {
      includeDatabase: true,
      database: async () => [{ id: 1, valid: true }],
      channel
    });

    expect(result.columns).toEqual(['id', 'valid', 'name']);
    expect(result.rowCount).toBe(2);
    expect(result.metrics).toEqual({
      completeness: 66.67,
      consistency: 100,
      overallIntegrity: 80,
      validRecords: 1,
      invalidRecords: 1
    });
    expect(channel.issues).toEqual([]);
  });

  it('reports a missing database and carries on', async () => {
    const channel = createCollectingChannel();
    const result = await runPipeline([csv('id\n1', 'ids.csv')], { includeDatabase: true, channel });
    expect(result.rowCount).toBe(1);
    expect(channel.issues).toEqual([{ source: 'database', kind: 'relational-rows', message: 'no database configured' }]);
  });

  it('reports a collaborator that throws and carries on', async () => {
    const channel = createCollectingChannel();
    const result = await runPipeline([], {
      includeDatabase: true,
      database: async () => {
        throw new Error('connection refused');
      },
      channel
    });
    expect(result.rowCount).toBe(0);
    expect(channel.issues).toEqual([{ source: 'database', kind: 'relational-rows', message: 'connection refused' }]);
  });

  it('skips failed sources without aborting the run', async () => {
    const channel = createCollectingChannel();
    const result = await runPipeline([csv('a,b\n1,2,3', 'wide.csv'), csv('a\n1\n1', 'ok.csv')], { channel });
    expect(result.rowCount).toBe(2);
    expect(result.metrics.consistency).toBe(50);
    expect(channel.issues).toHaveLength(1);
    expect(channel.issues[0].source).toBe('wide.csv');
  });
});
