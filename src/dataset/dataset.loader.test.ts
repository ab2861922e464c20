import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { loadSegmentTable, parseSegmentCsv } from './dataset.loader.js';
import { DatasetFormatError, DatasetMissingError } from './dataset.errors.js';

const HEADER = 'segment,cluster_id,category,avg_raw_traffic';

describe('parseSegmentCsv', () => {
  it('maps rows to segment records', () => {
    const records = parseSegmentCsv(`${HEADER}\nA0A1,0,Low Traffic,12.5\nB1C1,2,High Traffic,140\n`);

    expect(records).toEqual([
      { segmentId: 'A0A1', clusterId: 0, category: 'Low', avgTraffic: 12.5 },
      { segmentId: 'B1C1', clusterId: 2, category: 'High', avgTraffic: 140 },
    ]);
  });

  it('ignores extra columns, blank lines and a byte order mark', () => {
    const records = parseSegmentCsv(
      `\uFEFF${HEADER},notes\nA0B0,1,medium traffic,48.25,rush hour\n\n`
    );
    expect(records).toEqual([{ segmentId: 'A0B0', clusterId: 1, category: 'Medium', avgTraffic: 48.25 }]);
  });

  it('rejects an unknown category with its line number', () => {
    expect(() => parseSegmentCsv(`${HEADER}\nA0A1,0,Low Traffic,1\nA0B0,1,Heavy Traffic,2\n`, 'test.csv')).toThrow(
      'test.csv:3: category: category must be Low Traffic, Medium Traffic or High Traffic'
    );
  });

  it('rejects cluster ids outside 0..2', () => {
    expect(() => parseSegmentCsv(`${HEADER}\nA0A1,5,Low Traffic,1\n`, 'test.csv')).toThrow(
      'test.csv:2: cluster_id: cluster_id must be 0, 1 or 2'
    );
  });

  it('does not read an empty cluster id as cluster 0', () => {
    expect(() => parseSegmentCsv(`${HEADER}\nA0A1,,Low Traffic,1\n`, 'test.csv')).toThrow(
      'test.csv:2: cluster_id: cluster_id is empty'
    );
  });

  it('rejects negative traffic', () => {
    expect(() => parseSegmentCsv(`${HEADER}\nA0A1,0,Low Traffic,-3\n`)).toThrow(DatasetFormatError);
  });

  it('rejects a row with a missing column', () => {
    expect(() => parseSegmentCsv('segment,cluster_id,category\nA0A1,0,Low Traffic\n')).toThrow(DatasetFormatError);
  });
});

describe('loadSegmentTable', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'traffic-dataset-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads a CSV file into a table', async () => {
    const file = path.join(dir, 'clusters.csv');
    writeFileSync(file, `${HEADER}\nA0A1,0,Low Traffic,12.5\nA1B1,1,Medium Traffic,55\nB1C1,2,High Traffic,140\n`);

    const table = await loadSegmentTable(file);

    expect(table.size).toBe(3);
    expect(table.findSegment('a1b1')?.avgTraffic).toBe(55);
    expect(table.byCluster(2).map(r => r.segmentId)).toEqual(['B1C1']);
  });

  it('names the missing path', async () => {
    const missing = path.join(dir, 'nope.csv');

    await expect(loadSegmentTable(missing)).rejects.toBeInstanceOf(DatasetMissingError);
    await expect(loadSegmentTable(missing)).rejects.toThrow(`Traffic dataset not found at ${missing}`);
  });

  it('rejects duplicate segment ids', async () => {
    const file = path.join(dir, 'duplicates.csv');
    writeFileSync(file, `${HEADER}\nA0A1,0,Low Traffic,1\na0a1,0,Low Traffic,2\n`);

    await expect(loadSegmentTable(file)).rejects.toThrow(`${file}: Duplicate segment id: a0a1`);
  });
});
