import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { SegmentTable } from './segment-table.js';
import { DatasetFormatError, DatasetMissingError } from './dataset.errors.js';
import { isClusterId, type SegmentRecord, type TrafficCategory } from './segment.types.js';
import logger from '../utils/logger.js';

const CATEGORY_BY_LABEL = new Map<string, TrafficCategory>([
  ['low traffic', 'Low'],
  ['medium traffic', 'Medium'],
  ['high traffic', 'High'],
]);

// Number('') is 0, so empty cells are rejected before coercion
const numericCell = (column: string) => z.string().trim().min(1, `${column} is empty`);

const rowSchema = z.object({
  segment: z.string().trim().min(1, 'segment is empty'),
  cluster_id: numericCell('cluster_id').pipe(
    z.coerce.number().int().refine(isClusterId, { message: 'cluster_id must be 0, 1 or 2' })
  ),
  category: z
    .string()
    .transform((label): TrafficCategory | undefined => CATEGORY_BY_LABEL.get(label.trim().toLowerCase()))
    .refine((category): category is TrafficCategory => category !== undefined, {
      message: 'category must be Low Traffic, Medium Traffic or High Traffic',
    }),
  avg_raw_traffic: numericCell('avg_raw_traffic').pipe(z.coerce.number().finite().nonnegative()),
});

/**
 * Parse CSV text into segment records. The header row must contain
 * segment, cluster_id, category and avg_raw_traffic; extra columns are ignored.
 */
export function parseSegmentCsv(content: string, source = '<inline>'): SegmentRecord[] {
  let rows: unknown[];
  try {
    rows = parse(content, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      bom: true,
    });
  } catch (error) {
    throw new DatasetFormatError((error as Error).message, source);
  }

  return rows.map((row, index) => {
    const result = rowSchema.safeParse(row);
    if (!result.success) {
      const issue = result.error.issues[0];
      const field = issue?.path.join('.') || 'row';
      // +2: header line, then 1-based numbering
      throw new DatasetFormatError(`${field}: ${issue?.message ?? 'invalid row'}`, source, index + 2);
    }
    const { segment, cluster_id, category, avg_raw_traffic } = result.data;
    return {
      segmentId: segment,
      clusterId: cluster_id,
      category,
      avgTraffic: avg_raw_traffic,
    };
  });
}

/**
 * Load the clustered traffic CSV into a read-only table.
 * A missing file is fatal for the service.
 */
export async function loadSegmentTable(csvPath: string): Promise<SegmentTable> {
  const resolved = path.resolve(csvPath);
  if (!existsSync(resolved)) {
    throw new DatasetMissingError(resolved);
  }

  const content = await readFile(resolved, 'utf8');
  const records = parseSegmentCsv(content, resolved);

  let table: SegmentTable;
  try {
    table = new SegmentTable(records);
  } catch (error) {
    throw new DatasetFormatError((error as Error).message, resolved);
  }

  logger.info('Traffic dataset loaded', { path: resolved, segments: table.size });
  return table;
}
