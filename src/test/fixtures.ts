import { SegmentTable } from '../dataset/segment-table.js';
import type { SegmentRecord } from '../dataset/segment.types.js';

export const SAMPLE_RECORDS: SegmentRecord[] = [
  { segmentId: 'A0A1', clusterId: 0, category: 'Low', avgTraffic: 10 },
  { segmentId: 'A0B0', clusterId: 0, category: 'Low', avgTraffic: 20 },
  { segmentId: 'A1A0', clusterId: 1, category: 'Medium', avgTraffic: 50 },
  { segmentId: 'A1B1', clusterId: 1, category: 'Medium', avgTraffic: 70 },
  { segmentId: 'B0B1', clusterId: 2, category: 'High', avgTraffic: 100 },
  { segmentId: 'B1C1', clusterId: 2, category: 'High', avgTraffic: 130 },
  { segmentId: 'C0C1', clusterId: 2, category: 'High', avgTraffic: 160 },
];

export function sampleTable(): SegmentTable {
  return new SegmentTable(SAMPLE_RECORDS);
}

/** Same table without any Medium / cluster 1 rows */
export function tableWithoutMedium(): SegmentTable {
  return new SegmentTable(SAMPLE_RECORDS.filter(r => r.category !== 'Medium'));
}
