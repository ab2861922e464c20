import type { SegmentRecord, TrafficCategory } from './segment.types.js';

/**
 * Read-only in-memory table of segments. Built once at startup and passed
 * by reference to everything that answers questions.
 */
export class SegmentTable {
  readonly rows: readonly SegmentRecord[];
  private readonly bySegmentId: ReadonlyMap<string, SegmentRecord>;

  constructor(records: Iterable<SegmentRecord>) {
    const rows: SegmentRecord[] = [];
    const index = new Map<string, SegmentRecord>();

    for (const record of records) {
      const key = record.segmentId.toLowerCase();
      if (index.has(key)) {
        throw new Error(`Duplicate segment id: ${record.segmentId}`);
      }
      const frozen = Object.freeze({ ...record });
      index.set(key, frozen);
      rows.push(frozen);
    }

    this.rows = Object.freeze(rows);
    this.bySegmentId = index;
  }

  get size(): number {
    return this.rows.length;
  }

  findSegment(segmentId: string): SegmentRecord | undefined {
    return this.bySegmentId.get(segmentId.toLowerCase());
  }

  segmentIds(): string[] {
    return this.rows.map(r => r.segmentId);
  }

  byCluster(clusterId: number): SegmentRecord[] {
    return this.rows.filter(r => r.clusterId === clusterId);
  }

  byCategory(category: TrafficCategory): SegmentRecord[] {
    return this.rows.filter(r => r.category === category);
  }
}
