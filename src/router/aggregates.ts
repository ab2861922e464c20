import type { SegmentTable } from '../dataset/segment-table.js';
import {
  CLUSTER_CATEGORY,
  CLUSTER_IDS,
  TRAFFIC_CATEGORIES,
  categoryLabel,
  type ClusterId,
  type SegmentRecord,
  type TrafficCategory,
} from '../dataset/segment.types.js';

export const NO_DATA = 'no data';

export interface TrafficStats {
  count: number;
  mean: number;
  min: number;
  max: number;
}

export interface GroupMean {
  count: number;
  /** null when the group is empty */
  mean: number | null;
}

export interface CategoryMean extends GroupMean {
  category: TrafficCategory;
}

export interface ClusterMean extends GroupMean {
  clusterId: ClusterId;
}

export interface ClusterComparison {
  left: ClusterMean;
  right: ClusterMean;
  /** right.mean - left.mean, null if either side is empty */
  difference: number | null;
}

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function summarize(rows: readonly SegmentRecord[]): TrafficStats | null {
  if (rows.length === 0) return null;
  // Single pass, no spread into Math.min/max
  let sum = 0;
  let min = Infinity;
  let max = -Infinity;
  for (const { avgTraffic } of rows) {
    sum += avgTraffic;
    if (avgTraffic < min) min = avgTraffic;
    if (avgTraffic > max) max = avgTraffic;
  }
  return { count: rows.length, mean: sum / rows.length, min, max };
}

/**
 * Top K rows by avgTraffic. Ties are broken by segment id so the
 * ordering is stable across calls.
 */
export function topSegments(
  rows: readonly SegmentRecord[],
  k: number,
  order: 'desc' | 'asc'
): SegmentRecord[] {
  const direction = order === 'desc' ? -1 : 1;
  return [...rows]
    .sort((a, b) =>
      a.avgTraffic !== b.avgTraffic
        ? direction * (a.avgTraffic - b.avgTraffic)
        : a.segmentId.localeCompare(b.segmentId)
    )
    .slice(0, Math.max(0, k));
}

function groupMean(rows: readonly SegmentRecord[]): GroupMean {
  return { count: rows.length, mean: mean(rows.map(r => r.avgTraffic)) };
}

/**
 * Mean per category. Always reports Low, Medium and High, in that order.
 */
export function averageByCategory(table: SegmentTable): CategoryMean[] {
  return TRAFFIC_CATEGORIES.map(category => ({
    category,
    ...groupMean(table.byCategory(category)),
  }));
}

export function clusterMeans(table: SegmentTable): ClusterMean[] {
  return CLUSTER_IDS.map(clusterId => ({
    clusterId,
    ...groupMean(table.byCluster(clusterId)),
  }));
}

/**
 * Every unordered pair of clusters: (0,1), (0,2), (1,2).
 */
export function compareClusters(table: SegmentTable): ClusterComparison[] {
  const means = clusterMeans(table);
  const pairs: ClusterComparison[] = [];
  for (let i = 0; i < means.length; i++) {
    for (let j = i + 1; j < means.length; j++) {
      const left = means[i];
      const right = means[j];
      pairs.push({
        left,
        right,
        difference: left.mean === null || right.mean === null ? null : right.mean - left.mean,
      });
    }
  }
  return pairs;
}

export function formatNumber(value: number | null): string {
  return value === null ? NO_DATA : value.toFixed(2);
}

/**
 * Compact text description of the dataset, used as grounding context for
 * the generative fallback and for overview answers.
 */
export function datasetSummary(table: SegmentTable): string {
  const categoryCounts = TRAFFIC_CATEGORIES.map(
    category => `${categoryLabel(category)}: ${table.byCategory(category).length}`
  ).join(', ');

  const clusterLines = clusterMeans(table).map(
    c =>
      `Cluster ${c.clusterId} (${categoryLabel(CLUSTER_CATEGORY[c.clusterId])}): ` +
      `${c.count} segments, avg traffic ${formatNumber(c.mean)}`
  );

  const topLines = topSegments(table.rows, 5, 'desc').map(
    r => `${r.segmentId}: ${formatNumber(r.avgTraffic)} (${categoryLabel(r.category)}, cluster ${r.clusterId})`
  );

  return [
    `Total segments: ${table.size}`,
    `Segments per category: ${categoryCounts}`,
    ...clusterLines,
    'Top 5 highest traffic segments:',
    ...topLines,
  ].join('\n');
}
