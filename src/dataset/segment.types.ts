// ============================================
// Segment Types - rows of the clustered traffic dataset
// ============================================

export const CLUSTER_IDS = [0, 1, 2] as const;

export type ClusterId = (typeof CLUSTER_IDS)[number];

export const TRAFFIC_CATEGORIES = ['Low', 'Medium', 'High'] as const;

export type TrafficCategory = (typeof TRAFFIC_CATEGORIES)[number];

/**
 * Fixed mapping from cluster id to traffic level, assigned when the
 * clustering was run offline.
 */
export const CLUSTER_CATEGORY: Record<ClusterId, TrafficCategory> = {
  0: 'Low',
  1: 'Medium',
  2: 'High',
};

/**
 * One road segment with its cluster assignment and mean raw traffic.
 */
export interface SegmentRecord {
  readonly segmentId: string;
  readonly clusterId: ClusterId;
  readonly category: TrafficCategory;
  readonly avgTraffic: number;
}

export function isClusterId(value: number): value is ClusterId {
  return CLUSTER_IDS.some(id => id === value);
}

export function categoryLabel(category: TrafficCategory): string {
  return `${category} Traffic`;
}
