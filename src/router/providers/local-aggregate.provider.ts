import type { SegmentTable } from '../../dataset/segment-table.js';
import {
  CLUSTER_CATEGORY,
  categoryLabel,
  isClusterId,
  type SegmentRecord,
} from '../../dataset/segment.types.js';
import {
  averageByCategory,
  clusterMeans,
  compareClusters,
  datasetSummary,
  formatNumber,
  NO_DATA,
  summarize,
  topSegments,
} from '../aggregates.js';
import {
  DEFAULT_QUERY_OPTIONS,
  type Answer,
  type AnswerProvider,
  type AnswerTable,
  type QueryIntent,
  type QueryOptions,
} from '../router.types.js';

export const GREETING_MESSAGE =
  "Hello! I'm your traffic data assistant. I can help you analyze road segment traffic, " +
  'explain the clusters and answer questions about traffic levels. What would you like to know?';

export const NOT_UNDERSTOOD_MESSAGE =
  "Sorry, I don't understand that question. Try asking about the highest traffic segments, " +
  'a specific cluster, or the average traffic per category.';

const SEGMENT_COLUMNS = ['segment', 'cluster_id', 'category', 'avg_traffic'];

function round2(value: number): number {
  return Number(value.toFixed(2));
}

function segmentTable(rows: readonly SegmentRecord[]): AnswerTable {
  return {
    columns: SEGMENT_COLUMNS,
    rows: rows.map(r => [r.segmentId, r.clusterId, categoryLabel(r.category), round2(r.avgTraffic)]),
  };
}

function describeSegment(r: SegmentRecord): string {
  return `${r.segmentId}: ${formatNumber(r.avgTraffic)} (${categoryLabel(r.category)}, cluster ${r.clusterId})`;
}

function clusterName(clusterId: number): string {
  return isClusterId(clusterId)
    ? `Cluster ${clusterId} (${categoryLabel(CLUSTER_CATEGORY[clusterId])})`
    : `Cluster ${clusterId}`;
}

/**
 * Answers every recognised intent from the in-memory table.
 * Pure computation: the same question always yields the same answer.
 */
export class LocalAggregateProvider implements AnswerProvider {
  readonly name = 'local';
  private readonly options: QueryOptions;

  constructor(options: Partial<QueryOptions> = {}) {
    this.options = { ...DEFAULT_QUERY_OPTIONS, ...options };
  }

  async answer(_question: string, intent: QueryIntent, table: SegmentTable): Promise<Answer> {
    return this.compute(intent, table);
  }

  compute(intent: QueryIntent, table: SegmentTable): Answer {
    switch (intent.kind) {
      case 'greeting':
        return { text: GREETING_MESSAGE, intent: intent.kind, source: 'local' };

      case 'highest_traffic':
      case 'lowest_traffic':
        return this.ranked(intent.kind, table);

      case 'cluster_summary':
        return this.clusterSummary(intent.clusterId, table, intent.reference);

      case 'category_filter': {
        const label = categoryLabel(intent.category);
        const matching = table.byCategory(intent.category);
        if (matching.length === 0) {
          return { text: `No segments are classified as ${label}.`, intent: intent.kind, source: 'local' };
        }
        const shown = matching.slice(0, this.options.maxRows);
        return {
          text: [
            `${label} segments (showing ${shown.length} of ${matching.length}):`,
            ...shown.map(r => `- ${describeSegment(r)}`),
          ].join('\n'),
          intent: intent.kind,
          source: 'local',
          table: segmentTable(shown),
        };
      }

      case 'segment_lookup': {
        const found = intent.segmentIds.flatMap(id => {
          const record = table.findSegment(id);
          return record ? [record] : [];
        });
        return {
          text: ['Segment details:', ...found.map(r => `- ${describeSegment(r)}`)].join('\n'),
          intent: intent.kind,
          source: 'local',
          table: segmentTable(found),
        };
      }

      case 'average_by_category': {
        const groups = averageByCategory(table);
        return {
          text: [
            'Average traffic by category:',
            ...groups.map(g => `- ${categoryLabel(g.category)}: ${formatNumber(g.mean)} (${g.count} segments)`),
          ].join('\n'),
          intent: intent.kind,
          source: 'local',
          table: {
            columns: ['category', 'segments', 'avg_traffic'],
            rows: groups.map(g => [categoryLabel(g.category), g.count, g.mean === null ? NO_DATA : round2(g.mean)]),
          },
        };
      }

      case 'compare': {
        const pairs = compareClusters(table);
        const lines = pairs.map(
          ({ left, right, difference }) =>
            `- ${clusterName(left.clusterId)} vs ${clusterName(right.clusterId)}: ` +
            `mean ${formatNumber(left.mean)} vs ${formatNumber(right.mean)}, ` +
            `segments ${left.count} vs ${right.count}, difference ${formatNumber(difference)}`
        );
        return {
          text: ['Cluster comparison:', ...lines].join('\n'),
          intent: intent.kind,
          source: 'local',
          table: {
            columns: ['cluster_id', 'category', 'segments', 'avg_traffic'],
            rows: clusterMeans(table).map(c => [
              c.clusterId,
              categoryLabel(CLUSTER_CATEGORY[c.clusterId]),
              c.count,
              c.mean === null ? NO_DATA : round2(c.mean),
            ]),
          },
        };
      }

      case 'overview':
        return {
          text: `Dataset overview:\n${datasetSummary(table)}`,
          intent: intent.kind,
          source: 'local',
        };

      case 'unknown':
        return { text: NOT_UNDERSTOOD_MESSAGE, intent: intent.kind, source: 'fallback' };
    }
  }

  private ranked(kind: 'highest_traffic' | 'lowest_traffic', table: SegmentTable): Answer {
    if (table.size === 0) {
      return { text: 'The dataset has no segments.', intent: kind, source: 'local' };
    }
    const order = kind === 'highest_traffic' ? 'desc' : 'asc';
    const rows = topSegments(table.rows, this.options.topK, order);
    const heading = `Top ${rows.length} ${kind === 'highest_traffic' ? 'highest' : 'lowest'} traffic segments:`;
    return {
      text: [heading, ...rows.map((r, i) => `${i + 1}. ${describeSegment(r)}`)].join('\n'),
      intent: kind,
      source: 'local',
      table: segmentTable(rows),
    };
  }

  private clusterSummary(clusterId: number, table: SegmentTable, reference = String(clusterId)): Answer {
    if (!isClusterId(clusterId)) {
      return {
        text:
          `There is no cluster ${reference}. Valid clusters are 0 (Low Traffic), ` +
          '1 (Medium Traffic) and 2 (High Traffic).',
        intent: 'cluster_summary',
        source: 'local',
      };
    }

    const rows = table.byCluster(clusterId);
    const stats = summarize(rows);
    if (!stats) {
      return { text: `${clusterName(clusterId)} has no data.`, intent: 'cluster_summary', source: 'local' };
    }

    const shown = topSegments(rows, this.options.maxRows, 'desc');
    return {
      text: [
        `Cluster ${clusterId} corresponds to ${categoryLabel(CLUSTER_CATEGORY[clusterId])}.`,
        `Segments: ${stats.count}`,
        `Average traffic: ${formatNumber(stats.mean)}`,
        `Min traffic: ${formatNumber(stats.min)}`,
        `Max traffic: ${formatNumber(stats.max)}`,
      ].join('\n'),
      intent: 'cluster_summary',
      source: 'local',
      table: segmentTable(shown),
    };
  }
}
