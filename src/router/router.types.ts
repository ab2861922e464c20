/**
 * Query Router Types
 *
 * A question is classified into exactly one intent by an ordered rule
 * table, then answered by the provider responsible for that intent.
 */

import type { TrafficCategory } from '../dataset/segment.types.js';
import type { SegmentTable } from '../dataset/segment-table.js';

export type QueryIntent =
  | { kind: 'greeting' }
  | { kind: 'highest_traffic' }
  | { kind: 'lowest_traffic' }
  | { kind: 'cluster_summary'; clusterId: number; reference?: string }
  | { kind: 'category_filter'; category: TrafficCategory }
  | { kind: 'segment_lookup'; segmentIds: string[] }
  | { kind: 'compare' }
  | { kind: 'average_by_category' }
  | { kind: 'overview' }
  | { kind: 'unknown' };

export type IntentKind = QueryIntent['kind'];

/**
 * One entry of the rule table. `match` receives the normalized question and
 * returns an intent when the rule applies.
 */
export interface IntentRule {
  name: string;
  match: (text: string, table: SegmentTable) => QueryIntent | null;
}

export interface ClassificationResult {
  intent: QueryIntent;

  /** Name of the rule that fired, undefined when nothing matched */
  rule?: string;
}

export type AnswerSource = 'local' | 'remote' | 'fallback';

/**
 * Small supporting table rendered next to the answer text.
 */
export interface AnswerTable {
  columns: string[];
  rows: Array<Array<string | number>>;
}

export interface Answer {
  text: string;
  intent: IntentKind;
  source: AnswerSource;
  table?: AnswerTable;
}

/**
 * Something that can turn a classified question into an answer.
 * Implementations must not throw for expected failures.
 */
export interface AnswerProvider {
  readonly name: string;
  answer(question: string, intent: QueryIntent, table: SegmentTable): Promise<Answer>;
}

export interface QueryOptions {
  /** Rows returned for highest/lowest questions */
  topK: number;

  /** Display limit for category listings */
  maxRows: number;
}

export const DEFAULT_QUERY_OPTIONS: QueryOptions = {
  topK: 5,
  maxRows: 10,
};
