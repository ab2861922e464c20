/**
 * Intent Classification
 *
 * An ordered rule table. Each rule inspects the normalized question and
 * either returns an intent or passes. The first rule that returns an intent
 * wins, so declaration order is the priority order.
 *
 * | #  | Rule                | Fires on                                   |
 * |----|---------------------|--------------------------------------------|
 * | 1  | greeting            | the whole message is a greeting            |
 * | 2  | compare             | compare / comparison / versus / vs         |
 * | 3  | cluster_summary     | "cluster" followed by a number             |
 * | 4  | segment_lookup      | a known segment id is mentioned            |
 * | 5  | average_by_category | average/mean with category, level or       |
 * |    |                     | low / medium / high                        |
 * | 6  | average_by_cluster  | average/mean with cluster(s) -> compare    |
 * | 7  | highest_traffic     | highest / busiest / top ...                |
 * | 8  | lowest_traffic      | lowest / quietest / least ...              |
 * | 9  | category_filter     | low / medium / high traffic                |
 * | 10 | overview            | overview / summary / clusters / dataset    |
 *
 * Nothing matched -> unknown.
 */

import type { ClassificationResult, IntentRule, QueryIntent } from '../router.types.js';
import type { SegmentTable } from '../../dataset/segment-table.js';
import type { TrafficCategory } from '../../dataset/segment.types.js';

const GREETING_PATTERN = /^(hi|hello|hey|howdy|greetings|good\s+(morning|afternoon|evening))(\s+there)?$/;
const COMPARE_PATTERN = /\b(compare|comparing|comparison|versus|vs|difference\s+between)\b/;
const CLUSTER_NUMBER_PATTERN = /\bcluster\s*(?:#|no\.?|number)?\s*(-?\d+(?:\.\d+)?)(?!\d)/;
const CLUSTER_WORD_PATTERN = /\bclusters?\b/;
const AVERAGE_PATTERN = /\b(average|mean|avg)\b/;
const CATEGORY_WORD_PATTERN = /\b(categor(y|ies)|levels?|low|medium|high)\b/;
const HIGHEST_PATTERN = /\b(highest|busiest|heaviest|top|most\s+(traffic|congested|busy))\b/;
const LOWEST_PATTERN = /\b(lowest|quietest|lightest|least\s+(traffic|congested|busy))\b/;
const CATEGORY_FILTER_PATTERN = /\b(low|medium|high)[\s-]+traffic\b/;
const OVERVIEW_PATTERN = /\b(overview|summary|summari[sz]e|clusters|dataset)\b/;

const CATEGORY_BY_WORD: Record<string, TrafficCategory> = {
  low: 'Low',
  medium: 'Medium',
  high: 'High',
};

/**
 * Normalize text for matching
 */
export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .trim()
    .replace(/[.,!?]+$/g, '') // Remove trailing punctuation
    .replace(/\s+/g, ' '); // Normalize whitespace
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function mentionedSegments(text: string, table: SegmentTable): string[] {
  return table.segmentIds().filter((id) =>
    new RegExp(`(^|[^a-z0-9])${escapeRegExp(id.toLowerCase())}($|[^a-z0-9])`).test(text)
  );
}

function when(pattern: RegExp, intent: QueryIntent): IntentRule['match'] {
  return (text) => (pattern.test(text) ? intent : null);
}

export const INTENT_RULES: readonly IntentRule[] = [
  { name: 'greeting', match: when(GREETING_PATTERN, { kind: 'greeting' }) },
  { name: 'compare', match: when(COMPARE_PATTERN, { kind: 'compare' }) },
  {
    name: 'cluster_summary',
    match: (text) => {
      const found = CLUSTER_NUMBER_PATTERN.exec(text);
      // Number() keeps fractions so "cluster 1.5" is not read as cluster 1
      return found ? { kind: 'cluster_summary', clusterId: Number(found[1]), reference: found[1] } : null;
    },
  },
  {
    name: 'segment_lookup',
    match: (text, table) => {
      const segmentIds = mentionedSegments(text, table);
      return segmentIds.length > 0 ? { kind: 'segment_lookup', segmentIds } : null;
    },
  },
  {
    name: 'average_by_category',
    match: (text) =>
      AVERAGE_PATTERN.test(text) && CATEGORY_WORD_PATTERN.test(text)
        ? { kind: 'average_by_category' }
        : null,
  },
  {
    name: 'average_by_cluster',
    match: (text) =>
      AVERAGE_PATTERN.test(text) && CLUSTER_WORD_PATTERN.test(text) ? { kind: 'compare' } : null,
  },
  { name: 'highest_traffic', match: when(HIGHEST_PATTERN, { kind: 'highest_traffic' }) },
  { name: 'lowest_traffic', match: when(LOWEST_PATTERN, { kind: 'lowest_traffic' }) },
  {
    name: 'category_filter',
    match: (text) => {
      const found = CATEGORY_FILTER_PATTERN.exec(text);
      const category = found ? CATEGORY_BY_WORD[found[1]] : undefined;
      return category ? { kind: 'category_filter', category } : null;
    },
  },
  { name: 'overview', match: when(OVERVIEW_PATTERN, { kind: 'overview' }) },
];

/**
 * Classify a question against the rule table. First match wins.
 */
export function classifyQuestion(
  question: string,
  table: SegmentTable,
  rules: readonly IntentRule[] = INTENT_RULES
): ClassificationResult {
  const text = normalizeText(question);
  if (!text) {
    return { intent: { kind: 'unknown' } };
  }

  for (const rule of rules) {
    const intent = rule.match(text, table);
    if (intent) {
      return { intent, rule: rule.name };
    }
  }

  return { intent: { kind: 'unknown' } };
}
