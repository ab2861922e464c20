/**
 * Query Router
 *
 * Maps a free-text question about the traffic dataset to an answer.
 * Recognised intents are computed locally; everything else goes to the
 * generative provider.
 */

export { QueryRouter, ERROR_MESSAGE } from './router.service.js';
export type { QueryRouterOptions } from './router.service.js';

export type {
  Answer,
  AnswerProvider,
  AnswerSource,
  AnswerTable,
  ClassificationResult,
  IntentKind,
  IntentRule,
  QueryIntent,
  QueryOptions,
} from './router.types.js';

export { DEFAULT_QUERY_OPTIONS } from './router.types.js';

export { classifyQuestion, normalizeText, INTENT_RULES } from './rules/intent-classifier.js';
export { LocalAggregateProvider, GREETING_MESSAGE } from './providers/local-aggregate.provider.js';
export { RemoteGenerativeProvider, REMOTE_FALLBACK_MESSAGE } from './providers/remote-generative.provider.js';
