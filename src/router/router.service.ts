/**
 * Query Router - Main Entry Point
 *
 * Classifies a question, picks the provider responsible for the intent and
 * returns its answer. Never throws: every failure degrades to text.
 */

import type { SegmentTable } from '../dataset/segment-table.js';
import type { Answer, AnswerProvider, IntentRule, QueryIntent } from './router.types.js';
import { classifyQuestion, INTENT_RULES } from './rules/intent-classifier.js';
import logger from '../utils/logger.js';

export const ERROR_MESSAGE =
  'Sorry, I ran into a problem answering that. Please try rephrasing your question.';

export interface QueryRouterOptions {
  /** Answers every recognised intent */
  local: AnswerProvider;

  /** Answers questions no rule matched */
  remote: AnswerProvider;

  rules?: readonly IntentRule[];
}

export class QueryRouter {
  private readonly rules: readonly IntentRule[];

  constructor(private readonly options: QueryRouterOptions) {
    this.rules = options.rules ?? INTENT_RULES;
  }

  selectProvider(intent: QueryIntent): AnswerProvider {
    return intent.kind === 'unknown' ? this.options.remote : this.options.local;
  }

  async ask(question: string, table: SegmentTable): Promise<Answer> {
    const startTime = Date.now();
    let intent: QueryIntent = { kind: 'unknown' };

    try {
      const classification = classifyQuestion(question, table, this.rules);
      intent = classification.intent;
      const provider = this.selectProvider(intent);

      const answer = await provider.answer(question, intent, table);

      logger.debug('Question answered', {
        question: question.slice(0, 100),
        intent: intent.kind,
        rule: classification.rule,
        provider: provider.name,
        source: answer.source,
        durationMs: Date.now() - startTime,
      });

      return answer;
    } catch (error) {
      logger.error('Query router failed', {
        error: (error as Error).message,
        question: question.slice(0, 100),
        intent: intent.kind,
      });
      return { text: ERROR_MESSAGE, intent: intent.kind, source: 'fallback' };
    }
  }
}
