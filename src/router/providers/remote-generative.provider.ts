import type { SegmentTable } from '../../dataset/segment-table.js';
import type { ChatMessage, CompletionFn } from '../../llm/types.js';
import { datasetSummary } from '../aggregates.js';
import type { Answer, AnswerProvider, QueryIntent } from '../router.types.js';
import logger from '../../utils/logger.js';

export const REMOTE_FALLBACK_MESSAGE =
  "Sorry, I couldn't reach the AI assistant right now. I can still answer questions about the " +
  'highest or lowest traffic segments, a specific cluster, categories, or a comparison of clusters.';

export interface RemoteGenerativeOptions {
  complete: CompletionFn;
  isConfigured: () => boolean;
  model: string;
  timeoutMs: number;
}

const SYSTEM_PROMPT = `You are a traffic data assistant for road segment analysis.
Answer the question ONLY using the dataset context provided.

Use the following fixed mapping from cluster IDs to traffic levels:
Cluster 0 = Low Traffic
Cluster 1 = Medium Traffic
Cluster 2 = High Traffic

Guidelines:
- Be specific and provide numerical data when available
- Mention segment names, traffic values, and categories
- If asked about trends, compare different segments or clusters
- Keep responses concise but informative
- If the data doesn't contain enough information, say so clearly
- Reply in plain text, without HTML`;

/**
 * Remove HTML tags a model sometimes emits despite instructions.
 */
export function stripHtml(text: string): string {
  return text.replace(/<\/?[a-z][^>]*>/gi, '').trim();
}

export function buildMessages(question: string, table: SegmentTable): ChatMessage[] {
  return [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: `Dataset context:\n${datasetSummary(table)}\n\nQuestion: ${question}` },
  ];
}

/**
 * Delegates questions no rule understood to a generative model.
 * One attempt, bounded by timeoutMs; any failure becomes the static fallback.
 */
export class RemoteGenerativeProvider implements AnswerProvider {
  readonly name = 'remote';

  constructor(private readonly options: RemoteGenerativeOptions) {}

  async answer(question: string, intent: QueryIntent, table: SegmentTable): Promise<Answer> {
    const fallback: Answer = { text: REMOTE_FALLBACK_MESSAGE, intent: intent.kind, source: 'fallback' };

    if (!this.options.isConfigured()) {
      logger.warn('Generative fallback skipped, provider not configured');
      return fallback;
    }

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    try {
      const result = await Promise.race([
        this.options.complete(this.options.model, buildMessages(question, table), {
          temperature: 0.3,
          signal: controller.signal,
        }),
        new Promise<never>((_, reject) => {
          timer = setTimeout(() => {
            controller.abort();
            reject(new Error(`Generative provider timed out after ${this.options.timeoutMs}ms`));
          }, this.options.timeoutMs);
        }),
      ]);

      const text = stripHtml(result.content);
      if (!text) {
        logger.warn('Generative provider returned an empty answer', { model: result.model });
        return fallback;
      }

      logger.debug('Generative answer received', { model: result.model, tokensUsed: result.tokensUsed });
      return { text, intent: intent.kind, source: 'remote' };
    } catch (error) {
      logger.warn('Generative provider unavailable, using fallback', {
        error: (error as Error).message,
        model: this.options.model,
      });
      return fallback;
    } finally {
      clearTimeout(timer);
    }
  }
}
