import { describe, it, expect, vi } from 'vitest';
import {
  RemoteGenerativeProvider,
  REMOTE_FALLBACK_MESSAGE,
  buildMessages,
  stripHtml,
} from './remote-generative.provider.js';
import type { CompletionFn, CompletionOptions } from '../../llm/types.js';
import { sampleTable } from '../../test/fixtures.js';

const table = sampleTable();
const unknown = { kind: 'unknown' } as const;

function completionReturning(content: string): CompletionFn {
  return vi.fn<CompletionFn>(async (model) => ({ content, tokensUsed: 12, model, provider: 'google' }));
}

function createProvider(complete: CompletionFn, overrides: { configured?: boolean; timeoutMs?: number } = {}) {
  return new RemoteGenerativeProvider({
    complete,
    isConfigured: () => overrides.configured ?? true,
    model: 'test-model',
    timeoutMs: overrides.timeoutMs ?? 1000,
  });
}

describe('stripHtml', () => {
  it('removes tags and trims', () => {
    expect(stripHtml('  <div><p>Cluster 2 is <span>busiest</span></p></div><br/> ')).toBe('Cluster 2 is busiest');
  });

  it('leaves comparisons alone', () => {
    expect(stripHtml('cluster 0 < cluster 2')).toBe('cluster 0 < cluster 2');
  });
});

describe('buildMessages', () => {
  it('grounds the question in the dataset summary', () => {
    const [system, user] = buildMessages('What are the traffic patterns?', table);
    expect(system.role).toBe('system');
    expect(system.content).toContain('Cluster 2 = High Traffic');
    expect(user.content.startsWith('Dataset context:\nTotal segments: 7')).toBe(true);
    expect(user.content.endsWith('Question: What are the traffic patterns?')).toBe(true);
  });
});

describe('RemoteGenerativeProvider', () => {
  it('returns the model answer without HTML', async () => {
    const complete = completionReturning('<p>Cluster 2 carries the most traffic.</p>');
    const answer = await createProvider(complete).answer('What are the patterns?', unknown, table);

    expect(answer).toEqual({ text: 'Cluster 2 carries the most traffic.', intent: 'unknown', source: 'remote' });
    expect(complete).toHaveBeenCalledTimes(1);
    expect(vi.mocked(complete).mock.calls[0][0]).toBe('test-model');
  });

  it('falls back without calling out when not configured', async () => {
    const complete = completionReturning('unused');
    const answer = await createProvider(complete, { configured: false }).answer('anything', unknown, table);

    expect(answer).toEqual({ text: REMOTE_FALLBACK_MESSAGE, intent: 'unknown', source: 'fallback' });
    expect(complete).not.toHaveBeenCalled();
  });

  it('falls back when the call fails', async () => {
    const complete = vi.fn<CompletionFn>(async () => {
      throw new Error('Google AI completion failed: 503 unavailable');
    });
    const answer = await createProvider(complete).answer('anything', unknown, table);

    expect(answer.source).toBe('fallback');
    expect(answer.text).toBe(REMOTE_FALLBACK_MESSAGE);
  });

  it('falls back on an empty answer', async () => {
    const answer = await createProvider(completionReturning('  <br>  ')).answer('anything', unknown, table);
    expect(answer.source).toBe('fallback');
  });

  it('gives up after the timeout and aborts the request', async () => {
    let signal: AbortSignal | undefined;
    const complete = vi.fn<CompletionFn>((_model, _messages, options?: CompletionOptions) => {
      signal = options?.signal;
      return new Promise<never>(() => {});
    });

    const started = Date.now();
    const answer = await createProvider(complete, { timeoutMs: 50 }).answer('anything', unknown, table);

    expect(answer).toEqual({ text: REMOTE_FALLBACK_MESSAGE, intent: 'unknown', source: 'fallback' });
    expect(Date.now() - started).toBeLessThan(1000);
    expect(signal?.aborted).toBe(true);
  });
});
