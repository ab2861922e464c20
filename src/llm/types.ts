// LLM Provider Types

export type ProviderId = 'google';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface CompletionResult {
  content: string;
  tokensUsed: number;
  model: string;
  provider: ProviderId;
}

export type CompletionFn = (
  model: string,
  messages: ChatMessage[],
  options?: CompletionOptions
) => Promise<CompletionResult>;
