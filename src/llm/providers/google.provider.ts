import { config } from '../../config/index.js';
import type { ChatMessage, CompletionOptions, CompletionResult } from '../types.js';
import logger from '../../utils/logger.js';

const BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';

interface GeminiContent {
  role: 'user' | 'model';
  parts: { text: string }[];
}

interface GeminiResponse {
  candidates?: Array<{
    content?: {
      parts?: Array<{ text?: string }>;
    };
    finishReason?: string;
  }>;
  usageMetadata?: {
    promptTokenCount: number;
    candidatesTokenCount: number;
    totalTokenCount: number;
  };
}

function convertMessages(messages: ChatMessage[]): { contents: GeminiContent[]; systemInstruction?: { parts: { text: string }[] } } {
  const systemMessages = messages.filter(m => m.role === 'system');
  const chatMessages = messages.filter(m => m.role !== 'system');

  const contents: GeminiContent[] = chatMessages.map(m => ({
    role: m.role === 'assistant' ? 'model' : 'user',
    parts: [{ text: m.content }],
  }));

  const result: { contents: GeminiContent[]; systemInstruction?: { parts: { text: string }[] } } = { contents };

  if (systemMessages.length > 0) {
    result.systemInstruction = {
      parts: [{ text: systemMessages.map(m => m.content).join('\n\n') }],
    };
  }

  return result;
}

export async function createCompletion(
  model: string,
  messages: ChatMessage[],
  options: CompletionOptions = {}
): Promise<CompletionResult> {
  if (!isConfigured()) {
    throw new Error('Google AI is not configured (missing API key)');
  }

  try {
    const { contents, systemInstruction } = convertMessages(messages);

    const response = await fetch(
      `${BASE_URL}/models/${encodeURIComponent(model)}:generateContent`,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-goog-api-key': config.google.apiKey ?? '',
        },
        body: JSON.stringify({
          contents,
          systemInstruction,
          generationConfig: {
            temperature: options.temperature ?? 0.7,
            maxOutputTokens: options.maxTokens,
          },
        }),
        signal: options.signal,
      }
    );

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`Google AI completion failed: ${response.status} ${errorText}`);
    }

    const data = await response.json() as GeminiResponse;

    return {
      content: data.candidates?.[0]?.content?.parts?.[0]?.text || '',
      tokensUsed: data.usageMetadata?.totalTokenCount || 0,
      model,
      provider: 'google',
    };
  } catch (error) {
    logger.error('Google AI completion failed', { error: (error as Error).message, model });
    throw error;
  }
}

export function isConfigured(): boolean {
  return config.google.enabled && !!config.google.apiKey;
}
