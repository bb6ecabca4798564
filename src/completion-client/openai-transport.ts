import OpenAI from 'openai';
import type { CompletionTransport } from './completion-service.js';

export interface OpenAiTransportOptions {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  timeoutMs?: number;
}

export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: {
        model: string;
        max_tokens: number;
        temperature: number;
        messages: { role: 'user'; content: string }[];
      }): Promise<{ choices: { message: { content: string | null } }[] }>;
    };
  };
}

/**
 * Chat-completion transport with deterministic sampling. Request failures
 * reject; an empty choice list resolves to an empty reply.
 */
export function createChatTransport(client: ChatCompletionsClient, model: string): CompletionTransport {
  return async (prompt, maxTokens) => {
    const response = await client.chat.completions.create({
      model,
      max_tokens: maxTokens,
      temperature: 0,
      messages: [{ role: 'user', content: prompt }],
    });
    return response.choices[0]?.message.content ?? '';
  };
}

export function createOpenAiTransport(options: OpenAiTransportOptions): CompletionTransport {
  const openai = new OpenAI({
    apiKey: options.apiKey,
    ...(options.baseUrl ? { baseURL: options.baseUrl } : {}),
    timeout: options.timeoutMs ?? 120_000,
  });

  return createChatTransport(
    {
      chat: {
        completions: {
          create: (body) => openai.chat.completions.create(body),
        },
      },
    },
    options.model ?? 'gpt-4o',
  );
}
