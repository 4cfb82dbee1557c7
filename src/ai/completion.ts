import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';

export type CompletionRole = 'system' | 'user';

export interface CompletionMessage {
  role: CompletionRole;
  content: string;
}

export interface CompletionRequest {
  messages: CompletionMessage[];
  temperature: number;
}

/**
 * Anything that turns role-tagged messages into generated text. Failures are
 * thrown; the gateway converts them.
 */
export interface CompletionService {
  createCompletion(request: CompletionRequest): Promise<string>;
}

export interface OpenAICompletionOptions {
  apiKey: string;
  model: string;
  timeoutMs?: number;
}

function toOpenAIMessage(message: CompletionMessage): ChatCompletionMessageParam {
  if (message.role === 'system') {
    return { role: 'system', content: message.content };
  }
  return { role: 'user', content: message.content };
}

export function createOpenAICompletionService(options: OpenAICompletionOptions): CompletionService {
  const openai = new OpenAI({
    apiKey: options.apiKey,
    timeout: options.timeoutMs,
    maxRetries: 0,
  });

  return {
    async createCompletion(request: CompletionRequest): Promise<string> {
      const completion = await openai.chat.completions.create({
        model: options.model,
        messages: request.messages.map(toOpenAIMessage),
        temperature: request.temperature,
      });

      const choice = completion.choices[0];
      if (!choice?.message) {
        throw new Error('OpenAI response did not include a message');
      }
      const content = choice.message.content;
      if (typeof content !== 'string' || !content.trim()) {
        throw new Error('OpenAI response message was empty');
      }
      return content;
    },
  };
}
