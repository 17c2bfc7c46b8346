import { z } from 'zod';
import { EmptyResponseError } from '../errors';
import type { RequestConfig } from '../presets';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatCompletionBody {
  model: string;
  messages: ChatMessage[];
  max_tokens: number;
  temperature: number;
  stop?: string[];
  stream?: boolean;
}

const ChatCompletionResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullish(),
      }),
    })
  ),
});

export function buildChatCompletionBody(
  prompt: string,
  config: RequestConfig,
  stream: boolean = false
): ChatCompletionBody {
  const messages: ChatMessage[] = [];
  if (config.systemMessage) {
    messages.push({ role: 'system', content: config.systemMessage });
  }
  messages.push({ role: 'user', content: prompt });

  const body: ChatCompletionBody = {
    model: config.model,
    messages,
    max_tokens: config.maxTokens,
    temperature: config.temperature,
  };
  if (config.stopSequences && config.stopSequences.length > 0) {
    body.stop = [...config.stopSequences];
  }
  if (stream) {
    body.stream = true;
  }
  return body;
}

/**
 * Returns the first choice's assistant content of a successful response body.
 */
export function extractAssistantContent(body: Buffer): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body.toString('utf8'));
  } catch {
    throw new EmptyResponseError('Response body is not a chat completion');
  }

  const result = ChatCompletionResponseSchema.safeParse(parsed);
  if (!result.success) {
    throw new EmptyResponseError('Response body is not a chat completion');
  }

  const content = result.data.choices[0]?.message.content;
  if (!content || content.trim().length === 0) {
    throw new EmptyResponseError();
  }
  return content;
}
