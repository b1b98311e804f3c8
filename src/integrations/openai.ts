import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { ChatMessage, GenerationRequest, GenerationService } from '../types';
import { GenerationError, describeError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const log = createLogger('openai');

// Rate limits, timeouts and server-side faults are worth retrying; client errors are not
export function classifyOpenAIError(error: unknown): GenerationError {
  if (error instanceof GenerationError) return error;

  if (error instanceof OpenAI.APIConnectionError) {
    return new GenerationError(`OpenAI connection failed: ${error.message}`, true, { cause: error });
  }

  if (error instanceof OpenAI.APIError) {
    const status = error.status;
    const transient = status === undefined || status === 408 || status === 409 || status === 429 || status >= 500;
    return new GenerationError(`OpenAI request failed (${status ?? 'no status'}): ${error.message}`, transient, {
      cause: error
    });
  }

  return new GenerationError(`Generation failed: ${describeError(error)}`, false, { cause: error });
}

function toOpenAIMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

export class OpenAIService implements GenerationService {
  private client: OpenAI;

  constructor(apiKey: string, client?: OpenAI) {
    this.client = client ?? new OpenAI({ apiKey, maxRetries: 0 });
  }

  async generate(request: GenerationRequest, signal?: AbortSignal): Promise<string> {
    const { config, messages } = request;

    try {
      const response = await this.client.chat.completions.create(
        {
          model: config.model,
          messages: messages.map(toOpenAIMessage),
          temperature: config.temperature,
          max_tokens: config.maxTokens
        },
        { signal }
      );

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new GenerationError('No content received from OpenAI', true);
      }

      return content.trim();
    } catch (error) {
      // Aborts belong to the caller's cancellation path, not to generation failure
      if (error instanceof OpenAI.APIUserAbortError) throw error;

      const failure = classifyOpenAIError(error);
      log.error(`Error generating reply (${failure.transient ? 'transient' : 'permanent'}):`, failure.message);
      throw failure;
    }
  }
}
