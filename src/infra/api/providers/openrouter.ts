import OpenAI from 'openai';
import { CompletionProvider, ProviderRequest, ProviderResponse, failed } from '../types';
import { isAbortError, reasonForError } from '../classify';
import { FailureReason } from '../../../shared/errors';
import { LLM_CONSTANTS } from '../../../shared/constants';

export interface OpenRouterSettings {
  apiKey: string;
  model: string;
  baseURL?: string;
}

/**
 * OpenRouter speaks the OpenAI chat-completions protocol, so the official
 * OpenAI client is pointed at its base URL. The SDK's own retries are off:
 * the gateway owns retry and fallback.
 */
export class OpenRouterProvider implements CompletionProvider {
  readonly id = 'openrouter';
  readonly model: string;
  private readonly client: OpenAI;

  constructor(settings: OpenRouterSettings) {
    this.model = settings.model;
    this.client = new OpenAI({
      apiKey: settings.apiKey,
      baseURL: settings.baseURL ?? LLM_CONSTANTS.OPENROUTER_BASE_URL,
      maxRetries: 0,
      defaultHeaders: {
        'HTTP-Referer': 'https://www.npmjs.com/package/gitbrief',
        'X-Title': LLM_CONSTANTS.APP_TITLE
      }
    });
  }

  async complete(request: ProviderRequest, signal: AbortSignal): Promise<ProviderResponse> {
    try {
      const completion = await this.client.chat.completions.create(
        {
          model: request.model,
          messages: [{ role: 'user', content: request.prompt }],
          max_tokens: request.maxOutputTokens,
          temperature: request.temperature
        },
        { signal }
      );
      return toResponse(this.model, completion);
    } catch (error) {
      if (error instanceof OpenAI.APIUserAbortError || isAbortError(error)) throw error;
      const message = error instanceof Error ? error.message : String(error);
      return failed(this.id, openRouterReason(error), message, statusOfApiError(error));
    }
  }
}

export function openRouterReason(error: unknown): FailureReason {
  if (error instanceof OpenAI.APIConnectionTimeoutError) return 'timeout';
  return reasonForError(error);
}

function statusOfApiError(error: unknown): number | undefined {
  return error instanceof OpenAI.APIError ? error.status : undefined;
}

export interface ChatCompletionLike {
  choices: Array<{ message?: { content?: string | null } | null }>;
  usage?: { prompt_tokens?: number; completion_tokens?: number; total_tokens?: number } | null;
}

/**
 * Maps a chat completion body; a body without text is not a usable completion
 */
export function toResponse(model: string, completion: ChatCompletionLike): ProviderResponse {
  const text = completion.choices[0]?.message?.content;
  if (typeof text !== 'string') {
    return failed('openrouter', 'invalid-response', 'response had no message content');
  }
  return {
    status: 'success',
    provider: 'openrouter',
    model,
    text,
    usage: completion.usage
      ? {
          promptTokens: completion.usage.prompt_tokens,
          completionTokens: completion.usage.completion_tokens,
          totalTokens: completion.usage.total_tokens
        }
      : undefined
  };
}
