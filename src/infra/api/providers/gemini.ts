import { GoogleGenAI } from '@google/genai';
import { CompletionProvider, ProviderRequest, ProviderResponse, failed } from '../types';
import { isAbortError, reasonForError, statusOf } from '../classify';

export interface GeminiSettings {
  apiKey: string;
  model: string;
}

export class GeminiProvider implements CompletionProvider {
  readonly id = 'gemini';
  readonly model: string;
  private readonly client: GoogleGenAI;

  constructor(settings: GeminiSettings) {
    this.model = settings.model;
    this.client = new GoogleGenAI({ apiKey: settings.apiKey });
  }

  async complete(request: ProviderRequest, signal: AbortSignal): Promise<ProviderResponse> {
    try {
      const response = await this.client.models.generateContent({
        model: request.model,
        contents: request.prompt,
        config: {
          maxOutputTokens: request.maxOutputTokens,
          temperature: request.temperature,
          candidateCount: 1,
          abortSignal: signal
        }
      });
      return toResponse(this.model, response);
    } catch (error) {
      if (isAbortError(error)) throw error;
      const message = error instanceof Error ? error.message : String(error);
      return failed(this.id, reasonForError(error), message, statusOf(error));
    }
  }
}

export interface GenerateContentLike {
  text?: string;
  usageMetadata?: {
    promptTokenCount?: number;
    candidatesTokenCount?: number;
    totalTokenCount?: number;
  };
}

export function toResponse(model: string, response: GenerateContentLike): ProviderResponse {
  const text = response.text;
  if (typeof text !== 'string') {
    return failed('gemini', 'invalid-response', 'response had no candidate text');
  }
  const usage = response.usageMetadata;
  return {
    status: 'success',
    provider: 'gemini',
    model,
    text,
    usage: usage
      ? {
          promptTokens: usage.promptTokenCount,
          completionTokens: usage.candidatesTokenCount,
          totalTokens: usage.totalTokenCount
        }
      : undefined
  };
}
