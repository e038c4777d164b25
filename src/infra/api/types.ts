import { FailureReason, ProviderFailure } from '../../shared/errors';

export type ProviderId = 'openrouter' | 'gemini';

export const PROVIDER_LABELS: Record<ProviderId, string> = {
  openrouter: 'OpenRouter',
  gemini: 'Gemini'
};

// One attempt against one provider; retries and fallbacks issue a new one
export interface ProviderRequest {
  readonly provider: ProviderId;
  readonly model: string;
  readonly prompt: string;
  readonly maxOutputTokens: number;
  readonly temperature: number;
  readonly attempt: number;
}

export interface Usage {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
}

export type ProviderResponse =
  | { status: 'success'; provider: ProviderId; model: string; text: string; usage?: Usage }
  | { status: 'rate-limited'; provider: ProviderId; failure: ProviderFailure }
  | { status: 'error'; provider: ProviderId; failure: ProviderFailure };

export type SuccessfulResponse = Extract<ProviderResponse, { status: 'success' }>;

/**
 * Capability every provider variant implements. Implementations never throw
 * for HTTP or transport problems; they report them as a failed response.
 */
export interface CompletionProvider {
  readonly id: ProviderId;
  readonly model: string;
  complete(request: ProviderRequest, signal: AbortSignal): Promise<ProviderResponse>;
}

export function failed(provider: ProviderId, reason: FailureReason, message: string, status?: number): ProviderResponse {
  const failure: ProviderFailure = { provider: PROVIDER_LABELS[provider], reason, message, status };
  return reason === 'rate-limited'
    ? { status: 'rate-limited', provider, failure }
    : { status: 'error', provider, failure };
}
