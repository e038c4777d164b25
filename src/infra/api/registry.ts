import { CompletionProvider, ProviderId } from './types';
import { OpenRouterProvider } from './providers/openrouter';
import { GeminiProvider } from './providers/gemini';
import { AppConfig } from '../config/manager';

const DEFAULT_PRIORITY: readonly ProviderId[] = ['openrouter', 'gemini'];

/**
 * Providers with credentials, highest priority first:
 * explicit choice, then OpenRouter, then Gemini
 */
export function providerOrder(config: Pick<AppConfig, 'provider' | 'credentials'>): ProviderId[] {
  const configured = DEFAULT_PRIORITY.filter(id => Boolean(config.credentials[id]));
  if (config.provider === 'auto' || !configured.includes(config.provider)) {
    return configured;
  }
  return [config.provider, ...configured.filter(id => id !== config.provider)];
}

export function createProviders(config: AppConfig): CompletionProvider[] {
  return providerOrder(config).flatMap((id): CompletionProvider[] => {
    const apiKey = config.credentials[id];
    if (!apiKey) return [];
    switch (id) {
      case 'openrouter':
        return [new OpenRouterProvider({ apiKey, model: config.models.openrouter })];
      case 'gemini':
        return [new GeminiProvider({ apiKey, model: config.models.gemini })];
    }
  });
}
