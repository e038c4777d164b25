import { CompletionProvider, PROVIDER_LABELS, ProviderRequest, ProviderResponse, SuccessfulResponse, failed } from './types';
import { GatewayState, INITIAL_STATE, RetryPolicy, nextStep } from './retry-policy';
import { reasonForError } from './classify';
import { AbortedByUserError, NoProviderConfiguredError, ProviderExhaustedError, ProviderFailure } from '../../shared/errors';
import { Logger, silentLogger } from '../../shared/logger';

export interface CompletionInput {
  prompt: string;
  maxOutputTokens: number;
  temperature: number;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface GatewayOptions {
  policy: RetryPolicy;
  logger?: Logger;
  sleep?: Sleep;
}

export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortedByUserError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortedByUserError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Sends one prompt to the configured providers in priority order. Requests
 * are strictly sequential: one attempt in flight at any time.
 */
export class ProviderGateway {
  private readonly policy: RetryPolicy;
  private readonly logger: Logger;
  private readonly sleep: Sleep;

  constructor(private readonly providers: readonly CompletionProvider[], options: GatewayOptions) {
    this.policy = options.policy;
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep ?? sleep;
  }

  // label of the provider that will be tried first
  primaryLabel(): string | null {
    const first = this.providers[0];
    return first ? PROVIDER_LABELS[first.id] : null;
  }

  async complete(input: CompletionInput, signal?: AbortSignal): Promise<SuccessfulResponse> {
    if (this.providers.length === 0) {
      throw new NoProviderConfiguredError();
    }

    const failures = new Map<string, ProviderFailure>();
    let state: GatewayState = INITIAL_STATE;

    for (;;) {
      if (signal?.aborted) throw new AbortedByUserError();

      const provider = this.providers[state.providerIndex];
      const request: ProviderRequest = {
        provider: provider.id,
        model: provider.model,
        prompt: input.prompt,
        maxOutputTokens: input.maxOutputTokens,
        temperature: input.temperature,
        attempt: state.attempt
      };

      this.logger.debug('provider attempt', { provider: provider.id, model: provider.model, attempt: state.attempt });
      const response = await this.attempt(provider, request, signal);
      if (response.status === 'success') {
        this.logger.debug('provider success', { provider: provider.id, usage: response.usage });
        return response;
      }

      failures.set(provider.id, response.failure);
      const step = nextStep(state, { kind: 'failure', reason: response.failure.reason }, this.providers.length, this.policy);

      if (step.action === 'retry') {
        this.logger.debug(`retrying ${provider.id} in ${step.delayMs}ms`, { reason: response.failure.reason });
        await this.sleep(step.delayMs, signal);
        state = step.next;
        continue;
      }
      if (step.action === 'fallback') {
        const next = this.providers[step.next.providerIndex];
        this.logger.warn(`${PROVIDER_LABELS[provider.id]} failed (${response.failure.reason}), falling back to ${PROVIDER_LABELS[next.id]}`);
        state = step.next;
        continue;
      }

      throw new ProviderExhaustedError([...failures.values()]);
    }
  }

  private async attempt(provider: CompletionProvider, request: ProviderRequest, signal?: AbortSignal): Promise<ProviderResponse> {
    const controller = new AbortController();

    let resolveTimeout: (response: ProviderResponse) => void = () => undefined;
    const timedOut = new Promise<ProviderResponse>(resolve => {
      resolveTimeout = resolve;
    });
    const timer = setTimeout(() => {
      resolveTimeout(failed(provider.id, 'timeout', `no response within ${this.policy.timeoutMs}ms`));
      controller.abort();
    }, this.policy.timeoutMs);

    let rejectCancelled: (error: Error) => void = () => undefined;
    const cancelled = new Promise<never>((_, reject) => {
      rejectCancelled = reject;
    });
    const onAbort = () => {
      controller.abort();
      rejectCancelled(new AbortedByUserError());
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      return await Promise.race([provider.complete(request, controller.signal), timedOut, cancelled]);
    } catch (error) {
      if (error instanceof AbortedByUserError || signal?.aborted) throw new AbortedByUserError();
      const message = error instanceof Error ? error.message : String(error);
      return failed(provider.id, reasonForError(error), message);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
