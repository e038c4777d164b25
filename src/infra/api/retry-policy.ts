import { FailureReason } from '../../shared/errors';
import { isTransient } from './classify';

export interface RetryPolicy {
  // extra attempts against the same provider after the first one
  retries: number;
  initialBackoffMs: number;
  maxBackoffMs: number;
  factor: number;
  timeoutMs: number;
}

export interface GatewayState {
  providerIndex: number;
  // 1-based attempt number against the current provider
  attempt: number;
  elapsedBackoffMs: number;
}

export type Outcome =
  | { kind: 'success' }
  | { kind: 'failure'; reason: FailureReason };

export type Step =
  | { action: 'succeed' }
  | { action: 'retry'; delayMs: number; next: GatewayState }
  | { action: 'fallback'; next: GatewayState }
  | { action: 'exhausted' };

export const INITIAL_STATE: GatewayState = { providerIndex: 0, attempt: 1, elapsedBackoffMs: 0 };

export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  const delay = policy.initialBackoffMs * Math.pow(policy.factor, attempt - 1);
  return Math.min(delay, policy.maxBackoffMs);
}

/**
 * Transition of the retry-then-fallback machine. Transient failures retry the
 * same provider until the budget is spent; everything else moves on at once.
 */
export function nextStep(state: GatewayState, outcome: Outcome, providerCount: number, policy: RetryPolicy): Step {
  if (outcome.kind === 'success') return { action: 'succeed' };

  if (isTransient(outcome.reason) && state.attempt <= policy.retries) {
    const delayMs = backoffDelay(state.attempt, policy);
    return {
      action: 'retry',
      delayMs,
      next: { ...state, attempt: state.attempt + 1, elapsedBackoffMs: state.elapsedBackoffMs + delayMs }
    };
  }

  if (state.providerIndex + 1 < providerCount) {
    return {
      action: 'fallback',
      next: { providerIndex: state.providerIndex + 1, attempt: 1, elapsedBackoffMs: state.elapsedBackoffMs }
    };
  }

  return { action: 'exhausted' };
}
