import { INITIAL_STATE, RetryPolicy, backoffDelay, nextStep } from '../retry-policy';
import { reasonForError, reasonForStatus, isTransient } from '../classify';

const POLICY: RetryPolicy = { retries: 2, initialBackoffMs: 1000, maxBackoffMs: 8000, factor: 2, timeoutMs: 60000 };

describe('backoffDelay', () => {
  it('grows geometrically up to the cap', () => {
    expect([1, 2, 3, 4, 5].map(attempt => backoffDelay(attempt, POLICY))).toEqual([1000, 2000, 4000, 8000, 8000]);
  });
});

describe('nextStep', () => {
  it('finishes on success', () => {
    expect(nextStep(INITIAL_STATE, { kind: 'success' }, 2, POLICY)).toEqual({ action: 'succeed' });
  });

  it('retries a transient failure on the same provider', () => {
    expect(nextStep(INITIAL_STATE, { kind: 'failure', reason: 'rate-limited' }, 2, POLICY)).toEqual({
      action: 'retry',
      delayMs: 1000,
      next: { providerIndex: 0, attempt: 2, elapsedBackoffMs: 1000 }
    });
  });

  it('falls back once the retry budget is spent', () => {
    const state = { providerIndex: 0, attempt: 3, elapsedBackoffMs: 3000 };
    expect(nextStep(state, { kind: 'failure', reason: 'server' }, 2, POLICY)).toEqual({
      action: 'fallback',
      next: { providerIndex: 1, attempt: 1, elapsedBackoffMs: 3000 }
    });
  });

  it('falls back at once on a permanent failure', () => {
    expect(nextStep(INITIAL_STATE, { kind: 'failure', reason: 'auth' }, 2, POLICY)).toMatchObject({ action: 'fallback' });
    expect(nextStep(INITIAL_STATE, { kind: 'failure', reason: 'invalid-response' }, 2, POLICY)).toMatchObject({ action: 'fallback' });
  });

  it('is exhausted after the last provider', () => {
    expect(nextStep({ providerIndex: 1, attempt: 1, elapsedBackoffMs: 0 }, { kind: 'failure', reason: 'auth' }, 2, POLICY))
      .toEqual({ action: 'exhausted' });
  });

  it('never retries when retries is zero', () => {
    expect(nextStep(INITIAL_STATE, { kind: 'failure', reason: 'timeout' }, 1, { ...POLICY, retries: 0 }))
      .toEqual({ action: 'exhausted' });
  });
});

describe('failure classification', () => {
  it.each([
    [429, 'rate-limited'],
    [408, 'timeout'],
    [500, 'server'],
    [503, 'server'],
    [401, 'auth'],
    [403, 'auth'],
    [400, 'bad-request'],
    [404, 'bad-request']
  ])('status %i is %s', (status, reason) => {
    expect(reasonForStatus(status)).toBe(reason);
  });

  it('reads the status off thrown errors', () => {
    expect(reasonForError(Object.assign(new Error('quota'), { status: 429 }))).toBe('rate-limited');
    expect(reasonForError(new Error('Request timed out'))).toBe('timeout');
    expect(reasonForError(new Error('ECONNRESET'))).toBe('network');
  });

  it('treats only rate limits, server errors, timeouts and network errors as transient', () => {
    expect(isTransient('network')).toBe(true);
    expect(isTransient('auth')).toBe(false);
    expect(isTransient('bad-request')).toBe(false);
  });
});
