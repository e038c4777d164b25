import { FailureReason } from '../../shared/errors';

/**
 * Reads a numeric HTTP status off an SDK error, if it carries one
 */
export function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('status' in error)) return undefined;
  const { status } = error;
  return typeof status === 'number' ? status : undefined;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'APIUserAbortError');
}

export function reasonForStatus(status: number): FailureReason {
  if (status === 429) return 'rate-limited';
  if (status === 408) return 'timeout';
  if (status >= 500) return 'server';
  if (status === 401 || status === 403) return 'auth';
  return 'bad-request';
}

export function reasonForError(error: unknown): FailureReason {
  const status = statusOf(error);
  if (status !== undefined) return reasonForStatus(status);

  const message = error instanceof Error ? error.message : String(error);
  if (/timed? ?out|ETIMEDOUT/i.test(message)) return 'timeout';
  return 'network';
}

export function isTransient(reason: FailureReason): boolean {
  return reason === 'rate-limited' || reason === 'server' || reason === 'timeout' || reason === 'network';
}
