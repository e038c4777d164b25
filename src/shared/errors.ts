export type ErrorCode =
  | 'NotAGitRepository'
  | 'GitCommandError'
  | 'NoProviderConfigured'
  | 'ProviderExhausted'
  | 'MalformedCompletion'
  | 'ExportError'
  | 'ConfigError'
  | 'AbortedByUser';

/**
 * Base class for every fatal error the CLI knows how to report
 */
export abstract class GitbriefError extends Error {
  abstract readonly code: ErrorCode;
  readonly hint?: string;

  constructor(message: string, hint?: string) {
    super(message);
    this.name = new.target.name;
    this.hint = hint;
  }
}

export class NotAGitRepositoryError extends GitbriefError {
  readonly code = 'NotAGitRepository';

  constructor(readonly path: string) {
    super(`Not a git repository: ${path}`, 'Run gitbrief inside a git working tree.');
  }
}

export class GitCommandError extends GitbriefError {
  readonly code = 'GitCommandError';

  constructor(readonly exitCode: number, readonly stderr: string) {
    super(`git exited with code ${exitCode}: ${stderr.trim() || '(no stderr)'}`);
  }
}

export class NoProviderConfiguredError extends GitbriefError {
  readonly code = 'NoProviderConfigured';

  constructor() {
    super(
      'No LLM API key configured',
      'Set OPENROUTER_API_KEY (https://openrouter.ai/keys) or GEMINI_API_KEY (https://aistudio.google.com/apikey) in your environment or .env file.'
    );
  }
}

export type FailureReason =
  | 'rate-limited'
  | 'server'
  | 'timeout'
  | 'network'
  | 'auth'
  | 'bad-request'
  | 'invalid-response';

export interface ProviderFailure {
  provider: string;
  reason: FailureReason;
  status?: number;
  message: string;
}

export class ProviderExhaustedError extends GitbriefError {
  readonly code = 'ProviderExhausted';

  // last failure of each provider that was tried, in the order they were tried
  constructor(readonly failures: ProviderFailure[]) {
    super(
      `All providers failed: ${failures.map(f => `${f.provider} (${f.reason}${f.status ? ` ${f.status}` : ''}: ${f.message})`).join('; ')}`,
      'Check your API keys and network connection, then try again.'
    );
  }
}

export class MalformedCompletionError extends GitbriefError {
  readonly code = 'MalformedCompletion';

  constructor(reason: string) {
    super(`Provider returned an unusable completion: ${reason}`, 'Try again or switch provider with GITBRIEF_PROVIDER.');
  }
}

export class ExportError extends GitbriefError {
  readonly code = 'ExportError';

  constructor(readonly target: 'file' | 'slack', message: string, hint?: string) {
    super(message, hint);
  }
}

export class ConfigError extends GitbriefError {
  readonly code = 'ConfigError';

  // names of the environment variables that failed validation
  constructor(readonly variables: string[], detail: string) {
    super(
      `Invalid environment override ${variables.join(', ')}: ${detail}`,
      `Fix or unset ${variables.join(', ')}; run gitbrief init to see the supported settings.`
    );
  }
}

export class AbortedByUserError extends GitbriefError {
  readonly code = 'AbortedByUser';

  constructor() {
    super('Aborted');
  }
}

export function isGitbriefError(error: unknown): error is GitbriefError {
  return error instanceof GitbriefError;
}
