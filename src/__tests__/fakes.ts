import { CommitHeader, CommitScope, FileChange, GitSource, RepoStatus, TimeWindow } from '../domain/git/types';
import { CompletionProvider, ProviderId, ProviderRequest, ProviderResponse, failed } from '../infra/api/types';
import { FailureReason } from '../shared/errors';
import { Logger } from '../shared/logger';

export function filePatch(path: string, added: string[], removed: string[] = []): string {
  return [
    `diff --git a/${path} b/${path}`,
    'index 1111111..2222222 100644',
    `--- a/${path}`,
    `+++ b/${path}`,
    `@@ -1,${removed.length} +1,${added.length} @@`,
    ...removed.map(line => `-${line}`),
    ...added.map(line => `+${line}`)
  ].join('\n') + '\n';
}

export function change(path: string, additions: number, deletions: number, overrides: Partial<FileChange> = {}): FileChange {
  return {
    path,
    oldPath: null,
    kind: 'modified',
    additions,
    deletions,
    binary: false,
    hunk: `diff --git a/${path} b/${path}`,
    ...overrides
  };
}

export class FakeGitSource implements GitSource {
  repository = true;
  stagedPatch = '';
  worktreePatch = '';
  headers: CommitHeader[] = [];
  patches: Record<string, string> = {};
  windows: TimeWindow[] = [];
  commits: Array<{ message: string; scope: CommitScope }> = [];
  repoStatus: RepoStatus = {
    branch: 'main',
    staged: [],
    modified: [],
    untracked: [],
    isDirty: false,
    lastCommitAt: null
  };

  async isRepository(): Promise<boolean> {
    return this.repository;
  }

  async workingTreePatch(stagedOnly: boolean): Promise<string> {
    return stagedOnly ? this.stagedPatch : this.worktreePatch;
  }

  async commitsBetween(window: TimeWindow): Promise<CommitHeader[]> {
    this.windows.push(window);
    return this.headers;
  }

  async commitPatch(hash: string): Promise<string> {
    return this.patches[hash] ?? '';
  }

  async status(): Promise<RepoStatus> {
    return this.repoStatus;
  }

  async commit(message: string, scope: CommitScope = {}): Promise<string> {
    this.commits.push({ message, scope });
    return 'f00dbab';
  }
}

export type Scripted = ProviderResponse | Error | ((request: ProviderRequest, signal: AbortSignal) => Promise<ProviderResponse>);

export function ok(provider: ProviderId, text: string): ProviderResponse {
  return { status: 'success', provider, model: `${provider}-model`, text };
}

export function fail(provider: ProviderId, reason: FailureReason, status?: number): ProviderResponse {
  return failed(provider, reason, `${reason} from ${provider}`, status);
}

/**
 * Plays back a fixed list of outcomes; the last one repeats.
 */
export class ScriptedProvider implements CompletionProvider {
  readonly model: string;
  readonly requests: ProviderRequest[] = [];

  constructor(readonly id: ProviderId, private readonly script: Scripted[]) {
    this.model = `${id}-model`;
  }

  async complete(request: ProviderRequest, signal: AbortSignal): Promise<ProviderResponse> {
    this.requests.push(request);
    const next = this.script[Math.min(this.requests.length, this.script.length) - 1];
    if (next instanceof Error) throw next;
    if (typeof next === 'function') return next(request, signal);
    return next;
  }
}

export class RecordingLogger implements Logger {
  readonly lines: Array<{ level: string; message: string }> = [];

  debug(message: string): void {
    this.lines.push({ level: 'debug', message });
  }

  info(message: string): void {
    this.lines.push({ level: 'info', message });
  }

  warn(message: string): void {
    this.lines.push({ level: 'warn', message });
  }

  error(message: string): void {
    this.lines.push({ level: 'error', message });
  }
}
