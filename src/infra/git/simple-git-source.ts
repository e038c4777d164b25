import simpleGit, { SimpleGit } from 'simple-git';
import { CommitHeader, CommitScope, GitSource, RepoStatus, TimeWindow } from '../../domain/git/types';
import { GitCommandError } from '../../shared/errors';

const DIFF_FLAGS = ['-M', '--no-color', '--no-ext-diff'];

interface GitFailure {
  exitCode: number;
  stderr: string;
}

/**
 * GitSource backed by simple-git. Every non-zero exit becomes a GitCommandError
 * carrying the exit code and captured stderr.
 */
export class SimpleGitSource implements GitSource {
  private readonly git: SimpleGit;
  private lastFailure: GitFailure | null = null;

  constructor(repoPath: string) {
    this.git = simpleGit({
      baseDir: repoPath,
      config: ['core.quotepath=false'],
      errors: (error, result) => {
        if (result.exitCode === 0) return error;
        const failure = {
          exitCode: result.exitCode,
          stderr: Buffer.concat(result.stdErr).toString('utf8')
        };
        this.lastFailure = failure;
        return new GitCommandError(failure.exitCode, failure.stderr);
      }
    });
  }

  async isRepository(): Promise<boolean> {
    return this.run(() => this.git.checkIsRepo());
  }

  async topLevel(): Promise<string> {
    const root = await this.run(() => this.git.revparse(['--show-toplevel']));
    return root.trim();
  }

  async workingTreePatch(stagedOnly: boolean): Promise<string> {
    if (stagedOnly) {
      return this.run(() => this.git.raw(['diff', '--cached', ...DIFF_FLAGS]));
    }
    if (await this.hasHead()) {
      return this.run(() => this.git.raw(['diff', 'HEAD', ...DIFF_FLAGS]));
    }
    // no commits yet: index against the empty tree, then worktree against the index
    const staged = await this.run(() => this.git.raw(['diff', '--cached', ...DIFF_FLAGS]));
    const unstaged = await this.run(() => this.git.raw(['diff', ...DIFF_FLAGS]));
    return staged + unstaged;
  }

  async commitsBetween(window: TimeWindow): Promise<CommitHeader[]> {
    if (!(await this.hasHead())) return [];

    const log = await this.run(() => this.git.log({
      '--since': window.since.toISOString(),
      '--until': window.until.toISOString(),
      '--no-merges': null
    }));

    return log.all.map(entry => ({
      hash: entry.hash,
      author: entry.author_name,
      email: entry.author_email,
      date: entry.date,
      subject: entry.message,
      body: entry.body.trim()
    }));
  }

  async commitPatch(hash: string): Promise<string> {
    return this.run(() => this.git.raw(['show', hash, '--format=', '--patch', ...DIFF_FLAGS]));
  }

  async status(): Promise<RepoStatus> {
    const status = await this.run(() => this.git.status());

    const staged: string[] = [];
    const modified: string[] = [];
    const untracked: string[] = [];
    for (const file of status.files) {
      if (file.index === '?') {
        untracked.push(file.path);
        continue;
      }
      if (/^[MADRC]$/.test(file.index)) staged.push(file.path);
      if (file.working_dir === 'M' || file.working_dir === 'D') modified.push(file.path);
    }

    return {
      branch: status.current ?? 'HEAD',
      staged,
      modified,
      untracked,
      isDirty: staged.length > 0 || modified.length > 0,
      lastCommitAt: await this.lastCommitDate()
    };
  }

  // `all` also commits tracked changes that were never staged; `paths` limits the commit to those files
  async commit(message: string, scope: CommitScope = {}): Promise<string> {
    const paths = scope.paths ? [...scope.paths] : [];
    const result = await this.run(() => paths.length > 0
      ? this.git.commit(message, paths)
      : this.git.commit(message, undefined, scope.all ? { '--all': null } : {}));
    return result.commit;
  }

  private async lastCommitDate(): Promise<Date | null> {
    if (!(await this.hasHead())) return null;
    const log = await this.run(() => this.git.log({ maxCount: 1 }));
    return log.latest ? new Date(log.latest.date) : null;
  }

  private async hasHead(): Promise<boolean> {
    try {
      await this.git.raw(['rev-parse', '--verify', '--quiet', 'HEAD']);
      return true;
    } catch {
      return false;
    }
  }

  private takeFailure(): GitFailure | null {
    const failure = this.lastFailure;
    this.lastFailure = null;
    return failure;
  }

  private async run<T>(task: () => Promise<T>): Promise<T> {
    this.lastFailure = null;
    try {
      return await task();
    } catch (error) {
      if (error instanceof GitCommandError) throw error;
      const failure = this.takeFailure();
      throw new GitCommandError(
        failure?.exitCode ?? 1,
        failure?.stderr ?? (error instanceof Error ? error.message : String(error))
      );
    }
  }
}
