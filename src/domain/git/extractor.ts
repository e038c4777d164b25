import { parseUnifiedDiff } from './diff-parser';
import { ChangeSet, CommitUnit, ExtractMode, GitSource, RepoStatus, TimeWindow } from './types';
import { NotAGitRepositoryError } from '../../shared/errors';
import { TIME_CONSTANTS } from '../../shared/constants';
import { Logger, silentLogger } from '../../shared/logger';

export interface ExtractorOptions {
  now?: () => Date;
  logger?: Logger;
}

/**
 * Turns repository state into a ChangeSet. Git failures propagate untouched,
 * so an invocation either gets a complete ChangeSet or nothing.
 */
export class GitStateExtractor {
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(
    private readonly source: GitSource,
    private readonly repoPath: string,
    options: ExtractorOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
  }

  async extract(request: ExtractMode): Promise<ChangeSet> {
    await this.ensureRepository();

    switch (request.mode) {
      case 'uncommitted':
        return this.workingTree(false);
      case 'staged':
        return this.workingTree(true);
      case 'last-n-days':
        return this.history(request.days);
    }
  }

  async status(): Promise<RepoStatus> {
    await this.ensureRepository();
    return this.source.status();
  }

  windowFor(days: number): TimeWindow {
    const until = this.now();
    return { since: new Date(until.getTime() - days * TIME_CONSTANTS.DAY_MS), until };
  }

  private async ensureRepository(): Promise<void> {
    if (!(await this.source.isRepository())) {
      throw new NotAGitRepositoryError(this.repoPath);
    }
  }

  private async workingTree(stagedOnly: boolean): Promise<ChangeSet> {
    const patch = await this.source.workingTreePatch(stagedOnly);
    const files = parseUnifiedDiff(patch);
    this.logger.debug('working tree extracted', { stagedOnly, files: files.length });
    return { source: 'working-tree', staged: stagedOnly, files };
  }

  private async history(days: number): Promise<ChangeSet> {
    const window = this.windowFor(days);
    const headers = await this.source.commitsBetween(window);

    // one git process at a time
    const commits: CommitUnit[] = [];
    for (const header of headers) {
      const patch = await this.source.commitPatch(header.hash);
      commits.push({ ...header, files: parseUnifiedDiff(patch) });
    }

    commits.sort((a, b) => Date.parse(b.date) - Date.parse(a.date));
    this.logger.debug('history extracted', { days, commits: commits.length });
    return { source: 'history', window, commits };
  }
}
