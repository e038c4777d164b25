import { ChangeSet, CommitUnit, FileChange, changedLines } from '../git/types';
import { CommitRef, NormalizedFile, PromptPayload, TaskKind } from './types';
import { GENERATED_PATH_PATTERNS, GENERATED_WEIGHT } from '../../shared/constants';

const SEPARATOR = '\n\n';

interface DiffUnit {
  change: FileChange;
  commit: CommitRef | null;
  // position in the ChangeSet, last tie breaker
  order: number;
  score: number;
}

export function shortHash(hash: string): string {
  return hash.slice(0, 7);
}

// Calendar day in the author's own offset: "2026-10-18T23:10:00+02:00" -> "2026-10-18"
export function commitDay(isoDate: string): string {
  return isoDate.slice(0, 10);
}

export function toCommitRef(commit: CommitUnit): CommitRef {
  return {
    hash: commit.hash,
    shortHash: shortHash(commit.hash),
    day: commitDay(commit.date),
    subject: commit.subject,
    author: commit.author
  };
}

export function isGeneratedPath(path: string): boolean {
  return GENERATED_PATH_PATTERNS.some(pattern => pattern.test(path));
}

export function importanceScore(change: FileChange): number {
  const weight = change.binary || isGeneratedPath(change.path) ? GENERATED_WEIGHT : 1;
  return Math.max(changedLines(change), 1) * weight;
}

/**
 * Greedy, importance-ordered packing of a ChangeSet into a character budget.
 * A file either appears with its whole diff, as a one-line summary, or not at
 * all; hunks are never cut.
 */
export class DiffNormalizer {
  constructor(private readonly budget: number) {
    if (!Number.isInteger(budget) || budget <= 0) {
      throw new RangeError(`Prompt budget must be a positive integer, got ${budget}`);
    }
  }

  normalize(changeSet: ChangeSet, task: TaskKind): PromptPayload {
    const commits = changeSet.source === 'history' ? changeSet.commits.map(toCommitRef) : [];
    const units = this.rank(changeSet, commits);

    const parts: string[] = [];
    let used = 0;
    let truncated = false;

    const fits = (part: string) => used + (parts.length > 0 ? SEPARATOR.length : 0) + part.length <= this.budget;
    const push = (part: string) => {
      used += (parts.length > 0 ? SEPARATOR.length : 0) + part.length;
      parts.push(part);
    };

    if (commits.length > 0) {
      const logLines: string[] = [];
      for (const commit of commits) {
        const line = commitLogLine(commit);
        const candidate = [...logLines, line].join('\n');
        if (!fits(candidate)) {
          truncated = true;
          break;
        }
        logLines.push(line);
      }
      if (logLines.length > 0) push(logLines.join('\n'));
    }

    const files: NormalizedFile[] = [];
    let omitted = 0;
    for (const unit of units) {
      const full = renderFull(unit);
      const summary = renderSummary(unit);
      let inclusion: NormalizedFile['inclusion'];

      if (fits(full)) {
        push(full);
        inclusion = 'full';
      } else if (fits(summary)) {
        push(summary);
        inclusion = 'summary';
        truncated = true;
      } else {
        inclusion = 'omitted';
        truncated = true;
        omitted++;
      }

      files.push({
        path: unit.change.path,
        kind: unit.change.kind,
        additions: unit.change.additions,
        deletions: unit.change.deletions,
        commit: unit.commit?.shortHash ?? null,
        score: unit.score,
        inclusion
      });
    }

    if (omitted > 0) {
      const notice = `... ${omitted} more file change(s) omitted`;
      if (fits(notice)) push(notice);
    }

    return {
      task,
      content: parts.join(SEPARATOR),
      truncated,
      budget: this.budget,
      used,
      files,
      commits,
      totals: {
        files: files.length,
        additions: files.reduce((sum, f) => sum + f.additions, 0),
        deletions: files.reduce((sum, f) => sum + f.deletions, 0)
      }
    };
  }

  private rank(changeSet: ChangeSet, commits: CommitRef[]): DiffUnit[] {
    const units: DiffUnit[] = [];
    if (changeSet.source === 'working-tree') {
      changeSet.files.forEach(change => {
        units.push({ change, commit: null, order: units.length, score: importanceScore(change) });
      });
    } else {
      changeSet.commits.forEach((commit, index) => {
        for (const change of commit.files) {
          units.push({ change, commit: commits[index], order: units.length, score: importanceScore(change) });
        }
      });
    }

    return units.sort((a, b) =>
      b.score - a.score ||
      compareText(a.change.path, b.change.path) ||
      a.order - b.order
    );
  }
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function commitLogLine(commit: CommitRef): string {
  return `- [${commit.day}] ${commit.shortHash} ${commit.subject} (by ${commit.author})`;
}

function header(unit: DiffUnit): string {
  const { change, commit } = unit;
  const where = commit ? ` [${commit.shortHash}]` : '';
  const from = change.oldPath ? ` from ${change.oldPath}` : '';
  return `### ${change.path}${where} (${change.kind}${from}, +${change.additions} -${change.deletions})`;
}

function renderFull(unit: DiffUnit): string {
  if (unit.change.binary) return `${header(unit)}\nbinary file`;
  return unit.change.hunk ? `${header(unit)}\n${unit.change.hunk}` : header(unit);
}

function renderSummary(unit: DiffUnit): string {
  return `${header(unit)}: ${changedLines(unit.change)} lines changed, diff omitted`;
}
