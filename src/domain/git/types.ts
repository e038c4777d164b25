import { z } from 'zod';

export const ChangeKind = z.enum(['added', 'modified', 'deleted', 'renamed']);
export type ChangeKind = z.infer<typeof ChangeKind>;

// One file's delta. `oldPath` is set only for renames.
export const FileChange = z.object({
  path: z.string().min(1),
  oldPath: z.string().min(1).nullable(),
  kind: ChangeKind,
  additions: z.number().int().nonnegative(),
  deletions: z.number().int().nonnegative(),
  binary: z.boolean(),
  hunk: z.string()
}).refine(
  change => (change.kind === 'renamed') === (change.oldPath !== null),
  { message: 'oldPath must be present exactly when the change is a rename' }
);
export type FileChange = z.infer<typeof FileChange>;

export const CommitUnit = z.object({
  hash: z.string().min(1),
  author: z.string(),
  email: z.string(),
  // ISO 8601 with the author's offset, as git reports it
  date: z.string(),
  subject: z.string(),
  body: z.string(),
  files: z.array(FileChange)
});
export type CommitUnit = z.infer<typeof CommitUnit>;

export interface TimeWindow {
  since: Date;
  until: Date;
}

export type ExtractMode =
  | { mode: 'uncommitted' }
  | { mode: 'staged' }
  | { mode: 'last-n-days'; days: number };

export type ChangeSet =
  | {
      readonly source: 'working-tree';
      readonly staged: boolean;
      readonly files: readonly FileChange[];
    }
  | {
      readonly source: 'history';
      readonly window: TimeWindow;
      readonly commits: readonly CommitUnit[];
    };

export interface RepoStatus {
  branch: string;
  staged: string[];
  modified: string[];
  untracked: string[];
  isDirty: boolean;
  lastCommitAt: Date | null;
}

// Header fields of one commit, before its diff is loaded
export type CommitHeader = Omit<CommitUnit, 'files'>;

/**
 * Read-only view of the repository the extractor works against
 */
export interface GitSource {
  isRepository(): Promise<boolean>;
  workingTreePatch(stagedOnly: boolean): Promise<string>;
  commitsBetween(window: TimeWindow): Promise<CommitHeader[]>;
  commitPatch(hash: string): Promise<string>;
  status(): Promise<RepoStatus>;
}

// What `git commit` should record: every tracked change, or only the given paths
export interface CommitScope {
  all?: boolean;
  paths?: readonly string[];
}

export function isEmptyChangeSet(changeSet: ChangeSet): boolean {
  return changeSet.source === 'working-tree'
    ? changeSet.files.length === 0
    : changeSet.commits.length === 0;
}

export function changedLines(change: FileChange): number {
  return change.additions + change.deletions;
}

export function changeCount(changeSet: ChangeSet): number {
  return changeSet.source === 'working-tree' ? changeSet.files.length : changeSet.commits.length;
}

// every path a commit of these changes touches, including where renames came from
export function touchedPaths(files: readonly FileChange[]): string[] {
  return [...new Set(files.flatMap(file => (file.oldPath ? [file.oldPath, file.path] : [file.path])))];
}
