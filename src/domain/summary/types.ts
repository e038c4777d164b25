import { ChangeKind } from '../git/types';

export type TaskKind = 'status' | 'commit' | 'report';

export type TaskRequest =
  | { kind: 'status' }
  | { kind: 'commit'; subjectMaxLength: number; stagedFirst: boolean }
  | { kind: 'report'; days: number };

export type Inclusion = 'full' | 'summary' | 'omitted';

export interface NormalizedFile {
  path: string;
  kind: ChangeKind;
  additions: number;
  deletions: number;
  // short hash of the commit the change belongs to, for history payloads
  commit: string | null;
  score: number;
  inclusion: Inclusion;
}

export interface CommitRef {
  hash: string;
  shortHash: string;
  day: string;
  subject: string;
  author: string;
}

export interface PromptPayload {
  readonly task: TaskKind;
  readonly content: string;
  readonly truncated: boolean;
  readonly budget: number;
  readonly used: number;
  readonly files: readonly NormalizedFile[];
  readonly commits: readonly CommitRef[];
  readonly totals: { files: number; additions: number; deletions: number };
}

export interface GenerationParams {
  maxOutputTokens: number;
  temperature: number;
}

export interface BuiltPrompt {
  text: string;
  generation: GenerationParams;
}

export interface StatusSummary {
  kind: 'status';
  text: string;
}

export interface CommitMessage {
  kind: 'commit';
  subject: string;
  body: string | null;
}

export interface ReportEntry {
  // YYYY-MM-DD, or null for an ungrouped entry
  day: string | null;
  items: string[];
  commits: CommitRef[];
}

export interface Report {
  kind: 'report';
  overview: string;
  entries: ReportEntry[];
  grouped: boolean;
  days: number;
  totalCommits: number;
  // every commit in the window, newest first
  commits: CommitRef[];
}

export interface NothingToSummarize {
  kind: 'nothing';
  task: TaskKind;
}

export type Result = StatusSummary | CommitMessage | Report | NothingToSummarize;

export function formatCommitMessage(message: CommitMessage): string {
  return message.body ? `${message.subject}\n\n${message.body}` : message.subject;
}
