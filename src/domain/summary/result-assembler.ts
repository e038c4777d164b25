import { ChangeSet } from '../git/types';
import { toCommitRef } from './normalizer';
import { CommitMessage, CommitRef, Report, ReportEntry, Result, StatusSummary, TaskRequest } from './types';
import { MalformedCompletionError } from '../../shared/errors';

const DAY_HEADING = /^#{2,3}\s+\**(\d{4}-\d{2}-\d{2})\**/;
const ANY_HEADING = /^#{1,6}\s+/;
const BULLET = /^\s*(?:[-*+]|\d+[.)])\s+(.*)$/;

/**
 * Removes a ``` fence the model wrapped around its whole answer
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith('```')) return trimmed;
  const lines = trimmed.split('\n');
  const last = lines.length - 1;
  if (last < 1) return '';
  const end = lines[last].trim() === '```' ? last : lines.length;
  return lines.slice(1, end).join('\n').trim();
}

/**
 * Shortens `text` to at most `limit` characters at a word boundary.
 * A first word longer than the limit is the one case where a hard cut happens.
 */
export function truncateAtWord(text: string, limit: number): string {
  if (text.length <= limit) return text;

  const words = text.split(/\s+/).filter(Boolean);
  let result = '';
  for (const word of words) {
    const next = result ? `${result} ${word}` : word;
    if (next.length > limit) break;
    result = next;
  }

  if (!result) return text.slice(0, limit);
  return result.replace(/[\s,;:\-]+$/, '');
}

function cleanSubject(line: string): string {
  return line.trim()
    .replace(/^commit message:\s*/i, '')
    .replace(/^["'`]+|["'`]+$/g, '')
    .replace(/\.+$/, '')
    .trim();
}

export class ResultAssembler {
  assemble(task: TaskRequest, completion: string, changeSet: ChangeSet): Result {
    const text = stripCodeFence(completion);
    if (!text) {
      throw new MalformedCompletionError('empty completion');
    }

    switch (task.kind) {
      case 'status':
        return this.status(text);
      case 'commit':
        return this.commit(text, task.subjectMaxLength);
      case 'report': {
        const commits = changeSet.source === 'history' ? changeSet.commits.map(toCommitRef) : [];
        return this.report(text, task.days, commits);
      }
    }
  }

  private status(text: string): StatusSummary {
    return { kind: 'status', text };
  }

  private commit(text: string, subjectMaxLength: number): CommitMessage {
    const lines = text.split('\n');
    // a label, quotes or dots alone on a line are not a subject
    const firstIndex = lines.findIndex(line => cleanSubject(line) !== '');
    if (firstIndex === -1) {
      throw new MalformedCompletionError('no commit subject');
    }

    const subject = truncateAtWord(cleanSubject(lines[firstIndex]), subjectMaxLength);
    const body = lines.slice(firstIndex + 1).join('\n').trim();

    return { kind: 'commit', subject, body: body || null };
  }

  private report(text: string, days: number, commits: CommitRef[]): Report {
    const byDay = new Map<string, string[]>();
    const overview: string[] = [];
    let currentDay: string | null = null;

    for (const raw of text.split('\n')) {
      const line = raw.trimEnd();
      const day = DAY_HEADING.exec(line);
      if (day) {
        currentDay = day[1];
        if (!byDay.has(currentDay)) byDay.set(currentDay, []);
        continue;
      }
      if (ANY_HEADING.test(line)) {
        // a non-date heading ends the current day section
        currentDay = null;
        continue;
      }
      if (!line.trim()) continue;

      if (currentDay === null) {
        overview.push(line.trim());
        continue;
      }
      const bullet = BULLET.exec(line);
      const items = byDay.get(currentDay);
      if (items) items.push(bullet ? bullet[1].trim() : line.trim());
    }

    // only days that actually have commits become entries; a day the model
    // skipped is filled in from its commit subjects
    const commitDays = [...new Set(commits.map(commit => commit.day))].sort((a, b) => (a < b ? 1 : a > b ? -1 : 0));
    const matched = commitDays.filter(day => (byDay.get(day) ?? []).length > 0);

    const entries: ReportEntry[] = matched.length === 0 ? [] : commitDays.map(day => {
      const dayCommits = commits.filter(commit => commit.day === day);
      const items = byDay.get(day) ?? [];
      return { day, items: items.length > 0 ? items : dayCommits.map(commit => commit.subject), commits: dayCommits };
    });

    if (entries.length === 0) {
      // the model ignored the day layout: keep its whole answer as one entry
      return {
        kind: 'report',
        overview: '',
        entries: [{ day: null, items: [text], commits }],
        grouped: false,
        days,
        totalCommits: commits.length,
        commits
      };
    }

    return {
      kind: 'report',
      overview: overview.join('\n'),
      entries,
      grouped: true,
      days,
      totalCommits: commits.length,
      commits
    };
  }
}
