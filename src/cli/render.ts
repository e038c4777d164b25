import chalk from 'chalk';
import { i18n } from '../i18n';
import { CommitMessage, CommitRef, PromptPayload, Report } from '../domain/summary/types';
import { RepoStatus } from '../domain/git/types';
import { TEXT_CONSTANTS, TIME_CONSTANTS } from '../shared/constants';

export type Write = (line: string) => void;

const MAX_LISTED = 5;
const MAX_UNTRACKED = 3;

export function formatAgo(then: Date, now: Date): string {
  const ago = i18n().getOutputs().ago;
  const ms = Math.max(0, now.getTime() - then.getTime());
  const days = Math.floor(ms / TIME_CONSTANTS.DAY_MS);
  if (days === 0) {
    const minutes = Math.floor(ms / 60000);
    return minutes < 60 ? ago.minutes(minutes) : ago.hours(Math.floor(minutes / 60));
  }
  return days === 1 ? ago.yesterday : ago.days(days);
}

export function previewLines(diff: string, maxLines: number = TEXT_CONSTANTS.MAX_PREVIEW_LINES): string[] {
  if (!diff.trim()) return [];
  const lines = diff.split('\n');
  const shown = lines.slice(0, maxLines);
  if (lines.length > maxLines) {
    shown.push(i18n().getOutputs().moreLines(lines.length - maxLines));
  }
  return shown;
}

/**
 * Terminal output. Everything goes through `write` so it can be captured.
 */
export class Renderer {
  constructor(private readonly write: Write = line => console.log(line)) {}

  header(title: string, subtitle?: string): void {
    this.write('');
    this.write(chalk.bold.cyan(`🚀 ${title}`));
    if (subtitle) this.write(chalk.gray(subtitle));
    this.write('');
  }

  info(message: string): void {
    this.write(chalk.blue(`ℹ️  ${message}`));
  }

  warn(message: string): void {
    this.write(chalk.yellow(`⚠️  ${message}`));
  }

  success(message: string): void {
    this.write(chalk.green(`✅ ${message}`));
  }

  repoStatus(status: RepoStatus, now: Date): void {
    const outputs = i18n().getOutputs();
    this.write(chalk.bold(outputs.branch(status.branch, status.isDirty)));

    this.fileGroup(chalk.bold.green(outputs.staged(status.staged.length)), status.staged, MAX_LISTED, chalk.green);
    this.fileGroup(chalk.bold.yellow(outputs.modified(status.modified.length)), status.modified, MAX_LISTED, chalk.yellow);
    this.fileGroup(chalk.dim(outputs.untracked(status.untracked.length)), status.untracked, MAX_UNTRACKED, chalk.dim);

    if (status.lastCommitAt) {
      const at = status.lastCommitAt.toISOString().slice(0, 16).replace('T', ' ');
      this.write('');
      this.write(outputs.lastActivity(chalk.bold(formatAgo(status.lastCommitAt, now)), at));
    }
  }

  nothingToSummarize(): void {
    this.write('');
    this.write(chalk.green(i18n().getOutputs().nothingToSummarize));
  }

  payloadStats(payload: PromptPayload): void {
    const outputs = i18n().getOutputs();
    const { files, additions, deletions } = payload.totals;
    this.write('');
    this.write(outputs.diffStats(files, additions, deletions));
    for (const file of payload.files.slice(0, MAX_LISTED * 2)) {
      this.write(`  ${chalk.cyan('•')} ${file.path} ${chalk.green(`+${file.additions}`)} ${chalk.red(`-${file.deletions}`)}`);
    }
    if (payload.files.length > MAX_LISTED * 2) {
      this.write(chalk.dim(`  ${outputs.andMore(payload.files.length - MAX_LISTED * 2)}`));
    }
    if (payload.truncated) this.warn(outputs.truncatedNotice);
  }

  diffPreview(diff: string): void {
    const lines = previewLines(diff);
    if (lines.length === 0) return;
    this.write('');
    this.write(chalk.bold(i18n().getOutputs().diffPreview));
    for (const line of lines) {
      if (line.startsWith('+') && !line.startsWith('+++')) this.write(chalk.green(line));
      else if (line.startsWith('-') && !line.startsWith('---')) this.write(chalk.red(line));
      else if (line.startsWith('@@')) this.write(chalk.cyan(line));
      else this.write(chalk.dim(line));
    }
  }

  summary(text: string): void {
    this.write('');
    this.write(chalk.bold.green(i18n().getOutputs().summaryTitle));
    this.write('');
    this.write(text);
  }

  commitMessage(message: CommitMessage): void {
    const outputs = i18n().getOutputs();
    this.write('');
    this.write(chalk.bold.yellow(outputs.commitTitle));
    this.write('');
    this.write(chalk.bold.yellow(message.subject));
    if (message.body) {
      this.write('');
      this.write(message.body);
    }
    this.write('');
    this.write(chalk.dim(outputs.copyHint));
    const body = message.body ? ` -m ${JSON.stringify(message.body)}` : '';
    this.write(chalk.cyan(`  git commit -m ${JSON.stringify(message.subject)}${body}`));
  }

  commitsTable(commits: readonly CommitRef[]): void {
    if (commits.length === 0) return;
    const outputs = i18n().getOutputs();
    this.write('');
    this.write(chalk.bold(outputs.commitsTitle));
    commits.slice(0, TEXT_CONSTANTS.MAX_COMMIT_ROWS).forEach((commit, index) => {
      const subject = commit.subject.length > TEXT_CONSTANTS.MAX_SUBJECT_DISPLAY
        ? commit.subject.slice(0, TEXT_CONSTANTS.MAX_SUBJECT_DISPLAY) + '...'
        : commit.subject;
      this.write(`${chalk.dim(String(index + 1).padStart(3))}  ${chalk.magenta(commit.day.slice(5))}  ${subject}  ${chalk.cyan(commit.author)}`);
    });
    if (commits.length > TEXT_CONSTANTS.MAX_COMMIT_ROWS) {
      this.write(chalk.dim(`     ${outputs.andMore(commits.length - TEXT_CONSTANTS.MAX_COMMIT_ROWS)}`));
    }
  }

  report(report: Report): void {
    const outputs = i18n().getOutputs();
    this.write('');
    this.write(chalk.bold.blue(outputs.reportTitle(report.days)));
    if (report.overview) {
      this.write('');
      this.write(report.overview);
    }
    for (const entry of report.entries) {
      this.write('');
      this.write(chalk.bold.magenta(entry.day ?? outputs.ungrouped));
      for (const item of entry.items) {
        this.write(entry.day === null ? item : `  • ${item}`);
      }
    }
  }

  private fileGroup(title: string, files: string[], limit: number, colour: (text: string) => string): void {
    if (files.length === 0) return;
    this.write('');
    this.write(title);
    for (const file of files.slice(0, limit)) {
      this.write(`  ${colour('•')} ${file}`);
    }
    if (files.length > limit) {
      this.write(chalk.dim(`  ${i18n().getOutputs().andMore(files.length - limit)}`));
    }
  }
}
