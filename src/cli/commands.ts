import path from 'path';
import { i18n } from '../i18n';
import { ChangeSet, CommitScope, FileChange, touchedPaths } from '../domain/git/types';
import { GitStateExtractor } from '../domain/git/extractor';
import { ChangeSelector, SummaryPipeline } from '../domain/summary/pipeline';
import { commitDay } from '../domain/summary/normalizer';
import { CommitMessage, NothingToSummarize, Report, StatusSummary, formatCommitMessage } from '../domain/summary/types';
import { renderReportMarkdown } from '../infra/export/markdown';
import { SlackPayload, buildReportPayload, buildStatusPayload } from '../infra/slack/sender';
import { Renderer } from './render';
import { Prompter } from './prompter';
import { TEXT_CONSTANTS } from '../shared/constants';

export interface ReportSink {
  write(target: string, markdown: string): string;
}

export interface Notifier {
  ensureConfigured(): string;
  send(payload: SlackPayload, signal?: AbortSignal): Promise<void>;
}

export interface Committer {
  commit(message: string, scope?: CommitScope): Promise<string>;
}

export interface CommandContext {
  repoRoot: string;
  pipeline: SummaryPipeline;
  extractor: GitStateExtractor;
  renderer: Renderer;
  exporter: ReportSink;
  notifier: Notifier;
  committer: Committer;
  providerLabel: string | null;
  subjectMaxLength: number;
  now: () => Date;
  prompter?: Prompter;
  signal?: AbortSignal;
}

export interface StatusOptions {
  showDiff: boolean;
  slack: boolean;
  // let the user choose which files to summarize
  select: boolean;
}

export interface CommitOptions {
  apply: boolean;
  select: boolean;
  // ask before running git commit
  confirm: boolean;
  // false skips the staged-only pass
  stagedFirst: boolean;
}

export interface ReportOptions {
  days: number;
  save: string | null;
  slack: boolean;
  // let the user choose which commits go into the report
  select: boolean;
}

export function repoName(repoRoot: string): string {
  return path.basename(repoRoot);
}

export function rawDiff(changeSet: ChangeSet): string {
  const files = changeSet.source === 'working-tree'
    ? changeSet.files
    : changeSet.commits.flatMap(commit => commit.files);
  return files.map(file => file.hunk).filter(Boolean).join('\n');
}

function fileLabel(file: FileChange): string {
  const from = file.oldPath ? `${file.oldPath} -> ` : '';
  return `${from}${file.path} (+${file.additions} -${file.deletions})`;
}

export function fileSelector(prompter: Prompter): ChangeSelector {
  return async changeSet => {
    if (changeSet.source !== 'working-tree') return changeSet;
    const files = await prompter.pick(
      i18n().getOutputs().selectFiles,
      changeSet.files.map(file => ({ label: fileLabel(file), value: file }))
    );
    return { ...changeSet, files };
  };
}

export function commitSelector(prompter: Prompter): ChangeSelector {
  return async changeSet => {
    if (changeSet.source !== 'history') return changeSet;
    const max = TEXT_CONSTANTS.MAX_SUBJECT_DISPLAY;
    const commits = await prompter.pick(
      i18n().getOutputs().selectCommits,
      changeSet.commits.map(commit => {
        const subject = commit.subject.length > max ? `${commit.subject.slice(0, max)}...` : commit.subject;
        return { label: `[${commitDay(commit.date).slice(5).replace('-', '/')}] ${subject}`, value: commit };
      })
    );
    return { ...changeSet, commits };
  };
}

function selectorFor(ctx: CommandContext, wanted: boolean, make: (prompter: Prompter) => ChangeSelector): ChangeSelector | undefined {
  return wanted && ctx.prompter ? make(ctx.prompter) : undefined;
}

function announceGeneration(ctx: CommandContext): void {
  if (ctx.providerLabel) {
    ctx.renderer.info(i18n().getOutputs().generating(ctx.providerLabel));
  }
}

export async function runStatus(ctx: CommandContext, options: StatusOptions): Promise<StatusSummary | NothingToSummarize> {
  const outputs = i18n().getOutputs();
  const { renderer } = ctx;
  // fail before any provider call when the result could not be delivered
  if (options.slack) ctx.notifier.ensureConfigured();

  renderer.header(outputs.headers.status, outputs.repository(repoName(ctx.repoRoot)));
  renderer.repoStatus(await ctx.extractor.status(), ctx.now());

  const prepared = await ctx.pipeline.prepare({ kind: 'status' }, selectorFor(ctx, options.select, fileSelector));
  if (prepared.payload === null) {
    if (prepared.narrowed) renderer.warn(outputs.nothingSelected);
    else renderer.nothingToSummarize();
    return { kind: 'nothing', task: 'status' };
  }

  renderer.payloadStats(prepared.payload);
  if (options.showDiff) renderer.diffPreview(rawDiff(prepared.changeSet));

  announceGeneration(ctx);
  const { result } = await ctx.pipeline.generate(prepared, ctx.signal);
  if (result.kind !== 'status') return { kind: 'nothing', task: 'status' };

  renderer.summary(result.text);

  if (options.slack) {
    await ctx.notifier.send(buildStatusPayload(result, repoName(ctx.repoRoot)), ctx.signal);
    renderer.success(outputs.sentToSlack);
  }
  return result;
}

// the commit records exactly the changes the message was written from
function commitScope(changeSet: ChangeSet, narrowed: boolean): CommitScope {
  if (changeSet.source !== 'working-tree') return {};
  if (narrowed) return { paths: touchedPaths(changeSet.files) };
  return { all: !changeSet.staged };
}

export async function runCommit(ctx: CommandContext, options: CommitOptions): Promise<CommitMessage | NothingToSummarize> {
  const outputs = i18n().getOutputs();
  const { renderer } = ctx;

  renderer.header(outputs.headers.commit, outputs.repository(repoName(ctx.repoRoot)));

  const prepared = await ctx.pipeline.prepare({
    kind: 'commit',
    subjectMaxLength: ctx.subjectMaxLength,
    stagedFirst: options.stagedFirst
  }, selectorFor(ctx, options.select, fileSelector));
  if (prepared.stagedFallback) renderer.warn(outputs.stagedFallback);
  if (prepared.payload === null) {
    if (prepared.narrowed) renderer.warn(outputs.nothingSelected);
    else renderer.nothingToSummarize();
    return { kind: 'nothing', task: 'commit' };
  }

  renderer.payloadStats(prepared.payload);
  announceGeneration(ctx);
  const { result } = await ctx.pipeline.generate(prepared, ctx.signal);
  if (result.kind !== 'commit') return { kind: 'nothing', task: 'commit' };

  renderer.commitMessage(result);

  let apply = options.apply;
  if (!apply && options.confirm && ctx.prompter) {
    apply = await ctx.prompter.confirm(outputs.confirmCommit, false);
  }
  if (apply) {
    const hash = await ctx.committer.commit(formatCommitMessage(result), commitScope(prepared.changeSet, prepared.narrowed));
    renderer.success(outputs.committed(hash));
  }
  return result;
}

export async function runReport(ctx: CommandContext, options: ReportOptions): Promise<Report | NothingToSummarize> {
  const outputs = i18n().getOutputs();
  const { renderer } = ctx;
  const name = repoName(ctx.repoRoot);
  if (options.slack) ctx.notifier.ensureConfigured();

  renderer.header(outputs.headers.report, outputs.repository(name));

  const prepared = await ctx.pipeline.prepare({ kind: 'report', days: options.days }, selectorFor(ctx, options.select, commitSelector));
  if (prepared.payload === null) {
    if (prepared.narrowed) renderer.warn(outputs.nothingSelected);
    else renderer.info(outputs.noCommits(options.days));
    return { kind: 'nothing', task: 'report' };
  }
  if (prepared.narrowed) renderer.info(outputs.selectedCommits(prepared.payload.commits.length));
  else renderer.info(outputs.foundCommits(prepared.payload.commits.length, options.days));
  if (prepared.payload.truncated) renderer.warn(outputs.truncatedNotice);

  announceGeneration(ctx);
  const { result } = await ctx.pipeline.generate(prepared, ctx.signal);
  if (result.kind !== 'report') return { kind: 'nothing', task: 'report' };

  renderer.report(result);
  renderer.commitsTable(result.commits);

  if (options.save) {
    const markdown = renderReportMarkdown(result, { repoName: name, generatedAt: ctx.now() }, outputs.ungrouped);
    renderer.success(outputs.saved(ctx.exporter.write(options.save, markdown)));
  }
  if (options.slack) {
    await ctx.notifier.send(buildReportPayload(result, name), ctx.signal);
    renderer.success(outputs.sentToSlack);
  }
  return result;
}
