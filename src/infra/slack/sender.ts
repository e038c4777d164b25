import { Report, StatusSummary } from '../../domain/summary/types';
import { averagePerDay } from '../export/markdown';
import { i18n } from '../../i18n';
import { AbortedByUserError, ExportError } from '../../shared/errors';
import { TEXT_CONSTANTS } from '../../shared/constants';

export interface SlackBlock {
  type: string;
  text?: { type: 'plain_text' | 'mrkdwn'; text: string; emoji?: boolean };
  fields?: Array<{ type: 'mrkdwn'; text: string }>;
  elements?: Array<{ type: 'mrkdwn'; text: string }>;
}

export interface SlackPayload {
  text: string;
  blocks: SlackBlock[];
}

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, maxLength - 3) + '...';
}

// Slack mrkdwn has no headings; turn "## x" into bold lines
export function toMrkdwn(markdown: string): string {
  return markdown
    .split('\n')
    .map(line => {
      const heading = /^#{1,6}\s+(.*)$/.exec(line);
      if (heading) return `*${heading[1].replace(/\*/g, '')}*`;
      return line.replace(/^\s*[-*+]\s+/, '• ').replace(/\*\*(.+?)\*\*/g, '*$1*');
    })
    .join('\n');
}

export function reportText(report: Report, ungroupedTitle = i18n().getOutputs().ungrouped): string {
  const sections: string[] = [];
  if (report.overview) sections.push(report.overview);
  for (const entry of report.entries) {
    const items = entry.day === null ? entry.items : entry.items.map(item => `• ${item}`);
    sections.push([`*${entry.day ?? ungroupedTitle}*`, ...items].join('\n'));
  }
  return sections.join('\n\n');
}

export function buildReportPayload(report: Report, repoName: string): SlackPayload {
  const outputs = i18n().getOutputs();
  const text = outputs.slack;
  const summary = truncate(reportText(report, outputs.ungrouped), TEXT_CONSTANTS.MAX_SLACK_SUMMARY);
  const blocks: SlackBlock[] = [
    { type: 'header', text: { type: 'plain_text', text: text.reportHeader, emoji: true } },
    {
      type: 'section',
      fields: [
        { type: 'mrkdwn', text: `*${text.repository}:*\n${repoName}` },
        { type: 'mrkdwn', text: `*${text.period}:*\n${text.lastDays(report.days)}` },
        { type: 'mrkdwn', text: `*${text.totalCommits}:*\n${report.totalCommits}` },
        { type: 'mrkdwn', text: `*${text.average}:*\n${text.perDay(averagePerDay(report.totalCommits, report.days))}` }
      ]
    },
    { type: 'divider' },
    { type: 'section', text: { type: 'mrkdwn', text: `*${text.summary}*\n${summary}` } }
  ];

  if (report.commits.length > 0) {
    const shown = report.commits.slice(0, TEXT_CONSTANTS.MAX_SLACK_COMMITS)
      .map(commit => `• ${commit.subject.slice(0, TEXT_CONSTANTS.MAX_SUBJECT_DISPLAY)}`);
    const rest = report.commits.length - TEXT_CONSTANTS.MAX_SLACK_COMMITS;
    if (rest > 0) shown.push(`_${text.andMore(rest)}_`);
    blocks.push({ type: 'section', text: { type: 'mrkdwn', text: `*${text.recentCommits}*\n${shown.join('\n')}` } });
  }

  blocks.push({ type: 'divider' });
  blocks.push({ type: 'context', elements: [{ type: 'mrkdwn', text: `_${text.footer}_ 🚀` }] });

  return {
    text: text.reportText(repoName, report.days),
    blocks
  };
}

export function buildStatusPayload(summary: StatusSummary, repoName: string): SlackPayload {
  const text = i18n().getOutputs().slack;
  const body = truncate(toMrkdwn(summary.text), TEXT_CONSTANTS.MAX_SLACK_SUMMARY);
  return {
    text: text.statusText(repoName),
    blocks: [
      { type: 'header', text: { type: 'plain_text', text: text.statusHeader(repoName), emoji: true } },
      { type: 'section', text: { type: 'mrkdwn', text: body } }
    ]
  };
}

export type Fetch = (url: string, init: { method: string; headers: Record<string, string>; body: string; signal?: AbortSignal }) =>
  Promise<{ ok: boolean; status: number; text(): Promise<string> }>;

/**
 * Posts a finished payload to an incoming webhook. Only ever called after the
 * Result is fully assembled.
 */
export class SlackSender {
  constructor(
    private readonly webhookUrl: string | undefined,
    private readonly fetchImpl: Fetch = fetch
  ) {}

  isConfigured(): boolean {
    return Boolean(this.webhookUrl);
  }

  ensureConfigured(): string {
    if (!this.webhookUrl) {
      throw new ExportError('slack', 'Slack webhook URL not configured', 'Set SLACK_WEBHOOK_URL in your .env file or environment.');
    }
    return this.webhookUrl;
  }

  async send(payload: SlackPayload, signal?: AbortSignal): Promise<void> {
    const webhookUrl = this.ensureConfigured();

    let response: Awaited<ReturnType<Fetch>>;
    try {
      response = await this.fetchImpl(webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal
      });
    } catch (error) {
      if (signal?.aborted) throw new AbortedByUserError();
      throw new ExportError('slack', `Failed to send to Slack: ${error instanceof Error ? error.message : String(error)}`);
    }

    if (!response.ok) {
      const body = await response.text();
      throw new ExportError('slack', `Slack responded with ${response.status}: ${body}`, 'Check that SLACK_WEBHOOK_URL is still valid.');
    }
  }
}
