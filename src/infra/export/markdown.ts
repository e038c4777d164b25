import fs from 'fs';
import path from 'path';
import { Report } from '../../domain/summary/types';
import { ExportError } from '../../shared/errors';

export interface ReportMeta {
  repoName: string;
  generatedAt: Date;
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}

export function averagePerDay(totalCommits: number, days: number): number {
  return Math.round((totalCommits / Math.max(days, 1)) * 10) / 10;
}

/**
 * Renders a finished Report as a standalone Markdown document
 */
export function renderReportMarkdown(report: Report, meta: ReportMeta, ungroupedTitle = 'Highlights'): string {
  const lines: string[] = [];

  lines.push(`# Progress Report: ${meta.repoName}`);
  lines.push('');
  lines.push(`- **Period:** Last ${report.days} days`);
  lines.push(`- **Total commits:** ${report.totalCommits}`);
  lines.push(`- **Average:** ${averagePerDay(report.totalCommits, report.days)} commits/day`);
  lines.push(`- **Generated:** ${meta.generatedAt.toISOString()}`);
  lines.push('');

  if (report.overview) {
    lines.push('## Summary');
    lines.push('');
    lines.push(report.overview);
    lines.push('');
  }

  for (const entry of report.entries) {
    lines.push(`## ${entry.day ?? ungroupedTitle}`);
    lines.push('');
    if (entry.day === null) {
      lines.push(...entry.items);
    } else {
      lines.push(...entry.items.map(item => `- ${item}`));
    }
    lines.push('');
  }

  if (report.commits.length > 0) {
    lines.push('## Commits');
    lines.push('');
    lines.push('| Date | Commit | Message | Author |');
    lines.push('| --- | --- | --- | --- |');
    for (const commit of report.commits) {
      lines.push(`| ${commit.day} | \`${commit.shortHash}\` | ${escapeCell(commit.subject)} | ${escapeCell(commit.author)} |`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

/**
 * Writes through a temporary sibling and renames it into place, so a failed
 * or interrupted export never leaves a partial file at `target`.
 */
export class MarkdownExporter {
  write(target: string, markdown: string): string {
    const resolved = path.resolve(target.endsWith('.md') ? target : `${target}.md`);
    const temp = `${resolved}.${process.pid}.tmp`;

    try {
      fs.mkdirSync(path.dirname(resolved), { recursive: true });
      fs.writeFileSync(temp, markdown, 'utf-8');
      fs.renameSync(temp, resolved);
      return resolved;
    } catch (error) {
      if (fs.existsSync(temp)) fs.rmSync(temp, { force: true });
      throw new ExportError(
        'file',
        `Failed to save report to ${resolved}: ${error instanceof Error ? error.message : String(error)}`,
        'Check that the directory is writable.'
      );
    }
  }
}
