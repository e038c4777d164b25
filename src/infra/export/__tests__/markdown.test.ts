import fs from 'fs';
import os from 'os';
import path from 'path';
import { MarkdownExporter, averagePerDay, renderReportMarkdown } from '../markdown';
import { Report } from '../../../domain/summary/types';
import { ExportError } from '../../../shared/errors';

const COMMIT = { hash: 'abc1234def', shortHash: 'abc1234', day: '2026-10-18', subject: 'Add | export', author: 'Dana' };

const REPORT: Report = {
  kind: 'report',
  overview: 'Good week.',
  entries: [{ day: '2026-10-18', items: ['Added export'], commits: [COMMIT] }],
  grouped: true,
  days: 7,
  totalCommits: 1,
  commits: [COMMIT]
};

describe('averagePerDay', () => {
  it('rounds to one decimal', () => {
    expect(averagePerDay(1, 7)).toBe(0.1);
    expect(averagePerDay(10, 3)).toBe(3.3);
    expect(averagePerDay(0, 7)).toBe(0);
  });
});

describe('renderReportMarkdown', () => {
  it('renders summary, day sections and the commit table', () => {
    const markdown = renderReportMarkdown(REPORT, { repoName: 'demo', generatedAt: new Date('2026-10-19T12:00:00Z') });

    expect(markdown).toBe([
      '# Progress Report: demo',
      '',
      '- **Period:** Last 7 days',
      '- **Total commits:** 1',
      '- **Average:** 0.1 commits/day',
      '- **Generated:** 2026-10-19T12:00:00.000Z',
      '',
      '## Summary',
      '',
      'Good week.',
      '',
      '## 2026-10-18',
      '',
      '- Added export',
      '',
      '## Commits',
      '',
      '| Date | Commit | Message | Author |',
      '| --- | --- | --- | --- |',
      '| 2026-10-18 | `abc1234` | Add \\| export | Dana |',
      ''
    ].join('\n'));
  });

  it('writes an ungrouped answer verbatim under the fallback title', () => {
    const ungrouped: Report = {
      ...REPORT,
      overview: '',
      grouped: false,
      entries: [{ day: null, items: ['Free-form text\n- with a list'], commits: [COMMIT] }]
    };

    const markdown = renderReportMarkdown(ungrouped, { repoName: 'demo', generatedAt: new Date(0) }, 'Highlights');

    expect(markdown).toContain('## Highlights\n\nFree-form text\n- with a list\n\n## Commits');
    expect(markdown).not.toContain('## Summary');
  });
});

describe('MarkdownExporter', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'gitbrief-export-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('adds the .md extension and creates missing directories', () => {
    const written = new MarkdownExporter().write(path.join(dir, 'reports', 'weekly'), '# Report\n');

    expect(written).toBe(path.join(dir, 'reports', 'weekly.md'));
    expect(fs.readFileSync(written, 'utf-8')).toBe('# Report\n');
    expect(fs.readdirSync(path.join(dir, 'reports'))).toEqual(['weekly.md']);
  });

  it('fails with an ExportError and leaves nothing behind', () => {
    fs.writeFileSync(path.join(dir, 'blocker'), 'not a directory');

    let error: unknown;
    try {
      new MarkdownExporter().write(path.join(dir, 'blocker', 'report.md'), '# Report\n');
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(ExportError);
    expect(error).toMatchObject({ code: 'ExportError', target: 'file' });
    expect(fs.readdirSync(dir)).toEqual(['blocker']);
  });
});
