import { ResultAssembler, stripCodeFence, truncateAtWord } from '../result-assembler';
import { ChangeSet, CommitUnit } from '../../git/types';
import { MalformedCompletionError } from '../../../shared/errors';

const EMPTY_TREE: ChangeSet = { source: 'working-tree', staged: false, files: [] };

function commit(hash: string, date: string, subject: string): CommitUnit {
  return { hash, author: 'Dana', email: 'dana@example.com', date, subject, body: '', files: [] };
}

const HISTORY: ChangeSet = {
  source: 'history',
  window: { since: new Date('2026-10-12T12:00:00Z'), until: new Date('2026-10-19T12:00:00Z') },
  commits: [
    commit('ccccccc333', '2026-10-18T16:00:00+00:00', 'Add export'),
    commit('bbbbbbb222', '2026-10-18T09:00:00+00:00', 'Fix parser'),
    commit('aaaaaaa111', '2026-10-15T11:00:00+00:00', 'Start project')
  ]
};

describe('stripCodeFence', () => {
  it('removes a fence around the whole answer', () => {
    expect(stripCodeFence('```\nfeat: add x\n```')).toBe('feat: add x');
    expect(stripCodeFence('```text\nfeat: add x\n\nbody\n```\n')).toBe('feat: add x\n\nbody');
  });

  it('leaves unfenced text alone apart from trimming', () => {
    expect(stripCodeFence('  plain answer \n')).toBe('plain answer');
  });
});

describe('truncateAtWord', () => {
  it('returns short text unchanged', () => {
    expect(truncateAtWord('fix: typo', 72)).toBe('fix: typo');
  });

  it('cuts at the last whole word and drops trailing punctuation', () => {
    expect(truncateAtWord('feat: add retry, backoff and fallback', 23)).toBe('feat: add retry');
  });

  it('hard cuts only a single word longer than the limit', () => {
    expect(truncateAtWord('a'.repeat(30), 10)).toBe('a'.repeat(10));
  });
});

describe('ResultAssembler', () => {
  const assembler = new ResultAssembler();

  it('wraps a status answer', () => {
    expect(assembler.assemble({ kind: 'status' }, '## Summary\nWork on auth', EMPTY_TREE))
      .toEqual({ kind: 'status', text: '## Summary\nWork on auth' });
  });

  it('rejects an empty completion', () => {
    expect(() => assembler.assemble({ kind: 'status' }, '  \n ', EMPTY_TREE)).toThrow(MalformedCompletionError);
    expect(() => assembler.assemble({ kind: 'status' }, '```\n```', EMPTY_TREE)).toThrow(MalformedCompletionError);
  });

  describe('commit', () => {
    const task = { kind: 'commit' as const, subjectMaxLength: 30, stagedFirst: true };

    it('splits subject and body', () => {
      expect(assembler.assemble(task, 'feat: add login\n\nUses the new session store.', EMPTY_TREE))
        .toEqual({ kind: 'commit', subject: 'feat: add login', body: 'Uses the new session store.' });
    });

    it('cleans up the subject line', () => {
      expect(assembler.assemble(task, '\nCommit message: "fix: handle empty input."', EMPTY_TREE))
        .toEqual({ kind: 'commit', subject: 'fix: handle empty input', body: null });
    });

    it('skips a label line to find the real subject', () => {
      expect(assembler.assemble(task, 'Commit message:\nfeat: add login', EMPTY_TREE))
        .toEqual({ kind: 'commit', subject: 'feat: add login', body: null });
      expect(assembler.assemble(task, '"..."\nfix: typo\n\nDetails.', EMPTY_TREE))
        .toEqual({ kind: 'commit', subject: 'fix: typo', body: 'Details.' });
    });

    it('rejects an answer with no usable subject', () => {
      expect(() => assembler.assemble(task, 'Commit message:\n""\n...', EMPTY_TREE)).toThrow(MalformedCompletionError);
    });

    it('keeps the subject within the configured length', () => {
      const result = assembler.assemble(task, 'refactor(core): split the pipeline into prepare and generate', EMPTY_TREE);
      expect(result).toEqual({ kind: 'commit', subject: 'refactor(core): split the', body: null });
    });
  });

  describe('report', () => {
    const task = { kind: 'report' as const, days: 7 };

    it('groups bullets by day, most recent first', () => {
      const text = [
        '## Progress Summary',
        'Steady week.',
        '',
        '## 2026-10-15',
        '- Started the project',
        '',
        '## 2026-10-18',
        '- Added Markdown export',
        '* Fixed the diff parser'
      ].join('\n');

      const result = assembler.assemble(task, text, HISTORY);

      expect(result).toMatchObject({ kind: 'report', overview: 'Steady week.', grouped: true, days: 7, totalCommits: 3 });
      if (result.kind !== 'report') return;
      expect(result.entries.map(e => e.day)).toEqual(['2026-10-18', '2026-10-15']);
      expect(result.entries[0].items).toEqual(['Added Markdown export', 'Fixed the diff parser']);
      expect(result.entries[0].commits.map(c => c.shortHash)).toEqual(['ccccccc', 'bbbbbbb']);
      expect(result.entries[1].commits.map(c => c.subject)).toEqual(['Start project']);
    });

    it('accepts bold dates and numbered items', () => {
      const result = assembler.assemble(task, '### **2026-10-18**\n1. Shipped export', HISTORY);
      if (result.kind !== 'report') throw new Error('expected a report');
      expect(result.entries[0]).toEqual({ day: '2026-10-18', items: ['Shipped export'], commits: expect.any(Array) });
    });

    it('keeps exactly one entry per commit day whatever days the model names', () => {
      const text = [
        '## 2026-10-18',
        '- Added export and fixed the parser',
        '## 2026-10-16',
        '- Something that never happened'
      ].join('\n');

      const result = assembler.assemble(task, text, HISTORY);

      if (result.kind !== 'report') throw new Error('expected a report');
      expect(result.grouped).toBe(true);
      expect(result.entries).toEqual([
        {
          day: '2026-10-18',
          items: ['Added export and fixed the parser'],
          commits: [
            { hash: 'ccccccc333', shortHash: 'ccccccc', day: '2026-10-18', subject: 'Add export', author: 'Dana' },
            { hash: 'bbbbbbb222', shortHash: 'bbbbbbb', day: '2026-10-18', subject: 'Fix parser', author: 'Dana' }
          ]
        },
        {
          day: '2026-10-15',
          items: ['Start project'],
          commits: [{ hash: 'aaaaaaa111', shortHash: 'aaaaaaa', day: '2026-10-15', subject: 'Start project', author: 'Dana' }]
        }
      ]);
    });

    it('falls back to one ungrouped entry when no named day has commits', () => {
      const result = assembler.assemble(task, '## 2026-10-16\n- Invented work', HISTORY);

      if (result.kind !== 'report') throw new Error('expected a report');
      expect(result.grouped).toBe(false);
      expect(result.entries).toEqual([{ day: null, items: ['## 2026-10-16\n- Invented work'], commits: expect.any(Array) }]);
    });

    it('keeps an answer without day sections as one ungrouped entry', () => {
      const result = assembler.assemble(task, 'Lots of work on parsing.\n- parser\n- export', HISTORY);
      if (result.kind !== 'report') throw new Error('expected a report');
      expect(result.grouped).toBe(false);
      expect(result.entries).toHaveLength(1);
      expect(result.entries[0].day).toBeNull();
      expect(result.entries[0].items).toEqual(['Lots of work on parsing.\n- parser\n- export']);
      expect(result.entries[0].commits).toHaveLength(3);
    });
  });
});
