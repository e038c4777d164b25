import { GitStateExtractor } from '../extractor';
import { NotAGitRepositoryError } from '../../../shared/errors';
import { FakeGitSource, filePatch } from '../../../__tests__/fakes';

const NOW = new Date('2026-10-19T12:00:00Z');

function setup() {
  const source = new FakeGitSource();
  const extractor = new GitStateExtractor(source, '/repo', { now: () => NOW });
  return { source, extractor };
}

describe('GitStateExtractor', () => {
  it('rejects a directory that is not a repository', async () => {
    const { source, extractor } = setup();
    source.repository = false;

    await expect(extractor.extract({ mode: 'uncommitted' })).rejects.toBeInstanceOf(NotAGitRepositoryError);
    await expect(extractor.status()).rejects.toThrow('Not a git repository: /repo');
  });

  it('reads the whole working tree for uncommitted mode', async () => {
    const { source, extractor } = setup();
    source.worktreePatch = filePatch('a.ts', ['one']) + filePatch('b.ts', ['two'], ['old']);
    source.stagedPatch = filePatch('a.ts', ['one']);

    const changeSet = await extractor.extract({ mode: 'uncommitted' });

    expect(changeSet.source).toBe('working-tree');
    if (changeSet.source !== 'working-tree') return;
    expect(changeSet.staged).toBe(false);
    expect(changeSet.files.map(f => [f.path, f.additions, f.deletions])).toEqual([['a.ts', 1, 0], ['b.ts', 1, 1]]);
  });

  it('reads only the index for staged mode', async () => {
    const { source, extractor } = setup();
    source.worktreePatch = filePatch('a.ts', ['one']) + filePatch('b.ts', ['two']);
    source.stagedPatch = filePatch('a.ts', ['one']);

    const changeSet = await extractor.extract({ mode: 'staged' });

    expect(changeSet).toMatchObject({ source: 'working-tree', staged: true });
    if (changeSet.source !== 'working-tree') return;
    expect(changeSet.files.map(f => f.path)).toEqual(['a.ts']);
  });

  it('returns an empty change set for a clean tree', async () => {
    const { extractor } = setup();
    const changeSet = await extractor.extract({ mode: 'uncommitted' });
    expect(changeSet).toEqual({ source: 'working-tree', staged: false, files: [] });
  });

  it('collects commits in the window, newest first', async () => {
    const { source, extractor } = setup();
    source.headers = [
      { hash: 'aaaaaaa111', author: 'Dana', email: 'dana@example.com', date: '2026-10-17T09:00:00+00:00', subject: 'First', body: '' },
      { hash: 'bbbbbbb222', author: 'Lee', email: 'lee@example.com', date: '2026-10-18T09:00:00+00:00', subject: 'Second', body: 'details' }
    ];
    source.patches = {
      aaaaaaa111: filePatch('a.ts', ['x', 'y']),
      bbbbbbb222: filePatch('b.ts', ['z'])
    };

    const changeSet = await extractor.extract({ mode: 'last-n-days', days: 3 });

    expect(source.windows).toEqual([{ since: new Date('2026-10-16T12:00:00Z'), until: NOW }]);
    expect(changeSet.source).toBe('history');
    if (changeSet.source !== 'history') return;
    expect(changeSet.commits.map(c => c.subject)).toEqual(['Second', 'First']);
    expect(changeSet.commits[1].files).toHaveLength(1);
    expect(changeSet.commits[1].files[0]).toMatchObject({ path: 'a.ts', additions: 2 });
  });

  it('returns no commits when the window is empty', async () => {
    const { extractor } = setup();
    const changeSet = await extractor.extract({ mode: 'last-n-days', days: 1 });
    expect(changeSet).toMatchObject({ source: 'history', commits: [] });
  });

  it('computes the window from the injected clock', () => {
    const { extractor } = setup();
    expect(extractor.windowFor(7)).toEqual({ since: new Date('2026-10-12T12:00:00Z'), until: NOW });
  });
});
