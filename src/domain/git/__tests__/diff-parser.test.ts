import { parseUnifiedDiff } from '../diff-parser';
import { FileChange } from '../types';

const PATCH = [
  'diff --git a/src/app.ts b/src/app.ts',
  'index 1111111..2222222 100644',
  '--- a/src/app.ts',
  '+++ b/src/app.ts',
  '@@ -1,3 +1,4 @@',
  ' const a = 1;',
  '-const b = 2;',
  '+const b = 3;',
  '+const c = 4;',
  ' export { a };',
  'diff --git a/docs/new.md b/docs/new.md',
  'new file mode 100644',
  'index 0000000..3333333',
  '--- /dev/null',
  '+++ b/docs/new.md',
  '@@ -0,0 +1,2 @@',
  '+# Title',
  '+text',
  'diff --git a/old.txt b/old.txt',
  'deleted file mode 100644',
  'index 4444444..0000000',
  '--- a/old.txt',
  '+++ /dev/null',
  '@@ -1 +0,0 @@',
  '-gone',
  'diff --git a/lib/a.ts b/lib/b.ts',
  'similarity index 90%',
  'rename from lib/a.ts',
  'rename to lib/b.ts',
  'index 5555555..6666666 100644',
  '--- a/lib/a.ts',
  '+++ b/lib/b.ts',
  '@@ -1 +1 @@',
  '-export const x = 1;',
  '+export const x = 2;',
  'diff --git a/img/logo.png b/img/logo.png',
  'index 7777777..8888888 100644',
  'Binary files a/img/logo.png and b/img/logo.png differ',
  ''
].join('\n');

describe('parseUnifiedDiff', () => {
  const files = parseUnifiedDiff(PATCH);

  it('returns one change per file in patch order', () => {
    expect(files.map(f => f.path)).toEqual(['src/app.ts', 'docs/new.md', 'old.txt', 'lib/b.ts', 'img/logo.png']);
  });

  it('counts added and removed lines inside hunks only', () => {
    expect(files[0]).toMatchObject({ kind: 'modified', additions: 2, deletions: 1, oldPath: null, binary: false });
  });

  it('detects added and deleted files', () => {
    expect(files[1]).toMatchObject({ kind: 'added', additions: 2, deletions: 0 });
    expect(files[2]).toMatchObject({ path: 'old.txt', kind: 'deleted', additions: 0, deletions: 1 });
  });

  it('keeps both paths of a rename', () => {
    expect(files[3]).toMatchObject({ path: 'lib/b.ts', oldPath: 'lib/a.ts', kind: 'renamed', additions: 1, deletions: 1 });
  });

  it('marks binary files and drops their hunk', () => {
    expect(files[4]).toEqual({
      path: 'img/logo.png',
      oldPath: null,
      kind: 'modified',
      additions: 0,
      deletions: 0,
      binary: true,
      hunk: ''
    });
  });

  it('keeps the whole file block as the hunk', () => {
    expect(files[2].hunk).toBe([
      'diff --git a/old.txt b/old.txt',
      'deleted file mode 100644',
      'index 4444444..0000000',
      '--- a/old.txt',
      '+++ /dev/null',
      '@@ -1 +0,0 @@',
      '-gone'
    ].join('\n'));
  });

  it('produces changes that satisfy the FileChange schema', () => {
    for (const file of files) {
      expect(FileChange.safeParse(file).success).toBe(true);
    }
  });

  it('returns nothing for an empty patch', () => {
    expect(parseUnifiedDiff('')).toEqual([]);
    expect(parseUnifiedDiff('\n')).toEqual([]);
  });

  it('takes a path with spaces from the header', () => {
    const [file] = parseUnifiedDiff([
      'diff --git a/my docs/a b.bin b/my docs/a b.bin',
      'Binary files a/my docs/a b.bin and b/my docs/a b.bin differ'
    ].join('\n'));
    expect(file.path).toBe('my docs/a b.bin');
  });

  it('accepts CRLF line endings', () => {
    const [file] = parseUnifiedDiff(PATCH.split('diff --git a/docs')[0].replace(/\n/g, '\r\n'));
    expect(file).toMatchObject({ path: 'src/app.ts', additions: 2, deletions: 1 });
  });
});
