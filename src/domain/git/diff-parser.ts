import { ChangeKind, FileChange } from './types';

const DIFF_HEADER = /^diff --git /m;

/**
 * Splits `git diff` / `git show --patch` output into one FileChange per file.
 * Expects the output of git run with core.quotepath=false and rename detection.
 */
export function parseUnifiedDiff(patch: string): FileChange[] {
  const normalized = patch.replace(/\r\n/g, '\n');
  const start = normalized.search(DIFF_HEADER);
  if (start === -1) return [];

  return normalized
    .slice(start)
    .split(/^(?=diff --git )/m)
    .filter(block => block.startsWith('diff --git '))
    .map(parseFileBlock);
}

function parseFileBlock(block: string): FileChange {
  const text = block.replace(/\n+$/, '');
  const lines = text.split('\n');

  let oldPath: string | null = null;
  let newPath: string | null = null;
  let renameFrom: string | null = null;
  let renameTo: string | null = null;
  let kind: ChangeKind = 'modified';
  let binary = false;
  let additions = 0;
  let deletions = 0;
  let inHunk = false;

  for (const line of lines) {
    if (inHunk) {
      if (line.startsWith('+')) additions++;
      else if (line.startsWith('-')) deletions++;
      else if (line.startsWith('@@')) continue;
      continue;
    }

    if (line.startsWith('@@')) {
      inHunk = true;
    } else if (line.startsWith('new file mode')) {
      kind = 'added';
    } else if (line.startsWith('deleted file mode')) {
      kind = 'deleted';
    } else if (line.startsWith('rename from ')) {
      renameFrom = line.slice('rename from '.length);
    } else if (line.startsWith('rename to ')) {
      renameTo = line.slice('rename to '.length);
    } else if (line.startsWith('--- ')) {
      oldPath = stripPrefix(line.slice(4), 'a/');
    } else if (line.startsWith('+++ ')) {
      newPath = stripPrefix(line.slice(4), 'b/');
    } else if (line.startsWith('Binary files ') || line === 'GIT binary patch') {
      binary = true;
    }
  }

  if (renameFrom !== null && renameTo !== null) {
    kind = 'renamed';
  }

  const [headerOld, headerNew] = pathsFromHeader(lines[0]);
  const path = renameTo ?? newPath ?? (kind === 'deleted' ? oldPath : null) ?? headerNew ?? headerOld;

  return {
    path,
    oldPath: kind === 'renamed' ? (renameFrom ?? headerOld) : null,
    kind,
    additions,
    deletions,
    binary,
    hunk: binary ? '' : text
  };
}

function stripPrefix(path: string, prefix: string): string | null {
  if (path === '/dev/null') return null;
  return path.startsWith(prefix) ? path.slice(prefix.length) : path;
}

// "diff --git a/x b/y". Paths may contain spaces, so split on the last " b/".
function pathsFromHeader(header: string): [string, string] {
  const rest = header.slice('diff --git '.length);
  const split = rest.lastIndexOf(' b/');
  if (split === -1) return [rest, rest];
  const left = rest.slice(0, split);
  const right = rest.slice(split + 3);
  return [left.startsWith('a/') ? left.slice(2) : left, right];
}
