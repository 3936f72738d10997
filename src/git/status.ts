import type { StatusFile } from './backend.js';

export type FileStatus =
  | 'modified'
  | 'added'
  | 'deleted'
  | 'untracked'
  | 'renamed'
  | 'copied'
  | 'unmerged';

export interface CategorizedFile {
  path: string;
  origPath?: string;
  status: FileStatus;
}

export interface CategorizedStatus {
  untracked: CategorizedFile[];
  unstaged: CategorizedFile[];
  staged: CategorizedFile[];
}

export function parseStatusCode(code: string): FileStatus {
  switch (code) {
    case 'M':
      return 'modified';
    case 'A':
      return 'added';
    case 'D':
      return 'deleted';
    case '?':
      return 'untracked';
    case 'R':
      return 'renamed';
    case 'C':
      return 'copied';
    case 'U':
      return 'unmerged';
    default:
      return 'modified';
  }
}

function isUnmerged(file: StatusFile): boolean {
  if (file.index === 'U' || file.workingDir === 'U') return true;
  return (file.index === 'A' && file.workingDir === 'A') || (file.index === 'D' && file.workingDir === 'D');
}

/**
 * Split porcelain status entries into the three change sections.
 * A file with both staged and unstaged changes appears in both.
 * Conflicted files are listed only as unstaged; ignored files are dropped.
 */
export function categorizeStatusFiles(files: StatusFile[]): CategorizedStatus {
  const result: CategorizedStatus = { untracked: [], unstaged: [], staged: [] };

  for (const file of files) {
    if (file.index === '!' || file.workingDir === '!') continue;

    if (file.index === '?' || file.workingDir === '?') {
      result.untracked.push({ path: file.path, status: 'untracked' });
      continue;
    }

    if (isUnmerged(file)) {
      result.unstaged.push({ path: file.path, status: 'unmerged' });
      continue;
    }

    if (file.index !== ' ' && file.index !== '') {
      const entry: CategorizedFile = { path: file.path, status: parseStatusCode(file.index) };
      if (file.origPath) entry.origPath = file.origPath;
      result.staged.push(entry);
    }

    if (file.workingDir !== ' ' && file.workingDir !== '') {
      result.unstaged.push({ path: file.path, status: parseStatusCode(file.workingDir) });
    }
  }

  return result;
}
