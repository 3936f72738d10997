import { parseDiff, type DiffLine, type FileDiff } from '../git/diff.js';
import {
  describeError,
  type BranchInfo,
  type CommitInfo,
  type GitBackend,
  type RepoStatus,
  type StashEntry,
} from '../git/backend.js';
import { categorizeStatusFiles, type CategorizedFile } from '../git/status.js';
import type { EntryData, SectionData } from '../types/outline.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('snapshot');

/**
 * Everything one refresh reads from the repository.
 */
export interface RepoSnapshot {
  status: RepoStatus;
  unstaged: FileDiff[];
  staged: FileDiff[];
  /** Contents of untracked files by path, as added lines. */
  previews: Map<string, DiffLine[]>;
  stashes: StashEntry[];
  commits: CommitInfo[];
  branches: BranchInfo[];
}

export const SECTION_TITLES = {
  untracked: 'Untracked files',
  unstaged: 'Unstaged changes',
  staged: 'Staged changes',
  stashes: 'Stashes',
  recentCommits: 'Recent commits',
  branches: 'Branches',
} as const;

/**
 * Added lines of one untracked file. A file that cannot be read gets no
 * preview; it is still listed and can be staged whole.
 */
async function loadPreview(backend: GitBackend, path: string): Promise<DiffLine[] | null> {
  try {
    const [file] = parseDiff(await backend.readUntrackedDiff(path));
    return file ? file.hunks.flatMap((hunk) => hunk.lines) : null;
  } catch (err) {
    log.debug('no preview', { path, reason: describeError(err) });
    return null;
  }
}

async function loadPreviews(backend: GitBackend, status: RepoStatus): Promise<Map<string, DiffLine[]>> {
  // Untracked directories are listed as "dir/" and have no contents to show
  const paths = categorizeStatusFiles(status.files)
    .untracked.map((file) => file.path)
    .filter((path) => !path.endsWith('/'));
  const previews = await Promise.all(paths.map((path) => loadPreview(backend, path)));

  const byPath = new Map<string, DiffLine[]>();
  paths.forEach((path, i) => {
    const lines = previews[i];
    if (lines) byPath.set(path, lines);
  });
  return byPath;
}

export async function loadSnapshot(backend: GitBackend, commitLimit: number): Promise<RepoSnapshot> {
  const [status, unstagedText, stagedText, stashes, commits, branches] = await Promise.all([
    backend.readStatus(),
    backend.readDiff(false),
    backend.readDiff(true),
    backend.listStashes(),
    backend.listRecentCommits(commitLimit),
    backend.listBranches(),
  ]);

  return {
    status,
    unstaged: parseDiff(unstagedText),
    staged: parseDiff(stagedText),
    previews: await loadPreviews(backend, status),
    stashes,
    commits,
    branches,
  };
}

function fileEntries(files: CategorizedFile[], diffs: FileDiff[]): EntryData[] {
  const byPath = new Map(diffs.map((diff): [string, FileDiff] => [diff.path, diff]));
  return files.map((file): EntryData => ({
    id: file.path,
    label: file.origPath ? `${file.origPath} -> ${file.path}` : file.path,
    payload: {
      kind: 'file',
      path: file.path,
      origPath: file.origPath,
      status: file.status,
      diff: byPath.get(file.path) ?? null,
    },
  }));
}

function untrackedEntries(files: CategorizedFile[], previews: Map<string, DiffLine[]>): EntryData[] {
  return fileEntries(files, []).map((entry): EntryData => {
    const preview = previews.get(entry.id);
    if (!preview || entry.payload.kind !== 'file') return entry;
    return { ...entry, payload: { ...entry.payload, preview } };
  });
}

/**
 * Turn a snapshot into outline sections, in display order. Empty sections are left out.
 */
export function buildSections(snapshot: RepoSnapshot): SectionData[] {
  const files = categorizeStatusFiles(snapshot.status.files);

  const sections: SectionData[] = [
    {
      kind: 'untracked',
      title: SECTION_TITLES.untracked,
      entries: untrackedEntries(files.untracked, snapshot.previews),
    },
    {
      kind: 'unstaged',
      title: SECTION_TITLES.unstaged,
      entries: fileEntries(files.unstaged, snapshot.unstaged),
    },
    {
      kind: 'staged',
      title: SECTION_TITLES.staged,
      entries: fileEntries(files.staged, snapshot.staged),
    },
    {
      kind: 'stashes',
      title: SECTION_TITLES.stashes,
      entries: snapshot.stashes.map((stash): EntryData => ({
        id: stash.ref,
        label: stash.message ? `${stash.ref} ${stash.message}` : stash.ref,
        payload: { kind: 'stash', stash },
      })),
    },
    {
      kind: 'recentCommits',
      title: SECTION_TITLES.recentCommits,
      entries: snapshot.commits.map((commit): EntryData => ({
        id: commit.hash,
        label: `${commit.shortHash} ${commit.message}`,
        payload: { kind: 'commit', commit },
      })),
    },
    {
      kind: 'branches',
      title: SECTION_TITLES.branches,
      entries: snapshot.branches.map((branch): EntryData => ({
        id: branch.name,
        label: `${branch.current ? '* ' : '  '}${branch.name}`,
        payload: { kind: 'branch', branch },
      })),
    },
  ];

  return sections.filter((section) => section.entries.length > 0);
}
