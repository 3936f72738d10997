import { vi } from 'vitest';
import type { SectionData } from '../types/outline.js';
import { BackendFailure } from './backend.js';
import type {
  BackendOutcome,
  BranchInfo,
  CommitInfo,
  DiscardTarget,
  GitBackend,
  PatchTarget,
  RepoStatus,
  StashEntry,
  StatusFile,
} from './backend.js';

export const HUNK_ONE = ['@@ -1,3 +1,3 @@', ' one', '-two', '+TWO', ' three'];
export const HUNK_TWO = ['@@ -8,3 +8,4 @@ section', ' eight', ' nine', '+nine and a half', ' ten'];

/**
 * `git diff` text for one modified file.
 */
export function fileDiff(path: string, ...hunks: string[][]): string {
  return (
    [
      `diff --git a/${path} b/${path}`,
      'index 1111111..2222222 100644',
      `--- a/${path}`,
      `+++ b/${path}`,
      ...hunks.flat(),
    ].join('\n') + '\n'
  );
}

export const TWO_HUNK_DIFF = fileDiff('a.txt', HUNK_ONE, HUNK_TWO);

/**
 * An Untracked section with one file whose contents preview as added lines.
 */
export function untrackedWithPreview(path: string, contents: string[]): SectionData[] {
  const preview = contents.map((text, i) => ({
    kind: 'addition' as const,
    text: `+${text}`,
    spans: [],
    newLineNum: i + 1,
  }));
  return [
    {
      kind: 'untracked',
      title: 'Untracked files',
      entries: [{ id: path, label: path, payload: { kind: 'file', path, status: 'untracked', diff: null, preview } }],
    },
  ];
}

export const HEAD_COMMIT: CommitInfo = {
  hash: 'abc1234def5678abc1234def5678abc1234def56',
  shortHash: 'abc1234',
  message: 'Initial commit',
  author: 'Test User',
  date: new Date('2024-01-15T10:00:00Z'),
  refs: 'HEAD -> main',
};

export function repoStatus(files: StatusFile[] = []): RepoStatus {
  return {
    branch: 'main',
    detached: false,
    ahead: 0,
    behind: 0,
    head: HEAD_COMMIT,
    files,
  };
}

const OK: BackendOutcome = { ok: true };

/**
 * In-memory GitBackend. Tests set the fields to shape what the next refresh
 * reads and inspect the mocks for the calls made.
 */
export class FakeBackend implements GitBackend {
  readonly repoPath = '/repo';

  status: RepoStatus = repoStatus();
  unstagedDiff = '';
  stagedDiff = '';
  /** Diff text per untracked path; paths not listed fail to read. */
  untrackedDiffs: Record<string, string> = {};
  stashes: StashEntry[] = [];
  commits: CommitInfo[] = [];
  branches: BranchInfo[] = [];
  lastMessage = '';

  readStatus = vi.fn(async (): Promise<RepoStatus> => this.status);
  readDiff = vi.fn(async (staged: boolean): Promise<string> => (staged ? this.stagedDiff : this.unstagedDiff));
  readUntrackedDiff = vi.fn(async (path: string): Promise<string> => {
    const text = this.untrackedDiffs[path];
    if (text === undefined) throw new BackendFailure(`git diff --no-index ${path} failed: no such file`);
    return text;
  });
  listStashes = vi.fn(async (): Promise<StashEntry[]> => this.stashes);
  listRecentCommits = vi.fn(async (limit: number): Promise<CommitInfo[]> => this.commits.slice(0, limit));
  listBranches = vi.fn(async (): Promise<BranchInfo[]> => this.branches);
  headMessage = vi.fn(async (): Promise<string> => this.lastMessage);

  applyPatch = vi.fn(
    async (_patch: string, _target: PatchTarget, _options: { reverse: boolean }): Promise<BackendOutcome> =>
      OK
  );
  stagePaths = vi.fn(async (_paths: string[]): Promise<BackendOutcome> => OK);
  unstagePaths = vi.fn(async (_paths: string[]): Promise<BackendOutcome> => OK);
  commit = vi.fn(async (_message: string, _amend: boolean): Promise<BackendOutcome> => OK);
  discard = vi.fn(async (_target: DiscardTarget): Promise<BackendOutcome> => OK);
  runSubcommand = vi.fn(async (_args: string[]): Promise<BackendOutcome> => OK);
}
