import type { FileStatus } from './status.js';

export interface StatusFile {
  path: string;
  /** Source path of a rename or copy. */
  origPath?: string;
  /** Porcelain index column (' ', 'M', 'A', 'D', 'R', 'C', 'U', '?'). */
  index: string;
  /** Porcelain working tree column. */
  workingDir: string;
}

export interface CommitInfo {
  hash: string;
  shortHash: string;
  message: string;
  author: string;
  date: Date;
  refs: string;
}

export interface RepoStatus {
  branch: string;
  detached: boolean;
  tracking?: string;
  ahead: number;
  behind: number;
  /** Null on an unborn branch. */
  head: CommitInfo | null;
  files: StatusFile[];
}

export interface StashEntry {
  /** e.g. "stash@{0}" */
  ref: string;
  message: string;
}

export interface BranchInfo {
  name: string;
  current: boolean;
  commit: string;
  label: string;
}

export type PatchTarget = 'index' | 'workingTree';

/**
 * Result of a mutation. `partial` marks a failure that still changed the
 * repository, such as a hunk discard that reverted the index but not the
 * working tree.
 */
export type BackendOutcome = { ok: true } | { ok: false; reason: string; partial?: boolean };

export type DiscardTarget =
  | {
      kind: 'file';
      path: string;
      origPath?: string;
      origin: 'untracked' | 'unstaged' | 'staged';
      status: FileStatus;
    }
  | { kind: 'hunk'; path: string; header: string; patch: string; origin: 'unstaged' | 'staged' }
  | { kind: 'lines'; path: string; header: string; patch: string; origin: 'unstaged' | 'staged' };

/**
 * A repository read that could not be completed.
 */
export class BackendFailure extends Error {
  constructor(
    message: string,
    readonly command?: string
  ) {
    super(message);
    this.name = 'BackendFailure';
  }
}

/**
 * Repository queries and mutations.
 *
 * Reads reject with BackendFailure. Mutations never reject; they resolve to
 * an outcome carrying git's reason on failure.
 */
export interface GitBackend {
  readonly repoPath: string;

  readStatus(): Promise<RepoStatus>;
  /** Raw `git diff` text of the working tree, or of the index when staged. */
  readDiff(staged: boolean): Promise<string>;
  /** An untracked file as a diff against /dev/null. */
  readUntrackedDiff(path: string): Promise<string>;
  listStashes(): Promise<StashEntry[]>;
  listRecentCommits(limit: number): Promise<CommitInfo[]>;
  listBranches(): Promise<BranchInfo[]>;
  /** Full message of HEAD, or '' without one. */
  headMessage(): Promise<string>;

  applyPatch(patch: string, target: PatchTarget, options: { reverse: boolean }): Promise<BackendOutcome>;
  stagePaths(paths: string[]): Promise<BackendOutcome>;
  unstagePaths(paths: string[]): Promise<BackendOutcome>;
  commit(message: string, amend: boolean): Promise<BackendOutcome>;
  discard(target: DiscardTarget): Promise<BackendOutcome>;

  /** Run a git subcommand attached to the terminal (pager, blame, log). */
  runSubcommand(args: string[]): Promise<BackendOutcome>;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
