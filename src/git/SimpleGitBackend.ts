import { execFileSync, spawnSync } from 'node:child_process';
import { simpleGit, type SimpleGit } from 'simple-git';
import { createLogger } from '../utils/logger.js';
import {
  BackendFailure,
  describeError,
  type BackendOutcome,
  type BranchInfo,
  type CommitInfo,
  type DiscardTarget,
  type GitBackend,
  type PatchTarget,
  type RepoStatus,
  type StashEntry,
} from './backend.js';

const OK: BackendOutcome = { ok: true };

const log = createLogger('git');

export interface SimpleGitBackendOptions {
  /** Ask git for colored diffs; colors are carried into the outline. */
  colorDiff?: boolean;
}

function failure(err: unknown): BackendOutcome {
  return { ok: false, reason: describeError(err).trim() };
}

/** stderr of a failed execFileSync, falling back to the error message. */
function processError(err: unknown): string {
  if (err instanceof Error && 'stderr' in err) {
    const stderr = String(err.stderr).trim();
    if (stderr) return stderr;
  }
  return describeError(err);
}

/**
 * GitBackend over simple-git. Patches go through `git apply` on stdin.
 */
export class SimpleGitBackend implements GitBackend {
  private git: SimpleGit;
  private colorDiff: boolean;

  constructor(
    readonly repoPath: string,
    options: SimpleGitBackendOptions = {}
  ) {
    this.git = simpleGit(repoPath);
    this.colorDiff = options.colorDiff ?? false;
  }

  private async read<T>(command: string, run: () => Promise<T>): Promise<T> {
    log.debug('read', { command });
    try {
      return await run();
    } catch (err) {
      throw new BackendFailure(`git ${command} failed: ${describeError(err).trim()}`, command);
    }
  }

  private async mutate(command: string, run: () => Promise<unknown>): Promise<BackendOutcome> {
    log.debug('write', { command });
    try {
      await run();
      return OK;
    } catch (err) {
      log.debug('write failed', { command, reason: describeError(err).trim() });
      return failure(err);
    }
  }

  private async hasHead(): Promise<boolean> {
    // rev-parse -q prints nothing on an unborn branch
    const out = await this.git.raw(['rev-parse', '--verify', '-q', 'HEAD']).catch(() => '');
    return out.trim() !== '';
  }

  // --- Reads ---

  async readStatus(): Promise<RepoStatus> {
    const status = await this.read('status', () => this.git.status());
    const head = (await this.hasHead()) ? ((await this.listRecentCommits(1))[0] ?? null) : null;

    return {
      branch: status.current || 'HEAD',
      detached: status.detached,
      tracking: status.tracking || undefined,
      ahead: status.ahead,
      behind: status.behind,
      head,
      files: status.files.map((file) => ({
        path: file.path,
        origPath: file.from || undefined,
        index: file.index,
        workingDir: file.working_dir,
      })),
    };
  }

  private colorArg(): string {
    return this.colorDiff ? '--color=always' : '--no-color';
  }

  readDiff(staged: boolean): Promise<string> {
    const args = ['--no-ext-diff', '-M', this.colorArg()];
    if (staged) args.push('--cached');
    return this.read(`diff ${args.join(' ')}`, () => this.git.diff(args));
  }

  readUntrackedDiff(path: string): Promise<string> {
    // Exits 1 when the file has content; simple-git only fails on exit codes with stderr
    const args = ['diff', '--no-index', '--no-ext-diff', this.colorArg(), '--', '/dev/null', path];
    return this.read(`diff --no-index ${path}`, () => this.git.raw(args));
  }

  async listStashes(): Promise<StashEntry[]> {
    const output = await this.read('stash list', () =>
      this.git.raw(['stash', 'list', '--format=%gd%x09%s'])
    );
    const stashes: StashEntry[] = [];
    for (const line of output.split('\n')) {
      if (!line) continue;
      const tab = line.indexOf('\t');
      stashes.push(
        tab === -1
          ? { ref: line, message: '' }
          : { ref: line.slice(0, tab), message: line.slice(tab + 1) }
      );
    }
    return stashes;
  }

  async listRecentCommits(limit: number): Promise<CommitInfo[]> {
    if (!(await this.hasHead())) return [];
    const result = await this.read('log', () => this.git.log({ maxCount: limit }));
    return result.all.map((entry) => ({
      hash: entry.hash,
      shortHash: entry.hash.slice(0, 7),
      message: entry.message.split('\n')[0],
      author: entry.author_name,
      date: new Date(entry.date),
      refs: entry.refs || '',
    }));
  }

  async listBranches(): Promise<BranchInfo[]> {
    const summary = await this.read('branch', () => this.git.branchLocal());
    return Object.values(summary.branches).map((branch) => ({
      name: branch.name,
      current: branch.current,
      commit: branch.commit,
      label: branch.label,
    }));
  }

  async headMessage(): Promise<string> {
    if (!(await this.hasHead())) return '';
    const message = await this.read('log -1', () => this.git.raw(['log', '-1', '--format=%B']));
    return message.trimEnd();
  }

  // --- Mutations ---

  async applyPatch(
    patch: string,
    target: PatchTarget,
    options: { reverse: boolean }
  ): Promise<BackendOutcome> {
    const args = ['apply', '--whitespace=nowarn', '--recount'];
    if (target === 'index') args.push('--cached');
    if (options.reverse) args.push('--reverse');
    args.push('-');

    log.debug('apply', { command: args.join(' '), bytes: patch.length });
    try {
      execFileSync('git', args, {
        cwd: this.repoPath,
        input: patch,
        encoding: 'utf-8',
        stdio: ['pipe', 'pipe', 'pipe'],
      });
      return OK;
    } catch (err) {
      const reason = processError(err);
      log.debug('apply failed', { target, reason });
      return { ok: false, reason };
    }
  }

  stagePaths(paths: string[]): Promise<BackendOutcome> {
    return this.mutate(`add ${paths.join(' ')}`, () => this.git.raw(['add', '-A', '--', ...paths]));
  }

  async unstagePaths(paths: string[]): Promise<BackendOutcome> {
    if (await this.hasHead()) {
      return this.mutate(`reset ${paths.join(' ')}`, () =>
        this.git.raw(['reset', '-q', 'HEAD', '--', ...paths])
      );
    }
    return this.mutate(`rm --cached ${paths.join(' ')}`, () =>
      this.git.raw(['rm', '--cached', '-r', '-q', '--', ...paths])
    );
  }

  commit(message: string, amend: boolean): Promise<BackendOutcome> {
    return this.mutate(amend ? 'commit --amend' : 'commit', () =>
      this.git.commit(message, undefined, amend ? { '--amend': null } : undefined)
    );
  }

  async discard(target: DiscardTarget): Promise<BackendOutcome> {
    if (target.kind !== 'file') {
      if (target.origin === 'unstaged') {
        return this.applyPatch(target.patch, 'workingTree', { reverse: true });
      }
      // The working tree may have moved on from the index; revert the index first
      const indexOutcome = await this.applyPatch(target.patch, 'index', { reverse: true });
      if (!indexOutcome.ok) return indexOutcome;
      const treeOutcome = await this.applyPatch(target.patch, 'workingTree', { reverse: true });
      if (!treeOutcome.ok) {
        return { ok: false, reason: `removed from the index only: ${treeOutcome.reason}`, partial: true };
      }
      return OK;
    }

    const { path } = target;
    switch (target.origin) {
      case 'untracked':
        return this.mutate(`clean ${path}`, () => this.git.raw(['clean', '-f', '-d', '-q', '--', path]));
      case 'unstaged':
        return this.mutate(`checkout ${path}`, () => this.git.raw(['checkout', '--', path]));
      case 'staged':
        if (target.status === 'added') {
          return this.mutate(`rm ${path}`, () => this.git.raw(['rm', '-f', '-q', '--', path]));
        }
        if (target.status === 'renamed' && target.origPath) {
          const origPath = target.origPath;
          return this.mutate(`rm ${path}; checkout HEAD ${origPath}`, async () => {
            await this.git.raw(['rm', '-f', '-q', '--', path]);
            await this.git.raw(['checkout', 'HEAD', '--', origPath]);
          });
        }
        return this.mutate(`checkout HEAD ${path}`, () => this.git.raw(['checkout', 'HEAD', '--', path]));
    }
  }

  async runSubcommand(args: string[]): Promise<BackendOutcome> {
    log.debug('attached', { command: args.join(' ') });
    const result = spawnSync('git', args, { cwd: this.repoPath, stdio: 'inherit' });
    if (result.error) return failure(result.error);
    if (result.status !== 0) {
      return { ok: false, reason: `git ${args[0]} exited with code ${result.status ?? 'unknown'}` };
    }
    return OK;
  }
}
