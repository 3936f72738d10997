import { EventEmitter } from 'node:events';
import { createLogger } from '../utils/logger.js';
import { describeError, type BackendOutcome, type GitBackend } from '../git/backend.js';
import { loadSnapshot, type RepoSnapshot } from './sections.js';
import type { PlannedOp } from './operations.js';

const log = createLogger('tree');

export interface WorkingTreeState {
  snapshot: RepoSnapshot | null;
  isLoading: boolean;
  error: string | null;
}

type WorkingTreeEventMap = {
  'state-change': [WorkingTreeState];
};

/**
 * Owns the last repository snapshot and every call that changes the repository.
 *
 * A failed mutation stops the remaining operations. The snapshot is refreshed
 * after any run that changed the repository, failed or not, and kept as it was
 * when nothing changed. A refresh that fails also keeps the previous snapshot,
 * and its reason stays in `error` until the next refresh.
 */
export class WorkingTreeManager extends EventEmitter<WorkingTreeEventMap> {
  private backend: GitBackend;
  private commitLimit: number;

  private _state: WorkingTreeState = {
    snapshot: null,
    isLoading: false,
    error: null,
  };

  constructor(backend: GitBackend, commitLimit: number) {
    super();
    this.backend = backend;
    this.commitLimit = commitLimit;
  }

  get state(): WorkingTreeState {
    return this._state;
  }

  private updateState(partial: Partial<WorkingTreeState>): void {
    this._state = { ...this._state, ...partial };
    this.emit('state-change', this._state);
  }

  // --- Refresh ---

  async refresh(): Promise<BackendOutcome> {
    this.updateState({ isLoading: true, error: null });

    try {
      const snapshot = await loadSnapshot(this.backend, this.commitLimit);
      this.updateState({ snapshot, isLoading: false });
      return { ok: true };
    } catch (err) {
      const reason = `Failed to refresh: ${describeError(err)}`;
      log.warn(reason);
      this.updateState({ isLoading: false, error: reason });
      return { ok: false, reason };
    }
  }

  // --- Staging operations ---

  private run(op: PlannedOp): Promise<BackendOutcome> {
    switch (op.kind) {
      case 'stagePaths':
        return this.backend.stagePaths(op.paths);
      case 'unstagePaths':
        return this.backend.unstagePaths(op.paths);
      case 'applyPatch':
        return this.backend.applyPatch(op.patch, op.target, { reverse: op.reverse });
      case 'discard':
        return this.backend.discard(op.target);
    }
  }

  /**
   * Run planned operations in order, then refresh. On failure the failing
   * outcome is returned, after a refresh if earlier operations went through.
   */
  async execute(ops: PlannedOp[]): Promise<BackendOutcome> {
    for (const [index, op] of ops.entries()) {
      log.debug('execute', { op: op.kind, step: index + 1, of: ops.length });
      const outcome = await this.run(op);
      if (!outcome.ok) {
        if (index > 0 || outcome.partial) await this.refresh();
        return outcome;
      }
    }
    return this.refresh();
  }

  // --- Commit ---

  async commit(message: string, amend: boolean): Promise<BackendOutcome> {
    const outcome = await this.backend.commit(message, amend);
    if (!outcome.ok) return outcome;
    return this.refresh();
  }

  /** HEAD's message for amending; '' when it cannot be read. */
  async headMessage(): Promise<string> {
    try {
      return await this.backend.headMessage();
    } catch (err) {
      log.warn('Failed to read HEAD message', { reason: describeError(err) });
      return '';
    }
  }

  // --- Pass-through ---

  runSubcommand(args: string[]): Promise<BackendOutcome> {
    return this.backend.runSubcommand(args);
  }
}
