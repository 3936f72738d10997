import { EventEmitter } from 'node:events';
import type { BackendOutcome } from '../git/backend.js';
import { validateCommit, formatCommitMessage } from '../services/commitService.js';

export interface CommitFlowStateData {
  message: string;
  amend: boolean;
  isCommitting: boolean;
  error: string | null;
}

type CommitFlowEventMap = {
  change: [CommitFlowStateData];
};

const DEFAULT_STATE: CommitFlowStateData = {
  message: '',
  amend: false,
  isCommitting: false,
  error: null,
};

/**
 * CommitFlowState holds the commit editor's buffer and flags.
 *
 * Editing is synchronous; only amend (which may load HEAD's message) and
 * submit reach the backend.
 */
export class CommitFlowState extends EventEmitter<CommitFlowEventMap> {
  private _state: CommitFlowStateData = { ...DEFAULT_STATE };
  private getHeadMessage: () => Promise<string>;
  private onCommit: (message: string, amend: boolean) => Promise<BackendOutcome>;
  private stagedCount: number = 0;

  constructor(options: {
    getHeadMessage: () => Promise<string>;
    onCommit: (message: string, amend: boolean) => Promise<BackendOutcome>;
  }) {
    super();
    this.getHeadMessage = options.getHeadMessage;
    this.onCommit = options.onCommit;
  }

  get state(): CommitFlowStateData {
    return this._state;
  }

  private update(partial: Partial<CommitFlowStateData>): void {
    this._state = { ...this._state, ...partial };
    this.emit('change', this._state);
  }

  setStagedCount(count: number): void {
    this.stagedCount = count;
  }

  // --- Editing ---

  insert(text: string): void {
    this.update({ message: this._state.message + text, error: null });
  }

  newline(): void {
    this.insert('\n');
  }

  backspace(): void {
    const chars = Array.from(this._state.message);
    chars.pop();
    this.update({ message: chars.join(''), error: null });
  }

  clear(): void {
    this.update({ message: '', error: null });
  }

  async toggleAmend(): Promise<void> {
    const newAmend = !this._state.amend;
    this.update({ amend: newAmend });

    // Start from HEAD's message when amending an empty buffer
    if (newAmend && !this._state.message) {
      const msg = await this.getHeadMessage();
      if (msg && !this._state.message) {
        this.update({ message: msg });
      }
    }
  }

  /**
   * Validate and commit. Resolves to true when the commit went through; on
   * failure the buffer is kept and the reason is left in `error`.
   */
  async submit(): Promise<boolean> {
    const validation = validateCommit(this._state.message, this.stagedCount, this._state.amend);
    if (!validation.valid) {
      this.update({ error: validation.error });
      return false;
    }

    this.update({ isCommitting: true, error: null });

    const outcome = await this.onCommit(formatCommitMessage(this._state.message), this._state.amend);
    if (!outcome.ok) {
      this.update({ isCommitting: false, error: outcome.reason });
      return false;
    }

    this.reset();
    return true;
  }

  reset(): void {
    this._state = { ...DEFAULT_STATE };
    this.emit('change', this._state);
  }
}
