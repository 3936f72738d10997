import { createLogger } from './utils/logger.js';
import type { BackendOutcome } from './git/backend.js';
import { categorizeStatusFiles } from './git/status.js';
import type { Outline } from './core/Outline.js';
import { describeDiscard, planOperation, type PlannedOp, type StagingAction } from './core/operations.js';
import { buildSections, type RepoSnapshot } from './core/sections.js';
import type { WorkingTreeManager } from './core/WorkingTreeManager.js';
import { CommitFlowState } from './state/CommitFlowState.js';
import {
  DEFAULT_KEYMAP,
  resolveAction,
  type Action,
  type KeyPress,
  type Keymap,
} from './KeyBindings.js';
import type { OutlineNode } from './types/outline.js';

export type DispatcherMode =
  | { kind: 'normal' }
  | { kind: 'confirmDiscard'; ops: PlannedOp[]; prompt: string }
  | { kind: 'commit' };

export type KeyResult = 'handled' | 'quit';

/**
 * Runs git subcommands that take over the terminal (pager, blame). The host
 * suspends and restores the screen around the call.
 */
export interface SubcommandHost {
  runSubcommand(args: string[]): Promise<BackendOutcome>;
}

const log = createLogger('keys');

// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\x00-\x1f\x7f]/;

export const LOG_ARGS = ['log', '--graph', '--decorate', '--oneline'];

/**
 * Subcommand shown for an entry, or null when it has nothing to show.
 */
export function showArgs(node: OutlineNode): string[] | null {
  if (node.kind !== 'entry') return null;
  const payload = node.entry.payload;
  switch (payload.kind) {
    case 'commit':
      return ['show', payload.commit.hash];
    case 'stash':
      return ['stash', 'show', '-p', payload.stash.ref];
    case 'branch':
      return [...LOG_ARGS, payload.branch.name];
    case 'file':
      return payload.status === 'untracked' || payload.status === 'added'
        ? null
        : ['blame', '--', payload.origPath ?? payload.path];
  }
}

/**
 * CommandDispatcher turns key presses into outline changes and backend calls.
 *
 * In normal mode a key resolves to a command through the keymap, and the
 * command to an action through the context table for the node under the
 * cursor. Discard and commit switch into their own modes, which see every key
 * until they end.
 */
export class CommandDispatcher {
  readonly commitFlow: CommitFlowState;

  private outline: Outline;
  private manager: WorkingTreeManager;
  private host: SubcommandHost;
  private keymap: Keymap;

  private _mode: DispatcherMode = { kind: 'normal' };
  private _statusMessage: string | null = null;
  private snapshot: RepoSnapshot | null = null;

  constructor(options: {
    outline: Outline;
    manager: WorkingTreeManager;
    host: SubcommandHost;
    keymap?: Keymap;
  }) {
    this.outline = options.outline;
    this.manager = options.manager;
    this.host = options.host;
    this.keymap = options.keymap ?? DEFAULT_KEYMAP;

    this.commitFlow = new CommitFlowState({
      getHeadMessage: () => this.manager.headMessage(),
      onCommit: (message, amend) => this.manager.commit(message, amend),
    });

    this.manager.on('state-change', (state) => {
      if (!state.snapshot || state.snapshot === this.snapshot) return;
      this.snapshot = state.snapshot;
      this.outline.replace(buildSections(state.snapshot));
      this.commitFlow.setStagedCount(categorizeStatusFiles(state.snapshot.status.files).staged.length);
    });
  }

  get mode(): DispatcherMode {
    return this._mode;
  }

  /** Message from the last key, cleared when the next one arrives. */
  get statusMessage(): string | null {
    return this._statusMessage;
  }

  async handleKey(key: KeyPress): Promise<KeyResult> {
    this._statusMessage = null;

    switch (this._mode.kind) {
      case 'confirmDiscard':
        await this.handleConfirm(key, this._mode.ops);
        return 'handled';
      case 'commit':
        await this.handleCommitKey(key);
        return 'handled';
      case 'normal':
        break;
    }

    const command = this.keymap[key.name];
    if (!command) return 'handled';

    const node = this.outline.cursorNode();
    const action = resolveAction(node?.kind ?? 'empty', command);
    if (!action) {
      log.debug('ignored', { command, at: node?.kind ?? 'empty' });
      return 'handled';
    }
    return this.perform(action, node);
  }

  private async perform(action: Action, node: OutlineNode | undefined): Promise<KeyResult> {
    switch (action.kind) {
      case 'move':
        this.outline[action.movement]();
        break;
      case 'toggleFold':
        this.outline.toggleFold();
        break;
      case 'toggleFoldKind':
        if (node) this.outline.toggleFoldKind(node.kind);
        break;
      case 'toggleSelect':
        this.outline.toggleSelect();
        break;
      case 'clearSelection':
        this.outline.clearSelection();
        break;
      case 'staging':
        await this.staging(action.action);
        break;
      case 'commit':
        this.commitFlow.reset();
        this._mode = { kind: 'commit' };
        if (action.amend) await this.commitFlow.toggleAmend();
        break;
      case 'refresh':
        this.report(await this.manager.refresh());
        break;
      case 'show': {
        const args = node ? showArgs(node) : null;
        if (args) this.report(await this.host.runSubcommand(args));
        break;
      }
      case 'log':
        this.report(await this.host.runSubcommand(LOG_ARGS));
        break;
      case 'quit':
        return 'quit';
    }
    return 'handled';
  }

  private async staging(action: StagingAction): Promise<void> {
    const ops = planOperation(this.outline, this.outline.targets(), action);
    if (ops.length === 0) {
      log.debug('nothing to do', { action });
      return;
    }

    if (action === 'discard') {
      this._mode = { kind: 'confirmDiscard', ops, prompt: describeDiscard(ops) };
      return;
    }
    await this.execute(ops);
  }

  private async execute(ops: PlannedOp[]): Promise<void> {
    const outcome = await this.manager.execute(ops);
    if (outcome.ok) this.outline.clearSelection();
    this.report(outcome);
  }

  private async handleConfirm(key: KeyPress, ops: PlannedOp[]): Promise<void> {
    this._mode = { kind: 'normal' };
    if (key.name !== 'y') {
      this._statusMessage = 'Discard cancelled';
      return;
    }
    await this.execute(ops);
  }

  private async handleCommitKey(key: KeyPress): Promise<void> {
    const flow = this.commitFlow;
    if (flow.state.isCommitting) return;

    switch (key.name) {
      case 'enter':
        if (await flow.submit()) {
          this._mode = { kind: 'normal' };
          this._statusMessage = 'Committed';
        }
        return;
      case 'escape':
      case 'C-g':
        flow.reset();
        this._mode = { kind: 'normal' };
        return;
      case 'C-j':
        flow.newline();
        return;
      case 'C-u':
        flow.clear();
        return;
      case 'C-a':
        await flow.toggleAmend();
        return;
      case 'backspace':
        flow.backspace();
        return;
    }

    if (key.ch && !CONTROL_CHARS.test(key.ch)) flow.insert(key.ch);
  }

  private report(outcome: BackendOutcome): void {
    if (!outcome.ok) this._statusMessage = outcome.reason;
  }
}
