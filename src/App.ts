import type { Config } from './config.js';
import { ActionQueue } from './core/ActionQueue.js';
import { Outline } from './core/Outline.js';
import { WorkingTreeManager } from './core/WorkingTreeManager.js';
import type { BackendOutcome, GitBackend } from './git/backend.js';
import { CommandDispatcher } from './CommandDispatcher.js';
import { buildKeymap, type KeyPress } from './KeyBindings.js';
import { getTheme, type Theme } from './themes.js';
import { FrameRenderer, type FrameInput } from './ui/FrameRenderer.js';
import { buildOutlineRows } from './ui/outlineRows.js';
import type { BlessedTerminal } from './ui/Terminal.js';
import { formatFooter } from './ui/widgets/Footer.js';
import { formatHeader } from './ui/widgets/Header.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('app');

export interface AppOptions {
  config: Config;
  backend: GitBackend;
  terminal: BlessedTerminal;
}

/**
 * Main application controller.
 *
 * Owns the event loop: every key press and resize is queued, handled to
 * completion, then followed by exactly one render.
 */
export class App {
  private terminal: BlessedTerminal;
  private theme: Theme;

  private outline = new Outline();
  private manager: WorkingTreeManager;
  private dispatcher: CommandDispatcher;
  private renderer: FrameRenderer;
  private queue = new ActionQueue();

  private stopped = false;
  private onExit: (() => void) | null = null;

  constructor(options: AppOptions) {
    const { config, backend, terminal } = options;
    this.terminal = terminal;
    this.theme = getTheme(config.theme);

    this.manager = new WorkingTreeManager(backend, config.recentCommitLimit);
    this.dispatcher = new CommandDispatcher({
      outline: this.outline,
      manager: this.manager,
      keymap: buildKeymap(config.keymap),
      host: { runSubcommand: (args) => this.runAttached(args) },
    });
    this.renderer = new FrameRenderer(terminal.width, terminal.height, {
      cursor: this.theme.colors.cursorBg,
      selection: this.theme.colors.selectionBg,
    });
  }

  /**
   * Start the application (returns when app exits).
   */
  start(): Promise<void> {
    const exited = new Promise<void>((resolve) => {
      this.onExit = resolve;
    });

    this.terminal.open();
    this.terminal.on('key', (key) => this.schedule(() => this.handleKey(key)));
    this.terminal.on('resize', () =>
      this.schedule(async () => {
        this.renderer.resize(this.terminal.width, this.terminal.height);
        this.render();
      })
    );

    this.render();
    this.schedule(async () => {
      await this.manager.refresh();
      this.render();
    });

    return exited;
  }

  private schedule(action: () => Promise<void>): void {
    this.queue.enqueue(action).catch((err: unknown) => {
      log.error('Event handler failed', err);
    });
  }

  private async handleKey(key: KeyPress): Promise<void> {
    if (this.stopped) return;
    const result = await this.dispatcher.handleKey(key);
    if (result === 'quit') {
      this.stop();
      return;
    }
    this.render();
  }

  private async runAttached(args: string[]): Promise<BackendOutcome> {
    const outcome = await this.terminal.suspend(() => this.manager.runSubcommand(args));
    this.renderer.invalidate();
    return outcome;
  }

  private render(): void {
    if (this.stopped) return;

    const rows = buildOutlineRows(this.outline, this.theme);
    const { width } = this.renderer.size;
    const state = this.manager.state;
    const input: FrameInput = {
      header: formatHeader(state.snapshot?.status ?? null, state.isLoading, state.error, width, this.theme),
      rows,
      cursorRow: rows.findIndex((row) => row.highlight === 'cursor'),
      footer: formatFooter(
        this.dispatcher.mode,
        this.dispatcher.statusMessage,
        this.dispatcher.commitFlow.state,
        this.theme
      ),
    };
    this.terminal.write(this.renderer.render(input));
  }

  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    this.terminal.close();
    this.onExit?.();
  }
}
