import type { StagingAction } from './core/operations.js';
import type { NodeKind } from './types/outline.js';

/**
 * A decoded key press. `name` is the full key name as the terminal reports
 * it ('j', 'S-tab', 'C-c', 'enter'); `ch` is the printed character, if any.
 */
export interface KeyPress {
  name: string;
  ch?: string;
}

export const COMMANDS = [
  'next',
  'prev',
  'parent',
  'into',
  'nextSibling',
  'prevSibling',
  'fold',
  'foldAll',
  'select',
  'clearSelection',
  'stage',
  'unstage',
  'discard',
  'commit',
  'amend',
  'refresh',
  'show',
  'log',
  'quit',
] as const;

export type Command = (typeof COMMANDS)[number];

export function isCommand(value: unknown): value is Command {
  return typeof value === 'string' && (COMMANDS as readonly string[]).includes(value);
}

export type Keymap = Readonly<Record<string, Command>>;

export const DEFAULT_KEYMAP: Keymap = {
  j: 'next',
  down: 'next',
  k: 'prev',
  up: 'prev',
  h: 'parent',
  left: 'parent',
  l: 'into',
  right: 'into',
  n: 'nextSibling',
  p: 'prevSibling',
  tab: 'fold',
  'S-tab': 'foldAll',
  space: 'select',
  escape: 'clearSelection',
  s: 'stage',
  u: 'unstage',
  x: 'discard',
  c: 'commit',
  'S-c': 'amend',
  g: 'refresh',
  r: 'refresh',
  enter: 'show',
  'S-l': 'log',
  q: 'quit',
  'C-c': 'quit',
};

/**
 * Layer configured bindings over the defaults.
 */
export function buildKeymap(overrides: Keymap = {}): Keymap {
  return { ...DEFAULT_KEYMAP, ...overrides };
}

export type Movement = 'next' | 'prev' | 'parent' | 'firstChild' | 'nextSibling' | 'prevSibling';

export type Action =
  | { kind: 'move'; movement: Movement }
  | { kind: 'toggleFold' }
  | { kind: 'toggleFoldKind' }
  | { kind: 'toggleSelect' }
  | { kind: 'clearSelection' }
  | { kind: 'staging'; action: StagingAction }
  | { kind: 'commit'; amend: boolean }
  | { kind: 'refresh' }
  | { kind: 'show' }
  | { kind: 'log' }
  | { kind: 'quit' };

/** What the cursor sits on; `empty` when the outline has no nodes. */
export type ActionContext = NodeKind | 'empty';

type ActionTable = Partial<Record<Command, Action>>;

const MOVES: ActionTable = {
  next: { kind: 'move', movement: 'next' },
  prev: { kind: 'move', movement: 'prev' },
  parent: { kind: 'move', movement: 'parent' },
  nextSibling: { kind: 'move', movement: 'nextSibling' },
  prevSibling: { kind: 'move', movement: 'prevSibling' },
};

const NAVIGATION: ActionTable = {
  ...MOVES,
  select: { kind: 'toggleSelect' },
  clearSelection: { kind: 'clearSelection' },
};

const FOLDING: ActionTable = {
  into: { kind: 'move', movement: 'firstChild' },
  fold: { kind: 'toggleFold' },
  foldAll: { kind: 'toggleFoldKind' },
};

const STAGING: ActionTable = {
  stage: { kind: 'staging', action: 'stage' },
  unstage: { kind: 'staging', action: 'unstage' },
  discard: { kind: 'staging', action: 'discard' },
};

/** Commands that mean the same thing wherever the cursor is. */
export const GLOBAL_ACTIONS: ActionTable = {
  commit: { kind: 'commit', amend: false },
  amend: { kind: 'commit', amend: true },
  refresh: { kind: 'refresh' },
  log: { kind: 'log' },
  quit: { kind: 'quit' },
};

export const CONTEXT_ACTIONS: Record<ActionContext, ActionTable> = {
  section: { ...NAVIGATION, ...FOLDING, ...STAGING },
  entry: { ...NAVIGATION, ...FOLDING, ...STAGING, show: { kind: 'show' } },
  hunk: { ...NAVIGATION, ...FOLDING, ...STAGING },
  line: { ...NAVIGATION, ...STAGING },
  preview: MOVES,
  empty: {},
};

/**
 * Look up what a command does in the given context. Null means the command
 * has no meaning there and the key is ignored.
 */
export function resolveAction(context: ActionContext, command: Command): Action | null {
  return CONTEXT_ACTIONS[context][command] ?? GLOBAL_ACTIONS[command] ?? null;
}
