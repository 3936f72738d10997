import { describe, it, expect } from 'vitest';
import {
  CONTEXT_ACTIONS,
  DEFAULT_KEYMAP,
  buildKeymap,
  isCommand,
  resolveAction,
} from './KeyBindings.js';

describe('resolveAction', () => {
  it('resolves staging at every level of the outline', () => {
    for (const context of ['section', 'entry', 'hunk', 'line'] as const) {
      expect(resolveAction(context, 'stage')).toEqual({ kind: 'staging', action: 'stage' });
    }
  });

  it('only folds nodes that can have children', () => {
    expect(resolveAction('hunk', 'fold')).toEqual({ kind: 'toggleFold' });
    expect(resolveAction('line', 'fold')).toBeNull();
  });

  it('shows entries only', () => {
    expect(resolveAction('entry', 'show')).toEqual({ kind: 'show' });
    expect(resolveAction('hunk', 'show')).toBeNull();
  });

  it('only moves over untracked file previews', () => {
    expect(resolveAction('preview', 'next')).toEqual({ kind: 'move', movement: 'next' });
    expect(resolveAction('preview', 'stage')).toBeNull();
    expect(resolveAction('preview', 'select')).toBeNull();
  });

  it('falls back to global actions', () => {
    expect(resolveAction('empty', 'commit')).toEqual({ kind: 'commit', amend: false });
    expect(resolveAction('line', 'amend')).toEqual({ kind: 'commit', amend: true });
    expect(resolveAction('empty', 'quit')).toEqual({ kind: 'quit' });
  });

  it('ignores navigation on an empty outline', () => {
    expect(CONTEXT_ACTIONS.empty).toEqual({});
    expect(resolveAction('empty', 'next')).toBeNull();
  });
});

describe('keymap', () => {
  it('binds the default keys', () => {
    expect(DEFAULT_KEYMAP['S-tab']).toBe('foldAll');
    expect(DEFAULT_KEYMAP.x).toBe('discard');
    expect(DEFAULT_KEYMAP['C-c']).toBe('quit');
  });

  it('layers overrides over the defaults', () => {
    const keymap = buildKeymap({ a: 'stage', s: 'select' });
    expect(keymap.a).toBe('stage');
    expect(keymap.s).toBe('select');
    expect(keymap.u).toBe('unstage');
  });

  it('recognizes command names', () => {
    expect(isCommand('foldAll')).toBe(true);
    expect(isCommand('explode')).toBe(false);
    expect(isCommand(3)).toBe(false);
  });
});
