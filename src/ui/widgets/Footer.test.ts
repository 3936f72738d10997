import { describe, it, expect } from 'vitest';
import type { CommitFlowStateData } from '../../state/CommitFlowState.js';
import { getTheme } from '../../themes.js';
import type { StyledLine } from '../../types/frame.js';
import { formatFooter, MAX_EDITOR_LINES } from './Footer.js';

const theme = getTheme('dark-ansi');

const IDLE: CommitFlowStateData = { message: '', amend: false, isCommitting: false, error: null };

function text(line: StyledLine): string {
  return line.segments.map((s) => s.text).join('');
}

describe('formatFooter', () => {
  it('shows key hints when idle', () => {
    const { lines, caret } = formatFooter({ kind: 'normal' }, null, IDLE, theme);
    expect(lines).toHaveLength(1);
    expect(text(lines[0]).startsWith('s stage  u unstage')).toBe(true);
    expect(caret).toBeNull();
  });

  it('shows the status message instead of hints', () => {
    const { lines } = formatFooter({ kind: 'normal' }, 'patch does not apply', IDLE, theme);
    expect(lines.map(text)).toEqual(['patch does not apply']);
  });

  it('shows the discard prompt', () => {
    const { lines } = formatFooter(
      { kind: 'confirmDiscard', ops: [], prompt: 'Discard a.txt? (y/n)' },
      null,
      IDLE,
      theme
    );
    expect(lines).toEqual([
      { segments: [{ text: 'Discard a.txt? (y/n)', style: { fg: 'redBright', bold: true } }], highlight: null },
    ]);
  });

  it('shows the commit editor with its caret', () => {
    const { lines, caret } = formatFooter(
      { kind: 'commit' },
      null,
      { ...IDLE, message: 'Fix\nBody', error: 'No changes staged for commit' },
      theme
    );

    expect(lines.map(text).slice(1)).toEqual(['> Fix', '> Body', 'No changes staged for commit']);
    expect(text(lines[0]).startsWith('Commit message')).toBe(true);
    expect(caret).toEqual({ row: 2, col: 6 });
  });

  it('keeps only the last editor lines', () => {
    const message = ['1', '2', '3', '4', '5', '6', '7'].join('\n');
    const { lines, caret } = formatFooter({ kind: 'commit' }, null, { ...IDLE, message, amend: true }, theme);

    expect(lines).toHaveLength(1 + MAX_EDITOR_LINES);
    expect(text(lines[1])).toBe('> 3');
    expect(text(lines[0]).startsWith('Amend commit')).toBe(true);
    expect(caret).toEqual({ row: MAX_EDITOR_LINES, col: 3 });
  });
});
