import { describe, it, expect } from 'vitest';
import { repoStatus } from '../../git/test-helpers.js';
import { getTheme } from '../../themes.js';
import type { StyledLine } from '../../types/frame.js';
import { formatHeader } from './Header.js';

const theme = getTheme('dark');

function text(line: StyledLine): string {
  return line.segments.map((s) => s.text).join('');
}

describe('formatHeader', () => {
  it('shows branch, short hash and subject', () => {
    expect(text(formatHeader(repoStatus(), false, null, 80, theme))).toBe(
      'Head: main abc1234 Initial commit'
    );
  });

  it('right-aligns tracking info', () => {
    const status = { ...repoStatus(), tracking: 'origin/main', ahead: 1 };
    const line = text(formatHeader(status, false, null, 60, theme));

    expect(line).toHaveLength(60);
    expect(line.startsWith('Head: main abc1234 Initial commit ')).toBe(true);
    expect(line.endsWith('→ origin/main ↑1')).toBe(true);
  });

  it('drops tracking info that does not fit', () => {
    const status = { ...repoStatus(), tracking: 'origin/main' };
    expect(text(formatHeader(status, false, null, 30, theme))).toBe(
      'Head: main abc1234 Initial commit'
    );
  });

  it('describes a detached or empty HEAD', () => {
    expect(text(formatHeader({ ...repoStatus(), detached: true }, false, null, 80, theme))).toBe(
      'Head: (detached) abc1234 Initial commit'
    );
    expect(text(formatHeader({ ...repoStatus(), head: null }, false, null, 80, theme))).toBe(
      'Head: main (no commits yet)'
    );
  });

  it('shows loading and errors', () => {
    expect(text(formatHeader(null, true, null, 80, theme))).toBe('Head: loading…');
    expect(text(formatHeader(repoStatus(), false, 'Failed to refresh: locked', 80, theme))).toBe(
      'Head: main abc1234 Initial commit (Failed to refresh: locked)'
    );
  });
});
