import stringWidth from 'string-width';
import type { RepoStatus } from '../../git/backend.js';
import type { Theme } from '../../themes.js';
import type { Segment, StyledLine } from '../../types/frame.js';

function textWidth(segments: Segment[]): number {
  return segments.reduce((sum, s) => sum + stringWidth(s.text), 0);
}

/**
 * Tracking branch and ahead/behind counts, for the right side.
 */
function formatTracking(status: RepoStatus, theme: Theme): Segment[] {
  const segments: Segment[] = [];
  if (status.tracking) {
    segments.push({ text: '→ ', style: { fg: theme.colors.muted } });
    segments.push({ text: status.tracking, style: { fg: theme.colors.hunkHeader } });
  }
  if (status.ahead > 0) {
    segments.push({ text: ` ↑${status.ahead}`, style: { fg: theme.colors.addition } });
  }
  if (status.behind > 0) {
    segments.push({ text: ` ↓${status.behind}`, style: { fg: theme.colors.deletion } });
  }
  return segments;
}

/**
 * Header row: `Head: <branch> <short hash> <subject>`, tracking info on the right.
 */
export function formatHeader(
  status: RepoStatus | null,
  isLoading: boolean,
  error: string | null,
  width: number,
  theme: Theme
): StyledLine {
  const { colors } = theme;
  const left: Segment[] = [{ text: 'Head: ', style: { fg: colors.sectionTitle, bold: true } }];

  if (!status) {
    left.push({ text: isLoading ? 'loading…' : '(unknown)', style: { fg: colors.muted } });
  } else {
    const branch = status.detached ? '(detached)' : status.branch;
    left.push({ text: branch, style: { fg: colors.addition, bold: true } });
    if (status.head) {
      left.push({ text: ` ${status.head.shortHash}`, style: { fg: colors.hash } });
      left.push({ text: ` ${status.head.message}`, style: {} });
    } else {
      left.push({ text: ' (no commits yet)', style: { fg: colors.muted } });
    }
  }

  if (error) {
    left.push({ text: ` (${error})`, style: { fg: colors.error } });
  }

  const right = status ? formatTracking(status, theme) : [];
  if (right.length === 0) return { segments: left, highlight: null };

  // Right-align when both sides fit
  const padding = width - textWidth(left) - textWidth(right);
  if (padding < 1) return { segments: left, highlight: null };
  return { segments: [...left, { text: ' '.repeat(padding), style: {} }, ...right], highlight: null };
}
