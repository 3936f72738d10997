import stringWidth from 'string-width';
import type { DispatcherMode } from '../../CommandDispatcher.js';
import type { CommitFlowStateData } from '../../state/CommitFlowState.js';
import type { Theme } from '../../themes.js';
import type { StyledLine } from '../../types/frame.js';
import type { TextStyle } from '../../utils/ansi.js';

/** Message lines the commit editor shows at most; older lines scroll off. */
export const MAX_EDITOR_LINES = 5;

const KEY_HINTS =
  's stage  u unstage  x discard  c commit  tab fold  space select  enter show  q quit';

export interface FooterContent {
  lines: StyledLine[];
  /** Text caret relative to the first footer row, when editing. */
  caret: { row: number; col: number } | null;
}

function plain(text: string, style: TextStyle = {}): StyledLine {
  return { segments: [{ text, style }], highlight: null };
}

function formatCommitEditor(commit: CommitFlowStateData, theme: Theme): FooterContent {
  const { colors } = theme;
  const title = commit.amend ? 'Amend commit' : 'Commit message';
  const lines: StyledLine[] = [
    {
      segments: [
        { text: title, style: { fg: colors.sectionTitle, bold: true } },
        {
          text: '  enter commit  C-j newline  C-a amend  C-u clear  esc cancel',
          style: { fg: colors.muted },
        },
      ],
      highlight: null,
    },
  ];

  const messageLines = commit.message.split('\n').slice(-MAX_EDITOR_LINES);
  for (const text of messageLines) {
    lines.push(plain(`> ${text}`));
  }
  const caret = {
    row: lines.length - 1,
    col: 2 + stringWidth(messageLines[messageLines.length - 1]),
  };

  if (commit.isCommitting) {
    lines.push(plain('Committing…', { fg: colors.muted }));
  } else if (commit.error) {
    lines.push(plain(commit.error, { fg: colors.error }));
  }
  return { lines, caret };
}

/**
 * Footer rows for the current mode: commit editor, discard prompt, the last
 * status message, or key hints.
 */
export function formatFooter(
  mode: DispatcherMode,
  statusMessage: string | null,
  commit: CommitFlowStateData,
  theme: Theme
): FooterContent {
  const { colors } = theme;

  switch (mode.kind) {
    case 'commit':
      return formatCommitEditor(commit, theme);
    case 'confirmDiscard':
      return { lines: [plain(mode.prompt, { fg: colors.error, bold: true })], caret: null };
    case 'normal':
      break;
  }

  if (statusMessage) {
    return { lines: [plain(statusMessage)], caret: null };
  }
  return { lines: [plain(KEY_HINTS, { fg: colors.muted })], caret: null };
}
