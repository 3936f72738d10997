import type { DiffLine, FileDiff } from '../git/diff.js';
import type { FileStatus } from '../git/status.js';
import type { Outline } from '../core/Outline.js';
import type { Theme } from '../themes.js';
import type { Segment, StyledLine } from '../types/frame.js';
import type { EntryNode, OutlineNode, SectionKind } from '../types/outline.js';
import type { StyleSpan, TextStyle } from '../utils/ansi.js';

export const FOLD_OPEN = '⌄';
export const FOLD_CLOSED = '›';

const INDENT = '  ';
const TAB = '    ';

const STATUS_LABELS: Record<FileStatus, string> = {
  modified: 'modified',
  added: 'new file',
  deleted: 'deleted',
  untracked: '',
  renamed: 'renamed',
  copied: 'copied',
  unmerged: 'unmerged',
};

const LABEL_WIDTH = 10;

export const CLEAN_TREE = 'nothing to commit, working tree clean';

const CHANGE_SECTIONS: ReadonlySet<SectionKind> = new Set(['untracked', 'unstaged', 'staged']);

// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\x00-\x08\x0a-\x1f\x7f]/g;

/** Caret notation for control characters left in diff text: CR shows as ^M. */
function caret(ch: string): string {
  const code = ch.charCodeAt(0);
  return code === 0x7f ? '^?' : `^${String.fromCharCode(code + 64)}`;
}

function seg(text: string, style: TextStyle = {}): Segment {
  return { text: text.replace(/\t/g, TAB).replace(CONTROL_CHARS, caret), style };
}

function foldMarker(node: OutlineNode): string {
  if (node.children.length === 0) return ' ';
  return node.expanded ? FOLD_OPEN : FOLD_CLOSED;
}

/**
 * Split text into segments along style spans; gaps take the fallback style.
 */
function spanSegments(text: string, spans: StyleSpan[], fallback: TextStyle): Segment[] {
  if (spans.length === 0) return [seg(text, fallback)];

  const segments: Segment[] = [];
  let pos = 0;
  for (const span of spans) {
    if (span.start > pos) segments.push(seg(text.slice(pos, span.start), fallback));
    segments.push(seg(text.slice(span.start, span.end), span.style));
    pos = span.end;
  }
  if (pos < text.length) segments.push(seg(text.slice(pos), fallback));
  return segments;
}

function entrySegments(node: EntryNode, theme: Theme): Segment[] {
  const { colors } = theme;
  const payload = node.entry.payload;

  switch (payload.kind) {
    case 'file': {
      const status = STATUS_LABELS[payload.status];
      const segments = status ? [seg(status.padEnd(LABEL_WIDTH), { fg: colors.muted })] : [];
      segments.push(seg(node.entry.label));
      const diff: FileDiff | null = payload.diff;
      if (diff?.binary) segments.push(seg(' (binary)', { fg: colors.muted }));
      if (diff?.unparsable) {
        segments.push(seg(` (unparsable: ${diff.unparsable.reason})`, { fg: colors.error }));
      }
      return segments;
    }
    case 'stash':
      return [
        seg(payload.stash.ref, { fg: colors.hash }),
        seg(payload.stash.message ? ` ${payload.stash.message}` : ''),
      ];
    case 'commit':
      return [seg(payload.commit.shortHash, { fg: colors.hash }), seg(` ${payload.commit.message}`)];
    case 'branch':
      return [seg(node.entry.label, payload.branch.current ? { bold: true } : {})];
  }
}

function lineSegments(line: DiffLine, theme: Theme): Segment[] {
  const { colors } = theme;
  const fg =
    line.kind === 'addition' ? colors.addition : line.kind === 'deletion' ? colors.deletion : colors.context;
  const segments = spanSegments(line.text, line.spans, { fg });
  if (line.noEol) segments.push(seg(' (no newline at end of file)', { fg: colors.muted }));
  return segments;
}

/**
 * Segments for one outline node, indentation and fold marker included.
 */
export function nodeSegments(node: OutlineNode, theme: Theme): Segment[] {
  const { colors } = theme;
  const indent = INDENT.repeat(node.depth);

  switch (node.kind) {
    case 'section':
      return [
        seg(`${foldMarker(node)} `, { fg: colors.muted }),
        seg(node.title, { fg: colors.sectionTitle, bold: true }),
        seg(` (${node.entryCount})`, { fg: colors.muted }),
      ];
    case 'entry':
      return [seg(`${indent}${foldMarker(node)} `, { fg: colors.muted }), ...entrySegments(node, theme)];
    case 'hunk': {
      const hunk = node.file.hunks[node.index];
      return [
        seg(`${indent}${foldMarker(node)} `, { fg: colors.muted }),
        ...spanSegments(hunk.header, hunk.headerSpans, { fg: colors.hunkHeader }),
      ];
    }
    case 'line': {
      const line = node.file.hunks[node.hunkIndex].lines[node.index];
      return [seg(`${indent}  `), ...lineSegments(line, theme)];
    }
    case 'preview':
      return [seg(`${indent}  `), ...lineSegments(node.line, theme)];
  }
}

/**
 * Styled rows for the outline's visible sequence, with cursor and selection
 * overlays marked. A clean tree gets a leading placeholder row.
 */
export function buildOutlineRows(outline: Outline, theme: Theme): StyledLine[] {
  const rows: StyledLine[] = [];
  let clean = true;
  for (const key of outline.visible()) {
    const node = outline.get(key);
    if (!node) continue;
    if (node.kind === 'section' && CHANGE_SECTIONS.has(node.section)) clean = false;
    rows.push({
      segments: nodeSegments(node, theme),
      highlight: key === outline.cursor ? 'cursor' : outline.isSelected(key) ? 'selection' : null,
    });
  }
  // Not an outline node: the cursor never lands on it.
  if (clean) rows.unshift({ segments: [seg(CLEAN_TREE, { fg: theme.colors.muted })], highlight: null });
  return rows;
}
