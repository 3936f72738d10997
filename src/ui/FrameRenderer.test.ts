import { describe, it, expect, beforeEach } from 'vitest';
import type { CellUpdate, Highlight, StyledLine } from '../types/frame.js';
import type { TextStyle } from '../utils/ansi.js';
import { FrameRenderer, type FrameInput, type HighlightColors } from './FrameRenderer.js';

const HIGHLIGHTS: HighlightColors = { cursor: 'gray', selection: 'blue' };

function line(text: string, style: TextStyle = {}, highlight: Highlight = null): StyledLine {
  return { segments: [{ text, style }], highlight };
}

function frame(rows: StyledLine[], cursorRow: number, footer: StyledLine[] = [line('hints')]): FrameInput {
  return { header: line('Head: main'), rows, cursorRow, footer: { lines: footer, caret: null } };
}

/** Plain rows with the cursor highlight on one of them. */
function outlineRows(count: number, cursor: number): StyledLine[] {
  return Array.from({ length: count }, (_, i) =>
    line(`row ${i}`, {}, i === cursor ? 'cursor' : null)
  );
}

function text(update: CellUpdate): string {
  return update.segments.map((s) => s.text).join('');
}

describe('FrameRenderer', () => {
  let renderer: FrameRenderer;

  beforeEach(() => {
    renderer = new FrameRenderer(80, 24, HIGHLIGHTS);
  });

  it('draws every row on the first frame', () => {
    const update = renderer.render(frame(outlineRows(3, 0), 0));

    expect(update.fullRedraw).toBe(true);
    expect(update.updates).toHaveLength(24);
    expect(update.updates[0]).toEqual({
      row: 0,
      col: 0,
      segments: [{ text: 'Head: main'.padEnd(80), style: {} }],
    });
    expect(text(update.updates[23])).toBe('hints'.padEnd(80));
    expect(update.cursor).toEqual({ row: 1, col: 0, visible: false });
  });

  it('writes nothing when the frame is unchanged', () => {
    renderer.render(frame(outlineRows(3, 0), 0));
    expect(renderer.render(frame(outlineRows(3, 0), 0))).toEqual({
      fullRedraw: false,
      updates: [],
      cursor: { row: 1, col: 0, visible: false },
    });
  });

  it('redraws only the rows the cursor left and entered', () => {
    renderer.render(frame(outlineRows(3, 0), 0));

    const { updates } = renderer.render(frame(outlineRows(3, 1), 1));

    expect(updates).toEqual([
      { row: 1, col: 0, segments: [{ text: 'row 0'.padEnd(80), style: {} }] },
      { row: 2, col: 0, segments: [{ text: 'row 1'.padEnd(80), style: { bg: 'gray' } }] },
    ]);
  });

  it('writes the changed span of a row', () => {
    renderer.render(frame([line('row 0')], -1));
    const { updates } = renderer.render(frame([line('rox 0')], -1));
    expect(updates).toEqual([{ row: 1, col: 2, segments: [{ text: 'x', style: {} }] }]);
  });

  it('keeps a line color under the highlight', () => {
    const { updates } = renderer.render(frame([line('-two', { fg: 'red' }, 'cursor')], 0));
    expect(updates[1].segments).toEqual([
      { text: '-two', style: { fg: 'red', bg: 'gray' } },
      { text: ' '.repeat(76), style: { bg: 'gray' } },
    ]);
  });

  it('restores the line color when the highlight moves away', () => {
    renderer.render(frame([line('-two', { fg: 'red' }, 'cursor'), line('x')], 0));
    const { updates } = renderer.render(frame([line('-two', { fg: 'red' }), line('x', {}, 'cursor')], 1));
    expect(updates[0].segments).toEqual([
      { text: '-two', style: { fg: 'red' } },
      { text: ' '.repeat(76), style: {} },
    ]);
  });

  describe('wide characters', () => {
    beforeEach(() => {
      renderer = new FrameRenderer(20, 5, HIGHLIGHTS);
    });

    it('gives a wide character two columns', () => {
      const { updates } = renderer.render(frame([line('a日b')], -1));
      expect(text(updates[1])).toBe('a日b' + ' '.repeat(16));
    });

    it('rewrites a wide character whole', () => {
      renderer.render(frame([line('a日b')], -1));
      const { updates } = renderer.render(frame([line('a本b')], -1));
      expect(updates).toEqual([{ row: 1, col: 1, segments: [{ text: '本', style: {} }] }]);
    });

    it('blanks a wide character that would cross the right edge', () => {
      const { updates } = renderer.render(frame([line('x'.repeat(19) + '日')], -1));
      expect(text(updates[1])).toBe('x'.repeat(19) + ' ');
    });
  });

  describe('resize', () => {
    it('redraws fully after a resize and keeps the cursor on screen', () => {
      const rows = outlineRows(40, 30);
      const first = renderer.render(frame(rows, 30));
      expect(first.cursor).toEqual({ row: 22, col: 0, visible: false });

      renderer.resize(40, 24);
      const narrow = renderer.render(frame(rows, 30));
      expect(narrow.fullRedraw).toBe(true);
      expect(narrow.updates).toHaveLength(24);
      expect(narrow.updates.every((u) => u.col === 0 && text(u).length === 40)).toBe(true);

      renderer.resize(40, 10);
      const short = renderer.render(frame(rows, 30));
      expect(short.fullRedraw).toBe(true);
      expect(short.updates).toHaveLength(10);
      expect(short.cursor).toEqual({ row: 5, col: 0, visible: false });
      expect(text(short.updates[5])).toBe('row 30'.padEnd(40));
    });

    it('shows a placeholder when the terminal is too small', () => {
      renderer.resize(10, 24);
      const update = renderer.render(frame(outlineRows(3, 0), 0));

      expect(update.fullRedraw).toBe(true);
      expect(text(update.updates[0])).toBe('terminal t');
      expect(text(update.updates[1])).toBe(' '.repeat(10));
      expect(update.cursor).toBeNull();
    });

    it('emits nothing for a zero-size terminal', () => {
      renderer.resize(0, 0);
      expect(renderer.render(frame(outlineRows(3, 0), 0))).toEqual({
        fullRedraw: false,
        updates: [],
        cursor: null,
      });

      renderer.resize(40, 24);
      expect(renderer.render(frame(outlineRows(3, 0), 0)).fullRedraw).toBe(true);
    });
  });

  it('redraws fully after invalidate', () => {
    renderer.render(frame(outlineRows(3, 0), 0));
    renderer.invalidate();
    expect(renderer.render(frame(outlineRows(3, 0), 0)).fullRedraw).toBe(true);
  });

  it('places a visible caret in the footer', () => {
    const input = frame(outlineRows(3, 0), 0, [line('Commit message'), line('> Fix')]);
    input.footer.caret = { row: 1, col: 5 };
    expect(renderer.render(input).cursor).toEqual({ row: 23, col: 5, visible: true });
  });
});
