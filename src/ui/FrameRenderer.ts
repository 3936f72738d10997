import stringWidth from 'string-width';
import { stylesEqual, type Color, type TextStyle } from '../utils/ansi.js';
import type {
  CellUpdate,
  CursorDirective,
  FrameUpdate,
  Highlight,
  Segment,
  StyledLine,
} from '../types/frame.js';
import type { FooterContent } from './widgets/Footer.js';
import { calculateScrollOffset } from './viewport.js';

export const MIN_WIDTH = 20;
export const MIN_HEIGHT = 3;
export const TOO_SMALL = 'terminal too small';

export interface FrameInput {
  header: StyledLine;
  rows: StyledLine[];
  /** Index of the cursor's row in `rows`, -1 when there is none. */
  cursorRow: number;
  footer: FooterContent;
}

export type HighlightColors = Record<Exclude<Highlight, null>, Color>;

/**
 * One screen cell. A wide character sits in a cell of width 2 followed by a
 * width-0 continuation cell.
 */
interface Cell {
  ch: string;
  width: number;
  style: TextStyle;
  highlight: Highlight;
}

function blankCell(highlight: Highlight): Cell {
  return { ch: ' ', width: 1, style: {}, highlight };
}

function cellsEqual(a: Cell, b: Cell): boolean {
  return (
    a.ch === b.ch &&
    a.width === b.width &&
    a.highlight === b.highlight &&
    stylesEqual(a.style, b.style)
  );
}

/**
 * Lay a styled line onto exactly `width` cells. Text past the edge is cut;
 * a wide character that would straddle the edge becomes a blank.
 */
function rasterize(line: StyledLine, width: number): Cell[] {
  const cells: Cell[] = [];

  for (const segment of line.segments) {
    for (const ch of Array.from(segment.text)) {
      const w = stringWidth(ch);
      if (w === 0) {
        // Combining marks join the character before them
        const last = cells[cells.length - 1];
        if (last && last.width > 0) last.ch += ch;
        continue;
      }
      if (cells.length + w > width) break;
      cells.push({ ch, width: w, style: segment.style, highlight: line.highlight });
      if (w === 2) cells.push({ ch: '', width: 0, style: segment.style, highlight: line.highlight });
    }
    if (cells.length >= width) break;
  }

  while (cells.length < width) cells.push(blankCell(line.highlight));
  return cells;
}

/**
 * FrameRenderer keeps the last frame it emitted and turns each new frame into
 * the cell runs that changed.
 *
 * Compositing: a highlight replaces the background only. Foreground and
 * attributes always come from the line's own style, so a highlight moving off
 * a colored line restores exactly what was under it.
 */
export class FrameRenderer {
  private width: number;
  private height: number;
  private highlights: HighlightColors;

  private previous: Cell[][] | null = null;
  private forceFullRedraw = true;
  private scrollOffset = 0;

  constructor(width: number, height: number, highlights: HighlightColors) {
    this.width = width;
    this.height = height;
    this.highlights = highlights;
  }

  get size(): { width: number; height: number } {
    return { width: this.width, height: this.height };
  }

  resize(width: number, height: number): void {
    this.width = width;
    this.height = height;
    this.invalidate();
  }

  /** Forget the last frame; the next render redraws everything. */
  invalidate(): void {
    this.forceFullRedraw = true;
  }

  render(input: FrameInput): FrameUpdate {
    const { width, height } = this;
    if (width <= 0 || height <= 0) {
      this.previous = null;
      this.forceFullRedraw = true;
      return { fullRedraw: false, updates: [], cursor: null };
    }

    const { lines, cursor } = this.layout(input);
    const grid: Cell[][] = [];
    for (let row = 0; row < height; row++) {
      grid.push(rasterize(lines[row] ?? { segments: [], highlight: null }, width));
    }

    const fullRedraw = this.forceFullRedraw || this.previous === null;
    const updates = fullRedraw ? this.fullUpdates(grid) : this.diffUpdates(grid, this.previous ?? []);

    this.previous = grid;
    this.forceFullRedraw = false;
    return { fullRedraw, updates, cursor };
  }

  /**
   * Screen lines top to bottom: header, outline viewport, footer.
   */
  private layout(input: FrameInput): { lines: StyledLine[]; cursor: CursorDirective | null } {
    const { width, height } = this;

    if (width < MIN_WIDTH || height < MIN_HEIGHT) {
      return { lines: [{ segments: [{ text: TOO_SMALL, style: {} }], highlight: null }], cursor: null };
    }

    // Header and at least one outline row stay on screen
    const footerRoom = height - 2;
    const dropped = Math.max(0, input.footer.lines.length - footerRoom);
    const footer = input.footer.lines.slice(dropped);
    const viewportHeight = height - 1 - footer.length;

    this.scrollOffset = calculateScrollOffset(
      input.cursorRow,
      this.scrollOffset,
      viewportHeight,
      input.rows.length
    );

    const empty: StyledLine = { segments: [], highlight: null };
    const lines: StyledLine[] = [input.header];
    for (let i = 0; i < viewportHeight; i++) {
      lines.push(input.rows[this.scrollOffset + i] ?? empty);
    }
    lines.push(...footer);

    const footerTop = 1 + viewportHeight;
    const caret = input.footer.caret;
    let cursor: CursorDirective | null = null;
    if (caret && caret.row >= dropped) {
      cursor = {
        row: footerTop + caret.row - dropped,
        col: Math.min(caret.col, width - 1),
        visible: true,
      };
    } else if (input.cursorRow >= 0) {
      cursor = { row: 1 + input.cursorRow - this.scrollOffset, col: 0, visible: false };
    }
    return { lines, cursor };
  }

  private composite(cell: Cell): TextStyle {
    return cell.highlight ? { ...cell.style, bg: this.highlights[cell.highlight] } : cell.style;
  }

  /** Group cells [from, to) into runs of the same composited style. */
  private segmentsOf(cells: Cell[], from: number, to: number): Segment[] {
    const segments: Segment[] = [];
    for (let col = from; col < to; col++) {
      const cell = cells[col];
      if (cell.width === 0) continue;
      const style = this.composite(cell);
      const last = segments[segments.length - 1];
      if (last && stylesEqual(last.style, style)) last.text += cell.ch;
      else segments.push({ text: cell.ch, style });
    }
    return segments;
  }

  private fullUpdates(grid: Cell[][]): CellUpdate[] {
    return grid.map((cells, row) => ({ row, col: 0, segments: this.segmentsOf(cells, 0, cells.length) }));
  }

  /**
   * One update per row that changed, spanning its first to last changed cell.
   */
  private diffUpdates(grid: Cell[][], previous: Cell[][]): CellUpdate[] {
    const updates: CellUpdate[] = [];

    grid.forEach((cells, row) => {
      const before = previous[row];
      let start = -1;
      let end = -1;
      for (let col = 0; col < cells.length; col++) {
        if (before && before[col] && cellsEqual(before[col], cells[col])) continue;
        if (start === -1) start = col;
        end = col;
      }
      if (start === -1) return;

      // Never start on the second half of a wide character or stop on its first
      if (cells[start].width === 0 && start > 0) start--;
      if (cells[end].width === 2) end++;

      updates.push({ row, col: start, segments: this.segmentsOf(cells, start, end + 1) });
    });

    return updates;
  }
}
