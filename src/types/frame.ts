import type { TextStyle } from '../utils/ansi.js';

export interface Segment {
  text: string;
  style: TextStyle;
}

/** Overlay drawn on top of a row's own styling. */
export type Highlight = 'cursor' | 'selection' | null;

export interface StyledLine {
  segments: Segment[];
  highlight: Highlight;
}

/** A run of changed cells on one screen row, styles already composited. */
export interface CellUpdate {
  row: number;
  col: number;
  segments: Segment[];
}

export interface CursorDirective {
  row: number;
  col: number;
  visible: boolean;
}

export interface FrameUpdate {
  /** Clear the screen before applying the updates. */
  fullRedraw: boolean;
  updates: CellUpdate[];
  cursor: CursorDirective | null;
}
