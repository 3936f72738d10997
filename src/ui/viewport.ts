/**
 * Calculate the scroll offset needed to keep the cursor row visible.
 *
 * Scrolls by the smallest amount that brings the cursor back into view. When
 * the cursor lands more than a full viewport beyond either edge (a refresh or
 * a long jump) it is centered instead.
 */
export function calculateScrollOffset(
  cursorRow: number,
  currentScrollOffset: number,
  visibleHeight: number,
  totalRows: number
): number {
  if (visibleHeight <= 0 || totalRows <= 0) return 0;

  const maxOffset = Math.max(0, totalRows - visibleHeight);
  const current = Math.min(Math.max(0, currentScrollOffset), maxOffset);
  if (cursorRow < 0) return current;

  let offset = current;
  if (cursorRow < current - visibleHeight || cursorRow >= current + 2 * visibleHeight) {
    offset = cursorRow - Math.floor(visibleHeight / 2);
  }
  // Scroll up if cursor is above visible area
  else if (cursorRow < current) {
    offset = cursorRow;
  }
  // Scroll down if cursor is below visible area
  else if (cursorRow >= current + visibleHeight) {
    offset = cursorRow - visibleHeight + 1;
  }

  return Math.min(Math.max(0, offset), maxOffset);
}
