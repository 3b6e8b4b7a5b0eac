/**
 * Cursor and scroll arithmetic shared by the list views.
 */

export interface ListPosition {
  selectedIndex: number;
  scrollOffset: number;
}

/** Keep an index inside a list of `length` items (0 for an empty list). */
export function clampIndex(index: number, length: number): number {
  if (length <= 0) return 0;
  return Math.min(Math.max(0, index), length - 1);
}

/**
 * Move the cursor by `delta` and scroll just enough to keep it inside
 * a viewport of `visibleRows` rows.
 */
export function moveSelection(
  position: ListPosition,
  delta: number,
  length: number,
  visibleRows: number,
): ListPosition {
  const selectedIndex = clampIndex(position.selectedIndex + delta, length);
  return { selectedIndex, scrollOffset: scrollToReveal(selectedIndex, position.scrollOffset, visibleRows) };
}

export function scrollToReveal(index: number, scrollOffset: number, visibleRows: number): number {
  if (index < scrollOffset) return index;
  if (index >= scrollOffset + visibleRows) return index - visibleRows + 1;
  return scrollOffset;
}

/** "1".."9" pick one of the first nine rows; anything else is null. */
export function quickSelectIndex(input: string): number | null {
  return /^[1-9]$/.test(input) ? Number(input) - 1 : null;
}
