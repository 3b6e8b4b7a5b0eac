/**
 * useListCursor Hook
 *
 * Cursor and scroll state for a list view whose length can change
 * under it (targets filtered out, sessions ending).
 */

import { useState, useCallback } from "react";
import { clampIndex, moveSelection, scrollToReveal } from "../utils/list-navigation.js";
import type { ListPosition } from "../utils/list-navigation.js";

export interface UseListCursorReturn {
  selectedIndex: number;
  scrollOffset: number;
  move: (delta: number) => void;
  reset: () => void;
}

export function useListCursor(length: number, visibleRows: number): UseListCursorReturn {
  const [position, setPosition] = useState<ListPosition>({ selectedIndex: 0, scrollOffset: 0 });

  const move = useCallback((delta: number) => {
    setPosition((prev) => moveSelection(prev, delta, length, visibleRows));
  }, [length, visibleRows]);

  const reset = useCallback(() => {
    setPosition({ selectedIndex: 0, scrollOffset: 0 });
  }, []);

  // The list may have shrunk since the last move
  const selectedIndex = clampIndex(position.selectedIndex, length);
  const scrollOffset = Math.min(
    scrollToReveal(selectedIndex, position.scrollOffset, visibleRows),
    Math.max(0, length - visibleRows),
  );

  return { selectedIndex, scrollOffset, move, reset };
}
