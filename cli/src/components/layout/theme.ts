/**
 * Shared theme constants for the CLI TUI layout.
 *
 * Two-tone palette: teal (content) + slate (structure).
 */

// Primary palette
export const ACCENT_COLOR = "#2DD4BF";      // Teal — titles, selected items
export const BORDER_COLOR = "#64748B";      // Slate — box borders, structural chrome
export const SECONDARY_COLOR = "#94A3B8";   // Key labels, secondary interactive elements
export const MUTED_TEXT = "#8B9296";         // Cool grey — hints, inactive, dimmed

// Semantic status
export const SUCCESS_COLOR = "#34D399";
export const WARNING_COLOR = "#FBBF24";
export const ERROR_COLOR = "#EF4444";

// Utility
export const MIN_CONTENT_WIDTH = 42;
export const CONTENT_PADDING = 2;
export const HORIZONTAL_LAYOUT_MIN_WIDTH = 62;
export const FIXED_CONTENT_HEIGHT = 14;
