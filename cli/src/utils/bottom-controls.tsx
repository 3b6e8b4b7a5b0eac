/**
 * Bottom Controls Builder
 *
 * Builds bottom border controls JSX and auto-computes the character width
 * from the same data, so the border can be padded without manual counting.
 */

import React from "react";
import { Text } from "ink";
import { ACCENT_COLOR, MUTED_TEXT } from "../components/layout/theme.js";

export interface ControlItem {
  /** Key shown in brackets, e.g. "q", "Esc", "Enter". ASCII only: some terminals draw arrows two cells wide. */
  key: string;
  /** Label text after the key, e.g. " quit " */
  label: string;
}

/** Character width of a control row: `[key]` plus label for each item. */
export function controlsWidth(items: ControlItem[]): number {
  return items.reduce((width, item) => width + item.key.length + 2 + item.label.length, 0);
}

/**
 * Build bottom controls JSX element and compute its exact character width.
 */
export function buildBottomControls(items: ControlItem[]): {
  element: React.ReactNode;
  width: number;
} {
  const elements: React.ReactNode[] = [];

  items.forEach((item, i) => {
    elements.push(
      <Text key={`k${i}`} color={ACCENT_COLOR}>{`[${item.key}]`}</Text>
    );
    if (item.label) {
      elements.push(
        <Text key={`l${i}`} color={MUTED_TEXT}>{item.label}</Text>
      );
    }
  });

  return { element: <>{elements}</>, width: controlsWidth(items) };
}

export const TARGET_CONTROLS: ControlItem[] = [
  { key: "Enter", label: " connect " },
  { key: "p", label: " probe " },
  { key: "s", label: " sessions " },
  { key: "?", label: " help " },
  { key: "q", label: "" },
];

export const SESSION_CONTROLS: ControlItem[] = [
  { key: "x", label: " kill " },
  { key: "X", label: " kill all " },
  { key: "u", label: " refresh " },
  { key: "Esc", label: "" },
];

export const HISTORY_CONTROLS: ControlItem[] = [
  { key: "j/k", label: " scroll " },
  { key: "Esc", label: " back" },
];

export const ANALYTICS_CONTROLS: ControlItem[] = [
  { key: "Esc", label: " back" },
];

export const HELP_CONTROLS: ControlItem[] = [
  { key: "Esc", label: " back" },
];
