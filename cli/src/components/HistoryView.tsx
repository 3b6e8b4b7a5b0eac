/**
 * HistoryView Component
 *
 * Finished connection attempts, newest first.
 */

import React from "react";
import { Text } from "ink";
import type { ConnectionHistoryEntry } from "@hostwarden/core";
import {
  HorizontalLayout,
  VerticalLayout,
  ACCENT_COLOR,
  MUTED_TEXT,
  HORIZONTAL_LAYOUT_MIN_WIDTH,
  FIXED_CONTENT_HEIGHT,
} from "./layout/index.js";
import { buildBottomControls, HISTORY_CONTROLS } from "../utils/bottom-controls.js";
import { formatHistoryEntry, OUTCOME_INDICATORS } from "../utils/history-display.js";

const HEADER_LINES = 2;
export const HISTORY_LIST_ROWS = FIXED_CONTENT_HEIGHT - HEADER_LINES - 1;

interface HistoryViewProps {
  entries: ConnectionHistoryEntry[];
  scrollOffset: number;
  notification: string | null;
  terminalWidth: number;
  now?: number;
}

export function HistoryView({
  entries,
  scrollOffset,
  notification,
  terminalWidth,
  now = Date.now(),
}: HistoryViewProps): React.ReactElement {
  const showVersion = terminalWidth >= 65;
  const nameWidth = Math.min(16, Math.max(4, ...entries.map((e) => e.targetName.length)));

  const contentLines: React.ReactNode[] = [
    <Text key="header">
      <Text bold color={ACCENT_COLOR}>
        Connection History{entries.length > 0 ? ` (${entries.length})` : ""}
      </Text>
      {scrollOffset > 0 && <Text color={MUTED_TEXT}> ▲</Text>}
    </Text>,
    <Text key="sep" color={MUTED_TEXT}>{"─".repeat(30)}</Text>,
  ];

  if (entries.length === 0) {
    contentLines.push(
      <Text key="empty" color={MUTED_TEXT}>No connection history yet. Connect to a target to see it here.</Text>
    );
  }

  entries.slice(scrollOffset, scrollOffset + HISTORY_LIST_ROWS).forEach((entry, i) => {
    const outcome = OUTCOME_INDICATORS[entry.outcome];
    contentLines.push(
      <Text key={`h-${scrollOffset + i}`} wrap="truncate-end">
        <Text color={outcome.color}>{outcome.icon} </Text>
        <Text>{formatHistoryEntry(entry, nameWidth, now)}</Text>
      </Text>
    );
  });

  if (scrollOffset + HISTORY_LIST_ROWS < entries.length) {
    contentLines.push(<Text key="scroll-down" color={MUTED_TEXT}>▼ more</Text>);
  }

  const { element: bottomControls, width: controlsWidth } = buildBottomControls(HISTORY_CONTROLS);

  return terminalWidth >= HORIZONTAL_LAYOUT_MIN_WIDTH ? (
    <HorizontalLayout
      content={contentLines}
      terminalWidth={terminalWidth}
      title="hostwarden"
      showVersion={showVersion}
      notification={notification}
      bottomControls={bottomControls}
      bottomControlsWidth={controlsWidth}
    />
  ) : (
    <VerticalLayout
      content={contentLines}
      title="hostwarden"
      showVersion={showVersion}
      notification={notification}
      bottomControls={bottomControls}
    />
  );
}
