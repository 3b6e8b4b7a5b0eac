/**
 * SessionsView Component
 *
 * SSH sessions running in their own terminal windows, newest first.
 */

import React from "react";
import { Text } from "ink";
import type { ActiveSession } from "@hostwarden/core";
import {
  HorizontalLayout,
  VerticalLayout,
  ACCENT_COLOR,
  MUTED_TEXT,
  HORIZONTAL_LAYOUT_MIN_WIDTH,
  FIXED_CONTENT_HEIGHT,
} from "./layout/index.js";
import { buildBottomControls, SESSION_CONTROLS } from "../utils/bottom-controls.js";
import { formatElapsedTime } from "../utils/format.js";

const HEADER_LINES = 2;
export const SESSION_LIST_ROWS = FIXED_CONTENT_HEIGHT - HEADER_LINES - 1;

interface SessionsViewProps {
  sessions: ActiveSession[];
  selectedIndex: number;
  scrollOffset: number;
  notification: string | null;
  terminalWidth: number;
  now?: number;
}

export function SessionsView({
  sessions,
  selectedIndex,
  scrollOffset,
  notification,
  terminalWidth,
  now = Date.now(),
}: SessionsViewProps): React.ReactElement {
  const useHorizontalLayout = terminalWidth >= HORIZONTAL_LAYOUT_MIN_WIDTH;
  const showVersion = terminalWidth >= 65;

  const contentLines: React.ReactNode[] = [];

  contentLines.push(
    <Text key="header">
      <Text bold color={ACCENT_COLOR}>
        Sessions{sessions.length > 0 ? ` (${sessions.length})` : ""}
      </Text>
      {scrollOffset > 0 && <Text color={MUTED_TEXT}> ▲</Text>}
    </Text>
  );
  contentLines.push(<Text key="sep" color={MUTED_TEXT}>{"─".repeat(30)}</Text>);

  if (sessions.length === 0) {
    contentLines.push(
      <Text key="empty" color={MUTED_TEXT}>No sessions in separate windows</Text>
    );
  }

  sessions.slice(scrollOffset, scrollOffset + SESSION_LIST_ROWS).forEach((session, i) => {
    const isSelected = scrollOffset + i === selectedIndex;
    const elapsed = formatElapsedTime(Math.max(0, Math.floor((now - session.startedAt) / 1000)));

    contentLines.push(
      <Text key={`s-${session.pid}`} wrap="truncate-end">
        <Text color={isSelected ? ACCENT_COLOR : "white"}>{isSelected ? "▸" : " "} </Text>
        <Text bold={isSelected} color={isSelected ? ACCENT_COLOR : "white"}>{session.label}</Text>
        <Text color={MUTED_TEXT}>  PID {session.pid}  {elapsed}</Text>
      </Text>
    );
  });

  if (scrollOffset + SESSION_LIST_ROWS < sessions.length) {
    contentLines.push(<Text key="scroll-down" color={MUTED_TEXT}>▼ more</Text>);
  }

  const { element: bottomControls, width: controlsWidth } = buildBottomControls(SESSION_CONTROLS);

  return useHorizontalLayout ? (
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
