/**
 * TargetsView Component
 *
 * Target list with health dots, latency and uptime, plus a detail block
 * for the selected target.
 */

import React from "react";
import { Text } from "ink";
import type { ConnectionMode, Target } from "@hostwarden/core";
import { describeAuth } from "@hostwarden/engine";
import {
  HorizontalLayout,
  VerticalLayout,
  ACCENT_COLOR,
  ERROR_COLOR,
  MUTED_TEXT,
  HORIZONTAL_LAYOUT_MIN_WIDTH,
} from "./layout/index.js";
import { buildBottomControls, TARGET_CONTROLS } from "../utils/bottom-controls.js";
import { formatLatency, formatRelativeTime, formatUptime, truncate } from "../utils/format.js";
import { HEALTH_INDICATORS, SECURITY_INDICATORS, formatEndpoint } from "../utils/target-display.js";

/** Rows of the target list; the rest of the frame holds header and details. */
export const TARGET_LIST_ROWS = 8;

interface TargetsViewProps {
  targets: Target[];
  totalCount: number;
  onlineCount: number;
  onlyOnline: boolean;
  selectedIndex: number;
  scrollOffset: number;
  mode: ConnectionMode;
  monitorRunning: boolean;
  sessionCount: number;
  notification: string | null;
  terminalWidth: number;
}

function buildDetailLines(target: Target): React.ReactElement[] {
  const security = SECURITY_INDICATORS[target.security];
  const lines: React.ReactElement[] = [
    <Text key="d-auth" wrap="truncate-end">
      <Text color={MUTED_TEXT}>Auth </Text>
      <Text>{describeAuth(target.auth)}</Text>
      <Text color={MUTED_TEXT}>  Security </Text>
      <Text color={security.color}>{security.label}</Text>
      {target.tags.length > 0 && <Text color={MUTED_TEXT}>  #{target.tags.join(" #")}</Text>}
    </Text>,
  ];

  if (target.lastError) {
    lines.push(
      <Text key="d-error" color={ERROR_COLOR} wrap="truncate-end">{target.lastError}</Text>
    );
  } else {
    lines.push(
      <Text key="d-checked" color={MUTED_TEXT} wrap="truncate-end">
        Checked {formatRelativeTime(target.stats.lastCheckedAt)}
        {" · "}last reachable {formatRelativeTime(target.stats.lastConnectedAt)}
        {target.description ? ` · ${target.description}` : ""}
      </Text>
    );
  }
  return lines;
}

export function TargetsView({
  targets,
  totalCount,
  onlineCount,
  onlyOnline,
  selectedIndex,
  scrollOffset,
  mode,
  monitorRunning,
  sessionCount,
  notification,
  terminalWidth,
}: TargetsViewProps): React.ReactElement {
  const useHorizontalLayout = terminalWidth >= HORIZONTAL_LAYOUT_MIN_WIDTH;
  const showVersion = terminalWidth >= 65;
  const nameWidth = Math.min(18, Math.max(4, ...targets.map((t) => t.name.length)));

  const contentLines: React.ReactNode[] = [];

  contentLines.push(
    <Text key="header">
      <Text bold color={ACCENT_COLOR}>Targets</Text>
      <Text color={MUTED_TEXT}> ({onlineCount}/{totalCount} online)</Text>
      {onlyOnline && <Text color={ACCENT_COLOR}> [online only]</Text>}
      {scrollOffset > 0 && <Text color={MUTED_TEXT}> ▲</Text>}
    </Text>
  );
  contentLines.push(<Text key="sep" color={MUTED_TEXT}>{"─".repeat(30)}</Text>);

  if (targets.length === 0) {
    contentLines.push(
      <Text key="empty" color={MUTED_TEXT}>
        {totalCount === 0
          ? "No targets configured. Add one with: hostwarden add <name> <host>"
          : "No targets online (press f to show all)"}
      </Text>
    );
  }

  targets.slice(scrollOffset, scrollOffset + TARGET_LIST_ROWS).forEach((target, i) => {
    const index = scrollOffset + i;
    const isSelected = index === selectedIndex;
    const health = HEALTH_INDICATORS[target.health];
    const checks = target.stats.successCount + target.stats.failureCount;

    contentLines.push(
      <Text key={`t-${target.id}`} wrap="truncate-end">
        <Text color={isSelected ? ACCENT_COLOR : "white"}>{isSelected ? "▸" : " "} </Text>
        <Text color={health.color}>{health.icon} </Text>
        <Text bold={isSelected} color={isSelected ? ACCENT_COLOR : "white"}>
          {truncate(target.name, nameWidth).padEnd(nameWidth)}
        </Text>
        <Text color={MUTED_TEXT}>  {formatLatency(target.stats.latencyMs).padStart(6)}</Text>
        <Text color={MUTED_TEXT}>  {formatUptime(target.stats.uptimePercentage, checks).padStart(4)}</Text>
        <Text color={MUTED_TEXT}>  {formatEndpoint(target)}</Text>
      </Text>
    );
  });

  if (scrollOffset + TARGET_LIST_ROWS < targets.length) {
    contentLines.push(<Text key="scroll-down" color={MUTED_TEXT}>▼ more</Text>);
  }

  const selected = targets[selectedIndex];
  if (selected) {
    contentLines.push(<Text key="detail-spacer"> </Text>);
    contentLines.push(...buildDetailLines(selected));
  }

  const status = `${mode} · monitor ${monitorRunning ? "on" : "off"} · ${sessionCount} session${sessionCount === 1 ? "" : "s"}`;
  const { element: bottomControls, width: controlsWidth } = buildBottomControls(TARGET_CONTROLS);

  return useHorizontalLayout ? (
    <HorizontalLayout
      content={contentLines}
      terminalWidth={terminalWidth}
      title="hostwarden"
      showVersion={showVersion}
      status={status}
      notification={notification}
      bottomControls={bottomControls}
      bottomControlsWidth={controlsWidth}
    />
  ) : (
    <VerticalLayout
      content={contentLines}
      title="hostwarden"
      showVersion={showVersion}
      status={status}
      notification={notification}
      bottomControls={bottomControls}
    />
  );
}
