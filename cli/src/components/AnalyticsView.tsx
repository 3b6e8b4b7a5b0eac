/**
 * AnalyticsView Component
 *
 * Totals across every target plus the most used ones.
 */

import React from "react";
import { Text } from "ink";
import type { GlobalAnalytics } from "@hostwarden/engine";
import {
  HorizontalLayout,
  VerticalLayout,
  ACCENT_COLOR,
  MUTED_TEXT,
  HORIZONTAL_LAYOUT_MIN_WIDTH,
} from "./layout/index.js";
import { buildBottomControls, ANALYTICS_CONTROLS } from "../utils/bottom-controls.js";
import { buildAnalyticsRows } from "../utils/history-display.js";

interface AnalyticsViewProps {
  analytics: GlobalAnalytics;
  notification: string | null;
  terminalWidth: number;
}

export function AnalyticsView({ analytics, notification, terminalWidth }: AnalyticsViewProps): React.ReactElement {
  const showVersion = terminalWidth >= 65;

  const contentLines: React.ReactNode[] = [
    <Text key="header" bold color={ACCENT_COLOR}>Analytics</Text>,
    <Text key="sep" color={MUTED_TEXT}>{"─".repeat(30)}</Text>,
    ...buildAnalyticsRows(analytics).map(([label, value]) => (
      <Text key={label}>
        <Text color={MUTED_TEXT}>{label.padEnd(13)}</Text>
        <Text>{value}</Text>
      </Text>
    )),
  ];

  if (analytics.mostUsed.length > 0) {
    contentLines.push(<Text key="top" bold color={ACCENT_COLOR}>Most used</Text>);
    analytics.mostUsed.forEach((usage, i) => {
      contentLines.push(
        <Text key={`u-${usage.targetId}`} wrap="truncate-end">
          <Text color={MUTED_TEXT}>{`${i + 1}. `}</Text>
          <Text>{usage.name}</Text>
          <Text color={MUTED_TEXT}>  {usage.connections}×</Text>
        </Text>
      );
    });
  }

  const { element: bottomControls, width: controlsWidth } = buildBottomControls(ANALYTICS_CONTROLS);

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
