/**
 * HelpView Component
 */

import React from "react";
import { Text } from "ink";
import {
  HorizontalLayout,
  VerticalLayout,
  ACCENT_COLOR,
  MUTED_TEXT,
  HORIZONTAL_LAYOUT_MIN_WIDTH,
} from "./layout/index.js";
import { buildBottomControls, HELP_CONTROLS } from "../utils/bottom-controls.js";

export const KEY_BINDINGS: Array<[keys: string, action: string]> = [
  ["↑/↓ j/k", "move"],
  ["Enter c", "connect (configured mode)"],
  ["1-9", "connect to the Nth row"],
  ["n", "connect in a new window"],
  ["d", "connect in this terminal"],
  ["p / r", "probe selected / refresh all"],
  ["f", "toggle online only"],
  ["s", "sessions (x kill, X kill all, u refresh)"],
  ["H", "connection history"],
  ["A", "analytics"],
  ["Ctrl+X", "kill all sessions"],
  ["q Esc", "quit"],
];

interface HelpViewProps {
  terminalWidth: number;
  notification: string | null;
}

export function HelpView({ terminalWidth, notification }: HelpViewProps): React.ReactElement {
  const showVersion = terminalWidth >= 65;
  const contentLines: React.ReactNode[] = [
    <Text key="header" bold color={ACCENT_COLOR}>Keys</Text>,
    <Text key="sep" color={MUTED_TEXT}>{"─".repeat(30)}</Text>,
    ...KEY_BINDINGS.map(([keys, action]) => (
      <Text key={keys}>
        <Text color={ACCENT_COLOR}>{keys.padEnd(10)}</Text>
        <Text color={MUTED_TEXT}>{action}</Text>
      </Text>
    )),
  ];

  const { element: bottomControls, width: controlsWidth } = buildBottomControls(HELP_CONTROLS);

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
