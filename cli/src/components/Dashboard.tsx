/**
 * Dashboard Component
 *
 * Thin view router that tracks terminal dimensions and delegates
 * rendering to the appropriate view component based on currentView.
 */

import React, { useState, useEffect } from "react";
import { Box, useStdout } from "ink";
import type { ActiveSession, ConnectionHistoryEntry, ConnectionMode, Target } from "@hostwarden/core";
import type { GlobalAnalytics } from "@hostwarden/engine";
import { TargetsView } from "./TargetsView.js";
import { SessionsView } from "./SessionsView.js";
import { HistoryView } from "./HistoryView.js";
import { AnalyticsView } from "./AnalyticsView.js";
import { HelpView } from "./HelpView.js";

export type DashboardView = "targets" | "sessions" | "history" | "analytics" | "help";

interface DashboardProps {
  currentView: DashboardView;
  notification: string | null;
  mode: ConnectionMode;
  monitorRunning: boolean;
  // Targets view
  targets: Target[];
  totalCount: number;
  onlineCount: number;
  onlyOnline: boolean;
  targetsSelectedIndex: number;
  targetsScrollOffset: number;
  // Sessions view
  sessions: ActiveSession[];
  sessionsSelectedIndex: number;
  sessionsScrollOffset: number;
  // History view
  history: ConnectionHistoryEntry[];
  historyScrollOffset: number;
  // Analytics view
  analytics: GlobalAnalytics;
}

export function Dashboard(props: DashboardProps): React.ReactElement {
  const { stdout } = useStdout();
  const [terminalWidth, setTerminalWidth] = useState(stdout.columns || 80);
  const [terminalHeight, setTerminalHeight] = useState(stdout.rows || 24);

  useEffect(() => {
    const handleResize = () => {
      stdout.write("\x1Bc");
      if (stdout.columns) setTerminalWidth(stdout.columns);
      if (stdout.rows) setTerminalHeight(stdout.rows);
    };
    stdout.on("resize", handleResize);
    return () => {
      stdout.off("resize", handleResize);
    };
  }, [stdout]);

  const tw = terminalWidth;
  const th = terminalHeight;

  switch (props.currentView) {
    case "sessions":
      return (
        <Box width={tw} height={th} flexDirection="column">
          <SessionsView
            sessions={props.sessions}
            selectedIndex={props.sessionsSelectedIndex}
            scrollOffset={props.sessionsScrollOffset}
            notification={props.notification}
            terminalWidth={tw}
          />
        </Box>
      );

    case "history":
      return (
        <Box width={tw} height={th} flexDirection="column">
          <HistoryView
            entries={props.history}
            scrollOffset={props.historyScrollOffset}
            notification={props.notification}
            terminalWidth={tw}
          />
        </Box>
      );

    case "analytics":
      return (
        <Box width={tw} height={th} flexDirection="column">
          <AnalyticsView
            analytics={props.analytics}
            notification={props.notification}
            terminalWidth={tw}
          />
        </Box>
      );

    case "help":
      return (
        <Box width={tw} height={th} flexDirection="column">
          <HelpView terminalWidth={tw} notification={props.notification} />
        </Box>
      );

    case "targets":
    default:
      return (
        <Box width={tw} height={th} flexDirection="column">
          <TargetsView
            targets={props.targets}
            totalCount={props.totalCount}
            onlineCount={props.onlineCount}
            onlyOnline={props.onlyOnline}
            selectedIndex={props.targetsSelectedIndex}
            scrollOffset={props.targetsScrollOffset}
            mode={props.mode}
            monitorRunning={props.monitorRunning}
            sessionCount={props.sessions.length}
            notification={props.notification}
            terminalWidth={tw}
          />
        </Box>
      );
  }
}
