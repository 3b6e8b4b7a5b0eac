/**
 * App Component
 *
 * Root component for the dashboard. Instantiates hooks, dispatches
 * keyboard input per view and passes state down to Dashboard.
 */

import React, { useCallback, useState } from "react";
import { useInput, useApp, useStdin, Box } from "ink";
import type { Key } from "ink";
import type { Orchestrator } from "@hostwarden/engine";
import { useOrchestrator } from "../hooks/useOrchestrator.js";
import { useNotification } from "../hooks/useNotification.js";
import { useListCursor } from "../hooks/useListCursor.js";
import { Dashboard } from "./Dashboard.js";
import type { DashboardView } from "./Dashboard.js";
import { TARGET_LIST_ROWS } from "./TargetsView.js";
import { SESSION_LIST_ROWS } from "./SessionsView.js";
import { HISTORY_LIST_ROWS } from "./HistoryView.js";
import { quickSelectIndex } from "../utils/list-navigation.js";

export interface AppProps {
  orchestrator: Orchestrator;
  showOnlyOnline?: boolean;
}

export function App({ orchestrator, showOnlyOnline = false }: AppProps): React.ReactElement {
  const state = useOrchestrator(orchestrator);
  const { exit } = useApp();
  const { isRawModeSupported } = useStdin();
  const { notification, showNotification } = useNotification(orchestrator);

  // ---- State ----
  const [currentView, setCurrentView] = useState<DashboardView>("targets");
  const [onlyOnline, setOnlyOnline] = useState(showOnlyOnline);

  // Re-filtered on every render; the snapshot changes whenever a target does
  const visibleTargets = orchestrator.targets.filter({ onlyOnline });
  const targetCursor = useListCursor(visibleTargets.length, TARGET_LIST_ROWS);
  const sessionCursor = useListCursor(state.sessions.length, SESSION_LIST_ROWS);
  // History has no selection; the cursor only drives scrolling
  const historyCursor = useListCursor(state.history.length, HISTORY_LIST_ROWS);

  const selectedTarget = visibleTargets[targetCursor.selectedIndex];
  const selectedSession = state.sessions[sessionCursor.selectedIndex];

  // ---- Handler: targets view input ----
  const handleTargetsInput = useCallback((input: string, key: Key) => {
    if (key.upArrow || input === "k") {
      targetCursor.move(-1);
      return;
    }
    if (key.downArrow || input === "j") {
      targetCursor.move(1);
      return;
    }
    if (key.ctrl && input === "x") {
      state.killAllSessions();
      return;
    }
    if (input === "q" || key.escape) {
      exit();
      return;
    }
    if (input === "s") {
      sessionCursor.reset();
      setCurrentView("sessions");
      return;
    }
    if (input === "?") {
      setCurrentView("help");
      return;
    }
    if (input === "H") {
      historyCursor.reset();
      setCurrentView("history");
      return;
    }
    if (input === "A") {
      setCurrentView("analytics");
      return;
    }
    const quickIndex = quickSelectIndex(input);
    if (quickIndex !== null) {
      const quickTarget = visibleTargets[quickIndex];
      if (quickTarget) {
        showNotification(`Connecting to ${quickTarget.name}...`);
        state.connect(quickTarget.id);
      } else {
        showNotification(`No target at ${input}`);
      }
      return;
    }
    if (input === "r") {
      showNotification("Refreshing all targets...");
      state.refreshAll();
      return;
    }
    if (input === "f") {
      setOnlyOnline((prev) => !prev);
      targetCursor.reset();
      showNotification(onlyOnline ? "Showing all targets" : "Showing online targets only");
      return;
    }

    const isConnectKey = key.return || input === "c" || input === "n" || input === "d";
    if (!isConnectKey && input !== "p") return;

    if (!selectedTarget) {
      showNotification("No target selected");
      return;
    }

    if (input === "p") {
      showNotification(`Probing ${selectedTarget.name}...`);
      state.probe(selectedTarget.id);
    } else if (input === "n") {
      showNotification(`Opening ${selectedTarget.name} in a new window...`);
      state.connect(selectedTarget.id, "new-window");
    } else if (input === "d") {
      showNotification(`Connecting to ${selectedTarget.name}...`);
      state.connect(selectedTarget.id, "direct");
    } else {
      showNotification(`Connecting to ${selectedTarget.name}...`);
      state.connect(selectedTarget.id);
    }
  }, [targetCursor, sessionCursor, historyCursor, visibleTargets, selectedTarget, onlyOnline, state, exit, showNotification]);

  // ---- Handler: sessions view input ----
  const handleSessionsInput = useCallback((input: string, key: Key) => {
    if (key.escape) {
      setCurrentView("targets");
      return;
    }
    if (key.upArrow || input === "k") {
      sessionCursor.move(-1);
      return;
    }
    if (key.downArrow || input === "j") {
      sessionCursor.move(1);
      return;
    }
    if (input === "X" || (key.ctrl && input === "x")) {
      state.killAllSessions();
      return;
    }
    if (input === "x") {
      if (selectedSession) {
        state.killSession(selectedSession.pid);
      } else {
        showNotification("No session selected");
      }
      return;
    }
    if (input === "u") {
      state.reconcileSessions();
      return;
    }
    if (input === "q") {
      exit();
    }
  }, [sessionCursor, selectedSession, state, exit, showNotification]);

  // ---- Handler: history view input ----
  const handleHistoryInput = useCallback((input: string, key: Key) => {
    if (key.escape || input === "q" || input === "H") {
      setCurrentView("targets");
      return;
    }
    if (key.upArrow || input === "k") {
      historyCursor.move(-1);
      return;
    }
    if (key.downArrow || input === "j") {
      historyCursor.move(1);
    }
  }, [historyCursor]);

  // ---- Central keyboard dispatcher ----
  useInput(
    (input, key) => {
      if (key.ctrl && input === "c") {
        exit();
        return;
      }

      switch (currentView) {
        case "targets":
          handleTargetsInput(input, key);
          break;

        case "sessions":
          handleSessionsInput(input, key);
          break;

        case "history":
          handleHistoryInput(input, key);
          break;

        case "analytics":
          if (key.escape || input === "q" || input === "A") {
            setCurrentView("targets");
          }
          break;

        default:
          if (key.escape || key.return || input) {
            setCurrentView("targets");
          }
          break;
      }
    },
    { isActive: isRawModeSupported },
  );

  // ---- Render ----
  return (
    <Box flexDirection="column">
      <Dashboard
        currentView={currentView}
        notification={notification}
        mode={state.mode}
        monitorRunning={state.monitorRunning}
        // Targets view
        targets={visibleTargets}
        totalCount={state.targets.length}
        onlineCount={orchestrator.targets.countOnline()}
        onlyOnline={onlyOnline}
        targetsSelectedIndex={targetCursor.selectedIndex}
        targetsScrollOffset={targetCursor.scrollOffset}
        // Sessions view
        sessions={state.sessions}
        sessionsSelectedIndex={sessionCursor.selectedIndex}
        sessionsScrollOffset={sessionCursor.scrollOffset}
        // History and analytics views
        history={state.history}
        historyScrollOffset={historyCursor.scrollOffset}
        analytics={orchestrator.analytics()}
      />
    </Box>
  );
}

export default App;
