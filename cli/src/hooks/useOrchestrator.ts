/**
 * useOrchestrator Hook
 *
 * Wraps the orchestrator and provides reactive state for the dashboard.
 * State is re-read on every "change" event; actions are queued and run
 * on the orchestrator's next tick.
 */

import { useState, useEffect, useCallback } from "react";
import type { ConnectionMode } from "@hostwarden/core";
import type { Orchestrator, OrchestratorSnapshot } from "@hostwarden/engine";

export interface UseOrchestratorReturn extends OrchestratorSnapshot {
  connect: (targetId: string, mode?: ConnectionMode) => void;
  probe: (targetId: string) => void;
  refreshAll: () => void;
  killSession: (pid: number) => void;
  killAllSessions: () => void;
  reconcileSessions: () => void;
}

export function useOrchestrator(orchestrator: Orchestrator): UseOrchestratorReturn {
  const [snapshot, setSnapshot] = useState<OrchestratorSnapshot>(() => orchestrator.snapshot());

  useEffect(() => {
    setSnapshot(orchestrator.snapshot());
    return orchestrator.on("change", () => {
      setSnapshot(orchestrator.snapshot());
    });
  }, [orchestrator]);

  const connect = useCallback((targetId: string, mode?: ConnectionMode) => {
    orchestrator.request({ type: "connect", targetId, mode });
  }, [orchestrator]);

  const probe = useCallback((targetId: string) => {
    orchestrator.request({ type: "probe", targetId });
  }, [orchestrator]);

  const refreshAll = useCallback(() => {
    orchestrator.request({ type: "refresh" });
  }, [orchestrator]);

  const killSession = useCallback((pid: number) => {
    orchestrator.request({ type: "kill", pid });
  }, [orchestrator]);

  const killAllSessions = useCallback(() => {
    orchestrator.request({ type: "kill-all" });
  }, [orchestrator]);

  const reconcileSessions = useCallback(() => {
    orchestrator.request({ type: "reconcile" });
  }, [orchestrator]);

  return {
    ...snapshot,
    connect,
    probe,
    refreshAll,
    killSession,
    killAllSessions,
    reconcileSessions,
  };
}
