/**
 * useNotification Hook
 *
 * Manages notification messages displayed in the dashboard's bottom
 * border. Handles both local UI notifications (showNotification) and
 * notifications emitted by the orchestrator.
 *
 * A leading "!" marks a message for the error style; the layouts strip it.
 */

import { useState, useCallback, useEffect, useRef } from "react";
import type { Notification, Orchestrator } from "@hostwarden/engine";

const AUTO_DISMISS_MS = 5000;

export interface UseNotificationReturn {
  /** Current notification text ("!" prefixed for errors) */
  notification: string | null;
  /** Show a local ephemeral notification */
  showNotification: (message: string, duration?: number) => void;
}

export function isErrorMessage(message: string): boolean {
  return /^(failed|error|no |not |invalid|cannot|couldn't|unknown)/i.test(message);
}

export function toNotificationText(notification: Pick<Notification, "level" | "message">): string {
  const isError = notification.level === "error" || notification.level === "warning";
  return (isError ? "!" : "") + notification.message;
}

export function useNotification(orchestrator?: Orchestrator | null): UseNotificationReturn {
  const [notification, setNotification] = useState<string | null>(null);
  const dismissTimer = useRef<NodeJS.Timeout | null>(null);

  const display = useCallback((text: string, duration: number) => {
    if (dismissTimer.current) {
      clearTimeout(dismissTimer.current);
    }
    setNotification(text);
    dismissTimer.current = setTimeout(() => {
      dismissTimer.current = null;
      setNotification(null);
    }, duration);
  }, []);

  const showNotification = useCallback((message: string, duration = 3000) => {
    display((isErrorMessage(message) ? "!" : "") + message, duration);
  }, [display]);

  useEffect(() => {
    if (!orchestrator) return;

    const unsubscribe = orchestrator.on("notification", (notif) => {
      display(toNotificationText(notif), AUTO_DISMISS_MS);
    });

    return () => {
      unsubscribe();
      if (dismissTimer.current) {
        clearTimeout(dismissTimer.current);
        dismissTimer.current = null;
      }
    };
  }, [orchestrator, display]);

  return { notification, showNotification };
}
