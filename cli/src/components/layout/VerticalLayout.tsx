/**
 * Vertical layout (no border) for narrow terminals.
 */

import React from "react";
import { Box, Text } from "ink";
import { ACCENT_COLOR, MUTED_TEXT, SUCCESS_COLOR, ERROR_COLOR } from "./theme.js";
import { VERSION } from "../../version.js";

export interface VerticalLayoutProps {
  content: React.ReactNode[];
  title: string;
  showVersion: boolean;
  status?: string;
  notification?: string | null;
  bottomControls: React.ReactNode;
}

export function VerticalLayout({
  content,
  title,
  showVersion,
  status,
  notification,
  bottomControls,
}: VerticalLayoutProps): React.ReactElement {
  return (
    <Box flexDirection="column">
      <Text>
        <Text bold color={ACCENT_COLOR}>{title}</Text>
        {showVersion && <Text color={MUTED_TEXT}> v{VERSION}</Text>}
        {status && <Text color={MUTED_TEXT}>  {status}</Text>}
      </Text>

      {/* Content */}
      <Box flexDirection="column" marginTop={1}>
        {content.map((line, index) => (
          <Box key={index}>{line}</Box>
        ))}
      </Box>

      {/* Bottom - notification or controls */}
      <Box marginTop={1}>
        {notification ? (
          (() => {
            const isError = notification.startsWith("!");
            const cleanMessage = isError ? notification.slice(1) : notification;
            return (
              <Text color={isError ? ERROR_COLOR : SUCCESS_COLOR}>
                {isError ? "✗" : "✓"} {cleanMessage}
              </Text>
            );
          })()
        ) : (
          bottomControls
        )}
      </Box>
    </Box>
  );
}
