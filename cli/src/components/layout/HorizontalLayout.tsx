/**
 * Bordered layout for wide terminals: title crossing the top border,
 * fixed-height content rows, notification or controls in the bottom border.
 */

import React from "react";
import { Box, Text } from "ink";
import {
  BORDER_COLOR,
  ACCENT_COLOR,
  MUTED_TEXT,
  ERROR_COLOR,
  SUCCESS_COLOR,
  MIN_CONTENT_WIDTH,
  CONTENT_PADDING,
  FIXED_CONTENT_HEIGHT,
} from "./theme.js";
import { VERSION } from "../../version.js";

export interface HorizontalLayoutProps {
  content: React.ReactNode[];
  terminalWidth: number;
  title: string;
  showVersion: boolean;
  /** Text at the right end of the top border, e.g. "3/5 online" */
  status?: string;
  notification?: string | null;
  bottomControls: React.ReactNode;
  /** Character width of bottomControls text for border calculation. */
  bottomControlsWidth: number;
}

export function HorizontalLayout({
  content,
  terminalWidth,
  title,
  showVersion,
  status,
  notification,
  bottomControls,
  bottomControlsWidth,
}: HorizontalLayoutProps): React.ReactElement {
  const contentWidth = Math.max(MIN_CONTENT_WIDTH, terminalWidth - 2);
  const totalHeight = FIXED_CONTENT_HEIGHT;
  const visibleContent = content.slice(0, totalHeight);

  // Title that crosses the border
  const titlePart = `─ ${title}`;
  const versionPart = showVersion ? ` v${VERSION}` : "";
  const statusPart = status ? ` ${status} ` : "";
  const titleLength = titlePart.length + versionPart.length + statusPart.length;
  const remainingBorder = Math.max(0, terminalWidth - titleLength - 4);

  // Bottom content - either notification or controls
  let bottomTextWidth = bottomControlsWidth;
  let bottomNotificationText: string | null = null;
  let bottomIsError = false;

  if (notification) {
    const isError = notification.startsWith("!");
    const cleanMessage = isError ? notification.slice(1) : notification;
    const maxNotificationLength = terminalWidth - 6;
    const truncatedNotification =
      cleanMessage.length > maxNotificationLength
        ? cleanMessage.substring(0, maxNotificationLength - 3) + "..."
        : cleanMessage;
    bottomNotificationText = `${isError ? "✗" : "✓"} ${truncatedNotification}`;
    bottomTextWidth = bottomNotificationText.length;
    bottomIsError = isError;
  }

  const totalBottomDashes = Math.max(0, terminalWidth - bottomTextWidth - 2);
  const bottomLeftBorder = Math.max(1, Math.floor(totalBottomDashes / 2));
  const bottomRightBorder = Math.max(1, totalBottomDashes - bottomLeftBorder);

  return (
    <Box flexDirection="column" height={totalHeight + 2} flexShrink={0}>
      {/* Top border with title crossing */}
      <Box>
        <Text color={BORDER_COLOR}>╭</Text>
        <Text color={ACCENT_COLOR}>{titlePart}</Text>
        {showVersion && <Text color={MUTED_TEXT}>{versionPart}</Text>}
        <Text color={BORDER_COLOR}>
          {" "}
          {"─".repeat(remainingBorder)}
        </Text>
        {status && <Text color={MUTED_TEXT}>{statusPart}</Text>}
        <Text color={BORDER_COLOR}>─╮</Text>
      </Box>

      {/* Content rows */}
      {Array.from({ length: totalHeight }).map((_, rowIndex) => (
        <Box key={rowIndex} flexDirection="row" height={1}>
          <Text color={BORDER_COLOR}>│</Text>
          <Box
            width={contentWidth}
            paddingLeft={CONTENT_PADDING}
            paddingRight={CONTENT_PADDING}
            flexShrink={0}
          >
            {visibleContent[rowIndex] || <Text> </Text>}
          </Box>
          <Text color={BORDER_COLOR}>│</Text>
        </Box>
      ))}

      {/* Bottom border with notification or controls */}
      <Box>
        <Text color={BORDER_COLOR}>
          ╰{"─".repeat(bottomLeftBorder)}
        </Text>
        {bottomNotificationText ? (
          <Text color={bottomIsError ? ERROR_COLOR : SUCCESS_COLOR}>{bottomNotificationText}</Text>
        ) : (
          bottomControls
        )}
        <Text color={BORDER_COLOR}>
          {"─".repeat(bottomRightBorder)}╯
        </Text>
      </Box>
    </Box>
  );
}
