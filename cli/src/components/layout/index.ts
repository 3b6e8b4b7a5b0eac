export { HorizontalLayout } from "./HorizontalLayout.js";
export type { HorizontalLayoutProps } from "./HorizontalLayout.js";
export { VerticalLayout } from "./VerticalLayout.js";
export type { VerticalLayoutProps } from "./VerticalLayout.js";
export {
  BORDER_COLOR,
  ACCENT_COLOR,
  SECONDARY_COLOR,
  MUTED_TEXT,
  SUCCESS_COLOR,
  WARNING_COLOR,
  ERROR_COLOR,
  MIN_CONTENT_WIDTH,
  CONTENT_PADDING,
  HORIZONTAL_LAYOUT_MIN_WIDTH,
  FIXED_CONTENT_HEIGHT,
} from "./theme.js";
