/**
 * Presentation data for the known callout types. Renderers look a type up
 * here; anything not in the catalogue renders with {@link NEUTRAL_CALLOUT}.
 */

export type CalloutColor = "blue" | "cyan" | "green" | "orange" | "red" | "purple" | "gray";

export interface CalloutStyle {
  color: CalloutColor;
  /** Hex color for HTML output. */
  cssColor: string;
  /** Icon name from the lucide set. */
  icon: string;
  emoji: string;
}

const CSS_COLORS: Record<CalloutColor, string> = {
  blue: "#3b82f6",
  cyan: "#06b6d4",
  green: "#22c55e",
  orange: "#f97316",
  red: "#ef4444",
  purple: "#a855f7",
  gray: "#6b7280",
};

function style(color: CalloutColor, icon: string, emoji: string): CalloutStyle {
  return { color, cssColor: CSS_COLORS[color], icon, emoji };
}

// Aliases share one style object.
const GROUPS: Array<[string[], CalloutStyle]> = [
  [["note"], style("blue", "pencil", "✏️")],
  [["abstract", "summary"], style("cyan", "clipboard-list", "\u{1F4CB}")],
  [["info"], style("blue", "info", "ℹ️")],
  [["todo"], style("blue", "circle-check", "☑️")],
  [["tip", "hint", "important"], style("cyan", "lightbulb", "\u{1F4A1}")],
  [["success", "check", "done"], style("green", "check", "✅")],
  [["question", "help", "faq"], style("orange", "circle-help", "❓")],
  [["warning", "caution", "attention"], style("orange", "triangle-alert", "⚠️")],
  [["failure", "fail", "missing"], style("red", "x", "❌")],
  [["danger", "error"], style("red", "octagon-x", "\u{1F6D1}")],
  [["bug"], style("red", "bug", "\u{1F41B}")],
  [["example"], style("purple", "list", "\u{1F4DD}")],
  [["quote", "cite"], style("gray", "quote", "\u{1F4AC}")],
];

const CATALOG = new Map<string, CalloutStyle>(
  GROUPS.flatMap(([names, shared]) => names.map((name): [string, CalloutStyle] => [name, shared])),
);

export const NEUTRAL_CALLOUT: CalloutStyle = style("gray", "info", "ℹ️");

/** Every known type, in catalogue order. */
export const CALLOUT_TYPES: readonly string[] = [...CATALOG.keys()];

/** Case-insensitive; surrounding whitespace is ignored. */
export function isKnownCalloutType(name: string): boolean {
  return CATALOG.has(name.trim().toLowerCase());
}

export function calloutStyle(name: string): CalloutStyle {
  return CATALOG.get(name.trim().toLowerCase()) ?? NEUTRAL_CALLOUT;
}
