/**
 * Reserved private-use code points that stand in for extension delimiters
 * while the source goes through the GFM parser.
 */
export const SENTINELS = {
  imageDivider: "\uE000",
  highlightOpen: "\uE001",
  highlightClose: "\uE002",
  mathOpen: "\uE003",
  mathClose: "\uE004",
  additionOpen: "\uE010",
  additionClose: "\uE011",
  deletionOpen: "\uE012",
  deletionClose: "\uE013",
  substitutionOpen: "\uE014",
  substitutionSeparator: "\uE015",
  substitutionClose: "\uE016",
  commentOpen: "\uE017",
  commentClose: "\uE018",
  criticHighlightOpen: "\uE019",
  criticHighlightClose: "\uE01A",
} as const;

export type SentinelName = keyof typeof SENTINELS;

/** Source spelling of every sentinel. */
const LITERAL_BY_SENTINEL = new Map<string, string>([
  [SENTINELS.imageDivider, "|"],
  [SENTINELS.highlightOpen, "=="],
  [SENTINELS.highlightClose, "=="],
  [SENTINELS.mathOpen, "$"],
  [SENTINELS.mathClose, "$"],
  [SENTINELS.additionOpen, "{++"],
  [SENTINELS.additionClose, "++}"],
  [SENTINELS.deletionOpen, "{--"],
  [SENTINELS.deletionClose, "--}"],
  [SENTINELS.substitutionOpen, "{~~"],
  [SENTINELS.substitutionSeparator, "~>"],
  [SENTINELS.substitutionClose, "~~}"],
  [SENTINELS.commentOpen, "{>>"],
  [SENTINELS.commentClose, "<<}"],
  [SENTINELS.criticHighlightOpen, "{=="],
  [SENTINELS.criticHighlightClose, "==}"],
]);

const SENTINEL_REGEX = /[\uE000-\uE004\uE010-\uE01A]/;
const SENTINEL_REGEX_GLOBAL = /[\uE000-\uE004\uE010-\uE01A]/g;
const TRAILING_SENTINELS_REGEX = /[\uE000-\uE004\uE010-\uE01A]+$/;
const PRIVATE_USE_REGEX_GLOBAL = /[\uE000-\uF8FF]/g;
const MATH_SPAN_REGEX = /\uE003([^\uE003\uE004]*)\uE004/g;

// ASCII punctuation, the set CommonMark lets a backslash escape.
const ASCII_PUNCTUATION_REGEX = /[\x21-\x2f\x3a-\x40\x5b-\x60\x7b-\x7e]/g;
const ESCAPED_PUNCTUATION_REGEX = /\\([\x21-\x2f\x3a-\x40\x5b-\x60\x7b-\x7e])/g;

export function literalFor(sentinel: string): string {
  return LITERAL_BY_SENTINEL.get(sentinel) ?? sentinel;
}

export function isSentinel(char: string): boolean {
  return LITERAL_BY_SENTINEL.has(char);
}

export function containsSentinel(value: string): boolean {
  return SENTINEL_REGEX.test(value);
}

/** The run of sentinels `value` ends with, or `""`. */
export function trailingSentinels(value: string): string {
  return TRAILING_SENTINELS_REGEX.exec(value)?.[0] ?? "";
}

/** Removes every reserved sentinel code point, leaving other private-use characters alone. */
export function stripSentinels(value: string): string {
  return value.replace(SENTINEL_REGEX_GLOBAL, "");
}

/** Removes every character of the Basic Multilingual Plane private-use area (U+E000–U+F8FF). */
export function stripPrivateUseCharacters(value: string): string {
  return value.replace(PRIVATE_USE_REGEX_GLOBAL, "");
}

/**
 * Backslash-escapes the ASCII punctuation of a math expression so the parser
 * hands it back as one literal text run.
 */
export function escapeMathContent(expression: string): string {
  return expression.replace(ASCII_PUNCTUATION_REGEX, "\\$&");
}

export function unescapeMathContent(escaped: string): string {
  return escaped.replace(ESCAPED_PUNCTUATION_REGEX, "$1");
}

/**
 * Turns every sentinel back into the delimiter it replaced. Inverse of the
 * protector passes: `revealSentinels(prepareForParsing(s)) === s` for input
 * without stray sentinels.
 */
export function revealSentinels(value: string): string {
  if (!containsSentinel(value)) {
    return value;
  }
  return value
    .replace(MATH_SPAN_REGEX, (_match, content: string) => `$${unescapeMathContent(content)}$`)
    .replace(SENTINEL_REGEX_GLOBAL, (char) => literalFor(char));
}
