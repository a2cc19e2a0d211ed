import { findCodeZones, overlapsZone, type Zone } from "./code-zones.js";
import { escapeMathContent, SENTINELS } from "./sentinels.js";
import type { ProtectResult } from "./types.js";

/**
 * One shielding pass: a global, index-reporting (`d`) pattern and the text
 * an accepted match is replaced with. Text outside the capture groups is the
 * delimiter; a match whose delimiter touches a code zone is rejected.
 */
interface ShieldRule {
  pattern: RegExp;
  shield(match: RegExpExecArray): string;
}

// ─── Rules ───────────────────────────────────────────────────────

const HIGHLIGHT_RULE: ShieldRule = {
  pattern: /==([^=\n]+?)==(?!=)/dg,
  shield: (match) => `${SENTINELS.highlightOpen}${match[1] ?? ""}${SENTINELS.highlightClose}`,
};

const IMAGE_DIMENSIONS_RULE: ShieldRule = {
  pattern: /!\[([^\]]*\|[^\]]*)\]\(([^)]+)\)/dg,
  shield: (match) => {
    const alt = (match[1] ?? "").replaceAll("|", SENTINELS.imageDivider);
    return `![${alt}](${match[2] ?? ""})`;
  },
};

const MATH_RULE: ShieldRule = {
  pattern: /(?<![$\\])\$([^$\n]+?)(?<!\\)\$(?!\$)/dg,
  shield: (match) =>
    `${SENTINELS.mathOpen}${escapeMathContent(match[1] ?? "")}${SENTINELS.mathClose}`,
};

// Applied in this order.
const CRITIC_RULES: ShieldRule[] = [
  {
    pattern: /\{~~([\s\S]+?)~>([\s\S]+?)~~\}/dg,
    shield: (match) =>
      `${SENTINELS.substitutionOpen}${match[1] ?? ""}${SENTINELS.substitutionSeparator}${match[2] ?? ""}${SENTINELS.substitutionClose}`,
  },
  {
    pattern: /\{\+\+([\s\S]+?)\+\+\}/dg,
    shield: (match) => `${SENTINELS.additionOpen}${match[1] ?? ""}${SENTINELS.additionClose}`,
  },
  {
    pattern: /\{--([\s\S]+?)--\}/dg,
    shield: (match) => `${SENTINELS.deletionOpen}${match[1] ?? ""}${SENTINELS.deletionClose}`,
  },
  {
    pattern: /\{>>([\s\S]+?)<<\}/dg,
    shield: (match) => `${SENTINELS.commentOpen}${match[1] ?? ""}${SENTINELS.commentClose}`,
  },
  {
    pattern: /\{==([\s\S]+?)==\}/dg,
    shield: (match) =>
      `${SENTINELS.criticHighlightOpen}${match[1] ?? ""}${SENTINELS.criticHighlightClose}`,
  },
];

// ─── Public API ──────────────────────────────────────────────────

/** `==text==` → open/close sentinels around the untouched content. */
export function protectHighlights(text: string): ProtectResult {
  return applyRule(text, HIGHLIGHT_RULE);
}

/**
 * Shields the five CriticMarkup kinds in the order substitution, addition,
 * deletion, comment, highlight. Content may span lines.
 */
export function protectCriticMarkup(text: string): ProtectResult {
  let current = text;
  let matched = false;
  for (const rule of CRITIC_RULES) {
    const result = applyRule(current, rule);
    current = result.text;
    matched ||= result.matched;
  }
  return { text: current, matched };
}

/** Hides the `|` of `![alt|WxH](url)` from the table parser. */
export function protectImageDimensions(text: string): ProtectResult {
  return applyRule(text, IMAGE_DIMENSIONS_RULE);
}

/** `$expr$` (never `$$expr$$`; an escaped `\$` neither opens nor closes). */
export function protectInlineMath(text: string): ProtectResult {
  return applyRule(text, MATH_RULE);
}

// ─── Matching ────────────────────────────────────────────────────

function applyRule(text: string, rule: ShieldRule): ProtectResult {
  const zones = findCodeZones(text);
  const pattern = new RegExp(rule.pattern.source, rule.pattern.flags);

  // Every span is located against the unmodified input, then the output is
  // assembled in one forward sweep.
  let output = "";
  let cursor = 0;
  let matched = false;
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(text)) !== null) {
    if (delimiterTouchesZone(match, zones)) {
      pattern.lastIndex = match.index + 1;
      continue;
    }
    output += text.slice(cursor, match.index) + rule.shield(match);
    cursor = match.index + match[0].length;
    matched = true;
  }

  if (!matched) {
    return { text, matched: false };
  }
  return { text: output + text.slice(cursor), matched: true };
}

function delimiterTouchesZone(match: RegExpExecArray, zones: Zone[]): boolean {
  if (zones.length === 0) {
    return false;
  }
  return delimiterRanges(match).some(([start, end]) => overlapsZone(start, end, zones));
}

function delimiterRanges(match: RegExpExecArray): Array<[number, number]> {
  const start = match.index;
  const end = start + match[0].length;
  const groups = (match.indices ?? [])
    .slice(1)
    .filter((range): range is [number, number] => range !== undefined)
    .sort((a, b) => a[0] - b[0]);

  const ranges: Array<[number, number]> = [];
  let cursor = start;
  for (const [groupStart, groupEnd] of groups) {
    if (groupStart > cursor) {
      ranges.push([cursor, groupStart]);
    }
    cursor = Math.max(cursor, groupEnd);
  }
  if (end > cursor) {
    ranges.push([cursor, end]);
  }
  return ranges;
}
