/**
 * Locates source ranges the parser will turn into code: fenced code blocks
 * and inline code spans. Protector passes never place a delimiter inside
 * one of these ranges.
 *
 * The scan is line based and deliberately shallow: fences may sit behind
 * blockquote markers or a list bullet, inline spans end at a blank line.
 * Indented code blocks are not detected; sentinels that land in them are
 * revealed again after parsing.
 */

export interface Zone {
  start: number;
  /** Exclusive. */
  end: number;
}

const FENCE_OPEN_REGEX = /^(?:[ \t]*>)*[ \t]*(?:(?:[-+*]|\d{1,9}[.)])[ \t]+)?(`{3,}|~{3,})(.*)$/;
const FENCE_CLOSE_REGEX = /^(?:[ \t]*>)*[ \t]*(`{3,}|~{3,})[ \t\r]*$/;
const BLANK_LINE_REGEX = /\n[ \t]*\n/g;

export function findCodeZones(text: string): Zone[] {
  const fenced = findFencedZones(text);
  const inline = findInlineCodeZones(text, fenced);
  return [...fenced, ...inline].sort((a, b) => a.start - b.start);
}

export function overlapsZone(start: number, end: number, zones: Zone[]): boolean {
  for (const zone of zones) {
    if (zone.start >= end) {
      break;
    }
    if (zone.end > start) {
      return true;
    }
  }
  return false;
}

function findFencedZones(text: string): Zone[] {
  const zones: Zone[] = [];
  let offset = 0;
  let open: { start: number; char: string; length: number } | null = null;

  for (const line of text.split("\n")) {
    const lineEnd = offset + line.length;

    if (open) {
      const close = FENCE_CLOSE_REGEX.exec(line);
      const fence = close?.[1];
      if (fence && fence[0] === open.char && fence.length >= open.length) {
        zones.push({ start: open.start, end: lineEnd });
        open = null;
      }
    } else {
      const match = FENCE_OPEN_REGEX.exec(line);
      const fence = match?.[1];
      const info = match?.[2] ?? "";
      // A backtick fence's info string cannot itself contain backticks.
      if (fence && !(fence[0] === "`" && info.includes("`"))) {
        open = { start: offset, char: fence[0] ?? "`", length: fence.length };
      }
    }

    offset = lineEnd + 1;
  }

  if (open) {
    zones.push({ start: open.start, end: text.length });
  }
  return zones;
}

function findInlineCodeZones(text: string, fenced: Zone[]): Zone[] {
  const zones: Zone[] = [];
  let index = 0;

  while (index < text.length) {
    const fence = fenced.find((zone) => index >= zone.start && index < zone.end);
    if (fence) {
      index = fence.end;
      continue;
    }

    if (text[index] !== "`" || isEscaped(text, index)) {
      index += 1;
      continue;
    }

    const runLength = backtickRunLength(text, index);
    const limit = inlineSearchLimit(text, index, fenced);
    const closeAt = findClosingRun(text, index + runLength, runLength, limit);

    if (closeAt === -1) {
      index += runLength;
      continue;
    }

    zones.push({ start: index, end: closeAt + runLength });
    index = closeAt + runLength;
  }

  return zones;
}

function isEscaped(text: string, index: number): boolean {
  let backslashes = 0;
  for (let i = index - 1; i >= 0 && text[i] === "\\"; i -= 1) {
    backslashes += 1;
  }
  return backslashes % 2 === 1;
}

function backtickRunLength(text: string, index: number): number {
  let end = index;
  while (text[end] === "`") {
    end += 1;
  }
  return end - index;
}

function inlineSearchLimit(text: string, from: number, fenced: Zone[]): number {
  BLANK_LINE_REGEX.lastIndex = from;
  const blank = BLANK_LINE_REGEX.exec(text);
  let limit = blank ? blank.index : text.length;
  for (const zone of fenced) {
    if (zone.start > from && zone.start < limit) {
      limit = zone.start;
    }
  }
  return limit;
}

function findClosingRun(text: string, from: number, runLength: number, limit: number): number {
  let index = from;
  while (index < limit) {
    if (text[index] !== "`") {
      index += 1;
      continue;
    }
    const length = backtickRunLength(text, index);
    if (length === runLength && index + length <= limit) {
      return index;
    }
    index += length;
  }
  return -1;
}
