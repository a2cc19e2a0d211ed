import { isKnownCalloutType } from "./callout-catalog.js";
import type { BlockNode, InlineNode } from "./types.js";

export interface CalloutOptions {
  /** Also accept `> **Note**` style callouts. Defaults to true. */
  labels?: boolean;
}

const MARKER_REGEX = /^\[!([a-zA-Z0-9_-]+)\](?:\s+(.+))?/;

/**
 * Rewrites blockquotes that open with a callout marker (`> [!type] Title`)
 * or a bold catalogue label (`> **Warning**`) into callout blocks. Lists,
 * blockquotes and callouts are searched recursively; table cells hold no
 * blocks and are left alone.
 */
export function applyCallouts(blocks: BlockNode[], options: CalloutOptions = {}): BlockNode[] {
  return blocks.map((block) => rewriteBlock(block, options));
}

function rewriteBlock(block: BlockNode, options: CalloutOptions): BlockNode {
  switch (block.type) {
    case "blockquote":
      return (
        parseCallout(block.children, options) ?? {
          type: "blockquote",
          children: applyCallouts(block.children, options),
        }
      );
    case "callout":
      return { ...block, children: applyCallouts(block.children, options) };
    case "bulletedList":
    case "numberedList":
      return {
        ...block,
        items: block.items.map((item) => ({ children: applyCallouts(item.children, options) })),
      };
    case "taskList":
      return {
        ...block,
        items: block.items.map((item) => ({
          checked: item.checked,
          children: applyCallouts(item.children, options),
        })),
      };
    default:
      return block;
  }
}

// ─── Detection ───────────────────────────────────────────────────

function parseCallout(children: BlockNode[], options: CalloutOptions): BlockNode | undefined {
  const [first, ...rest] = children;
  if (first?.type !== "paragraph") {
    return undefined;
  }
  const inlines = first.children;
  const lead = inlines[0];
  if (!lead) {
    return undefined;
  }

  if (lead.type === "text") {
    const marker = parseMarkerCallout(lead.value, inlines, rest, options);
    if (marker) {
      return marker;
    }
  }

  if (options.labels ?? true) {
    return parseLabelCallout(lead, inlines, rest, options);
  }
  return undefined;
}

/** `[!type]` or `[!type] Title` at the very start of the first text run. */
function parseMarkerCallout(
  text: string,
  inlines: InlineNode[],
  rest: BlockNode[],
  options: CalloutOptions,
): BlockNode | undefined {
  const match = MARKER_REGEX.exec(text);
  const identifier = match?.[1];
  if (!match || !identifier) {
    return undefined;
  }

  const title = match[2]?.trim();
  const remainder = text.slice(match[0].length).trim();

  let body: InlineNode[];
  if (remainder) {
    body = [{ type: "text", value: remainder }, ...inlines.slice(1)];
  } else {
    body = dropLeadingBlanks(inlines.slice(1), false);
  }

  return {
    type: "callout",
    calloutType: identifier.toLowerCase(),
    ...(title ? { title } : {}),
    children: applyCallouts(withFirstParagraph(body, rest), options),
  };
}

/** A first inline `strong` holding only a catalogue name. */
function parseLabelCallout(
  lead: InlineNode,
  inlines: InlineNode[],
  rest: BlockNode[],
  options: CalloutOptions,
): BlockNode | undefined {
  if (lead.type !== "strong" || lead.children.length !== 1) {
    return undefined;
  }
  const label = lead.children[0];
  if (label?.type !== "text" || !isKnownCalloutType(label.value)) {
    return undefined;
  }

  const body = dropLeadingBlanks(inlines.slice(1), true);
  return {
    type: "callout",
    calloutType: label.value.trim().toLowerCase(),
    children: applyCallouts(withFirstParagraph(body, rest), options),
  };
}

/**
 * Drops leading soft breaks and whitespace-only text. With `trimText`, the
 * first surviving text run also loses its leading whitespace.
 */
function dropLeadingBlanks(inlines: InlineNode[], trimText: boolean): InlineNode[] {
  let index = 0;
  while (index < inlines.length) {
    const node = inlines[index];
    if (node?.type === "softBreak") {
      index += 1;
    } else if (node?.type === "text" && !node.value.trim()) {
      index += 1;
    } else {
      break;
    }
  }

  const remaining = inlines.slice(index);
  const head = remaining[0];
  if (trimText && head?.type === "text") {
    return [{ type: "text", value: head.value.trimStart() }, ...remaining.slice(1)];
  }
  return remaining;
}

function withFirstParagraph(inlines: InlineNode[], rest: BlockNode[]): BlockNode[] {
  return inlines.length > 0 ? [{ type: "paragraph", children: inlines }, ...rest] : rest;
}
