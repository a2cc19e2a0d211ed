import { toPlainText } from "./plain-text.js";
import { revealSentinels, SENTINELS } from "./sentinels.js";
import { restoreSpans, type SpanRule } from "./spans.js";
import { mapBlocks, mapInlineTree } from "./traverse.js";
import type { BlockNode, InlineNode } from "./types.js";

type WarningHandler = (message: string) => void;

// ─── Span rules ──────────────────────────────────────────────────

export const HIGHLIGHT_SPAN: SpanRule = {
  name: "highlight",
  open: SENTINELS.highlightOpen,
  close: SENTINELS.highlightClose,
  build: (children) => ({ type: "highlight", children }),
};

export const CRITIC_SPANS: SpanRule[] = [
  {
    name: "addition",
    open: SENTINELS.additionOpen,
    close: SENTINELS.additionClose,
    build: (children) => ({ type: "criticAddition", children }),
  },
  {
    name: "deletion",
    open: SENTINELS.deletionOpen,
    close: SENTINELS.deletionClose,
    build: (children) => ({ type: "criticDeletion", children }),
  },
  {
    name: "substitution",
    open: SENTINELS.substitutionOpen,
    close: SENTINELS.substitutionClose,
    separator: SENTINELS.substitutionSeparator,
    build: (children, head) =>
      head === undefined
        ? undefined
        : { type: "criticSubstitution", oldChildren: head, newChildren: children },
  },
  {
    name: "comment",
    open: SENTINELS.commentOpen,
    close: SENTINELS.commentClose,
    build: (children) => ({ type: "criticComment", children }),
  },
  {
    name: "critic highlight",
    open: SENTINELS.criticHighlightOpen,
    close: SENTINELS.criticHighlightClose,
    build: (children) => ({ type: "criticHighlight", children }),
  },
];

export const MATH_SPAN: SpanRule = {
  name: "math",
  open: SENTINELS.mathOpen,
  close: SENTINELS.mathClose,
  build: (children) => ({ type: "math", value: toPlainText(children) }),
};

// ─── Passes ──────────────────────────────────────────────────────

/** Puts `|` back into text, image alt text included. */
export function restoreImageDimensions(blocks: BlockNode[]): BlockNode[] {
  return mapBlocks(blocks, {
    inlines: (children) =>
      mapInlineTree(children, (node) =>
        node.type === "text" && node.value.includes(SENTINELS.imageDivider)
          ? { type: "text", value: node.value.replaceAll(SENTINELS.imageDivider, "|") }
          : node,
      ),
  });
}

export function restoreHighlights(blocks: BlockNode[], onWarning?: WarningHandler): BlockNode[] {
  return restoreSpanPass(blocks, [HIGHLIGHT_SPAN], onWarning);
}

export function restoreCriticMarkup(blocks: BlockNode[], onWarning?: WarningHandler): BlockNode[] {
  return restoreSpanPass(blocks, CRITIC_SPANS, onWarning);
}

export function restoreMath(blocks: BlockNode[], onWarning?: WarningHandler): BlockNode[] {
  return restoreSpanPass(blocks, [MATH_SPAN], onWarning);
}

function restoreSpanPass(
  blocks: BlockNode[],
  rules: SpanRule[],
  onWarning: WarningHandler | undefined,
): BlockNode[] {
  return mapBlocks(blocks, {
    inlines: (children) => restoreSpans(children, rules, onWarning),
  });
}

/**
 * Spells out every sentinel still held by a string field: code and HTML
 * leaves, code and HTML blocks, link destinations, image sources, math
 * values and callout titles. Runs last, after every span pass.
 */
export function revealLeafSentinels(blocks: BlockNode[]): BlockNode[] {
  return mapBlocks(blocks, {
    inlines: (children) => mapInlineTree(children, revealInline),
    block: revealBlock,
  });
}

function revealInline(node: InlineNode): InlineNode {
  switch (node.type) {
    case "text":
    case "code":
    case "html":
    case "math":
      return { ...node, value: revealSentinels(node.value) };
    case "link":
      return { ...node, destination: revealSentinels(node.destination) };
    case "image":
      return { ...node, source: revealSentinels(node.source) };
    default:
      return node;
  }
}

function revealBlock(block: BlockNode): BlockNode {
  switch (block.type) {
    case "codeBlock":
      return block.info === undefined
        ? { ...block, value: revealSentinels(block.value) }
        : { ...block, info: revealSentinels(block.info), value: revealSentinels(block.value) };
    case "htmlBlock":
      return { ...block, value: revealSentinels(block.value) };
    case "callout":
      return block.title === undefined ? block : { ...block, title: revealSentinels(block.title) };
    default:
      return block;
  }
}
