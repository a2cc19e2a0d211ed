import { imageData } from "./image-data.js";
import { containsSentinel } from "./sentinels.js";
import { blockInlineSequences, walkBlocks, walkInlines } from "./traverse.js";
import type { BlockNode, InlineNode } from "./types.js";

export interface TreeSummary {
  /** Callout count per callout type. */
  callouts: Record<string, number>;
  highlights: number;
  additions: number;
  deletions: number;
  substitutions: number;
  comments: number;
  criticHighlights: number;
  math: number;
  sizedImages: number;
}

export interface SentinelLeak {
  /** Node type holding the string, e.g. `text` or `codeBlock`. */
  nodeType: string;
  /** Field name, e.g. `value` or `destination`. */
  field: string;
  value: string;
}

// ─── Summary ─────────────────────────────────────────────────────

export function summarizeTree(blocks: BlockNode[]): TreeSummary {
  const summary: TreeSummary = {
    callouts: {},
    highlights: 0,
    additions: 0,
    deletions: 0,
    substitutions: 0,
    comments: 0,
    criticHighlights: 0,
    math: 0,
    sizedImages: 0,
  };

  walkBlocks(blocks, (block) => {
    if (block.type === "callout") {
      summary.callouts[block.calloutType] = (summary.callouts[block.calloutType] ?? 0) + 1;
    }
    for (const sequence of blockInlineSequences(block)) {
      walkInlines(sequence, (node) => countInline(summary, node));
    }
  });
  return summary;
}

function countInline(summary: TreeSummary, node: InlineNode): void {
  switch (node.type) {
    case "highlight":
      summary.highlights += 1;
      break;
    case "criticAddition":
      summary.additions += 1;
      break;
    case "criticDeletion":
      summary.deletions += 1;
      break;
    case "criticSubstitution":
      summary.substitutions += 1;
      break;
    case "criticComment":
      summary.comments += 1;
      break;
    case "criticHighlight":
      summary.criticHighlights += 1;
      break;
    case "math":
      summary.math += 1;
      break;
    case "image":
      if (imageData(node)?.width !== undefined) {
        summary.sizedImages += 1;
      }
      break;
    default:
      break;
  }
}

// ─── Leaks ───────────────────────────────────────────────────────

/** Every string field of the tree that still holds a sentinel. */
export function findSentinelLeaks(blocks: BlockNode[]): SentinelLeak[] {
  const leaks: SentinelLeak[] = [];
  const check = (nodeType: string, field: string, value: string | undefined) => {
    if (value !== undefined && containsSentinel(value)) {
      leaks.push({ nodeType, field, value });
    }
  };

  walkBlocks(blocks, (block) => {
    switch (block.type) {
      case "callout":
        check(block.type, "title", block.title);
        break;
      case "codeBlock":
        check(block.type, "info", block.info);
        check(block.type, "value", block.value);
        break;
      case "htmlBlock":
        check(block.type, "value", block.value);
        break;
      default:
        break;
    }

    for (const sequence of blockInlineSequences(block)) {
      walkInlines(sequence, (node) => {
        switch (node.type) {
          case "text":
          case "code":
          case "html":
          case "math":
            check(node.type, "value", node.value);
            break;
          case "link":
            check(node.type, "destination", node.destination);
            break;
          case "image":
            check(node.type, "source", node.source);
            break;
          default:
            break;
        }
      });
    }
  });
  return leaks;
}
