import type { BlockNode, InlineNode } from "./types.js";

/**
 * Hooks for {@link mapBlocks}. `inlines` receives every inline sequence of a
 * paragraph, heading or table cell; `block` receives each block after its
 * children were mapped.
 */
export interface BlockVisitor {
  inlines?(children: InlineNode[]): InlineNode[];
  block?(block: BlockNode): BlockNode;
}

// ─── Blocks ──────────────────────────────────────────────────────

/** Rebuilds the block tree bottom-up. The input is never mutated. */
export function mapBlocks(blocks: BlockNode[], visitor: BlockVisitor): BlockNode[] {
  return blocks.map((block) => mapBlock(block, visitor));
}

function mapBlock(block: BlockNode, visitor: BlockVisitor): BlockNode {
  const inlines = (children: InlineNode[]) =>
    visitor.inlines ? visitor.inlines(children) : children;

  let mapped: BlockNode;
  switch (block.type) {
    case "blockquote":
    case "callout":
      mapped = { ...block, children: mapBlocks(block.children, visitor) };
      break;
    case "bulletedList":
    case "numberedList":
      mapped = {
        ...block,
        items: block.items.map((item) => ({ children: mapBlocks(item.children, visitor) })),
      };
      break;
    case "taskList":
      mapped = {
        ...block,
        items: block.items.map((item) => ({
          checked: item.checked,
          children: mapBlocks(item.children, visitor),
        })),
      };
      break;
    case "paragraph":
    case "heading":
      mapped = { ...block, children: inlines(block.children) };
      break;
    case "table":
      mapped = {
        ...block,
        rows: block.rows.map((row) => ({
          cells: row.cells.map((cell) => ({ children: inlines(cell.children) })),
        })),
      };
      break;
    case "codeBlock":
    case "htmlBlock":
    case "thematicBreak":
      mapped = block;
      break;
  }

  return visitor.block ? visitor.block(mapped) : mapped;
}

/** Pre-order walk over every block, list items and callout bodies included. */
export function walkBlocks(blocks: BlockNode[], visit: (block: BlockNode) => void): void {
  for (const block of blocks) {
    visit(block);
    for (const children of childBlockLists(block)) {
      walkBlocks(children, visit);
    }
  }
}

function childBlockLists(block: BlockNode): BlockNode[][] {
  switch (block.type) {
    case "blockquote":
    case "callout":
      return [block.children];
    case "bulletedList":
    case "numberedList":
    case "taskList":
      return block.items.map((item) => item.children);
    default:
      return [];
  }
}

/** Every inline sequence that sits directly in a block. */
export function blockInlineSequences(block: BlockNode): InlineNode[][] {
  switch (block.type) {
    case "paragraph":
    case "heading":
      return [block.children];
    case "table":
      return block.rows.flatMap((row) => row.cells.map((cell) => cell.children));
    default:
      return [];
  }
}

// ─── Inlines ─────────────────────────────────────────────────────

/**
 * Applies `fn` to every child array of an inline container (both halves of a
 * substitution). Leaves are returned as they are.
 */
export function mapInlineChildren(
  node: InlineNode,
  fn: (children: InlineNode[]) => InlineNode[],
): InlineNode {
  switch (node.type) {
    case "criticSubstitution":
      return { ...node, oldChildren: fn(node.oldChildren), newChildren: fn(node.newChildren) };
    case "emphasis":
    case "strong":
    case "strikethrough":
    case "highlight":
    case "link":
    case "image":
    case "criticAddition":
    case "criticDeletion":
    case "criticComment":
    case "criticHighlight":
      return { ...node, children: fn(node.children) };
    default:
      return node;
  }
}

export function inlineChildLists(node: InlineNode): InlineNode[][] {
  switch (node.type) {
    case "criticSubstitution":
      return [node.oldChildren, node.newChildren];
    case "emphasis":
    case "strong":
    case "strikethrough":
    case "highlight":
    case "link":
    case "image":
    case "criticAddition":
    case "criticDeletion":
    case "criticComment":
    case "criticHighlight":
      return [node.children];
    default:
      return [];
  }
}

/** Post-order map: children are rebuilt first, then `fn` sees the rebuilt node. */
export function mapInlineTree(
  inlines: InlineNode[],
  fn: (node: InlineNode) => InlineNode,
): InlineNode[] {
  return inlines.map((node) =>
    fn(mapInlineChildren(node, (children) => mapInlineTree(children, fn))),
  );
}

/** Post-order walk over every inline of a sequence. */
export function walkInlines(inlines: InlineNode[], visit: (node: InlineNode) => void): void {
  for (const node of inlines) {
    for (const children of inlineChildLists(node)) {
      walkInlines(children, visit);
    }
    visit(node);
  }
}

/**
 * Collects a value from every inline in the document, post-order. `fn`
 * returning `undefined` contributes nothing.
 */
export function collectInlines<T>(
  blocks: BlockNode[],
  fn: (node: InlineNode) => T | undefined,
): T[] {
  const collected: T[] = [];
  walkBlocks(blocks, (block) => {
    for (const sequence of blockInlineSequences(block)) {
      walkInlines(sequence, (node) => {
        const value = fn(node);
        if (value !== undefined) {
          collected.push(value);
        }
      });
    }
  });
  return collected;
}
