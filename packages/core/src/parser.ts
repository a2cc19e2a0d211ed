/**
 * GFM parser using unified + remark-parse + remark-frontmatter + remark-gfm.
 *
 * Private-use characters pass through as ordinary text, which is what lets
 * the sentinel characters of the protector survive parsing.
 */
import { unified } from "unified";
import remarkParse from "remark-parse";
import remarkFrontmatter from "remark-frontmatter";
import remarkGfm from "remark-gfm";
import type { Root } from "mdast";
import { mdastToBlocks } from "./from-mdast.js";
import type { BlockNode } from "./types.js";

const processor = unified().use(remarkParse).use(remarkFrontmatter, ["yaml"]).use(remarkGfm);

/**
 * Parse a markdown string into an mdast AST tree.
 */
export function parseMarkdown(content: string): Root {
  return processor.parse(content);
}

/**
 * Parse an already shielded string into the block model, before any
 * extension syntax is restored.
 */
export function parseMarkdownBlocks(content: string): BlockNode[] {
  return mdastToBlocks(parseMarkdown(content));
}
