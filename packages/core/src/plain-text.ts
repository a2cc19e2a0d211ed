import type { InlineNode } from "./types.js";

/**
 * Flattens inlines to the text a reader would see once every suggested edit
 * is accepted: additions and the new side of a substitution are kept,
 * deletions and comments are dropped. Breaks become spaces and raw HTML is
 * left out.
 */
export function toPlainText(inlines: InlineNode[]): string {
  return inlines.map(nodePlainText).join("");
}

function nodePlainText(node: InlineNode): string {
  switch (node.type) {
    case "text":
    case "code":
    case "math":
      return node.value;
    case "softBreak":
    case "lineBreak":
      return " ";
    case "html":
      return "";
    case "criticDeletion":
    case "criticComment":
      return "";
    case "criticSubstitution":
      return toPlainText(node.newChildren);
    case "emphasis":
    case "strong":
    case "strikethrough":
    case "highlight":
    case "link":
    case "image":
    case "criticAddition":
    case "criticHighlight":
      return toPlainText(node.children);
  }
}
