import { toPlainText } from "./plain-text.js";
import type { BlockNode } from "./types.js";

export type TextDirection = "ltr" | "rtl";

// Hebrew, Arabic, Syriac, Thaana, NKo, Samaritan, Mandaic and the Hebrew and
// Arabic presentation forms.
const STRONG_RTL_REGEX =
  /[\u0590-\u05FF\u0600-\u06FF\u0700-\u074F\u0750-\u077F\u0780-\u07BF\u07C0-\u07FF\u0800-\u083F\u0840-\u085F\u08A0-\u08FF\uFB1D-\uFB4F\uFB50-\uFDFF\uFE70-\uFEFF]/u;
const LETTER_REGEX = /\p{L}/u;

/** The first strong character decides; text without one is `ltr`. */
export function detectTextDirection(text: string): TextDirection {
  for (const char of text) {
    if (STRONG_RTL_REGEX.test(char)) {
      return "rtl";
    }
    if (LETTER_REGEX.test(char)) {
      return "ltr";
    }
  }
  return "ltr";
}

export function blockTextDirection(block: BlockNode): TextDirection {
  return detectTextDirection(blockPlainText(block));
}

function blockPlainText(block: BlockNode): string {
  switch (block.type) {
    case "paragraph":
    case "heading":
      return toPlainText(block.children);
    case "blockquote":
    case "callout":
      return block.children.map(blockPlainText).join(" ");
    case "bulletedList":
    case "numberedList":
    case "taskList":
      return block.items
        .flatMap((item) => item.children)
        .map(blockPlainText)
        .join(" ");
    case "codeBlock":
    case "htmlBlock":
      return block.value;
    case "table":
      return block.rows
        .flatMap((row) => row.cells)
        .map((cell) => toPlainText(cell.children))
        .join(" ");
    case "thematicBreak":
      return "";
  }
}
