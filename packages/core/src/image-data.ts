import { toPlainText } from "./plain-text.js";
import type { InlineNode } from "./types.js";

export interface ImageData {
  source: string;
  /** Alt text without the size suffix. */
  alt: string;
  /** Set when the image is the only child of a link. */
  destination?: string;
  width?: number;
  height?: number;
}

const SIZE_SUFFIX_REGEX = /^(.*?)\|(\d+)(?:x(\d+))?$/;

/**
 * Reads an image (or a link wrapping exactly one image), splitting a
 * `alt|W` or `alt|WxH` suffix off the alt text.
 */
export function imageData(node: InlineNode): ImageData | undefined {
  if (node.type === "image") {
    return { source: node.source, ...parseAltText(toPlainText(node.children)) };
  }
  if (node.type === "link" && node.children.length === 1) {
    const [child] = node.children;
    const image = child ? imageData(child) : undefined;
    return image ? { ...image, destination: node.destination } : undefined;
  }
  return undefined;
}

export function parseAltText(alt: string): Pick<ImageData, "alt" | "width" | "height"> {
  const match = SIZE_SUFFIX_REGEX.exec(alt);
  if (!match) {
    return { alt };
  }
  const width = Number(match[2]);
  const height = match[3] === undefined ? undefined : Number(match[3]);
  return height === undefined
    ? { alt: match[1] ?? "", width }
    : { alt: match[1] ?? "", width, height };
}
