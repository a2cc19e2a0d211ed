import { applyCallouts } from "./callouts.js";
import { parseMarkdownBlocks } from "./parser.js";
import {
  protectCriticMarkup,
  protectHighlights,
  protectImageDimensions,
  protectInlineMath,
} from "./protect.js";
import {
  restoreCriticMarkup,
  restoreHighlights,
  restoreImageDimensions,
  restoreMath,
  revealLeafSentinels,
} from "./restore.js";
import { stripPrivateUseCharacters, stripSentinels } from "./sentinels.js";
import type { BlockNode, ExtensionSettings, FinalizeOptions, SanitizeMode } from "./types.js";

export const DEFAULT_SETTINGS: ExtensionSettings = {
  highlight: true,
  critic_markup: true,
  math: true,
  image_dimensions: true,
  callouts: true,
  callout_labels: true,
  sanitize: "sentinels",
};

export function resolveSettings(settings: Partial<ExtensionSettings> = {}): ExtensionSettings {
  return { ...DEFAULT_SETTINGS, ...settings };
}

// ─── Public API ──────────────────────────────────────────────────

/**
 * Shields extension syntax from the GFM parser. Stray sentinel characters
 * are removed first, then math, image dimensions, CriticMarkup and
 * highlights are shielded in that order.
 */
export function prepareForParsing(
  rawText: string,
  settings: Partial<ExtensionSettings> = {},
): string {
  const resolved = resolveSettings(settings);
  let text = sanitize(rawText, resolved.sanitize);

  if (resolved.math) {
    text = protectInlineMath(text).text;
  }
  if (resolved.image_dimensions) {
    text = protectImageDimensions(text).text;
  }
  if (resolved.critic_markup) {
    text = protectCriticMarkup(text).text;
  }
  if (resolved.highlight) {
    text = protectHighlights(text).text;
  }
  return text;
}

/**
 * Turns a parsed tree into the final tree: callouts first, then image
 * dimensions, highlights, CriticMarkup and math, then any sentinel left in
 * code, HTML or attribute strings is spelled out.
 */
export function finalizeTree(blocks: BlockNode[], options: FinalizeOptions = {}): BlockNode[] {
  const settings = resolveSettings(options.settings);
  const { onWarning } = options;
  let tree = blocks;

  if (settings.callouts) {
    tree = applyCallouts(tree, { labels: settings.callout_labels });
  }
  if (settings.image_dimensions) {
    tree = restoreImageDimensions(tree);
  }
  if (settings.highlight) {
    tree = restoreHighlights(tree, onWarning);
  }
  if (settings.critic_markup) {
    tree = restoreCriticMarkup(tree, onWarning);
  }
  if (settings.math) {
    tree = restoreMath(tree, onWarning);
  }
  return revealLeafSentinels(tree);
}

/** prepare → parse → finalize in one call. */
export function parseExtendedMarkdown(source: string, options: FinalizeOptions = {}): BlockNode[] {
  return finalizeTree(parseMarkdownBlocks(prepareForParsing(source, options.settings)), options);
}

function sanitize(text: string, mode: SanitizeMode): string {
  switch (mode) {
    case "sentinels":
      return stripSentinels(text);
    case "private-use":
      return stripPrivateUseCharacters(text);
    case "none":
      return text;
  }
}
