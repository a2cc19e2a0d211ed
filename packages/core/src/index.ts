export * from "./types.js";
export {
  SENTINELS,
  type SentinelName,
  containsSentinel,
  isSentinel,
  literalFor,
  revealSentinels,
  stripPrivateUseCharacters,
  stripSentinels,
  trailingSentinels,
} from "./sentinels.js";
export { findCodeZones, type Zone } from "./code-zones.js";
export {
  protectCriticMarkup,
  protectHighlights,
  protectImageDimensions,
  protectInlineMath,
} from "./protect.js";
export { parseMarkdown, parseMarkdownBlocks } from "./parser.js";
export { mdastToBlocks } from "./from-mdast.js";
export {
  type BlockVisitor,
  collectInlines,
  mapBlocks,
  mapInlineTree,
  walkBlocks,
  walkInlines,
} from "./traverse.js";
export { restoreSpans, type SpanRule } from "./spans.js";
export {
  restoreCriticMarkup,
  restoreHighlights,
  restoreImageDimensions,
  restoreMath,
  revealLeafSentinels,
} from "./restore.js";
export { applyCallouts, type CalloutOptions } from "./callouts.js";
export {
  CALLOUT_TYPES,
  NEUTRAL_CALLOUT,
  calloutStyle,
  isKnownCalloutType,
  type CalloutColor,
  type CalloutStyle,
} from "./callout-catalog.js";
export {
  DEFAULT_SETTINGS,
  finalizeTree,
  parseExtendedMarkdown,
  prepareForParsing,
  resolveSettings,
} from "./pipeline.js";
export {
  ConfigOverrideSchema,
  ExtensionSettingsSchema,
  MarkextConfigSchema,
  SanitizeModeSchema,
  configJsonSchema,
} from "./config-schema.js";
export {
  CONFIG_FILENAME,
  FRONT_MATTER_KEY,
  parseConfig,
  parseConfigJson,
  resolveFileSettings,
} from "./config.js";
export { toPlainText } from "./plain-text.js";
export { imageData, parseAltText, type ImageData } from "./image-data.js";
export { blockTextDirection, detectTextDirection, type TextDirection } from "./text-direction.js";
export {
  findSentinelLeaks,
  summarizeTree,
  type SentinelLeak,
  type TreeSummary,
} from "./inspect.js";
