import { z } from "zod";

export const SanitizeModeSchema = z
  .enum(["sentinels", "private-use", "none"])
  .describe(
    "How input is cleaned before shielding. 'sentinels' removes only the reserved sentinel code points, 'private-use' removes the whole U+E000–U+F8FF range, 'none' keeps the input as it is.",
  )
  .meta({ examples: ["sentinels"] });

export const ExtensionSettingsSchema = z
  .object({
    highlight: z.boolean().optional().describe("Recognize `==highlighted==` text."),
    critic_markup: z
      .boolean()
      .optional()
      .describe(
        "Recognize CriticMarkup: `{++added++}`, `{--deleted--}`, `{~~old~>new~~}`, `{>>comment<<}` and `{==marked==}`.",
      ),
    math: z.boolean().optional().describe("Recognize `$inline math$`. `$$display$$` is never matched."),
    image_dimensions: z
      .boolean()
      .optional()
      .describe("Recognize `![alt|width](url)` and `![alt|widthxheight](url)` size annotations."),
    callouts: z
      .boolean()
      .optional()
      .describe("Rewrite blockquotes opening with `[!type] Title` into callouts."),
    callout_labels: z
      .boolean()
      .optional()
      .describe(
        "Also rewrite blockquotes opening with a bold callout type name, such as `> **Warning**`. Has no effect when callouts are off.",
      ),
    sanitize: SanitizeModeSchema.optional(),
  })
  .describe("Switches for the individual markdown extensions. Omitted keys keep their default.");

export const ConfigOverrideSchema = z
  .object({
    pattern: z
      .string()
      .min(1)
      .describe("A glob pattern matched against file paths relative to the configuration file.")
      .meta({ examples: ["drafts/**/*.md"] }),
    extensions: ExtensionSettingsSchema.describe(
      "Settings merged over the root settings for matching files.",
    ),
  })
  .describe(
    "Adjusts extension settings for files matching a glob pattern. Within the overrides array, later matches take precedence.",
  );

export const MarkextConfigSchema = z
  .object({
    $schema: z.string().optional().describe("JSON Schema URI for editor validation."),
    version: z
      .literal("1")
      .describe("Schema version. Must be '1'.")
      .meta({ examples: ["1"] }),
    extensions: ExtensionSettingsSchema.optional().describe(
      "Default extension settings for every file in this directory tree.",
    ),
    overrides: z
      .array(ConfigOverrideSchema)
      .optional()
      .describe("Per-pattern settings. Applied in order after the root settings."),
  })
  .describe("Configuration for markext, read from `.markext.json`.");

/** JSON Schema for `.markext.json`, for editors and `markext schema`. */
export function configJsonSchema() {
  return z.toJSONSchema(MarkextConfigSchema, { target: "draft-2020-12" });
}
