import matter from "gray-matter";
import picomatch from "picomatch";
import { z } from "zod";
import { ExtensionSettingsSchema, MarkextConfigSchema } from "./config-schema.js";
import { resolveSettings } from "./pipeline.js";
import type { ExtensionSettings, MarkextConfig } from "./types.js";

export const CONFIG_FILENAME = ".markext.json";

/** Front matter key holding per-document settings. */
export const FRONT_MATTER_KEY = "markext";

export function parseConfig(input: unknown): MarkextConfig {
  const result = MarkextConfigSchema.safeParse(input);
  if (!result.success) {
    throw new Error(`Invalid markext config: ${formatIssues(result.error)}`, {
      cause: result.error,
    });
  }
  const { $schema: _schema, ...config } = result.data;
  return config;
}

export function parseConfigJson(contents: string): MarkextConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (err) {
    throw new Error("Config is not valid JSON", { cause: err });
  }
  return parseConfig(parsed);
}

/**
 * Settings for one file. Later sources win: defaults, the config's root
 * `extensions`, each matching override in order, then the document's own
 * `markext` front matter key.
 */
export function resolveFileSettings(params: {
  relativeFilePath: string;
  config?: MarkextConfig;
  markdown?: string;
}): ExtensionSettings {
  let settings = resolveSettings(params.config?.extensions);
  const matchPath = toPosixPath(params.relativeFilePath);

  for (const override of params.config?.overrides ?? []) {
    const matcher = picomatch(override.pattern, { dot: true });
    if (matcher(matchPath)) {
      settings = { ...settings, ...override.extensions };
    }
  }

  if (params.markdown) {
    settings = { ...settings, ...parseFrontMatterSettings(params.markdown) };
  }
  return settings;
}

function parseFrontMatterSettings(markdown: string): Partial<ExtensionSettings> {
  const parsed = matter(markdown);
  const value: unknown = parsed.data[FRONT_MATTER_KEY];
  if (value === undefined) {
    return {};
  }
  const result = ExtensionSettingsSchema.safeParse(value);
  if (!result.success) {
    throw new Error(
      `Invalid "${FRONT_MATTER_KEY}" front matter: ${formatIssues(result.error)}`,
      { cause: result.error },
    );
  }
  return result.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.map(String).join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");
}

function toPosixPath(value: string): string {
  return value.replace(/\\/g, "/").replace(/^\.\//, "");
}
