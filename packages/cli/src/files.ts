import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import { CONFIG_FILENAME, parseConfigJson, type MarkextConfig } from "@markext/core";

export interface ConfigContext {
  config: MarkextConfig;
  /** Directory holding the config file; override patterns are relative to it. */
  baseDir: string;
}

export async function loadConfigFile(configPath: string): Promise<ConfigContext> {
  const resolved = path.resolve(configPath);
  let contents: string;
  try {
    contents = await readFile(resolved, "utf8");
  } catch (err) {
    throw new Error(`cannot read config ${resolved}`, { cause: err });
  }
  try {
    return { config: parseConfigJson(contents), baseDir: path.dirname(resolved) };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`${resolved}: ${reason}`, { cause: err });
  }
}

/**
 * Walks from the file's directory up to `stopDir` and returns the first
 * `.markext.json` found.
 */
export async function loadNearestConfig(
  filePath: string,
  stopDir: string,
  cache: Map<string, ConfigContext>,
): Promise<ConfigContext | undefined> {
  let currentDir = path.dirname(path.resolve(filePath));
  const stop = path.resolve(stopDir);

  while (true) {
    const candidate = path.join(currentDir, CONFIG_FILENAME);
    const cached = cache.get(candidate);
    if (cached) {
      return cached;
    }
    if (await exists(candidate)) {
      const context = await loadConfigFile(candidate);
      cache.set(candidate, context);
      return context;
    }

    if (currentDir === stop) {
      break;
    }

    const parent = path.dirname(currentDir);
    if (parent === currentDir || !isWithinDir(parent, stop)) {
      break;
    }

    currentDir = parent;
  }

  return undefined;
}

export async function listMarkdownFiles(docsDir: string): Promise<string[]> {
  const files = await fg(["**/*.md"], {
    cwd: docsDir,
    absolute: true,
    onlyFiles: true,
    dot: false,
  });
  files.sort((a, b) => a.localeCompare(b));
  return files;
}

/** Path of `filePath` relative to `baseDir`, with forward slashes. */
export function relativePosix(baseDir: string, filePath: string): string {
  return toPosix(path.relative(baseDir, path.resolve(filePath)));
}

export function isWithinDir(candidate: string, parent: string): boolean {
  const relative = path.relative(parent, candidate);
  return relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative));
}

async function exists(targetPath: string): Promise<boolean> {
  try {
    await stat(targetPath);
    return true;
  } catch {
    return false;
  }
}

function toPosix(input: string): string {
  return input.split(path.sep).join("/");
}
