import { readFile } from "node:fs/promises";
import path from "node:path";
import {
  findSentinelLeaks,
  parseExtendedMarkdown,
  resolveFileSettings,
  summarizeTree,
  type BlockNode,
  type TreeSummary,
} from "@markext/core";
import {
  listMarkdownFiles,
  loadConfigFile,
  loadNearestConfig,
  relativePosix,
  type ConfigContext,
} from "./files.js";

export interface FileReport {
  /** Relative to the docs directory, forward slashes. */
  file: string;
  tree: BlockNode[];
  warnings: string[];
  leaks: number;
}

export interface CheckReport {
  files: FileReport[];
  totals: Omit<TreeSummary, "callouts"> & { callouts: number };
  warnings: number;
  leaks: number;
}

/**
 * Finalizes one markdown file with the settings its config and front matter
 * resolve to, recording degraded spans and leftover sentinels as warnings.
 */
export async function checkFile(
  filePath: string,
  displayName: string,
  context: ConfigContext | undefined,
): Promise<FileReport> {
  const markdown = await readFile(filePath, "utf8");
  const settings = resolveFileSettings({
    relativeFilePath: context ? relativePosix(context.baseDir, filePath) : displayName,
    markdown,
    ...(context ? { config: context.config } : {}),
  });

  const warnings: string[] = [];
  const tree = parseExtendedMarkdown(markdown, {
    settings,
    onWarning: (message) => warnings.push(message),
  });

  const leaks = findSentinelLeaks(tree);
  for (const leak of leaks) {
    warnings.push(`sentinel left in ${leak.nodeType}.${leak.field}`);
  }

  return { file: displayName, tree, warnings, leaks: leaks.length };
}

export async function checkDocs(options: {
  docsDir: string;
  configPath?: string;
}): Promise<CheckReport> {
  const docsDir = path.resolve(options.docsDir);
  const files = await listMarkdownFiles(docsDir);
  const explicit = options.configPath ? await loadConfigFile(options.configPath) : undefined;
  const cache = new Map<string, ConfigContext>();

  const reports: FileReport[] = [];
  for (const file of files) {
    const context = explicit ?? (await loadNearestConfig(file, docsDir, cache));
    reports.push(await checkFile(file, relativePosix(docsDir, file), context));
  }

  return {
    files: reports,
    totals: sumSummaries(reports.map((report) => summarizeTree(report.tree))),
    warnings: reports.reduce((sum, report) => sum + report.warnings.length, 0),
    leaks: reports.reduce((sum, report) => sum + report.leaks, 0),
  };
}

function sumSummaries(summaries: TreeSummary[]): CheckReport["totals"] {
  const totals: CheckReport["totals"] = {
    callouts: 0,
    highlights: 0,
    additions: 0,
    deletions: 0,
    substitutions: 0,
    comments: 0,
    criticHighlights: 0,
    math: 0,
    sizedImages: 0,
  };
  for (const summary of summaries) {
    totals.callouts += Object.values(summary.callouts).reduce((sum, count) => sum + count, 0);
    totals.highlights += summary.highlights;
    totals.additions += summary.additions;
    totals.deletions += summary.deletions;
    totals.substitutions += summary.substitutions;
    totals.comments += summary.comments;
    totals.criticHighlights += summary.criticHighlights;
    totals.math += summary.math;
    totals.sizedImages += summary.sizedImages;
  }
  return totals;
}

/** One line, e.g. `2 callouts, 3 highlights, 1 edit, 0 math, 1 sized image`. */
export function formatTotals(totals: CheckReport["totals"]): string {
  const edits =
    totals.additions +
    totals.deletions +
    totals.substitutions +
    totals.comments +
    totals.criticHighlights;
  return [
    plural(totals.callouts, "callout"),
    plural(totals.highlights, "highlight"),
    plural(edits, "edit"),
    `${totals.math} math`,
    plural(totals.sizedImages, "sized image"),
  ].join(", ");
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}
