#!/usr/bin/env node

import { readFile } from "node:fs/promises";
import { createRequire } from "node:module";
import path from "node:path";
import { Command } from "commander";

const require = createRequire(import.meta.url);
const { version: CLI_VERSION } = require("../package.json") as {
  version: string;
};
import {
  configJsonSchema,
  prepareForParsing,
  resolveFileSettings,
  type ExtensionSettings,
} from "@markext/core";
import { checkDocs, checkFile, formatTotals } from "./check.js";
import {
  isWithinDir,
  loadConfigFile,
  loadNearestConfig,
  relativePosix,
  type ConfigContext,
} from "./files.js";

const program = new Command();

program
  .name("markext")
  .description("Shield, parse and check markdown with highlight, CriticMarkup, math and callouts")
  .version(CLI_VERSION);

program
  .command("protect")
  .description("Print the file with extension syntax replaced by sentinel characters")
  .argument("<file>", "Markdown file")
  .option("--config <path>", "Path to a .markext.json file")
  .action(async (file: string, options: { config?: string }) => {
    const markdown = await readFile(file, "utf8");
    const settings = await settingsForFile(file, markdown, options.config);
    process.stdout.write(prepareForParsing(markdown, settings));
  });

program
  .command("parse")
  .description("Print the finalized block tree of a markdown file as JSON")
  .argument("<file>", "Markdown file")
  .option("--config <path>", "Path to a .markext.json file")
  .action(async (file: string, options: { config?: string }) => {
    const context = await configForFile(file, options.config);
    const report = await checkFile(path.resolve(file), file, context);
    for (const warning of report.warnings) {
      console.warn(`warn: ${file}: ${warning}`);
    }
    console.log(JSON.stringify(report.tree, null, 2));
  });

program
  .command("check")
  .description("Finalize every markdown file and report degraded spans and leftover sentinels")
  .requiredOption("--docs-dir <path>", "Path to markdown corpus")
  .option("--config <path>", "Use this config for every file instead of the nearest .markext.json")
  .action(async (options: { docsDir: string; config?: string }) => {
    const report = await checkDocs({
      docsDir: options.docsDir,
      ...(options.config ? { configPath: options.config } : {}),
    });

    for (const file of report.files) {
      for (const warning of file.warnings) {
        console.warn(`warn: ${file.file}: ${warning}`);
      }
    }

    console.log(`checked ${report.files.length} markdown files: ${formatTotals(report.totals)}`);
    if (report.warnings > 0) {
      console.log(`completed with ${report.warnings} warning(s)`);
    }
    if (report.leaks > 0) {
      process.exitCode = 1;
    }
  });

program
  .command("schema")
  .description("Print the JSON Schema of .markext.json")
  .action(() => {
    console.log(JSON.stringify(configJsonSchema(), null, 2));
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});

async function configForFile(
  file: string,
  configPath: string | undefined,
): Promise<ConfigContext | undefined> {
  if (configPath) {
    return loadConfigFile(configPath);
  }
  const absolute = path.resolve(file);
  const cwd = process.cwd();
  const stopDir = isWithinDir(absolute, cwd) ? cwd : path.dirname(absolute);
  return loadNearestConfig(absolute, stopDir, new Map());
}

async function settingsForFile(
  file: string,
  markdown: string,
  configPath: string | undefined,
): Promise<ExtensionSettings> {
  const context = await configForFile(file, configPath);
  return resolveFileSettings({
    relativeFilePath: context ? relativePosix(context.baseDir, file) : file,
    markdown,
    ...(context ? { config: context.config } : {}),
  });
}
