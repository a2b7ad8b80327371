#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command } from "commander";
import pkg from "../../package.json";
import { SnapshotFileRenderer } from "../capture/snapshotFile";
import { runScrape } from "../commands/scrape";
import { loadSettings } from "../config/settings";
import {
  applyCliOverrides,
  parseIntegerOption,
  ReplayCliOptionsSchema,
  resolveOutPath,
  ScrapeCliOptionsSchema
} from "./options";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.RATES_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

const defaultEnvPath = path.resolve(process.cwd(), ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

const program = new Command();

program
  .name("rates-scraper")
  .description("Scrape disability compensation rates (single year) into CSV")
  .version(pkg.version);

program.option(
  "--env-file <path>",
  "Path to .env file (overrides RATES_ENV_FILE/DOTENV_CONFIG_PATH)",
  envPath
);

program
  .command("scrape")
  .requiredOption("--url <url>", "Disability rates page URL")
  .requiredOption("--year <year>", "Rates year (e.g., 2024)", parseIntegerOption)
  .option("--out <path>", "Output CSV path")
  .option("--output <path>", "Output CSV path (alias for --out)")
  .option(
    "--preview <n>",
    "Preview the first N rows in the terminal (no file written)",
    parseIntegerOption
  )
  .option("--snapshot-out <path>", "Also save the raw table snapshots as JSON")
  .option("--debug", "Enable verbose debug logging", false)
  .option(
    "--hydration-timeout <ms>",
    "How long to wait for hydrated rate tables",
    parseIntegerOption
  )
  .option("--headed", "Show the browser window", false)
  .action(async (rawOpts) => {
    const opts = ScrapeCliOptionsSchema.parse(rawOpts);
    await runScrape({
      url: opts.url,
      year: opts.year,
      outPath: resolveOutPath(opts),
      preview: opts.preview,
      snapshotOut: opts.snapshotOut,
      debug: opts.debug,
      settings: applyCliOverrides(loadSettings(), opts)
    });
  });

program
  .command("replay")
  .description("Rebuild the dataset from table snapshots saved with --snapshot-out")
  .requiredOption("--tables <path>", "Table snapshot JSON file")
  .requiredOption("--year <year>", "Rates year (e.g., 2024)", parseIntegerOption)
  .option("--out <path>", "Output CSV path")
  .option("--output <path>", "Output CSV path (alias for --out)")
  .option(
    "--preview <n>",
    "Preview the first N rows in the terminal (no file written)",
    parseIntegerOption
  )
  .option("--debug", "Enable verbose debug logging", false)
  .action(async (rawOpts) => {
    const opts = ReplayCliOptionsSchema.parse(rawOpts);
    await runScrape({
      url: path.resolve(opts.tables),
      year: opts.year,
      outPath: resolveOutPath(opts),
      preview: opts.preview,
      debug: opts.debug,
      settings: loadSettings(),
      renderer: new SnapshotFileRenderer()
    });
  });

program.parseAsync().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
