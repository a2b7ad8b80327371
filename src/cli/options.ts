import { InvalidArgumentError } from "commander";
import { z } from "zod";
import { ScrapeSettings } from "../config/settings";

export const ScrapeCliOptionsSchema = z.object({
  url: z.string().url(),
  year: z.number().int().positive(),
  out: z.string().min(1).optional(),
  output: z.string().min(1).optional(),
  preview: z.number().int().nonnegative().optional(),
  snapshotOut: z.string().min(1).optional(),
  debug: z.boolean().default(false),
  hydrationTimeout: z.number().int().positive().optional(),
  headed: z.boolean().default(false)
});

export const ReplayCliOptionsSchema = z.object({
  tables: z.string().min(1),
  year: z.number().int().positive(),
  out: z.string().min(1).optional(),
  output: z.string().min(1).optional(),
  preview: z.number().int().nonnegative().optional(),
  debug: z.boolean().default(false)
});

export type ScrapeCliOptions = z.infer<typeof ScrapeCliOptionsSchema>;
export type ReplayCliOptions = z.infer<typeof ReplayCliOptionsSchema>;

export function parseIntegerOption(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Expected an integer, got '${value}'.`);
  }
  return parsed;
}

/** `--out` wins over its `--output` alias. */
export function resolveOutPath(options: { out?: string; output?: string }): string | undefined {
  return options.out ?? options.output;
}

export function applyCliOverrides(settings: ScrapeSettings, options: ScrapeCliOptions): ScrapeSettings {
  return {
    ...settings,
    hydrationTimeoutMs: options.hydrationTimeout ?? settings.hydrationTimeoutMs,
    headless: options.headed ? false : settings.headless
  };
}
