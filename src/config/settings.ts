import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const SettingsSchema = z.object({
  RATES_HYDRATION_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  RATES_SETTLE_MS: z.coerce.number().int().nonnegative().default(300),
  RATES_NAVIGATION_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  RATES_HEADLESS: booleanFlag.default("true")
});

export interface ScrapeSettings {
  hydrationTimeoutMs: number;
  settleMs: number;
  navigationTimeoutMs: number;
  headless: boolean;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): ScrapeSettings {
  const parsed = SettingsSchema.parse(env);
  return {
    hydrationTimeoutMs: parsed.RATES_HYDRATION_TIMEOUT_MS,
    settleMs: parsed.RATES_SETTLE_MS,
    navigationTimeoutMs: parsed.RATES_NAVIGATION_TIMEOUT_MS,
    headless: parsed.RATES_HEADLESS
  };
}
