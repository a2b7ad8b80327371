import { NormalizationWarning } from "./types";

// Unsigned decimal; a bare fraction such as ".50" is accepted.
const DECIMAL_PATTERN = /^\d*\.?\d+$/;

export interface MoneyParseResult {
  value: number | null;
  warning?: NormalizationWarning;
}

export function parseMoneyText(moneyText: string): MoneyParseResult {
  const cleaned = moneyText.replace(/[$,\u00a0]/g, "").trim();
  if (!DECIMAL_PATTERN.test(cleaned)) {
    return {
      value: null,
      warning: {
        code: "RATE_PARSE_FAILED",
        message: `Could not parse rate: ${moneyText}`,
        severity: "warning"
      }
    };
  }
  return { value: Number(cleaned) };
}
