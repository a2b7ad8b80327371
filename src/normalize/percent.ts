const PERCENT_PATTERN = /(\d+)\s*%/;

/** First integer followed by a percent sign, e.g. "30%" or "Veteran 30 %". */
export function findPercent(text: string): number | null {
  const match = text.match(PERCENT_PATTERN);
  return match ? Number.parseInt(match[1], 10) : null;
}

export function hasPercent(text: string): boolean {
  return PERCENT_PATTERN.test(text);
}
