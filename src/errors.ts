export class RenderTimeoutError extends Error {
  constructor(selector: string, timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for ${selector} to appear`);
    this.name = "RenderTimeoutError";
  }
}

export class EmptyResultError extends Error {
  constructor() {
    super("No rows were scraped. Run again with --debug to see diagnostics.");
    this.name = "EmptyResultError";
  }
}

export class OutputConfigurationError extends Error {
  constructor() {
    super("Error: provide --out (or --output), or run with --preview for preview-only mode.");
    this.name = "OutputConfigurationError";
  }
}
