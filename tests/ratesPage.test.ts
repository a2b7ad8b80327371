import { errors } from "playwright";
import { describe, expect, it } from "vitest";
import {
  HYDRATED_TABLE_SELECTOR,
  PlaywrightRatesRenderer,
  RatesPage,
  RatesSessionOpener
} from "../src/capture/ratesPage";
import { ScrapeSettings } from "../src/config/settings";
import { RenderTimeoutError } from "../src/errors";
import { createRecordingLogger } from "./helpers";

const PAGE_URL = "https://example.com/disability/compensation-rates/veteran-rates/";

const settings: ScrapeSettings = {
  hydrationTimeoutMs: 250,
  settleMs: 0,
  navigationTimeoutMs: 1000,
  headless: true
};

interface StubSession {
  calls: string[];
  open: RatesSessionOpener;
}

function stubSession(waitForSelector: RatesPage["waitForSelector"]): StubSession {
  const calls: string[] = [];
  const page: RatesPage = {
    goto: async (url) => {
      calls.push(`goto ${url}`);
      return null;
    },
    $$: async () => [],
    waitForSelector,
    waitForTimeout: async () => undefined
  };
  return {
    calls,
    open: async (headless) => {
      calls.push(`open headless=${headless}`);
      return {
        page,
        close: async () => {
          calls.push("close");
        }
      };
    }
  };
}

describe("playwright rates renderer", () => {
  it("turns a hydration wait timeout into a RenderTimeoutError", async () => {
    const session = stubSession(async () => {
      throw new errors.TimeoutError("waiting for locator");
    });
    const renderer = new PlaywrightRatesRenderer(settings, createRecordingLogger(), session.open);

    await renderer.open(PAGE_URL);
    const read = renderer.readTables();

    await expect(read).rejects.toBeInstanceOf(RenderTimeoutError);
    await expect(read).rejects.toThrow(
      `Timed out after 250ms waiting for ${HYDRATED_TABLE_SELECTOR} to appear`
    );
  });

  it("passes other wait failures through unchanged", async () => {
    const session = stubSession(async () => {
      throw new Error("Target page, context or browser has been closed");
    });
    const renderer = new PlaywrightRatesRenderer(settings, createRecordingLogger(), session.open);

    await renderer.open(PAGE_URL);

    await expect(renderer.readTables()).rejects.toThrow(
      "Target page, context or browser has been closed"
    );
  });

  it("returns no snapshots when no hydrated table is present", async () => {
    const session = stubSession(async () => null);
    const renderer = new PlaywrightRatesRenderer(settings, createRecordingLogger(), session.open);

    await renderer.open(PAGE_URL);
    expect(await renderer.expandAccordions()).toBe(0);
    expect(await renderer.readTables()).toEqual([]);
    await renderer.close();
    await renderer.close();

    expect(session.calls).toEqual(["open headless=true", `goto ${PAGE_URL}`, "close"]);
  });

  it("refuses to read tables before the page is open", async () => {
    const session = stubSession(async () => null);
    const renderer = new PlaywrightRatesRenderer(settings, createRecordingLogger(), session.open);

    await expect(renderer.readTables()).rejects.toThrow("Rates page is not open");
    expect(session.calls).toEqual([]);
  });
});
