import { ElementHandle, Page, errors } from "playwright";
import { ScrapeSettings } from "../config/settings";
import { getDistributedText } from "../dom/distributedText";
import { DEFAULT_SECTION_LOOKUP, findPrecedingHeading } from "../dom/sectionHeading";
import { RenderTimeoutError } from "../errors";
import { RawTableSnapshot } from "../types/rateTables";
import { Logger } from "../utils/log";
import { closeBrowserSession, openBrowserSession } from "./playwright";
import { RatesPageRenderer } from "./renderer";

export const HYDRATED_TABLE_SELECTOR = "va-table-inner.hydrated";
export const EXPAND_ALL_SELECTOR = 'va-accordion button[data-testid="expand-all-accordions"]';

async function textOf<T extends Node>(handle: ElementHandle<T> | null): Promise<string> {
  if (!handle) return "";
  return handle.evaluate(getDistributedText);
}

async function readTable(table: ElementHandle<HTMLTableElement>): Promise<RawTableSnapshot> {
  const caption = await textOf(await table.$("caption"));

  const headers: string[] = [];
  for (const header of await table.$$("thead tr th")) {
    headers.push(await textOf(header));
  }

  const rows: string[][] = [];
  for (const bodyRow of await table.$$("tbody tr")) {
    const cells: string[] = [];
    for (const cell of await bodyRow.$$("th, td")) {
      cells.push(await textOf(cell));
    }
    rows.push(cells);
  }

  const section = await table.evaluate(findPrecedingHeading, DEFAULT_SECTION_LOOKUP);
  return { caption, headers, rows, section };
}

/** The page operations the renderer drives; a Playwright `Page` satisfies it. */
export interface RatesPage {
  goto: Page["goto"];
  $$(selector: string): Promise<ElementHandle<SVGElement | HTMLElement>[]>;
  waitForSelector(selector: string, options: { timeout: number }): Promise<unknown>;
  waitForTimeout: Page["waitForTimeout"];
}

export interface RatesPageSession {
  page: RatesPage;
  close(): Promise<void>;
}

export type RatesSessionOpener = (headless: boolean) => Promise<RatesPageSession>;

export const openChromiumSession: RatesSessionOpener = async (headless) => {
  const session = await openBrowserSession(headless);
  return { page: session.page, close: () => closeBrowserSession(session) };
};

export class PlaywrightRatesRenderer implements RatesPageRenderer {
  name = "playwright";
  private session: RatesPageSession | null = null;

  constructor(
    private readonly settings: ScrapeSettings,
    private readonly logger: Logger,
    private readonly openSession: RatesSessionOpener = openChromiumSession
  ) {}

  private requirePage(): RatesPage {
    if (!this.session) {
      throw new Error("Rates page is not open");
    }
    return this.session.page;
  }

  async open(url: string): Promise<void> {
    this.session = await this.openSession(this.settings.headless);
    await this.session.page.goto(url, {
      waitUntil: "networkidle",
      timeout: this.settings.navigationTimeoutMs
    });
  }

  async expandAccordions(): Promise<number> {
    const page = this.requirePage();
    const buttons = await page.$$(EXPAND_ALL_SELECTOR);
    let clicked = 0;
    for (const button of buttons) {
      try {
        await button.click();
        clicked += 1;
      } catch (error) {
        this.logger.debug(
          `Could not click accordion control: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }
    return clicked;
  }

  async settle(): Promise<void> {
    if (this.settings.settleMs > 0) {
      await this.requirePage().waitForTimeout(this.settings.settleMs);
    }
  }

  async readTables(): Promise<RawTableSnapshot[]> {
    const page = this.requirePage();
    try {
      await page.waitForSelector(HYDRATED_TABLE_SELECTOR, {
        timeout: this.settings.hydrationTimeoutMs
      });
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        throw new RenderTimeoutError(HYDRATED_TABLE_SELECTOR, this.settings.hydrationTimeoutMs);
      }
      throw error;
    }

    const snapshots: RawTableSnapshot[] = [];
    for (const inner of await page.$$(HYDRATED_TABLE_SELECTOR)) {
      // CSS selectors pierce open shadow roots, so this finds the table inside the host's shadow tree.
      const table = await inner.$("table");
      if (table) {
        snapshots.push(await readTable(table));
      }
    }
    return snapshots;
  }

  async close(): Promise<void> {
    if (!this.session) return;
    const session = this.session;
    this.session = null;
    await session.close();
  }
}
