import { chromium, Browser, BrowserContext, Page } from "playwright";

export const DEFAULT_VIEWPORT = { width: 1280, height: 720 };
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export interface BrowserSession {
  browser: Browser;
  context: BrowserContext;
  page: Page;
}

export async function openBrowserSession(headless: boolean): Promise<BrowserSession> {
  const browser = await chromium.launch({
    headless,
    args: ["--disable-blink-features=AutomationControlled"]
  });
  try {
    const context = await browser.newContext({
      viewport: DEFAULT_VIEWPORT,
      userAgent: DEFAULT_USER_AGENT,
      locale: "en-US",
      extraHTTPHeaders: { "Accept-Language": "en-US,en;q=0.9" }
    });
    const page = await context.newPage();
    return { browser, context, page };
  } catch (error) {
    await browser.close().catch(() => undefined);
    throw error;
  }
}

export async function closeBrowserSession(session: BrowserSession): Promise<void> {
  await session.page.close().catch(() => undefined);
  await session.context.close().catch(() => undefined);
  await session.browser.close().catch(() => undefined);
}
