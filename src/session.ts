import type { Browser, BrowserContext, Page } from "playwright-core";
import type { BrowserSession, SessionCookie, WaitCondition } from "./types.js";

export type SessionBrowser = Pick<Browser, "close">;
export type SessionContext = Pick<BrowserContext, "addCookies">;
export type SessionPage = Pick<
  Page,
  | "goto"
  | "url"
  | "content"
  | "evaluate"
  | "screenshot"
  | "waitForSelector"
  | "waitForFunction"
  | "waitForLoadState"
  | "waitForURL"
>;

/**
 * Browser session backed by one Playwright browser, context and page
 */
export class PlaywrightSession implements BrowserSession {
  private terminated = false;

  constructor(
    readonly id: string,
    private readonly browser: SessionBrowser,
    private readonly context: SessionContext,
    private readonly page: SessionPage
  ) {}

  async navigate(url: string): Promise<void> {
    await this.page.goto(url);
  }

  async setCookie(cookie: SessionCookie): Promise<void> {
    // Scoped to the current document, like a cookie set from the page itself
    await this.context.addCookies([{ name: cookie.name, value: cookie.value, url: this.page.url() }]);
  }

  async waitUntil(condition: WaitCondition, timeoutMs: number): Promise<void> {
    switch (condition.type) {
      case "selector":
        await this.page.waitForSelector(condition.selector, { state: condition.state, timeout: timeoutMs });
        return;
      case "function":
        await this.page.waitForFunction(condition.expression, undefined, { timeout: timeoutMs });
        return;
      case "load-state":
        await this.page.waitForLoadState(condition.state, { timeout: timeoutMs });
        return;
      case "url":
        await this.page.waitForURL(condition.url, { timeout: timeoutMs });
        return;
    }
  }

  async executeScript(script: string): Promise<void> {
    await this.page.evaluate(script);
  }

  readPage(): Promise<string> {
    return this.page.content();
  }

  async readUrl(): Promise<string> {
    return this.page.url();
  }

  captureScreenshot(): Promise<Buffer> {
    return this.page.screenshot({ type: "png" });
  }

  async terminate(): Promise<void> {
    if (this.terminated) return;
    this.terminated = true;
    await this.browser.close();
  }
}
