import { describe, it, expect, vi, beforeEach } from "vitest";
import { PlaywrightSession } from "../src/session.js";

function fakePage() {
  return {
    goto: vi.fn().mockResolvedValue(null),
    url: vi.fn().mockReturnValue("https://news.example.test/article"),
    content: vi.fn().mockResolvedValue("<html><body>article</body></html>"),
    evaluate: vi.fn().mockResolvedValue(undefined),
    screenshot: vi.fn().mockResolvedValue(Buffer.from("png")),
    waitForSelector: vi.fn().mockResolvedValue(null),
    waitForFunction: vi.fn().mockResolvedValue(null),
    waitForLoadState: vi.fn().mockResolvedValue(undefined),
    waitForURL: vi.fn().mockResolvedValue(undefined),
  };
}

describe("PlaywrightSession", () => {
  let page: ReturnType<typeof fakePage>;
  let context: { addCookies: ReturnType<typeof vi.fn> };
  let browser: { close: ReturnType<typeof vi.fn> };
  let session: PlaywrightSession;

  beforeEach(() => {
    page = fakePage();
    context = { addCookies: vi.fn().mockResolvedValue(undefined) };
    browser = { close: vi.fn().mockResolvedValue(undefined) };
    session = new PlaywrightSession("session-a", browser, context, page);
  });

  it("should navigate the page", async () => {
    await session.navigate("https://news.example.test/");

    expect(page.goto).toHaveBeenCalledWith("https://news.example.test/");
  });

  it("should scope cookies to the current page", async () => {
    await session.setCookie({ name: "consent", value: "yes" });

    expect(context.addCookies).toHaveBeenCalledWith([
      { name: "consent", value: "yes", url: "https://news.example.test/article" },
    ]);
  });

  describe("waitUntil", () => {
    it("should wait for a selector", async () => {
      await session.waitUntil({ type: "selector", selector: "#comments", state: "attached" }, 500);

      expect(page.waitForSelector).toHaveBeenCalledWith("#comments", { state: "attached", timeout: 500 });
    });

    it("should wait for an expression to become truthy", async () => {
      await session.waitUntil({ type: "function", expression: "window.appReady === true" }, 500);

      expect(page.waitForFunction).toHaveBeenCalledWith("window.appReady === true", undefined, {
        timeout: 500,
      });
    });

    it("should wait for a load state", async () => {
      await session.waitUntil({ type: "load-state", state: "networkidle" }, 500);

      expect(page.waitForLoadState).toHaveBeenCalledWith("networkidle", { timeout: 500 });
    });

    it("should wait for a URL", async () => {
      const pattern = /\/article$/;
      await session.waitUntil({ type: "url", url: pattern }, 500);

      expect(page.waitForURL).toHaveBeenCalledWith(pattern, { timeout: 500 });
    });

    it("should reject when the condition times out", async () => {
      page.waitForSelector.mockRejectedValue(new Error("Timeout 500ms exceeded."));

      await expect(session.waitUntil({ type: "selector", selector: "#never" }, 500)).rejects.toThrow(
        "Timeout 500ms exceeded."
      );
    });
  });

  it("should run scripts in the page", async () => {
    await session.executeScript("document.body.dataset.seen = '1'");

    expect(page.evaluate).toHaveBeenCalledWith("document.body.dataset.seen = '1'");
  });

  it("should read the markup and the current URL", async () => {
    expect(await session.readPage()).toBe("<html><body>article</body></html>");
    expect(await session.readUrl()).toBe("https://news.example.test/article");
  });

  it("should capture a PNG screenshot", async () => {
    const bytes = await session.captureScreenshot();

    expect(bytes).toEqual(Buffer.from("png"));
    expect(page.screenshot).toHaveBeenCalledWith({ type: "png" });
  });

  it("should close the browser only once", async () => {
    await session.terminate();
    await session.terminate();

    expect(browser.close).toHaveBeenCalledTimes(1);
  });
});
