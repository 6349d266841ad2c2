import { PoolDegradedError, PoolExhaustedError, RenderFailedError } from "./errors.js";
import { consoleLogger, debugLogger, errorMessage } from "./logger.js";
import type { Logger } from "./logger.js";
import type { SessionPool } from "./pool.js";
import { isRenderRequest } from "./request.js";
import type { BrowserSession, CrawlRequest, RenderRequest, RenderedResponse } from "./types.js";

export interface RenderFetcherOptions {
  /**
   * Put the session at request.meta.session after a render. The session is
   * already back in the pool at that point and must not be driven.
   */
  exposeSession?: boolean;
  debug?: boolean;
  logger?: Logger;
}

interface RenderResult {
  url: string;
  markup: string;
}

/**
 * Renders flagged requests with sessions checked out of a pool
 */
export class RenderFetcher {
  private readonly exposeSession: boolean;
  private readonly logger: Logger;
  private readonly log: Logger;

  constructor(
    private readonly pool: SessionPool,
    options: RenderFetcherOptions = {}
  ) {
    this.exposeSession = options.exposeSession ?? false;
    this.logger = options.logger ?? consoleLogger;
    this.log = debugLogger(options.debug ?? false, this.logger);
  }

  /**
   * Render a request. Resolves to null when the request is not flagged for
   * rendering or no session freed up in time.
   */
  async fetch(request: CrawlRequest): Promise<RenderedResponse | null> {
    if (!isRenderRequest(request)) {
      return null;
    }

    let session: BrowserSession;
    try {
      session = await this.pool.acquire();
    } catch (err) {
      if (err instanceof PoolExhaustedError) {
        this.logger("[fetch] no browser session available, skipping render", {
          url: request.url,
          timeoutMs: err.timeoutMs,
        });
        return null;
      }
      throw err;
    }

    let result: RenderResult;
    try {
      result = await this.render(session, request);
    } catch (err) {
      throw await this.fail(session, request, err);
    }

    await this.pool.release(session);
    if (this.exposeSession) {
      request.meta.session = session;
    }

    this.log("[fetch] rendered", { url: request.url, finalUrl: result.url, sessionId: session.id });

    return {
      url: result.url,
      body: Buffer.from(result.markup, "utf-8"),
      encoding: "utf-8",
      request,
    };
  }

  private async render(session: BrowserSession, request: RenderRequest): Promise<RenderResult> {
    await session.navigate(request.url);

    for (const [name, value] of Object.entries(request.cookies)) {
      await session.setCookie({ name, value });
    }

    if (request.waitUntil) {
      await session.waitUntil(request.waitUntil, request.waitTimeoutMs);
    }

    if (request.screenshot) {
      request.meta.screenshot = await session.captureScreenshot();
    }

    if (request.script) {
      await session.executeScript(request.script);
    }

    const markup = await session.readPage();
    const url = await session.readUrl();
    return { url, markup };
  }

  /**
   * Swap out the session that failed and build the error to throw
   */
  private async fail(session: BrowserSession, request: RenderRequest, cause: unknown): Promise<RenderFailedError> {
    this.logger("[fetch] render failed, replacing session", {
      url: request.url,
      sessionId: session.id,
      error: errorMessage(cause),
    });

    try {
      await this.pool.replace(session);
    } catch (err) {
      if (err instanceof PoolDegradedError) {
        return new RenderFailedError(request.url, cause, err);
      }
      throw err;
    }
    return new RenderFailedError(request.url, cause);
  }
}
