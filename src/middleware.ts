import { resolvePoolConfig, settingsFromEnv } from "./config.js";
import { PlaywrightSessionFactory } from "./factory.js";
import type { BrowserLaunchers } from "./factory.js";
import { RenderFetcher } from "./fetcher.js";
import { consoleLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { SessionPool } from "./pool.js";
import type { CrawlRequest, PoolOptions, PoolStats, RenderedResponse, SessionFactory } from "./types.js";

export interface RenderMiddlewareDeps {
  /** Session factory to use instead of the Playwright one */
  factory?: SessionFactory;
  /** Browser type modules for the Playwright factory */
  launchers?: BrowserLaunchers;
  logger?: Logger;
}

/**
 * Crawler hook that renders flagged requests through a browser session pool.
 *
 * Open it once at startup and close it on teardown.
 */
export class RenderMiddleware {
  private constructor(
    private readonly pool: SessionPool,
    private readonly fetcher: RenderFetcher
  ) {}

  /**
   * Build and pre-fill the pool. Throws NotConfiguredError when no browser
   * kind is set and ProvisioningError when a session cannot be started.
   */
  static async open(options: PoolOptions, deps: RenderMiddlewareDeps = {}): Promise<RenderMiddleware> {
    const config = resolvePoolConfig(options);
    const logger = deps.logger ?? consoleLogger;

    const factory =
      deps.factory ?? new PlaywrightSessionFactory(config, { launchers: deps.launchers, logger });

    const pool = new SessionPool({
      factory,
      size: config.poolSize,
      checkoutTimeoutMs: config.checkoutTimeoutMs,
      debug: config.debug,
      logger,
    });
    await pool.init();

    const fetcher = new RenderFetcher(pool, {
      exposeSession: config.exposeSession,
      debug: config.debug,
      logger,
    });
    return new RenderMiddleware(pool, fetcher);
  }

  static fromEnv(env: NodeJS.ProcessEnv = process.env, deps: RenderMiddlewareDeps = {}): Promise<RenderMiddleware> {
    return RenderMiddleware.open(settingsFromEnv(env), deps);
  }

  /**
   * Resolves to null for requests left to the regular downloader
   */
  processRequest(request: CrawlRequest): Promise<RenderedResponse | null> {
    return this.fetcher.fetch(request);
  }

  close(): Promise<void> {
    return this.pool.shutdown();
  }

  stats(): PoolStats {
    return this.pool.stats();
  }
}
