export { SessionPool } from "./pool.js";
export { RenderFetcher } from "./fetcher.js";
export { RenderMiddleware } from "./middleware.js";
export { PlaywrightSessionFactory, PLAYWRIGHT_LAUNCHERS, LAUNCH_OPTIONS_HEADER } from "./factory.js";
export { PlaywrightSession } from "./session.js";
export { createRenderRequest, isRenderRequest, DEFAULT_WAIT_TIMEOUT_MS } from "./request.js";
export {
  resolvePoolConfig,
  resolveBrowserKind,
  settingsFromEnv,
  parseStartupArguments,
  DEFAULT_POOL_SIZE,
  DEFAULT_CHECKOUT_TIMEOUT_MS,
} from "./config.js";
export { consoleLogger } from "./logger.js";
export {
  RenderPoolError,
  NotConfiguredError,
  ConfigurationError,
  ProvisioningError,
  UnsupportedBrowserError,
  PoolExhaustedError,
  PoolClosedError,
  PoolDegradedError,
  SessionNotCheckedOutError,
  RenderFailedError,
} from "./errors.js";
export type { Logger } from "./logger.js";
export type { BrowserLauncher, BrowserLaunchers, PlaywrightSessionFactoryOptions } from "./factory.js";
export type { RenderFetcherOptions } from "./fetcher.js";
export type { RenderMiddlewareDeps } from "./middleware.js";
export type { RenderRequestOptions } from "./request.js";
export type {
  BrowserEngine,
  BrowserSpec,
  RemoteProtocol,
  ProvisioningMode,
  PoolOptions,
  PoolConfig,
  SessionCookie,
  WaitCondition,
  BrowserSession,
  SessionFactory,
  SessionPoolConfig,
  PoolStats,
  CrawlRequest,
  RenderRequest,
  RenderedResponse,
} from "./types.js";
