import type { Logger } from "./logger.js";

/**
 * Playwright engine a browser kind runs on
 */
export type BrowserEngine = "chromium" | "firefox" | "webkit";

/**
 * Resolved browser kind
 */
export interface BrowserSpec {
  /** Normalized kind as configured, e.g. "chrome" */
  kind: string;
  engine: BrowserEngine;
  /** Branded channel for Chromium builds (chrome, msedge) */
  channel?: string;
}

export type RemoteProtocol = "playwright" | "cdp";

/**
 * How sessions are provisioned. Chosen once when the config is resolved.
 */
export type ProvisioningMode =
  | { type: "local-binary"; executablePath: string; browserBinaryPath?: string }
  | { type: "remote"; endpoint: string; protocol: RemoteProtocol; browserBinaryPath?: string }
  | { type: "auto-managed"; browserBinaryPath?: string };

/**
 * Pool options as supplied by the host
 */
export interface PoolOptions {
  /** Browser kind: chromium, chrome, msedge, firefox or webkit */
  browserKind?: string;

  /** Local browser executable; selects local-binary mode */
  executablePath?: string;

  /** Overrides the browser binary location */
  browserBinaryPath?: string;

  /** Browser server endpoint; selects remote mode unless executablePath is set */
  remoteEndpoint?: string;

  /** Remote wire protocol (default: "playwright") */
  remoteProtocol?: RemoteProtocol;

  /** Browser launch flags, in order */
  startupArguments?: string[];

  /** Run browsers headless (default: true) */
  headless?: boolean;

  /** Number of sessions kept in the pool (default: 5) */
  poolSize?: number;

  /** How long acquire waits for a free session, in ms (default: 300000) */
  checkoutTimeoutMs?: number;

  /** Attach the live session to request.meta.session after a render (default: false) */
  exposeSession?: boolean;

  /** Enable debug logging (default: false) */
  debug?: boolean;
}

/**
 * Validated configuration
 */
export interface PoolConfig {
  browser: BrowserSpec;
  provisioning: ProvisioningMode;
  startupArguments: readonly string[];
  headless: boolean;
  poolSize: number;
  checkoutTimeoutMs: number;
  exposeSession: boolean;
  debug: boolean;
}

export interface SessionCookie {
  name: string;
  value: string;
}

/**
 * Condition a rendered page must reach before its markup is read
 */
export type WaitCondition =
  | { type: "selector"; selector: string; state?: "attached" | "detached" | "visible" | "hidden" }
  | { type: "function"; expression: string }
  | { type: "load-state"; state: "load" | "domcontentloaded" | "networkidle" }
  | { type: "url"; url: string | RegExp };

/**
 * One live browser-automation session.
 *
 * Any operation may throw; a session whose operation threw is no longer trusted.
 */
export interface BrowserSession {
  readonly id: string;
  navigate(url: string): Promise<void>;
  setCookie(cookie: SessionCookie): Promise<void>;
  /** Rejects when the condition does not hold within timeoutMs */
  waitUntil(condition: WaitCondition, timeoutMs: number): Promise<void>;
  executeScript(script: string): Promise<void>;
  readPage(): Promise<string>;
  readUrl(): Promise<string>;
  captureScreenshot(): Promise<Buffer>;
  terminate(): Promise<void>;
}

export interface SessionFactory {
  create(): Promise<BrowserSession>;
}

/**
 * Session pool constructor options
 */
export interface SessionPoolConfig {
  factory: SessionFactory;

  /** Number of sessions to maintain in pool */
  size: number;

  /** Default acquire timeout in ms (default: 300000) */
  checkoutTimeoutMs?: number;

  /** Enable debug logging (default: false) */
  debug?: boolean;

  /** Custom logger function */
  logger?: Logger;
}

/**
 * Pool statistics
 */
export interface PoolStats {
  available: number;
  inUse: number;
  creating: number;
  waiting: number;
  total: number;
  maxSize: number;
  closed: boolean;
}

/**
 * Any request travelling through the crawler
 */
export interface CrawlRequest {
  readonly url: string;
  meta: Record<string, unknown>;
}

/**
 * A request flagged for browser rendering
 */
export interface RenderRequest extends CrawlRequest {
  readonly render: true;
  readonly cookies: Readonly<Record<string, string>>;
  readonly waitUntil?: WaitCondition;
  readonly waitTimeoutMs: number;
  readonly script?: string;
  readonly screenshot: boolean;
}

export interface RenderedResponse {
  /** URL after any redirect */
  url: string;
  body: Buffer;
  encoding: "utf-8";
  request: RenderRequest;
}
