import type { CrawlRequest, RenderRequest, WaitCondition } from "./types.js";

export const DEFAULT_WAIT_TIMEOUT_MS = 10_000;

export interface RenderRequestOptions {
  cookies?: Record<string, string>;
  waitUntil?: WaitCondition;
  /** How long waitUntil may take, in ms (default: 10000) */
  waitTimeoutMs?: number;
  /** Script run in the page after it settles; its result is discarded */
  script?: string;
  /** Capture a PNG screenshot into meta.screenshot */
  screenshot?: boolean;
  meta?: Record<string, unknown>;
}

/**
 * Build a request that the middleware renders in a browser
 */
export function createRenderRequest(url: string, options: RenderRequestOptions = {}): RenderRequest {
  return {
    url,
    render: true,
    cookies: Object.freeze({ ...options.cookies }),
    waitUntil: options.waitUntil,
    waitTimeoutMs: options.waitTimeoutMs ?? DEFAULT_WAIT_TIMEOUT_MS,
    script: options.script,
    screenshot: options.screenshot ?? false,
    meta: { ...options.meta },
  };
}

export function isRenderRequest(request: CrawlRequest): request is RenderRequest {
  return "render" in request && request.render === true;
}
