import { z } from "zod";
import { ConfigurationError, NotConfiguredError, UnsupportedBrowserError } from "./errors.js";
import type { BrowserSpec, PoolConfig, PoolOptions, ProvisioningMode } from "./types.js";

export const DEFAULT_POOL_SIZE = 5;
export const DEFAULT_CHECKOUT_TIMEOUT_MS = 300_000;
/** Longest delay a Node timer honours; larger values fire after 1ms */
export const MAX_CHECKOUT_TIMEOUT_MS = 2_147_483_647;

const BROWSER_KINDS = new Map<string, Omit<BrowserSpec, "kind">>([
  ["chromium", { engine: "chromium" }],
  ["chrome", { engine: "chromium", channel: "chrome" }],
  ["msedge", { engine: "chromium", channel: "msedge" }],
  ["firefox", { engine: "firefox" }],
  ["webkit", { engine: "webkit" }],
]);

const poolOptionsSchema = z.object({
  browserKind: z.string().trim().min(1),
  executablePath: z.string().min(1).optional(),
  browserBinaryPath: z.string().min(1).optional(),
  remoteEndpoint: z.string().url().optional(),
  remoteProtocol: z.enum(["playwright", "cdp"]).default("playwright"),
  startupArguments: z.array(z.string()).default([]),
  headless: z.boolean().default(true),
  poolSize: z.number().int().min(1).default(DEFAULT_POOL_SIZE),
  checkoutTimeoutMs: z.number().int().min(0).max(MAX_CHECKOUT_TIMEOUT_MS).default(DEFAULT_CHECKOUT_TIMEOUT_MS),
  exposeSession: z.boolean().default(false),
  debug: z.boolean().default(false),
});

/**
 * Look up a browser kind (case-insensitive)
 */
export function resolveBrowserKind(kind: string): BrowserSpec {
  const normalized = kind.trim().toLowerCase();
  const spec = BROWSER_KINDS.get(normalized);
  if (!spec) {
    throw new UnsupportedBrowserError(kind);
  }
  return { kind: normalized, ...spec };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
    .join("; ");
}

/**
 * Validate pool options and pick the provisioning mode
 */
export function resolvePoolConfig(options: PoolOptions): PoolConfig {
  if (!options.browserKind?.trim()) {
    throw new NotConfiguredError("browserKind must be set");
  }

  const parsed = poolOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid pool options: ${formatIssues(parsed.error)}`);
  }
  const opts = parsed.data;
  const browser = resolveBrowserKind(opts.browserKind);

  let provisioning: ProvisioningMode;
  if (opts.executablePath !== undefined) {
    provisioning = {
      type: "local-binary",
      executablePath: opts.executablePath,
      browserBinaryPath: opts.browserBinaryPath,
    };
  } else if (opts.remoteEndpoint !== undefined) {
    if (opts.remoteProtocol === "cdp") {
      if (browser.engine !== "chromium") {
        throw new ConfigurationError(
          `Remote protocol "cdp" requires a Chromium browser, got ${browser.kind}`
        );
      }
      // an existing CDP endpoint takes no launch options
      if (opts.startupArguments.length > 0 || opts.browserBinaryPath !== undefined) {
        throw new ConfigurationError(
          'Remote protocol "cdp" attaches to a running browser; startupArguments and browserBinaryPath cannot be set'
        );
      }
    }
    provisioning = {
      type: "remote",
      endpoint: opts.remoteEndpoint,
      protocol: opts.remoteProtocol,
      browserBinaryPath: opts.browserBinaryPath,
    };
  } else {
    provisioning = { type: "auto-managed", browserBinaryPath: opts.browserBinaryPath };
  }

  return {
    browser,
    provisioning,
    startupArguments: opts.startupArguments,
    headless: opts.headless,
    poolSize: opts.poolSize,
    checkoutTimeoutMs: opts.checkoutTimeoutMs,
    exposeSession: opts.exposeSession,
    debug: opts.debug,
  };
}

// ============================================
// ENVIRONMENT SETTINGS
// ============================================

const unsetIfEmpty = (value: unknown) => (value === "" ? undefined : value);

const optionalString = z.preprocess(unsetIfEmpty, z.string().trim().optional());

const flagString = z.preprocess(
  unsetIfEmpty,
  z
    .string()
    .optional()
    .transform((val) => (val === undefined ? undefined : ["true", "1", "yes"].includes(val.toLowerCase())))
);

const envSchema = z.object({
  RENDER_BROWSER_KIND: optionalString,
  RENDER_EXECUTABLE_PATH: optionalString,
  RENDER_BROWSER_BINARY_PATH: optionalString,
  RENDER_REMOTE_ENDPOINT: optionalString,
  RENDER_REMOTE_PROTOCOL: z.preprocess(unsetIfEmpty, z.enum(["playwright", "cdp"]).optional()),
  RENDER_STARTUP_ARGUMENTS: optionalString,
  RENDER_HEADLESS: z.preprocess(
    unsetIfEmpty,
    z
      .string()
      .optional()
      .transform((val) => (val === undefined ? undefined : !["false", "0", "no"].includes(val.toLowerCase())))
  ),
  RENDER_POOL_SIZE: z.preprocess(unsetIfEmpty, z.coerce.number().int().min(1).optional()),
  RENDER_CHECKOUT_TIMEOUT: z.preprocess(
    unsetIfEmpty,
    z.coerce.number().min(0).max(Math.floor(MAX_CHECKOUT_TIMEOUT_MS / 1000)).optional()
  ),
  RENDER_EXPOSE_SESSION: flagString,
  RENDER_DEBUG: flagString,
});

/**
 * Parse startup arguments: a JSON array of strings, or whitespace-separated flags
 */
export function parseStartupArguments(raw: string): string[] {
  if (raw.startsWith("[")) {
    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch (err) {
      throw new ConfigurationError(
        `RENDER_STARTUP_ARGUMENTS is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
      );
    }
    const result = z.array(z.string()).safeParse(value);
    if (!result.success) {
      throw new ConfigurationError("RENDER_STARTUP_ARGUMENTS must be an array of strings");
    }
    return result.data;
  }
  return raw.split(/\s+/).filter((arg) => arg.length > 0);
}

/**
 * Read pool options from RENDER_* environment variables.
 * RENDER_CHECKOUT_TIMEOUT is in seconds.
 */
export function settingsFromEnv(env: NodeJS.ProcessEnv = process.env): PoolOptions {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid environment settings: ${formatIssues(parsed.error)}`);
  }
  const vars = parsed.data;

  const options: PoolOptions = {
    browserKind: vars.RENDER_BROWSER_KIND,
    executablePath: vars.RENDER_EXECUTABLE_PATH,
    browserBinaryPath: vars.RENDER_BROWSER_BINARY_PATH,
    remoteEndpoint: vars.RENDER_REMOTE_ENDPOINT,
    remoteProtocol: vars.RENDER_REMOTE_PROTOCOL,
    headless: vars.RENDER_HEADLESS,
    poolSize: vars.RENDER_POOL_SIZE,
    exposeSession: vars.RENDER_EXPOSE_SESSION,
    debug: vars.RENDER_DEBUG,
  };
  if (vars.RENDER_STARTUP_ARGUMENTS !== undefined) {
    options.startupArguments = parseStartupArguments(vars.RENDER_STARTUP_ARGUMENTS);
  }
  if (vars.RENDER_CHECKOUT_TIMEOUT !== undefined) {
    options.checkoutTimeoutMs = Math.round(vars.RENDER_CHECKOUT_TIMEOUT * 1000);
  }
  return options;
}
