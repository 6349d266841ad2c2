import { describe, it, expect } from "vitest";
import { parseStartupArguments, resolvePoolConfig, settingsFromEnv } from "../src/config.js";
import {
  ConfigurationError,
  NotConfiguredError,
  ProvisioningError,
  UnsupportedBrowserError,
} from "../src/errors.js";

describe("resolvePoolConfig", () => {
  it("should apply defaults and pick auto-managed mode", () => {
    expect(resolvePoolConfig({ browserKind: "chromium" })).toEqual({
      browser: { kind: "chromium", engine: "chromium" },
      provisioning: { type: "auto-managed" },
      startupArguments: [],
      headless: true,
      poolSize: 5,
      checkoutTimeoutMs: 300_000,
      exposeSession: false,
      debug: false,
    });
  });

  it("should prefer local-binary mode over remote mode", () => {
    const config = resolvePoolConfig({
      browserKind: "chrome",
      executablePath: "/opt/chrome/chrome",
      remoteEndpoint: "ws://grid.internal:3000/",
    });

    expect(config.provisioning).toEqual({ type: "local-binary", executablePath: "/opt/chrome/chrome" });
    expect(config.browser).toEqual({ kind: "chrome", engine: "chromium", channel: "chrome" });
  });

  it("should pick remote mode when only an endpoint is set", () => {
    const config = resolvePoolConfig({ browserKind: "firefox", remoteEndpoint: "ws://grid.internal:3000/" });

    expect(config.provisioning).toEqual({
      type: "remote",
      endpoint: "ws://grid.internal:3000/",
      protocol: "playwright",
    });
  });

  it("should fail with NotConfiguredError without a browser kind", () => {
    expect(() => resolvePoolConfig({})).toThrow(NotConfiguredError);
    expect(() => resolvePoolConfig({ browserKind: "   " })).toThrow(NotConfiguredError);
  });

  it("should reject unknown browser kinds", () => {
    let error: unknown;
    try {
      resolvePoolConfig({ browserKind: "netscape" });
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(UnsupportedBrowserError);
    expect(error).toBeInstanceOf(ProvisioningError);
    expect(error).toMatchObject({ browserKind: "netscape", message: "Unsupported browser kind: netscape" });
  });

  it("should reject invalid option values", () => {
    expect(() => resolvePoolConfig({ browserKind: "chromium", poolSize: 0 })).toThrow(ConfigurationError);
    expect(() => resolvePoolConfig({ browserKind: "chromium", poolSize: 2.5 })).toThrow(/poolSize/);
    expect(() => resolvePoolConfig({ browserKind: "chromium", checkoutTimeoutMs: -1 })).toThrow(
      /checkoutTimeoutMs/
    );
  });

  it("should cap the checkout timeout at the longest timer delay", () => {
    expect(resolvePoolConfig({ browserKind: "chromium", checkoutTimeoutMs: 2_147_483_647 }).checkoutTimeoutMs).toBe(
      2_147_483_647
    );
    expect(() => resolvePoolConfig({ browserKind: "chromium", checkoutTimeoutMs: 30 * 86_400_000 })).toThrow(
      /checkoutTimeoutMs/
    );
  });

  it("should only accept the cdp protocol for Chromium kinds", () => {
    expect(() =>
      resolvePoolConfig({ browserKind: "webkit", remoteEndpoint: "http://localhost:9222", remoteProtocol: "cdp" })
    ).toThrow(ConfigurationError);
    expect(
      resolvePoolConfig({ browserKind: "msedge", remoteEndpoint: "http://localhost:9222", remoteProtocol: "cdp" })
        .provisioning
    ).toEqual({ type: "remote", endpoint: "http://localhost:9222", protocol: "cdp" });
  });

  it("should reject launch options alongside the cdp protocol", () => {
    const base = { browserKind: "chromium", remoteEndpoint: "http://localhost:9222", remoteProtocol: "cdp" } as const;

    expect(() =>
      resolvePoolConfig({ ...base, startupArguments: ["--proxy-server=http://p:1"], browserBinaryPath: "/opt/x" })
    ).toThrow(ConfigurationError);
    expect(() => resolvePoolConfig({ ...base, startupArguments: ["--proxy-server=http://p:1"] })).toThrow(
      /startupArguments and browserBinaryPath cannot be set/
    );
    expect(() => resolvePoolConfig({ ...base, browserBinaryPath: "/opt/x" })).toThrow(ConfigurationError);
    expect(resolvePoolConfig({ ...base, startupArguments: [] }).provisioning).toEqual({
      type: "remote",
      endpoint: "http://localhost:9222",
      protocol: "cdp",
    });
  });
});

describe("settingsFromEnv", () => {
  it("should read RENDER_* variables", () => {
    const options = settingsFromEnv({
      RENDER_BROWSER_KIND: "firefox",
      RENDER_POOL_SIZE: "3",
      RENDER_CHECKOUT_TIMEOUT: "1.5",
      RENDER_STARTUP_ARGUMENTS: '["--window-size=1280,800", "--mute-audio"]',
      RENDER_HEADLESS: "false",
      RENDER_DEBUG: "yes",
      RENDER_EXECUTABLE_PATH: "",
    });

    expect(options).toEqual({
      browserKind: "firefox",
      poolSize: 3,
      checkoutTimeoutMs: 1500,
      startupArguments: ["--window-size=1280,800", "--mute-audio"],
      headless: false,
      debug: true,
    });
  });

  it("should leave everything unset for an empty environment", () => {
    expect(settingsFromEnv({})).toEqual({});
  });

  it("should feed resolvePoolConfig", () => {
    const config = resolvePoolConfig(
      settingsFromEnv({
        RENDER_BROWSER_KIND: "chromium",
        RENDER_REMOTE_ENDPOINT: "http://localhost:9222",
        RENDER_REMOTE_PROTOCOL: "cdp",
        RENDER_EXPOSE_SESSION: "1",
      })
    );

    expect(config.provisioning).toEqual({ type: "remote", endpoint: "http://localhost:9222", protocol: "cdp" });
    expect(config.exposeSession).toBe(true);
    expect(config.poolSize).toBe(5);
  });

  it("should reject a checkout timeout longer than a timer can wait", () => {
    expect(settingsFromEnv({ RENDER_CHECKOUT_TIMEOUT: "2147483" }).checkoutTimeoutMs).toBe(2_147_483_000);
    expect(() => settingsFromEnv({ RENDER_CHECKOUT_TIMEOUT: "2147484" })).toThrow(/RENDER_CHECKOUT_TIMEOUT/);
  });

  it("should reject a non-numeric pool size", () => {
    expect(() => settingsFromEnv({ RENDER_POOL_SIZE: "many" })).toThrow(ConfigurationError);
  });
});

describe("parseStartupArguments", () => {
  it("should split whitespace-separated flags", () => {
    expect(parseStartupArguments("--headless=new  --disable-gpu")).toEqual(["--headless=new", "--disable-gpu"]);
  });

  it("should reject malformed JSON arrays", () => {
    expect(() => parseStartupArguments("[--no-sandbox")).toThrow(ConfigurationError);
    expect(() => parseStartupArguments('["--no-sandbox", 1]')).toThrow(
      "RENDER_STARTUP_ARGUMENTS must be an array of strings"
    );
  });
});
