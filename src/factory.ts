import { randomUUID } from "node:crypto";
import { chromium, firefox, webkit } from "playwright-core";
import type { Browser, BrowserType, LaunchOptions } from "playwright-core";
import { ProvisioningError } from "./errors.js";
import { consoleLogger, debugLogger, errorMessage } from "./logger.js";
import type { Logger } from "./logger.js";
import { PlaywrightSession } from "./session.js";
import type { BrowserEngine, BrowserSession, PoolConfig, SessionFactory } from "./types.js";

/**
 * Browser type module interface - the subset of playwright-core's BrowserType in use
 */
export type BrowserLauncher = Pick<BrowserType, "launch" | "connect" | "connectOverCDP">;

export type BrowserLaunchers = Record<BrowserEngine, BrowserLauncher>;

export const PLAYWRIGHT_LAUNCHERS: BrowserLaunchers = { chromium, firefox, webkit };

/**
 * Header a Playwright browser server reads its launch options from
 */
export const LAUNCH_OPTIONS_HEADER = "x-playwright-launch-options";

export interface PlaywrightSessionFactoryOptions {
  launchers?: BrowserLaunchers;
  logger?: Logger;
}

/**
 * Creates Playwright sessions in the provisioning mode picked by the config
 */
export class PlaywrightSessionFactory implements SessionFactory {
  private readonly launcher: BrowserLauncher;
  private readonly logger: Logger;
  private readonly log: Logger;

  constructor(
    private readonly config: PoolConfig,
    options: PlaywrightSessionFactoryOptions = {}
  ) {
    const launchers = options.launchers ?? PLAYWRIGHT_LAUNCHERS;
    this.launcher = launchers[config.browser.engine];
    this.logger = options.logger ?? consoleLogger;
    this.log = debugLogger(config.debug, this.logger);

    const { provisioning } = config;
    if (provisioning.type === "local-binary" && provisioning.browserBinaryPath !== undefined) {
      this.log("[factory] browser binary path overrides executable path", {
        executablePath: provisioning.executablePath,
        browserBinaryPath: provisioning.browserBinaryPath,
      });
    }
  }

  /**
   * Options shared by every mode
   */
  launchOptions(): LaunchOptions {
    const { provisioning, startupArguments, headless, browser } = this.config;
    const options: LaunchOptions = { headless, args: [...startupArguments] };

    switch (provisioning.type) {
      case "local-binary":
        options.executablePath = provisioning.browserBinaryPath ?? provisioning.executablePath;
        break;
      case "remote":
      case "auto-managed":
        if (provisioning.browserBinaryPath) {
          options.executablePath = provisioning.browserBinaryPath;
        } else if (browser.channel) {
          options.channel = browser.channel;
        }
        break;
    }
    return options;
  }

  private async open(): Promise<Browser> {
    const { provisioning } = this.config;
    const launchOptions = this.launchOptions();

    switch (provisioning.type) {
      case "local-binary":
      case "auto-managed":
        return this.launcher.launch(launchOptions);
      case "remote":
        if (provisioning.protocol === "cdp") {
          return this.launcher.connectOverCDP(provisioning.endpoint);
        }
        return this.launcher.connect(provisioning.endpoint, {
          headers: { [LAUNCH_OPTIONS_HEADER]: JSON.stringify(launchOptions) },
        });
    }
  }

  async create(): Promise<BrowserSession> {
    const { browser: spec, provisioning } = this.config;
    const id = randomUUID();

    let browser: Browser;
    try {
      browser = await this.open();
    } catch (err) {
      throw new ProvisioningError(
        `Failed to start ${spec.kind} browser (${provisioning.type}): ${errorMessage(err)}`,
        { cause: err }
      );
    }

    try {
      const context = await browser.newContext();
      const page = await context.newPage();
      this.log("[factory] session ready", {
        sessionId: id,
        browser: spec.kind,
        mode: provisioning.type,
      });
      return new PlaywrightSession(id, browser, context, page);
    } catch (err) {
      await browser.close().catch((closeErr: unknown) => {
        this.logger("[factory] browser close warning", { sessionId: id, error: errorMessage(closeErr) });
      });
      throw new ProvisioningError(`Failed to open a page in ${spec.kind}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }
}
