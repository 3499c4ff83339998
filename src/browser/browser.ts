import { chromium } from "playwright";
import pino from "pino";
import { SettingsSchema } from "../config/settings.js";
import type { Settings } from "../config/settings.js";
import type { AttachFunction, BrowserConnector } from "./connector.js";
import type { AttachedBrowser, PageHandle, ViewportSize } from "./models.js";

const logger = pino({ name: "browser" });

/**
 * Configuration for the Browser
 */
export interface BrowserConfig {
  cdpUrl?: string;
  useOwnBrowser?: boolean;
  executablePath?: string;
  userDataDir?: string;
  headless?: boolean;
  viewportSize?: ViewportSize;
}

export interface BundledLaunchOptions {
  headless: boolean;
  viewportSize: ViewportSize;
}

export type BundledLauncher = (options: BundledLaunchOptions) => Promise<AttachedBrowser>;

export interface BrowserOptions {
  connector?: BrowserConnector;
  attach?: AttachFunction;
  launchBundled?: BundledLauncher;
}

// How the current page was obtained
export enum SessionMode {
  OWN_CHROME = "own_chrome",
  CDP = "cdp",
  BUNDLED = "bundled",
}

const launchBundledChromium: BundledLauncher = ({ headless, viewportSize }) =>
  chromium.launch({
    headless,
    args: [`--window-size=${viewportSize.width},${viewportSize.height}`],
  });

const attachOverCDP: AttachFunction = (endpointUrl) => chromium.connectOverCDP(endpointUrl);

async function firstPage(browser: AttachedBrowser, viewport: ViewportSize): Promise<PageHandle> {
  const contexts = browser.contexts();
  const context = contexts.length > 0 ? contexts[0] : await browser.newContext({ viewport });
  const pages = context.pages();
  return pages.length > 0 ? pages[0] : context.newPage();
}

function headlessFrom(env: NodeJS.ProcessEnv): boolean {
  const parsed = SettingsSchema.shape.HEADLESS.safeParse(env.HEADLESS?.trim() || undefined);
  if (!parsed.success) {
    logger.warn({ value: env.HEADLESS }, "Ignoring invalid HEADLESS value");
    return false;
  }
  return parsed.data;
}

/**
 * Session over whichever browser is available: an explicit CDP endpoint, the
 * user's own Chrome through the connector, or Playwright's bundled Chromium.
 */
export class Browser {
  private config: BrowserConfig & { headless: boolean; viewportSize: ViewportSize };
  private connector: BrowserConnector | null;
  private attach: AttachFunction;
  private launchBundled: BundledLauncher;

  private playwrightBrowser: AttachedBrowser | null = null;
  private currentPage: PageHandle | null = null;
  private _mode: SessionMode | null = null;

  constructor(config: BrowserConfig = {}, options: BrowserOptions = {}) {
    this.config = {
      ...config,
      headless: config.headless ?? false,
      viewportSize: config.viewportSize ?? { width: 1200, height: 900 },
    };
    this.connector = options.connector ?? null;
    this.attach = options.attach ?? attachOverCDP;
    this.launchBundled = options.launchBundled ?? launchBundledChromium;
  }

  /**
   * Build a config from the variables the auto-configuration step exports.
   * `HEADLESS` is read through the settings schema unless validated settings
   * are passed in.
   */
  static fromEnvironment(
    env: NodeJS.ProcessEnv = process.env,
    options: BrowserOptions = {},
    settings?: Pick<Settings, "HEADLESS">
  ): Browser {
    return new Browser(
      {
        cdpUrl: env.BROWSER_CDP || undefined,
        useOwnBrowser: (env.USE_OWN_BROWSER ?? "").toLowerCase() === "true",
        executablePath: env.BROWSER_PATH || undefined,
        userDataDir: env.BROWSER_USER_DATA || undefined,
        headless: settings?.HEADLESS ?? headlessFrom(env),
      },
      options
    );
  }

  get mode(): SessionMode | null {
    return this._mode;
  }

  /**
   * Pick a browser and return its page. Failures on the CDP and own-Chrome
   * paths fall through to the bundled Chromium.
   */
  async init(): Promise<PageHandle> {
    if (this.currentPage) {
      return this.currentPage;
    }

    const { cdpUrl, useOwnBrowser, executablePath, userDataDir, viewportSize } = this.config;

    if (cdpUrl) {
      logger.info(`Connecting to remote browser via CDP ${cdpUrl}`);
      try {
        this.playwrightBrowser = await this.attach(cdpUrl);
        this.currentPage = await firstPage(this.playwrightBrowser, viewportSize);
        this._mode = SessionMode.CDP;
        return this.currentPage;
      } catch (error) {
        logger.warn({ error }, "CDP connection failed, falling back to bundled Chromium");
        this.playwrightBrowser = null;
      }
    } else if (useOwnBrowser) {
      const page = await this.initOwnChrome(executablePath, userDataDir);
      if (page) {
        this.currentPage = page;
        this._mode = SessionMode.OWN_CHROME;
        return page;
      }
    }

    logger.info("Launching new browser instance");
    this.playwrightBrowser = await this.launchBundled({
      headless: this.config.headless,
      viewportSize,
    });
    this.currentPage = await firstPage(this.playwrightBrowser, viewportSize);
    this._mode = SessionMode.BUNDLED;
    return this.currentPage;
  }

  private async initOwnChrome(
    executablePath: string | undefined,
    userDataDir: string | undefined
  ): Promise<PageHandle | null> {
    if (!this.connector) {
      logger.warn("No connector available for the user's Chrome");
      return null;
    }
    if (!executablePath || !userDataDir) {
      logger.warn(
        { executablePath, userDataDir },
        "Own browser requested but Chrome path or profile is missing"
      );
      return null;
    }

    const outcome = await this.connector.connect(executablePath, userDataDir);
    if (!outcome.ok) {
      logger.warn({ kind: outcome.kind }, `Could not use own Chrome: ${outcome.message}`);
      return null;
    }
    return this.connector.getOrCreatePage();
  }

  /**
   * Get the current page
   */
  async getCurrentPage(): Promise<PageHandle> {
    return this.init();
  }

  async navigateTo(url: string): Promise<void> {
    const page = await this.getCurrentPage();
    await page.goto(url, { waitUntil: "domcontentloaded" });
  }

  /**
   * Release the session. The user's own Chrome is only disconnected.
   */
  async close(): Promise<void> {
    logger.debug("Closing browser");
    const mode = this._mode;
    const browser = this.playwrightBrowser;

    this.playwrightBrowser = null;
    this.currentPage = null;
    this._mode = null;

    if (mode === SessionMode.OWN_CHROME && this.connector) {
      await this.connector.close();
      return;
    }

    if (browser) {
      try {
        await browser.close();
      } catch (error) {
        logger.error({ error }, "Error during browser cleanup");
      }
    }
  }
}
