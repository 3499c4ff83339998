import { existsSync, readFileSync, writeFileSync } from "fs";
import pino from "pino";
import { z } from "zod";
import { ChromeDetector } from "../browser/detector.js";

const logger = pino({ name: "auto_config" });

export const DEFAULT_CONFIG_FILE = "chrome_auto_config.json";

const BooleanFlagSchema = z.enum(["true", "false"]);

/**
 * Persisted detection result. Unrecognized keys are dropped on load.
 */
export const ConfigurationRecordSchema = z.object({
  BROWSER_PATH: z.string().optional(),
  USE_OWN_BROWSER: BooleanFlagSchema.optional(),
  BROWSER_USER_DATA: z.string().optional(),
  CONNECTION_TESTED: BooleanFlagSchema.optional(),
});
export type ConfigurationRecord = z.infer<typeof ConfigurationRecordSchema>;

// Keys mirrored into the process environment
export const ENVIRONMENT_KEYS = ["BROWSER_PATH", "USE_OWN_BROWSER", "BROWSER_USER_DATA"] as const;

export interface ChromeStatus {
  chromeDetected: boolean;
  chromePath: string | null;
  userDataDir: string | null;
  useOwnBrowser: boolean;
  executableVerified: boolean;
  connectionTested: boolean;
  message: string;
}

export interface AutoConfigOptions {
  configFile?: string;
  detector?: ChromeDetector;
  env?: NodeJS.ProcessEnv;
}

function statusMessage(status: Omit<ChromeStatus, "message">): string {
  if (!status.chromeDetected) {
    return "Chrome not detected, using Playwright's bundled Chromium";
  }
  if (!status.executableVerified) {
    return `Chrome found at ${status.chromePath} but it is not executable, using Playwright's bundled Chromium`;
  }
  if (!status.useOwnBrowser) {
    return `Chrome found at ${status.chromePath}, own browser disabled`;
  }
  const tested = status.connectionTested ? "connection tested" : "connection not yet tested";
  return `Using your Chrome at ${status.chromePath} (${tested})`;
}

/**
 * Detects Chrome once per run, remembers the result on disk and exports it to
 * the environment. Never launches a browser.
 */
export class AutoConfig {
  readonly configFile: string;
  private detector: ChromeDetector;
  private env: NodeJS.ProcessEnv;

  constructor(options: AutoConfigOptions = {}) {
    this.configFile = options.configFile ?? DEFAULT_CONFIG_FILE;
    this.detector = options.detector ?? new ChromeDetector();
    this.env = options.env ?? process.env;
  }

  async autoDetectAndConfigure(): Promise<ConfigurationRecord> {
    const record: ConfigurationRecord = {};

    try {
      const best = await this.detector.bestCandidate();
      if (best) {
        record.BROWSER_PATH = best.path;
        logger.info({ path: best.path }, "Auto-detected Chrome path");

        if (this.detector.verifyExecutable(best.path)) {
          record.USE_OWN_BROWSER = "true";
          logger.info("Chrome executable verified, will use local browser");
        } else {
          record.USE_OWN_BROWSER = "false";
          logger.warn("Chrome executable not accessible, falling back to Playwright");
        }
      } else {
        record.USE_OWN_BROWSER = "false";
        logger.warn("No Chrome installation found, using Playwright");
      }

      const userDataDir = this.detector.findProfileDirectory();
      if (userDataDir) {
        record.BROWSER_USER_DATA = userDataDir;
        logger.info({ userDataDir }, "Auto-detected Chrome user data directory");
      }

      // a fresh detection has not been connected to yet
      record.CONNECTION_TESTED = "false";
    } catch (error) {
      logger.error({ error }, "Error in auto-configuration");
      return { USE_OWN_BROWSER: "false" };
    }

    this.save(record);
    return record;
  }

  /**
   * Write the record as indented JSON. Returns whether the write succeeded.
   */
  save(record: ConfigurationRecord): boolean {
    try {
      writeFileSync(this.configFile, JSON.stringify(record, null, 2));
      logger.info({ configFile: this.configFile }, "Configuration saved");
      return true;
    } catch (error) {
      logger.error({ error, configFile: this.configFile }, "Error saving configuration");
      return false;
    }
  }

  /**
   * Read the record back. A missing or malformed file loads as `{}`.
   */
  load(): ConfigurationRecord {
    if (!existsSync(this.configFile)) {
      return {};
    }

    try {
      const raw: unknown = JSON.parse(readFileSync(this.configFile, "utf-8"));
      const parsed = ConfigurationRecordSchema.safeParse(raw);
      if (!parsed.success) {
        logger.error(
          { configFile: this.configFile, issues: parsed.error.issues },
          "Invalid configuration file"
        );
        return {};
      }
      logger.info({ configFile: this.configFile }, "Configuration loaded");
      return parsed.data;
    } catch (error) {
      logger.error({ error, configFile: this.configFile }, "Error loading configuration");
      return {};
    }
  }

  applyToEnvironment(record: ConfigurationRecord): void {
    for (const key of ENVIRONMENT_KEYS) {
      const value = record[key];
      if (value) {
        this.env[key] = value;
        logger.info(`Set environment variable ${key}=${value}`);
      }
    }
  }

  /**
   * Record that an attach to the configured Chrome succeeded.
   */
  markConnectionTested(): void {
    const record = this.load();
    this.save({ ...record, CONNECTION_TESTED: "true" });
  }

  /**
   * Snapshot of the persisted configuration. Re-checks the executable on
   * disk but never launches it.
   */
  async status(): Promise<ChromeStatus> {
    const record = this.load();
    const chromePath = record.BROWSER_PATH || null;

    const snapshot = {
      chromeDetected: chromePath !== null,
      chromePath,
      userDataDir: record.BROWSER_USER_DATA || null,
      useOwnBrowser: record.USE_OWN_BROWSER === "true",
      executableVerified: chromePath !== null && this.detector.verifyExecutable(chromePath),
      connectionTested: record.CONNECTION_TESTED === "true",
    };

    return { ...snapshot, message: statusMessage(snapshot) };
  }
}
