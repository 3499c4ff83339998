import { chromium } from "playwright";
import pino from "pino";
import { Controller } from "../controller/controller.js";
import { parseTask } from "../controller/tasks.js";
import {
  AttachedBrowser,
  ConnectorState,
  ContextHandle,
  FailureKind,
  LaunchDecision,
  NotConnectedError,
  Outcome,
  PageHandle,
  TaskResult,
  failure,
  success,
} from "./models.js";
import {
  DEFAULT_DEBUG_HOST,
  DEFAULT_DEBUG_PORT,
  DEFAULT_POLLING,
  DebugEndpointProbe,
  HttpDebugEndpointProbe,
  ManagedProcess,
  PollingOptions,
  ProcessLauncher,
  SpawnProcessLauncher,
  buildLaunchArgs,
  debugEndpointUrl,
  sleep,
} from "./launcher.js";

const logger = pino({ name: "connector" });

export type AttachFunction = (endpointUrl: string) => Promise<AttachedBrowser>;

const attachOverCDP: AttachFunction = (endpointUrl) => chromium.connectOverCDP(endpointUrl);

export interface ConnectorOptions {
  host?: string;
  port?: number;
  polling?: Partial<PollingOptions>;
  launcher?: ProcessLauncher;
  probe?: DebugEndpointProbe;
  attach?: AttachFunction;
  controller?: Controller;
  /** Called after every successful attach. */
  onAttached?: () => void | Promise<void>;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Launches or finds a remote-debuggable Chrome and attaches to it over CDP.
 *
 * One instance owns one connection. Construct it once and hand it to whatever
 * needs the browser; callers sharing an instance share the session.
 */
export class BrowserConnector {
  private host: string;
  private port: number;
  private polling: PollingOptions;
  private launcher: ProcessLauncher;
  private probe: DebugEndpointProbe;
  private attach: AttachFunction;
  private controller: Controller;
  private onAttached?: () => void | Promise<void>;

  private browser: AttachedBrowser | null = null;
  private context: ContextHandle | null = null;
  private page: PageHandle | null = null;
  private managedProcess: ManagedProcess | null = null;
  private _state: ConnectorState = ConnectorState.UNATTACHED;

  constructor(options: ConnectorOptions = {}) {
    this.host = options.host ?? DEFAULT_DEBUG_HOST;
    this.port = options.port ?? DEFAULT_DEBUG_PORT;
    this.polling = { ...DEFAULT_POLLING, ...options.polling };
    this.launcher = options.launcher ?? new SpawnProcessLauncher();
    this.probe = options.probe ?? new HttpDebugEndpointProbe();
    this.attach = options.attach ?? attachOverCDP;
    this.controller = options.controller ?? new Controller();
    this.onAttached = options.onAttached;
  }

  get state(): ConnectorState {
    return this._state;
  }

  get isAttached(): boolean {
    return this._state === ConnectorState.ATTACHED && this.browser !== null;
  }

  get endpointUrl(): string {
    return debugEndpointUrl(this.host, this.port);
  }

  /**
   * Attach to Chrome, launching it first if nothing answers on the debug
   * port. A no-op when already attached.
   */
  async connect(
    executablePath: string,
    profileDirectory: string
  ): Promise<Outcome<AttachedBrowser>> {
    if (this.isAttached && this.browser) {
      logger.info("Already connected to Chrome");
      return success(this.browser);
    }

    logger.info({ endpoint: this.endpointUrl }, "Connecting to Chrome");
    const launch = await this.ensureDebuggableProcess(executablePath, profileDirectory);
    if (!launch.ok) {
      logger.warn({ kind: launch.kind }, `${launch.message}; attempting to attach anyway`);
    }

    let browser: AttachedBrowser;
    try {
      browser = await this.attach(this.endpointUrl);
    } catch (error) {
      this._state = ConnectorState.UNATTACHED;
      logger.error({ error }, "Could not attach to Chrome");
      return launch.ok
        ? failure(FailureKind.ATTACH_FAILURE, `Attach failed: ${describe(error)}`)
        : failure(launch.kind, `${launch.message}; attach failed: ${describe(error)}`);
    }

    this.browser = browser;
    this.context = null;
    this.page = null;
    this._state = ConnectorState.ATTACHED;
    logger.info("Connected to Chrome");

    if (this.onAttached) {
      try {
        await this.onAttached();
      } catch (error) {
        logger.error({ error }, "onAttached hook failed");
      }
    }

    return success(browser);
  }

  /**
   * Make sure something is listening on the debug port. Launches at most one
   * managed process per connector while it is alive; never throws.
   */
  async ensureDebuggableProcess(
    executablePath: string,
    profileDirectory: string
  ): Promise<Outcome<LaunchDecision>> {
    if (await this.probe.isReachable(this.endpointUrl)) {
      logger.info("Chrome with debugging already running");
      return success(LaunchDecision.ALREADY_RUNNING);
    }

    if (this.managedProcess && this.managedProcess.isAlive()) {
      logger.info({ pid: this.managedProcess.pid }, "Chrome already launched by this connector");
      return success(LaunchDecision.ALREADY_LAUNCHED);
    }

    this._state = ConnectorState.LAUNCHING;
    try {
      this.managedProcess = this.launcher.launch(
        executablePath,
        buildLaunchArgs(this.port, profileDirectory)
      );
    } catch (error) {
      this._state = ConnectorState.UNATTACHED;
      logger.error({ error, executablePath }, "Error launching Chrome with debugging");
      return failure(FailureKind.LAUNCH_FAILURE, `Failed to launch Chrome: ${describe(error)}`);
    }

    this._state = ConnectorState.WAITING_FOR_DEBUG_PORT;
    const { settleDelayMs, intervalMs, maxAttempts } = this.polling;
    await sleep(settleDelayMs);

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (await this.probe.isReachable(this.endpointUrl)) {
        logger.info({ attempt }, "Chrome with debugging started");
        return success(LaunchDecision.LAUNCHED);
      }
      if (attempt < maxAttempts) {
        await sleep(intervalMs);
      }
    }

    this._state = ConnectorState.UNATTACHED;
    logger.warn({ maxAttempts }, "Chrome debugging port not available after timeout");
    return failure(
      FailureKind.LAUNCH_FAILURE,
      `Chrome debugging port not available after ${maxAttempts} attempts`
    );
  }

  private requireBrowser(): AttachedBrowser {
    if (!this.isAttached || !this.browser) {
      throw new NotConnectedError();
    }
    return this.browser;
  }

  async getOrCreateContext(): Promise<ContextHandle> {
    const browser = this.requireBrowser();
    const contexts = browser.contexts();

    if (this.context && contexts.includes(this.context)) {
      return this.context;
    }

    if (contexts.length > 0) {
      this.context = contexts[0];
      logger.info("Using existing browser context");
    } else {
      this.context = await browser.newContext();
      logger.info("Created new browser context");
    }
    return this.context;
  }

  async getOrCreatePage(): Promise<PageHandle> {
    const context = await this.getOrCreateContext();
    const pages = context.pages();

    if (this.page && pages.includes(this.page)) {
      return this.page;
    }

    if (pages.length > 0) {
      this.page = pages[0];
      logger.info("Using existing browser page");
    } else {
      this.page = await context.newPage();
      logger.info("Created new browser page");
    }
    return this.page;
  }

  /**
   * Run a keyword task on the current page. Navigation errors come back as
   * `success: false`; calling this while unattached throws.
   */
  async executeTask(task: string): Promise<TaskResult> {
    this.requireBrowser();

    try {
      const page = await this.getOrCreatePage();
      const action = parseTask(task);
      logger.info({ task, action: action.name }, "Executing task");

      const result = await this.controller.executeAction(action, page);
      if (result.error) {
        return { success: false, message: `Error: ${result.error}` };
      }
      return {
        success: true,
        message: result.content ?? "",
        url: result.url,
        title: result.title,
      };
    } catch (error) {
      logger.error({ error, kind: FailureKind.TASK_EXECUTION_FAILURE }, "Error executing task");
      return { success: false, message: `Error: ${describe(error)}` };
    }
  }

  /**
   * Drop the CDP attachment. Chrome itself stays open for the user.
   */
  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    this.context = null;
    this.page = null;
    this._state = ConnectorState.UNATTACHED;

    if (!browser) {
      return;
    }

    try {
      await browser.close();
      logger.info("Browser connection closed (Chrome left running for user)");
    } catch (error) {
      logger.error({ error }, "Error closing browser connection");
    }
  }

  /**
   * Kill the Chrome process this connector launched, if it is still running.
   * Returns whether a kill was issued.
   */
  forceTerminate(): boolean {
    const managed = this.managedProcess;
    if (!managed || !managed.isAlive()) {
      return false;
    }

    const killed = managed.kill();
    if (killed) {
      // the attachment, if any, was to this process
      this.browser = null;
      this.context = null;
      this.page = null;
      this._state = ConnectorState.UNATTACHED;
      logger.info({ pid: managed.pid }, "Chrome process terminated");
    }
    return killed;
  }
}
