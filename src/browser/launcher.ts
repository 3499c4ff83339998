import { ChildProcess, spawn } from "child_process";
import pino from "pino";

const logger = pino({ name: "launcher" });

export const DEFAULT_DEBUG_HOST = "localhost";
export const DEFAULT_DEBUG_PORT = 9222;

/**
 * A browser process this component spawned.
 */
export interface ManagedProcess {
  readonly pid?: number;
  /** Polled, not cached: false once the process has exited or failed to spawn. */
  isAlive(): boolean;
  kill(): boolean;
}

export interface ProcessLauncher {
  launch(executablePath: string, args: string[]): ManagedProcess;
}

export interface DebugEndpointProbe {
  isReachable(endpointUrl: string): Promise<boolean>;
}

export interface PollingOptions {
  /** Wait after spawning before the first poll. */
  settleDelayMs: number;
  intervalMs: number;
  maxAttempts: number;
}

export const DEFAULT_POLLING: PollingOptions = {
  settleDelayMs: 3000,
  intervalMs: 1000,
  maxAttempts: 10,
};

export function debugEndpointUrl(host: string, port: number): string {
  return `http://${host}:${port}`;
}

/**
 * Flags applied every time Chrome is launched for remote debugging.
 */
export function buildLaunchArgs(port: number, userDataDir: string): string[] {
  return [
    `--remote-debugging-port=${port}`,
    `--user-data-dir=${userDataDir}`,
    "--no-first-run",
    "--no-default-browser-check",
    "--disable-default-apps",
    "--disable-popup-blocking",
    "--disable-background-timer-throttling",
    "--disable-backgrounding-occluded-windows",
    "--disable-renderer-backgrounding",
    "--disable-features=TranslateUI",
    "--disable-ipc-flooding-protection",
  ];
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

class ChildManagedProcess implements ManagedProcess {
  private child: ChildProcess;
  private exited = false;

  constructor(child: ChildProcess) {
    this.child = child;
    child.once("exit", (code, signal) => {
      this.exited = true;
      logger.info({ pid: child.pid, code, signal }, "Chrome process exited");
    });
    child.once("error", (error) => {
      this.exited = true;
      logger.error({ error }, "Failed to launch Chrome");
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  isAlive(): boolean {
    // no pid means the spawn itself failed
    return (
      this.child.pid !== undefined &&
      !this.exited &&
      this.child.exitCode === null &&
      this.child.signalCode === null
    );
  }

  kill(): boolean {
    return this.child.kill("SIGTERM");
  }
}

/**
 * Spawns Chrome detached from our stdio so it outlives a disconnect.
 */
export class SpawnProcessLauncher implements ProcessLauncher {
  launch(executablePath: string, args: string[]): ManagedProcess {
    logger.info({ executablePath, args }, "Launching Chrome with remote debugging");
    const child = spawn(executablePath, args, { stdio: "ignore", detached: true });
    child.unref();
    return new ChildManagedProcess(child);
  }
}

/**
 * Treats HTTP 200 from `/json/version` as "debug port ready".
 */
export class HttpDebugEndpointProbe implements DebugEndpointProbe {
  private timeoutMs: number;

  constructor(timeoutMs: number = 2000) {
    this.timeoutMs = timeoutMs;
  }

  async isReachable(endpointUrl: string): Promise<boolean> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await fetch(`${endpointUrl}/json/version`, {
        signal: controller.signal,
      });
      return response.status === 200;
    } catch {
      return false;
    } finally {
      clearTimeout(timer);
    }
  }
}
