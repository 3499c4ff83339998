// Where a Chrome executable was found, highest confidence first
export enum CandidateSource {
  WELL_KNOWN_PATH = "well_known_path",
  REGISTRY = "registry",
  PATH_SEARCH = "path_search",
}

export interface ExecutableCandidate {
  path: string;
  source: CandidateSource;
}

export enum ConnectorState {
  UNATTACHED = "unattached",
  LAUNCHING = "launching",
  WAITING_FOR_DEBUG_PORT = "waiting_for_debug_port",
  ATTACHED = "attached",
}

export enum FailureKind {
  DETECTION_MISS = "detection_miss",
  LAUNCH_FAILURE = "launch_failure",
  ATTACH_FAILURE = "attach_failure",
  TASK_EXECUTION_FAILURE = "task_execution_failure",
}

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; kind: FailureKind; message: string };

export function success<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function failure<T>(kind: FailureKind, message: string): Outcome<T> {
  return { ok: false, kind, message };
}

export enum LaunchDecision {
  ALREADY_RUNNING = "already_running",
  ALREADY_LAUNCHED = "already_launched",
  LAUNCHED = "launched",
}

export interface TaskResult {
  success: boolean;
  message: string;
  url?: string;
  title?: string;
}

export interface ViewportSize {
  width: number;
  height: number;
}

/**
 * The slice of a Playwright page the connector and controller drive.
 */
export interface PageHandle {
  goto(url: string, options?: { waitUntil?: "load" | "domcontentloaded" }): Promise<unknown>;
  url(): string;
  title(): Promise<string>;
  screenshot(options?: { path?: string; fullPage?: boolean }): Promise<Buffer>;
}

export interface ContextHandle {
  pages(): PageHandle[];
  newPage(): Promise<PageHandle>;
}

export interface AttachedBrowser {
  contexts(): ContextHandle[];
  newContext(options?: { viewport?: ViewportSize }): Promise<ContextHandle>;
  close(): Promise<void>;
}

// Custom Error class for Browser specific errors
export class BrowserError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BrowserError";
  }
}

export class NotConnectedError extends BrowserError {
  constructor(message: string = "Browser not connected") {
    super(message);
    this.name = "NotConnectedError";
  }
}
