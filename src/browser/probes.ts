import { execFile } from "child_process";
import { existsSync } from "fs";
import os from "os";
import path from "path";
import pino from "pino";
import { CandidateSource } from "./models.js";

const logger = pino({ name: "probes" });

/**
 * Everything a probe needs from the operating system. Tests pass fakes.
 */
export interface ProbeEnvironment {
  platform: NodeJS.Platform;
  env: NodeJS.ProcessEnv;
  homeDir: string;
  exists(filePath: string): boolean;
  /** Run a command and resolve its stdout, or null if it failed. */
  run(command: string, args: string[]): Promise<string | null>;
}

export function systemProbeEnvironment(): ProbeEnvironment {
  return {
    platform: process.platform,
    env: process.env,
    homeDir: os.homedir(),
    exists: (filePath) => existsSync(filePath),
    run: (command, args) =>
      new Promise((resolve) => {
        // `which a b` exits non-zero if any name is missing but still prints the rest
        execFile(command, args, { timeout: 10000, windowsHide: true }, (_error, stdout) => {
          resolve(stdout.length > 0 ? stdout : null);
        });
      }),
  };
}

export function pathApiFor(platform: NodeJS.Platform): path.PlatformPath {
  return platform === "win32" ? path.win32 : path.posix;
}

export interface ProbeStrategy {
  readonly source: CandidateSource;
  probe(probeEnv: ProbeEnvironment): Promise<string[]>;
}

/**
 * Fixed install locations for the current platform and user.
 */
export class WellKnownPathProbe implements ProbeStrategy {
  readonly source = CandidateSource.WELL_KNOWN_PATH;

  async probe(probeEnv: ProbeEnvironment): Promise<string[]> {
    const { env, homeDir } = probeEnv;
    const p = pathApiFor(probeEnv.platform);
    const paths: string[] = [];

    switch (probeEnv.platform) {
      case "win32": {
        paths.push(
          "C:\\Program Files\\Google\\Chrome\\Application\\chrome.exe",
          "C:\\Program Files (x86)\\Google\\Chrome\\Application\\chrome.exe"
        );
        if (env.PROGRAMFILES) {
          paths.push(p.join(env.PROGRAMFILES, "Google", "Chrome", "Application", "chrome.exe"));
        }
        if (env.LOCALAPPDATA) {
          paths.push(p.join(env.LOCALAPPDATA, "Google", "Chrome", "Application", "chrome.exe"));
        }
        for (const user of [env.USERNAME, env.USER]) {
          if (user) {
            paths.push(
              `C:\\Users\\${user}\\AppData\\Local\\Google\\Chrome\\Application\\chrome.exe`
            );
          }
        }
        break;
      }
      case "darwin":
        paths.push(
          "/Applications/Google Chrome.app/Contents/MacOS/Google Chrome",
          p.join(homeDir, "Applications/Google Chrome.app/Contents/MacOS/Google Chrome"),
          "/Applications/Chromium.app/Contents/MacOS/Chromium"
        );
        break;
      default:
        paths.push(
          "/usr/bin/google-chrome",
          "/usr/bin/google-chrome-stable",
          "/opt/google/chrome/chrome",
          "/usr/bin/chromium",
          "/usr/bin/chromium-browser",
          "/snap/bin/chromium"
        );
    }

    return paths.filter((candidate) => probeEnv.exists(candidate));
  }
}

const REGISTRY_KEYS = [
  "HKLM\\SOFTWARE\\Microsoft\\Windows\\CurrentVersion\\App Paths\\chrome.exe",
  "HKLM\\SOFTWARE\\WOW6432Node\\Microsoft\\Windows\\CurrentVersion\\App Paths\\chrome.exe",
  "HKCU\\SOFTWARE\\Microsoft\\Windows\\CurrentVersion\\App Paths\\chrome.exe",
];

/**
 * Parse the default value out of `reg query <key> /ve` output, e.g.
 * `    (Default)    REG_SZ    C:\Program Files\...\chrome.exe`.
 */
export function parseRegistryDefaultValue(output: string): string | null {
  for (const line of output.split(/\r?\n/)) {
    const match = line.match(/REG_(?:EXPAND_)?SZ\s+(.+)$/);
    if (match) {
      return match[1].trim().replace(/^"|"$/g, "");
    }
  }
  return null;
}

/**
 * Windows App Paths registration. Yields nothing on other platforms.
 */
export class RegistryProbe implements ProbeStrategy {
  readonly source = CandidateSource.REGISTRY;

  async probe(probeEnv: ProbeEnvironment): Promise<string[]> {
    if (probeEnv.platform !== "win32") {
      return [];
    }

    const paths: string[] = [];
    for (const key of REGISTRY_KEYS) {
      const output = await probeEnv.run("reg", ["query", key, "/ve"]);
      if (!output) continue;

      const value = parseRegistryDefaultValue(output);
      if (value && probeEnv.exists(value)) {
        paths.push(value);
      }
    }
    return paths;
  }
}

/**
 * Ask the OS to locate the binary on PATH (`where` / `which`).
 */
export class PathSearchProbe implements ProbeStrategy {
  readonly source = CandidateSource.PATH_SEARCH;

  async probe(probeEnv: ProbeEnvironment): Promise<string[]> {
    const output =
      probeEnv.platform === "win32"
        ? await probeEnv.run("where", ["chrome"])
        : await probeEnv.run("which", [
            "google-chrome",
            "google-chrome-stable",
            "chromium",
            "chromium-browser",
          ]);

    if (!output) {
      return [];
    }

    return output
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0 && probeEnv.exists(line));
  }
}

/**
 * Run a probe, turning any failure into an empty result.
 */
export async function runProbe(
  strategy: ProbeStrategy,
  probeEnv: ProbeEnvironment
): Promise<string[]> {
  try {
    return await strategy.probe(probeEnv);
  } catch (error) {
    logger.warn({ source: strategy.source, error }, "Chrome probe failed");
    return [];
  }
}

export function defaultProbes(): ProbeStrategy[] {
  return [new WellKnownPathProbe(), new RegistryProbe(), new PathSearchProbe()];
}
