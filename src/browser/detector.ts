import { accessSync, constants, existsSync } from "fs";
import pino from "pino";
import { ExecutableCandidate } from "./models.js";
import {
  ProbeEnvironment,
  ProbeStrategy,
  defaultProbes,
  pathApiFor,
  runProbe,
  systemProbeEnvironment,
} from "./probes.js";

const logger = pino({ name: "detector" });

/**
 * Substrings that mark a system-wide install, per platform.
 */
function systemInstallMarkers(platform: NodeJS.Platform): string[] {
  switch (platform) {
    case "win32":
      return ["Program Files"];
    case "darwin":
      return ["/Applications/"];
    default:
      return ["/usr/", "/opt/", "/snap/"];
  }
}

/**
 * Prefer a system-wide install over a user-local one; otherwise the first
 * candidate wins.
 */
export function pickBestCandidate(
  candidates: ExecutableCandidate[],
  platform: NodeJS.Platform,
  homeDir: string
): ExecutableCandidate | null {
  if (candidates.length === 0) {
    return null;
  }

  const markers = systemInstallMarkers(platform);
  const systemWide = candidates.find(
    (candidate) =>
      !(homeDir && candidate.path.startsWith(homeDir)) &&
      markers.some((marker) => candidate.path.includes(marker))
  );

  return systemWide ?? candidates[0];
}

/**
 * Check that a file exists and is executable. Never launches it.
 */
export function verifyExecutable(executablePath: string): boolean {
  try {
    if (!executablePath || !existsSync(executablePath)) {
      logger.warn({ executablePath }, "Chrome executable not found");
      return false;
    }
    accessSync(executablePath, constants.X_OK);
    logger.info({ executablePath }, "Chrome executable verified");
    return true;
  } catch (error) {
    logger.warn({ executablePath, error }, "Chrome executable not accessible");
    return false;
  }
}

/**
 * Locates a local Chrome install and its profile directory.
 */
export class ChromeDetector {
  private probeEnv: ProbeEnvironment;
  private probes: ProbeStrategy[];

  /**
   * @param probeEnv - OS access, the real system by default
   * @param probes - Strategies in priority order
   */
  constructor(
    probeEnv: ProbeEnvironment = systemProbeEnvironment(),
    probes: ProbeStrategy[] = defaultProbes()
  ) {
    this.probeEnv = probeEnv;
    this.probes = probes;
  }

  /**
   * All Chrome executables found, de-duplicated, in probe order.
   */
  async findCandidates(): Promise<ExecutableCandidate[]> {
    const p = pathApiFor(this.probeEnv.platform);
    const seen = new Set<string>();
    const candidates: ExecutableCandidate[] = [];

    for (const strategy of this.probes) {
      const found = await runProbe(strategy, this.probeEnv);

      for (const rawPath of found) {
        const resolved = p.resolve(rawPath);
        if (seen.has(resolved)) continue;

        seen.add(resolved);
        candidates.push({ path: resolved, source: strategy.source });
        logger.info({ path: resolved, source: strategy.source }, "Found Chrome");
      }
    }

    return candidates;
  }

  async bestCandidate(): Promise<ExecutableCandidate | null> {
    const candidates = await this.findCandidates();
    const best = pickBestCandidate(candidates, this.probeEnv.platform, this.probeEnv.homeDir);

    if (best) {
      logger.info({ path: best.path }, "Selected Chrome");
    } else {
      logger.warn("No Chrome installation found");
    }
    return best;
  }

  /**
   * Chrome's user-data directory for the current user, if it exists.
   */
  findProfileDirectory(): string | null {
    const { env, homeDir, platform } = this.probeEnv;
    const p = pathApiFor(platform);

    const username = env.USERNAME || env.USER;
    if (!username) {
      return null;
    }

    let profileDir: string;
    switch (platform) {
      case "win32":
        if (!env.LOCALAPPDATA) return null;
        profileDir = p.join(env.LOCALAPPDATA, "Google", "Chrome", "User Data");
        break;
      case "darwin":
        profileDir = p.join(homeDir, "Library", "Application Support", "Google", "Chrome");
        break;
      default:
        profileDir = p.join(env.XDG_CONFIG_HOME || p.join(homeDir, ".config"), "google-chrome");
    }

    if (this.probeEnv.exists(profileDir)) {
      logger.info({ profileDir }, "Found Chrome user data directory");
      return profileDir;
    }

    logger.warn({ profileDir }, "Chrome user data directory not found");
    return null;
  }

  verifyExecutable(executablePath: string): boolean {
    return verifyExecutable(executablePath);
  }
}
