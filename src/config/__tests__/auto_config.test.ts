import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  chmodSync,
  existsSync,
  mkdirSync,
  mkdtempSync,
  readFileSync,
  rmSync,
  writeFileSync,
} from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { AutoConfig, ConfigurationRecord } from "../auto_config.js";
import { ChromeDetector } from "../../browser/detector.js";
import { CandidateSource, ExecutableCandidate } from "../../browser/models.js";
import type { ProbeEnvironment, ProbeStrategy } from "../../browser/probes.js";

function fixedProbe(paths: string[]): ProbeStrategy {
  return { source: CandidateSource.PATH_SEARCH, probe: async () => paths };
}

class BrokenDetector extends ChromeDetector {
  async bestCandidate(): Promise<ExecutableCandidate | null> {
    throw new Error("probe crashed");
  }
}

describe("AutoConfig", () => {
  let tmpDir: string;
  let configFile: string;
  let probeEnv: ProbeEnvironment;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "chrome-pilot-config-"));
    configFile = join(tmpDir, "chrome_auto_config.json");
    probeEnv = {
      platform: "linux",
      env: { USER: "ana" },
      homeDir: tmpDir,
      exists: (filePath) => existsSync(filePath),
      run: async () => null,
    };
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  function makeExecutable(mode: number): string {
    const exe = join(tmpDir, "chrome");
    writeFileSync(exe, "#!/bin/sh\n");
    chmodSync(exe, mode);
    return exe;
  }

  function makeProfile(): string {
    const profile = join(tmpDir, ".config", "google-chrome");
    mkdirSync(profile, { recursive: true });
    return profile;
  }

  describe("autoDetectAndConfigure", () => {
    it("records a verified Chrome and its profile", async () => {
      const exe = makeExecutable(0o755);
      const profile = makeProfile();
      const autoConfig = new AutoConfig({
        configFile,
        detector: new ChromeDetector(probeEnv, [fixedProbe([exe])]),
        env: {},
      });

      const record = await autoConfig.autoDetectAndConfigure();

      expect(record).toEqual({
        BROWSER_PATH: exe,
        USE_OWN_BROWSER: "true",
        BROWSER_USER_DATA: profile,
        CONNECTION_TESTED: "false",
      });
      expect(JSON.parse(readFileSync(configFile, "utf-8"))).toEqual(record);
    });

    it("disables the own browser when the binary is not executable", async () => {
      const exe = makeExecutable(0o644);
      const autoConfig = new AutoConfig({
        configFile,
        detector: new ChromeDetector(probeEnv, [fixedProbe([exe])]),
        env: {},
      });

      const record = await autoConfig.autoDetectAndConfigure();

      expect(record).toEqual({
        BROWSER_PATH: exe,
        USE_OWN_BROWSER: "false",
        CONNECTION_TESTED: "false",
      });
    });

    it("falls back to Playwright when nothing is found", async () => {
      const autoConfig = new AutoConfig({
        configFile,
        detector: new ChromeDetector(probeEnv, []),
        env: {},
      });

      expect(await autoConfig.autoDetectAndConfigure()).toEqual({
        USE_OWN_BROWSER: "false",
        CONNECTION_TESTED: "false",
      });
    });

    it("returns the fallback record without writing when detection throws", async () => {
      const autoConfig = new AutoConfig({
        configFile,
        detector: new BrokenDetector(probeEnv, []),
        env: {},
      });

      expect(await autoConfig.autoDetectAndConfigure()).toEqual({ USE_OWN_BROWSER: "false" });
      expect(existsSync(configFile)).toBe(false);
    });

    it("overwrites the previous record and resets the connection flag", async () => {
      const exe = makeExecutable(0o755);
      const autoConfig = new AutoConfig({
        configFile,
        detector: new ChromeDetector(probeEnv, [fixedProbe([exe])]),
        env: {},
      });
      autoConfig.save({ BROWSER_PATH: "/old/chrome", CONNECTION_TESTED: "true" });

      await autoConfig.autoDetectAndConfigure();

      expect(autoConfig.load()).toEqual({
        BROWSER_PATH: exe,
        USE_OWN_BROWSER: "true",
        CONNECTION_TESTED: "false",
      });
    });
  });

  describe("save and load", () => {
    it("round-trips a partial record", () => {
      const autoConfig = new AutoConfig({ configFile, env: {} });
      const record: ConfigurationRecord = { BROWSER_USER_DATA: "/home/ana/.config/google-chrome" };

      expect(autoConfig.save(record)).toBe(true);
      expect(autoConfig.load()).toEqual(record);
    });

    it("loads an empty record when the file is missing", () => {
      expect(new AutoConfig({ configFile, env: {} }).load()).toEqual({});
    });

    it("loads an empty record from malformed JSON", () => {
      writeFileSync(configFile, "{ not json");

      expect(new AutoConfig({ configFile, env: {} }).load()).toEqual({});
    });

    it("loads an empty record when a value has the wrong shape", () => {
      writeFileSync(configFile, JSON.stringify({ USE_OWN_BROWSER: "maybe" }));

      expect(new AutoConfig({ configFile, env: {} }).load()).toEqual({});
    });

    it("drops keys it does not know", () => {
      writeFileSync(configFile, JSON.stringify({ BROWSER_PATH: "/usr/bin/chromium", THEME: "Ocean" }));

      expect(new AutoConfig({ configFile, env: {} }).load()).toEqual({
        BROWSER_PATH: "/usr/bin/chromium",
      });
    });

    it("reports a failed write", () => {
      const autoConfig = new AutoConfig({ configFile: join(tmpDir, "missing", "config.json"), env: {} });

      expect(autoConfig.save({ USE_OWN_BROWSER: "false" })).toBe(false);
    });
  });

  describe("applyToEnvironment", () => {
    it("writes non-empty browser keys only", () => {
      const env: NodeJS.ProcessEnv = { BROWSER_PATH: "/usr/bin/chromium" };
      const autoConfig = new AutoConfig({ configFile, env });

      autoConfig.applyToEnvironment({
        BROWSER_PATH: "",
        USE_OWN_BROWSER: "true",
        BROWSER_USER_DATA: "/home/ana/.config/chromium",
        CONNECTION_TESTED: "true",
      });

      expect(env).toEqual({
        BROWSER_PATH: "/usr/bin/chromium",
        USE_OWN_BROWSER: "true",
        BROWSER_USER_DATA: "/home/ana/.config/chromium",
      });
    });
  });

  describe("status", () => {
    it("reports a missing configuration", async () => {
      const status = await new AutoConfig({ configFile, env: {} }).status();

      expect(status).toEqual({
        chromeDetected: false,
        chromePath: null,
        userDataDir: null,
        useOwnBrowser: false,
        executableVerified: false,
        connectionTested: false,
        message: "Chrome not detected, using Playwright's bundled Chromium",
      });
    });

    it("reflects detection and the connection test", async () => {
      const exe = makeExecutable(0o755);
      const profile = makeProfile();
      const autoConfig = new AutoConfig({
        configFile,
        detector: new ChromeDetector(probeEnv, [fixedProbe([exe])]),
        env: {},
      });
      await autoConfig.autoDetectAndConfigure();

      const before = await autoConfig.status();
      autoConfig.markConnectionTested();
      const after = await autoConfig.status();

      expect(before).toEqual({
        chromeDetected: true,
        chromePath: exe,
        userDataDir: profile,
        useOwnBrowser: true,
        executableVerified: true,
        connectionTested: false,
        message: `Using your Chrome at ${exe} (connection not yet tested)`,
      });
      expect(after.connectionTested).toBe(true);
      expect(after.message).toBe(`Using your Chrome at ${exe} (connection tested)`);
    });

    it("re-verifies the executable on disk", async () => {
      const autoConfig = new AutoConfig({ configFile, env: {} });
      autoConfig.save({ BROWSER_PATH: join(tmpDir, "deleted-chrome"), USE_OWN_BROWSER: "true" });

      const status = await autoConfig.status();

      expect(status.chromeDetected).toBe(true);
      expect(status.executableVerified).toBe(false);
      expect(status.message).toBe(
        `Chrome found at ${join(tmpDir, "deleted-chrome")} but it is not executable, using Playwright's bundled Chromium`
      );
    });
  });
});
