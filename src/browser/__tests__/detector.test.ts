import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { chmodSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { ChromeDetector, pickBestCandidate, verifyExecutable } from "../detector.js";
import { CandidateSource } from "../models.js";
import { ProbeStrategy, defaultProbes } from "../probes.js";
import { fakeProbeEnvironment } from "./fakes.js";

const WIN_CHROME = "C:\\Program Files\\Google\\Chrome\\Application\\chrome.exe";
const WIN_LOCAL_CHROME = "C:\\Users\\ana\\AppData\\Local\\Google\\Chrome\\Application\\chrome.exe";

describe("ChromeDetector.findCandidates", () => {
  it("merges probes in priority order without duplicates on Linux", async () => {
    const probeEnv = fakeProbeEnvironment({
      existing: ["/usr/bin/google-chrome", "/snap/bin/chromium", "/home/ana/bin/chromium"],
      commands: {
        "which google-chrome google-chrome-stable chromium chromium-browser":
          "/usr/bin/google-chrome\n/home/ana/bin/chromium\n",
      },
    });

    const candidates = await new ChromeDetector(probeEnv).findCandidates();

    expect(candidates).toEqual([
      { path: "/usr/bin/google-chrome", source: CandidateSource.WELL_KNOWN_PATH },
      { path: "/snap/bin/chromium", source: CandidateSource.WELL_KNOWN_PATH },
      { path: "/home/ana/bin/chromium", source: CandidateSource.PATH_SEARCH },
    ]);
  });

  it("does not query the registry off Windows", async () => {
    const probeEnv = fakeProbeEnvironment({ existing: [] });

    await new ChromeDetector(probeEnv).findCandidates();

    expect(probeEnv.commandsRun.some((line) => line.startsWith("reg "))).toBe(false);
  });

  it("collapses the same Windows install reported by several probes", async () => {
    const probeEnv = fakeProbeEnvironment({
      platform: "win32",
      homeDir: "C:\\Users\\ana",
      env: {
        USERNAME: "ana",
        PROGRAMFILES: "C:\\Program Files",
        LOCALAPPDATA: "C:\\Users\\ana\\AppData\\Local",
      },
      existing: [WIN_CHROME, WIN_LOCAL_CHROME],
      commands: {
        "reg query HKLM\\SOFTWARE\\Microsoft\\Windows\\CurrentVersion\\App Paths\\chrome.exe /ve": [
          "",
          "HKEY_LOCAL_MACHINE\\SOFTWARE\\Microsoft\\Windows\\CurrentVersion\\App Paths\\chrome.exe",
          `    (Default)    REG_SZ    ${WIN_CHROME}`,
          "",
        ].join("\r\n"),
        "where chrome": `${WIN_LOCAL_CHROME}\r\n`,
      },
    });

    const candidates = await new ChromeDetector(probeEnv).findCandidates();

    expect(candidates).toEqual([
      { path: WIN_CHROME, source: CandidateSource.WELL_KNOWN_PATH },
      { path: WIN_LOCAL_CHROME, source: CandidateSource.WELL_KNOWN_PATH },
    ]);
  });

  it("keeps going when one probe throws", async () => {
    const broken: ProbeStrategy = {
      source: CandidateSource.REGISTRY,
      probe: async () => {
        throw new Error("access denied");
      },
    };
    const probeEnv = fakeProbeEnvironment({ existing: ["/usr/bin/google-chrome"] });
    const [wellKnown, , pathSearch] = defaultProbes();

    const candidates = await new ChromeDetector(probeEnv, [
      broken,
      wellKnown,
      pathSearch,
    ]).findCandidates();

    expect(candidates).toEqual([
      { path: "/usr/bin/google-chrome", source: CandidateSource.WELL_KNOWN_PATH },
    ]);
  });
});

describe("ChromeDetector.bestCandidate", () => {
  it("returns null when nothing is installed", async () => {
    const detector = new ChromeDetector(fakeProbeEnvironment());

    expect(await detector.bestCandidate()).toBeNull();
  });

  it("prefers the system-wide install on Windows", async () => {
    const probeEnv = fakeProbeEnvironment({
      platform: "win32",
      homeDir: "C:\\Users\\ana",
      env: { USERNAME: "ana", LOCALAPPDATA: "C:\\Users\\ana\\AppData\\Local" },
      existing: [WIN_CHROME, WIN_LOCAL_CHROME],
    });

    const best = await new ChromeDetector(probeEnv).bestCandidate();

    expect(best?.path).toBe(WIN_CHROME);
  });
});

describe("pickBestCandidate", () => {
  it("skips user-local installs in favour of a system path", () => {
    const best = pickBestCandidate(
      [
        { path: "/home/ana/.local/chrome/chrome", source: CandidateSource.PATH_SEARCH },
        { path: "/opt/google/chrome/chrome", source: CandidateSource.PATH_SEARCH },
      ],
      "linux",
      "/home/ana"
    );

    expect(best?.path).toBe("/opt/google/chrome/chrome");
  });

  it("treats ~/Applications on macOS as user-local", () => {
    const userApp = "/Users/ana/Applications/Google Chrome.app/Contents/MacOS/Google Chrome";
    const systemApp = "/Applications/Google Chrome.app/Contents/MacOS/Google Chrome";

    const best = pickBestCandidate(
      [
        { path: userApp, source: CandidateSource.WELL_KNOWN_PATH },
        { path: systemApp, source: CandidateSource.WELL_KNOWN_PATH },
      ],
      "darwin",
      "/Users/ana"
    );

    expect(best?.path).toBe(systemApp);
  });

  it("falls back to the first candidate", () => {
    const best = pickBestCandidate(
      [
        { path: "/home/ana/chrome", source: CandidateSource.PATH_SEARCH },
        { path: "/srv/chrome", source: CandidateSource.PATH_SEARCH },
      ],
      "linux",
      "/home/ana"
    );

    expect(best?.path).toBe("/home/ana/chrome");
  });

  it("returns null for an empty list", () => {
    expect(pickBestCandidate([], "linux", "/home/ana")).toBeNull();
  });
});

describe("ChromeDetector.findProfileDirectory", () => {
  it("uses ~/.config/google-chrome on Linux", () => {
    const detector = new ChromeDetector(
      fakeProbeEnvironment({
        env: { USER: "ana" },
        existing: ["/home/ana/.config/google-chrome"],
      })
    );

    expect(detector.findProfileDirectory()).toBe("/home/ana/.config/google-chrome");
  });

  it("honours XDG_CONFIG_HOME", () => {
    const detector = new ChromeDetector(
      fakeProbeEnvironment({
        env: { USER: "ana", XDG_CONFIG_HOME: "/data/config" },
        existing: ["/data/config/google-chrome"],
      })
    );

    expect(detector.findProfileDirectory()).toBe("/data/config/google-chrome");
  });

  it("uses Application Support on macOS", () => {
    const profile = "/Users/ana/Library/Application Support/Google/Chrome";
    const detector = new ChromeDetector(
      fakeProbeEnvironment({
        platform: "darwin",
        homeDir: "/Users/ana",
        env: { USER: "ana" },
        existing: [profile],
      })
    );

    expect(detector.findProfileDirectory()).toBe(profile);
  });

  it("uses LOCALAPPDATA on Windows", () => {
    const profile = "C:\\Users\\ana\\AppData\\Local\\Google\\Chrome\\User Data";
    const detector = new ChromeDetector(
      fakeProbeEnvironment({
        platform: "win32",
        homeDir: "C:\\Users\\ana",
        env: { USERNAME: "ana", LOCALAPPDATA: "C:\\Users\\ana\\AppData\\Local" },
        existing: [profile],
      })
    );

    expect(detector.findProfileDirectory()).toBe(profile);
  });

  it("returns null without a user name", () => {
    const detector = new ChromeDetector(
      fakeProbeEnvironment({ env: {}, existing: ["/home/ana/.config/google-chrome"] })
    );

    expect(detector.findProfileDirectory()).toBeNull();
  });

  it("returns null when the directory does not exist", () => {
    const detector = new ChromeDetector(fakeProbeEnvironment({ env: { USER: "ana" } }));

    expect(detector.findProfileDirectory()).toBeNull();
  });
});

describe("verifyExecutable", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "chrome-pilot-test-"));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("accepts an executable file", () => {
    const exe = join(tmpDir, "chrome");
    writeFileSync(exe, "#!/bin/sh\n");
    chmodSync(exe, 0o755);

    expect(verifyExecutable(exe)).toBe(true);
  });

  it("rejects a file without execute permission", () => {
    const file = join(tmpDir, "chrome");
    writeFileSync(file, "");
    chmodSync(file, 0o644);

    expect(verifyExecutable(file)).toBe(false);
  });

  it("rejects a missing path", () => {
    expect(verifyExecutable(join(tmpDir, "missing"))).toBe(false);
    expect(verifyExecutable("")).toBe(false);
  });
});
