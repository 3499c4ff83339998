#!/usr/bin/env node
import pino from "pino";
import { Agent } from "./agent/agent.js";
import { Browser } from "./browser/browser.js";
import { BrowserConnector } from "./browser/connector.js";
import { CliArgs, USAGE, UsageError, parseArgs } from "./cli_args.js";
import { AutoConfig, ChromeStatus } from "./config/auto_config.js";
import { Settings, loadSettingsFromDotenv } from "./config/settings.js";
import { Controller } from "./controller/controller.js";
import { getLLMProvider } from "./llm/factory.js";

const logger = pino({ name: "cli" });

function printStatus(status: ChromeStatus): void {
  console.log(`Chrome detected:     ${status.chromeDetected ? "yes" : "no"}`);
  console.log(`Chrome path:         ${status.chromePath ?? "Not set"}`);
  console.log(`User data directory: ${status.userDataDir ?? "Not set"}`);
  console.log(`Use own browser:     ${status.useOwnBrowser ? "yes" : "no"}`);
  console.log(`Executable verified: ${status.executableVerified ? "yes" : "no"}`);
  console.log(`Connection tested:   ${status.connectionTested ? "yes" : "no"}`);
  console.log(status.message);
}

function createConnector(settings: Settings, autoConfig: AutoConfig): BrowserConnector {
  return new BrowserConnector({
    host: settings.CHROME_DEBUG_HOST,
    port: settings.CHROME_DEBUG_PORT,
    onAttached: () => autoConfig.markConnectionTested(),
  });
}

async function configure(args: CliArgs, autoConfig: AutoConfig): Promise<void> {
  if (!args.autoConfig) {
    logger.info("Auto-configuration disabled");
    autoConfig.applyToEnvironment(autoConfig.load());
    return;
  }

  logger.info("Starting automatic Chrome configuration");
  const record = await autoConfig.autoDetectAndConfigure();
  autoConfig.applyToEnvironment(record);
}

async function runTask(args: CliArgs, settings: Settings, autoConfig: AutoConfig): Promise<number> {
  await configure(args, autoConfig);

  const executablePath = process.env.BROWSER_PATH;
  const profileDirectory = process.env.BROWSER_USER_DATA;
  if (process.env.USE_OWN_BROWSER !== "true" || !executablePath || !profileDirectory) {
    console.error("Chrome is not configured. Run `chrome-pilot detect` and check `status`.");
    return 1;
  }

  const connector = createConnector(settings, autoConfig);
  const connected = await connector.connect(executablePath, profileDirectory);
  if (!connected.ok) {
    console.error(`Could not connect to Chrome (${connected.kind}): ${connected.message}`);
    return 1;
  }

  try {
    const result = await connector.executeTask(args.task);
    console.log(result.message);
    if (result.url) console.log(`URL:   ${result.url}`);
    if (result.title) console.log(`Title: ${result.title}`);
    return result.success ? 0 : 1;
  } finally {
    await connector.close();
  }
}

async function runAgent(args: CliArgs, settings: Settings, autoConfig: AutoConfig): Promise<number> {
  const llm = getLLMProvider({
    provider: settings.LLM_PROVIDER,
    model: settings.LLM_MODEL,
  });

  await configure(args, autoConfig);

  const connector = createConnector(settings, autoConfig);
  const browser = Browser.fromEnvironment(process.env, { connector }, settings);
  const agent = new Agent(llm, new Controller(), () => browser.getCurrentPage());

  try {
    const output = await agent.run({
      task: args.task,
      maxSteps: args.maxSteps ?? settings.AGENT_MAX_STEPS,
    });

    console.log(`Steps taken: ${output.stepCount}`);
    const result = output.result;
    if (result?.isDone) {
      console.log(`Final result: ${result.content ?? ""}`);
      return 0;
    }
    console.log(`Stopped without finishing: ${result?.error ?? result?.content ?? "no result"}`);
    return 1;
  } finally {
    await browser.close();
  }
}

async function main(argv: string[]): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`${error.message}\n\n${USAGE}`);
      return 2;
    }
    throw error;
  }

  const settings = loadSettingsFromDotenv();
  const autoConfig = new AutoConfig({ configFile: args.configFile ?? settings.AUTO_CONFIG_FILE });

  switch (args.command) {
    case "help":
      console.log(USAGE);
      return 0;
    case "detect": {
      const record = await autoConfig.autoDetectAndConfigure();
      autoConfig.applyToEnvironment(record);
      console.log(JSON.stringify(record, null, 2));
      printStatus(await autoConfig.status());
      return 0;
    }
    case "status":
      printStatus(await autoConfig.status());
      return 0;
    case "run":
      return runTask(args, settings, autoConfig);
    case "agent":
      return runAgent(args, settings, autoConfig);
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error({ error }, "Fatal error");
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
