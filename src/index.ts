/**
 * chrome-pilot - drive the user's own Chrome over the DevTools protocol
 */

// Locator, connector and session
export * from "./browser/models.js";
export * from "./browser/probes.js";
export * from "./browser/detector.js";
export * from "./browser/launcher.js";
export * from "./browser/connector.js";
export * from "./browser/browser.js";

// Configuration
export * from "./config/auto_config.js";
export * from "./config/settings.js";

// Controller
export * from "./controller/models.js";
export * from "./controller/controller.js";
export * from "./controller/default_actions.js";
export * from "./controller/tasks.js";

// LLM providers
export * from "./llm/llm.js";
export * from "./llm/factory.js";
export * from "./llm/providers/openai.js";
export * from "./llm/providers/anthropic.js";
export * from "./llm/providers/google.js";

// Agent
export * from "./agent/models.js";
export * from "./agent/prompts.js";
export * from "./agent/agent.js";
