import dotenv from "dotenv";
import { z } from "zod";
import { DEFAULT_DEBUG_HOST, DEFAULT_DEBUG_PORT } from "../browser/launcher.js";
import { LLMProviderName } from "../llm/llm.js";
import { DEFAULT_CONFIG_FILE } from "./auto_config.js";

const booleanFromEnv = z
  .string()
  .toLowerCase()
  .pipe(z.enum(["true", "false", "1", "0", "yes", "no"]))
  .transform((value) => value === "true" || value === "1" || value === "yes");

const optionalString = z
  .string()
  .optional()
  .transform((value) => value || undefined);

export const SettingsSchema = z.object({
  CHROME_DEBUG_HOST: z.string().min(1).default(DEFAULT_DEBUG_HOST),
  CHROME_DEBUG_PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_DEBUG_PORT),
  AUTO_CONFIG_FILE: z.string().min(1).default(DEFAULT_CONFIG_FILE),
  HEADLESS: booleanFromEnv.default("false"),
  LLM_PROVIDER: z.nativeEnum(LLMProviderName).default(LLMProviderName.OPENAI),
  LLM_MODEL: optionalString,
  OPENAI_API_KEY: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  GOOGLE_API_KEY: optionalString,
  AGENT_MAX_STEPS: z.coerce.number().int().positive().default(20),
});

export type Settings = z.infer<typeof SettingsSchema>;

export class SettingsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SettingsError";
  }
}

/**
 * Validate settings from an environment. Empty strings count as unset.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== "") {
      present[key] = value.trim();
    }
  }

  const parsed = SettingsSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new SettingsError(`Invalid configuration: ${problems}`);
  }
  return parsed.data;
}

/**
 * Load `.env` into `process.env`, then validate it.
 */
export function loadSettingsFromDotenv(path?: string): Settings {
  dotenv.config(path ? { path } : undefined);
  return loadSettings(process.env);
}
