import {
  BaseLLMProvider,
  DEFAULT_MODELS,
  LLMConfigurationError,
  LLMProviderName,
} from "./llm.js";
import { AnthropicProvider } from "./providers/anthropic.js";
import { GoogleProvider } from "./providers/google.js";
import { OpenAIProvider } from "./providers/openai.js";

export interface LLMProviderConfig {
  provider: LLMProviderName;
  model?: string;
  /** Falls back to the provider's API key variable in `env`. */
  apiKey?: string;
  temperature?: number;
  env?: NodeJS.ProcessEnv;
}

const API_KEY_VARIABLES: Record<LLMProviderName, string> = {
  [LLMProviderName.OPENAI]: "OPENAI_API_KEY",
  [LLMProviderName.ANTHROPIC]: "ANTHROPIC_API_KEY",
  [LLMProviderName.GOOGLE]: "GOOGLE_API_KEY",
};

/**
 * Build a provider, refusing to do so without an API key.
 */
export function getLLMProvider(config: LLMProviderConfig): BaseLLMProvider {
  const { provider, temperature, env = process.env } = config;
  const keyVariable = API_KEY_VARIABLES[provider];
  const apiKey = config.apiKey || env[keyVariable];

  if (!apiKey) {
    throw new LLMConfigurationError(
      `${provider} API key not found. Set the ${keyVariable} environment variable or pass an API key.`
    );
  }

  const model = config.model || DEFAULT_MODELS[provider];

  switch (provider) {
    case LLMProviderName.OPENAI:
      return new OpenAIProvider({ model, apiKey, temperature });
    case LLMProviderName.ANTHROPIC:
      return new AnthropicProvider({ model, apiKey, temperature });
    case LLMProviderName.GOOGLE:
      return new GoogleProvider({ model, apiKey, temperature });
  }
}
