import { z } from "zod";

// Enums
export enum MessageRole {
  SYSTEM = "system",
  USER = "user",
  ASSISTANT = "assistant",
}

export enum LLMProviderName {
  OPENAI = "openai",
  ANTHROPIC = "anthropic",
  GOOGLE = "google",
}

export const DEFAULT_MODELS: Record<LLMProviderName, string> = {
  [LLMProviderName.OPENAI]: "gpt-4o",
  [LLMProviderName.ANTHROPIC]: "claude-3-5-sonnet-latest",
  [LLMProviderName.GOOGLE]: "gemini-1.5-flash",
};

// Message class
export class Message {
  role: MessageRole;
  content: string;

  constructor(role: MessageRole, content: string) {
    this.role = role;
    this.content = content;
  }
}

// Zod schema for LLMResponse
export const LLMResponseSchema = z.object({
  content: z.string(),
  usage: z.object({
    promptTokens: z.number(),
    completionTokens: z.number(),
    totalTokens: z.number(),
  }),
});

export type LLMResponse = z.infer<typeof LLMResponseSchema>;

export interface CallOptions {
  temperature?: number;
  maxTokens?: number;
}

export class LLMConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LLMConfigurationError";
  }
}

// Abstract base class for LLM providers
export abstract class BaseLLMProvider {
  model: string;

  constructor(model: string) {
    this.model = model;
  }

  abstract call(messages: Message[], options?: CallOptions): Promise<LLMResponse>;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
