import Anthropic from "@anthropic-ai/sdk";
import pino from "pino";
import { z } from "zod";
import {
  BaseLLMProvider,
  CallOptions,
  LLMResponse,
  LLMResponseSchema,
  Message,
  MessageRole,
  errorMessage,
} from "../llm.js";

const logger = pino({ name: "anthropic" });

export interface AnthropicProviderOptions {
  model: string;
  apiKey: string;
  temperature?: number;
  maxTokens?: number;
}

export class AnthropicProvider extends BaseLLMProvider {
  private client: Anthropic;
  private temperature: number;
  private maxTokens: number;

  constructor({ model, apiKey, temperature = 1, maxTokens = 4096 }: AnthropicProviderOptions) {
    super(model);
    this.client = new Anthropic({ apiKey });
    this.temperature = temperature;
    this.maxTokens = maxTokens;
  }

  async call(messages: Message[], options: CallOptions = {}): Promise<LLMResponse> {
    // Anthropic takes the system prompt separately from the conversation
    const system = messages
      .filter((msg) => msg.role === MessageRole.SYSTEM)
      .map((msg) => msg.content)
      .join("\n\n");

    const conversation: Anthropic.Messages.MessageParam[] = [];
    for (const msg of messages) {
      if (msg.role === MessageRole.USER) {
        conversation.push({ role: "user", content: msg.content });
      } else if (msg.role === MessageRole.ASSISTANT) {
        conversation.push({ role: "assistant", content: msg.content });
      }
    }

    try {
      const response = await this.client.messages.create({
        model: this.model,
        messages: conversation,
        system: system || undefined,
        temperature: options.temperature ?? this.temperature,
        max_tokens: options.maxTokens ?? this.maxTokens,
      });

      let responseContent = "";
      for (const block of response.content) {
        if (block.type === "text") {
          // Concatenate multiple text blocks if they exist
          responseContent += (responseContent ? "\n" : "") + block.text;
        }
      }

      if (!responseContent) {
        throw new Error("Invalid response from Anthropic: No text blocks found.");
      }

      return LLMResponseSchema.parse({
        content: responseContent,
        usage: {
          promptTokens: response.usage.input_tokens,
          completionTokens: response.usage.output_tokens,
          totalTokens: response.usage.input_tokens + response.usage.output_tokens,
        },
      });
    } catch (error) {
      logger.error({ error }, "Error calling Anthropic");
      if (error instanceof z.ZodError) {
        throw new Error(`LLM response validation failed: ${error.message}`);
      }
      throw new Error(`Failed to call Anthropic: ${errorMessage(error)}`);
    }
  }
}
