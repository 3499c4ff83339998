import OpenAI from "openai";
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

const logger = pino({ name: "openai" });

type OpenAIMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;

export interface OpenAIProviderOptions {
  model: string;
  apiKey: string;
  temperature?: number;
}

export class OpenAIProvider extends BaseLLMProvider {
  private client: OpenAI;
  private temperature: number;

  constructor({ model, apiKey, temperature = 0.7 }: OpenAIProviderOptions) {
    super(model);
    this.client = new OpenAI({ apiKey });
    this.temperature = temperature;
  }

  private toOpenAIFormat(messages: Message[]): OpenAIMessage[] {
    return messages.map((msg): OpenAIMessage => {
      switch (msg.role) {
        case MessageRole.SYSTEM:
          return { role: "system", content: msg.content };
        case MessageRole.ASSISTANT:
          return { role: "assistant", content: msg.content };
        case MessageRole.USER:
          return { role: "user", content: msg.content };
      }
    });
  }

  async call(messages: Message[], options: CallOptions = {}): Promise<LLMResponse> {
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: this.toOpenAIFormat(messages),
        temperature: options.temperature ?? this.temperature,
        max_tokens: options.maxTokens,
      });

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new Error("Invalid response from OpenAI: No content.");
      }

      const usage = response.usage ?? { prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 };

      return LLMResponseSchema.parse({
        content,
        usage: {
          promptTokens: usage.prompt_tokens,
          completionTokens: usage.completion_tokens,
          totalTokens: usage.total_tokens,
        },
      });
    } catch (error) {
      logger.error({ error }, "Error calling OpenAI");
      if (error instanceof z.ZodError) {
        throw new Error(`LLM response validation failed: ${error.message}`);
      }
      throw new Error(`Failed to call OpenAI: ${errorMessage(error)}`);
    }
  }
}
