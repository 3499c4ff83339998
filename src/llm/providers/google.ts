import { GoogleGenAI, type Content } from "@google/genai";
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

const logger = pino({ name: "google" });

export interface GoogleProviderOptions {
  model: string;
  apiKey: string;
  temperature?: number;
}

/**
 * Split a conversation into Gemini's system instruction and turns.
 * Gemini names the assistant role "model".
 */
export function toGeminiContents(messages: Message[]): {
  systemInstruction: string | undefined;
  contents: Content[];
} {
  const system: string[] = [];
  const contents: Content[] = [];
  for (const msg of messages) {
    switch (msg.role) {
      case MessageRole.SYSTEM:
        system.push(msg.content);
        break;
      case MessageRole.USER:
        contents.push({ role: "user", parts: [{ text: msg.content }] });
        break;
      case MessageRole.ASSISTANT:
        contents.push({ role: "model", parts: [{ text: msg.content }] });
        break;
    }
  }
  return { systemInstruction: system.join("\n\n") || undefined, contents };
}

export class GoogleProvider extends BaseLLMProvider {
  private client: GoogleGenAI;
  private temperature: number;

  constructor({ model, apiKey, temperature = 0 }: GoogleProviderOptions) {
    super(model);
    this.client = new GoogleGenAI({ apiKey });
    this.temperature = temperature;
  }

  async call(messages: Message[], options: CallOptions = {}): Promise<LLMResponse> {
    const { systemInstruction, contents } = toGeminiContents(messages);

    try {
      const response = await this.client.models.generateContent({
        model: this.model,
        contents,
        config: {
          systemInstruction,
          temperature: options.temperature ?? this.temperature,
          maxOutputTokens: options.maxTokens,
        },
      });

      const content = response.text;
      if (!content) {
        throw new Error("Invalid response from Gemini: No text in the first candidate.");
      }

      const usage = response.usageMetadata;
      return LLMResponseSchema.parse({
        content,
        usage: {
          promptTokens: usage?.promptTokenCount ?? 0,
          completionTokens: usage?.candidatesTokenCount ?? 0,
          totalTokens: usage?.totalTokenCount ?? 0,
        },
      });
    } catch (error) {
      logger.error({ error }, "Error calling Gemini");
      if (error instanceof z.ZodError) {
        throw new Error(`LLM response validation failed: ${error.message}`);
      }
      throw new Error(`Failed to call Gemini: ${errorMessage(error)}`);
    }
  }
}
