import pino from "pino";
import type { PageHandle } from "../browser/models.js";
import { Controller } from "../controller/controller.js";
import { ActionResult } from "../controller/models.js";
import { BaseLLMProvider, Message, MessageRole, errorMessage } from "../llm/llm.js";
import {
  AgentLLMOutput,
  AgentLLMOutputSchema,
  AgentOutput,
  AgentOutputParseError,
  AgentRunOptions,
  AgentStep,
} from "./models.js";
import { stateMessage, systemPrompt } from "./prompts.js";

const logger = pino({ name: "agent" });

export const DEFAULT_MAX_STEPS = 20;

export type PageSource = () => Promise<PageHandle>;

/**
 * Pull the JSON reply out of `<output>` tags (or take the whole reply when
 * there are none) and validate it.
 */
export function parseAgentOutput(content: string): AgentLLMOutput {
  const cleaned = content.replace(/\0/g, "");
  const match = /<output(?:[^>]*)>(.*?)<\/output(?:[^>]*)>/s.exec(cleaned);
  const jsonStr = (match ? match[1] : cleaned).trim();

  let raw: unknown;
  try {
    raw = JSON.parse(jsonStr);
  } catch (error) {
    throw new AgentOutputParseError(
      `Could not parse response: ${errorMessage(error)}\nResponse was: ${jsonStr}`
    );
  }

  const parsed = AgentLLMOutputSchema.safeParse(raw);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join(".")).join(", ");
    throw new AgentOutputParseError(`Invalid agent output, check fields: ${fields}`);
  }
  return parsed.data;
}

/**
 * Agent class that coordinates interactions between LLM, page and controller
 */
export class Agent {
  private llm: BaseLLMProvider;
  private controller: Controller;
  private pageSource: PageSource;

  /**
   * @param pageSource - Supplies the page to act on each step, e.g. the
   * connector's `getOrCreatePage`
   */
  constructor(llm: BaseLLMProvider, controller: Controller, pageSource: PageSource) {
    this.llm = llm;
    this.controller = controller;
    this.pageSource = pageSource;
  }

  async run({ task, maxSteps = DEFAULT_MAX_STEPS }: AgentRunOptions): Promise<AgentOutput> {
    const messages: Message[] = [
      new Message(MessageRole.SYSTEM, systemPrompt(this.controller.getActionDescriptions())),
    ];
    const history: AgentStep[] = [];
    let result: ActionResult | null = null;
    let step = 0;

    while (step < maxSteps) {
      step += 1;
      logger.info(`Step ${step}`);

      const page = await this.pageSource();
      // the task rides along until the model has answered once
      const pendingTask = messages.length === 1 ? task : undefined;
      messages.push(
        new Message(
          MessageRole.USER,
          stateMessage(page.url(), await page.title(), result, pendingTask)
        )
      );

      let output: AgentLLMOutput;
      try {
        const response = await this.llm.call(messages);
        output = parseAgentOutput(response.content);
        messages.push(new Message(MessageRole.ASSISTANT, response.content));
      } catch (error) {
        // drop the state message so the next step sends a fresh one
        messages.pop();
        result = new ActionResult({ error: errorMessage(error) });
        history.push({ step, result });
        logger.warn({ step, error: result.error }, "Model output unusable");
        continue;
      }

      logger.info(`Thought: ${output.thought}`);
      logger.info(`Action: ${JSON.stringify(output.action)}`);

      result = await this.controller.executeAction(output.action, page);
      history.push({ step, output, result });

      if (result.isDone) {
        logger.info(`Task completed in ${step} steps`);
        return { result, stepCount: step, history };
      }
    }

    logger.info("Maximum number of steps reached");
    return { result, stepCount: step, history };
  }
}
