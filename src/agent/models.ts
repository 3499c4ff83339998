import { z } from "zod";
import { ActionModelSchema, ActionResult } from "../controller/models.js";

export const AgentLLMOutputSchema = z.object({
  thought: z.string().min(1),
  action: ActionModelSchema,
  summary: z.string().default(""),
});
export type AgentLLMOutput = z.infer<typeof AgentLLMOutputSchema>;

/**
 * One iteration of the agent loop. `output` is missing when the model's
 * reply could not be used.
 */
export interface AgentStep {
  step: number;
  output?: AgentLLMOutput;
  result: ActionResult;
}

export interface AgentOutput {
  result: ActionResult | null;
  stepCount: number;
  history: AgentStep[];
}

export interface AgentRunOptions {
  task: string;
  maxSteps?: number;
}

export class AgentOutputParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AgentOutputParseError";
  }
}
