import { z } from "zod";
import type { PageHandle } from "../browser/models.js";

export const ActionModelSchema = z.object({
  name: z.string(),
  params: z.record(z.unknown()).default({}),
});
export type ActionModel = z.infer<typeof ActionModelSchema>;

/**
 * Result of an action execution
 */
export class ActionResult {
  isDone: boolean;
  content?: string;
  error?: string;
  url?: string;
  title?: string;

  constructor(
    options: {
      isDone?: boolean;
      content?: string;
      error?: string;
      url?: string;
      title?: string;
    } = {}
  ) {
    const { isDone = false, content, error, url, title } = options;

    this.isDone = isDone;
    this.content = content;
    this.error = error;
    this.url = url;
    this.title = title;
  }
}

export type ActionFunction<P> = (params: P, page: PageHandle) => Promise<ActionResult>;

/**
 * Represents a registered action in the controller
 */
export interface Action {
  name: string;
  description: string;
  parameters: string[];
  execute(params: unknown, page: PageHandle): Promise<ActionResult>;
}
