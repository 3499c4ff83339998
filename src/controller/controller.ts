import pino from "pino";
import { z } from "zod";
import type { PageHandle } from "../browser/models.js";
import { Action, ActionFunction, ActionModel, ActionResult } from "./models.js";
import { registerDefaultActions } from "./default_actions.js";

const logger = pino({ name: "controller" });

/**
 * Controller for page actions with integrated registry functionality
 */
export class Controller {
  private actions: Map<string, Action> = new Map();
  private excludeActions: string[];

  /**
   * @param excludeActions - Action names to leave out of the registry
   */
  constructor(excludeActions: string[] = []) {
    this.excludeActions = excludeActions;

    registerDefaultActions(this);
  }

  /**
   * Register an action whose params are validated against a zod object schema
   */
  registerAction<S extends z.AnyZodObject>(
    name: string,
    description: string,
    paramsSchema: S,
    func: ActionFunction<z.infer<S>>
  ): void {
    if (this.excludeActions.includes(name)) {
      return;
    }

    this.actions.set(name, {
      name,
      description,
      parameters: Object.keys(paramsSchema.shape),
      execute: async (params, page) => func(paramsSchema.parse(params), page),
    });
  }

  hasAction(name: string): boolean {
    return this.actions.has(name);
  }

  /**
   * Execute an action against a page. Failures come back as `error` results.
   */
  async executeAction(action: ActionModel, page: PageHandle): Promise<ActionResult> {
    const { name, params } = action;
    logger.info({ actionName: name, params }, "Executing action");

    const registered = this.actions.get(name);
    if (!registered) {
      return new ActionResult({ error: `Action ${name} not found` });
    }

    try {
      return await registered.execute(params, page);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Error executing action ${name}: ${message}`);
      return new ActionResult({ error: `Error executing action ${name}: ${message}` });
    }
  }

  /**
   * Descriptions of all registered actions for the LLM prompt
   */
  getActionDescriptions(): string {
    const actionInfo: string[] = [];

    for (const action of this.actions.values()) {
      actionInfo.push(
        JSON.stringify(
          {
            name: action.name,
            description: action.description,
            parameters: action.parameters,
          },
          null,
          2
        )
      );
    }

    return actionInfo.join("\n\n");
  }
}
