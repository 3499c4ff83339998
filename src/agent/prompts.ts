import type { ActionResult } from "../controller/models.js";

export function systemPrompt(actionDescriptions: string): string {
  return `You are a browser automation agent working in the user's own Chrome.
Each turn you see the task, the current page URL and title, and the result of your previous action.
Pick exactly one action per turn.

Available actions:

${actionDescriptions}

Reply with a JSON object wrapped in <output> tags:

<output>
{
  "thought": "what you observe and what to do next",
  "action": { "name": "action_name", "params": { } },
  "summary": "one line describing this step"
}
</output>

When the task is complete, use the "done" action with the final answer as its text.`;
}

export function stateMessage(
  url: string,
  title: string,
  previousResult: ActionResult | null,
  task?: string
): string {
  const parts: string[] = [];

  if (task) {
    parts.push(`<task>\n${task}\n</task>`);
  }
  if (previousResult) {
    const output = previousResult.error
      ? `Error: ${previousResult.error}`
      : previousResult.content ?? "";
    parts.push(`<previous_action_output>\n${output}\n</previous_action_output>`);
  }
  parts.push(`Current URL: ${url || "about:blank"}\nPage title: ${title}`);

  return parts.join("\n\n");
}
