import type { ActionModel } from "./models.js";

/**
 * Map free text onto one of the default actions. Checked in order:
 * "open google", "open youtube", anything mentioning "search", a raw
 * http(s) URL, and finally a Google search for the whole text.
 */
export function parseTask(task: string): ActionModel {
  const text = task.trim();
  const lower = text.toLowerCase();

  if (lower.includes("open google")) {
    return { name: "open_site", params: { site: "google" } };
  }
  if (lower.includes("open youtube")) {
    return { name: "open_site", params: { site: "youtube" } };
  }
  if (lower.includes("search")) {
    const query = text.replace(/search/gi, "").replace(/\s+/g, " ").trim();
    return { name: "search_google", params: { query } };
  }
  if (/^https?:\/\//i.test(text)) {
    return { name: "go_to_url", params: { url: text } };
  }
  return { name: "search_google", params: { query: text } };
}
