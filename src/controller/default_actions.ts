import pino from "pino";
import { z } from "zod";
import { ActionResult } from "./models.js";
import type { Controller } from "./controller.js";

const logger = pino({ name: "default_actions" });

export const KNOWN_SITES = {
  google: { name: "Google", url: "https://www.google.com" },
  youtube: { name: "YouTube", url: "https://www.youtube.com" },
} as const;

export type KnownSite = keyof typeof KNOWN_SITES;

export function googleSearchUrl(query: string): string {
  return `https://www.google.com/search?q=${encodeURIComponent(query)}`;
}

/**
 * Register the default set of actions with the controller
 */
export function registerDefaultActions(controller: Controller): void {
  controller.registerAction(
    "done",
    "Complete task",
    z.object({ text: z.string() }),
    async ({ text }) => new ActionResult({ isDone: true, content: text })
  );

  controller.registerAction(
    "open_site",
    `Open a well-known site in the current tab. One of: ${Object.keys(KNOWN_SITES).join(", ")}`,
    z.object({ site: z.enum(["google", "youtube"]) }),
    async ({ site }, page) => {
      const target = KNOWN_SITES[site];
      await page.goto(target.url);
      const msg = `Opened ${target.name} successfully`;
      logger.info(msg);
      return new ActionResult({ content: msg, url: page.url(), title: await page.title() });
    }
  );

  controller.registerAction(
    "search_google",
    "Search Google for the query in the current tab.",
    z.object({ query: z.string() }),
    async ({ query }, page) => {
      await page.goto(googleSearchUrl(query));
      const msg = `Searched for: ${query}`;
      logger.info(msg);
      return new ActionResult({ content: msg, url: page.url(), title: await page.title() });
    }
  );

  controller.registerAction(
    "go_to_url",
    "Navigate to URL in the current tab",
    z.object({ url: z.string() }),
    async ({ url }, page) => {
      await page.goto(url, { waitUntil: "domcontentloaded" });
      const msg = `Navigated to: ${url}`;
      logger.info(msg);
      return new ActionResult({ content: msg, url: page.url(), title: await page.title() });
    }
  );
}
