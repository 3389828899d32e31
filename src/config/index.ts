import { readFileSync } from "node:fs";
import { parse } from "yaml";
import { appConfigSchema } from "./schema";
import type { AppConfig, MailingListConfig, RedditConfig, FeedConfig } from "./schema";

/**
 * Reads the notifier's YAML configuration: the Telegram chat, the sources to
 * watch (mailing-list archive, subreddit, feeds), their cron schedules and
 * polling limits. Defaults are filled in by the schema.
 *
 * Secrets are not part of the file; they come from the environment.
 *
 * @throws Error listing every invalid field, one `  - path: message` line each
 */
export function loadConfig(configPath: string): AppConfig {
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to read config file at ${configPath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to parse YAML in ${configPath}: ${message}`);
  }

  const result = appConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`invalid configuration in ${configPath}:\n${issues}`);
  }

  return result.data;
}

export type { AppConfig, MailingListConfig, RedditConfig, FeedConfig };
