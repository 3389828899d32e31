import type { Logger } from "pino";
import { fetchText } from "./http";
import type { ListingResult, RawPost } from "./types";

export type RedditListing = "top" | "hot" | "new";
export type RedditTimeFilter = "hour" | "day" | "week" | "month" | "year" | "all";

export type ListingOptions = {
  readonly listing: RedditListing;
  readonly timeFilter: RedditTimeFilter;
  readonly limit: number;
  readonly timeoutMs: number;
};

const REDDIT_ORIGIN = "https://www.reddit.com";

function asRecord(value: unknown): Record<string, unknown> {
  if (value && typeof value === "object" && !Array.isArray(value)) {
    // safe: checked for a non-array object above
    return value as Record<string, unknown>;
  }
  return {};
}

function asString(value: unknown): string | null {
  return typeof value === "string" && value.length > 0 ? value : null;
}

export function buildListingUrl(
  subreddit: string,
  options: Pick<ListingOptions, "listing" | "timeFilter" | "limit">,
): string {
  const url = new URL(
    `${REDDIT_ORIGIN}/r/${encodeURIComponent(subreddit)}/${options.listing}.json`,
  );
  url.searchParams.set("raw_json", "1");
  url.searchParams.set("limit", String(Math.max(1, Math.min(100, options.limit))));
  if (options.listing === "top") {
    url.searchParams.set("t", options.timeFilter);
  }
  return url.toString();
}

/**
 * Maps a listing payload to posts, in listing order. Children that are not
 * posts or lack a title or url are skipped.
 */
export function parseListing(payload: unknown): Array<RawPost> {
  const data = asRecord(asRecord(payload)["data"]);
  const children = Array.isArray(data["children"]) ? data["children"] : [];
  const posts: Array<RawPost> = [];

  for (const child of children) {
    const record = asRecord(child);
    if (record["kind"] !== "t3") continue;

    const post = asRecord(record["data"]);
    const title = asString(post["title"]);
    const url = asString(post["url"]);
    if (!title || !url) continue;

    const permalink = asString(post["permalink"]);
    posts.push({
      title,
      url,
      isSelf: post["is_self"] === true,
      comments: permalink ? new URL(permalink, REDDIT_ORIGIN).toString() : null,
    });
  }

  return posts;
}

export async function fetchSubreddit(
  subreddit: string,
  options: ListingOptions,
  logger: Logger,
): Promise<ListingResult> {
  const url = buildListingUrl(subreddit, options);
  try {
    const body = await fetchText(url, options.timeoutMs, "application/json");
    const payload: unknown = JSON.parse(body);
    const items = parseListing(payload);

    logger.info({ subreddit, itemCount: items.length }, "subreddit polled");
    return { subreddit, items, error: null };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ subreddit, url, error: message }, "subreddit poll failed");
    return { subreddit, items: [], error: message };
  }
}
