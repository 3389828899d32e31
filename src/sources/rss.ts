import Parser from "rss-parser";
import type { Logger } from "pino";
import { parsePublicationDate } from "../model";
import type { PollResult, RawArticle } from "./types";

type FeedParser = Parser<Record<string, unknown>, Record<string, unknown>>;

let parserInstance: FeedParser | null = null;

export function createParser(timeoutMs?: number): FeedParser {
  return new Parser<Record<string, unknown>, Record<string, unknown>>({
    timeout: timeoutMs,
  });
}

export function getParserInstance(): FeedParser {
  if (!parserInstance) {
    parserInstance = createParser();
  }
  return parserInstance;
}

export function setParserInstance(parser: FeedParser): void {
  parserInstance = parser;
}

export function resetParser(): void {
  parserInstance = null;
}

/**
 * Polls one feed. Items keep feed order; a failed poll returns no items and
 * the error message.
 */
export async function pollFeed(
  feedName: string,
  feedUrl: string,
  logger: Logger,
): Promise<PollResult> {
  try {
    const parser = getParserInstance();
    const feed = await parser.parseURL(feedUrl);

    const items: Array<RawArticle> = feed.items.map((item) => {
      const rawDate = item.pubDate ?? item.isoDate;
      return {
        guid: item.guid ?? item.link ?? "",
        title: item.title ?? "",
        description: item.contentSnippet ?? item.summary ?? "",
        url: item.link ?? "",
        publishedAt: rawDate ? parsePublicationDate(rawDate) : null,
      };
    });

    logger.info({ feedName, itemCount: items.length }, "feed polled successfully");
    return { feedName, feedTitle: feed.title ?? null, items, error: null };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ feedName, feedUrl, error: message }, "feed poll failed");
    return { feedName, feedTitle: null, items: [], error: message };
  }
}
