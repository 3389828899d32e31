// pattern: Imperative Shell
import pLimit from "p-limit";
import type { Logger } from "pino";
import type { AppConfig, FeedConfig, MailingListConfig, RedditConfig } from "../config";
import {
  Article,
  Feed,
  MailItem,
  Post,
  Subreddit,
  Threads,
  escapeHtml,
} from "../model";
import type { GlyphResolver, PublicationDate } from "../model";
import {
  createSeenRegistry,
  fetchSubreddit,
  pollFeed,
  resolveArchiveUrl,
  scrapeArchive,
} from "../sources";
import type { PollResult, RawArticle, RawPost, ScrapeResult, SeenRegistry } from "../sources";
import type { SendEmailFn, SendMessageFn } from "../delivery";
import { buildDigestParts } from "./digest";
import type { DigestHeaders, DigestPart } from "./digest";

export type NotifierDeps = {
  readonly config: AppConfig;
  readonly sendMessage: SendMessageFn;
  readonly sendEmail: SendEmailFn | null;
  readonly glyphs: GlyphResolver | undefined;
  readonly logger: Logger;
};

export type MailSourceState = {
  readonly seen: SeenRegistry;
  /**
   * Archive page of the last cycle that left nothing pending. When the month
   * changes it is scraped once more, for mail posted after its last poll.
   */
  lastPageUrl: string | null;
};

/**
 * Per-source record of what has been announced, kept for the life of the
 * process.
 */
export type NotifierState = {
  readonly mail: MailSourceState;
  readonly reddit: SeenRegistry;
  readonly feeds: Map<string, SeenRegistry>;
};

export type CycleStatus = "primed" | "empty" | "delivered" | "partial" | "failed";

export type CycleResult = {
  readonly source: string;
  readonly status: CycleStatus;
  readonly newCount: number;
  readonly skippedCount: number;
};

export function createMailSourceState(): MailSourceState {
  return { seen: createSeenRegistry(), lastPageUrl: null };
}

export function createNotifierState(): NotifierState {
  return {
    mail: createMailSourceState(),
    reddit: createSeenRegistry(),
    feeds: new Map(),
  };
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count !== 1 ? "s" : ""}`;
}

function postKey(post: RawPost): string {
  return post.comments ?? post.url;
}

function articleKey(article: RawArticle): string {
  return article.guid || article.url;
}

function localNow(now: Date): PublicationDate {
  return { instant: now, offsetMinutes: -now.getTimezoneOffset() };
}

function digestHeaders(title: string, separator: string, summary = ""): DigestHeaders {
  return {
    first: `${title}${summary}${separator}`,
    continued: `${title} (continued)${separator}`,
  };
}

/**
 * Sends the parts in order and marks the keys of each accepted part seen right
 * away. Stops at the first rejected part; later parts stay pending.
 *
 * @returns the units that reached the chat
 */
async function deliverParts<T>(
  deps: NotifierDeps,
  source: string,
  parts: ReadonlyArray<DigestPart<T>>,
  keysOf: (unit: T) => ReadonlyArray<string>,
  seen: SeenRegistry,
): Promise<Array<T>> {
  const delivered: Array<T> = [];

  for (const [index, part] of parts.entries()) {
    const sent = await deps.sendMessage(part.html, deps.logger);
    if (!sent.success) {
      deps.logger.error(
        {
          source,
          error: sent.error,
          part: index + 1,
          parts: parts.length,
          chunksSent: sent.sentCount,
        },
        "digest part not delivered",
      );
      break;
    }

    seen.markSeen(part.units.flatMap(keysOf));
    delivered.push(...part.units);
  }

  return delivered;
}

function deliveryStatus(delivered: number, total: number): CycleStatus {
  if (delivered === total) {
    return "delivered";
  }
  return delivered === 0 ? "failed" : "partial";
}

/**
 * Rebuilds a thread collection from groups listed top of the digest first.
 */
function collectThreads(
  groups: ReadonlyArray<ReadonlyArray<MailItem>>,
  glyphs: GlyphResolver | undefined,
): Threads {
  const threads = new Threads(glyphs);
  for (const group of [...groups].reverse()) {
    for (const mail of group) {
      threads.append(mail);
    }
  }
  return threads;
}

function summarize(threads: Threads): string {
  return `${plural(threads.countMails(), "new mail")} in ${plural(threads.countThreads(), "thread")}`;
}

/**
 * Runs one mailing-list cycle: scrape the current month's archive page, group
 * unseen mails into threads, post the HTML digest and, when configured, email
 * the plain-text digest of what was posted.
 *
 * - The first successful scrape only primes the seen registry.
 * - After a month change the previous page is scraped as well until a cycle
 *   leaves nothing pending.
 * - A digest too long for one message goes out in parts of whole threads; the
 *   mails of each accepted part are marked seen, the rest are retried on the
 *   next cycle.
 */
export async function runMailCycle(
  deps: NotifierDeps,
  list: MailingListConfig,
  state: MailSourceState,
  now: Date = new Date(),
): Promise<CycleResult> {
  const { logger } = deps;
  const { seen } = state;
  const source = `mail:${list.name}`;
  const pageUrl = resolveArchiveUrl(list.archiveUrl, now);
  const pageUrls =
    state.lastPageUrl && state.lastPageUrl !== pageUrl
      ? [state.lastPageUrl, pageUrl]
      : [pageUrl];

  const scrapes: Array<ScrapeResult> = [];
  for (const url of pageUrls) {
    const scrape = await scrapeArchive(url, deps.config.polling.timeoutMs, logger);
    if (scrape.error) {
      logger.warn({ source, pageUrl: url, error: scrape.error }, "archive scrape returned error");
    }
    scrapes.push(scrape);
  }

  const scraped = scrapes.filter((scrape) => !scrape.error);
  if (scraped.length === 0) {
    logger.warn({ source }, "no archive page scraped, skipping cycle");
    return { source, status: "failed", newCount: 0, skippedCount: 0 };
  }

  const complete = scraped.length === scrapes.length;
  const items = scraped.flatMap((scrape) => scrape.items);
  const { fresh, skippedCount } = seen.partition(items, (mail) => mail.url);

  if (!seen.primed) {
    seen.markSeen(fresh.map((mail) => mail.url));
    if (complete) {
      state.lastPageUrl = pageUrl;
    }
    logger.info({ source, count: fresh.length }, "seen registry primed");
    return { source, status: "primed", newCount: 0, skippedCount: fresh.length };
  }

  const threads = new Threads(deps.glyphs);
  for (const raw of fresh) {
    if (!threads.append(new MailItem(raw.subject, raw.author, raw.url))) {
      logger.debug({ source, url: raw.url }, "duplicate mail skipped");
    }
  }

  if (threads.countMails() === 0) {
    if (complete) {
      state.lastPageUrl = pageUrl;
    }
    logger.info({ source, skippedCount }, "no new mails");
    return { source, status: "empty", newCount: 0, skippedCount };
  }

  const title = `<b>${escapeHtml(list.name)}</b>`;
  const groups = threads.groups().reverse();
  const parts = buildDigestParts(
    groups,
    (batch) => collectThreads(batch, deps.glyphs).renderHtml(),
    digestHeaders(title, "\n\n", `: ${summarize(threads)}`),
  );

  const delivered = await deliverParts(
    deps,
    source,
    parts,
    (group) => group.map((mail) => mail.url),
    seen,
  );
  const status = deliveryStatus(delivered.length, groups.length);
  const newCount = threads.countMails();

  if (status === "failed") {
    logger.error({ source }, "mail digest not delivered");
    return { source, status, newCount, skippedCount };
  }

  const sent = collectThreads(delivered, deps.glyphs);
  if (deps.sendEmail && deps.config.email) {
    await deps.sendEmail(
      deps.config.email.recipient,
      `${list.name}: ${summarize(sent)}`,
      sent.renderText(),
      logger,
    );
  }

  if (status === "partial") {
    logger.warn(
      { source, mails: sent.countMails(), pending: newCount - sent.countMails() },
      "mail digest partly delivered",
    );
    return { source, status, newCount, skippedCount };
  }

  if (complete) {
    state.lastPageUrl = pageUrl;
  }
  logger.info(
    { source, mails: newCount, threads: threads.countThreads() },
    "mail cycle complete",
  );
  return { source, status, newCount, skippedCount };
}

function collectPosts(
  name: string,
  batch: ReadonlyArray<RawPost>,
  glyphs: GlyphResolver | undefined,
): Subreddit {
  const subreddit = new Subreddit(name, glyphs);
  for (const raw of [...batch].reverse()) {
    subreddit.append(new Post(raw));
  }
  return subreddit;
}

/**
 * Runs one subreddit cycle. The listing arrives best-first, so posts are
 * appended in reverse to render best on top.
 */
export async function runRedditCycle(
  deps: NotifierDeps,
  reddit: RedditConfig,
  seen: SeenRegistry,
): Promise<CycleResult> {
  const { logger } = deps;
  const source = `reddit:${reddit.subreddit}`;

  const listing = await fetchSubreddit(
    reddit.subreddit,
    {
      listing: reddit.listing,
      timeFilter: reddit.timeFilter,
      limit: reddit.limit,
      timeoutMs: deps.config.polling.timeoutMs,
    },
    logger,
  );
  if (listing.error) {
    logger.warn({ source, error: listing.error }, "subreddit poll returned error, skipping cycle");
    return { source, status: "failed", newCount: 0, skippedCount: 0 };
  }

  const { fresh, skippedCount } = seen.partition(listing.items, postKey);

  if (!seen.primed) {
    seen.markSeen(fresh.map(postKey));
    logger.info({ source, count: fresh.length }, "seen registry primed");
    return { source, status: "primed", newCount: 0, skippedCount: fresh.length };
  }

  if (fresh.length === 0) {
    logger.info({ source, skippedCount }, "no new posts");
    return { source, status: "empty", newCount: 0, skippedCount };
  }

  const parts = buildDigestParts(
    fresh,
    (batch) => collectPosts(reddit.subreddit, batch, deps.glyphs).renderHtml(),
    digestHeaders(`<b>r/${escapeHtml(reddit.subreddit)}</b>`, "\n"),
  );
  const delivered = await deliverParts(
    deps,
    source,
    parts,
    (post) => [postKey(post)],
    seen,
  );
  const status = deliveryStatus(delivered.length, fresh.length);

  if (status === "failed") {
    logger.error({ source }, "subreddit digest not delivered");
  } else if (status === "partial") {
    logger.warn(
      { source, posts: delivered.length, pending: fresh.length - delivered.length },
      "subreddit digest partly delivered",
    );
  } else {
    logger.info({ source, posts: fresh.length }, "reddit cycle complete");
  }
  return { source, status, newCount: fresh.length, skippedCount };
}

function toArticle(raw: RawArticle, now: Date): Article {
  return new Article({
    title: raw.title || raw.url,
    description: raw.description,
    url: raw.url,
    date: raw.publishedAt ?? localNow(now),
  });
}

async function deliverFeed(
  deps: NotifierDeps,
  feedConfig: FeedConfig,
  poll: PollResult,
  seen: SeenRegistry,
  now: Date,
): Promise<CycleResult> {
  const { logger } = deps;
  const source = `feed:${feedConfig.name}`;

  if (poll.error) {
    logger.warn({ source, error: poll.error }, "feed poll returned error, skipping feed");
    return { source, status: "failed", newCount: 0, skippedCount: 0 };
  }

  const { fresh, skippedCount } = seen.partition(poll.items, articleKey);

  if (!seen.primed) {
    seen.markSeen(fresh.map(articleKey));
    logger.info({ source, count: fresh.length }, "seen registry primed");
    return { source, status: "primed", newCount: 0, skippedCount: fresh.length };
  }

  if (fresh.length === 0) {
    logger.info({ source, skippedCount }, "no new articles");
    return { source, status: "empty", newCount: 0, skippedCount };
  }

  const feedTitle = poll.feedTitle ?? feedConfig.name;
  // feeds list newest first; each part appends oldest first so it reads newest on top
  const parts = buildDigestParts(
    fresh,
    (batch) => {
      const feed = new Feed(feedTitle, deps.glyphs);
      for (const raw of [...batch].reverse()) {
        feed.append(toArticle(raw, now));
      }
      return feed.renderHtml();
    },
    digestHeaders(`<b>${escapeHtml(feedTitle)}</b>`, "\n"),
  );
  const delivered = await deliverParts(
    deps,
    source,
    parts,
    (article) => [articleKey(article)],
    seen,
  );
  const status = deliveryStatus(delivered.length, fresh.length);

  if (status === "failed") {
    logger.error({ source }, "feed digest not delivered");
  } else if (status === "partial") {
    logger.warn(
      { source, articles: delivered.length, pending: fresh.length - delivered.length },
      "feed digest partly delivered",
    );
  } else {
    logger.info({ source, articles: fresh.length }, "feed delivered");
  }
  return { source, status, newCount: fresh.length, skippedCount };
}

/**
 * Polls every enabled feed with bounded concurrency, then delivers one message
 * per feed in configuration order. Each feed has its own seen registry.
 */
export async function runFeedsCycle(
  deps: NotifierDeps,
  feeds: ReadonlyArray<FeedConfig>,
  registries: Map<string, SeenRegistry>,
  now: Date = new Date(),
): Promise<Array<CycleResult>> {
  const enabled = feeds.filter((feed) => feed.enabled);
  if (enabled.length === 0) {
    return [];
  }

  const limit = pLimit(deps.config.polling.maxConcurrency);
  const polls = await Promise.all(
    enabled.map((feed) => limit(() => pollFeed(feed.name, feed.url, deps.logger))),
  );

  const results: Array<CycleResult> = [];
  for (const [index, feed] of enabled.entries()) {
    const poll = polls[index];
    if (!poll) continue;

    let seen = registries.get(feed.url);
    if (!seen) {
      seen = createSeenRegistry();
      registries.set(feed.url, seen);
    }

    results.push(await deliverFeed(deps, feed, poll, seen, now));
  }

  deps.logger.info({ feedCount: results.length }, "feeds cycle complete");
  return results;
}

/**
 * Runs every configured source once, e.g. at startup to prime the registries.
 */
export async function runAllCycles(
  deps: NotifierDeps,
  state: NotifierState,
): Promise<Array<CycleResult>> {
  const { config } = deps;
  const results: Array<CycleResult> = [];

  if (config.mailingList) {
    results.push(await runMailCycle(deps, config.mailingList, state.mail));
  }
  if (config.reddit) {
    results.push(await runRedditCycle(deps, config.reddit, state.reddit));
  }
  results.push(...(await runFeedsCycle(deps, config.feeds, state.feeds)));

  return results;
}
