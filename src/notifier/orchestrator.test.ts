import { describe, it, expect, vi, beforeEach } from "vitest";
import type { ScrapeResult, ListingResult, PollResult } from "../sources";

vi.mock("../sources/mailman", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../sources/mailman")>();
  return { ...actual, scrapeArchive: vi.fn() };
});

vi.mock("../sources/reddit", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../sources/reddit")>();
  return { ...actual, fetchSubreddit: vi.fn() };
});

vi.mock("../sources/rss", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../sources/rss")>();
  return { ...actual, pollFeed: vi.fn() };
});

import { scrapeArchive } from "../sources/mailman";
import { fetchSubreddit } from "../sources/reddit";
import { pollFeed } from "../sources/rss";
import { createSeenRegistry } from "../sources";
import type { SeenRegistry } from "../sources";
import { createTestConfig, createSilentLogger } from "../test-utils/config";
import {
  createNotifierState,
  runAllCycles,
  runFeedsCycle,
  runMailCycle,
  runRedditCycle,
} from "./orchestrator";
import type { MailSourceState, NotifierDeps } from "./orchestrator";
import type { SendResult, EmailResult } from "../delivery";

const PAGE_URL = "https://lists.example.org/pipermail/dev/2025-October/date.html";
const NOW = new Date(2025, 9, 18, 7, 30);

const ARCHIVE_DIR = "https://lists.example.org/pipermail/dev/2025-October/";

const MSG_1 = { subject: "[Dev] Release planning", author: "carol", url: `${ARCHIVE_DIR}000101.html` };
const MSG_2 = { subject: "[Dev] Build broke", author: "alice", url: `${ARCHIVE_DIR}000102.html` };
const MSG_3 = { subject: "Re: Build broke", author: "bob", url: `${ARCHIVE_DIR}000103.html` };

function scrape(items: ScrapeResult["items"], error: string | null = null): ScrapeResult {
  return { pageUrl: PAGE_URL, items, error };
}

const DELIVERED: SendResult = { success: true, messageIds: [1] };
const EMAILED: EmailResult = { success: true, messageId: "msg-1" };

function createDeps(overrides?: Partial<NotifierDeps>): NotifierDeps {
  return {
    config: createTestConfig(),
    sendMessage: vi.fn().mockResolvedValue(DELIVERED),
    sendEmail: vi.fn().mockResolvedValue(EMAILED),
    glyphs: undefined,
    logger: createSilentLogger(),
    ...overrides,
  };
}

function primedRegistry(keys: Array<string>): SeenRegistry {
  const seen = createSeenRegistry();
  seen.markSeen(keys);
  return seen;
}

function mailState(
  seen: SeenRegistry = createSeenRegistry(),
  lastPageUrl: string | null = null,
): MailSourceState {
  return { seen, lastPageUrl };
}

describe("runMailCycle", () => {
  const list = createTestConfig().mailingList!;

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should scrape the archive page of the current month", async () => {
    vi.mocked(scrapeArchive).mockResolvedValue(scrape([]));
    const deps = createDeps();

    await runMailCycle(deps, list, mailState(), NOW);

    expect(scrapeArchive).toHaveBeenCalledTimes(1);
    expect(scrapeArchive).toHaveBeenCalledWith(PAGE_URL, 5000, deps.logger);
  });

  it("should only prime the registry on the first successful scrape", async () => {
    vi.mocked(scrapeArchive).mockResolvedValue(scrape([MSG_1, MSG_2]));
    const deps = createDeps();
    const state = mailState();

    const result = await runMailCycle(deps, list, state, NOW);

    expect(result).toEqual({ source: "mail:Dev list", status: "primed", newCount: 0, skippedCount: 2 });
    expect(state.seen.primed).toBe(true);
    expect(state.seen.size).toBe(2);
    expect(state.lastPageUrl).toBe(PAGE_URL);
    expect(deps.sendMessage).not.toHaveBeenCalled();
  });

  it("should post new mails grouped into threads and email the text digest", async () => {
    vi.mocked(scrapeArchive).mockResolvedValue(scrape([MSG_1, MSG_2, MSG_3]));
    const deps = createDeps();
    const seen = primedRegistry([MSG_1.url]);

    const result = await runMailCycle(deps, list, mailState(seen), NOW);

    expect(result).toEqual({ source: "mail:Dev list", status: "delivered", newCount: 2, skippedCount: 1 });
    expect(deps.sendMessage).toHaveBeenCalledWith(
      "<b>Dev list</b>: 2 new mails in 1 thread\n\n" +
        "- <b>Build broke</b>\n" +
        `    <a href="${MSG_3.url}">bob</a>\n` +
        `    <a href="${MSG_2.url}">alice</a>\n`,
      deps.logger,
    );
    expect(deps.sendEmail).toHaveBeenCalledWith(
      "digest@example.com",
      "Dev list: 2 new mails in 1 thread",
      `Build broke:\n\tbob - <${MSG_3.url}>\n\talice - <${MSG_2.url}>\n\n`,
      deps.logger,
    );
    expect(seen.has(MSG_2.url)).toBe(true);
    expect(seen.has(MSG_3.url)).toBe(true);
  });

  it("should not email when no email sender is configured", async () => {
    vi.mocked(scrapeArchive).mockResolvedValue(scrape([MSG_2]));
    const deps = createDeps({ sendEmail: null });

    const result = await runMailCycle(deps, list, mailState(primedRegistry([])), NOW);

    expect(result.status).toBe("delivered");
    expect(deps.sendMessage).toHaveBeenCalledTimes(1);
  });

  it("should report an empty cycle when every mail was already announced", async () => {
    vi.mocked(scrapeArchive).mockResolvedValue(scrape([MSG_1, MSG_2]));
    const deps = createDeps();

    const result = await runMailCycle(
      deps,
      list,
      mailState(primedRegistry([MSG_1.url, MSG_2.url])),
      NOW,
    );

    expect(result).toEqual({ source: "mail:Dev list", status: "empty", newCount: 0, skippedCount: 2 });
    expect(deps.sendMessage).not.toHaveBeenCalled();
    expect(deps.sendEmail).not.toHaveBeenCalled();
  });

  it("should keep mails unseen when Telegram rejects the digest", async () => {
    vi.mocked(scrapeArchive).mockResolvedValue(scrape([MSG_2]));
    const deps = createDeps({
      sendMessage: vi.fn().mockResolvedValue({ success: false, error: "Bad Request" }),
    });
    const seen = primedRegistry([]);

    const result = await runMailCycle(deps, list, mailState(seen), NOW);

    expect(result.status).toBe("failed");
    expect(seen.has(MSG_2.url)).toBe(false);
    expect(deps.sendEmail).not.toHaveBeenCalled();
  });

  it("should skip the cycle when the scrape fails", async () => {
    vi.mocked(scrapeArchive).mockResolvedValue(scrape([], "HTTP 503: Service Unavailable"));
    const deps = createDeps();
    const state = mailState();

    const result = await runMailCycle(deps, list, state, NOW);

    expect(result).toEqual({ source: "mail:Dev list", status: "failed", newCount: 0, skippedCount: 0 });
    expect(state.seen.primed).toBe(false);
    expect(state.lastPageUrl).toBeNull();
  });

  it("should mark only the threads of accepted parts seen when a later part is rejected", async () => {
    const mails = Array.from({ length: 80 }, (_, index) => ({
      subject: `[Dev] Topic ${index} about the nightly build pipeline`,
      author: `author-${index}`,
      url: `${ARCHIVE_DIR}${String(1000 + index)}.html`,
    }));
    vi.mocked(scrapeArchive).mockResolvedValue(scrape(mails));
    const sendMessage = vi
      .fn()
      .mockResolvedValueOnce(DELIVERED)
      .mockResolvedValueOnce({ success: false, error: "Too Many Requests", sentCount: 0 })
      .mockResolvedValue(DELIVERED);
    const deps = createDeps({ sendMessage });
    const state = mailState(primedRegistry([]));

    const first = await runMailCycle(deps, list, state, NOW);

    expect(first.status).toBe("partial");
    expect(sendMessage).toHaveBeenCalledTimes(2);
    const firstPart: string = sendMessage.mock.calls[0]![0];
    expect(firstPart.length).toBeLessThanOrEqual(4096);
    expect(firstPart.startsWith("<b>Dev list</b>: 80 new mails in 80 threads\n\n")).toBe(true);
    const posted = mails.filter((mail) => firstPart.includes(`"${mail.url}"`));
    expect(posted.length).toBeGreaterThan(0);
    expect(posted.length).toBeLessThan(mails.length);
    for (const mail of mails) {
      expect(state.seen.has(mail.url)).toBe(posted.includes(mail));
    }
    expect(deps.sendEmail).toHaveBeenCalledWith(
      "digest@example.com",
      `Dev list: ${posted.length} new mails in ${posted.length} threads`,
      expect.any(String),
      deps.logger,
    );
    expect(state.lastPageUrl).toBeNull();

    sendMessage.mockClear();
    const second = await runMailCycle(deps, list, state, NOW);

    expect(second).toEqual({
      source: "mail:Dev list",
      status: "delivered",
      newCount: mails.length - posted.length,
      skippedCount: posted.length,
    });
    const resent = sendMessage.mock.calls.map((call) => String(call[0])).join("\n");
    for (const mail of posted) {
      expect(resent.includes(`"${mail.url}"`)).toBe(false);
    }
    expect(mails.every((mail) => state.seen.has(mail.url))).toBe(true);
    expect(sendMessage.mock.calls[1]?.[0]).toMatch(/^<b>Dev list<\/b> \(continued\)\n\n/);
  });

  it("should scrape the previous month once more after the month changes", async () => {
    const october = PAGE_URL;
    const november = "https://lists.example.org/pipermail/dev/2025-November/date.html";
    const late = {
      subject: "[Dev] Late October mail",
      author: "dave",
      url: `${ARCHIVE_DIR}000104.html`,
    };
    const early = {
      subject: "[Dev] Early November mail",
      author: "erin",
      url: "https://lists.example.org/pipermail/dev/2025-November/000001.html",
    };
    const state = mailState();
    const deps = createDeps();

    vi.mocked(scrapeArchive).mockResolvedValueOnce(scrape([MSG_1]));
    await runMailCycle(deps, list, state, new Date(2025, 9, 31, 23, 50));
    expect(state.lastPageUrl).toBe(october);

    vi.mocked(scrapeArchive).mockImplementation(async (pageUrl) => ({
      pageUrl,
      items: pageUrl === october ? [MSG_1, late] : [early],
      error: null,
    }));
    const crossing = await runMailCycle(deps, list, state, new Date(2025, 10, 1, 0, 5));

    expect(vi.mocked(scrapeArchive).mock.calls.slice(1).map((call) => call[0])).toEqual([
      october,
      november,
    ]);
    expect(crossing).toEqual({ source: "mail:Dev list", status: "delivered", newCount: 2, skippedCount: 1 });
    expect(deps.sendMessage).toHaveBeenCalledWith(
      "<b>Dev list</b>: 2 new mails in 2 threads\n\n" +
        "- <b>Early November mail</b>\n" +
        `    <a href="${early.url}">erin</a>\n` +
        "- <b>Late October mail</b>\n" +
        `    <a href="${late.url}">dave</a>\n`,
      deps.logger,
    );
    expect(state.lastPageUrl).toBe(november);

    vi.mocked(scrapeArchive).mockClear();
    await runMailCycle(deps, list, state, new Date(2025, 10, 1, 0, 20));

    expect(scrapeArchive).toHaveBeenCalledTimes(1);
    expect(scrapeArchive).toHaveBeenCalledWith(november, 5000, deps.logger);
  });

  it("should retry the previous month while its page cannot be scraped", async () => {
    const october = PAGE_URL;
    const november = "https://lists.example.org/pipermail/dev/2025-November/date.html";
    const early = {
      subject: "[Dev] Early November mail",
      author: "erin",
      url: "https://lists.example.org/pipermail/dev/2025-November/000001.html",
    };
    vi.mocked(scrapeArchive).mockImplementation(async (pageUrl) =>
      pageUrl === october
        ? { pageUrl, items: [], error: "HTTP 503: Service Unavailable" }
        : { pageUrl, items: [early], error: null },
    );
    const deps = createDeps();
    const state = mailState(primedRegistry([]), october);

    const result = await runMailCycle(deps, list, state, new Date(2025, 10, 1, 0, 5));

    expect(result.status).toBe("delivered");
    expect(state.seen.has(early.url)).toBe(true);
    expect(state.lastPageUrl).toBe(october);
  });
});

describe("runRedditCycle", () => {
  const reddit = createTestConfig().reddit!;

  const TOP = {
    title: "Top post",
    url: "https://example.com/a",
    isSelf: false,
    comments: "https://www.reddit.com/r/testsub/comments/a/",
  };
  const SELF = {
    title: "Self post",
    url: "https://www.reddit.com/r/testsub/comments/b/",
    isSelf: true,
    comments: "https://www.reddit.com/r/testsub/comments/b/",
  };

  function listing(items: ListingResult["items"], error: string | null = null): ListingResult {
    return { subreddit: "testsub", items, error };
  }

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should pass the listing options through", async () => {
    vi.mocked(fetchSubreddit).mockResolvedValue(listing([]));
    const deps = createDeps();

    await runRedditCycle(deps, reddit, createSeenRegistry());

    expect(fetchSubreddit).toHaveBeenCalledWith(
      "testsub",
      { listing: "top", timeFilter: "day", limit: 10, timeoutMs: 5000 },
      deps.logger,
    );
  });

  it("should prime on the first poll", async () => {
    vi.mocked(fetchSubreddit).mockResolvedValue(listing([TOP, SELF]));
    const deps = createDeps();
    const seen = createSeenRegistry();

    const result = await runRedditCycle(deps, reddit, seen);

    expect(result.status).toBe("primed");
    expect(seen.has(TOP.comments)).toBe(true);
    expect(deps.sendMessage).not.toHaveBeenCalled();
  });

  it("should post new posts best first and suppress comments for self posts", async () => {
    vi.mocked(fetchSubreddit).mockResolvedValue(listing([TOP, SELF]));
    const deps = createDeps();

    const result = await runRedditCycle(deps, reddit, primedRegistry([]));

    expect(result).toEqual({ source: "reddit:testsub", status: "delivered", newCount: 2, skippedCount: 0 });
    expect(deps.sendMessage).toHaveBeenCalledWith(
      "<b>r/testsub</b>\n" +
        '- <a href="https://example.com/a">Top post</a> (<a href="https://www.reddit.com/r/testsub/comments/a/">comments</a>)\n' +
        '- <a href="https://www.reddit.com/r/testsub/comments/b/">Self post</a>',
      deps.logger,
    );
  });

  it("should skip posts already announced", async () => {
    vi.mocked(fetchSubreddit).mockResolvedValue(listing([TOP, SELF]));
    const deps = createDeps();

    const result = await runRedditCycle(deps, reddit, primedRegistry([TOP.comments, SELF.comments]));

    expect(result.status).toBe("empty");
    expect(deps.sendMessage).not.toHaveBeenCalled();
  });

  it("should report poll errors", async () => {
    vi.mocked(fetchSubreddit).mockResolvedValue(listing([], "HTTP 429: Too Many Requests"));

    const result = await runRedditCycle(createDeps(), reddit, createSeenRegistry());

    expect(result.status).toBe("failed");
  });
});

describe("runFeedsCycle", () => {
  const FEED_A = { name: "blog-a", url: "https://a.example.com/rss", enabled: true };
  const FEED_B = { name: "blog-b", url: "https://b.example.com/rss", enabled: true };
  const FEED_OFF = { name: "blog-off", url: "https://off.example.com/rss", enabled: false };

  const OLD = {
    guid: "a-1",
    title: "First",
    description: "",
    url: "https://a.example.com/1",
    publishedAt: { instant: new Date("2025-10-13T08:00:00Z"), offsetMinutes: 0 },
  };
  const NEW = {
    guid: "a-2",
    title: "Second",
    description: "",
    url: "https://a.example.com/2",
    publishedAt: { instant: new Date("2025-10-14T16:05:00Z"), offsetMinutes: 120 },
  };

  function poll(feedName: string, items: PollResult["items"], error: string | null = null): PollResult {
    return { feedName, feedTitle: error ? null : `Title of ${feedName}`, items, error };
  }

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should poll only enabled feeds", async () => {
    vi.mocked(pollFeed).mockResolvedValue(poll("blog-a", []));
    const deps = createDeps();

    await runFeedsCycle(deps, [FEED_A, FEED_OFF], new Map(), NOW);

    expect(pollFeed).toHaveBeenCalledTimes(1);
    expect(pollFeed).toHaveBeenCalledWith("blog-a", "https://a.example.com/rss", deps.logger);
  });

  it("should keep a separate registry per feed", async () => {
    vi.mocked(pollFeed).mockImplementation(async (name) =>
      name === "blog-a" ? poll(name, [OLD]) : poll(name, [], "Invalid XML"),
    );
    const deps = createDeps();
    const registries = new Map<string, SeenRegistry>();

    const results = await runFeedsCycle(deps, [FEED_A, FEED_B], registries, NOW);

    expect(results.map((result) => result.status)).toEqual(["primed", "failed"]);
    expect(registries.get(FEED_A.url)?.primed).toBe(true);
    expect(registries.get(FEED_B.url)?.primed).toBe(false);
  });

  it("should post new articles newest first under the feed title", async () => {
    vi.mocked(pollFeed).mockResolvedValue(poll("blog-a", [NEW, OLD]));
    const deps = createDeps();
    const registries = new Map([[FEED_A.url, primedRegistry([OLD.guid])]]);

    const results = await runFeedsCycle(deps, [FEED_A], registries, NOW);

    expect(results).toEqual([
      { source: "feed:blog-a", status: "delivered", newCount: 1, skippedCount: 1 },
    ]);
    expect(deps.sendMessage).toHaveBeenCalledWith(
      "<b>Title of blog-a</b>\n" +
        '- <a href="https://a.example.com/2">Second</a>\n' +
        "    - 14/10/25 18:05",
      deps.logger,
    );
    expect(registries.get(FEED_A.url)?.has(NEW.guid)).toBe(true);
  });

  it("should date undated articles at poll time and title untitled ones by url", async () => {
    const undated = { ...NEW, title: "", publishedAt: null };
    vi.mocked(pollFeed).mockResolvedValue(poll("blog-a", [undated]));
    const deps = createDeps();

    await runFeedsCycle(deps, [FEED_A], new Map([[FEED_A.url, primedRegistry([])]]), NOW);

    expect(deps.sendMessage).toHaveBeenCalledWith(
      "<b>Title of blog-a</b>\n" +
        '- <a href="https://a.example.com/2">https://a.example.com/2</a>\n' +
        "    - 18/10/25 07:30",
      deps.logger,
    );
  });

  it("should return nothing when no feed is enabled", async () => {
    const results = await runFeedsCycle(createDeps(), [FEED_OFF], new Map(), NOW);

    expect(results).toEqual([]);
    expect(pollFeed).not.toHaveBeenCalled();
  });
});

describe("runAllCycles", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should run every configured source once", async () => {
    vi.mocked(scrapeArchive).mockResolvedValue(scrape([MSG_1]));
    vi.mocked(fetchSubreddit).mockResolvedValue({ subreddit: "testsub", items: [], error: null });
    vi.mocked(pollFeed).mockResolvedValue({ feedName: "blog-a", feedTitle: null, items: [], error: null });

    const results = await runAllCycles(createDeps(), createNotifierState());

    expect(results.map((result) => `${result.source}=${result.status}`)).toEqual([
      "mail:Dev list=primed",
      "reddit:testsub=primed",
      "feed:blog-a=primed",
    ]);
  });

  it("should skip sources that are not configured", async () => {
    vi.mocked(pollFeed).mockResolvedValue({ feedName: "blog-a", feedTitle: null, items: [], error: null });
    const deps = createDeps({
      config: createTestConfig({ mailingList: undefined, reddit: undefined }),
    });

    const results = await runAllCycles(deps, createNotifierState());

    expect(results.map((result) => result.source)).toEqual(["feed:blog-a"]);
    expect(scrapeArchive).not.toHaveBeenCalled();
    expect(fetchSubreddit).not.toHaveBeenCalled();
  });
});
