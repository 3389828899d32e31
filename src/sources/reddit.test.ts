import { describe, it, expect, vi, beforeEach } from "vitest";
import pino from "pino";
import { buildListingUrl, parseListing, fetchSubreddit } from "./reddit";
import type { ListingOptions } from "./reddit";

const logger = pino({ level: "silent" });

const options: ListingOptions = {
  listing: "top",
  timeFilter: "day",
  limit: 10,
  timeoutMs: 5000,
};

const LISTING = {
  kind: "Listing",
  data: {
    after: null,
    children: [
      {
        kind: "t3",
        data: {
          title: "Release 2.0 is out",
          url: "https://example.com/release-2",
          is_self: false,
          permalink: "/r/testsub/comments/aaa111/release_20_is_out/",
        },
      },
      {
        kind: "t3",
        data: {
          title: "Weekly questions thread",
          url: "https://www.reddit.com/r/testsub/comments/bbb222/weekly_questions_thread/",
          is_self: true,
          permalink: "/r/testsub/comments/bbb222/weekly_questions_thread/",
        },
      },
      { kind: "t1", data: { body: "a comment, not a post" } },
      { kind: "t3", data: { title: "", url: "https://example.com/untitled" } },
    ],
  },
};

describe("buildListingUrl", () => {
  it("should include the time filter for top listings", () => {
    expect(buildListingUrl("testsub", options)).toBe(
      "https://www.reddit.com/r/testsub/top.json?raw_json=1&limit=10&t=day",
    );
  });

  it("should clamp the limit and omit the time filter for other listings", () => {
    expect(buildListingUrl("testsub", { listing: "new", timeFilter: "day", limit: 500 })).toBe(
      "https://www.reddit.com/r/testsub/new.json?raw_json=1&limit=100",
    );
  });
});

describe("parseListing", () => {
  it("should map posts in listing order with permalink comments", () => {
    expect(parseListing(LISTING)).toEqual([
      {
        title: "Release 2.0 is out",
        url: "https://example.com/release-2",
        isSelf: false,
        comments: "https://www.reddit.com/r/testsub/comments/aaa111/release_20_is_out/",
      },
      {
        title: "Weekly questions thread",
        url: "https://www.reddit.com/r/testsub/comments/bbb222/weekly_questions_thread/",
        isSelf: true,
        comments: "https://www.reddit.com/r/testsub/comments/bbb222/weekly_questions_thread/",
      },
    ]);
  });

  it("should return nothing for malformed payloads", () => {
    expect(parseListing(null)).toEqual([]);
    expect(parseListing({ data: { children: "nope" } })).toEqual([]);
    expect(parseListing([1, 2, 3])).toEqual([]);
  });
});

describe("fetchSubreddit", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should fetch and parse the listing", async () => {
    const fetchMock = vi.fn().mockResolvedValue({
      ok: true,
      status: 200,
      statusText: "OK",
      text: vi.fn().mockResolvedValue(JSON.stringify(LISTING)),
    });
    vi.stubGlobal("fetch", fetchMock);

    const result = await fetchSubreddit("testsub", options, logger);

    expect(result.error).toBeNull();
    expect(result.subreddit).toBe("testsub");
    expect(result.items).toHaveLength(2);
    expect(fetchMock.mock.calls[0]![0]).toBe(
      "https://www.reddit.com/r/testsub/top.json?raw_json=1&limit=10&t=day",
    );
  });

  it("should report HTTP errors without throwing", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue({ ok: false, status: 429, statusText: "Too Many Requests" }),
    );

    const result = await fetchSubreddit("testsub", options, logger);

    expect(result.items).toEqual([]);
    expect(result.error).toBe("HTTP 429: Too Many Requests");
  });

  it("should report invalid JSON without throwing", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue({
        ok: true,
        status: 200,
        statusText: "OK",
        text: vi.fn().mockResolvedValue("<html>maintenance</html>"),
      }),
    );

    const result = await fetchSubreddit("testsub", options, logger);

    expect(result.items).toEqual([]);
    expect(result.error).not.toBeNull();
  });
});
