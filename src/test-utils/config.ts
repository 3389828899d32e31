import { vi } from "vitest";
import pino from "pino";
import type { Logger } from "pino";
import type { AppConfig } from "../config";

/**
 * Builds a fully-defaulted AppConfig for tests, with optional section overrides.
 */
export function createTestConfig(overrides?: Partial<AppConfig>): AppConfig {
  return {
    telegram: { chatId: "@test-group" },
    mailingList: {
      name: "Dev list",
      archiveUrl: "https://lists.example.org/pipermail/dev/$Y-$M/date.html",
    },
    reddit: {
      subreddit: "testsub",
      listing: "top",
      timeFilter: "day",
      limit: 10,
    },
    feeds: [
      { name: "blog-a", url: "https://a.example.com/rss", enabled: true },
    ],
    email: { recipient: "digest@example.com" },
    schedule: {
      mail: "*/15 * * * *",
      reddit: "0 9 * * *",
      feeds: "0 * * * *",
    },
    polling: { maxConcurrency: 2, timeoutMs: 5000 },
    ...overrides,
  };
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}

/**
 * Creates a Logger whose methods are spies, for asserting on log calls.
 */
export function createMockLogger(): Logger {
  return {
    info: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    level: "info" as const,
    setLevel: vi.fn(),
    child: vi.fn(),
    isLevelEnabled: vi.fn(),
  } as unknown as Logger;
}
