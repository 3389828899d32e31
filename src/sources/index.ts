export { resolveArchiveUrl, parseArchivePage, scrapeArchive } from "./mailman";
export { buildListingUrl, parseListing, fetchSubreddit } from "./reddit";
export type { RedditListing, RedditTimeFilter, ListingOptions } from "./reddit";
export { pollFeed } from "./rss";
export { createSeenRegistry } from "./seen";
export type { SeenRegistry, SeenPartition } from "./seen";
export type {
  RawMail,
  ScrapeResult,
  RawPost,
  ListingResult,
  RawArticle,
  PollResult,
} from "./types";
