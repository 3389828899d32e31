import type { PublicationDate } from "../model";

export type RawMail = {
  readonly subject: string;
  readonly author: string;
  readonly url: string;
};

export type ScrapeResult = {
  readonly pageUrl: string;
  readonly items: ReadonlyArray<RawMail>;
  readonly error: string | null;
};

export type RawPost = {
  readonly title: string;
  readonly url: string;
  readonly isSelf: boolean;
  readonly comments: string | null;
};

export type ListingResult = {
  readonly subreddit: string;
  readonly items: ReadonlyArray<RawPost>;
  readonly error: string | null;
};

export type RawArticle = {
  readonly guid: string;
  readonly title: string;
  readonly description: string;
  readonly url: string;
  readonly publishedAt: PublicationDate | null;
};

export type PollResult = {
  readonly feedName: string;
  readonly feedTitle: string | null;
  readonly items: ReadonlyArray<RawArticle>;
  readonly error: string | null;
};
