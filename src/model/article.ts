// pattern: functional-core
import { link } from "./html";
import { formatPublicationDate } from "./publication-date";
import type { PublicationDate } from "./publication-date";

export type ArticleInit = {
  readonly title: string;
  readonly description: string;
  readonly url: string;
  readonly date: PublicationDate;
};

/**
 * An entry of an RSS or Atom feed.
 */
export class Article {
  readonly title: string;
  readonly description: string;
  readonly url: string;
  readonly date: PublicationDate;

  constructor(init: ArticleInit) {
    this.title = init.title;
    this.description = init.description;
    this.url = init.url;
    this.date = init.date;
    Object.freeze(this);
  }

  /**
   * Title link followed by an indented line with the clock glyph and date.
   */
  toHtml(clock: string): string {
    return `${link(this.url, this.title)}\n    ${clock} ${formatPublicationDate(this.date)}`;
  }

  toString(): string {
    return `${this.title} - <${this.url}> (${formatPublicationDate(this.date)})`;
  }
}
