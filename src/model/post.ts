// pattern: functional-core
import { link } from "./html";

export type PostInit = {
  readonly title: string;
  readonly url: string;
  readonly isSelf: boolean;
  /** Comments page, when it differs from `url`. */
  readonly comments?: string | null;
};

/**
 * A subreddit post. Self posts link to their own discussion, so they carry no
 * separate comments link.
 */
export class Post {
  readonly title: string;
  readonly url: string;
  readonly isSelf: boolean;
  readonly comments: string | null;

  constructor(init: PostInit) {
    this.title = init.title;
    this.url = init.url;
    this.isSelf = init.isSelf;
    this.comments = init.isSelf ? null : (init.comments ?? init.url);
    Object.freeze(this);
  }

  toHtml(): string {
    let html = link(this.url, this.title);
    if (this.comments) {
      html += ` (${link(this.comments, "comments")})`;
    }
    return html;
  }

  toString(): string {
    return `${this.title} - <${this.url}>`;
  }
}
