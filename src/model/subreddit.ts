// pattern: functional-core
import type { Post } from "./post";
import { POINTER_GLYPH, resolveGlyph } from "./glyph";
import type { GlyphResolver } from "./glyph";

/**
 * Posts of one subreddit listing, in the order they were appended.
 */
export class Subreddit {
  private readonly posts: Array<Post> = [];

  constructor(
    readonly name: string,
    private readonly glyphs?: GlyphResolver,
  ) {}

  append(post: Post): void {
    this.posts.push(post);
  }

  count(): number {
    return this.posts.length;
  }

  renderText(): string {
    return this.newestFirst()
      .map((post) => post.toString())
      .join("\n");
  }

  renderHtml(): string {
    const dash = resolveGlyph(this.glyphs, POINTER_GLYPH);
    return this.newestFirst()
      .map((post) => `${dash} ${post.toHtml()}`)
      .join("\n");
  }

  private newestFirst(): Array<Post> {
    return [...this.posts].reverse();
  }
}
