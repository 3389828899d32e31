// pattern: functional-core
import type { Article } from "./article";
import { CLOCK_GLYPH, POINTER_GLYPH, resolveGlyph } from "./glyph";
import type { GlyphResolver } from "./glyph";

/**
 * Articles of one feed, in the order they were appended.
 */
export class Feed {
  private readonly articles: Array<Article> = [];

  constructor(
    readonly title: string,
    private readonly glyphs?: GlyphResolver,
  ) {}

  append(article: Article): void {
    this.articles.push(article);
  }

  count(): number {
    return this.articles.length;
  }

  renderText(): string {
    return this.newestFirst()
      .map((article) => article.toString())
      .join("\n");
  }

  renderHtml(): string {
    const dash = resolveGlyph(this.glyphs, POINTER_GLYPH);
    const clock = resolveGlyph(this.glyphs, CLOCK_GLYPH);
    return this.newestFirst()
      .map((article) => `${dash} ${article.toHtml(clock)}`)
      .join("\n");
  }

  private newestFirst(): Array<Article> {
    return [...this.articles].reverse();
  }
}
