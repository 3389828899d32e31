export { MailItem } from "./mail";
export { Threads } from "./threads";
export { Post } from "./post";
export type { PostInit } from "./post";
export { Subreddit } from "./subreddit";
export { Article } from "./article";
export type { ArticleInit } from "./article";
export { Feed } from "./feed";
export { parsePublicationDate, formatPublicationDate } from "./publication-date";
export type { PublicationDate } from "./publication-date";
export { sanitizeSubject, capitalizeSubject, threadKey } from "./subject";
export {
  createEmojiResolver,
  resolveGlyph,
  FALLBACK_GLYPH,
  POINTER_GLYPH,
  CLOCK_GLYPH,
} from "./glyph";
export type { GlyphResolver } from "./glyph";
export { escapeHtml } from "./html";
