import * as cheerio from "cheerio";
import type { Logger } from "pino";
import { fetchText } from "./http";
import type { RawMail, ScrapeResult } from "./types";

const MONTHS = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
] as const;

/**
 * Fills the `$Y` (year) and `$M` (English month name) placeholders of a
 * pipermail archive url, e.g. `.../pipermail/dev/$Y-$M/date.html`.
 */
export function resolveArchiveUrl(template: string, date: Date): string {
  const month = MONTHS[date.getMonth()] ?? "";
  return template
    .replaceAll("$Y", String(date.getFullYear()))
    .replaceAll("$M", month);
}

function collapse(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Reads the message index of a pipermail archive page.
 *
 * Each message is an `<li>` holding a link to the message and the author in
 * `<i>`; list items without both (the "sorted by" navigation) are skipped.
 * Urls are resolved against the page url. Items keep page order.
 */
export function parseArchivePage(html: string, pageUrl: string): Array<RawMail> {
  const $ = cheerio.load(html);
  const mails: Array<RawMail> = [];

  $("li").each((_, el) => {
    const item = $(el);
    const anchor = item.children("a[href]").first();
    const href = anchor.attr("href");
    const author = collapse(item.children("i").first().text());

    if (!href || href.startsWith("#") || author.length === 0) {
      return;
    }

    mails.push({
      subject: collapse(anchor.text()),
      author,
      url: new URL(href, pageUrl).toString(),
    });
  });

  return mails;
}

export async function scrapeArchive(
  pageUrl: string,
  timeoutMs: number,
  logger: Logger,
): Promise<ScrapeResult> {
  try {
    const html = await fetchText(pageUrl, timeoutMs, "text/html");
    const items = parseArchivePage(html, pageUrl);

    logger.info({ pageUrl, itemCount: items.length }, "archive scraped");
    return { pageUrl, items, error: null };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ pageUrl, error: message }, "archive scrape failed");
    return { pageUrl, items: [], error: message };
  }
}
