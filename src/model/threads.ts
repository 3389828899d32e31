// pattern: functional-core
import type { MailItem } from "./mail";
import { capitalizeSubject, threadKey } from "./subject";
import { POINTER_GLYPH, resolveGlyph } from "./glyph";
import type { GlyphResolver } from "./glyph";
import { escapeHtml, link } from "./html";

type Thread = {
  readonly subject: string;
  readonly mails: Array<MailItem>;
};

/**
 * Mails of one poll cycle partitioned into threads.
 *
 * Threads are keyed by the reply-normalised sanitized subject and keep their
 * creation order; mails keep their append order. Both orders are reversed when
 * rendering so the latest activity comes first.
 */
export class Threads {
  private readonly threads = new Map<string, Thread>();
  private mailCount = 0;

  constructor(private readonly glyphs?: GlyphResolver) {}

  /**
   * Adds a mail to its thread, creating the thread when needed.
   *
   * @returns false without modifying anything when the thread already holds a
   *          mail with the same url.
   */
  append(mail: MailItem): boolean {
    const key = threadKey(mail.subject);
    let thread = this.threads.get(key);

    if (thread) {
      if (thread.mails.some((existing) => existing.equals(mail))) {
        return false;
      }
    } else {
      thread = { subject: mail.subject, mails: [] };
      this.threads.set(key, thread);
    }

    thread.mails.push(mail);
    this.mailCount++;
    return true;
  }

  countThreads(): number {
    return this.threads.size;
  }

  countMails(): number {
    return this.mailCount;
  }

  /**
   * The mails of every thread; threads in creation order, mails in append order.
   */
  groups(): Array<ReadonlyArray<MailItem>> {
    return Array.from(this.threads.values(), (thread) => [...thread.mails]);
  }

  renderText(): string {
    let out = "";
    for (const thread of this.newestFirst()) {
      out += `${thread.subject}:\n`;
      for (const mail of [...thread.mails].reverse()) {
        out += `\t${mail.author} - <${mail.url}>\n`;
      }
      out += "\n";
    }
    return out;
  }

  renderHtml(): string {
    const dash = resolveGlyph(this.glyphs, POINTER_GLYPH);
    let out = "";
    for (const thread of this.newestFirst()) {
      out += `${dash} <b>${escapeHtml(capitalizeSubject(thread.subject))}</b>\n`;
      for (const mail of [...thread.mails].reverse()) {
        out += `    ${link(mail.url, mail.author)}\n`;
      }
    }
    return out;
  }

  private newestFirst(): Array<Thread> {
    return Array.from(this.threads.values()).reverse();
  }
}
