// pattern: functional-core
import { sanitizeSubject } from "./subject";

/**
 * A message from the mailing-list archive.
 *
 * Archive URLs embed the message id, so the url alone identifies a mail; the
 * other fields are carried for rendering only.
 */
export class MailItem {
  readonly subject: string;
  readonly author: string;
  readonly url: string;

  /**
   * @param rawSubject - Subject as shown in the archive, list tag included.
   * @param url - Archive url of the message, taken as-is.
   */
  constructor(rawSubject: string, author: string, url: string) {
    this.subject = sanitizeSubject(rawSubject);
    this.author = author;
    this.url = url;
    Object.freeze(this);
  }

  get key(): string {
    return this.url;
  }

  equals(other: MailItem): boolean {
    return this.key === other.key;
  }

  toString(): string {
    return `Subject: ${this.subject}\n\tAuthor: ${this.author}\n\tURL: ${this.url}`;
  }
}
