// pattern: functional-core

const REPLY_PREFIX = /^\s*(?:re|fwd?|aw)\s*:\s*/i;

/**
 * Removes a leading mailing-list tag such as `[Group] ` from a subject.
 *
 * Everything up to the first `]` plus one separator character is dropped.
 * Subjects without `]` are returned unchanged; a subject ending right after
 * the bracket yields an empty string.
 */
export function sanitizeSubject(raw: string): string {
  const index = raw.indexOf("]");
  if (index === -1) {
    return raw;
  }
  return raw.slice(index + 2);
}

/**
 * Strips leading symbols and upper-cases the first remaining character.
 */
export function capitalizeSubject(subject: string): string {
  const stripped = subject.replace(/^[^\p{L}\p{N}]+/u, "");
  if (stripped.length === 0) {
    return stripped;
  }
  return stripped.charAt(0).toUpperCase() + stripped.slice(1);
}

/**
 * Grouping key for a sanitized subject: reply and forward markers are removed
 * so `Re: Build broke` joins the `Build broke` thread.
 */
export function threadKey(subject: string): string {
  let key = subject;
  while (REPLY_PREFIX.test(key)) {
    key = key.replace(REPLY_PREFIX, "");
  }
  return key.replace(/\s+/g, " ").trim();
}
