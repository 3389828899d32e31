// pattern: functional-core
import { TELEGRAM_MESSAGE_LIMIT } from "../delivery";

/**
 * One Telegram message of a digest together with the units (threads, posts or
 * articles) it carries.
 */
export type DigestPart<T> = {
  readonly html: string;
  readonly units: ReadonlyArray<T>;
};

export type DigestHeaders = {
  /** Heading of the first message. */
  readonly first: string;
  /** Heading of every following message. */
  readonly continued: string;
};

/**
 * Groups units into consecutive batches whose rendering stays within `budget`
 * characters. Units are never split across batches; a unit that alone exceeds
 * the budget gets a batch of its own.
 */
export function packUnits<T>(
  units: ReadonlyArray<T>,
  render: (batch: ReadonlyArray<T>) => string,
  budget: number,
): Array<Array<T>> {
  const batches: Array<Array<T>> = [];
  let current: Array<T> = [];

  for (const unit of units) {
    const candidate = [...current, unit];
    if (current.length > 0 && render(candidate).length > budget) {
      batches.push(current);
      current = [unit];
    } else {
      current = candidate;
    }
  }

  if (current.length > 0) {
    batches.push(current);
  }

  return batches;
}

/**
 * Splits a digest into messages that each fit the Telegram limit, headed by
 * `headers.first` and then `headers.continued`.
 *
 * @param units - In the order they should be read, top of the digest first
 */
export function buildDigestParts<T>(
  units: ReadonlyArray<T>,
  render: (batch: ReadonlyArray<T>) => string,
  headers: DigestHeaders,
  limit: number = TELEGRAM_MESSAGE_LIMIT,
): Array<DigestPart<T>> {
  const budget = limit - Math.max(headers.first.length, headers.continued.length);

  return packUnits(units, render, budget).map((batch, index) => ({
    html: `${index === 0 ? headers.first : headers.continued}${render(batch)}`,
    units: batch,
  }));
}
