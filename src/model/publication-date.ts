// pattern: functional-core

/**
 * A publication timestamp together with the UTC offset the source reported,
 * so it can be printed in the source's own wall-clock time.
 */
export type PublicationDate = Readonly<{
  instant: Date;
  offsetMinutes: number;
}>;

const NAMED_OFFSETS: Readonly<Record<string, number>> = {
  Z: 0,
  UT: 0,
  UTC: 0,
  GMT: 0,
  EST: -5 * 60,
  EDT: -4 * 60,
  CST: -6 * 60,
  CDT: -5 * 60,
  MST: -7 * 60,
  MDT: -6 * 60,
  PST: -8 * 60,
  PDT: -7 * 60,
};

const NUMERIC_ZONE = /([+-])(\d{2}):?(\d{2})$/;
const NAMED_ZONE = /(?:\s|\d)([A-Z]{1,3})$/i;

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

function readOffset(raw: string): number | null {
  // date-only ISO strings are parsed as UTC
  if (DATE_ONLY.test(raw)) {
    return 0;
  }

  const numeric = NUMERIC_ZONE.exec(raw);
  if (numeric) {
    const [, sign, hours, minutes] = numeric;
    const total = Number(hours) * 60 + Number(minutes);
    return sign === "-" ? -total : total;
  }

  const named = NAMED_ZONE.exec(raw);
  if (named?.[1]) {
    return NAMED_OFFSETS[named[1].toUpperCase()] ?? null;
  }

  return null;
}

/**
 * Parses an RFC 822 or ISO 8601 date string.
 *
 * Date-times without a zone are read by the runtime as local time; the host offset
 * is recorded for them so the written wall clock is what gets printed.
 *
 * @returns null when the string is not a date.
 */
export function parsePublicationDate(raw: string): PublicationDate | null {
  const trimmed = raw.trim();
  const instant = new Date(trimmed);
  if (Number.isNaN(instant.getTime())) {
    return null;
  }

  const offsetMinutes = readOffset(trimmed) ?? -instant.getTimezoneOffset();
  return { instant, offsetMinutes };
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Formats as `DD/MM/YY HH:MM` (24h) in the date's own offset.
 */
export function formatPublicationDate(date: PublicationDate): string {
  const shifted = new Date(date.instant.getTime() + date.offsetMinutes * 60_000);
  const day = pad(shifted.getUTCDate());
  const month = pad(shifted.getUTCMonth() + 1);
  const year = pad(shifted.getUTCFullYear() % 100);
  const hours = pad(shifted.getUTCHours());
  const minutes = pad(shifted.getUTCMinutes());
  return `${day}/${month}/${year} ${hours}:${minutes}`;
}
