// pattern: Imperative Shell

export const USER_AGENT = "threadwatch/1.0 (group activity notifier)";

/**
 * GETs a url with a timeout and returns the body as text.
 * Throws on network errors and non-2xx statuses; callers turn that into a
 * result value.
 */
export async function fetchText(
  url: string,
  timeoutMs: number,
  accept: string,
): Promise<string> {
  const response = await fetch(url, {
    signal: AbortSignal.timeout(timeoutMs),
    headers: {
      "User-Agent": USER_AGENT,
      Accept: accept,
    },
  });

  if (!response.ok) {
    throw new Error(`HTTP ${response.status}: ${response.statusText}`);
  }

  return response.text();
}
