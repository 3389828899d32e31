// pattern: Imperative Shell
import type { Logger } from "pino";

export const TELEGRAM_MESSAGE_LIMIT = 4096;

/**
 * Discriminated union result type for Telegram sends. `sentCount` is the number
 * of chunks Telegram accepted before the failing one.
 */
export type SendResult =
  | { readonly success: true; readonly messageIds: ReadonlyArray<number> }
  | { readonly success: false; readonly error: string; readonly sentCount: number };

/**
 * Posts an HTML message to the configured chat. Never throws.
 */
export type SendMessageFn = (html: string, logger: Logger) => Promise<SendResult>;

type TelegramApiResponse<T> = {
  ok: boolean;
  result?: T;
  description?: string;
  error_code?: number;
};

type TelegramMessage = {
  message_id: number;
};

const TAG = /<[^>]*>/g;
const LONGEST_ENTITY = 8;

/**
 * Finds where to cut `text` so the first piece is at most `limit` characters
 * and neither a surrogate pair nor an HTML entity is split.
 */
function cutIndex(text: string, limit: number): number {
  let cut = limit;

  const code = text.charCodeAt(cut - 1);
  if (code >= 0xd800 && code <= 0xdbff) {
    cut--;
  }

  const amp = text.lastIndexOf("&", cut - 1);
  if (amp > 0 && cut - amp <= LONGEST_ENTITY && text.indexOf(";", amp) >= cut) {
    cut = amp;
  }

  return cut > 0 ? cut : limit;
}

/**
 * Splits text into chunks of at most `limit` characters, cutting at line
 * breaks. A single line longer than the limit loses its tags and is cut
 * mid-line, so no chunk carries half an element.
 */
export function splitMessage(
  text: string,
  limit: number = TELEGRAM_MESSAGE_LIMIT,
): Array<string> {
  if (text.length <= limit) {
    return text.length > 0 ? [text] : [];
  }

  const chunks: Array<string> = [];
  let current = "";

  for (const line of text.split("\n")) {
    const candidate = current.length > 0 ? `${current}\n${line}` : line;
    if (candidate.length <= limit) {
      current = candidate;
      continue;
    }

    if (current.length > 0) {
      chunks.push(current);
    }

    let rest = line.length > limit ? line.replace(TAG, "") : line;
    while (rest.length > limit) {
      const cut = cutIndex(rest, limit);
      chunks.push(rest.slice(0, cut));
      rest = rest.slice(cut);
    }
    current = rest;
  }

  if (current.length > 0) {
    chunks.push(current);
  }

  return chunks;
}

/**
 * Creates a sender bound to a bot token and chat.
 *
 * Long messages are split and sent in order; the first failing chunk stops the
 * send and its error is returned.
 */
export function createTelegramSender(
  token: string,
  chatId: string | number,
): SendMessageFn {
  const endpoint = `https://api.telegram.org/bot${token}/sendMessage`;

  return async function sendMessage(
    html: string,
    logger: Logger,
  ): Promise<SendResult> {
    const messageIds: Array<number> = [];

    try {
      for (const chunk of splitMessage(html)) {
        const response = await fetch(endpoint, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify({
            chat_id: chatId,
            text: chunk,
            parse_mode: "HTML",
            disable_web_page_preview: true,
          }),
        });

        // safe: the Bot API always answers with this envelope
        const payload = (await response.json()) as TelegramApiResponse<TelegramMessage>;
        if (!payload.ok || !payload.result) {
          const error = payload.description ?? `HTTP ${response.status}`;
          logger.error({ chatId, error, sent: messageIds.length }, "telegram send failed");
          return { success: false, error, sentCount: messageIds.length };
        }

        messageIds.push(payload.result.message_id);
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ chatId, error: message, sent: messageIds.length }, "telegram send failed");
      return { success: false, error: message, sentCount: messageIds.length };
    }

    logger.info({ chatId, messageIds }, "telegram message sent");
    return { success: true, messageIds };
  };
}
