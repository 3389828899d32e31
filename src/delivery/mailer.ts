// pattern: Imperative Shell
import Mailgun from "mailgun.js";
import FormData from "form-data";
import type { Logger } from "pino";

export type EmailResult =
  | { readonly success: true; readonly messageId: string }
  | { readonly success: false; readonly error: string };

/**
 * Function signature for sending a plain-text digest email.
 * Never throws — errors are returned in the result.
 */
export type SendEmailFn = (
  recipient: string,
  subject: string,
  text: string,
  logger: Logger,
) => Promise<EmailResult>;

/**
 * Creates a Mailgun-based email sender.
 *
 * @param apiKey - Mailgun API key for authentication
 * @param domain - Mailgun domain for sending emails
 * @returns A SendEmailFn closure bound to the Mailgun credentials.
 */
export function createMailgunSender(apiKey: string, domain: string): SendEmailFn {
  const mailgun = new Mailgun(FormData);
  const mg = mailgun.client({ username: "api", key: apiKey });

  return async function sendEmail(
    recipient: string,
    subject: string,
    text: string,
    logger: Logger,
  ): Promise<EmailResult> {
    try {
      const result = await mg.messages.create(domain, {
        from: `Threadwatch <noreply@${domain}>`,
        to: [recipient],
        subject,
        text,
      });

      logger.info({ messageId: result.id, recipient }, "digest email sent");
      return { success: true, messageId: result.id ?? "unknown" };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ recipient, error: message }, "digest email send failed");
      return { success: false, error: message };
    }
  };
}
