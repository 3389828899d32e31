export { createTelegramSender, splitMessage, TELEGRAM_MESSAGE_LIMIT } from "./telegram";
export type { SendResult, SendMessageFn } from "./telegram";

export { createMailgunSender } from "./mailer";
export type { EmailResult, SendEmailFn } from "./mailer";
