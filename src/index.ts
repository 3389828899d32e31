import { resolve } from "node:path";
import { createLogger } from "./logger";
import { loadConfig } from "./config";
import type { AppConfig } from "./config";
import { createEmojiResolver } from "./model";
import { createParser, setParserInstance } from "./sources/rss";
import { createMailgunSender, createTelegramSender } from "./delivery";
import type { SendEmailFn } from "./delivery";
import { createNotifierState, runAllCycles } from "./notifier";
import type { NotifierDeps } from "./notifier";
import { createNotifierSchedulers } from "./scheduler";
import { registerShutdownHandlers } from "./lifecycle";
import { NAME, VERSION } from "./version";

const CONFIG_PATH = process.env["CONFIG_PATH"] ?? "./config.yaml";

async function main(argv: ReadonlyArray<string>): Promise<void> {
  const flag = argv[0];
  if (flag === "-v" || flag === "--version") {
    console.log(`${NAME}\nVersion ${VERSION}`);
    return;
  }

  const logger = createLogger();
  logger.info({ version: VERSION }, "threadwatch starting");

  let config: AppConfig;
  try {
    config = loadConfig(resolve(CONFIG_PATH));
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "configuration error",
    );
    process.exit(1);
  }

  const token = process.env["TELEGRAM_BOT_TOKEN"];
  if (!token) {
    logger.fatal("TELEGRAM_BOT_TOKEN not set");
    process.exit(1);
  }

  logger.info(
    {
      mailingList: config.mailingList?.name ?? null,
      subreddit: config.reddit?.subreddit ?? null,
      feedCount: config.feeds.length,
    },
    "config loaded",
  );

  setParserInstance(createParser(config.polling.timeoutMs));

  const apiKey = process.env["MAILGUN_API_KEY"];
  const domain = process.env["MAILGUN_DOMAIN"];
  let sendEmail: SendEmailFn | null = null;
  if (config.email && apiKey && domain) {
    sendEmail = createMailgunSender(apiKey, domain);
    logger.info({ recipient: config.email.recipient }, "email digests enabled");
  } else if (config.email) {
    logger.warn("MAILGUN_API_KEY or MAILGUN_DOMAIN not set, email digests disabled");
  }

  const deps: NotifierDeps = {
    config,
    sendMessage: createTelegramSender(token, config.telegram.chatId),
    sendEmail,
    glyphs: createEmojiResolver(),
    logger,
  };
  const state = createNotifierState();

  const primed = await runAllCycles(deps, state);
  logger.info(
    { sources: primed.map((result) => `${result.source}=${result.status}`) },
    "initial poll complete",
  );

  const schedulers = createNotifierSchedulers(deps, state);
  logger.info({ schedulerCount: schedulers.length }, "schedulers started");

  registerShutdownHandlers({ schedulers, logger });
}

main(process.argv.slice(2)).catch((err) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});
