import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import type { Logger } from "pino";
import {
  runFeedsCycle,
  runMailCycle,
  runRedditCycle,
} from "./notifier";
import type { NotifierDeps, NotifierState } from "./notifier";

export type Scheduler = {
  readonly stop: () => void;
};

/**
 * Creates and starts a cron task running one source's cycle.
 *
 * A run that fires while the previous one is still in progress is skipped, so
 * a source never has two cycles (and two collections) in flight. Errors are
 * logged and swallowed to keep the task alive.
 *
 * @param name - Source label used in log lines
 * @param expression - Cron expression for the task
 * @param runCycle - The cycle to run on every tick
 * @param logger - Logger instance for recording cycle events
 * @returns A Scheduler with a stop() method to halt the task
 */
export function createCycleScheduler(
  name: string,
  expression: string,
  runCycle: () => Promise<unknown>,
  logger: Logger,
): Scheduler {
  let running = false;

  const task: ScheduledTask = cron.schedule(expression, async () => {
    if (running) {
      logger.warn({ source: name }, "previous cycle still running, skipping tick");
      return;
    }

    running = true;
    logger.info({ source: name }, "cycle starting");
    try {
      await runCycle();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ source: name, error: message }, "cycle failed unexpectedly");
    } finally {
      running = false;
    }
  });

  return {
    stop: () => {
      task.stop();
    },
  };
}

/**
 * Starts one scheduler per configured source.
 */
export function createNotifierSchedulers(
  deps: NotifierDeps,
  state: NotifierState,
): Array<Scheduler> {
  const { config, logger } = deps;
  const schedulers: Array<Scheduler> = [];

  const mailingList = config.mailingList;
  if (mailingList) {
    schedulers.push(
      createCycleScheduler(
        "mail",
        config.schedule.mail,
        () => runMailCycle(deps, mailingList, state.mail),
        logger,
      ),
    );
  }

  const reddit = config.reddit;
  if (reddit) {
    schedulers.push(
      createCycleScheduler(
        "reddit",
        config.schedule.reddit,
        () => runRedditCycle(deps, reddit, state.reddit),
        logger,
      ),
    );
  }

  if (config.feeds.some((feed) => feed.enabled)) {
    schedulers.push(
      createCycleScheduler(
        "feeds",
        config.schedule.feeds,
        () => runFeedsCycle(deps, config.feeds, state.feeds),
        logger,
      ),
    );
  }

  return schedulers;
}
