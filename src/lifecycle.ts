// pattern: Imperative Shell
import type { Logger } from "pino";

export type Stoppable = {
  readonly stop: () => void;
};

export type ShutdownDeps = {
  readonly schedulers: ReadonlyArray<Stoppable>;
  readonly logger: Logger;
};

/**
 * Registers SIGTERM and SIGINT handlers that stop every scheduler once and
 * exit with status 0. A scheduler that throws while stopping is logged and the
 * remaining ones are still stopped.
 */
export function registerShutdownHandlers(deps: ShutdownDeps): void {
  let shuttingDown = false;

  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;

    deps.logger.info({ signal }, "shutdown signal received");

    for (const scheduler of deps.schedulers) {
      try {
        scheduler.stop();
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        deps.logger.error({ error: message }, "error stopping scheduler");
      }
    }

    deps.logger.info({ stopped: deps.schedulers.length }, "shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}
