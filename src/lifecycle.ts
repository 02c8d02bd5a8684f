// pattern: Imperative Shell
import type { Logger } from "pino";

/**
 * Dependencies for the shutdown handler.
 */
export type ShutdownDeps = {
  readonly closeDb: () => void;
  readonly logger: Logger;
};

const SIGNAL_EXIT_CODES = {
  SIGINT: 130,
  SIGTERM: 143,
} as const;

type HandledSignal = keyof typeof SIGNAL_EXIT_CODES;

/**
 * Registers SIGINT and SIGTERM handlers that close the database and exit with
 * the conventional 128 + signal status. A second signal during shutdown is
 * ignored. Returns a function that removes the handlers again.
 */
export function registerShutdownHandlers(deps: ShutdownDeps): () => void {
  let shuttingDown = false;

  const shutdown = (signal: HandledSignal): void => {
    if (shuttingDown) return;
    shuttingDown = true;

    deps.logger.warn({ signal }, "interrupted, shutting down");

    try {
      deps.closeDb();
      deps.logger.info("database connection closed");
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      deps.logger.error({ error: message }, "error closing database");
    }

    process.exit(SIGNAL_EXIT_CODES[signal]);
  };

  const onSigint = (): void => shutdown("SIGINT");
  const onSigterm = (): void => shutdown("SIGTERM");
  process.on("SIGINT", onSigint);
  process.on("SIGTERM", onSigterm);

  return () => {
    process.off("SIGINT", onSigint);
    process.off("SIGTERM", onSigterm);
  };
}
