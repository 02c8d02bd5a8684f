// pattern: Imperative Shell
import type { Logger } from "pino";
import { USAGE, parseCli } from "./cli";
import type { CliCommand } from "./cli";
import type { AppConfig } from "./config";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export type RunCommand = Extract<CliCommand, { name: "run" }>;

export type MainDeps = {
  readonly createLogger: (level?: string) => Logger;
  readonly loadConfig: (configPath: string | null) => AppConfig;
  readonly runSetup: (
    config: AppConfig,
    logger: Logger,
    print: (line: string) => void,
  ) => Promise<void>;
  readonly executeRun: (
    command: RunCommand,
    config: AppConfig,
    logger: Logger,
    print: (line: string) => void,
  ) => Promise<void>;
  readonly print: (line: string) => void;
  readonly printError: (text: string) => void;
  readonly env: Readonly<Record<string, string | undefined>>;
};

/**
 * Parses `argv`, runs the chosen command and returns the process exit code:
 * 0 on success, 1 when the command fails, 2 for a usage error.
 */
export async function main(
  argv: ReadonlyArray<string>,
  deps: MainDeps,
): Promise<number> {
  const invocation = parseCli(argv);
  if (invocation.kind === "help") {
    deps.print(USAGE);
    return EXIT_OK;
  }
  if (invocation.kind === "usage-error") {
    deps.printError(`error: ${invocation.message}\n\n${USAGE}\n`);
    return EXIT_USAGE;
  }

  const { global, command } = invocation;
  const logger = deps.createLogger(global.verbose ? "debug" : undefined);

  try {
    const config = deps.loadConfig(global.configPath ?? deps.env["CONFIG_PATH"] ?? null);
    logger.debug(
      { provider: config.llm.provider, databasePath: config.databasePath },
      "config loaded",
    );

    if (command.name === "setup") {
      await deps.runSetup(config, logger, deps.print);
    } else {
      await deps.executeRun(command, config, logger, deps.print);
    }
    return EXIT_OK;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.fatal({ command: command.name, error: message }, "command failed");
    return EXIT_FAILURE;
  }
}
