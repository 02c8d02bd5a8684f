// pattern: Imperative Shell
import type { Logger } from "pino";
import type { AppConfig } from "./config";
import { runAuthorizationFlow } from "./gmail";

export const SUGGESTED_CRON = "0 7,19 * * *";

/**
 * Authorizes Gmail access once and tells the user how to schedule runs.
 */
export async function runSetup(
  config: AppConfig,
  logger: Logger,
  print: (line: string) => void,
): Promise<void> {
  await runAuthorizationFlow(config, logger, print);

  print("");
  print(`Authorization saved to ${config.gmail.tokenPath}.`);
  print("Schedule twice-daily briefings with a crontab entry such as:");
  print(`  ${SUGGESTED_CRON} cd ${process.cwd()} && newsletter-digest run`);
}
