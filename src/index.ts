#!/usr/bin/env tsx
import "dotenv/config";
import { resolve } from "node:path";
import { google } from "googleapis";
import type { Logger } from "pino";
import { loadConfig } from "./config";
import type { AppConfig } from "./config";
import { createDatabase } from "./db";
import { authorizeFromSavedToken, createGmailMailbox } from "./gmail";
import { registerShutdownHandlers } from "./lifecycle";
import { createLlmModels } from "./llm/client";
import { createLogger } from "./logger";
import { main } from "./main";
import type { RunCommand } from "./main";
import { runBriefing } from "./run";
import { runSetup } from "./setup";

async function executeRun(
  command: RunCommand,
  config: AppConfig,
  logger: Logger,
  print: (line: string) => void,
): Promise<void> {
  const auth = authorizeFromSavedToken(config, logger);
  const mailbox = createGmailMailbox(google.gmail({ version: "v1", auth }), logger);
  const models = createLlmModels(config);

  const { db, close: closeDb } = createDatabase(resolve(config.databasePath));
  const unregister = registerShutdownHandlers({ closeDb, logger });
  try {
    await runBriefing({ db, config, mailbox, models, logger, print }, command.options);
  } finally {
    unregister();
    closeDb();
  }
}

main(process.argv.slice(2), {
  createLogger,
  loadConfig: (configPath) => loadConfig(configPath),
  runSetup,
  executeRun,
  print: (line) => process.stdout.write(`${line}\n`),
  printError: (text) => process.stderr.write(text),
  env: process.env,
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error("fatal startup error:", err);
    process.exitCode = 1;
  });
