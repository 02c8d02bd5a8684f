// pattern: Imperative Shell
import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { google } from "googleapis";
import type { Auth } from "googleapis";
import type { Logger } from "pino";
import { z } from "zod";
import type { AppConfig } from "../config";
import { waitForAuthorizationCode } from "./callback-server";

export const GMAIL_SCOPES = [
  "https://www.googleapis.com/auth/gmail.readonly",
  "https://www.googleapis.com/auth/gmail.send",
  "https://www.googleapis.com/auth/gmail.modify",
];

const SETUP_HINT = "run `newsletter-digest setup` first";

const clientBlockSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
});

const clientSecretsSchema = z
  .object({
    installed: clientBlockSchema.optional(),
    web: clientBlockSchema.optional(),
  })
  .transform((secrets, ctx) => {
    const block = secrets.installed ?? secrets.web;
    if (!block) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'expected an "installed" or "web" client block',
      });
      return z.NEVER;
    }
    return { clientId: block.client_id, clientSecret: block.client_secret };
  });

export type ClientSecrets = z.infer<typeof clientSecretsSchema>;

const savedTokenSchema = z
  .object({
    access_token: z.string().nullish(),
    refresh_token: z.string().nullish(),
    expiry_date: z.number().nullish(),
    token_type: z.string().nullish(),
    scope: z.string().nullish(),
    id_token: z.string().nullish(),
  })
  .passthrough();

export type SavedToken = z.infer<typeof savedTokenSchema>;

function readJsonFile(path: string, what: string): unknown {
  if (!existsSync(path)) {
    throw new Error(`${what} not found at ${path}; ${SETUP_HINT}`);
  }
  try {
    return JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to read ${what} at ${path}: ${message}`);
  }
}

export function readClientSecrets(path: string): ClientSecrets {
  const result = clientSecretsSchema.safeParse(
    readJsonFile(path, "oauth client secrets"),
  );
  if (!result.success) {
    throw new Error(
      `invalid oauth client secrets at ${path}: ${result.error.issues.map((i) => i.message).join("; ")}`,
    );
  }
  return result.data;
}

export function readSavedToken(path: string): SavedToken {
  const result = savedTokenSchema.safeParse(readJsonFile(path, "saved token"));
  if (!result.success) {
    throw new Error(`invalid saved token at ${path}; ${SETUP_HINT}`);
  }
  return result.data;
}

export function saveToken(path: string, token: Auth.Credentials): void {
  writeFileSync(path, JSON.stringify(token, null, 2), { mode: 0o600 });
}

export function createOAuthClient(
  secrets: ClientSecrets,
  port: number,
): Auth.OAuth2Client {
  return new google.auth.OAuth2(
    secrets.clientId,
    secrets.clientSecret,
    `http://localhost:${port}/`,
  );
}

/**
 * Builds an authorized client from the saved token. Tokens the client refreshes
 * are merged into the token file so the next run starts from them.
 */
export function authorizeFromSavedToken(
  config: AppConfig,
  logger: Logger,
): Auth.OAuth2Client {
  const { credentialsPath, tokenPath, oauthPort } = config.gmail;
  const client = createOAuthClient(readClientSecrets(credentialsPath), oauthPort);
  const saved = readSavedToken(tokenPath);

  if (!saved.refresh_token) {
    const expired =
      typeof saved.expiry_date === "number" && saved.expiry_date <= Date.now();
    if (expired || !saved.access_token) {
      throw new Error(`saved token at ${tokenPath} cannot be refreshed; ${SETUP_HINT}`);
    }
  }

  client.setCredentials(saved);
  client.on("tokens", (tokens) => {
    saveToken(tokenPath, { ...saved, ...tokens });
    logger.info({ tokenPath }, "refreshed oauth token saved");
  });

  return client;
}

/**
 * Interactive consent flow: prints the authorization URL, waits for Google to
 * redirect back to the local callback server and stores the issued tokens.
 */
export async function runAuthorizationFlow(
  config: AppConfig,
  logger: Logger,
  print: (line: string) => void,
): Promise<Auth.OAuth2Client> {
  const { credentialsPath, tokenPath, oauthPort } = config.gmail;
  const client = createOAuthClient(readClientSecrets(credentialsPath), oauthPort);

  const url = client.generateAuthUrl({
    access_type: "offline",
    prompt: "consent",
    scope: GMAIL_SCOPES,
  });
  print("Open this URL in a browser to authorize Gmail access:");
  print(url);

  const code = await waitForAuthorizationCode(oauthPort, logger);
  const { tokens } = await client.getToken(code);
  client.setCredentials(tokens);
  saveToken(tokenPath, tokens);
  logger.info({ tokenPath }, "oauth token saved");

  return client;
}
