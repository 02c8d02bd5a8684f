// pattern: Imperative Shell
import express from "express";
import type { Logger } from "pino";

export type AuthorizationResult =
  | { readonly code: string }
  | { readonly error: string };

const DEFAULT_TIMEOUT_MS = 5 * 60 * 1000;

/**
 * Express app that receives Google's OAuth redirect on `/`. The first request
 * carrying `code` or `error` is reported through `onResult` once its response
 * has been written; anything else gets a 400 and is ignored.
 */
export function createCallbackApp(
  onResult: (result: AuthorizationResult) => void,
): express.Express {
  const app = express();

  app.get("/", (req, res) => {
    const code = req.query["code"];
    const error = req.query["error"];

    if (typeof code === "string" && code.length > 0) {
      res.once("finish", () => onResult({ code }));
      res.type("text/plain").send("Authorization complete. You can close this tab.");
      return;
    }

    if (typeof error === "string" && error.length > 0) {
      res.once("finish", () => onResult({ error }));
      res.status(400).type("text/plain").send(`Authorization failed: ${error}`);
      return;
    }

    res.status(400).type("text/plain").send("Missing authorization code.");
  });

  return app;
}

/**
 * Listens on localhost:`port` until the OAuth redirect arrives, then closes
 * the server, including the browser's keep-alive connections, and resolves
 * with the authorization code.
 */
export function waitForAuthorizationCode(
  port: number,
  logger: Logger,
  timeoutMs: number = DEFAULT_TIMEOUT_MS,
): Promise<string> {
  return new Promise((resolve, reject) => {
    const shutdown = (): void => {
      server.close();
      server.closeAllConnections();
    };

    const finish = (result: AuthorizationResult): void => {
      clearTimeout(timer);
      shutdown();
      if ("code" in result) {
        resolve(result.code);
      } else {
        reject(new Error(`authorization was denied: ${result.error}`));
      }
    };

    const app = createCallbackApp(finish);
    const server = app.listen(port, "127.0.0.1", () => {
      logger.info({ port }, "waiting for oauth redirect");
    });
    server.on("error", (err) => {
      clearTimeout(timer);
      reject(err);
    });

    const timer = setTimeout(() => {
      shutdown();
      reject(new Error(`no authorization received within ${timeoutMs} ms`));
    }, timeoutMs);
  });
}
