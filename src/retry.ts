import type { Logger } from "pino";

const BACKOFF_MULTIPLIER = 2;
const INITIAL_DELAY_MS = 1000;
const MAX_DELAY_MS = 30 * 1000;
const MAX_RETRIES = 4;

export type BackoffOptions = {
  readonly retries?: number;
  readonly initialDelayMs?: number;
  readonly maxDelayMs?: number;
  readonly isRetryable?: (err: unknown) => boolean;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly logger?: Logger;
  readonly operation?: string;
};

const RATE_LIMIT_REASONS = ["rateLimitExceeded", "userRateLimitExceeded"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function readStatus(err: Record<string, unknown>): number | null {
  if (typeof err["code"] === "number") return err["code"];
  if (typeof err["status"] === "number") return err["status"];
  const response = err["response"];
  if (isRecord(response) && typeof response["status"] === "number") {
    return response["status"];
  }
  return null;
}

function collectReasons(entries: unknown, into: Array<string>): void {
  if (!Array.isArray(entries)) return;
  for (const entry of entries) {
    if (isRecord(entry) && typeof entry["reason"] === "string") {
      into.push(entry["reason"]);
    }
  }
}

/**
 * Google API error reasons, from `err.errors` and from the JSON error body
 * (`response.data.error.errors[].reason`).
 */
export function errorReasons(err: unknown): Array<string> {
  const reasons: Array<string> = [];
  if (!isRecord(err)) return reasons;

  collectReasons(err["errors"], reasons);
  const response = err["response"];
  const data = isRecord(response) ? response["data"] : undefined;
  const body = isRecord(data) ? data["error"] : undefined;
  if (isRecord(body)) collectReasons(body["errors"], reasons);

  return reasons;
}

/**
 * True for provider responses that mean "slow down": HTTP 429, or a 403 whose
 * error reasons include one of Google's rate-limit reasons.
 */
export function isRateLimitError(err: unknown): boolean {
  if (!isRecord(err)) return false;

  const status = readStatus(err);
  if (status === 429) return true;
  if (status !== 403) return false;

  return errorReasons(err).some((reason) => RATE_LIMIT_REASONS.includes(reason));
}

/**
 * Delay before the given retry attempt (1-based), doubling from the initial
 * delay and capped.
 */
export function backoffDelay(
  attempt: number,
  initialDelayMs: number = INITIAL_DELAY_MS,
  maxDelayMs: number = MAX_DELAY_MS,
): number {
  return Math.min(
    initialDelayMs * Math.pow(BACKOFF_MULTIPLIER, attempt - 1),
    maxDelayMs,
  );
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Runs `fn`, retrying with exponential backoff while the error is retryable
 * (rate limits by default). The last error is rethrown once retries run out.
 */
export async function withBackoff<T>(
  fn: () => Promise<T>,
  options: BackoffOptions = {},
): Promise<T> {
  const retries = options.retries ?? MAX_RETRIES;
  const isRetryable = options.isRetryable ?? isRateLimitError;
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (attempt > retries || !isRetryable(err)) throw err;

      const delayMs = backoffDelay(
        attempt,
        options.initialDelayMs,
        options.maxDelayMs,
      );
      options.logger?.warn(
        {
          operation: options.operation,
          attempt,
          delayMs,
          error: err instanceof Error ? err.message : String(err),
        },
        "rate limited, backing off",
      );
      await sleep(delayMs);
    }
  }
}
