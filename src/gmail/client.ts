// pattern: Imperative Shell
import type { gmail_v1 } from "googleapis";
import type { Logger } from "pino";
import { withBackoff } from "../retry";
import type { BackoffOptions } from "../retry";
import type { RawEmail } from "../pipeline/types";
import { parseMessage } from "./message";
import { buildMimeMessage, encodeRawMessage } from "./mime";
import type { OutgoingMessage } from "./mime";

const USER_ID = "me";
const MODIFY_BATCH_SIZE = 1000;

/**
 * The mailbox operations a run needs. Implemented over the Gmail API by
 * `createGmailMailbox`; tests substitute their own.
 */
export type Mailbox = {
  readonly searchMessages: (query: string) => Promise<ReadonlyArray<RawEmail>>;
  readonly getProfileEmail: () => Promise<string>;
  readonly sendMessage: (message: OutgoingMessage) => Promise<string>;
  readonly ensureLabel: (name: string) => Promise<string>;
  readonly markAsRead: (messageIds: ReadonlyArray<string>) => Promise<void>;
  readonly addLabel: (
    messageIds: ReadonlyArray<string>,
    labelId: string,
  ) => Promise<void>;
};

function chunk<T>(items: ReadonlyArray<T>, size: number): Array<Array<T>> {
  const chunks: Array<Array<T>> = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export function createGmailMailbox(
  gmail: gmail_v1.Gmail,
  logger: Logger,
  backoff: BackoffOptions = {},
): Mailbox {
  const call = <T>(operation: string, fn: () => Promise<T>): Promise<T> =>
    withBackoff(fn, { logger, ...backoff, operation });

  async function listMessageIds(query: string): Promise<Array<string>> {
    const ids: Array<string> = [];
    let pageToken: string | undefined;

    do {
      const res = await call("messages.list", () =>
        gmail.users.messages.list({ userId: USER_ID, q: query, pageToken }),
      );
      for (const message of res.data.messages ?? []) {
        if (message.id) ids.push(message.id);
      }
      pageToken = res.data.nextPageToken ?? undefined;
    } while (pageToken);

    return ids;
  }

  async function searchMessages(query: string): Promise<ReadonlyArray<RawEmail>> {
    logger.info({ query }, "gmail query");

    const ids = await listMessageIds(query);
    logger.info({ count: ids.length }, "message ids listed, fetching bodies");

    const emails: Array<RawEmail> = [];
    for (const id of ids) {
      try {
        const res = await call("messages.get", () =>
          gmail.users.messages.get({ userId: USER_ID, id, format: "full" }),
        );
        const email = parseMessage(id, res.data);
        if (email) {
          emails.push(email);
        } else {
          logger.warn({ messageId: id }, "malformed message, skipping");
        }
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.warn({ messageId: id, error: message }, "message fetch failed");
      }
    }

    logger.info({ count: emails.length }, "messages fetched");
    return emails;
  }

  async function getProfileEmail(): Promise<string> {
    const res = await call("getProfile", () =>
      gmail.users.getProfile({ userId: USER_ID }),
    );
    const address = res.data.emailAddress;
    if (!address) {
      throw new Error("gmail profile has no email address");
    }
    return address;
  }

  async function sendMessage(message: OutgoingMessage): Promise<string> {
    const raw = encodeRawMessage(buildMimeMessage(message));
    const res = await call("messages.send", () =>
      gmail.users.messages.send({ userId: USER_ID, requestBody: { raw } }),
    );
    return res.data.id ?? "unknown";
  }

  async function ensureLabel(name: string): Promise<string> {
    const res = await call("labels.list", () =>
      gmail.users.labels.list({ userId: USER_ID }),
    );
    const existing = (res.data.labels ?? []).find((label) => label.name === name);
    if (existing?.id) {
      logger.debug({ label: name, labelId: existing.id }, "found existing label");
      return existing.id;
    }

    const created = await call("labels.create", () =>
      gmail.users.labels.create({
        userId: USER_ID,
        requestBody: {
          name,
          labelListVisibility: "labelShow",
          messageListVisibility: "show",
        },
      }),
    );
    if (!created.data.id) {
      throw new Error(`gmail did not return an id for new label "${name}"`);
    }
    logger.info({ label: name, labelId: created.data.id }, "created gmail label");
    return created.data.id;
  }

  async function batchModify(
    messageIds: ReadonlyArray<string>,
    requestBody: Omit<gmail_v1.Schema$BatchModifyMessagesRequest, "ids">,
  ): Promise<void> {
    for (const ids of chunk(messageIds, MODIFY_BATCH_SIZE)) {
      await call("messages.batchModify", () =>
        gmail.users.messages.batchModify({
          userId: USER_ID,
          requestBody: { ...requestBody, ids },
        }),
      );
    }
  }

  async function markAsRead(messageIds: ReadonlyArray<string>): Promise<void> {
    if (messageIds.length === 0) return;
    await batchModify(messageIds, { removeLabelIds: ["UNREAD"] });
    logger.info({ count: messageIds.length }, "messages marked as read");
  }

  async function addLabel(
    messageIds: ReadonlyArray<string>,
    labelId: string,
  ): Promise<void> {
    if (messageIds.length === 0) return;
    await batchModify(messageIds, { addLabelIds: [labelId] });
    logger.info({ count: messageIds.length, labelId }, "messages labelled");
  }

  return {
    searchMessages,
    getProfileEmail,
    sendMessage,
    ensureLabel,
    markAsRead,
    addLabel,
  };
}
