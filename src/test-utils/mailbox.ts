import { vi } from "vitest";
import type { Mock } from "vitest";
import type { Mailbox } from "../gmail/client";
import type { RawEmail } from "../pipeline/types";

export type FakeMailbox = {
  readonly [K in keyof Mailbox]: Mock<Mailbox[K]>;
};

/**
 * In-memory Mailbox whose operations are vi.fn spies. `searchMessages`
 * returns `emails`; sending returns "sent-1"; labels resolve to "Label_1".
 */
export function createFakeMailbox(emails: ReadonlyArray<RawEmail> = []): FakeMailbox {
  return {
    searchMessages: vi.fn<Mailbox["searchMessages"]>().mockResolvedValue(emails),
    getProfileEmail: vi.fn<Mailbox["getProfileEmail"]>().mockResolvedValue("me@example.com"),
    sendMessage: vi.fn<Mailbox["sendMessage"]>().mockResolvedValue("sent-1"),
    ensureLabel: vi.fn<Mailbox["ensureLabel"]>().mockResolvedValue("Label_1"),
    markAsRead: vi.fn<Mailbox["markAsRead"]>().mockResolvedValue(undefined),
    addLabel: vi.fn<Mailbox["addLabel"]>().mockResolvedValue(undefined),
  };
}
