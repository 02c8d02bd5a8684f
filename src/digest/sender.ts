// pattern: Imperative Shell
import type { Logger } from "pino";
import type { Mailbox } from "../gmail/client";

/**
 * Discriminated union result type for briefing send operations.
 */
export type SendResult =
  | { readonly success: true; readonly messageId: string }
  | { readonly success: false; readonly error: string };

export type OutgoingBriefing = {
  readonly recipient: string;
  readonly subject: string;
  readonly html: string;
  readonly text: string;
};

/**
 * Sends a rendered briefing. Never throws; errors are returned in the result.
 */
export type SendDigestFn = (
  briefing: OutgoingBriefing,
  logger: Logger,
) => Promise<SendResult>;

/**
 * Creates a sender that delivers through the user's own Gmail account.
 */
export function createGmailSender(mailbox: Mailbox): SendDigestFn {
  return async function sendDigest(
    briefing: OutgoingBriefing,
    logger: Logger,
  ): Promise<SendResult> {
    try {
      const messageId = await mailbox.sendMessage({
        to: briefing.recipient,
        subject: briefing.subject,
        html: briefing.html,
        text: briefing.text,
      });

      logger.info({ messageId, recipient: briefing.recipient }, "briefing email sent");
      return { success: true, messageId };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error(
        { recipient: briefing.recipient, error: message },
        "briefing email send failed",
      );
      return { success: false, error: message };
    }
  };
}
