export { authorizeFromSavedToken, runAuthorizationFlow } from "./auth";
export { createGmailMailbox } from "./client";
export type { Mailbox } from "./client";
export type { OutgoingMessage } from "./mime";
