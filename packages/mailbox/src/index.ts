export { Mailbox, createPendingMessage } from './mailbox.js';
export type { PendingMessage, MailboxConfig, MailboxEvents, EvictionReason } from './mailbox.js';
