export { NotificationDispatcher } from './NotificationDispatcher';
export { buildMessage, displayTime } from './message';
export { ConsoleSender } from './senders/ConsoleSender';
export { WebhookSender } from './senders/WebhookSender';
export { SlackSender } from './senders/SlackSender';
export { MailCommandSender } from './senders/MailCommandSender';
export type { Notification, NotificationKind, INotifier, SendResult, ChannelResult } from './types';
