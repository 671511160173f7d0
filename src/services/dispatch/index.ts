export { NotificationDispatcher } from './NotificationDispatcher';
export type { DispatcherOptions } from './NotificationDispatcher';
export { retryDelay, canRetry, DEFAULT_BACKOFF } from './backoff';
export type { BackoffConfig } from './backoff';
export { LoggingDelivery } from './senders/LoggingDelivery';
export { WebhookDelivery } from './senders/WebhookDelivery';
export * from './types';
