export type { IAlertInstanceStore } from './IAlertInstanceStore';
export type { INotificationAttemptStore } from './INotificationAttemptStore';
