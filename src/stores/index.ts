import { Database } from 'better-sqlite3';

import type { IAlertInstanceStore } from './interfaces/IAlertInstanceStore';
import type { INotificationAttemptStore } from './interfaces/INotificationAttemptStore';

import { AlertInstanceStore } from './impl/AlertInstanceStore';
import { NotificationAttemptStore } from './impl/NotificationAttemptStore';

/**
 * Central registry providing access to all stores over one database.
 */
export class StoreRegistry {
  public readonly alertInstances: IAlertInstanceStore;
  public readonly notificationAttempts: INotificationAttemptStore;

  private constructor(database: Database) {
    this.alertInstances = new AlertInstanceStore(database);
    this.notificationAttempts = new NotificationAttemptStore(database);
  }

  /**
   * Create a registry over `database`. Tests pass an in-memory database.
   */
  static create(database: Database): StoreRegistry {
    return new StoreRegistry(database);
  }
}

export * from './interfaces';
