import logger from '../../utils/logger';
import { NotificationDispatcher } from '../dispatch/NotificationDispatcher';

export interface CleanupResult {
  attemptsDeleted: number;
  retentionHours: number;
  cutoffTimestamp: string;
}

/**
 * Purges finished notification attempts once they are older than the
 * retention window. Checks once per minute.
 */
export class NotificationRetentionService {
  private intervalHandle: ReturnType<typeof setInterval> | null = null;
  private isRunning = false;
  private lastResult: CleanupResult | null = null;

  /** Visible for testing */
  static readonly CHECK_INTERVAL_MS = 60_000;

  constructor(
    private readonly dispatcher: NotificationDispatcher,
    private readonly retentionHours: number,
  ) {}

  start(): void {
    if (this.intervalHandle) {
      return; // Already running
    }

    logger.info({ retentionHours: this.retentionHours }, 'notification retention started');

    this.intervalHandle = setInterval(() => {
      this.checkAndRun();
    }, NotificationRetentionService.CHECK_INTERVAL_MS);
    this.intervalHandle.unref();
  }

  stop(): void {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
    }
  }

  private checkAndRun(): void {
    if (this.isRunning) return;

    try {
      this.runCleanup();
    } catch (error) {
      logger.error({ err: error }, 'notification retention cleanup failed');
    }
  }

  runCleanup(now: Date = new Date()): CleanupResult {
    this.isRunning = true;

    try {
      const cutoff = new Date(now.getTime() - this.retentionHours * 3_600_000);
      const attemptsDeleted = this.dispatcher.purgeTerminal(cutoff);

      const result: CleanupResult = {
        attemptsDeleted,
        retentionHours: this.retentionHours,
        cutoffTimestamp: cutoff.toISOString(),
      };

      if (attemptsDeleted > 0) {
        logger.info(result, 'notification retention cleanup completed');
      }

      this.lastResult = result;
      return result;
    } finally {
      this.isRunning = false;
    }
  }

  /** Visible for testing: whether the interval is active */
  get isSchedulerActive(): boolean {
    return this.intervalHandle !== null;
  }

  /** Visible for testing */
  get lastCleanup(): CleanupResult | null {
    return this.lastResult;
  }
}
