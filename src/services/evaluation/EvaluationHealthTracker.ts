import { EventEmitter } from 'events';
import logger from '../../utils/logger';
import { HealthEventType, MonitoringDegradedEvent, MonitoringRecoveredEvent } from './types';

export interface HealthTrackerConfig {
  /** Consecutive evaluation errors before a rule is marked degraded. */
  errorThreshold: number;
}

const DEFAULT_CONFIG: HealthTrackerConfig = {
  errorThreshold: 3,
};

interface RuleHealth {
  consecutiveErrors: number;
  degradedAt: string | null;
  lastError: string | null;
}

/**
 * Counts consecutive evaluation errors per rule. Crossing the threshold marks
 * the rule degraded; the next success recovers it. Alert state is untouched
 * either way.
 */
export class EvaluationHealthTracker extends EventEmitter {
  private rules: Map<string, RuleHealth> = new Map();
  private config: HealthTrackerConfig;

  constructor(config: Partial<HealthTrackerConfig> = {}) {
    super();
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  recordSuccess(ruleId: string): void {
    const health = this.rules.get(ruleId);
    if (!health) return;

    const wasDegraded = health.degradedAt !== null;
    this.rules.delete(ruleId);

    if (wasDegraded) {
      const event: MonitoringRecoveredEvent = { ruleId, recoveredAt: new Date().toISOString() };
      logger.info({ ruleId }, 'monitoring recovered');
      this.emit(HealthEventType.RECOVERED, event);
    }
  }

  recordFailure(ruleId: string, error: string): void {
    const health = this.rules.get(ruleId) ?? { consecutiveErrors: 0, degradedAt: null, lastError: null };
    health.consecutiveErrors++;
    health.lastError = error;
    this.rules.set(ruleId, health);

    if (health.degradedAt === null && health.consecutiveErrors >= this.config.errorThreshold) {
      health.degradedAt = new Date().toISOString();
      const event: MonitoringDegradedEvent = {
        ruleId,
        consecutiveErrors: health.consecutiveErrors,
        lastError: error,
        degradedAt: health.degradedAt,
      };
      logger.warn({ ruleId, consecutiveErrors: health.consecutiveErrors, lastError: error }, 'monitoring degraded');
      this.emit(HealthEventType.DEGRADED, event);
    }
  }

  isDegraded(ruleId: string): boolean {
    return (this.rules.get(ruleId)?.degradedAt ?? null) !== null;
  }

  getErrorCount(ruleId: string): number {
    return this.rules.get(ruleId)?.consecutiveErrors ?? 0;
  }

  listDegraded(): MonitoringDegradedEvent[] {
    const degraded: MonitoringDegradedEvent[] = [];
    for (const [ruleId, health] of this.rules) {
      if (health.degradedAt !== null) {
        degraded.push({
          ruleId,
          consecutiveErrors: health.consecutiveErrors,
          lastError: health.lastError ?? '',
          degradedAt: health.degradedAt,
        });
      }
    }
    return degraded;
  }

  /** Forget a rule, e.g. after it was removed by a reload. */
  remove(ruleId: string): void {
    this.rules.delete(ruleId);
  }

  clear(): void {
    this.rules.clear();
  }
}
