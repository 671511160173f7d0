export interface RuleScheduleState {
  ruleId: string;
  frequencyMs: number;
  lastEvaluatedAt: number;    // timestamp ms, 0 = never
  nextDue: number;            // timestamp ms
  isEvaluating: boolean;      // single-flight lock
  skippedCount: number;
}

/**
 * Runs one evaluation of a rule. Rejections are logged by the scheduler and
 * reported as EVALUATION_FAILED.
 */
export type EvaluateRuleFn = (ruleId: string) => Promise<void>;

export interface SchedulerOptions {
  /** Concurrent evaluations. */
  poolSize: number;
  tickMs: number;
  /** Fraction of the frequency added or removed at random, e.g. 0.1 for ±10%. */
  jitterRatio: number;
  /** Source of randomness in [0, 1). */
  random: () => number;
  /** Upper bound on how long stop() waits for in-flight evaluations. */
  shutdownTimeoutMs: number;
}

export enum SchedulerEventType {
  EVALUATION_COMPLETE = 'evaluation:complete',
  EVALUATION_FAILED = 'evaluation:failed',
  EVALUATION_SKIPPED = 'evaluation:skipped',
  RULE_SCHEDULED = 'rule:scheduled',
  RULE_UNSCHEDULED = 'rule:unscheduled',
}

export interface EvaluationCompleteEvent {
  ruleId: string;
  durationMs: number;
}

export interface EvaluationFailedEvent {
  ruleId: string;
  error: unknown;
}

export interface EvaluationSkippedEvent {
  ruleId: string;
  nextDue: number;
}
