import { EvaluationError } from '../../utils/errors';
import { Result } from '../../utils/result';
import { Aggregation } from '../config/types';

/**
 * Telemetry backend. Computes the aggregate over the trailing window; the
 * engine never sees raw samples.
 */
export interface TelemetrySource {
  queryAggregate(
    conditionQuery: string,
    aggregation: Aggregation,
    windowMs: number,
    signal?: AbortSignal,
  ): Promise<Result<number, EvaluationError>>;
}

export type EvaluationOutcome =
  | { kind: 'breach'; value: number }
  | { kind: 'clear'; value: number }
  | { kind: 'error'; error: EvaluationError };

/**
 * What the state machine is fed after the missing-data policy is applied.
 * `none` leaves the counters untouched.
 */
export type ConditionSignal = 'breach' | 'clear' | 'none';

export enum HealthEventType {
  DEGRADED = 'monitoring:degraded',
  RECOVERED = 'monitoring:recovered',
}

export interface MonitoringDegradedEvent {
  ruleId: string;
  consecutiveErrors: number;
  lastError: string;
  degradedAt: string;
}

export interface MonitoringRecoveredEvent {
  ruleId: string;
  recoveredAt: string;
}
