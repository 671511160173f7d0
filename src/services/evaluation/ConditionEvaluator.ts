import { EvaluationError, errorMessage } from '../../utils/errors';
import logger from '../../utils/logger';
import { TimeoutError, withTimeout } from '../../utils/timeout';
import { isNumber } from '../../utils/validation';
import { AlertRule, Comparator, MissingDataPolicy, formatAggregation } from '../config/types';
import { ConditionSignal, EvaluationOutcome, TelemetrySource } from './types';

const DEFAULT_TIMEOUT_MS = 10_000;

export function compare(value: number, comparator: Comparator, threshold: number): boolean {
  switch (comparator) {
    case '>':
      return value > threshold;
    case '>=':
      return value >= threshold;
    case '<':
      return value < threshold;
    case '<=':
      return value <= threshold;
    case '==':
      return value === threshold;
  }
}

/**
 * Map an outcome onto the signal the state machine consumes.
 */
export function resolveSignal(outcome: EvaluationOutcome, policy: MissingDataPolicy): ConditionSignal {
  if (outcome.kind !== 'error') {
    return outcome.kind;
  }
  switch (policy) {
    case 'breach':
      return 'breach';
    case 'clear':
      return 'clear';
    case 'ignore':
      return 'none';
  }
}

/**
 * Pulls one aggregate for a rule and compares it to the threshold.
 * Never throws: every failure comes back as an `error` outcome.
 */
export class ConditionEvaluator {
  private readonly timeoutMs: number;

  constructor(
    private readonly telemetry: TelemetrySource,
    options: { timeoutMs?: number } = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async evaluate(rule: AlertRule): Promise<EvaluationOutcome> {
    let value: number;

    try {
      const result = await withTimeout(
        signal => this.telemetry.queryAggregate(rule.conditionQuery, rule.aggregation, rule.windowSizeMs, signal),
        this.timeoutMs,
      );
      if (!result.ok) {
        return { kind: 'error', error: result.error };
      }
      value = result.value;
    } catch (error) {
      const evaluationError = error instanceof TimeoutError
        ? new EvaluationError(`Telemetry query timed out after ${this.timeoutMs}ms`, 'timeout')
        : new EvaluationError(`Telemetry query failed: ${errorMessage(error)}`, 'unavailable');
      return { kind: 'error', error: evaluationError };
    }

    if (!isNumber(value)) {
      return {
        kind: 'error',
        error: new EvaluationError(`Telemetry returned a non-finite value for ${formatAggregation(rule.aggregation)}`, 'malformed'),
      };
    }

    const breached = compare(value, rule.comparator, rule.threshold);
    logger.debug(
      { ruleId: rule.id, value, comparator: rule.comparator, threshold: rule.threshold, breached },
      'condition evaluated',
    );

    return breached ? { kind: 'breach', value } : { kind: 'clear', value };
  }
}
