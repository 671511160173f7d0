export { ConditionEvaluator, compare, resolveSignal } from './ConditionEvaluator';
export { EvaluationHealthTracker } from './EvaluationHealthTracker';
export { HttpTelemetrySource } from './HttpTelemetrySource';
export * from './types';
