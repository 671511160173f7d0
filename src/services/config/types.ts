import { ActionGroup, EscalationTable, Severity } from '../registry/types';

export type Comparator = '>' | '>=' | '<' | '<=' | '==';

export const COMPARATORS: readonly Comparator[] = ['>', '>=', '<', '<=', '=='];

/**
 * Aggregate computed by the telemetry backend over the rule's window.
 * `percentile` carries its rank, e.g. `{ kind: 'percentile', p: 95 }` for `p95`.
 */
export type Aggregation =
  | { kind: 'avg' }
  | { kind: 'count' }
  | { kind: 'ratio' }
  | { kind: 'percentile'; p: number };

/**
 * What a failed telemetry pull counts as.
 * `ignore` leaves the counters untouched (neither breach nor clear).
 */
export type MissingDataPolicy = 'ignore' | 'breach' | 'clear';

export const MISSING_DATA_POLICIES: readonly MissingDataPolicy[] = ['ignore', 'breach', 'clear'];

export interface AlertRule {
  id: string;
  name: string;
  /** Opaque handle passed through to the telemetry backend. */
  conditionQuery: string;
  aggregation: Aggregation;
  comparator: Comparator;
  threshold: number;
  evaluationFrequencyMs: number;
  windowSizeMs: number;
  severity: Severity;
  severityLabel: string;
  enabled: boolean;
  autoMitigate: boolean;
  consecutiveBreachesToFire: number;
  consecutiveClearsToResolve: number;
  actionGroupRefs: readonly string[];
  onMissingData: MissingDataPolicy;
  /** Null disables StillFiring reminders for the rule. */
  reNotifyIntervalMs: number | null;
}

/**
 * Settings the engine keeps but does not act on.
 */
export interface PassThroughSettings {
  skipMetricValidation: boolean;
  checkWorkspaceAlertsStorageConfigured: boolean;
}

/**
 * Result of validating a configuration document.
 */
export interface ParsedConfig {
  actionGroups: ActionGroup[];
  rules: AlertRule[];
  escalations: EscalationTable;
  severityLevels: ReadonlyMap<Severity, string>;
  passThrough: PassThroughSettings;
}

/**
 * One accepted configuration. Never mutated after it is stored.
 */
export interface ConfigVersion extends ParsedConfig {
  version: number;
  loadedAt: string;
}

export function formatAggregation(aggregation: Aggregation): string {
  return aggregation.kind === 'percentile' ? `p${aggregation.p}` : aggregation.kind;
}
