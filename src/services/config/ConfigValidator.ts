import { ValidationError } from '../../utils/errors';
import {
  isBoolean,
  isInteger,
  isNonEmptyString,
  isNumber,
  isPlainObject,
  isString,
  parseIsoDuration,
  MAX_EVALUATION_FREQUENCY_MS,
  MIN_EVALUATION_FREQUENCY_MS,
} from '../../utils/validation';
import { ActionGroupRegistry } from '../registry/ActionGroupRegistry';
import { ActionGroup, Receiver, Severity, isSeverity } from '../registry/types';
import {
  Aggregation,
  AlertRule,
  Comparator,
  COMPARATORS,
  MissingDataPolicy,
  MISSING_DATA_POLICIES,
  ParsedConfig,
  PassThroughSettings,
} from './types';

// --- Constants ---

const KNOWN_TOP_LEVEL_KEYS = new Set([
  'actionGroups',
  'alertRules',
  'severityEscalations',
  'reNotifyInterval',
]);

const KNOWN_RULE_BLOCK_KEYS = new Set([
  'commonSettings',
  'severityLevels',
  'evaluationFrequencyOptions',
  'aggregationGranularityOptions',
  'rules',
]);

const KNOWN_COMMON_SETTINGS = new Set([
  'enabled',
  'autoMitigate',
  'skipMetricValidation',
  'checkWorkspaceAlertsStorageConfigured',
]);

const KNOWN_ACTION_GROUP_FIELDS = new Set(['id', 'name', 'shortName', 'receivers']);

const KNOWN_RECEIVER_LISTS = new Set([
  'emailReceivers',
  'smsReceivers',
  'webhookReceivers',
  'armRoleReceivers',
]);

const KNOWN_RULE_FIELDS = new Set([
  'id',
  'name',
  'description',
  'conditionQuery',
  'aggregation',
  'comparator',
  'threshold',
  'evaluationFrequency',
  'windowSize',
  'severity',
  'enabled',
  'autoMitigate',
  'consecutiveBreachesToFire',
  'consecutiveClearsToResolve',
  'actionGroupRefs',
  'onMissingData',
  'reNotifyInterval',
]);

const PERCENTILE_REGEX = /^p(\d{1,2}(?:\.\d+)?)$/;

// --- Types ---

export interface ConfigValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationError[];
  /** Present only when `valid` is true. */
  config: ParsedConfig | null;
}

interface CommonSettings extends PassThroughSettings {
  enabled: boolean;
  autoMitigate: boolean;
}

interface Enumerations {
  severityLevels: Map<Severity, string>;
  frequencyOptions: Set<number>;
  granularityOptions: Set<number>;
}

// --- Helpers ---

function addError(errors: ValidationError[], path: string, message: string): void {
  errors.push(new ValidationError(message, path));
}

function addWarning(warnings: ValidationError[], path: string, message: string): void {
  warnings.push(new ValidationError(message, path));
}

function warnUnknownKeys(
  obj: Record<string, unknown>,
  known: Set<string>,
  basePath: string,
  warnings: ValidationError[],
): void {
  for (const key of Object.keys(obj)) {
    if (!known.has(key)) {
      const path = basePath ? `${basePath}.${key}` : key;
      addWarning(warnings, path, `Unknown field "${key}"`);
    }
  }
}

function optionalBoolean(
  value: unknown,
  fallback: boolean,
  path: string,
  errors: ValidationError[],
): boolean {
  if (value === undefined) return fallback;
  if (!isBoolean(value)) {
    addError(errors, path, 'Must be a boolean');
    return fallback;
  }
  return value;
}

function parseDurationField(
  value: unknown,
  path: string,
  errors: ValidationError[],
): number | null {
  if (!isNonEmptyString(value)) {
    addError(errors, path, 'Must be an ISO-8601 duration string such as "PT5M"');
    return null;
  }
  const ms = parseIsoDuration(value);
  if (ms === null) {
    addError(errors, path, `Invalid duration "${value}"`);
  }
  return ms;
}

export function parseAggregation(value: string): Aggregation | null {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'avg' || normalized === 'average') return { kind: 'avg' };
  if (normalized === 'count') return { kind: 'count' };
  if (normalized === 'ratio') return { kind: 'ratio' };

  const match = PERCENTILE_REGEX.exec(normalized);
  if (match) {
    const p = Number(match[1]);
    if (p > 0 && p < 100) return { kind: 'percentile', p };
  }
  return null;
}

function isComparator(value: unknown): value is Comparator {
  return isString(value) && (COMPARATORS as readonly string[]).includes(value);
}

function isMissingDataPolicy(value: unknown): value is MissingDataPolicy {
  return isString(value) && (MISSING_DATA_POLICIES as readonly string[]).includes(value);
}

// --- Level 1: Document Structure ---

function validateStructure(
  data: unknown,
  errors: ValidationError[],
  warnings: ValidationError[],
): { root: Record<string, unknown>; ruleBlock: Record<string, unknown> } | null {
  if (!isPlainObject(data)) {
    addError(errors, '', 'Configuration must be a JSON object');
    return null;
  }

  warnUnknownKeys(data, KNOWN_TOP_LEVEL_KEYS, '', warnings);

  let valid = true;

  if (!Array.isArray(data.actionGroups)) {
    addError(errors, 'actionGroups', 'actionGroups must be present and be an array');
    valid = false;
  }

  const ruleBlock = data.alertRules;
  if (!isPlainObject(ruleBlock)) {
    addError(errors, 'alertRules', 'alertRules must be present and be an object');
    return null;
  }

  warnUnknownKeys(ruleBlock, KNOWN_RULE_BLOCK_KEYS, 'alertRules', warnings);

  if (!Array.isArray(ruleBlock.rules)) {
    addError(errors, 'alertRules.rules', 'rules must be present and be an array');
    valid = false;
  }

  return valid ? { root: data, ruleBlock } : null;
}

// --- Level 2: Shared Rule Settings ---

function validateCommonSettings(
  value: unknown,
  errors: ValidationError[],
  warnings: ValidationError[],
): CommonSettings {
  const defaults: CommonSettings = {
    enabled: true,
    autoMitigate: true,
    skipMetricValidation: false,
    checkWorkspaceAlertsStorageConfigured: false,
  };

  if (value === undefined) return defaults;

  const path = 'alertRules.commonSettings';
  if (!isPlainObject(value)) {
    addError(errors, path, 'commonSettings must be an object');
    return defaults;
  }

  warnUnknownKeys(value, KNOWN_COMMON_SETTINGS, path, warnings);

  return {
    enabled: optionalBoolean(value.enabled, defaults.enabled, `${path}.enabled`, errors),
    autoMitigate: optionalBoolean(value.autoMitigate, defaults.autoMitigate, `${path}.autoMitigate`, errors),
    skipMetricValidation: optionalBoolean(
      value.skipMetricValidation, false, `${path}.skipMetricValidation`, errors,
    ),
    checkWorkspaceAlertsStorageConfigured: optionalBoolean(
      value.checkWorkspaceAlertsStorageConfigured, false, `${path}.checkWorkspaceAlertsStorageConfigured`, errors,
    ),
  };
}

function validateDurationOptions(
  value: unknown,
  path: string,
  errors: ValidationError[],
): Set<number> {
  const options = new Set<number>();

  if (!Array.isArray(value) || value.length === 0) {
    addError(errors, path, 'Must be a non-empty array of ISO-8601 durations');
    return options;
  }

  value.forEach((entry, index) => {
    const ms = parseDurationField(entry, `${path}[${index}]`, errors);
    if (ms !== null) options.add(ms);
  });

  return options;
}

function validateEnumerations(
  ruleBlock: Record<string, unknown>,
  errors: ValidationError[],
): Enumerations {
  const severityLevels = new Map<Severity, string>();
  const levelsPath = 'alertRules.severityLevels';

  if (!isPlainObject(ruleBlock.severityLevels)) {
    addError(errors, levelsPath, 'severityLevels must be an object mapping 0-4 to labels');
  } else {
    for (const [key, label] of Object.entries(ruleBlock.severityLevels)) {
      const severity = Number(key);
      if (!/^\d$/.test(key) || !isSeverity(severity)) {
        addError(errors, `${levelsPath}.${key}`, 'Severity level keys must be integers 0-4');
        continue;
      }
      if (!isNonEmptyString(label)) {
        addError(errors, `${levelsPath}.${key}`, 'Severity label must be a non-empty string');
        continue;
      }
      severityLevels.set(severity, label);
    }
  }

  return {
    severityLevels,
    frequencyOptions: validateDurationOptions(
      ruleBlock.evaluationFrequencyOptions, 'alertRules.evaluationFrequencyOptions', errors,
    ),
    granularityOptions: validateDurationOptions(
      ruleBlock.aggregationGranularityOptions, 'alertRules.aggregationGranularityOptions', errors,
    ),
  };
}

// --- Level 2: Action Groups ---

function parseReceiverList(
  list: unknown,
  listName: string,
  path: string,
  errors: ValidationError[],
): Receiver[] {
  if (list === undefined) return [];
  if (!Array.isArray(list)) {
    addError(errors, `${path}.${listName}`, `${listName} must be an array`);
    return [];
  }

  const receivers: Receiver[] = [];

  list.forEach((entry, index) => {
    const entryPath = `${path}.${listName}[${index}]`;
    if (!isPlainObject(entry)) {
      addError(errors, entryPath, 'Receiver entry must be an object');
      return;
    }

    const name = isString(entry.name) ? entry.name : '';

    switch (listName) {
      case 'emailReceivers':
        receivers.push({
          kind: 'email',
          name,
          address: isString(entry.emailAddress) ? entry.emailAddress : '',
        });
        break;
      case 'smsReceivers':
        receivers.push({
          kind: 'sms',
          name,
          countryCode: isString(entry.countryCode) || isNumber(entry.countryCode) ? String(entry.countryCode) : '',
          number: isString(entry.phoneNumber) || isNumber(entry.phoneNumber) ? String(entry.phoneNumber) : '',
        });
        break;
      case 'webhookReceivers':
        receivers.push({
          kind: 'webhook',
          name,
          uri: isString(entry.serviceUri) ? entry.serviceUri : '',
          useCommonSchema: entry.useCommonAlertSchema === true,
        });
        break;
      case 'armRoleReceivers':
        receivers.push({
          kind: 'role',
          name,
          roleId: isString(entry.roleId) ? entry.roleId : '',
        });
        break;
    }
  });

  return receivers;
}

function validateActionGroups(
  entries: unknown[],
  errors: ValidationError[],
  warnings: ValidationError[],
): ActionGroup[] {
  const groups: ActionGroup[] = [];
  const seenIds = new Map<string, number>();

  entries.forEach((entry, index) => {
    const path = `actionGroups[${index}]`;

    if (!isPlainObject(entry)) {
      addError(errors, path, 'Action group must be an object');
      return;
    }

    warnUnknownKeys(entry, KNOWN_ACTION_GROUP_FIELDS, path, warnings);

    if (!isNonEmptyString(entry.name)) {
      addError(errors, `${path}.name`, 'name is required and must be a non-empty string');
      return;
    }

    const id = entry.id === undefined ? entry.name : entry.id;
    if (!isNonEmptyString(id)) {
      addError(errors, `${path}.id`, 'id must be a non-empty string');
      return;
    }

    const previous = seenIds.get(id);
    if (previous !== undefined) {
      addError(errors, `${path}.id`, `Duplicate action group id "${id}" (first seen at actionGroups[${previous}])`);
      return;
    }
    seenIds.set(id, index);

    const receiversPath = `${path}.receivers`;
    const receivers: Receiver[] = [];
    if (entry.receivers !== undefined) {
      if (!isPlainObject(entry.receivers)) {
        addError(errors, receiversPath, 'receivers must be an object');
      } else {
        warnUnknownKeys(entry.receivers, KNOWN_RECEIVER_LISTS, receiversPath, warnings);
        for (const listName of KNOWN_RECEIVER_LISTS) {
          receivers.push(...parseReceiverList(entry.receivers[listName], listName, receiversPath, errors));
        }
      }
    }

    const group: ActionGroup = {
      id,
      name: entry.name,
      shortName: isString(entry.shortName) ? entry.shortName : '',
      receivers,
    };

    const issues = ActionGroupRegistry.validate(group, groups, path);
    if (issues.length > 0) {
      errors.push(...issues);
      return;
    }

    groups.push(group);
  });

  return groups;
}

// --- Level 2: Rules ---

function validateRule(
  entry: unknown,
  index: number,
  context: {
    common: CommonSettings;
    enumerations: Enumerations;
    groupIds: Set<string>;
    defaultReNotifyMs: number | null;
  },
  errors: ValidationError[],
  warnings: ValidationError[],
): AlertRule | null {
  const path = `alertRules.rules[${index}]`;

  if (!isPlainObject(entry)) {
    addError(errors, path, 'Rule entry must be an object');
    return null;
  }

  warnUnknownKeys(entry, KNOWN_RULE_FIELDS, path, warnings);

  const errorCount = errors.length;

  if (!isNonEmptyString(entry.id)) {
    addError(errors, `${path}.id`, 'id is required and must be a non-empty string');
  }
  if (!isNonEmptyString(entry.name)) {
    addError(errors, `${path}.name`, 'name is required and must be a non-empty string');
  }
  if (!isNonEmptyString(entry.conditionQuery)) {
    addError(errors, `${path}.conditionQuery`, 'conditionQuery is required and must be a non-empty string');
  }

  let aggregation: Aggregation | null = null;
  if (!isNonEmptyString(entry.aggregation)) {
    addError(errors, `${path}.aggregation`, 'aggregation is required and must be a string');
  } else {
    aggregation = parseAggregation(entry.aggregation);
    if (!aggregation) {
      addError(
        errors,
        `${path}.aggregation`,
        `Unsupported aggregation "${entry.aggregation}" (expected avg, count, ratio or pNN)`,
      );
    }
  }

  if (!isComparator(entry.comparator)) {
    addError(errors, `${path}.comparator`, `comparator must be one of: ${COMPARATORS.join(', ')}`);
  }

  if (!isNumber(entry.threshold)) {
    addError(errors, `${path}.threshold`, 'threshold is required and must be a finite number');
  }

  const { enumerations } = context;

  const frequencyMs = parseDurationField(entry.evaluationFrequency, `${path}.evaluationFrequency`, errors);
  if (frequencyMs !== null) {
    if (frequencyMs < MIN_EVALUATION_FREQUENCY_MS || frequencyMs > MAX_EVALUATION_FREQUENCY_MS) {
      addError(errors, `${path}.evaluationFrequency`, 'evaluationFrequency must be between 1 and 60 minutes');
    } else if (!enumerations.frequencyOptions.has(frequencyMs)) {
      addError(
        errors,
        `${path}.evaluationFrequency`,
        `evaluationFrequency "${String(entry.evaluationFrequency)}" is not one of evaluationFrequencyOptions`,
      );
    }
  }

  const windowMs = parseDurationField(entry.windowSize, `${path}.windowSize`, errors);
  if (windowMs !== null) {
    if (!enumerations.granularityOptions.has(windowMs)) {
      addError(
        errors,
        `${path}.windowSize`,
        `windowSize "${String(entry.windowSize)}" is not one of aggregationGranularityOptions`,
      );
    } else if (frequencyMs !== null && windowMs < frequencyMs) {
      addError(errors, `${path}.windowSize`, 'windowSize must be at least evaluationFrequency');
    }
  }

  let severityLabel = '';
  if (!isInteger(entry.severity) || !isSeverity(entry.severity)) {
    addError(errors, `${path}.severity`, 'severity must be an integer between 0 and 4');
  } else {
    const label = enumerations.severityLevels.get(entry.severity);
    if (label === undefined) {
      addError(errors, `${path}.severity`, `severity ${entry.severity} is not defined in severityLevels`);
    } else {
      severityLabel = label;
    }
  }

  const enabled = optionalBoolean(entry.enabled, context.common.enabled, `${path}.enabled`, errors);
  const autoMitigate = optionalBoolean(entry.autoMitigate, context.common.autoMitigate, `${path}.autoMitigate`, errors);

  const breachesToFire = entry.consecutiveBreachesToFire ?? 1;
  if (!isInteger(breachesToFire) || breachesToFire < 1) {
    addError(errors, `${path}.consecutiveBreachesToFire`, 'consecutiveBreachesToFire must be an integer >= 1');
  }

  const clearsToResolve = entry.consecutiveClearsToResolve ?? 1;
  if (!isInteger(clearsToResolve) || clearsToResolve < 1) {
    addError(errors, `${path}.consecutiveClearsToResolve`, 'consecutiveClearsToResolve must be an integer >= 1');
  }

  const refs: string[] = [];
  if (!Array.isArray(entry.actionGroupRefs) || entry.actionGroupRefs.length === 0) {
    addError(errors, `${path}.actionGroupRefs`, 'actionGroupRefs must be a non-empty array of action group ids');
  } else {
    entry.actionGroupRefs.forEach((ref: unknown, refIndex: number) => {
      const refPath = `${path}.actionGroupRefs[${refIndex}]`;
      if (!isNonEmptyString(ref)) {
        addError(errors, refPath, 'Action group reference must be a non-empty string');
      } else if (!context.groupIds.has(ref)) {
        addError(errors, refPath, `Action group "${ref}" does not exist`);
      } else if (!refs.includes(ref)) {
        refs.push(ref);
      }
    });
  }

  let onMissingData: MissingDataPolicy = 'ignore';
  if (entry.onMissingData !== undefined) {
    if (!isMissingDataPolicy(entry.onMissingData)) {
      addError(errors, `${path}.onMissingData`, `onMissingData must be one of: ${MISSING_DATA_POLICIES.join(', ')}`);
    } else {
      onMissingData = entry.onMissingData;
    }
  }

  let reNotifyIntervalMs = context.defaultReNotifyMs;
  if (entry.reNotifyInterval === null) {
    reNotifyIntervalMs = null;
  } else if (entry.reNotifyInterval !== undefined) {
    reNotifyIntervalMs = parseDurationField(entry.reNotifyInterval, `${path}.reNotifyInterval`, errors);
  }

  if (errors.length > errorCount) {
    return null;
  }

  // Every field below was checked above; the guards only narrow the types.
  if (
    !isNonEmptyString(entry.id) || !isNonEmptyString(entry.name) || !isNonEmptyString(entry.conditionQuery)
    || !aggregation || !isComparator(entry.comparator) || !isNumber(entry.threshold)
    || frequencyMs === null || windowMs === null || !isSeverity(entry.severity)
    || !isInteger(breachesToFire) || !isInteger(clearsToResolve)
  ) {
    return null;
  }

  return {
    id: entry.id,
    name: entry.name,
    conditionQuery: entry.conditionQuery,
    aggregation,
    comparator: entry.comparator,
    threshold: entry.threshold,
    evaluationFrequencyMs: frequencyMs,
    windowSizeMs: windowMs,
    severity: entry.severity,
    severityLabel,
    enabled,
    autoMitigate,
    consecutiveBreachesToFire: breachesToFire,
    consecutiveClearsToResolve: clearsToResolve,
    actionGroupRefs: refs,
    onMissingData,
    reNotifyIntervalMs,
  };
}

// --- Level 3: Escalations ---

function validateEscalations(
  value: unknown,
  groupIds: Set<string>,
  errors: ValidationError[],
): Map<Severity, string[]> {
  const table = new Map<Severity, string[]>();
  if (value === undefined) return table;

  if (!isPlainObject(value)) {
    addError(errors, 'severityEscalations', 'severityEscalations must be an object');
    return table;
  }

  for (const [key, ids] of Object.entries(value)) {
    const path = `severityEscalations.${key}`;
    const severity = Number(key);

    if (!/^\d$/.test(key) || !isSeverity(severity)) {
      addError(errors, path, 'Escalation keys must be severities 0-4');
      continue;
    }
    if (!Array.isArray(ids)) {
      addError(errors, path, 'Escalation must be an array of action group ids');
      continue;
    }

    const resolved: string[] = [];
    ids.forEach((id: unknown, index: number) => {
      if (!isNonEmptyString(id) || !groupIds.has(id)) {
        addError(errors, `${path}[${index}]`, `Action group "${String(id)}" does not exist`);
      } else if (!resolved.includes(id)) {
        resolved.push(id);
      }
    });
    table.set(severity, resolved);
  }

  return table;
}

// --- Public API ---

/**
 * Validate a parsed configuration document.
 *
 * Every section is checked even after an earlier one fails, so the caller sees
 * all problems at once. `config` is only returned for a fully valid document.
 */
export function validateConfig(data: unknown): ConfigValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationError[] = [];

  const structure = validateStructure(data, errors, warnings);
  if (!structure) {
    return { valid: false, errors, warnings, config: null };
  }

  const { root, ruleBlock } = structure;
  const groupEntries = Array.isArray(root.actionGroups) ? root.actionGroups : [];
  const ruleEntries = Array.isArray(ruleBlock.rules) ? ruleBlock.rules : [];

  const common = validateCommonSettings(ruleBlock.commonSettings, errors, warnings);
  const enumerations = validateEnumerations(ruleBlock, errors);
  const actionGroups = validateActionGroups(groupEntries, errors, warnings);
  const groupIds = new Set(actionGroups.map(group => group.id));

  let defaultReNotifyMs: number | null = null;
  if (root.reNotifyInterval !== undefined && root.reNotifyInterval !== null) {
    defaultReNotifyMs = parseDurationField(root.reNotifyInterval, 'reNotifyInterval', errors);
  }

  const rules: AlertRule[] = [];
  const seenRuleIds = new Map<string, number>();

  ruleEntries.forEach((entry, index) => {
    const rule = validateRule(entry, index, { common, enumerations, groupIds, defaultReNotifyMs }, errors, warnings);
    if (!rule) return;

    const previous = seenRuleIds.get(rule.id);
    if (previous !== undefined) {
      addError(
        errors,
        `alertRules.rules[${index}].id`,
        `Duplicate rule id "${rule.id}" (first seen at alertRules.rules[${previous}])`,
      );
      return;
    }
    seenRuleIds.set(rule.id, index);
    rules.push(rule);
  });

  const escalations = validateEscalations(root.severityEscalations, groupIds, errors);

  if (errors.length > 0) {
    return { valid: false, errors, warnings, config: null };
  }

  return {
    valid: true,
    errors,
    warnings,
    config: {
      actionGroups,
      rules,
      escalations,
      severityLevels: enumerations.severityLevels,
      passThrough: {
        skipMetricValidation: common.skipMetricValidation,
        checkWorkspaceAlertsStorageConfigured: common.checkWorkspaceAlertsStorageConfigured,
      },
    },
  };
}
