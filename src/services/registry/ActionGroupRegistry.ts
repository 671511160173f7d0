import { NotFoundError, ValidationError } from '../../utils/errors';
import { isNonEmptyString } from '../../utils/validation';
import { MAX_SHORT_NAME_LENGTH, receiverKey, validateReceiver } from './receivers';
import {
  ActionGroup,
  EscalationTable,
  Receiver,
  SEVERITIES,
  Severity,
  VersionedActionGroup,
} from './types';

/**
 * Immutable view of the registry at one point in time.
 *
 * Evaluations capture a snapshot when they start; later registrations build a
 * new snapshot and never touch this one.
 */
export class RegistrySnapshot {
  constructor(
    private readonly groups: ReadonlyMap<string, VersionedActionGroup>,
    private readonly escalations: EscalationTable,
    public readonly revision: number,
  ) {}

  /**
   * @throws NotFoundError if no group is registered under `id`
   */
  resolve(id: string): VersionedActionGroup {
    const group = this.groups.get(id);
    if (!group) {
      throw new NotFoundError(`Action group ${id}`);
    }
    return group;
  }

  has(id: string): boolean {
    return this.groups.has(id);
  }

  list(): VersionedActionGroup[] {
    return Array.from(this.groups.values());
  }

  escalationsFor(severity: Severity): readonly string[] {
    return this.escalations.get(severity) ?? [];
  }

  /**
   * Deduplicated union of receivers across the referenced groups, followed by
   * the escalation groups configured for `severity`. First-seen order wins.
   */
  listReceiversFor(severity: Severity, actionGroupIds: readonly string[]): Receiver[] {
    const groupIds = [...actionGroupIds, ...this.escalationsFor(severity)];
    const visitedGroups = new Set<string>();
    const seen = new Set<string>();
    const receivers: Receiver[] = [];

    for (const groupId of groupIds) {
      if (visitedGroups.has(groupId)) continue;
      visitedGroups.add(groupId);

      for (const receiver of this.resolve(groupId).receivers) {
        const key = receiverKey(receiver);
        if (seen.has(key)) continue;
        seen.add(key);
        receivers.push(receiver);
      }
    }

    return receivers;
  }
}

const EMPTY_SNAPSHOT = new RegistrySnapshot(new Map(), new Map(), 0);

/**
 * Stores named routing targets and their receivers.
 *
 * Reads go through the current snapshot. Every mutation validates first and
 * then swaps in a new snapshot, so readers never see a half-applied update.
 * Re-registering an id with different content stores a new version.
 */
export class ActionGroupRegistry {
  private current: RegistrySnapshot = EMPTY_SNAPSHOT;
  private versions: Map<string, VersionedActionGroup[]> = new Map();

  /**
   * Validate an action group in isolation and against the groups in `against`
   * (shortName uniqueness). Returns every problem found.
   */
  static validate(
    group: ActionGroup,
    against: readonly ActionGroup[] = [],
    path = 'actionGroup',
  ): ValidationError[] {
    const issues: ValidationError[] = [];

    if (!isNonEmptyString(group.id)) {
      issues.push(new ValidationError('Action group id must be a non-empty string', `${path}.id`));
    }

    if (!isNonEmptyString(group.shortName)) {
      issues.push(new ValidationError('shortName must be a non-empty string', `${path}.shortName`));
    } else if (group.shortName.length > MAX_SHORT_NAME_LENGTH) {
      issues.push(new ValidationError(
        `shortName must be at most ${MAX_SHORT_NAME_LENGTH} characters`,
        `${path}.shortName`,
      ));
    } else {
      const normalized = group.shortName.toLowerCase();
      const clash = against.find(other => other.id !== group.id && other.shortName.toLowerCase() === normalized);
      if (clash) {
        issues.push(new ValidationError(
          `shortName "${group.shortName}" is already used by action group ${clash.id}`,
          `${path}.shortName`,
        ));
      }
    }

    group.receivers.forEach((receiver, index) => {
      issues.push(...validateReceiver(receiver, `${path}.receivers[${index}]`));
    });

    return issues;
  }

  /**
   * Register (or re-version) a single action group.
   * @throws ValidationError on a shortName collision or a malformed receiver
   */
  register(group: ActionGroup): VersionedActionGroup {
    const issues = ActionGroupRegistry.validate(group, this.current.list());
    if (issues.length > 0) {
      throw issues[0];
    }

    const groups = new Map(this.groupEntries());
    const stored = this.nextVersion(group);
    groups.set(group.id, stored);

    this.swap(groups, this.escalationEntries());
    return stored;
  }

  /**
   * Replace the whole registry content at once: groups missing from `groups`
   * are dropped, unchanged groups keep their version.
   * Callers validate the batch beforehand (see ConfigValidator).
   */
  replaceAll(groups: readonly ActionGroup[], escalations: EscalationTable = new Map()): RegistrySnapshot {
    const next = new Map<string, VersionedActionGroup>();
    for (const group of groups) {
      next.set(group.id, this.nextVersion(group));
    }
    this.swap(next, escalations);
    return this.current;
  }

  /**
   * @throws ValidationError if an escalation references an unknown group
   */
  setEscalations(escalations: EscalationTable): void {
    for (const [severity, groupIds] of escalations) {
      for (const groupId of groupIds) {
        if (!this.current.has(groupId)) {
          throw new ValidationError(
            `Escalation for severity ${severity} references unknown action group "${groupId}"`,
            `severityEscalations.${severity}`,
          );
        }
      }
    }
    this.swap(new Map(this.groupEntries()), escalations);
  }

  resolve(id: string): VersionedActionGroup {
    return this.current.resolve(id);
  }

  listReceiversFor(severity: Severity, actionGroupIds: readonly string[]): Receiver[] {
    return this.current.listReceiversFor(severity, actionGroupIds);
  }

  snapshot(): RegistrySnapshot {
    return this.current;
  }

  /** Every stored version of a group, oldest first. */
  getVersions(id: string): VersionedActionGroup[] {
    return [...(this.versions.get(id) ?? [])];
  }

  private nextVersion(group: ActionGroup): VersionedActionGroup {
    const history = this.versions.get(group.id) ?? [];
    const latest = history[history.length - 1];

    if (latest && sameContent(latest, group)) {
      return latest;
    }

    const stored: VersionedActionGroup = Object.freeze({
      id: group.id,
      name: group.name,
      shortName: group.shortName,
      receivers: Object.freeze(group.receivers.map(receiver => Object.freeze({ ...receiver }))),
      version: (latest?.version ?? 0) + 1,
    });
    this.versions.set(group.id, [...history, stored]);
    return stored;
  }

  private groupEntries(): Array<[string, VersionedActionGroup]> {
    return this.current.list().map(group => [group.id, group]);
  }

  private escalationEntries(): EscalationTable {
    const table = new Map<Severity, readonly string[]>();
    for (const severity of SEVERITIES) {
      const ids = this.current.escalationsFor(severity);
      if (ids.length > 0) table.set(severity, ids);
    }
    return table;
  }

  private swap(groups: ReadonlyMap<string, VersionedActionGroup>, escalations: EscalationTable): void {
    this.current = new RegistrySnapshot(groups, escalations, this.current.revision + 1);
  }
}

function sameContent(a: ActionGroup, b: ActionGroup): boolean {
  return a.name === b.name
    && a.shortName === b.shortName
    && JSON.stringify(a.receivers) === JSON.stringify(b.receivers);
}
