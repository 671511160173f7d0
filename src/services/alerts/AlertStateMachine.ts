import { randomUUID } from 'crypto';
import { EventEmitter } from 'events';
import { ConflictError, DedupViolationError, NotFoundError } from '../../utils/errors';
import logger from '../../utils/logger';
import { AlertRule } from '../config/types';
import { ConditionSignal } from '../evaluation/types';
import type { IAlertInstanceStore } from '../../stores/interfaces/IAlertInstanceStore';
import {
  AlertInstance,
  TRANSITION_EVENT_TYPES,
  TransitionContext,
  TransitionEvent,
  TransitionType,
} from './types';

/**
 * Owns every AlertInstance transition.
 *
 * Pending -> Firing after `consecutiveBreachesToFire` breaches in a row.
 * Firing -> Resolved after `consecutiveClearsToResolve` clears in a row when
 * the rule auto-mitigates, otherwise only through manualResolve.
 * Resolved -> new Pending instance on the next breach.
 *
 * Each transition is written through to the store (when one is given) before
 * its event is emitted.
 */
export class AlertStateMachine extends EventEmitter {
  /** ruleId -> instances, oldest first. The last one is the current instance. */
  private history: Map<string, AlertInstance[]> = new Map();

  constructor(private readonly store?: IAlertInstanceStore) {
    super();
  }

  /**
   * Create the first Pending instance for a rule that has none yet.
   */
  ensureInstance(ruleId: string): AlertInstance {
    return { ...this.currentOrCreate(ruleId) };
  }

  /**
   * Rebuild in-memory state from persisted instances (e.g. on start-up).
   * Instances may arrive in any order; each rule keeps them by sequence.
   */
  restore(instances: readonly AlertInstance[]): void {
    this.history.clear();
    const ordered = [...instances].sort((a, b) => a.sequence - b.sequence);
    for (const instance of ordered) {
      const list = this.history.get(instance.ruleId) ?? [];
      list.push({ ...instance });
      this.history.set(instance.ruleId, list);
    }
    this.assertSingleActivePerRule();
  }

  /**
   * Feed one evaluation result into the rule's lifecycle.
   * Returns the transition events emitted (at most one).
   */
  apply(rule: AlertRule, signal: ConditionSignal, context: TransitionContext = {}): TransitionEvent[] {
    const now = context.now ?? new Date();
    const timestamp = now.toISOString();

    if (!rule.enabled) {
      logger.debug({ ruleId: rule.id }, 'rule disabled, evaluation ignored');
      return [];
    }

    let instance = this.currentOrCreate(rule.id);

    if (instance.state === 'Resolved' && signal === 'breach') {
      instance = this.supersede(rule.id);
    }

    instance.lastEvaluatedAt = timestamp;
    const events: TransitionEvent[] = [];

    switch (instance.state) {
      case 'Pending':
        if (signal === 'breach') {
          instance.consecutiveBreaches++;
          instance.consecutiveClears = 0;
          if (instance.firstBreachAt === null) {
            instance.firstBreachAt = timestamp;
          }
          if (instance.consecutiveBreaches >= rule.consecutiveBreachesToFire) {
            this.fire(instance, now);
            events.push(this.buildEvent('Fired', rule, instance, now, context, false));
          }
        } else if (signal === 'clear') {
          instance.consecutiveBreaches = 0;
          instance.consecutiveClears++;
          instance.firstBreachAt = null;
        }
        break;

      case 'Firing':
        if (signal === 'breach') {
          instance.consecutiveBreaches++;
          instance.consecutiveClears = 0;
          if (this.reNotifyDue(rule, instance, now)) {
            instance.lastNotifiedAt = timestamp;
            events.push(this.buildEvent('StillFiring', rule, instance, now, context, false));
          }
        } else if (signal === 'clear') {
          instance.consecutiveBreaches = 0;
          instance.consecutiveClears++;
          if (instance.consecutiveClears >= rule.consecutiveClearsToResolve && rule.autoMitigate) {
            this.resolve(instance, now);
            events.push(this.buildEvent('Resolved', rule, instance, now, context, false));
          }
        }
        break;

      case 'Resolved':
        // Clears and missing data keep the episode closed.
        break;
    }

    this.persist(instance);
    this.emitAll(events);
    return events;
  }

  /**
   * Resolve a Firing instance by hand.
   * @throws NotFoundError if the rule has no instance
   * @throws ConflictError if the current instance is not Firing
   */
  manualResolve(rule: AlertRule, context: TransitionContext = {}): TransitionEvent {
    const instance = this.current(rule.id);
    if (!instance) {
      throw new NotFoundError(`Alert instance for rule ${rule.id}`);
    }
    if (instance.state !== 'Firing') {
      throw new ConflictError(`Rule ${rule.id} is ${instance.state}, only a Firing alert can be resolved`);
    }

    const now = context.now ?? new Date();
    this.resolve(instance, now);
    this.persist(instance);

    const event = this.buildEvent('Resolved', rule, instance, now, context, true);
    logger.info({ ruleId: rule.id, correlationId: instance.correlationId }, 'alert resolved manually');
    this.emitAll([event]);
    return event;
  }

  getInstance(ruleId: string): AlertInstance | null {
    const current = this.current(ruleId);
    return current ? { ...current } : null;
  }

  getHistory(ruleId: string): AlertInstance[] {
    return (this.history.get(ruleId) ?? []).map(instance => ({ ...instance }));
  }

  listFiring(): AlertInstance[] {
    const firing: AlertInstance[] = [];
    for (const ruleId of this.history.keys()) {
      const current = this.current(ruleId);
      if (current?.state === 'Firing') {
        firing.push({ ...current });
      }
    }
    return firing;
  }

  ruleIds(): string[] {
    return Array.from(this.history.keys());
  }

  clear(): void {
    this.history.clear();
  }

  private current(ruleId: string): AlertInstance | undefined {
    const list = this.history.get(ruleId);
    return list?.[list.length - 1];
  }

  private currentOrCreate(ruleId: string): AlertInstance {
    const current = this.current(ruleId);
    if (current) return current;

    const instance = this.createInstance(ruleId, 1);
    this.history.set(ruleId, [instance]);
    this.persist(instance);
    return instance;
  }

  private createInstance(ruleId: string, sequence: number): AlertInstance {
    return {
      id: randomUUID(),
      ruleId,
      sequence,
      state: 'Pending',
      consecutiveBreaches: 0,
      consecutiveClears: 0,
      firstBreachAt: null,
      firedAt: null,
      resolvedAt: null,
      lastEvaluatedAt: null,
      correlationId: null,
      lastNotifiedAt: null,
    };
  }

  /**
   * Close the Resolved episode and open a new Pending one.
   * @throws DedupViolationError if the current instance is still active
   */
  private supersede(ruleId: string): AlertInstance {
    const list = this.history.get(ruleId) ?? [];
    const previous = list[list.length - 1];

    if (previous && previous.state !== 'Resolved') {
      throw new DedupViolationError(ruleId, `cannot supersede ${previous.state} instance ${previous.id}`);
    }

    const next = this.createInstance(ruleId, (previous?.sequence ?? 0) + 1);
    list.push(next);
    this.history.set(ruleId, list);
    logger.debug({ ruleId, sequence: next.sequence }, 'new alert instance opened');
    return next;
  }

  /**
   * @throws DedupViolationError if another instance of the rule is Firing
   */
  private fire(instance: AlertInstance, now: Date): void {
    const others = (this.history.get(instance.ruleId) ?? []).filter(
      other => other !== instance && other.state === 'Firing',
    );
    if (others.length > 0 || instance.state !== 'Pending') {
      throw new DedupViolationError(instance.ruleId, 'a second Firing instance would be created');
    }

    const timestamp = now.toISOString();
    instance.state = 'Firing';
    instance.firedAt = timestamp;
    instance.lastNotifiedAt = timestamp;
    instance.consecutiveClears = 0;
    instance.correlationId = randomUUID();

    logger.info(
      { ruleId: instance.ruleId, correlationId: instance.correlationId, breaches: instance.consecutiveBreaches },
      'alert fired',
    );
  }

  private resolve(instance: AlertInstance, now: Date): void {
    instance.state = 'Resolved';
    instance.resolvedAt = now.toISOString();
    logger.info({ ruleId: instance.ruleId, correlationId: instance.correlationId }, 'alert resolved');
  }

  private reNotifyDue(rule: AlertRule, instance: AlertInstance, now: Date): boolean {
    if (rule.reNotifyIntervalMs === null) return false;
    const last = instance.lastNotifiedAt ?? instance.firedAt;
    if (last === null) return false;
    return now.getTime() - Date.parse(last) >= rule.reNotifyIntervalMs;
  }

  private buildEvent(
    type: TransitionType,
    rule: AlertRule,
    instance: AlertInstance,
    now: Date,
    context: TransitionContext,
    manual: boolean,
  ): TransitionEvent {
    if (instance.correlationId === null) {
      throw new DedupViolationError(rule.id, `${type} emitted without a correlation id`);
    }
    return {
      type,
      rule,
      instance: Object.freeze({ ...instance }),
      correlationId: instance.correlationId,
      timestamp: now.toISOString(),
      manual,
      registry: context.registry,
    };
  }

  private emitAll(events: TransitionEvent[]): void {
    for (const event of events) {
      this.emit(TRANSITION_EVENT_TYPES[event.type], event);
    }
  }

  private persist(instance: AlertInstance): void {
    if (!this.store) return;
    try {
      this.store.save(instance);
    } catch (err) {
      logger.error({ err, ruleId: instance.ruleId, instanceId: instance.id }, 'failed to persist alert instance');
    }
  }

  private assertSingleActivePerRule(): void {
    for (const [ruleId, list] of this.history) {
      const active = list.filter(instance => instance.state !== 'Resolved');
      if (active.length > 1) {
        throw new DedupViolationError(ruleId, `${active.length} active instances restored`);
      }
    }
  }
}
