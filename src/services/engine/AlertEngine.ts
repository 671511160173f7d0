import { EventEmitter } from 'events';
import { DedupViolationError, NotFoundError, ConflictError, ValidationError } from '../../utils/errors';
import logger from '../../utils/logger';
import { Result, err, ok } from '../../utils/result';
import { AlertStateMachine, AlertEventType, AlertInstance } from '../alerts';
import { RuleConfigStore } from '../config/RuleConfigStore';
import { AlertRule, ConfigVersion } from '../config/types';
import { NotificationDispatcher, DispatcherOptions } from '../dispatch/NotificationDispatcher';
import { LoggingDelivery } from '../dispatch/senders/LoggingDelivery';
import { DispatchEventType, INotificationDelivery, NotificationAttempt } from '../dispatch/types';
import { ConditionEvaluator, resolveSignal } from '../evaluation/ConditionEvaluator';
import { EvaluationHealthTracker } from '../evaluation/EvaluationHealthTracker';
import { HealthEventType, MonitoringDegradedEvent, TelemetrySource } from '../evaluation/types';
import { ActionGroupRegistry } from '../registry/ActionGroupRegistry';
import { ReceiverKind } from '../registry/types';
import { NotificationRetentionService } from '../retention/NotificationRetentionService';
import { RuleScheduler, EvaluationFailedEvent, SchedulerEventType, SchedulerOptions } from '../scheduler';
import type { StoreRegistry } from '../../stores';

const DEFAULT_RETENTION_HOURS = 168;

export interface AlertEngineOptions {
  telemetry: TelemetrySource;
  /** Used for every receiver kind without its own entry in `deliveries`. */
  delivery?: INotificationDelivery;
  deliveries?: ReadonlyMap<ReceiverKind, INotificationDelivery>;
  /** Write-through persistence; instances and open attempts are restored from it. */
  stores?: StoreRegistry;
  scheduler?: Partial<SchedulerOptions>;
  dispatch?: Partial<DispatcherOptions>;
  telemetryTimeoutMs?: number;
  /** Consecutive evaluation errors before a rule is marked degraded. */
  errorThreshold?: number;
  notificationRetentionHours?: number;
}

/**
 * What a successful load hands back.
 */
export interface EngineHandle {
  version: number;
  loadedAt: string;
  ruleIds: string[];
  actionGroupIds: string[];
}

export interface EngineStatus {
  running: boolean;
  configVersion: number | null;
  rules: number;
  scheduledRules: number;
  firing: number;
  degraded: number;
  evaluationsInFlight: number;
  pendingRetries: number;
}

/**
 * Wires the registry, config store, evaluator, state machine, scheduler and
 * dispatcher together and exposes the engine's public surface.
 *
 * Events from the parts are re-emitted on the engine: alert transitions
 * (AlertEventType), monitoring health (HealthEventType) and given-up
 * notifications (DispatchEventType.GIVEN_UP).
 */
export class AlertEngine extends EventEmitter {
  readonly registry = new ActionGroupRegistry();
  private readonly configStore = new RuleConfigStore();
  private readonly stateMachine: AlertStateMachine;
  private readonly evaluator: ConditionEvaluator;
  private readonly health: EvaluationHealthTracker;
  private readonly scheduler: RuleScheduler;
  private readonly dispatcher: NotificationDispatcher;
  private readonly retention: NotificationRetentionService;

  private rules: Map<string, AlertRule> = new Map();
  /** Runtime enable/disable, cleared by every load. */
  private enabledOverrides: Map<string, boolean> = new Map();
  private running = false;

  constructor(options: AlertEngineOptions) {
    super();

    this.stateMachine = new AlertStateMachine(options.stores?.alertInstances);
    this.evaluator = new ConditionEvaluator(options.telemetry, { timeoutMs: options.telemetryTimeoutMs });
    this.health = new EvaluationHealthTracker(
      options.errorThreshold !== undefined ? { errorThreshold: options.errorThreshold } : {},
    );
    this.scheduler = new RuleScheduler(this.evaluateRule, options.scheduler);
    this.dispatcher = new NotificationDispatcher(
      this.registry,
      options.delivery ?? new LoggingDelivery(),
      options.dispatch,
      options.stores?.notificationAttempts,
    );
    this.retention = new NotificationRetentionService(
      this.dispatcher,
      options.notificationRetentionHours ?? DEFAULT_RETENTION_HOURS,
    );

    for (const [kind, delivery] of options.deliveries ?? []) {
      this.dispatcher.registerDelivery(kind, delivery);
    }

    const instanceStore = options.stores?.alertInstances;
    if (instanceStore) {
      const latest = instanceStore.findLatestPerRule();
      const history = latest.flatMap(instance => instanceStore.findByRuleId(instance.ruleId));
      this.stateMachine.restore(history);
      if (history.length > 0) {
        logger.info({ instances: history.length, rules: latest.length }, 'alert instances restored');
      }
    }

    this.dispatcher.start(this.stateMachine);
    this.forwardEvents();
  }

  /**
   * Validate and activate a configuration document. All or nothing: on any
   * issue the previous configuration stays active and nothing changes.
   */
  loadConfig(document: unknown): Result<EngineHandle, ValidationError[]> {
    const loaded = this.configStore.load(document);
    if (!loaded.ok) {
      return err(loaded.error.issues);
    }
    return ok(this.activate(loaded.value));
  }

  /**
   * Same as loadConfig, for JSON text (a config file's contents).
   */
  loadConfigText(text: string): Result<EngineHandle, ValidationError[]> {
    const loaded = this.configStore.loadText(text);
    if (!loaded.ok) {
      return err(loaded.error.issues);
    }
    return ok(this.activate(loaded.value));
  }

  /**
   * Replace the active configuration. Instances of rules that survive keep
   * their counters; removed rules stop being evaluated but keep their history.
   */
  reload(document: unknown): Result<EngineHandle, ValidationError[]> {
    const previous = this.configStore.current()?.version ?? null;
    return this.logReload(previous, this.loadConfig(document));
  }

  /** reload for JSON text. */
  reloadText(text: string): Result<EngineHandle, ValidationError[]> {
    const previous = this.configStore.current()?.version ?? null;
    return this.logReload(previous, this.loadConfigText(text));
  }

  private logReload(
    previous: number | null,
    result: Result<EngineHandle, ValidationError[]>,
  ): Result<EngineHandle, ValidationError[]> {
    if (result.ok) {
      logger.info({ from: previous, to: result.value.version }, 'configuration reloaded');
    } else {
      logger.warn({ issues: result.error.length, active: previous }, 'configuration reload rejected');
    }
    return result;
  }

  /**
   * Begin periodic evaluation, notification retries left from a previous run
   * and attempt retention.
   */
  start(): void {
    if (this.running) return;
    this.running = true;

    this.dispatcher.resume();
    this.scheduler.start();
    this.retention.start();

    logger.info({ rules: this.rules.size }, 'alert engine started');
  }

  /**
   * Stop scheduling, let in-flight evaluations and deliveries finish (bounded)
   * and drop pending retries. Open attempts stay in the store for the next run.
   */
  async shutdown(): Promise<void> {
    this.running = false;
    this.retention.stop();
    await this.scheduler.stop();
    await this.dispatcher.shutdown();
    logger.info('alert engine stopped');
  }

  getAlertInstance(ruleId: string): AlertInstance | null {
    return this.stateMachine.getInstance(ruleId);
  }

  getInstanceHistory(ruleId: string): AlertInstance[] {
    return this.stateMachine.getHistory(ruleId);
  }

  /** Firing instances of rules in the active configuration. */
  listFiring(): AlertInstance[] {
    return this.stateMachine.listFiring().filter(instance => this.rules.has(instance.ruleId));
  }

  listDegraded(): MonitoringDegradedEvent[] {
    return this.health.listDegraded().filter(entry => this.rules.has(entry.ruleId));
  }

  getNotificationAttempts(correlationId: string): NotificationAttempt[] {
    return this.dispatcher.getAttempts(correlationId);
  }

  /**
   * Resolve a Firing alert whose rule does not auto-mitigate (or any Firing
   * alert an operator wants closed).
   * @throws NotFoundError for an unknown rule
   * @throws ConflictError if the rule is disabled or its alert is not Firing
   */
  manualResolve(ruleId: string): AlertInstance {
    const rule = this.requireRule(ruleId);
    if (!rule.enabled) {
      throw new ConflictError(`Rule ${ruleId} is disabled`);
    }
    const event = this.stateMachine.manualResolve(rule, { registry: this.registry.snapshot() });
    return { ...event.instance };
  }

  /**
   * Disabling freezes the rule's instance and stops its evaluations;
   * enabling resumes from the frozen state and makes the rule due at once.
   * @throws NotFoundError for an unknown rule
   */
  setRuleEnabled(ruleId: string, enabled: boolean): AlertRule {
    this.requireRule(ruleId);
    this.enabledOverrides.set(ruleId, enabled);

    const rule = this.requireRule(ruleId);
    if (enabled) {
      this.scheduler.schedule(ruleId, rule.evaluationFrequencyMs);
    } else {
      this.scheduler.unschedule(ruleId);
    }

    logger.info({ ruleId, enabled }, 'rule enablement changed');
    return rule;
  }

  /**
   * Evaluate a rule immediately, outside the schedule.
   * @throws NotFoundError for an unknown rule
   * @throws ConflictError if the rule is disabled or already being evaluated
   */
  async evaluateNow(ruleId: string): Promise<AlertInstance | null> {
    const rule = this.requireRule(ruleId);
    if (!rule.enabled) {
      throw new ConflictError(`Rule ${ruleId} is disabled`);
    }

    const started = await this.scheduler.runNow(ruleId);
    if (!started) {
      throw new ConflictError(`Rule ${ruleId} is already being evaluated`);
    }
    return this.getAlertInstance(ruleId);
  }

  /** Active rule with runtime enablement applied. */
  getRule(ruleId: string): AlertRule | null {
    const rule = this.rules.get(ruleId);
    if (!rule) return null;

    const enabled = this.enabledOverrides.get(ruleId);
    return enabled === undefined || enabled === rule.enabled ? rule : { ...rule, enabled };
  }

  listRules(): AlertRule[] {
    return Array.from(this.rules.keys()).flatMap(ruleId => this.getRule(ruleId) ?? []);
  }

  getConfigVersion(): ConfigVersion | null {
    return this.configStore.current();
  }

  getStatus(): EngineStatus {
    return {
      running: this.running,
      configVersion: this.configStore.current()?.version ?? null,
      rules: this.rules.size,
      scheduledRules: this.scheduler.getScheduledRules().length,
      firing: this.listFiring().length,
      degraded: this.listDegraded().length,
      evaluationsInFlight: this.scheduler.inFlightCount,
      pendingRetries: this.dispatcher.pendingRetryCount,
    };
  }

  /**
   * One scheduled evaluation. The registry snapshot is taken before the pull
   * so a concurrent registry update does not reach this evaluation.
   * Bound as arrow function to preserve `this` context.
   */
  private evaluateRule = async (ruleId: string): Promise<void> => {
    const rule = this.getRule(ruleId);
    if (!rule || !rule.enabled) return;

    const registry = this.registry.snapshot();
    const outcome = await this.evaluator.evaluate(rule);

    if (outcome.kind === 'error') {
      logger.warn(
        { ruleId, reason: outcome.error.reason, err: outcome.error.message },
        'telemetry pull failed',
      );
      this.health.recordFailure(ruleId, outcome.error.message);
    } else {
      this.health.recordSuccess(ruleId);
    }

    // Disabled or removed while the pull was running: the instance stays frozen.
    const current = this.getRule(ruleId);
    if (!current || !current.enabled) {
      logger.debug({ ruleId }, 'rule changed during evaluation, result discarded');
      return;
    }

    const signal = resolveSignal(outcome, current.onMissingData);
    this.stateMachine.apply(current, signal, { registry });
  };

  private activate(version: ConfigVersion): EngineHandle {
    this.registry.replaceAll(version.actionGroups, version.escalations);

    const next = new Map(version.rules.map(rule => [rule.id, rule]));
    for (const ruleId of this.rules.keys()) {
      if (!next.has(ruleId)) {
        this.scheduler.unschedule(ruleId);
        this.health.remove(ruleId);
        logger.info({ ruleId }, 'rule removed');
      }
    }

    this.rules = next;
    this.enabledOverrides.clear();

    for (const rule of version.rules) {
      this.stateMachine.ensureInstance(rule.id);
      if (rule.enabled) {
        this.scheduler.schedule(rule.id, rule.evaluationFrequencyMs);
      } else {
        this.scheduler.unschedule(rule.id);
      }
    }

    return {
      version: version.version,
      loadedAt: version.loadedAt,
      ruleIds: version.rules.map(rule => rule.id),
      actionGroupIds: version.actionGroups.map(group => group.id),
    };
  }

  private requireRule(ruleId: string): AlertRule {
    const rule = this.getRule(ruleId);
    if (!rule) {
      throw new NotFoundError(`Rule ${ruleId}`);
    }
    return rule;
  }

  private forwardEvents(): void {
    for (const type of [AlertEventType.FIRED, AlertEventType.STILL_FIRING, AlertEventType.RESOLVED]) {
      this.stateMachine.on(type, event => this.emit(type, event));
    }
    for (const type of [HealthEventType.DEGRADED, HealthEventType.RECOVERED]) {
      this.health.on(type, event => this.emit(type, event));
    }
    this.dispatcher.on(DispatchEventType.GIVEN_UP, event => this.emit(DispatchEventType.GIVEN_UP, event));

    this.scheduler.on(SchedulerEventType.EVALUATION_FAILED, (event: EvaluationFailedEvent) => {
      if (event.error instanceof DedupViolationError) {
        // Never recovered: the rule is taken out of rotation.
        this.scheduler.unschedule(event.ruleId);
        logger.fatal({ err: event.error, ruleId: event.ruleId }, 'dedup violation, rule unscheduled');
      }
    });
  }
}
