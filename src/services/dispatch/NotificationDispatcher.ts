import { randomUUID } from 'crypto';
import { EventEmitter } from 'events';
import { DeliveryError, errorMessage } from '../../utils/errors';
import logger from '../../utils/logger';
import { Result, err } from '../../utils/result';
import { TimeoutError, withTimeout } from '../../utils/timeout';
import { AlertEventType, TransitionEvent } from '../alerts/types';
import { ActionGroupRegistry } from '../registry/ActionGroupRegistry';
import { receiverKey } from '../registry/receivers';
import { Receiver, ReceiverKind } from '../registry/types';
import type { INotificationAttemptStore } from '../../stores/interfaces/INotificationAttemptStore';
import { BackoffConfig, DEFAULT_BACKOFF, canRetry, retryDelay } from './backoff';
import {
  DispatchEventType,
  GivenUpEvent,
  INotificationDelivery,
  NotificationAttempt,
  NotificationPayload,
  PendingRetry,
  TERMINAL_STATUSES,
} from './types';

const DEFAULT_DISPATCH_TIMEOUT_MS = 15_000;
const SHUTDOWN_CHECK_INTERVAL_MS = 100;
const DEFAULT_SHUTDOWN_TIMEOUT_MS = 5000;

export interface DispatcherOptions {
  backoff: Partial<BackoffConfig>;
  timeoutMs: number;
  shutdownTimeoutMs: number;
}

/**
 * Routes alert transitions to receivers.
 *
 * Fired and StillFiring go to the receivers of the rule's action groups plus
 * the escalation groups for its severity. Resolved goes to exactly the
 * receivers that were sent a Fired or StillFiring notice in the same episode.
 * Every receiver is an independent attempt with its own retries; a receiver
 * that keeps failing is given up without holding back the others.
 *
 * Once an episode resolves, its Fired/StillFiring retries are abandoned. A
 * notice already in flight that lands afterwards is followed by the
 * resolution for that receiver.
 */
export class NotificationDispatcher extends EventEmitter {
  private deliveries: Map<ReceiverKind, INotificationDelivery> = new Map();
  /** correlationId -> receiverKey -> receiver targeted by Fired/StillFiring */
  private targets: Map<string, Map<string, Receiver>> = new Map();
  /** correlationId -> receiverKeys a Fired/StillFiring notice was sent to */
  private delivered: Map<string, Set<string>> = new Map();
  /** correlationId -> Resolved payload, for notices that land after resolution */
  private resolutions: Map<string, NotificationPayload> = new Map();
  /** correlationId -> transitions dispatched so far */
  private sequences: Map<string, number> = new Map();
  private attempts: Map<string, NotificationAttempt[]> = new Map();
  private pendingRetries: PendingRetry[] = [];
  private inFlight: Set<Promise<void>> = new Set();
  private source: EventEmitter | null = null;
  private options: DispatcherOptions;
  private isShuttingDown = false;

  constructor(
    private readonly registry: ActionGroupRegistry,
    private readonly defaultDelivery: INotificationDelivery,
    options: Partial<DispatcherOptions> = {},
    private readonly store?: INotificationAttemptStore,
  ) {
    super();
    this.options = {
      backoff: { ...DEFAULT_BACKOFF, ...options.backoff },
      timeoutMs: options.timeoutMs ?? DEFAULT_DISPATCH_TIMEOUT_MS,
      shutdownTimeoutMs: options.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS,
    };
  }

  /**
   * Use a specific delivery for one receiver kind instead of the default.
   */
  registerDelivery(kind: ReceiverKind, delivery: INotificationDelivery): void {
    this.deliveries.set(kind, delivery);
  }

  /**
   * Subscribe to the state machine's transition events.
   */
  start(source: EventEmitter): void {
    this.source = source;
    source.on(AlertEventType.FIRED, this.handleTransition);
    source.on(AlertEventType.STILL_FIRING, this.handleTransition);
    source.on(AlertEventType.RESOLVED, this.handleTransition);
    logger.info('notification dispatcher started');
  }

  /**
   * Re-schedule attempts that were still open when the process last stopped.
   */
  resume(): number {
    if (!this.store) return 0;

    const unfinished = this.store.findUnfinished();
    const now = Date.now();

    for (const attempt of unfinished) {
      this.track(attempt);
      if (attempt.eventType !== 'Resolved') {
        this.target(attempt.correlationId, [attempt.receiver]);
      }
      const dueAt = attempt.nextRetryAt ? Date.parse(attempt.nextRetryAt) : now;
      this.scheduleRetry(attempt, Math.max(dueAt - now, 0));
    }

    if (unfinished.length > 0) {
      logger.info({ count: unfinished.length }, 'resumed unfinished notifications');
    }
    return unfinished.length;
  }

  /**
   * Stop listening, drop scheduled retries and wait (bounded) for deliveries
   * already in flight.
   */
  async shutdown(): Promise<void> {
    this.isShuttingDown = true;

    if (this.source) {
      this.source.removeListener(AlertEventType.FIRED, this.handleTransition);
      this.source.removeListener(AlertEventType.STILL_FIRING, this.handleTransition);
      this.source.removeListener(AlertEventType.RESOLVED, this.handleTransition);
      this.source = null;
    }

    for (const retry of this.pendingRetries) {
      clearTimeout(retry.timer);
    }
    this.pendingRetries = [];

    let waited = 0;
    while (waited < this.options.shutdownTimeoutMs && this.inFlight.size > 0) {
      await new Promise<void>(resolve => {
        const timer = setTimeout(resolve, SHUTDOWN_CHECK_INTERVAL_MS);
        timer.unref();
      });
      waited += SHUTDOWN_CHECK_INTERVAL_MS;
    }

    if (this.inFlight.size > 0) {
      logger.warn({ pending: this.inFlight.size }, 'dispatcher stopped with deliveries still running');
    }

    logger.info('notification dispatcher stopped');
  }

  /**
   * Bound as arrow function to preserve `this` context.
   */
  private handleTransition = (event: TransitionEvent): void => {
    this.dispatch(event).catch(error => {
      logger.error({ err: error, ruleId: event.rule.id, correlationId: event.correlationId }, 'failed to dispatch transition');
    });
  };

  /**
   * Fan a transition out to its receivers. Resolves once every first attempt
   * has settled; retries continue in the background.
   */
  async dispatch(event: TransitionEvent): Promise<NotificationAttempt[]> {
    if (this.isShuttingDown) return [];

    const resolving = event.type === 'Resolved';
    let payload: NotificationPayload | null = null;
    if (resolving) {
      this.restoreEpisode(event.correlationId);
      payload = this.buildPayload(event);
      this.resolutions.set(event.correlationId, payload);
      this.abandonOpenNotices(event.correlationId);
    }

    const receivers = this.receiversFor(event);
    if (resolving) {
      this.targets.delete(event.correlationId);
      this.delivered.delete(event.correlationId);
    }
    if (receivers.length === 0) {
      logger.warn({ ruleId: event.rule.id, eventType: event.type }, 'no receivers for transition');
      return [];
    }

    const notice = payload ?? this.buildPayload(event);

    logger.info(
      { ruleId: event.rule.id, eventType: event.type, correlationId: event.correlationId, receivers: receivers.length },
      'dispatching notification',
    );

    const created = receivers.map(receiver => this.createAttempt(receiver, notice));

    await Promise.all(created.map(attempt => this.runAttempt(attempt)));

    return created.map(attempt => ({ ...attempt }));
  }

  getAttempts(correlationId: string): NotificationAttempt[] {
    return (this.attempts.get(correlationId) ?? []).map(attempt => ({ ...attempt }));
  }

  /**
   * Receivers sent a Fired or StillFiring notice in an episode that has not
   * been resolved, in the order they were first targeted.
   */
  getTargets(correlationId: string): Receiver[] {
    const sent = this.delivered.get(correlationId);
    if (!sent) return [];
    return Array.from(this.targets.get(correlationId)?.entries() ?? [])
      .filter(([key]) => sent.has(key))
      .map(([, receiver]) => receiver);
  }

  /**
   * Drop Sent and GivenUp attempts last updated before `cutoff`, from memory
   * and from the store.
   * @returns number of in-memory attempts removed
   */
  purgeTerminal(cutoff: Date): number {
    const cutoffIso = cutoff.toISOString();
    let removed = 0;

    for (const [correlationId, list] of this.attempts) {
      const kept = list.filter(a => !(TERMINAL_STATUSES.includes(a.status) && a.updatedAt < cutoffIso));
      removed += list.length - kept.length;
      if (kept.length === 0) {
        this.attempts.delete(correlationId);
        this.resolutions.delete(correlationId);
        if (!this.targets.has(correlationId)) {
          this.sequences.delete(correlationId);
        }
      } else {
        this.attempts.set(correlationId, kept);
      }
    }

    if (this.store) {
      this.store.deleteTerminalOlderThan(cutoffIso);
    }

    return removed;
  }

  /** Visible for testing */
  get pendingRetryCount(): number {
    return this.pendingRetries.length;
  }

  private buildPayload(event: TransitionEvent): NotificationPayload {
    const sequence = (this.sequences.get(event.correlationId) ?? 0) + 1;
    this.sequences.set(event.correlationId, sequence);

    return {
      correlationId: event.correlationId,
      ruleId: event.rule.id,
      ruleName: event.rule.name,
      severity: event.rule.severity,
      severityLabel: event.rule.severityLabel,
      state: event.instance.state,
      eventType: event.type,
      timestamp: event.timestamp,
      idempotencyKey: `${event.correlationId}:${event.type}:${sequence}`,
    };
  }

  private createAttempt(receiver: Receiver, payload: NotificationPayload): NotificationAttempt {
    const now = new Date().toISOString();
    const attempt: NotificationAttempt = {
      id: randomUUID(),
      correlationId: payload.correlationId,
      ruleId: payload.ruleId,
      eventType: payload.eventType,
      receiver,
      receiverKey: receiverKey(receiver),
      attemptNumber: 0,
      status: 'Pending',
      nextRetryAt: null,
      lastError: null,
      payload,
      createdAt: now,
      updatedAt: now,
    };
    this.track(attempt);
    this.persist(attempt);
    return attempt;
  }

  private receiversFor(event: TransitionEvent): Receiver[] {
    if (event.type === 'Resolved') {
      return this.getTargets(event.correlationId);
    }

    const snapshot = event.registry ?? this.registry.snapshot();
    const receivers = snapshot.listReceiversFor(event.rule.severity, event.rule.actionGroupRefs);
    this.target(event.correlationId, receivers);
    return receivers;
  }

  private target(correlationId: string, receivers: readonly Receiver[]): void {
    const targeted = this.targets.get(correlationId) ?? new Map<string, Receiver>();
    for (const receiver of receivers) {
      const key = receiverKey(receiver);
      if (!targeted.has(key)) {
        targeted.set(key, receiver);
      }
    }
    this.targets.set(correlationId, targeted);
  }

  /**
   * After a restart the episode's sent notices and numbering are only in
   * the store.
   */
  private restoreEpisode(correlationId: string): void {
    if (!this.store || this.delivered.has(correlationId)) return;

    let stored: NotificationAttempt[];
    try {
      stored = this.store.findByCorrelationId(correlationId);
    } catch (error) {
      logger.error({ err: error, correlationId }, 'failed to read notification attempts');
      return;
    }

    const numbered = new Set(stored.map(attempt => attempt.payload.idempotencyKey)).size;
    this.sequences.set(correlationId, Math.max(this.sequences.get(correlationId) ?? 0, numbered));

    const notices = stored.filter(attempt => attempt.eventType !== 'Resolved');
    this.target(correlationId, notices.map(attempt => attempt.receiver));
    for (const attempt of notices) {
      if (attempt.status === 'Sent') {
        this.markDelivered(attempt);
      }
    }
  }

  private markDelivered(attempt: NotificationAttempt): void {
    const sent = this.delivered.get(attempt.correlationId) ?? new Set<string>();
    sent.add(attempt.receiverKey);
    this.delivered.set(attempt.correlationId, sent);
  }

  /**
   * Drop the scheduled retries of an episode's Fired/StillFiring notices.
   */
  private abandonOpenNotices(correlationId: string): void {
    const open = (this.attempts.get(correlationId) ?? []).filter(
      attempt =>
        attempt.eventType !== 'Resolved' && this.pendingRetries.some(retry => retry.attemptId === attempt.id),
    );
    for (const attempt of open) {
      for (const retry of this.pendingRetries.filter(r => r.attemptId === attempt.id)) {
        clearTimeout(retry.timer);
      }
      this.pendingRetries = this.pendingRetries.filter(r => r.attemptId !== attempt.id);
      this.abandon(attempt);
    }
  }

  private abandon(attempt: NotificationAttempt): void {
    attempt.status = 'GivenUp';
    attempt.nextRetryAt = null;
    attempt.lastError = 'Episode resolved before delivery';
    attempt.updatedAt = new Date().toISOString();
    this.persist(attempt);
    logger.info(
      { correlationId: attempt.correlationId, receiver: attempt.receiverKey, eventType: attempt.eventType },
      'notification abandoned, episode resolved',
    );
  }

  /**
   * A Fired/StillFiring notice landed after its episode resolved: send the
   * resolution too, unless the receiver already has one.
   */
  private followWithResolution(attempt: NotificationAttempt, resolution: NotificationPayload): void {
    const alreadyResolved = (this.attempts.get(attempt.correlationId) ?? []).some(
      other => other.eventType === 'Resolved' && other.receiverKey === attempt.receiverKey,
    );
    if (alreadyResolved) return;

    const followUp = this.createAttempt(attempt.receiver, resolution);
    this.runAttempt(followUp).catch(error => {
      logger.error({ err: error, attemptId: followUp.id }, 'resolution follow-up threw');
    });
  }

  private track(attempt: NotificationAttempt): void {
    const list = this.attempts.get(attempt.correlationId) ?? [];
    list.push(attempt);
    this.attempts.set(attempt.correlationId, list);
  }

  private runAttempt(attempt: NotificationAttempt): Promise<void> {
    const run = this.deliverOnce(attempt).finally(() => {
      this.inFlight.delete(run);
    });
    this.inFlight.add(run);
    return run;
  }

  private async deliverOnce(attempt: NotificationAttempt): Promise<void> {
    attempt.attemptNumber++;
    attempt.status = 'Pending';
    attempt.nextRetryAt = null;

    const result = await this.callDelivery(attempt);
    attempt.updatedAt = new Date().toISOString();

    if (result.ok) {
      attempt.status = 'Sent';
      attempt.lastError = null;
      this.persist(attempt);
      logger.info(
        { correlationId: attempt.correlationId, receiver: attempt.receiverKey, attemptNumber: attempt.attemptNumber },
        'notification sent',
      );
      this.emit(DispatchEventType.SENT, { ...attempt });

      if (attempt.eventType !== 'Resolved') {
        const resolution = this.resolutions.get(attempt.correlationId);
        if (resolution) {
          this.followWithResolution(attempt, resolution);
        } else {
          this.markDelivered(attempt);
        }
      }
      return;
    }

    attempt.lastError = result.error.message;

    if (attempt.eventType !== 'Resolved' && this.resolutions.has(attempt.correlationId)) {
      this.abandon(attempt);
      return;
    }

    if (!result.error.transient || !canRetry(attempt.attemptNumber, this.options.backoff)) {
      this.giveUp(attempt);
      return;
    }

    const delay = retryDelay(attempt.attemptNumber, this.options.backoff);
    attempt.status = 'Failed';
    attempt.nextRetryAt = new Date(Date.now() + delay).toISOString();
    this.persist(attempt);

    logger.warn(
      { correlationId: attempt.correlationId, receiver: attempt.receiverKey, attemptNumber: attempt.attemptNumber, delay, error: attempt.lastError },
      'notification failed, retry scheduled',
    );
    this.emit(DispatchEventType.RETRY_SCHEDULED, { ...attempt });
    this.scheduleRetry(attempt, delay);
  }

  private async callDelivery(attempt: NotificationAttempt): Promise<Result<void, DeliveryError>> {
    const delivery = this.deliveries.get(attempt.receiver.kind) ?? this.defaultDelivery;

    try {
      return await withTimeout(
        signal => delivery.deliver(attempt.receiver, attempt.payload, signal),
        this.options.timeoutMs,
      );
    } catch (error) {
      if (error instanceof TimeoutError) {
        return err(new DeliveryError(`Delivery timed out after ${this.options.timeoutMs}ms`));
      }
      if (error instanceof DeliveryError) {
        return err(error);
      }
      return err(new DeliveryError(`Delivery threw: ${errorMessage(error)}`));
    }
  }

  private giveUp(attempt: NotificationAttempt): void {
    attempt.status = 'GivenUp';
    this.persist(attempt);

    const error = attempt.lastError ?? 'unknown error';
    logger.error(
      { correlationId: attempt.correlationId, ruleId: attempt.ruleId, receiver: attempt.receiverKey, attemptNumber: attempt.attemptNumber, error },
      'notification given up',
    );

    const event: GivenUpEvent = { attempt: { ...attempt }, error };
    this.emit(DispatchEventType.GIVEN_UP, event);
  }

  private scheduleRetry(attempt: NotificationAttempt, delayMs: number): void {
    const timer = setTimeout(() => {
      this.pendingRetries = this.pendingRetries.filter(r => r.timer !== timer);
      if (this.isShuttingDown || attempt.status === 'GivenUp') return;

      this.runAttempt(attempt).catch(error => {
        logger.error({ err: error, attemptId: attempt.id }, 'notification retry threw');
      });
    }, delayMs);

    timer.unref(); // Don't keep the process alive for retries

    this.pendingRetries.push({ timer, attemptId: attempt.id });
  }

  private persist(attempt: NotificationAttempt): void {
    if (!this.store) return;
    try {
      this.store.save(attempt);
    } catch (error) {
      logger.error({ err: error, attemptId: attempt.id }, 'failed to record notification attempt');
    }
  }
}
