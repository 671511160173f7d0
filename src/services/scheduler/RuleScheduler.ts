import { EventEmitter } from 'events';
import logger from '../../utils/logger';
import { ScheduleStateManager } from './ScheduleStateManager';
import {
  EvaluateRuleFn,
  EvaluationCompleteEvent,
  EvaluationFailedEvent,
  EvaluationSkippedEvent,
  RuleScheduleState,
  SchedulerEventType,
  SchedulerOptions,
} from './types';

const DEFAULT_OPTIONS: SchedulerOptions = {
  poolSize: 4,
  tickMs: 1000,
  jitterRatio: 0.1,
  random: Math.random,
  shutdownTimeoutMs: 5000,
};

const SHUTDOWN_CHECK_INTERVAL_MS = 100;

/**
 * Periodically evaluates every scheduled rule.
 *
 * Each tick starts the due rules while the worker pool has room; rules that
 * find no free worker stay due for the next tick. A rule that is still being
 * evaluated when it comes due again is skipped and deferred by one frequency
 * interval.
 */
export class RuleScheduler extends EventEmitter {
  private loopTimer: NodeJS.Timeout | null = null;
  private inFlight: Map<string, Promise<void>> = new Map();
  private stateManager: ScheduleStateManager;
  private options: SchedulerOptions;
  private isStopping = false;

  constructor(
    private readonly evaluate: EvaluateRuleFn,
    options: Partial<SchedulerOptions> = {},
    stateManager?: ScheduleStateManager,
  ) {
    super();
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.stateManager = stateManager || new ScheduleStateManager();
  }

  /**
   * Add a rule (due immediately) or update the frequency of a scheduled one.
   */
  schedule(ruleId: string, frequencyMs: number): void {
    if (this.stateManager.hasRule(ruleId)) {
      this.stateManager.updateFrequency(ruleId, frequencyMs);
      return;
    }

    this.stateManager.addRule(ruleId, frequencyMs);
    logger.debug({ ruleId, frequencyMs }, 'rule scheduled');
    this.emit(SchedulerEventType.RULE_SCHEDULED, { ruleId });
  }

  /**
   * Stop scheduling a rule. An evaluation already running is left to finish.
   */
  unschedule(ruleId: string): void {
    if (!this.stateManager.removeRule(ruleId)) return;

    logger.debug({ ruleId }, 'rule unscheduled');
    this.emit(SchedulerEventType.RULE_UNSCHEDULED, { ruleId });
  }

  start(): void {
    if (this.loopTimer || this.isStopping) return;

    logger.info({ tickMs: this.options.tickMs, poolSize: this.options.poolSize }, 'scheduler started');

    this.runTick();
    this.loopTimer = setInterval(() => this.runTick(), this.options.tickMs);
  }

  /**
   * Run one scheduling pass. Resolves once every evaluation it started has
   * settled.
   */
  async tick(now: number = Date.now()): Promise<void> {
    if (this.isStopping) return;

    const started: Promise<void>[] = [];

    for (const state of this.stateManager.getDueRules(now)) {
      if (this.inFlight.has(state.ruleId)) {
        this.skip(state, now);
        continue;
      }

      if (this.inFlight.size >= this.options.poolSize) {
        continue;
      }

      started.push(this.launch(state.ruleId, now));
    }

    await Promise.allSettled(started);
  }

  /**
   * Evaluate a rule right away, outside the pool.
   * @returns false if the rule is already being evaluated
   */
  async runNow(ruleId: string): Promise<boolean> {
    if (this.isStopping || this.inFlight.has(ruleId)) {
      return false;
    }
    await this.launch(ruleId, Date.now());
    return true;
  }

  /**
   * Stop the tick loop and wait (bounded) for in-flight evaluations.
   */
  async stop(): Promise<void> {
    this.isStopping = true;

    if (this.loopTimer) {
      clearInterval(this.loopTimer);
      this.loopTimer = null;
    }

    let waited = 0;
    while (waited < this.options.shutdownTimeoutMs && this.inFlight.size > 0) {
      await new Promise<void>(resolve => {
        const timer = setTimeout(resolve, SHUTDOWN_CHECK_INTERVAL_MS);
        timer.unref();
      });
      waited += SHUTDOWN_CHECK_INTERVAL_MS;
    }

    if (this.inFlight.size > 0) {
      logger.warn({ pending: Array.from(this.inFlight.keys()) }, 'scheduler stopped with evaluations still running');
    }

    this.stateManager.clear();
    logger.info('scheduler stopped');
  }

  isRunning(): boolean {
    return this.loopTimer !== null;
  }

  isScheduled(ruleId: string): boolean {
    return this.stateManager.hasRule(ruleId);
  }

  isEvaluating(ruleId: string): boolean {
    return this.inFlight.has(ruleId);
  }

  getScheduledRules(): string[] {
    return this.stateManager.getRuleIds();
  }

  /** Visible for testing */
  getState(ruleId: string): RuleScheduleState | undefined {
    return this.stateManager.getState(ruleId);
  }

  /** Visible for testing */
  get inFlightCount(): number {
    return this.inFlight.size;
  }

  private runTick(): void {
    this.tick().catch(err => {
      logger.error({ err }, 'scheduler tick failed');
    });
  }

  private launch(ruleId: string, now: number): Promise<void> {
    const state = this.stateManager.getState(ruleId);
    if (state) {
      this.stateManager.markStarted(ruleId, now, this.jitteredInterval(state.frequencyMs));
    }

    const startedAt = Date.now();
    const run = Promise.resolve()
      .then(() => this.evaluate(ruleId))
      .finally(() => {
        this.inFlight.delete(ruleId);
        this.stateManager.markFinished(ruleId);
      });
    this.inFlight.set(ruleId, run);

    return run.then(
      () => {
        const event: EvaluationCompleteEvent = { ruleId, durationMs: Date.now() - startedAt };
        this.emit(SchedulerEventType.EVALUATION_COMPLETE, event);
      },
      (error: unknown) => {
        logger.error({ err: error, ruleId }, 'rule evaluation failed');
        const event: EvaluationFailedEvent = { ruleId, error };
        this.emit(SchedulerEventType.EVALUATION_FAILED, event);
        throw error;
      },
    );
  }

  private skip(state: RuleScheduleState, now: number): void {
    this.stateManager.defer(state.ruleId, now);
    logger.debug({ ruleId: state.ruleId }, 'rule still evaluating, skipped');
    const event: EvaluationSkippedEvent = { ruleId: state.ruleId, nextDue: now + state.frequencyMs };
    this.emit(SchedulerEventType.EVALUATION_SKIPPED, event);
  }

  private jitteredInterval(frequencyMs: number): number {
    const { jitterRatio, random } = this.options;
    const factor = 1 + (random() * 2 - 1) * jitterRatio;
    return Math.round(frequencyMs * factor);
  }
}
