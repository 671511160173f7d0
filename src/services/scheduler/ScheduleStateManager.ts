import { RuleScheduleState } from './types';

/**
 * Tracks when each scheduled rule is next due and whether it is being
 * evaluated right now.
 */
export class ScheduleStateManager {
  private states: Map<string, RuleScheduleState> = new Map();

  /**
   * Add a rule, due immediately.
   */
  addRule(ruleId: string, frequencyMs: number, now: number = Date.now()): RuleScheduleState {
    const state: RuleScheduleState = {
      ruleId,
      frequencyMs,
      lastEvaluatedAt: 0,
      nextDue: now,
      isEvaluating: false,
      skippedCount: 0,
    };

    this.states.set(ruleId, state);
    return state;
  }

  /**
   * Change a rule's frequency. The current due time is kept; the new
   * frequency applies from the next evaluation.
   * @returns true if the rule was updated, false if not found
   */
  updateFrequency(ruleId: string, frequencyMs: number): boolean {
    const state = this.states.get(ruleId);
    if (!state) return false;

    state.frequencyMs = frequencyMs;
    return true;
  }

  removeRule(ruleId: string): boolean {
    return this.states.delete(ruleId);
  }

  getState(ruleId: string): RuleScheduleState | undefined {
    return this.states.get(ruleId);
  }

  hasRule(ruleId: string): boolean {
    return this.states.has(ruleId);
  }

  getRuleIds(): string[] {
    return Array.from(this.states.keys());
  }

  get size(): number {
    return this.states.size;
  }

  /**
   * Rules whose due time has passed, earliest first. Includes rules that are
   * still evaluating; the caller decides what to do with those.
   */
  getDueRules(now: number): RuleScheduleState[] {
    return Array.from(this.states.values())
      .filter(state => state.nextDue <= now)
      .sort((a, b) => a.nextDue - b.nextDue);
  }

  /**
   * Lock a rule and set its next due time.
   * @param intervalMs - Delay until the next evaluation (jitter already applied)
   */
  markStarted(ruleId: string, now: number, intervalMs: number): boolean {
    const state = this.states.get(ruleId);
    if (!state) return false;

    state.isEvaluating = true;
    state.lastEvaluatedAt = now;
    state.nextDue = now + intervalMs;
    return true;
  }

  markFinished(ruleId: string): boolean {
    const state = this.states.get(ruleId);
    if (!state) return false;

    state.isEvaluating = false;
    return true;
  }

  /**
   * Push a rule's due time back by one frequency interval.
   */
  defer(ruleId: string, now: number): boolean {
    const state = this.states.get(ruleId);
    if (!state) return false;

    state.nextDue = now + state.frequencyMs;
    state.skippedCount++;
    return true;
  }

  /**
   * Make a rule due at `now` (e.g. after it was re-enabled).
   */
  markDue(ruleId: string, now: number): boolean {
    const state = this.states.get(ruleId);
    if (!state) return false;

    state.nextDue = now;
    return true;
  }

  getActiveCount(): number {
    return Array.from(this.states.values())
      .filter(s => s.isEvaluating).length;
  }

  clear(): void {
    this.states.clear();
  }
}
