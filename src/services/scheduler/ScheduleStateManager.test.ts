import { ScheduleStateManager } from './ScheduleStateManager';

describe('ScheduleStateManager', () => {
  let manager: ScheduleStateManager;

  beforeEach(() => {
    manager = new ScheduleStateManager();
  });

  describe('addRule', () => {
    it('should make a new rule due immediately', () => {
      const state = manager.addRule('cpu', 60_000, 1_000);

      expect(state).toEqual({
        ruleId: 'cpu',
        frequencyMs: 60_000,
        lastEvaluatedAt: 0,
        nextDue: 1_000,
        isEvaluating: false,
        skippedCount: 0,
      });
      expect(manager.getDueRules(1_000).map(s => s.ruleId)).toEqual(['cpu']);
    });
  });

  describe('getDueRules', () => {
    it('should return due rules earliest first', () => {
      manager.addRule('late', 60_000, 500);
      manager.addRule('early', 60_000, 100);
      manager.addRule('future', 60_000, 5_000);

      expect(manager.getDueRules(1_000).map(s => s.ruleId)).toEqual(['early', 'late']);
    });
  });

  describe('markStarted / markFinished', () => {
    it('should lock the rule and move its due time', () => {
      manager.addRule('cpu', 60_000, 0);

      manager.markStarted('cpu', 1_000, 58_000);

      expect(manager.getState('cpu')).toEqual(expect.objectContaining({
        isEvaluating: true,
        lastEvaluatedAt: 1_000,
        nextDue: 59_000,
      }));
      expect(manager.getActiveCount()).toBe(1);

      manager.markFinished('cpu');
      expect(manager.getActiveCount()).toBe(0);
    });

    it('should return false for an unknown rule', () => {
      expect(manager.markStarted('ghost', 0, 1)).toBe(false);
      expect(manager.markFinished('ghost')).toBe(false);
    });
  });

  describe('defer', () => {
    it('should push the due time back one frequency interval', () => {
      manager.addRule('cpu', 60_000, 0);

      manager.defer('cpu', 10_000);

      expect(manager.getState('cpu')?.nextDue).toBe(70_000);
      expect(manager.getState('cpu')?.skippedCount).toBe(1);
    });
  });

  describe('updateFrequency', () => {
    it('should keep the due time', () => {
      manager.addRule('cpu', 60_000, 0);
      manager.markStarted('cpu', 0, 60_000);

      manager.updateFrequency('cpu', 300_000);

      expect(manager.getState('cpu')).toEqual(expect.objectContaining({ frequencyMs: 300_000, nextDue: 60_000 }));
    });
  });

  describe('markDue', () => {
    it('should make a rule due at the given time', () => {
      manager.addRule('cpu', 60_000, 0);
      manager.markStarted('cpu', 0, 60_000);

      manager.markDue('cpu', 5_000);

      expect(manager.getDueRules(5_000).map(s => s.ruleId)).toEqual(['cpu']);
    });
  });

  it('should remove and clear rules', () => {
    manager.addRule('a', 60_000);
    manager.addRule('b', 60_000);

    expect(manager.removeRule('a')).toBe(true);
    expect(manager.removeRule('a')).toBe(false);
    expect(manager.getRuleIds()).toEqual(['b']);

    manager.clear();
    expect(manager.size).toBe(0);
  });
});
