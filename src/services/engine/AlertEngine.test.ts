import { AlertEngine } from './AlertEngine';
import { AlertEventType } from '../alerts/types';
import { HealthEventType } from '../evaluation/types';
import { openDatabase, closeDatabase } from '../../db';
import { StoreRegistry } from '../../stores';
import { ConflictError, EvaluationError, NotFoundError } from '../../utils/errors';
import { err, ok } from '../../utils/result';
import { createDocument, createRule } from '../../testing/configFixtures';

jest.mock('../../utils/logger', () => ({
  __esModule: true,
  default: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn(), fatal: jest.fn() },
}));

const flush = () => new Promise(resolve => setImmediate(resolve));

describe('AlertEngine', () => {
  let telemetry: { queryAggregate: jest.Mock };
  let delivery: { deliver: jest.Mock };
  let engine: AlertEngine;

  function respond(...values: number[]): void {
    for (const value of values) {
      telemetry.queryAggregate.mockResolvedValueOnce(ok(value));
    }
  }

  async function evaluate(ruleId: string, times = 1): Promise<void> {
    for (let i = 0; i < times; i++) {
      await engine.evaluateNow(ruleId);
    }
    await flush();
  }

  function deliveredEvents(): Array<[string, string]> {
    return delivery.deliver.mock.calls.map(call => [call[1].eventType, call[0].name]);
  }

  beforeEach(() => {
    telemetry = { queryAggregate: jest.fn() };
    delivery = { deliver: jest.fn().mockResolvedValue(ok(undefined)) };
    engine = new AlertEngine({ telemetry, delivery });
  });

  afterEach(async () => {
    await engine.shutdown();
  });

  describe('loadConfig', () => {
    it('should activate every rule with a fresh Pending instance', () => {
      const result = engine.loadConfig(createDocument([createRule(), createRule({ id: 'error-rate', severity: 0 })]));

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value).toEqual(expect.objectContaining({
          version: 1,
          ruleIds: ['high-latency', 'error-rate'],
          actionGroupIds: ['ag-ops', 'ag-escalation'],
        }));
      }
      for (const ruleId of ['high-latency', 'error-rate']) {
        expect(engine.getAlertInstance(ruleId)).toEqual(expect.objectContaining({
          state: 'Pending',
          consecutiveBreaches: 0,
        }));
      }
    });

    it('should reject a rule referencing a missing action group and activate nothing', () => {
      const result = engine.loadConfig(createDocument([createRule(), createRule({ id: 'orphan', actionGroupRefs: ['ag-missing'] })]));

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.map(issue => [issue.field, issue.message])).toEqual([
          ['alertRules.rules[1].actionGroupRefs[0]', 'Action group "ag-missing" does not exist'],
        ]);
      }
      expect(engine.getAlertInstance('high-latency')).toBeNull();
      expect(engine.listRules()).toEqual([]);
      expect(engine.getConfigVersion()).toBeNull();
    });

    it('should load JSON text and report unparseable text', () => {
      expect(engine.loadConfigText(JSON.stringify(createDocument())).ok).toBe(true);

      const broken = engine.loadConfigText('{ not json');
      expect(broken.ok).toBe(false);
      if (!broken.ok) {
        expect(broken.error[0].field).toBe('');
        expect(broken.error[0].message).toMatch(/^Invalid JSON: /);
      }
    });
  });

  describe('lifecycle', () => {
    beforeEach(() => {
      engine.loadConfig(createDocument());
    });

    it('should fire after consecutive breaches and notify the action group', async () => {
      const fired = jest.fn();
      engine.on(AlertEventType.FIRED, fired);
      respond(2500, 2600);

      await evaluate('high-latency', 2);

      const instance = engine.getAlertInstance('high-latency');
      expect(instance?.state).toBe('Firing');
      expect(instance?.correlationId).toEqual(expect.any(String));
      expect(fired).toHaveBeenCalledTimes(1);
      expect(engine.listFiring().map(i => i.ruleId)).toEqual(['high-latency']);
      expect(deliveredEvents()).toEqual([['Fired', 'oncall']]);
    });

    it('should resolve on the second consecutive clear and notify the same receivers', async () => {
      respond(2500, 2600, 100, 100);

      await evaluate('high-latency', 4);

      expect(engine.getAlertInstance('high-latency')?.state).toBe('Resolved');
      expect(engine.listFiring()).toEqual([]);
      expect(deliveredEvents()).toEqual([['Fired', 'oncall'], ['Resolved', 'oncall']]);
    });

    it('should route severity 0 rules to the escalation group as well', async () => {
      engine.loadConfig(createDocument([createRule({ id: 'error-rate', severity: 0, consecutiveBreachesToFire: 1 })]));
      respond(2500);

      await evaluate('error-rate');

      expect(deliveredEvents()).toEqual([['Fired', 'oncall'], ['Fired', 'pager']]);
    });

    it('should record notification attempts by correlation id', async () => {
      respond(2500, 2600);
      await evaluate('high-latency', 2);

      const correlationId = engine.getAlertInstance('high-latency')?.correlationId ?? '';
      const attempts = engine.getNotificationAttempts(correlationId);

      expect(attempts.map(a => [a.receiverKey, a.status])).toEqual([['email:ops@example.com', 'Sent']]);
      expect(attempts[0].payload.idempotencyKey).toBe(`${correlationId}:Fired:1`);
    });

    it('should open a new instance for a breach after Resolved', async () => {
      respond(2500, 2600, 100, 100, 2500);

      await evaluate('high-latency', 5);

      const history = engine.getInstanceHistory('high-latency');
      expect(history.map(i => [i.sequence, i.state])).toEqual([[1, 'Resolved'], [2, 'Pending']]);
      expect(history[1].consecutiveBreaches).toBe(1);
    });
  });

  describe('manualResolve', () => {
    beforeEach(() => {
      engine.loadConfig(createDocument([createRule({ autoMitigate: false, consecutiveBreachesToFire: 1 })]));
    });

    it('should keep a non-mitigating alert Firing until resolved by hand', async () => {
      respond(2500, 100, 100, 100);
      await evaluate('high-latency', 4);
      expect(engine.getAlertInstance('high-latency')?.state).toBe('Firing');

      const resolved = engine.manualResolve('high-latency');
      await flush();

      expect(resolved.state).toBe('Resolved');
      expect(deliveredEvents()).toEqual([['Fired', 'oncall'], ['Resolved', 'oncall']]);
    });

    it('should refuse to resolve the alert of a disabled rule', async () => {
      respond(2500);
      await evaluate('high-latency');
      engine.setRuleEnabled('high-latency', false);

      expect(() => engine.manualResolve('high-latency')).toThrow(
        new ConflictError('Rule high-latency is disabled'),
      );
      expect(engine.getAlertInstance('high-latency')?.state).toBe('Firing');
    });

    it('should refuse to resolve an alert that is not Firing', () => {
      expect(() => engine.manualResolve('high-latency')).toThrow(ConflictError);
    });

    it('should report an unknown rule', () => {
      expect(() => engine.manualResolve('nope')).toThrow(NotFoundError);
    });
  });

  describe('evaluation errors', () => {
    beforeEach(() => {
      engine.loadConfig(createDocument());
    });

    it('should mark a rule degraded after three errors without touching its alert', async () => {
      const degraded = jest.fn();
      const recovered = jest.fn();
      engine.on(HealthEventType.DEGRADED, degraded);
      engine.on(HealthEventType.RECOVERED, recovered);
      respond(2500);
      await evaluate('high-latency');

      for (let i = 0; i < 3; i++) {
        telemetry.queryAggregate.mockResolvedValueOnce(err(new EvaluationError('backend down')));
      }
      await evaluate('high-latency', 3);

      expect(engine.listDegraded()).toEqual([expect.objectContaining({
        ruleId: 'high-latency',
        consecutiveErrors: 3,
        lastError: 'backend down',
      })]);
      expect(degraded).toHaveBeenCalledTimes(1);
      expect(engine.getAlertInstance('high-latency')).toEqual(expect.objectContaining({
        state: 'Pending',
        consecutiveBreaches: 1,
      }));

      respond(2500);
      await evaluate('high-latency');

      expect(engine.listDegraded()).toEqual([]);
      expect(recovered).toHaveBeenCalledTimes(1);
      expect(engine.getAlertInstance('high-latency')?.state).toBe('Firing');
    });

    it('should count an error as a breach under onMissingData breach', async () => {
      engine.loadConfig(createDocument([createRule({ onMissingData: 'breach', consecutiveBreachesToFire: 1 })]));
      telemetry.queryAggregate.mockResolvedValueOnce(err(new EvaluationError('timeout', 'timeout')));

      await evaluate('high-latency');

      expect(engine.getAlertInstance('high-latency')?.state).toBe('Firing');
    });
  });

  describe('setRuleEnabled', () => {
    beforeEach(() => {
      engine.loadConfig(createDocument());
    });

    it('should freeze a disabled rule and resume from the frozen state', async () => {
      respond(2500);
      await evaluate('high-latency');

      const disabled = engine.setRuleEnabled('high-latency', false);
      expect(disabled.enabled).toBe(false);
      await expect(engine.evaluateNow('high-latency')).rejects.toThrow(ConflictError);
      expect(engine.getStatus().scheduledRules).toBe(0);

      engine.setRuleEnabled('high-latency', true);
      respond(2500);
      await evaluate('high-latency');

      expect(engine.getAlertInstance('high-latency')?.state).toBe('Firing');
      expect(engine.getStatus().scheduledRules).toBe(1);
    });

    it('should report an unknown rule', () => {
      expect(() => engine.setRuleEnabled('nope', false)).toThrow(NotFoundError);
    });
  });

  describe('reload', () => {
    it('should keep counters of surviving rules', async () => {
      engine.loadConfig(createDocument());
      respond(2500);
      await evaluate('high-latency');

      const result = engine.reload(createDocument([createRule({ evaluationFrequency: 'PT1M', windowSize: 'PT5M' })]));

      expect(result.ok).toBe(true);
      expect(engine.getAlertInstance('high-latency')?.consecutiveBreaches).toBe(1);
      expect(engine.getRule('high-latency')?.evaluationFrequencyMs).toBe(60_000);
    });

    it('should keep the previous configuration when the new one is invalid', () => {
      engine.loadConfig(createDocument());

      const result = engine.reload(createDocument([createRule({ threshold: 'high' })]));

      expect(result.ok).toBe(false);
      expect(engine.getConfigVersion()?.version).toBe(1);
      expect(engine.getRule('high-latency')?.threshold).toBe(2000);
    });

    it('should drop removed rules from listFiring but keep their history', async () => {
      engine.loadConfig(createDocument([createRule({ consecutiveBreachesToFire: 1 })]));
      respond(2500);
      await evaluate('high-latency');

      engine.reload(createDocument([createRule({ id: 'other' })]));

      expect(engine.listFiring()).toEqual([]);
      expect(engine.getInstanceHistory('high-latency').map(i => i.state)).toEqual(['Firing']);
      await expect(engine.evaluateNow('high-latency')).rejects.toThrow(NotFoundError);
    });
  });

  describe('persistence', () => {
    it('should restore alert instances and attempts from the stores', async () => {
      const db = openDatabase(':memory:');
      const stores = StoreRegistry.create(db);
      await engine.shutdown();

      engine = new AlertEngine({ telemetry, delivery, stores });
      engine.loadConfig(createDocument([createRule({ consecutiveBreachesToFire: 1 })]));
      respond(2500);
      await evaluate('high-latency');
      const fired = engine.getAlertInstance('high-latency');
      await engine.shutdown();

      engine = new AlertEngine({ telemetry, delivery, stores });
      engine.loadConfig(createDocument([createRule({ consecutiveBreachesToFire: 1 })]));

      expect(engine.getAlertInstance('high-latency')).toEqual(fired);
      expect(engine.listFiring()).toHaveLength(1);
      expect(stores.notificationAttempts.findByCorrelationId(fired?.correlationId ?? '').map(a => a.status))
        .toEqual(['Sent']);

      closeDatabase(db);
    });
  });

  describe('getStatus', () => {
    it('should summarize the engine', async () => {
      engine.loadConfig(createDocument([createRule({ consecutiveBreachesToFire: 1 }), createRule({ id: 'idle', enabled: false })]));
      respond(2500);
      await evaluate('high-latency');

      expect(engine.getStatus()).toEqual({
        running: false,
        configVersion: 1,
        rules: 2,
        scheduledRules: 1,
        firing: 1,
        degraded: 0,
        evaluationsInFlight: 0,
        pendingRetries: 0,
      });
    });
  });
});
