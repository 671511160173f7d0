import request from 'supertest';
import { createTestContext, flush, TestContext } from '../../testing/appFixture';
import { ok } from '../../utils/result';

jest.mock('../../utils/logger', () => ({
  __esModule: true,
  default: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn(), fatal: jest.fn() },
}));

describe('Alerts API', () => {
  let ctx: TestContext;

  async function fire(): Promise<void> {
    ctx.telemetry.queryAggregate.mockResolvedValue(ok(3000));
    await ctx.engine.evaluateNow('high-latency');
    await ctx.engine.evaluateNow('high-latency');
    await flush();
  }

  beforeEach(() => {
    ctx = createTestContext();
  });

  afterEach(async () => {
    await ctx.engine.shutdown();
    ctx.db.close();
  });

  describe('GET /api/alerts', () => {
    it('should return an empty list when nothing is firing', async () => {
      const response = await request(ctx.app).get('/api/alerts');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ alerts: [] });
    });

    it('should list firing instances', async () => {
      await fire();

      const response = await request(ctx.app).get('/api/alerts');

      expect(response.status).toBe(200);
      expect(response.body.alerts).toHaveLength(1);
      expect(response.body.alerts[0]).toMatchObject({ ruleId: 'high-latency', state: 'Firing', sequence: 1 });
    });
  });

  describe('GET /api/alerts/:ruleId', () => {
    it('should return the current instance', async () => {
      const response = await request(ctx.app).get('/api/alerts/high-latency');

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        ruleId: 'high-latency',
        state: 'Pending',
        consecutiveBreaches: 0,
        correlationId: null,
      });
    });

    it('should return 404 for an unknown rule', async () => {
      const response = await request(ctx.app).get('/api/alerts/unknown');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ error: 'Rule unknown not found' });
    });
  });

  describe('GET /api/alerts/:ruleId/history', () => {
    it('should return every instance of the rule', async () => {
      await fire();
      await request(ctx.app).post('/api/alerts/high-latency/resolve');
      await ctx.engine.evaluateNow('high-latency');

      const response = await request(ctx.app).get('/api/alerts/high-latency/history');

      expect(response.status).toBe(200);
      expect(response.body.total).toBe(2);
      expect(response.body.limit).toBe(50);
      expect(response.body.instances.map((i: { sequence: number; state: string }) => [i.sequence, i.state])).toEqual([
        [1, 'Resolved'],
        [2, 'Pending'],
      ]);
    });

    it('should cap the result at limit, keeping the newest', async () => {
      await fire();
      await request(ctx.app).post('/api/alerts/high-latency/resolve');
      await ctx.engine.evaluateNow('high-latency');

      const response = await request(ctx.app).get('/api/alerts/high-latency/history?limit=1');

      expect(response.body.instances).toHaveLength(1);
      expect(response.body.instances[0].sequence).toBe(2);
    });

    it('should return 404 for an unknown rule', async () => {
      const response = await request(ctx.app).get('/api/alerts/unknown/history');

      expect(response.status).toBe(404);
    });
  });

  describe('POST /api/alerts/:ruleId/resolve', () => {
    it('should resolve a firing alert', async () => {
      await fire();

      const response = await request(ctx.app).post('/api/alerts/high-latency/resolve');

      expect(response.status).toBe(200);
      expect(response.body.state).toBe('Resolved');
      expect(response.body.resolvedAt).toEqual(expect.any(String));
    });

    it('should return 409 when the alert is not firing', async () => {
      const response = await request(ctx.app).post('/api/alerts/high-latency/resolve');

      expect(response.status).toBe(409);
      expect(response.body).toEqual({
        error: 'Rule high-latency is Pending, only a Firing alert can be resolved',
      });
    });

    it('should return 409 when the rule is disabled', async () => {
      await fire();
      ctx.engine.setRuleEnabled('high-latency', false);

      const response = await request(ctx.app).post('/api/alerts/high-latency/resolve');

      expect(response.status).toBe(409);
      expect(response.body).toEqual({ error: 'Rule high-latency is disabled' });
    });

    it('should return 404 for an unknown rule', async () => {
      const response = await request(ctx.app).post('/api/alerts/unknown/resolve');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ error: 'Rule unknown not found' });
    });
  });

  describe('GET /api/alerts/:ruleId/notifications', () => {
    it('should be empty before the alert fires', async () => {
      const response = await request(ctx.app).get('/api/alerts/high-latency/notifications');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ ruleId: 'high-latency', correlationId: null, attempts: [] });
    });

    it('should list the attempts of the current episode', async () => {
      await fire();

      const response = await request(ctx.app).get('/api/alerts/high-latency/notifications');

      expect(response.status).toBe(200);
      expect(response.body.correlationId).toEqual(expect.any(String));
      expect(response.body.attempts).toHaveLength(1);
      expect(response.body.attempts[0]).toMatchObject({
        eventType: 'Fired',
        receiverKey: 'email:ops@example.com',
        status: 'Sent',
        attemptNumber: 1,
      });
    });
  });
});
