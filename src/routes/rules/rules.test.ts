import request from 'supertest';
import { createTestContext, TestContext } from '../../testing/appFixture';
import { EvaluationError } from '../../utils/errors';
import { err, ok } from '../../utils/result';

jest.mock('../../utils/logger', () => ({
  __esModule: true,
  default: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn(), fatal: jest.fn() },
}));

describe('Rules API', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  afterEach(async () => {
    await ctx.engine.shutdown();
    ctx.db.close();
  });

  describe('GET /api/rules', () => {
    it('should list active rules with flattened aggregation', async () => {
      const response = await request(ctx.app).get('/api/rules');

      expect(response.status).toBe(200);
      expect(response.body.rules).toHaveLength(1);
      expect(response.body.rules[0]).toMatchObject({
        id: 'high-latency',
        aggregation: 'p95',
        comparator: '>',
        threshold: 2000,
        evaluationFrequencyMs: 300_000,
        windowSizeMs: 900_000,
        severityLabel: 'Warning',
        enabled: true,
        actionGroupRefs: ['ag-ops'],
      });
    });
  });

  describe('GET /api/rules/:ruleId', () => {
    it('should return the rule', async () => {
      const response = await request(ctx.app).get('/api/rules/high-latency');

      expect(response.status).toBe(200);
      expect(response.body.name).toBe('High latency');
    });

    it('should return 404 for an unknown rule', async () => {
      const response = await request(ctx.app).get('/api/rules/unknown');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ error: 'Rule unknown not found' });
    });
  });

  describe('POST /api/rules/:ruleId/evaluate', () => {
    it('should evaluate and return the updated instance', async () => {
      ctx.telemetry.queryAggregate.mockResolvedValueOnce(ok(3000));

      const response = await request(ctx.app).post('/api/rules/high-latency/evaluate');

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({ state: 'Pending', consecutiveBreaches: 1 });
      expect(ctx.telemetry.queryAggregate).toHaveBeenCalledWith(
        'requests/duration',
        { kind: 'percentile', p: 95 },
        900_000,
        expect.any(AbortSignal),
      );
    });

    it('should leave counters alone when telemetry fails', async () => {
      ctx.telemetry.queryAggregate.mockResolvedValueOnce(err(new EvaluationError('backend down')));

      const response = await request(ctx.app).post('/api/rules/high-latency/evaluate');

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({ state: 'Pending', consecutiveBreaches: 0, consecutiveClears: 0 });
    });

    it('should return 409 for a disabled rule', async () => {
      ctx.engine.setRuleEnabled('high-latency', false);

      const response = await request(ctx.app).post('/api/rules/high-latency/evaluate');

      expect(response.status).toBe(409);
      expect(response.body).toEqual({ error: 'Rule high-latency is disabled' });
      expect(ctx.telemetry.queryAggregate).not.toHaveBeenCalled();
    });

    it('should return 404 for an unknown rule', async () => {
      const response = await request(ctx.app).post('/api/rules/unknown/evaluate');

      expect(response.status).toBe(404);
    });
  });

  describe('PUT /api/rules/:ruleId/enabled', () => {
    it('should disable and re-enable a rule', async () => {
      const disabled = await request(ctx.app)
        .put('/api/rules/high-latency/enabled')
        .send({ enabled: false });

      expect(disabled.status).toBe(200);
      expect(disabled.body).toEqual({ ruleId: 'high-latency', enabled: false });
      expect(ctx.engine.getRule('high-latency')?.enabled).toBe(false);

      const enabled = await request(ctx.app)
        .put('/api/rules/high-latency/enabled')
        .send({ enabled: true });

      expect(enabled.body).toEqual({ ruleId: 'high-latency', enabled: true });
    });

    it('should reject a non-boolean value', async () => {
      const response = await request(ctx.app)
        .put('/api/rules/high-latency/enabled')
        .send({ enabled: 'no' });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: 'enabled must be a boolean', field: 'enabled' });
    });

    it('should reject a missing body', async () => {
      const response = await request(ctx.app).put('/api/rules/high-latency/enabled');

      expect(response.status).toBe(400);
    });

    it('should return 404 for an unknown rule', async () => {
      const response = await request(ctx.app)
        .put('/api/rules/unknown/enabled')
        .send({ enabled: true });

      expect(response.status).toBe(404);
    });
  });
});
