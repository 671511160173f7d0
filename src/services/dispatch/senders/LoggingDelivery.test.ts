import { LoggingDelivery } from './LoggingDelivery';
import { NotificationPayload } from '../types';
import logger from '../../../utils/logger';

jest.mock('../../../utils/logger', () => ({
  __esModule: true,
  default: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

const payload: NotificationPayload = {
  correlationId: 'corr-1',
  ruleId: 'cpu',
  ruleName: 'CPU high',
  severity: 1,
  severityLabel: 'Error',
  state: 'Firing',
  eventType: 'Fired',
  timestamp: '2026-03-01T12:00:00.000Z',
  idempotencyKey: 'corr-1:Fired:1',
};

describe('LoggingDelivery', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should log the notification and succeed', async () => {
    const delivery = new LoggingDelivery();

    const result = await delivery.deliver({ kind: 'email', name: 'oncall', address: 'Ops@Example.com' }, payload);

    expect(result).toEqual({ ok: true, value: undefined });
    expect(logger.info).toHaveBeenCalledWith(
      {
        receiver: 'email:ops@example.com',
        receiverName: 'oncall',
        ruleId: 'cpu',
        eventType: 'Fired',
        severity: 1,
        idempotencyKey: 'corr-1:Fired:1',
      },
      'notification delivered',
    );
  });
});
