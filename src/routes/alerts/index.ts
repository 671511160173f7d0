import { Router } from 'express';
import type { AlertEngine } from '../../services/engine';
import { listFiringAlerts } from './list';
import { getAlert } from './get';
import { getAlertHistory } from './history';
import { resolveAlert } from './resolve';
import { listAlertNotifications } from './notifications';

export function createAlertsRouter(engine: AlertEngine): Router {
  const router = Router();

  router.get('/', listFiringAlerts(engine));
  router.get('/:ruleId', getAlert(engine));
  router.get('/:ruleId/history', getAlertHistory(engine));
  router.get('/:ruleId/notifications', listAlertNotifications(engine));
  router.post('/:ruleId/resolve', resolveAlert(engine));

  return router;
}
