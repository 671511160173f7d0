import { Router } from 'express';
import type { AlertEngine } from '../../services/engine';
import { listRules, getRule } from './list';
import { evaluateRule } from './evaluate';
import { setRuleEnabled } from './enabled';

export function createRulesRouter(engine: AlertEngine): Router {
  const router = Router();

  router.get('/', listRules(engine));
  router.get('/:ruleId', getRule(engine));
  router.post('/:ruleId/evaluate', evaluateRule(engine));
  router.put('/:ruleId/enabled', setRuleEnabled(engine));

  return router;
}
