import { Request, Response } from 'express';
import type { AlertEngine } from '../../services/engine';
import type { AlertRule } from '../../services/config/types';
import { NotFoundError, sendErrorResponse } from '../../utils/errors';
import { formatAggregation } from '../../services/config/types';

/** Rule as served over HTTP, with the aggregation flattened to its label. */
function toRuleResponse(rule: AlertRule) {
  return { ...rule, aggregation: formatAggregation(rule.aggregation) };
}

export function listRules(engine: AlertEngine) {
  return (_req: Request, res: Response): void => {
    try {
      res.json({ rules: engine.listRules().map(toRuleResponse) });
    } catch (error) {
      sendErrorResponse(res, error, 'listing rules');
    }
  };
}

export function getRule(engine: AlertEngine) {
  return (req: Request, res: Response): void => {
    try {
      const { ruleId } = req.params;
      const rule = engine.getRule(ruleId);
      if (!rule) {
        throw new NotFoundError(`Rule ${ruleId}`);
      }
      res.json(toRuleResponse(rule));
    } catch (error) {
      sendErrorResponse(res, error, 'getting rule');
    }
  };
}
