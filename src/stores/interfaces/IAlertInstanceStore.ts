import { AlertInstance } from '../../services/alerts/types';

export interface IAlertInstanceStore {
  /** Insert or update by instance id. */
  save(instance: AlertInstance): void;
  findById(id: string): AlertInstance | undefined;
  /** Every instance of a rule, oldest episode first. */
  findByRuleId(ruleId: string): AlertInstance[];
  /** The highest-sequence instance of every rule. */
  findLatestPerRule(): AlertInstance[];
  count(): number;
}
