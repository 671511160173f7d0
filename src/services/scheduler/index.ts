export { RuleScheduler } from './RuleScheduler';
export { ScheduleStateManager } from './ScheduleStateManager';
export * from './types';
