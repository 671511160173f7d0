export { validateConfig, parseAggregation } from './ConfigValidator';
export type { ConfigValidationResult } from './ConfigValidator';
export { RuleConfigStore } from './RuleConfigStore';
export * from './types';
