export { AlertStateMachine } from './AlertStateMachine';
export * from './types';
