export { AlertEngine } from './AlertEngine';
export type { AlertEngineOptions, EngineHandle, EngineStatus } from './AlertEngine';
