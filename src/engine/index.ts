export { ConfigEngine, ConfigurationInvalidError, createEngine } from './engine.js';
export type { CheckResult, EngineOptions } from './engine.js';
