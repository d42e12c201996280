export type { ILogger } from './logging/ILogger.js';
export type { IRenderCache } from './services/IRenderCache.js';
export * from './wiki/index.js';
