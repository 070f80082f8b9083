// Main project index

export * from './pipeline/index.ts';

export { loadSettings } from './config/settings.ts';
export type { Settings } from './config/settings.ts';
export { createLogger, LogLevel } from './utils/logger.ts';
export type { Logger } from './utils/logger.ts';
