export { ConfigManager, DEFAULT_ASSETS_DIR, LOG_LEVELS, isLogLevel } from './config.js';
export type { FaultpageConfig } from './config.js';
