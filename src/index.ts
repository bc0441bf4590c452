/**
 * Provider routing core
 */

export { createProviderRouting, startProviderRouting } from './app.js';
export type { ProviderRouting, ProviderRoutingOptions } from './app.js';

export * from './services/providers/index.js';
export * from './errors/index.js';
export * from './types/provider.js';
export * from './types/music.js';
export { ConfigManager } from './config/ConfigManager.js';
export type * from './config/types.js';
export { logger, initializeLogger } from './middleware/logging.js';
