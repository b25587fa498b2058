export * from './pool/index.js';
export * from './ledger/index.js';
export { Storage } from './storage/index.js';
export { loadContext } from './context.js';
export type { PoolContext } from './context.js';
export { createApp, startServer } from './api/server.js';
export type { AppDeps } from './api/server.js';
export { config } from './config.js';
export { Logger, logger } from './utils/logger.js';
