/**
 * Library entry: the compliance engines, plugin system and servers.
 * The stdio executable lives in ./main.ts.
 */

export * from './types/index.js';
export * from './errors.js';
export * from './classification/index.js';
export * from './transparency/index.js';
export * from './security/index.js';
export * from './templates/index.js';
export * from './plugins/index.js';
export { loadConfig, defaultResourcesPath, ComplianceConfigSchema, CONFIG_FILE_NAME } from './config.js';
export type { LoadConfigOptions } from './config.js';
export { createServer, SERVER_NAME, SERVER_VERSION } from './server.js';
export type { ComplianceServer, ServerOverrides } from './server.js';
export { buildApiServer } from './api/server.js';
export type { ApiServerOptions, DetectResponse } from './api/server.js';
