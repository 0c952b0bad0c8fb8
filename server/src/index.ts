export * from './services/consolidation/index.js';
export { GoogleSheetsService } from './services/googleSheetsClient.js';
export { buildConsolidationConfig, loadConsolidationConfig } from './config/index.js';
export type { ConsolidationConfig, DestinationConfig, MasterCatalogConfig, CredentialsConfig } from './config/index.js';
export { parseEnv, loadEnv } from './config/env.js';
export type { Env } from './config/env.js';
export * from './utils/errors.js';
export * from './utils/a1Notation.js';
