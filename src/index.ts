/**
 * dotstrap
 * Main entry point for programmatic usage
 */

// Types
export * from './types/index.js';

// Engine
export * from './provision/index.js';

// Catalog and config
export { loadCatalog, parseCatalog, defaultCatalogPath, CATALOG_FILENAME } from './catalog/index.js';
export { loadConfig, parseConfig, resolveSettings } from './utils/config-helpers.js';

// CLI
export { provision, formatRunSummary, formatPlan } from './cli/index.js';
export type { ProvisionDeps } from './cli/index.js';
