/**
 * Provisioning Engine
 *
 * Usage:
 * ```typescript
 * import { loadCatalog, createEnvironment, run } from 'dotstrap';
 *
 * const report = await run(loadCatalog(), createEnvironment({ installDir, sudo: 'auto' }), {
 *   skip: ['ghostty'],
 *   timeoutMs: 10 * 60 * 1000,
 * });
 * ```
 */

export * from './errors.js';
export * from './platform.js';
export * from './registry.js';
export * from './check.js';
export * from './archive.js';
export * from './commands/index.js';
export * from './strategies/index.js';
export * from './orchestrator.js';
export * from './environment.js';
