/**
 * CLI Commands Index
 */

export { provision } from './provision.js';
export type { ProvisionDeps } from './provision.js';
export { createProgram } from './main.js';
export { formatRunSummary, formatPlan } from './summary.js';
