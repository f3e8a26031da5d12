/**
 * CLI Types
 *
 * Types for CLI command options.
 */

/**
 * Options accepted by the provision command, as parsed by commander
 */
export interface ProvisionOptions {
  dryRun?: boolean;
  only?: string[];
  skip?: string[];
  config?: string;
  catalog?: string;
  installDir?: string;
  /** Per-tool timeout in seconds */
  timeout?: number;
  rootDir?: string;
}

/**
 * Process exit codes
 */
export const EXIT_SUCCESS = 0;
export const EXIT_TOOL_FAILED = 1;
export const EXIT_FATAL = 2;
