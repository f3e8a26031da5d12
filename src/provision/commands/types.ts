/**
 * Package Manager Command Types
 */

import type { PackageManager } from '../../types/index.js';

/**
 * Shell command set for one package manager
 */
export interface PackageManagerCommands {
  manager: PackageManager;
  /** Refreshes the package index. Run at most once per provisioning run. */
  refresh?: string;
  /** Builds the non-interactive install command */
  install: (packages: readonly string[]) => string;
  /** Whether commands must run as root */
  needsRoot: boolean;
  /** Extra environment for every command */
  env?: Record<string, string>;
}
