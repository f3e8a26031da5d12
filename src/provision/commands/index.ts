/**
 * Package Manager Commands Index
 *
 * Exports command sets for each package manager.
 */

import type { PackageManager, SudoMode } from '../../types/index.js';
import type { PackageManagerCommands } from './types.js';
import { aptCommands } from './apt.js';
import { dnfCommands } from './dnf.js';
import { pacmanCommands } from './pacman.js';
import { brewCommands } from './brew.js';

export type { PackageManagerCommands } from './types.js';

export const packageManagerCommands: Record<PackageManager, PackageManagerCommands> = {
  apt: aptCommands,
  dnf: dnfCommands,
  pacman: pacmanCommands,
  brew: brewCommands,
};

/**
 * Get the command set for a package manager
 */
export function getCommands(manager: PackageManager): PackageManagerCommands {
  return packageManagerCommands[manager];
}

/**
 * Whether to prefix privileged commands with sudo
 *
 * @param uid Current user id, undefined where the OS has none
 */
export function shouldUseSudo(
  commands: PackageManagerCommands,
  mode: SudoMode,
  uid: number | undefined
): boolean {
  if (!commands.needsRoot || mode === 'never') return false;
  if (mode === 'always') return true;
  return uid !== 0;
}

