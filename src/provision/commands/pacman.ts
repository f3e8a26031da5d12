/**
 * pacman Commands
 *
 * Command set for Arch Linux.
 */

import type { PackageManagerCommands } from './types.js';

export const pacmanCommands: PackageManagerCommands = {
  manager: 'pacman',
  // Arch does not support partial upgrades, so the sync refreshes and upgrades together
  refresh: 'pacman -Syu --noconfirm',
  // --needed keeps pacman from reinstalling up-to-date packages
  install: (packages) => 'pacman -S --needed --noconfirm ' + packages.join(' '),
  needsRoot: true,
};
