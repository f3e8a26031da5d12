/**
 * Homebrew Commands
 *
 * Command set for macOS. Homebrew refuses to run as root.
 */

import type { PackageManagerCommands } from './types.js';

export const brewCommands: PackageManagerCommands = {
  manager: 'brew',
  install: (packages) => 'brew install ' + packages.join(' '),
  needsRoot: false,
  env: { HOMEBREW_NO_AUTO_UPDATE: '1' },
};
