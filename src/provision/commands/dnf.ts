/**
 * dnf Commands
 *
 * Command set for Fedora/RHEL. dnf refreshes metadata on its own.
 */

import type { PackageManagerCommands } from './types.js';

export const dnfCommands: PackageManagerCommands = {
  manager: 'dnf',
  install: (packages) => 'dnf install -y ' + packages.join(' '),
  needsRoot: true,
};
