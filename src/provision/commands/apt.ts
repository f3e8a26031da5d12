/**
 * apt Commands
 *
 * Command set for Debian/Ubuntu (uses apt-get).
 */

import type { PackageManagerCommands } from './types.js';

export const aptCommands: PackageManagerCommands = {
  manager: 'apt',
  refresh: 'apt-get update -qq',
  install: (packages) => 'apt-get install -y -qq ' + packages.join(' '),
  needsRoot: true,
  env: { DEBIAN_FRONTEND: 'noninteractive' },
};
