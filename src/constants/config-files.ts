/**
 * Config file names and default locations.
 */

import * as os from 'os';
import * as path from 'path';

/** User-editable run config */
export const CONFIG_FILENAME = 'dotstrap.yml';

/** Where release downloads put binaries unless configured otherwise */
export function defaultInstallDir(): string {
  return path.join(os.homedir(), '.local', 'bin');
}

/**
 * Resolve path to the run config. An explicit path wins over the working directory.
 */
export function getConfigPath(rootDir: string, explicit?: string): string {
  if (explicit) return path.resolve(rootDir, explicit);
  return path.join(rootDir, CONFIG_FILENAME);
}
