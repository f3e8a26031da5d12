/**
 * Platform Types
 *
 * Types describing the host the provisioning run targets.
 */

/**
 * Supported operating system families
 */
export type Os = 'linux' | 'macos';

/**
 * Supported package managers
 */
export type PackageManager = 'apt' | 'dnf' | 'pacman' | 'brew';

export const PACKAGE_MANAGERS: readonly PackageManager[] = ['apt', 'dnf', 'pacman', 'brew'];

/**
 * Detected platform. Frozen once detected.
 */
export interface Platform {
  readonly os: Os;
  readonly packageManager: PackageManager;
  /** Node.js architecture name (x64, arm64, ...) */
  readonly arch: string;
  /** True when a graphical session is available */
  readonly desktop: boolean;
}

/**
 * The parts of the host environment the detector reads
 */
export interface HostInfo {
  platform: NodeJS.Platform;
  arch: string;
  env: NodeJS.ProcessEnv;
  hasCommand: (command: string) => boolean;
}
