/**
 * Platform Detection
 *
 * Detects the operating system family and package manager of the host.
 */

import { execSync } from 'child_process';
import type { HostInfo, PackageManager, Platform } from '../types/index.js';
import { UnsupportedPlatformError } from './errors.js';

/**
 * Linux package managers in order of preference, keyed by the binary that proves them
 */
const LINUX_MANAGERS: ReadonlyArray<[string, PackageManager]> = [
  ['apt-get', 'apt'],
  ['dnf', 'dnf'],
  ['pacman', 'pacman'],
];

function commandExists(command: string): boolean {
  try {
    execSync('command -v ' + command, { stdio: 'ignore' });
    return true;
  } catch {
    return false;
  }
}

/**
 * The running host
 */
export function currentHost(): HostInfo {
  return {
    platform: process.platform,
    arch: process.arch,
    env: process.env,
    hasCommand: commandExists,
  };
}

/**
 * Detect the current platform
 *
 * @throws UnsupportedPlatformError when the OS is neither Linux nor macOS,
 *   or Linux has none of apt, dnf, pacman
 */
export function detectPlatform(host: HostInfo = currentHost()): Platform {
  if (host.platform === 'darwin') {
    const platform: Platform = {
      os: 'macos',
      packageManager: 'brew',
      arch: host.arch,
      desktop: true,
    };
    return Object.freeze(platform);
  }

  if (host.platform === 'linux') {
    const found = LINUX_MANAGERS.find(([binary]) => host.hasCommand(binary));
    if (!found) {
      throw new UnsupportedPlatformError(
        'No supported package manager found (apt/dnf/pacman)'
      );
    }
    const platform: Platform = {
      os: 'linux',
      packageManager: found[1],
      arch: host.arch,
      desktop: Boolean(host.env.DISPLAY || host.env.WAYLAND_DISPLAY),
    };
    return Object.freeze(platform);
  }

  throw new UnsupportedPlatformError('Unsupported OS: ' + host.platform);
}

export function describePlatform(platform: Platform): string {
  return platform.os + ' (' + platform.packageManager + ', ' + platform.arch + ')';
}
