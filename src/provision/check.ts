/**
 * Installed-State Checks
 *
 * Re-derives whether a tool is present from PATH and the filesystem.
 * Nothing is cached between calls.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { ToolCheck } from '../types/index.js';
import { satisfiesMinimum } from '../utils/version.js';
import { shellQuote } from '../utils/exec.js';
import type { CommandRunner } from '../utils/exec.js';

/**
 * Read-only view of the host used by checks
 */
export interface HostProbe {
  /** Absolute path of a command on PATH, or null */
  which(command: string): Promise<string | null>;
  isExecutable(filePath: string): Promise<boolean>;
  /** Combined output of running an executable, or null if it fails */
  output(executable: string, args: readonly string[]): Promise<string | null>;
}

export function createHostProbe(runner: CommandRunner): HostProbe {
  return {
    async which(command) {
      const result = await runner.run('command -v ' + shellQuote(command));
      const found = result.stdout.trim();
      return result.exitCode === 0 && found ? found : null;
    },
    async isExecutable(filePath) {
      try {
        await fs.promises.access(filePath, fs.constants.X_OK);
        return true;
      } catch {
        return false;
      }
    },
    async output(executable, args) {
      const result = await runner.run([executable, ...args].map(shellQuote).join(' '));
      if (result.exitCode !== 0) return null;
      return result.stdout + result.stderr;
    },
  };
}

export function expandHome(filePath: string): string {
  if (filePath === '~') return os.homedir();
  if (filePath.startsWith('~/')) return path.join(os.homedir(), filePath.slice(2));
  return filePath;
}

/**
 * Expand `~` and `{installDir}` in a check path
 */
export function expandCheckPath(template: string, installDir: string): string {
  return expandHome(template.replace('{installDir}', installDir));
}

/**
 * Every executable a check may refer to: PATH hits first, then the listed paths
 */
async function candidates(
  check: ToolCheck,
  probe: HostProbe,
  installDir: string
): Promise<string[]> {
  const found: string[] = [];
  for (const command of check.command) {
    const hit = await probe.which(command);
    if (hit && !found.includes(hit)) found.push(hit);
  }
  for (const template of check.paths ?? []) {
    const candidate = expandCheckPath(template, installDir);
    if (!found.includes(candidate) && (await probe.isExecutable(candidate))) found.push(candidate);
  }
  return found;
}

/**
 * Evaluate a tool check. With a minimum version, any candidate that meets it
 * counts, so an old distro copy earlier on PATH does not hide a newer install.
 *
 * @param installDir Directory release downloads install into
 */
export async function isToolInstalled(
  check: ToolCheck,
  probe: HostProbe,
  installDir: string
): Promise<boolean> {
  for (const executable of await candidates(check, probe, installDir)) {
    if (!check.minVersion) return true;
    const output = await probe.output(executable, check.versionArgs ?? ['--version']);
    if (output !== null && satisfiesMinimum(output, check.minVersion)) return true;
  }
  return false;
}
