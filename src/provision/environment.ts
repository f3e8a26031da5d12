/**
 * Provision Environment
 *
 * Wires the real host collaborators into the orchestrator.
 */

import type { Platform, ResolvedSettings, ToolSpec } from '../types/index.js';
import { createShellRunner } from '../utils/exec.js';
import type { CommandRunner } from '../utils/exec.js';
import { createDownloader } from '../utils/download.js';
import type { Downloader } from '../utils/download.js';
import { TarExtractor } from './archive.js';
import type { ArchiveExtractor } from './archive.js';
import { createHostProbe } from './check.js';
import { getCommands, shouldUseSudo } from './commands/index.js';
import { detectPlatform } from './platform.js';
import { createInstaller } from './strategies/index.js';
import type { InstallContext, Installer, RunSession } from './strategies/index.js';
import type { ProvisionEnvironment } from './orchestrator.js';

export interface EnvironmentOverrides {
  detect?: () => Platform;
  runner?: CommandRunner;
  downloader?: Downloader;
  extractor?: ArchiveExtractor;
  verbose?: boolean;
}

/**
 * Build the environment for one run. Installers share a fresh session.
 */
export function createEnvironment(
  settings: Pick<ResolvedSettings, 'installDir' | 'sudo'>,
  overrides: EnvironmentOverrides = {}
): ProvisionEnvironment {
  const runner = overrides.runner ?? createShellRunner();
  const probe = createHostProbe(runner);
  const downloader = overrides.downloader ?? createDownloader();
  const extractor = overrides.extractor ?? new TarExtractor();
  const session: RunSession = { refreshed: false };
  const uid = process.getuid?.();

  return {
    detect: overrides.detect ?? (() => detectPlatform()),
    installerFor(spec: ToolSpec, platform: Platform): Installer {
      const context: InstallContext = {
        platform,
        runner,
        probe,
        downloader,
        extractor,
        installDir: settings.installDir,
        sudo: shouldUseSudo(getCommands(platform.packageManager), settings.sudo, uid),
        session,
        verbose: overrides.verbose,
      };
      return createInstaller(spec, context);
    },
  };
}
