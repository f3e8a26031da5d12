/**
 * Install Strategies
 *
 * Picks the strategy a tool uses on the detected platform and builds its installer.
 */

import type { Platform, PostInstall, Strategy, ToolSpec } from '../../types/index.js';
import { isToolInstalled } from '../check.js';
import { PackageManagerInstaller } from './package-manager.js';
import { ReleaseDownloadInstaller } from './release-download.js';
import { VendorScriptInstaller } from './vendor-script.js';
import { exitFailure, fromThrown, succeeded } from './outcome.js';
import type { InstallContext, InstallOutcome, Installer } from './types.js';

export * from './types.js';
export { PackageManagerInstaller, elevate } from './package-manager.js';
export { ReleaseDownloadInstaller, expandTemplate, sha256, DEFAULT_ARCH_MAP } from './release-download.js';
export { VendorScriptInstaller } from './vendor-script.js';

/**
 * Why a tool does not apply to the platform, or null if it does
 */
export function notApplicableReason(spec: ToolSpec, platform: Platform): string | null {
  const when = spec.when;
  if (!when) return null;
  if (when.os && !when.os.includes(platform.os)) {
    return 'not applicable on ' + platform.os;
  }
  if (when.managers && !when.managers.includes(platform.packageManager)) {
    return 'not available via ' + platform.packageManager;
  }
  if (when.desktop !== undefined && when.desktop !== platform.desktop) {
    return when.desktop ? 'headless host, desktop only' : 'desktop host, headless only';
  }
  return null;
}

/**
 * The strategy in effect for a platform
 */
export function resolveStrategy(spec: ToolSpec, platform: Platform): Strategy {
  return spec.overrides?.[platform.packageManager] ?? spec.strategy;
}

/**
 * Runs a tool's post-install commands once its installer has put it in place.
 * The tool counts as installed only when the post-install check passes too.
 */
class PostInstallInstaller implements Installer {
  constructor(
    private readonly inner: Installer,
    private readonly postInstall: PostInstall,
    private readonly context: InstallContext
  ) {}

  get tool(): string {
    return this.inner.tool;
  }

  get kind(): Installer['kind'] {
    return this.inner.kind;
  }

  describe(): string {
    return this.inner.describe() + ', then ' + this.postInstall.commands.join('; ');
  }

  async isInstalled(): Promise<boolean> {
    if (!(await this.inner.isInstalled())) return false;
    return isToolInstalled(this.postInstall.check, this.context.probe, this.context.installDir);
  }

  async install(signal?: AbortSignal): Promise<InstallOutcome> {
    try {
      if (!(await this.inner.isInstalled())) {
        const outcome = await this.inner.install(signal);
        if (!outcome.ok) return outcome;
      }

      for (const command of this.postInstall.commands) {
        const result = await this.context.runner.run(command, {
          signal,
          inherit: this.context.verbose,
        });
        if (result.exitCode !== 0) return exitFailure('Post-install "' + command + '"', result);
      }
      return succeeded;
    } catch (e) {
      return fromThrown(e, 'nonZeroExit');
    }
  }
}

function strategyInstaller(spec: ToolSpec, context: InstallContext): Installer {
  const strategy = resolveStrategy(spec, context.platform);
  switch (strategy.type) {
    case 'package':
      return new PackageManagerInstaller(spec, strategy, context);
    case 'release':
      return new ReleaseDownloadInstaller(spec, strategy, context);
    case 'script':
      return new VendorScriptInstaller(spec, strategy, context);
  }
}

/**
 * Build the installer for a tool on the context's platform
 */
export function createInstaller(spec: ToolSpec, context: InstallContext): Installer {
  const installer = strategyInstaller(spec, context);
  if (spec.postInstall) {
    return new PostInstallInstaller(installer, spec.postInstall, context);
  }
  return installer;
}
