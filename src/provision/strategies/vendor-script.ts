/**
 * Vendor Script Installer
 *
 * Downloads a vendor's install script and runs it. The script's exit code
 * is the outcome.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { ScriptStrategy, ToolSpec } from '../../types/index.js';
import { shellQuote } from '../../utils/exec.js';
import { isToolInstalled } from '../check.js';
import { isPermissionError } from '../archive.js';
import { exitFailure, fromThrown, succeeded } from './outcome.js';
import type { InstallContext, InstallOutcome, Installer } from './types.js';

export class VendorScriptInstaller implements Installer {
  readonly kind = 'script';

  constructor(
    private readonly spec: ToolSpec,
    private readonly strategy: ScriptStrategy,
    private readonly context: InstallContext
  ) {}

  get tool(): string {
    return this.spec.name;
  }

  describe(): string {
    return 'run ' + this.strategy.url + ' with ' + this.strategy.shell;
  }

  isInstalled(): Promise<boolean> {
    return isToolInstalled(this.spec.check, this.context.probe, this.context.installDir);
  }

  /**
   * Command line that runs the downloaded script
   */
  commandFor(scriptPath: string): string {
    return [this.strategy.shell, scriptPath, ...(this.strategy.args ?? [])].map(shellQuote).join(' ');
  }

  async install(signal?: AbortSignal): Promise<InstallOutcome> {
    let stagingDir: string;
    try {
      stagingDir = await fs.promises.mkdtemp(
        path.join(this.context.tempDir ?? os.tmpdir(), 'dotstrap-' + this.spec.name + '-')
      );
    } catch (e) {
      return fromThrown(e, isPermissionError(e) ? 'permission' : 'nonZeroExit');
    }

    try {
      const script = await this.context.downloader.download(this.strategy.url, signal);
      const scriptPath = path.join(stagingDir, 'install.sh');
      await fs.promises.writeFile(scriptPath, script, { mode: 0o700 });

      const result = await this.context.runner.run(this.commandFor(scriptPath), {
        signal,
        inherit: this.context.verbose,
      });
      if (result.exitCode !== 0) return exitFailure('Install script ' + this.strategy.url, result);
      return succeeded;
    } catch (e) {
      return fromThrown(e, 'nonZeroExit');
    } finally {
      await fs.promises.rm(stagingDir, { recursive: true, force: true });
    }
  }
}
