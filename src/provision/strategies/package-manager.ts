/**
 * Package Manager Installer
 *
 * Installs a tool with the platform's package manager.
 */

import type { PackageStrategy, ToolSpec } from '../../types/index.js';
import { shellQuote } from '../../utils/exec.js';
import type { ExecResult } from '../../utils/exec.js';
import { getCommands } from '../commands/index.js';
import type { PackageManagerCommands } from '../commands/index.js';
import { isToolInstalled } from '../check.js';
import { exitFailure, fromThrown, succeeded } from './outcome.js';
import type { InstallContext, InstallOutcome, Installer } from './types.js';

/**
 * Wrap a command so it runs as root with the manager's environment
 */
export function elevate(command: string, commands: PackageManagerCommands, sudo: boolean): string {
  if (!sudo) return command;
  const env = Object.entries(commands.env ?? {}).map(([key, value]) => key + '=' + shellQuote(value));
  const prefix = env.length > 0 ? 'sudo env ' + env.join(' ') + ' ' : 'sudo ';
  return prefix + 'sh -c ' + shellQuote(command);
}

export class PackageManagerInstaller implements Installer {
  readonly kind = 'package';
  private readonly commands: PackageManagerCommands;

  constructor(
    private readonly spec: ToolSpec,
    private readonly strategy: PackageStrategy,
    private readonly context: InstallContext
  ) {
    this.commands = getCommands(context.platform.packageManager);
  }

  get tool(): string {
    return this.spec.name;
  }

  /**
   * Package names for the current manager
   */
  get packages(): string[] {
    const manager = this.context.platform.packageManager;
    return this.strategy.names?.[manager] ?? this.strategy.name ?? [this.spec.name];
  }

  describe(): string {
    return this.commands.manager + ' install ' + this.packages.join(' ');
  }

  isInstalled(): Promise<boolean> {
    return isToolInstalled(this.spec.check, this.context.probe, this.context.installDir);
  }

  async install(signal?: AbortSignal): Promise<InstallOutcome> {
    const setup = this.strategy.setup?.[this.commands.manager] ?? [];

    try {
      for (const command of setup) {
        const result = await this.exec(command, signal);
        if (result.exitCode !== 0) return exitFailure('Setup command "' + command + '"', result);
      }

      if (this.commands.refresh && !this.context.session.refreshed) {
        const result = await this.exec(this.commands.refresh, signal);
        if (result.exitCode !== 0) return exitFailure(this.commands.manager + ' refresh', result);
        this.context.session.refreshed = true;
      }

      const result = await this.exec(this.commands.install(this.packages), signal);
      if (result.exitCode !== 0) return exitFailure(this.describe(), result);
      return succeeded;
    } catch (e) {
      return fromThrown(e, 'nonZeroExit');
    }
  }

  private exec(command: string, signal?: AbortSignal): Promise<ExecResult> {
    return this.context.runner.run(elevate(command, this.commands, this.context.sudo), {
      env: this.commands.env,
      signal,
      inherit: this.context.verbose,
    });
  }
}
