/**
 * Test fakes shared by the provisioning tests
 */
import type { Platform, ToolSpec } from '../src/types/index';
import type { ExecOptions, ExecResult, CommandRunner } from '../src/utils/exec';
import type { Downloader } from '../src/utils/download';
import type { HostProbe } from '../src/provision/check';
import type { InstallContext, InstallOutcome, Installer } from '../src/provision/strategies/index';
import type { ProvisionEnvironment } from '../src/provision/orchestrator';
import { InstallError } from '../src/provision/errors';

export const linuxApt: Platform = {
  os: 'linux',
  packageManager: 'apt',
  arch: 'x64',
  desktop: false,
};

export function tool(name: string, dependsOn: string[] = [], extra: Partial<ToolSpec> = {}): ToolSpec {
  return {
    name,
    check: { command: [name] },
    strategy: { type: 'package' },
    dependsOn,
    ...extra,
  };
}

export const ok: InstallOutcome = { ok: true, value: undefined };

export function failure(kind: InstallError['kind'], message: string): InstallOutcome {
  return { ok: false, error: new InstallError(kind, message) };
}

export interface FakeInstaller extends Installer {
  isInstalled: jest.Mock<Promise<boolean>, []>;
  install: jest.Mock<Promise<InstallOutcome>, [AbortSignal?]>;
}

export function fakeInstaller(name: string, present = false, outcome: InstallOutcome = ok): FakeInstaller {
  return {
    tool: name,
    kind: 'package',
    describe: () => 'install ' + name,
    isInstalled: jest.fn(async () => present),
    install: jest.fn(async (_signal?: AbortSignal) => outcome),
  };
}

/**
 * Environment whose installers come from a name -> installer map
 */
export function fakeEnvironment(
  installers: Record<string, Installer>,
  platform: Platform = linuxApt
): ProvisionEnvironment & { detect: jest.Mock<Platform, []> } {
  return {
    detect: jest.fn(() => platform),
    installerFor: (spec: ToolSpec) => {
      const installer = installers[spec.name];
      if (!installer) throw new Error('no fake installer for ' + spec.name);
      return installer;
    },
  };
}

export interface RecordingRunner extends CommandRunner {
  commands: string[];
  options: Array<ExecOptions | undefined>;
}

/**
 * Runner that records commands and answers from a handler (default: exit 0)
 */
export function recordingRunner(
  handler: (command: string) => Partial<ExecResult> = () => ({})
): RecordingRunner {
  const commands: string[] = [];
  const options: Array<ExecOptions | undefined> = [];
  return {
    commands,
    options,
    async run(command: string, opts?: ExecOptions): Promise<ExecResult> {
      commands.push(command);
      options.push(opts);
      return { exitCode: 0, stdout: '', stderr: '', ...handler(command) };
    },
  };
}

export function fakeDownloader(content: Buffer | Error): Downloader & { download: jest.Mock } {
  return {
    download: jest.fn(async () => {
      if (content instanceof Error) throw content;
      return content;
    }),
  };
}

/**
 * Probe where only the listed commands exist; `versions` maps executable to its output
 */
export function fakeProbe(commands: Record<string, string> = {}, versions: Record<string, string> = {}): HostProbe {
  return {
    which: async (command) => commands[command] ?? null,
    isExecutable: async () => false,
    output: async (executable) => versions[executable] ?? null,
  };
}

export function installContext(overrides: Partial<InstallContext> = {}): InstallContext {
  return {
    platform: linuxApt,
    runner: recordingRunner(),
    probe: fakeProbe(),
    downloader: fakeDownloader(Buffer.from('')),
    extractor: { extract: jest.fn(async () => undefined) },
    installDir: '/tmp/dotstrap-test-bin',
    sudo: false,
    session: { refreshed: false },
    ...overrides,
  };
}
