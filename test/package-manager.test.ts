/**
 * Tests for PackageManagerInstaller and the package manager command sets
 */
import { PackageManagerInstaller, elevate } from '../src/provision/strategies/package-manager';
import { getCommands, shouldUseSudo } from '../src/provision/commands/index';
import type { PackageStrategy, Platform } from '../src/types/index';
import { fakeProbe, installContext, recordingRunner, tool } from './helpers';

const fdStrategy: PackageStrategy = {
  type: 'package',
  names: { apt: ['fd-find'], dnf: ['fd-find'] },
};

function platformWith(packageManager: Platform['packageManager']): Platform {
  return { os: packageManager === 'brew' ? 'macos' : 'linux', packageManager, arch: 'x64', desktop: false };
}

describe('package manager commands', () => {
  test('build non-interactive install commands', () => {
    expect(getCommands('apt').install(['git', 'jq'])).toBe('apt-get install -y -qq git jq');
    expect(getCommands('dnf').install(['git'])).toBe('dnf install -y git');
    expect(getCommands('pacman').install(['git'])).toBe('pacman -S --needed --noconfirm git');
    expect(getCommands('brew').install(['git'])).toBe('brew install git');
  });

  test('sudo is used for root-only managers when not running as root', () => {
    expect(shouldUseSudo(getCommands('apt'), 'auto', 1000)).toBe(true);
    expect(shouldUseSudo(getCommands('apt'), 'auto', 0)).toBe(false);
    expect(shouldUseSudo(getCommands('apt'), 'never', 1000)).toBe(false);
    expect(shouldUseSudo(getCommands('dnf'), 'always', 0)).toBe(true);
    expect(shouldUseSudo(getCommands('brew'), 'always', 1000)).toBe(false);
  });

  test('elevate passes the manager environment through sudo', () => {
    expect(elevate('apt-get install -y -qq git', getCommands('apt'), true)).toBe(
      "sudo env DEBIAN_FRONTEND=noninteractive sh -c 'apt-get install -y -qq git'"
    );
    expect(elevate('dnf install -y git', getCommands('dnf'), true)).toBe("sudo sh -c 'dnf install -y git'");
    expect(elevate('dnf install -y git', getCommands('dnf'), false)).toBe('dnf install -y git');
  });
});

describe('PackageManagerInstaller', () => {
  test('uses the per-manager package name', () => {
    const installer = new PackageManagerInstaller(tool('fd'), fdStrategy, installContext());
    expect(installer.packages).toEqual(['fd-find']);
    expect(installer.describe()).toBe('apt install fd-find');
  });

  test('falls back to the shared name, then the tool name', () => {
    const pacman = installContext({ platform: platformWith('pacman') });
    expect(new PackageManagerInstaller(tool('fd'), fdStrategy, pacman).packages).toEqual(['fd']);
    expect(
      new PackageManagerInstaller(tool('gh'), { type: 'package', name: ['github-cli'] }, pacman).packages
    ).toEqual(['github-cli']);
  });

  test('refreshes the apt index once per run', async () => {
    const runner = recordingRunner();
    const context = installContext({ runner });

    await new PackageManagerInstaller(tool('git'), { type: 'package' }, context).install();
    await new PackageManagerInstaller(tool('jq'), { type: 'package' }, context).install();

    expect(runner.commands).toEqual([
      'apt-get update -qq',
      'apt-get install -y -qq git',
      'apt-get install -y -qq jq',
    ]);
    expect(runner.options[0]?.env).toEqual({ DEBIAN_FRONTEND: 'noninteractive' });
  });

  test('runs setup commands before installing', async () => {
    const runner = recordingRunner();
    const context = installContext({ runner, platform: platformWith('dnf'), sudo: true });
    const strategy: PackageStrategy = {
      type: 'package',
      setup: { dnf: ['dnf config-manager --add-repo https://example.test/gh.repo'] },
    };

    const outcome = await new PackageManagerInstaller(tool('gh'), strategy, context).install();

    expect(outcome.ok).toBe(true);
    expect(runner.commands).toEqual([
      "sudo sh -c 'dnf config-manager --add-repo https://example.test/gh.repo'",
      "sudo sh -c 'dnf install -y gh'",
    ]);
  });

  test('a non-zero exit fails with the exit code and last error line', async () => {
    const runner = recordingRunner((command) =>
      command.startsWith('pacman -S --needed') ? { exitCode: 1, stderr: 'resolving\nerror: target not found: nope\n' } : {}
    );
    const context = installContext({ runner, platform: platformWith('pacman') });

    const outcome = await new PackageManagerInstaller(tool('nope'), { type: 'package' }, context).install();

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.kind).toBe('nonZeroExit');
      expect(outcome.error.exitCode).toBe(1);
      expect(outcome.error.message).toBe('pacman install nope exited with 1: error: target not found: nope');
    }
  });

  test('pacman syncs its database once per run before installing', async () => {
    const runner = recordingRunner();
    const context = installContext({ runner, platform: platformWith('pacman') });

    await new PackageManagerInstaller(tool('jq'), { type: 'package' }, context).install();
    await new PackageManagerInstaller(tool('fzf'), { type: 'package' }, context).install();

    expect(runner.commands).toEqual([
      'pacman -Syu --noconfirm',
      'pacman -S --needed --noconfirm jq',
      'pacman -S --needed --noconfirm fzf',
    ]);
  });

  test('a failed setup command stops before installing', async () => {
    const runner = recordingRunner(() => ({ exitCode: 2 }));
    const context = installContext({ runner });
    const strategy: PackageStrategy = { type: 'package', setup: { apt: ['false'] } };

    const outcome = await new PackageManagerInstaller(tool('gh'), strategy, context).install();

    expect(outcome.ok).toBe(false);
    expect(runner.commands).toEqual(['false']);
    expect(context.session.refreshed).toBe(false);
  });

  test('a failed refresh is retried by the next tool', async () => {
    let refreshes = 0;
    const runner = recordingRunner((command) => {
      if (command === 'apt-get update -qq') {
        refreshes++;
        return { exitCode: refreshes === 1 ? 100 : 0 };
      }
      return {};
    });
    const context = installContext({ runner });

    const first = await new PackageManagerInstaller(tool('git'), { type: 'package' }, context).install();
    const second = await new PackageManagerInstaller(tool('jq'), { type: 'package' }, context).install();

    expect(first.ok).toBe(false);
    expect(second.ok).toBe(true);
    expect(refreshes).toBe(2);
  });

  test('isInstalled reflects the check', async () => {
    const context = installContext({ probe: fakeProbe({ fdfind: '/usr/bin/fdfind' }) });
    const check = { command: ['fd', 'fdfind'] };

    expect(await new PackageManagerInstaller(tool('fd', [], { check }), fdStrategy, context).isInstalled()).toBe(true);
    expect(await new PackageManagerInstaller(tool('jq'), { type: 'package' }, context).isInstalled()).toBe(false);
  });
});
