/**
 * Tests for installed-state checks and version comparison
 */
import * as os from 'os';
import * as path from 'path';

import { expandCheckPath, isToolInstalled } from '../src/provision/check';
import type { HostProbe } from '../src/provision/check';
import { compareVersions, parseVersion, satisfiesMinimum } from '../src/utils/version';
import { fakeProbe } from './helpers';

describe('version utilities', () => {
  test('parses the first version in tool output', () => {
    expect(parseVersion('NVIM v0.11.0\nBuild type: Release')).toEqual({ major: 0, minor: 11, patch: 0 });
    expect(parseVersion('jq-1.7')).toEqual({ major: 1, minor: 7, patch: 0 });
    expect(parseVersion('no version here')).toBeNull();
  });

  test('compares numerically, not lexically', () => {
    expect(compareVersions('0.10.0', '0.9.5')).toBeGreaterThan(0);
    expect(compareVersions('1.2.3', '1.2.3')).toBe(0);
    expect(compareVersions('x', '1.0')).toBeNull();
  });

  test('satisfiesMinimum', () => {
    expect(satisfiesMinimum('NVIM v0.10.2', '0.10')).toBe(true);
    expect(satisfiesMinimum('NVIM v0.9.5', '0.10')).toBe(false);
    expect(satisfiesMinimum('garbage', '0.10')).toBe(false);
  });
});

describe('isToolInstalled', () => {
  test('present when any listed command is on PATH', async () => {
    const probe = fakeProbe({ fdfind: '/usr/bin/fdfind' });
    expect(await isToolInstalled({ command: ['fd', 'fdfind'] }, probe, '/opt/bin')).toBe(true);
    expect(await isToolInstalled({ command: ['rg'] }, probe, '/opt/bin')).toBe(false);
  });

  test('enforces the minimum version', async () => {
    const probe = fakeProbe({ nvim: '/usr/bin/nvim' }, { '/usr/bin/nvim': 'NVIM v0.9.5' });
    expect(await isToolInstalled({ command: ['nvim'], minVersion: '0.10' }, probe, '/opt/bin')).toBe(false);

    const newer = fakeProbe({ nvim: '/usr/bin/nvim' }, { '/usr/bin/nvim': 'NVIM v0.11.0' });
    expect(await isToolInstalled({ command: ['nvim'], minVersion: '0.10' }, newer, '/opt/bin')).toBe(true);
  });

  test('any candidate meeting the minimum version counts', async () => {
    const probe: HostProbe = {
      which: async () => '/usr/bin/nvim',
      isExecutable: async (filePath) => filePath === '/opt/bin/nvim',
      output: async (executable) => (executable === '/usr/bin/nvim' ? 'NVIM v0.9.5' : 'NVIM v0.11.0'),
    };
    const check = { command: ['nvim'], minVersion: '0.10', paths: ['{installDir}/nvim'] };

    expect(await isToolInstalled(check, probe, '/opt/bin')).toBe(true);
    expect(await isToolInstalled({ ...check, paths: [] }, probe, '/opt/bin')).toBe(false);
  });

  test('a version command that fails counts as not installed', async () => {
    const probe = fakeProbe({ nvim: '/usr/bin/nvim' });
    expect(await isToolInstalled({ command: ['nvim'], minVersion: '0.10' }, probe, '/opt/bin')).toBe(false);
  });

  test('falls back to listed paths off PATH', async () => {
    const seen: string[] = [];
    const probe: HostProbe = {
      which: async () => null,
      isExecutable: async (filePath) => {
        seen.push(filePath);
        return filePath === '/opt/bin/zoxide';
      },
      output: async () => null,
    };

    expect(
      await isToolInstalled({ command: ['zoxide'], paths: ['~/.local/bin/zoxide', '{installDir}/zoxide'] }, probe, '/opt/bin')
    ).toBe(true);
    expect(seen).toEqual([path.join(os.homedir(), '.local/bin/zoxide'), '/opt/bin/zoxide']);
  });

  test('passes custom version arguments', async () => {
    const calls: string[][] = [];
    const probe: HostProbe = {
      which: async () => '/usr/bin/tmux',
      isExecutable: async () => false,
      output: async (executable, args) => {
        calls.push([executable, ...args]);
        return 'tmux 3.4';
      },
    };

    expect(await isToolInstalled({ command: ['tmux'], minVersion: '3.0', versionArgs: ['-V'] }, probe, '/opt/bin')).toBe(
      true
    );
    expect(calls).toEqual([['/usr/bin/tmux', '-V']]);
  });
});

describe('expandCheckPath', () => {
  test('expands home and the install directory', () => {
    expect(expandCheckPath('~/.cargo/bin/dust', '/opt/bin')).toBe(path.join(os.homedir(), '.cargo/bin/dust'));
    expect(expandCheckPath('{installDir}/eza', '/opt/bin')).toBe('/opt/bin/eza');
  });
});
