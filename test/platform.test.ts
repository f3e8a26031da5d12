/**
 * Tests for detectPlatform() - OS family and package manager detection
 */
import { detectPlatform } from '../src/provision/platform';
import { UnsupportedPlatformError } from '../src/provision/errors';
import type { HostInfo } from '../src/types/index';

function host(platform: NodeJS.Platform, commands: string[] = [], env: NodeJS.ProcessEnv = {}): HostInfo {
  return {
    platform,
    arch: 'x64',
    env,
    hasCommand: (command) => commands.includes(command),
  };
}

describe('detectPlatform', () => {
  test('macOS always uses brew and counts as desktop', () => {
    expect(detectPlatform(host('darwin'))).toEqual({
      os: 'macos',
      packageManager: 'brew',
      arch: 'x64',
      desktop: true,
    });
  });

  test('detects apt on Linux', () => {
    expect(detectPlatform(host('linux', ['apt-get'])).packageManager).toBe('apt');
  });

  test('detects dnf on Linux', () => {
    expect(detectPlatform(host('linux', ['dnf'])).packageManager).toBe('dnf');
  });

  test('detects pacman on Linux', () => {
    expect(detectPlatform(host('linux', ['pacman'])).packageManager).toBe('pacman');
  });

  test('prefers apt over dnf and pacman when several exist', () => {
    expect(detectPlatform(host('linux', ['pacman', 'dnf', 'apt-get'])).packageManager).toBe('apt');
  });

  test('Linux without a supported package manager is unsupported', () => {
    expect(() => detectPlatform(host('linux', ['zypper']))).toThrow(UnsupportedPlatformError);
  });

  test('other operating systems are unsupported', () => {
    expect(() => detectPlatform(host('win32'))).toThrow('Unsupported OS: win32');
  });

  test('Linux is a desktop only with a display', () => {
    expect(detectPlatform(host('linux', ['dnf'])).desktop).toBe(false);
    expect(detectPlatform(host('linux', ['dnf'], { WAYLAND_DISPLAY: 'wayland-0' })).desktop).toBe(true);
    expect(detectPlatform(host('linux', ['dnf'], { DISPLAY: ':0' })).desktop).toBe(true);
  });

  test('same host yields an equal, frozen platform', () => {
    const first = detectPlatform(host('linux', ['apt-get']));
    const second = detectPlatform(host('linux', ['apt-get']));
    expect(second).toEqual(first);
    expect(Object.isFrozen(first)).toBe(true);
  });
});
