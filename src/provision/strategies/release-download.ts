/**
 * Release Download Installer
 *
 * Downloads a release artifact for the host architecture and places its
 * binary in the install directory.
 *
 * Everything is written under a private staging directory first. The binary
 * is copied next to its destination under a hidden name and renamed into
 * place, so an interrupted install never leaves a partial file at the final path.
 */

import { createHash } from 'crypto';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { Platform, ReleaseStrategy, ToolSpec } from '../../types/index.js';
import { isToolInstalled } from '../check.js';
import { isPermissionError } from '../archive.js';
import { InstallError, errorMessage } from '../errors.js';
import { failed, fromThrown, succeeded } from './outcome.js';
import type { InstallContext, InstallOutcome, Installer } from './types.js';

/** Node arch names to the names most release pipelines use */
export const DEFAULT_ARCH_MAP: Readonly<Record<string, string>> = {
  x64: 'x86_64',
  arm64: 'aarch64',
};

const OS_NAMES: Record<Platform['os'], string> = {
  linux: 'linux',
  macos: 'darwin',
};

/**
 * Substitute {version}, {arch} and {os}
 */
export function expandTemplate(
  template: string,
  values: { version: string; arch: string; os: string }
): string {
  return template
    .replace(/\{version\}/g, values.version)
    .replace(/\{arch\}/g, values.arch)
    .replace(/\{os\}/g, values.os);
}

export function sha256(data: Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

export class ReleaseDownloadInstaller implements Installer {
  readonly kind = 'release';

  constructor(
    private readonly spec: ToolSpec,
    private readonly strategy: ReleaseStrategy,
    private readonly context: InstallContext
  ) {}

  get tool(): string {
    return this.spec.name;
  }

  /** Final path of the installed binary */
  get targetPath(): string {
    return path.join(this.context.installDir, this.strategy.binary);
  }

  /**
   * Release arch name for the host, or null when the release has no build for it
   */
  releaseArch(): string | null {
    const map = this.strategy.arch ?? DEFAULT_ARCH_MAP;
    return map[this.context.platform.arch] ?? null;
  }

  /**
   * Download URL for the host, or null for an unsupported arch
   */
  url(): string | null {
    const arch = this.releaseArch();
    if (!arch) return null;
    return expandTemplate(this.strategy.url, {
      version: this.strategy.version,
      arch,
      os: OS_NAMES[this.context.platform.os],
    });
  }

  describe(): string {
    return 'download ' + (this.url() ?? this.strategy.url) + ' -> ' + this.targetPath;
  }

  isInstalled(): Promise<boolean> {
    const check = {
      ...this.spec.check,
      paths: [...(this.spec.check.paths ?? []), this.targetPath],
    };
    return isToolInstalled(check, this.context.probe, this.context.installDir);
  }

  async install(signal?: AbortSignal): Promise<InstallOutcome> {
    const arch = this.releaseArch();
    const url = this.url();
    if (!arch || !url) {
      return failed(
        'architecture',
        'No ' + this.spec.name + ' release for architecture ' + this.context.platform.arch
      );
    }

    let stagingDir: string;
    try {
      stagingDir = await fs.promises.mkdtemp(
        path.join(this.context.tempDir ?? os.tmpdir(), 'dotstrap-' + this.spec.name + '-')
      );
    } catch (e) {
      return fromThrown(e, isPermissionError(e) ? 'permission' : 'extraction');
    }

    try {
      const data = await this.context.downloader.download(url, signal);
      this.verifyChecksum(arch, data);

      const artifact = path.join(stagingDir, path.basename(new URL(url).pathname) || 'artifact');
      await fs.promises.writeFile(artifact, data);

      const source = await this.unpack(artifact, stagingDir, arch);
      signal?.throwIfAborted();
      await this.placeBinary(source);
      return succeeded;
    } catch (e) {
      return fromThrown(e, 'extraction');
    } finally {
      await fs.promises.rm(stagingDir, { recursive: true, force: true });
    }
  }

  private verifyChecksum(arch: string, data: Buffer): void {
    const expected = this.strategy.sha256?.[arch];
    if (!expected) return;
    const actual = sha256(data);
    if (actual !== expected.toLowerCase()) {
      throw new InstallError(
        'checksum',
        'Checksum mismatch for ' + this.spec.name + ': expected ' + expected + ', got ' + actual
      );
    }
  }

  /**
   * Extract the artifact if needed and return the path of the binary inside staging
   */
  private async unpack(artifact: string, stagingDir: string, arch: string): Promise<string> {
    if (this.strategy.archive === 'binary') return artifact;

    const extractDir = path.resolve(stagingDir, 'extracted');
    await this.context.extractor.extract(artifact, extractDir);

    const inner = expandTemplate(this.strategy.path ?? this.strategy.binary, {
      version: this.strategy.version,
      arch,
      os: OS_NAMES[this.context.platform.os],
    });
    const source = path.resolve(extractDir, inner);
    if (!source.startsWith(extractDir + path.sep)) {
      throw new InstallError('extraction', 'Binary path escapes the archive: ' + inner);
    }
    if (!fs.existsSync(source)) {
      throw new InstallError('extraction', 'Binary ' + inner + ' not found in ' + path.basename(artifact));
    }
    return source;
  }

  /**
   * Copy beside the target, then rename over it
   */
  private async placeBinary(source: string): Promise<void> {
    const target = this.targetPath;
    const partial = path.join(
      this.context.installDir,
      '.' + this.strategy.binary + '.partial-' + process.pid
    );

    try {
      await fs.promises.mkdir(this.context.installDir, { recursive: true });
      await fs.promises.copyFile(source, partial);
      await fs.promises.chmod(partial, 0o755);
      await fs.promises.rename(partial, target);
    } catch (e) {
      await fs.promises.rm(partial, { force: true });
      if (isPermissionError(e)) {
        throw new InstallError(
          'permission',
          'Cannot write ' + target + ': ' + errorMessage(e)
        );
      }
      throw e;
    }
  }
}
