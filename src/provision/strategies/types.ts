/**
 * Installer Types
 */

import type { Platform, Result, StrategyKind } from '../../types/index.js';
import type { CommandRunner } from '../../utils/exec.js';
import type { Downloader } from '../../utils/download.js';
import type { ArchiveExtractor } from '../archive.js';
import type { HostProbe } from '../check.js';
import type { InstallError } from '../errors.js';

/**
 * Mutable state shared by installers within one run
 */
export interface RunSession {
  /** Package index already refreshed in this run */
  refreshed: boolean;
}

/**
 * Everything an installer talks to. Tests replace any of it.
 */
export interface InstallContext {
  platform: Platform;
  runner: CommandRunner;
  probe: HostProbe;
  downloader: Downloader;
  extractor: ArchiveExtractor;
  /** Final location of binaries placed by release downloads */
  installDir: string;
  /** Prefix privileged package manager commands with sudo */
  sudo: boolean;
  session: RunSession;
  /** Parent for staging directories (default: os.tmpdir()) */
  tempDir?: string;
  /** Stream command output instead of capturing it */
  verbose?: boolean;
}

export type InstallOutcome = Result<void, InstallError>;

/**
 * Installs one tool. `isInstalled` has no side effects; `install` never
 * throws for expected failures and reports them as an InstallError.
 */
export interface Installer {
  readonly tool: string;
  readonly kind: StrategyKind;
  describe(): string;
  isInstalled(): Promise<boolean>;
  install(signal?: AbortSignal): Promise<InstallOutcome>;
}

