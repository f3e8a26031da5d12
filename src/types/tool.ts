/**
 * Tool Types
 *
 * Static tool definitions loaded from the catalog.
 */

import type { Os, PackageManager } from './platform.js';

/**
 * How to tell whether a tool is already present.
 * Evaluated against PATH and the filesystem on every call.
 */
export interface ToolCheck {
  /** Any of these commands on PATH counts as present */
  command: string[];
  /** Minimum acceptable version, compared against the version output */
  minVersion?: string;
  /** Arguments that print the version (default: --version) */
  versionArgs?: string[];
  /** Extra locations to look at; `~` and `{installDir}` are expanded */
  paths?: string[];
}

/**
 * Install through the host package manager
 */
export interface PackageStrategy {
  type: 'package';
  /** Package names used on every manager unless `names` overrides */
  name?: string[];
  names?: Partial<Record<PackageManager, string[]>>;
  /** Shell commands run before installing, per manager */
  setup?: Partial<Record<PackageManager, string[]>>;
}

export type ArchiveFormat = 'tar.gz' | 'binary';

/**
 * Download a release artifact and place its binary in the install directory
 */
export interface ReleaseStrategy {
  type: 'release';
  version: string;
  /** URL template over {version}, {arch} and {os} */
  url: string;
  archive: ArchiveFormat;
  /** File name of the installed binary */
  binary: string;
  /** Path of the binary inside the extracted archive (template) */
  path?: string;
  /** Node arch name to release arch name */
  arch?: Record<string, string>;
  /** Expected sha256 of the artifact, keyed by release arch name */
  sha256?: Record<string, string>;
}

/**
 * Download and execute a vendor install script
 */
export interface ScriptStrategy {
  type: 'script';
  url: string;
  shell: 'sh' | 'bash';
  args?: string[];
}

export type Strategy = PackageStrategy | ReleaseStrategy | ScriptStrategy;

export type StrategyKind = Strategy['type'];

/**
 * Platform conditions a tool applies to
 */
export interface ToolCondition {
  os?: Os[];
  managers?: PackageManager[];
  desktop?: boolean;
}

/**
 * Commands run once the tool itself is present. `check` tells whether they
 * have taken effect, so a failed step is retried on the next run.
 */
export interface PostInstall {
  commands: string[];
  check: ToolCheck;
}

/**
 * A tool definition. Defined statically and never mutated.
 */
export interface ToolSpec {
  readonly name: string;
  readonly description?: string;
  readonly check: ToolCheck;
  readonly strategy: Strategy;
  /** Replacement strategy on specific package managers */
  readonly overrides?: Partial<Record<PackageManager, Strategy>>;
  readonly dependsOn: readonly string[];
  readonly when?: ToolCondition;
  readonly postInstall?: PostInstall;
}
