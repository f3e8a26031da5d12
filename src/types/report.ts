/**
 * Report Types
 *
 * Per-tool outcomes and the run report.
 */

import type { Platform } from './platform.js';

export type Outcome = 'alreadyPresent' | 'installed' | 'failed' | 'skipped';

export type InstallErrorKind =
  | 'check'
  | 'network'
  | 'permission'
  | 'checksum'
  | 'architecture'
  | 'extraction'
  | 'nonZeroExit'
  | 'timeout'
  | 'cancelled';

/**
 * Outcome of one tool in one run. Frozen on creation.
 */
export interface InstallResult {
  readonly tool: string;
  readonly outcome: Outcome;
  readonly detail?: string;
  readonly error?: {
    readonly kind: InstallErrorKind;
    readonly message: string;
  };
  readonly durationMs: number;
}

export interface RunReport {
  readonly platform: Platform;
  readonly results: readonly InstallResult[];
  /** True iff no result failed */
  readonly success: boolean;
}

/**
 * What a dry run would do for one tool
 */
export interface PlannedStep {
  readonly tool: string;
  readonly action: 'alreadyPresent' | 'install' | 'skip';
  readonly detail: string;
}

/**
 * Success or failure without throwing
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };
