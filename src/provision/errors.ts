/**
 * Provisioning Errors
 *
 * Fatal errors abort the run before anything is installed.
 * InstallError is per tool and ends up in that tool's result.
 */

import type { InstallErrorKind } from '../types/index.js';

export type ProvisionErrorCode =
  | 'UNSUPPORTED_PLATFORM'
  | 'CYCLIC_DEPENDENCY'
  | 'INVALID_CATALOG'
  | 'UNKNOWN_TOOL'
  | 'INVALID_CONFIG'
  | 'INSTALL_FAILED';

export abstract class ProvisionError extends Error {
  abstract readonly code: ProvisionErrorCode;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnsupportedPlatformError extends ProvisionError {
  readonly code = 'UNSUPPORTED_PLATFORM';
}

export class CyclicDependencyError extends ProvisionError {
  readonly code = 'CYCLIC_DEPENDENCY';

  constructor(readonly cycle: readonly string[]) {
    super('Dependency cycle: ' + cycle.join(' -> '));
  }
}

export class CatalogError extends ProvisionError {
  readonly code = 'INVALID_CATALOG';
}

export class UnknownToolError extends ProvisionError {
  readonly code = 'UNKNOWN_TOOL';

  constructor(readonly tools: readonly string[]) {
    super('Unknown tool(s): ' + tools.join(', '));
  }
}

export class ConfigError extends ProvisionError {
  readonly code = 'INVALID_CONFIG';
}

export class InstallError extends ProvisionError {
  readonly code = 'INSTALL_FAILED';

  constructor(
    readonly kind: InstallErrorKind,
    message: string,
    readonly exitCode?: number
  ) {
    super(message);
  }
}

/**
 * True for errors that abort the whole run
 */
export function isFatalError(e: unknown): e is ProvisionError {
  return e instanceof ProvisionError && !(e instanceof InstallError);
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
