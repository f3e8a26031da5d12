/**
 * Installer Outcome Helpers
 */

import type { InstallErrorKind } from '../../types/index.js';
import type { ExecResult } from '../../utils/exec.js';
import { InstallError, errorMessage } from '../errors.js';
import type { InstallOutcome } from './types.js';

export const succeeded: InstallOutcome = { ok: true, value: undefined };

export function failed(kind: InstallErrorKind, message: string, exitCode?: number): InstallOutcome {
  return { ok: false, error: new InstallError(kind, message, exitCode) };
}

/**
 * Turn a thrown value into a failed outcome, keeping the kind of an InstallError
 */
export function fromThrown(e: unknown, fallback: InstallErrorKind): InstallOutcome {
  if (e instanceof InstallError) return { ok: false, error: e };
  return failed(fallback, errorMessage(e));
}

/**
 * Last non-empty line of a command's stderr (or stdout), for result details
 */
export function lastOutputLine(result: ExecResult): string {
  const lines = (result.stderr || result.stdout)
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean);
  return lines[lines.length - 1] ?? '';
}

export function exitFailure(what: string, result: ExecResult): InstallOutcome {
  const tail = lastOutputLine(result);
  return failed(
    'nonZeroExit',
    what + ' exited with ' + result.exitCode + (tail ? ': ' + tail : ''),
    result.exitCode
  );
}
