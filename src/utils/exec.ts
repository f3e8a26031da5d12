/**
 * Command Execution
 *
 * Runs shell commands asynchronously so a run can time out or be cancelled.
 */

import { spawn } from 'child_process';

export interface ExecResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface ExecOptions {
  env?: Record<string, string>;
  signal?: AbortSignal;
  /** Stream output to the terminal instead of capturing it */
  inherit?: boolean;
}

/**
 * Runs a command line through the shell
 */
export interface CommandRunner {
  run(command: string, options?: ExecOptions): Promise<ExecResult>;
}

/**
 * Quote a value for POSIX sh
 */
export function shellQuote(value: string): string {
  if (/^[A-Za-z0-9_\-.,:/=@+%]+$/.test(value)) return value;
  return "'" + value.replace(/'/g, "'\\''") + "'";
}

/**
 * Runner backed by `sh -c`. Rejects only when the process cannot be spawned
 * or the signal aborts it; a non-zero exit resolves with its code.
 */
export function createShellRunner(): CommandRunner {
  return {
    run(command: string, options: ExecOptions = {}): Promise<ExecResult> {
      return new Promise((resolve, reject) => {
        const child = spawn('sh', ['-c', command], {
          env: { ...process.env, ...options.env },
          stdio: options.inherit ? 'inherit' : ['ignore', 'pipe', 'pipe'],
          signal: options.signal,
        });

        let stdout = '';
        let stderr = '';
        child.stdout?.on('data', (chunk: Buffer) => {
          stdout += chunk.toString();
        });
        child.stderr?.on('data', (chunk: Buffer) => {
          stderr += chunk.toString();
        });

        child.on('error', reject);
        child.on('close', (code, signal) => {
          resolve({
            // null code means the process was killed by a signal
            exitCode: code ?? (signal ? 128 : 1),
            stdout,
            stderr,
          });
        });
      });
    },
  };
}
