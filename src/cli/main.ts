#!/usr/bin/env node
/**
 * dotstrap CLI entry point
 */

import * as fs from 'fs';
import * as path from 'path';
import { Command, InvalidArgumentError } from 'commander';

import { provision } from './provision.js';
import type { ProvisionOptions } from '../types/index.js';

function parseList(value: string, previous: string[] = []): string[] {
  const names = value
    .split(',')
    .map((name) => name.trim())
    .filter(Boolean);
  return [...previous, ...names];
}

function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidArgumentError('Expected a positive number of seconds.');
  }
  return seconds;
}

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '../../package.json'), 'utf8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch {
    // not running from a package checkout
  }
  return '0.0.0';
}

export function createProgram(): Command {
  return new Command()
    .name('dotstrap')
    .description('Install the tool catalog on this machine, skipping what is already present')
    .version(readVersion())
    .option('--dry-run', 'Report planned actions without installing anything')
    .option('--only <tools>', 'Only provision these tools (comma separated)', parseList)
    .option('--skip <tools>', 'Do not provision these tools (comma separated)', parseList)
    .option('-c, --config <path>', 'Config file (default: ./dotstrap.yml)')
    .option('--catalog <path>', 'Tool catalog file')
    .option('--install-dir <dir>', 'Where downloaded binaries are placed (default: ~/.local/bin)')
    .option('--timeout <seconds>', 'Give up on a single tool after this many seconds', parseSeconds);
}

async function main(): Promise<void> {
  const program = createProgram();
  program.parse();
  const options = program.opts<ProvisionOptions>();

  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.error('\n⚠️  Interrupted, finishing the current step...');
    controller.abort();
  });

  process.exitCode = await provision(options, { signal: controller.signal });
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(2);
  });
}
