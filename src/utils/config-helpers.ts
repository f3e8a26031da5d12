/**
 * Config Helpers
 *
 * Loads dotstrap.yml and merges it with CLI flags.
 */

import * as fs from 'fs';
import * as path from 'path';
import yaml from 'js-yaml';

import { defaultInstallDir, getConfigPath } from '../constants/config-files.js';
import { defaultCatalogPath } from '../catalog/index.js';
import { expandHome } from '../provision/check.js';
import { ConfigError, errorMessage } from '../provision/errors.js';
import type { DotstrapConfig, ProvisionOptions, ResolvedSettings, SudoMode } from '../types/index.js';

const SUDO_MODES: readonly SudoMode[] = ['auto', 'always', 'never'];
const KNOWN_KEYS = ['installDir', 'timeoutSeconds', 'only', 'skip', 'sudo', 'catalog'];

function stringList(value: unknown, key: string): string[] {
  const items = Array.isArray(value) ? value : [value];
  return items.map((item) => {
    if (typeof item !== 'string' || item.length === 0) {
      throw new ConfigError(key + ' must be a tool name or list of tool names');
    }
    return item;
  });
}

/**
 * Validate a parsed config document
 *
 * @throws ConfigError on unknown keys or wrongly typed values
 */
export function parseConfig(document: unknown): DotstrapConfig {
  if (document === undefined || document === null) return {};
  if (typeof document !== 'object' || Array.isArray(document)) {
    throw new ConfigError('Config must be a mapping');
  }

  const fields: Record<string, unknown> = { ...document };
  const unknown = Object.keys(fields).filter((key) => !KNOWN_KEYS.includes(key));
  if (unknown.length > 0) {
    throw new ConfigError('Unknown config key(s): ' + unknown.join(', '));
  }

  const config: DotstrapConfig = {};

  if (fields.installDir !== undefined) {
    if (typeof fields.installDir !== 'string') throw new ConfigError('installDir must be a path');
    config.installDir = fields.installDir;
  }
  if (fields.timeoutSeconds !== undefined) {
    const timeout = fields.timeoutSeconds;
    if (typeof timeout !== 'number' || !(timeout > 0)) {
      throw new ConfigError('timeoutSeconds must be a positive number');
    }
    config.timeoutSeconds = timeout;
  }
  if (fields.only !== undefined) config.only = stringList(fields.only, 'only');
  if (fields.skip !== undefined) config.skip = stringList(fields.skip, 'skip');
  if (fields.sudo !== undefined) {
    const sudo = SUDO_MODES.find((mode) => mode === fields.sudo);
    if (!sudo) throw new ConfigError('sudo must be one of ' + SUDO_MODES.join(', '));
    config.sudo = sudo;
  }
  if (fields.catalog !== undefined) {
    if (typeof fields.catalog !== 'string') throw new ConfigError('catalog must be a path');
    config.catalog = fields.catalog;
  }

  return config;
}

/**
 * Load config from dotstrap.yml. A missing default file is an empty config;
 * a missing explicit file is an error.
 */
export function loadConfig(rootDir: string, explicitPath?: string): DotstrapConfig {
  const configPath = getConfigPath(rootDir, explicitPath);

  if (!fs.existsSync(configPath)) {
    if (explicitPath) throw new ConfigError('Config file not found: ' + configPath);
    return {};
  }

  let document: unknown;
  try {
    document = yaml.load(fs.readFileSync(configPath, 'utf8'));
  } catch (e) {
    throw new ConfigError('Error parsing ' + path.basename(configPath) + ': ' + errorMessage(e));
  }
  return parseConfig(document);
}

/**
 * Merge defaults, config file and CLI flags (flags win)
 */
export function resolveSettings(options: ProvisionOptions, config: DotstrapConfig): ResolvedSettings {
  const rootDir = options.rootDir ?? process.cwd();
  const installDir = options.installDir ?? config.installDir;
  const catalog = options.catalog ?? config.catalog;
  const timeoutSeconds = options.timeout ?? config.timeoutSeconds;

  if (timeoutSeconds !== undefined && !(timeoutSeconds > 0)) {
    throw new ConfigError('Timeout must be a positive number of seconds');
  }

  return {
    installDir: installDir ? path.resolve(rootDir, expandHome(installDir)) : defaultInstallDir(),
    timeoutMs: timeoutSeconds !== undefined ? timeoutSeconds * 1000 : undefined,
    only: options.only ?? config.only,
    skip: options.skip ?? config.skip,
    sudo: config.sudo ?? 'auto',
    catalogPath: catalog ? path.resolve(rootDir, expandHome(catalog)) : defaultCatalogPath(),
  };
}
