/**
 * Tool Catalog
 *
 * Loads tools.yml and validates it into ToolSpec definitions.
 */

import * as fs from 'fs';
import * as path from 'path';
import yaml from 'js-yaml';

import { CatalogError, errorMessage } from '../provision/errors.js';
import { PACKAGE_MANAGERS } from '../types/index.js';
import type {
  ArchiveFormat,
  Os,
  PackageManager,
  PackageStrategy,
  PostInstall,
  ReleaseStrategy,
  ScriptStrategy,
  Strategy,
  ToolCheck,
  ToolCondition,
  ToolSpec,
} from '../types/index.js';

export const CATALOG_FILENAME = 'tools.yml';

const OS_NAMES: readonly Os[] = ['linux', 'macos'];
const ARCHIVE_FORMATS: readonly ArchiveFormat[] = ['tar.gz', 'binary'];
const TOOL_NAME = /^[a-z0-9][a-z0-9._-]*$/;
const PACKAGE_NAME = /^[A-Za-z0-9][A-Za-z0-9+._@-]*$/;

type Fields = Record<string, unknown>;

function isRecord(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPackageManager(value: string): value is PackageManager {
  return (PACKAGE_MANAGERS as readonly string[]).includes(value);
}

/**
 * Field reader that reports the location of bad values
 */
class FieldReader {
  constructor(
    private readonly fields: Fields,
    private readonly where: string
  ) {}

  error(message: string): CatalogError {
    return new CatalogError(this.where + ': ' + message);
  }

  has(key: string): boolean {
    return this.fields[key] !== undefined && this.fields[key] !== null;
  }

  string(key: string): string {
    const value = this.fields[key];
    // YAML reads versions like 0.18 as numbers
    if (typeof value === 'number') return String(value);
    if (typeof value !== 'string' || value.length === 0) throw this.error(key + ' must be a non-empty string');
    return value;
  }

  boolean(key: string): boolean {
    const value = this.fields[key];
    if (typeof value !== 'boolean') throw this.error(key + ' must be true or false');
    return value;
  }

  optionalString(key: string): string | undefined {
    return this.has(key) ? this.string(key) : undefined;
  }

  /** A string or list of strings, always returned as a list */
  list(key: string): string[] {
    const value = this.fields[key];
    if (value === undefined || value === null) return [];
    const items = Array.isArray(value) ? value : [value];
    return items.map((item) => {
      if (typeof item === 'number') return String(item);
      if (typeof item !== 'string' || item.length === 0) throw this.error(key + ' must be a string or list of strings');
      return item;
    });
  }

  record(key: string): Fields | undefined {
    const value = this.fields[key];
    if (value === undefined || value === null) return undefined;
    if (!isRecord(value)) throw this.error(key + ' must be a mapping');
    return value;
  }

  child(key: string): FieldReader | undefined {
    const value = this.record(key);
    return value ? new FieldReader(value, this.where + '.' + key) : undefined;
  }

  /** Mapping of package manager to string list */
  perManager(key: string): Partial<Record<PackageManager, string[]>> | undefined {
    const reader = this.child(key);
    if (!reader) return undefined;
    const result: Partial<Record<PackageManager, string[]>> = {};
    for (const manager of reader.keys()) {
      if (!isPackageManager(manager)) throw reader.error('unknown package manager ' + manager);
      result[manager] = reader.list(manager);
    }
    return result;
  }

  /** Mapping of string to string */
  stringMap(key: string): Record<string, string> | undefined {
    const reader = this.child(key);
    if (!reader) return undefined;
    const result: Record<string, string> = {};
    for (const name of reader.keys()) {
      result[name] = reader.string(name);
    }
    return result;
  }

  keys(): string[] {
    return Object.keys(this.fields);
  }
}

function parseCheck(tool: FieldReader, name: string): ToolCheck {
  const reader = tool.child('check');
  if (!reader) return { command: [name] };

  const command = reader.list('command');
  const paths = reader.list('paths');
  if (command.length === 0 && paths.length === 0) {
    throw reader.error('check needs a command or paths');
  }

  const check: ToolCheck = { command };
  const minVersion = reader.optionalString('minVersion');
  if (minVersion) check.minVersion = minVersion;
  if (reader.has('versionArgs')) check.versionArgs = reader.list('versionArgs');
  if (paths.length > 0) check.paths = paths;
  return check;
}

function parseStrategy(reader: FieldReader): Strategy {
  const type = reader.string('type');

  switch (type) {
    case 'package': {
      for (const pkg of reader.list('name')) {
        if (!PACKAGE_NAME.test(pkg)) throw reader.error('invalid package name ' + pkg);
      }
      const names = reader.perManager('names');
      for (const pkg of Object.values(names ?? {}).flat()) {
        if (!PACKAGE_NAME.test(pkg)) throw reader.error('invalid package name ' + pkg);
      }
      const strategy: PackageStrategy = { type: 'package' };
      if (reader.has('name')) strategy.name = reader.list('name');
      if (names) strategy.names = names;
      const setup = reader.perManager('setup');
      if (setup) strategy.setup = setup;
      return strategy;
    }

    case 'release': {
      const archive = reader.string('archive');
      const format = ARCHIVE_FORMATS.find((candidate) => candidate === archive);
      if (!format) throw reader.error('archive must be one of ' + ARCHIVE_FORMATS.join(', '));

      const binary = reader.string('binary');
      if (binary.includes('/')) throw reader.error('binary must be a file name');

      const strategy: ReleaseStrategy = {
        type: 'release',
        version: reader.string('version'),
        url: reader.string('url'),
        archive: format,
        binary,
      };
      const inner = reader.optionalString('path');
      if (inner) strategy.path = inner;
      const arch = reader.stringMap('arch');
      if (arch) strategy.arch = arch;
      const checksums = reader.stringMap('sha256');
      if (checksums) strategy.sha256 = checksums;
      return strategy;
    }

    case 'script': {
      const shell = reader.optionalString('shell') ?? 'sh';
      if (shell !== 'sh' && shell !== 'bash') throw reader.error('shell must be sh or bash');
      const strategy: ScriptStrategy = { type: 'script', url: reader.string('url'), shell };
      if (reader.has('args')) strategy.args = reader.list('args');
      return strategy;
    }

    default:
      throw reader.error('unknown strategy type ' + type);
  }
}

function parseCondition(tool: FieldReader): ToolCondition | undefined {
  const reader = tool.child('when');
  if (!reader) return undefined;

  const condition: ToolCondition = {};
  if (reader.has('os')) {
    condition.os = reader.list('os').map((os) => {
      const known = OS_NAMES.find((candidate) => candidate === os);
      if (!known) throw reader.error('unknown os ' + os);
      return known;
    });
  }
  if (reader.has('managers')) {
    condition.managers = reader.list('managers').map((manager) => {
      if (!isPackageManager(manager)) throw reader.error('unknown package manager ' + manager);
      return manager;
    });
  }
  if (reader.has('desktop')) condition.desktop = reader.boolean('desktop');
  return condition;
}

function parsePostInstall(tool: FieldReader, name: string): PostInstall | undefined {
  const reader = tool.child('postInstall');
  if (!reader) return undefined;

  const commands = reader.list('commands');
  if (commands.length === 0) throw reader.error('commands must list at least one command');
  if (!reader.has('check')) throw reader.error('check is required');
  return { commands, check: parseCheck(reader, name) };
}

function parseTool(entry: unknown, index: number, source: string): ToolSpec {
  if (!isRecord(entry)) {
    throw new CatalogError(source + ': tool #' + (index + 1) + ' must be a mapping');
  }
  const reader = new FieldReader(entry, source + ': tool #' + (index + 1));
  const name = reader.string('name');
  if (!TOOL_NAME.test(name)) throw reader.error('invalid tool name ' + name);

  const tool = new FieldReader(entry, source + ': ' + name);
  const strategyReader = tool.child('strategy');
  if (!strategyReader) throw tool.error('strategy is required');

  let overrides: Partial<Record<PackageManager, Strategy>> | undefined;
  const overridesReader = tool.child('overrides');
  if (overridesReader) {
    overrides = {};
    for (const manager of overridesReader.keys()) {
      if (!isPackageManager(manager)) throw overridesReader.error('unknown package manager ' + manager);
      const strategy = overridesReader.child(manager);
      if (!strategy) throw overridesReader.error(manager + ' must be a mapping');
      overrides[manager] = parseStrategy(strategy);
    }
  }

  const spec: ToolSpec = {
    name,
    description: tool.optionalString('description'),
    check: parseCheck(tool, name),
    strategy: parseStrategy(strategyReader),
    overrides,
    dependsOn: tool.list('dependsOn'),
    when: parseCondition(tool),
    postInstall: parsePostInstall(tool, name),
  };
  return Object.freeze(spec);
}

/**
 * Validate a parsed catalog document
 *
 * @param source Name used in error messages
 * @throws CatalogError on any invalid entry, duplicate name or unknown dependency
 */
export function parseCatalog(document: unknown, source: string): ToolSpec[] {
  const entries = isRecord(document) ? document.tools : document;
  if (!Array.isArray(entries)) {
    throw new CatalogError(source + ': expected a list of tools under "tools"');
  }

  const specs = entries.map((entry, index) => parseTool(entry, index, source));

  const names = new Set<string>();
  for (const spec of specs) {
    if (names.has(spec.name)) throw new CatalogError(source + ': duplicate tool ' + spec.name);
    names.add(spec.name);
  }
  for (const spec of specs) {
    const missing = spec.dependsOn.filter((dep) => !names.has(dep));
    if (missing.length > 0) {
      throw new CatalogError(source + ': ' + spec.name + ' depends on unknown tool(s) ' + missing.join(', '));
    }
  }

  return specs;
}

/**
 * Location of the bundled catalog, from both src/ and dist/
 */
export function defaultCatalogPath(): string {
  const beside = path.join(__dirname, CATALOG_FILENAME);
  if (fs.existsSync(beside)) return beside;
  return path.join(__dirname, '../../src/catalog', CATALOG_FILENAME);
}

/**
 * Read and validate a catalog file
 */
export function loadCatalog(filePath: string = defaultCatalogPath()): ToolSpec[] {
  let document: unknown;
  try {
    document = yaml.load(fs.readFileSync(filePath, 'utf8'));
  } catch (e) {
    throw new CatalogError('Cannot read catalog ' + filePath + ': ' + errorMessage(e));
  }
  return parseCatalog(document, path.basename(filePath));
}
