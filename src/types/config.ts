/**
 * Config Types
 *
 * Types for dotstrap.yml and resolved run settings.
 */

export type SudoMode = 'auto' | 'always' | 'never';

/**
 * User config file (dotstrap.yml). Every field is optional.
 */
export interface DotstrapConfig {
  installDir?: string;
  timeoutSeconds?: number;
  only?: string[];
  skip?: string[];
  sudo?: SudoMode;
  /** Alternative tool catalog file */
  catalog?: string;
}

/**
 * Settings after merging defaults, config file and CLI flags
 */
export interface ResolvedSettings {
  installDir: string;
  timeoutMs?: number;
  only?: string[];
  skip?: string[];
  sudo: SudoMode;
  catalogPath: string;
}
