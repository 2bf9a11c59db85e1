/**
 * Application-wide constants
 * Loaded from config-defaults/settings.yaml
 */

import { join } from 'path';
import { loadSettingsConfig } from './utils/config-loader.js';

const settingsYaml = loadSettingsConfig();

/** Configuration directory name */
export const CONFIG_DIR_NAME = settingsYaml.paths.config_dir;

// File Names (without paths)
export const FILE_NAMES = {
  /** Directory holding every bundle root */
  BUNDLES_DIR: settingsYaml.paths.bundles_dir,
  /** Persisted pointer slot, kept inside the bundles directory */
  STATE_JSON: settingsYaml.paths.state_file,
  /** Project overrides */
  PROJECT_CONFIG: settingsYaml.paths.project_config,
} as const;

export const STORE_DEFAULTS = {
  TABLE_NAME: settingsYaml.store.table_name,
  BUNDLE_SUFFIX: settingsYaml.store.bundle_suffix,
  LANGUAGE_DIR_SUFFIX: settingsYaml.store.language_dir_suffix,
  TABLE_EXTENSION: settingsYaml.store.table_extension,
  /** Pointer slot key holding the current bundle directory name */
  POINTER_KEY: settingsYaml.store.pointer_key,
  SUPPORTED_LANGUAGES: settingsYaml.store.supported_languages,
} as const;

export const LOOKUP_DEFAULTS = {
  SENTINEL_PREFIX: settingsYaml.lookup.sentinel_prefix,
} as const;

export const LOGGING_DEFAULTS = {
  LEVEL: settingsYaml.logging.level,
  MAX_ENTRIES: settingsYaml.logging.max_entries,
} as const;

/** Log sources used by each component */
export const LOG_SOURCES = {
  BUNDLE_STORE: 'bundle-store',
  POINTER: 'pointer-store',
  COORDINATOR: 'coordinator',
  LOOKUP: 'lookup',
  STORE: 'localization-store',
  TRANSLATOR: 'dictionary-translator',
  CLI: 'cli',
} as const;

/**
 * Project-relative paths rooted at a working directory
 */
export function projectPaths(cwd: string = process.cwd()) {
  const configDir = join(cwd, CONFIG_DIR_NAME);
  return {
    CONFIG_DIR: configDir,
    BUNDLES_DIR: join(configDir, FILE_NAMES.BUNDLES_DIR),
    PROJECT_CONFIG: join(configDir, FILE_NAMES.PROJECT_CONFIG),
  };
}
