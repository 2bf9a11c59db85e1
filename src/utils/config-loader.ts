/**
 * YAML Configuration Loader
 * Loads and caches configuration from YAML files with Zod validation
 */

import { existsSync, readFileSync } from 'fs';
import { basename, dirname, extname, isAbsolute, join, normalize, relative, resolve } from 'path';
import { fileURLToPath } from 'url';
import yaml from 'js-yaml';
import { z } from 'zod';
import {
  ProjectConfigSchema,
  SettingsYamlSchema,
  type ProjectConfig,
  type SettingsYaml,
} from '../schemas/yaml-schemas.js';
import { extractErrorMessage } from './error-handler.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

let settingsCache: SettingsYaml | null = null;

/**
 * Get the config directory path
 */
function getConfigDir(): string {
  // In development: src/utils -> ../../config-defaults
  // In production: dist/utils -> ../../config-defaults
  return join(__dirname, '../../config-defaults');
}

function validateConfigFilename(filename: string, configDir: string): string {
  const normalized = normalize(filename);

  if (isAbsolute(normalized) || /(^|[\\/])\.\.(?:[\\/]|$)/.test(normalized)) {
    throw new Error(`Invalid config filename: ${filename}. Path traversal is not allowed.`);
  }

  if (normalized !== basename(normalized)) {
    throw new Error(`Invalid config filename: ${filename}. Directory components are not allowed.`);
  }

  const ext = extname(normalized).toLowerCase();
  if (ext !== '.yaml' && ext !== '.yml') {
    throw new Error(`Invalid config filename: ${filename}. Only .yaml/.yml files are allowed.`);
  }

  const configPath = resolve(configDir, normalized);
  const relativePath = relative(resolve(configDir), configPath);

  if (relativePath.startsWith('..') || isAbsolute(relativePath)) {
    throw new Error(`Invalid config path resolved for ${filename}.`);
  }

  return configPath;
}

/**
 * Parse YAML text and validate it against a schema
 */
export function parseYamlConfig<S extends z.ZodTypeAny>(
  source: string,
  contents: string,
  schema: S
): z.infer<S> {
  const config: unknown = yaml.load(contents);
  const result = schema.safeParse(config ?? {});
  if (!result.success) {
    throw new Error(`Validation failed for ${source}: ${result.error.message}`);
  }
  return result.data;
}

/**
 * Load a YAML file from config-defaults with schema validation
 */
export function loadYamlConfig<S extends z.ZodTypeAny>(filename: string, schema: S): z.infer<S> {
  try {
    const configPath = validateConfigFilename(filename, getConfigDir());
    return parseYamlConfig(filename, readFileSync(configPath, 'utf8'), schema);
  } catch (error) {
    throw new Error(`Failed to load config file ${filename}: ${extractErrorMessage(error)}`);
  }
}

/**
 * Load application settings (cached)
 */
export function loadSettingsConfig(): SettingsYaml {
  if (!settingsCache) {
    settingsCache = loadYamlConfig('settings.yaml', SettingsYamlSchema);
  }
  return settingsCache;
}

/**
 * Load project overrides from `<cwd>/<config_dir>/<project_config>`.
 * A missing file yields an empty override set.
 */
export function loadProjectConfig(cwd: string = process.cwd()): ProjectConfig {
  const { paths } = loadSettingsConfig();
  const configPath = join(cwd, paths.config_dir, paths.project_config);

  if (!existsSync(configPath)) {
    return {};
  }

  try {
    return parseYamlConfig(configPath, readFileSync(configPath, 'utf8'), ProjectConfigSchema);
  } catch (error) {
    throw new Error(`Failed to load project config ${configPath}: ${extractErrorMessage(error)}`);
  }
}

/**
 * Clear the configuration cache
 * Useful for testing or reloading configs
 */
export function clearConfigCache(): void {
  settingsCache = null;
}
