/**
 * Zod validation schemas for YAML configuration files
 * Ensures configuration integrity at load time
 */

import { z } from 'zod';

export const LanguageCodeSchema = z.string().min(1).regex(/^[A-Za-z0-9_-]+$/, {
  message: 'language codes may only contain letters, digits, "-" and "_"',
});

/**
 * Schema for application settings in config-defaults/settings.yaml
 */
export const SettingsYamlSchema = z.object({
  store: z.object({
    table_name: z.string().min(1).regex(/^[^\\/]+$/, { message: 'table_name must not contain path separators' }),
    bundle_suffix: z.string().startsWith('.'),
    language_dir_suffix: z.string().startsWith('.'),
    table_extension: z.string().startsWith('.'),
    pointer_key: z.string().min(1),
    supported_languages: z.array(LanguageCodeSchema).min(1),
  }),
  lookup: z.object({
    sentinel_prefix: z.string().min(1),
  }),
  paths: z.object({
    config_dir: z.string().min(1),
    bundles_dir: z.string().min(1),
    state_file: z.string().min(1),
    project_config: z.string().min(1),
  }),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
    max_entries: z.number().int().min(100),
  }),
});

export type SettingsYaml = z.infer<typeof SettingsYamlSchema>;

/**
 * Schema for project overrides in .polystring/config.yaml.
 * Every key is optional; present keys replace the defaults.
 */
export const ProjectConfigSchema = z.object({
  table_name: z.string().min(1).regex(/^[^\\/]+$/).optional(),
  supported_languages: z.array(LanguageCodeSchema).min(1).optional(),
  locale: z.string().min(1).optional(),
  bundles_dir: z.string().min(1).optional(),
  glossary: z.string().min(1).optional(),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  }).optional(),
});

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

/**
 * Schema for a glossary file: target language → source text → translation
 */
export const GlossarySchema = z.record(LanguageCodeSchema, z.record(z.string(), z.string()));

export type Glossary = z.infer<typeof GlossarySchema>;

/**
 * Schema for the persisted pointer slot file
 */
export const PointerFileSchema = z.record(z.string(), z.string());
