/**
 * Shared command plumbing: global options, store construction and the
 * error-reporting wrapper every action runs in.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import * as path from 'path';

import { assertLanguageKey } from '../bundle/bundle-store.js';
import { FileKeyValueSlot } from '../bundle/pointer-store.js';
import { FILE_NAMES, LOG_SOURCES, LOGGING_DEFAULTS, STORE_DEFAULTS, projectPaths } from '../constants.js';
import type { ProjectConfig } from '../schemas/yaml-schemas.js';
import { getUnifiedLogger, parseLogLevel, LogLevel } from '../sdk/unified-logger.js';
import { LocalizationStore } from '../store/localization-store.js';
import type { LanguageKey, TranslationService } from '../types/index.js';
import { loadProjectConfig } from '../utils/config-loader.js';
import { ErrorCategory, categorizeError, createErrorMessage, toError } from '../utils/error-handler.js';

// A type alias (not an interface) so it satisfies commander's OptionValues
export type GlobalOptions = {
  cwd?: string;
  dir?: string;
  languages?: string;
  table?: string;
  locale?: string;
  verbose?: boolean;
};

export interface ResolvedContext {
  cwd: string;
  baseDir: string;
  statePath: string;
  languages: LanguageKey[];
  tableName: string;
  locale: string;
  project: ProjectConfig;
}

/**
 * Parse a comma separated language list, dropping blanks
 */
export function parseLanguageList(value: string): LanguageKey[] {
  return value
    .split(',')
    .map(language => language.trim())
    .filter(language => language.length > 0);
}

/**
 * Combine command line options, project config and defaults
 */
export function resolveContext(options: GlobalOptions): ResolvedContext {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const project = loadProjectConfig(cwd);

  const languages = options.languages
    ? parseLanguageList(options.languages)
    : project.supported_languages ?? [...STORE_DEFAULTS.SUPPORTED_LANGUAGES];
  if (languages.length === 0) {
    throw new Error('At least one supported language is required');
  }
  languages.forEach(assertLanguageKey);

  const baseDir = options.dir
    ? path.resolve(cwd, options.dir)
    : project.bundles_dir
      ? path.resolve(cwd, project.bundles_dir)
      : projectPaths(cwd).BUNDLES_DIR;

  return {
    cwd,
    baseDir,
    statePath: path.join(baseDir, FILE_NAMES.STATE_JSON),
    languages,
    tableName: options.table ?? project.table_name ?? STORE_DEFAULTS.TABLE_NAME,
    locale: options.locale ?? project.locale ?? languages[0],
    project,
  };
}

/**
 * Apply the configured log level and, with --verbose, echo entries to stderr
 */
export function configureLogging(options: GlobalOptions, project: ProjectConfig): () => void {
  const logger = getUnifiedLogger();
  logger.setMaxLogSize(LOGGING_DEFAULTS.MAX_ENTRIES);
  if (options.verbose) {
    logger.setMinLevel(LogLevel.DEBUG);
    return logger.onLog(entry => {
      console.error(chalk.gray(logger.format(entry, { includeTimestamp: false })));
    });
  }
  logger.setMinLevel(parseLogLevel(project.logging?.level ?? LOGGING_DEFAULTS.LEVEL));
  return () => {};
}

export async function openStore(
  context: ResolvedContext,
  translationService?: TranslationService
): Promise<LocalizationStore> {
  return LocalizationStore.create({
    baseDir: context.baseDir,
    tableName: context.tableName,
    locale: context.locale,
    supportedLanguages: context.languages,
    pointer: new FileKeyValueSlot(context.statePath),
    translationService,
  });
}

/**
 * Global options of the root program, as seen from a subcommand
 */
export function globalOptions(command: Command): GlobalOptions {
  const opts = command.optsWithGlobals<GlobalOptions>();
  return {
    cwd: opts.cwd,
    dir: opts.dir,
    languages: opts.languages,
    table: opts.table,
    locale: opts.locale,
    verbose: opts.verbose,
  };
}

/**
 * Run a command action against an open store. Failures are printed and set
 * a non-zero exit code; the store is always closed. Anything that fails
 * before the project config is resolved is reported as a configuration error.
 */
export async function runWithStore(
  command: Command,
  category: ErrorCategory,
  operation: string,
  action: (store: LocalizationStore, context: ResolvedContext) => Promise<void>,
  translationService?: (context: ResolvedContext) => Promise<TranslationService | undefined>
): Promise<void> {
  const options = globalOptions(command);
  let stopLogging: () => void = () => {};
  let store: LocalizationStore | undefined;
  let stage = ErrorCategory.CONFIGURATION;

  try {
    const context = resolveContext(options);
    stopLogging = configureLogging(options, context.project);
    stage = category;
    const service = translationService ? await translationService(context) : undefined;
    store = await openStore(context, service);
    await action(store, context);
  } catch (error) {
    getUnifiedLogger().error(LOG_SOURCES.CLI, `${operation} failed`, toError(error));
    const reported = stage === ErrorCategory.CONFIGURATION ? stage : categorizeError(error, stage);
    console.error(chalk.red(createErrorMessage(reported, operation, error)));
    process.exitCode = 1;
  } finally {
    store?.close();
    stopLogging();
  }
}
