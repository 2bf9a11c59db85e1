/**
 * Bundle Store - durable, atomically replaced translation tables on disk
 *
 * Layout:
 *
 * ```text
 * <baseDir>/
 *   <uuid>.bundle/             one immutable snapshot ("root")
 *     en.lang/Localizable.table
 *     sv.lang/Localizable.table
 * ```
 *
 * Key design decisions:
 *   - A write never touches the current root. It builds a fresh root, fills
 *     every language file, and only then swaps the in-memory handle and the
 *     persisted pointer. The previous root is deleted after the swap.
 *   - Writes are serialized through a promise-based mutex, which makes the
 *     root swap a single-writer operation.
 *   - Reads of individual language files degrade to an empty map on any
 *     error so one corrupt file cannot block the others.
 *   - Language codes become directory names, so they are checked against
 *     LanguageCodeSchema before any path is built from them.
 *
 * @packageDocumentation
 */

import * as path from 'path';
import { randomUUID } from 'crypto';

import { LocalizationError, isLocalizationError } from '../errors.js';
import { LOG_SOURCES, STORE_DEFAULTS } from '../constants.js';
import { LanguageCodeSchema } from '../schemas/yaml-schemas.js';
import { getUnifiedLogger } from '../sdk/unified-logger.js';
import { parseTable, serializeTable } from '../table/strings-format.js';
import { TranslationTable } from '../table/translation-table.js';
import type { LanguageKey, Unsubscribe } from '../types/index.js';
import { extractErrorMessage, toError } from '../utils/error-handler.js';
import { nodeFileSystem, type BundleFileSystem } from './file-system.js';
import type { KeyValueSlot } from './pointer-store.js';

// ─── Events ─────────────────────────────────────────────────────────────────────

export type BundleStoreEventType =
  | 'root-created'
  | 'root-swapped'
  | 'root-deleted'
  | 'delete-failed'
  | 'cleaned';

export interface BundleStoreEvent {
  type: BundleStoreEventType;
  /** Absolute path of the root the event is about */
  root: string;
  /** Root that was current before a swap or clean */
  previousRoot?: string;
  error?: Error;
  timestamp: string;
}

export type BundleStoreEventCallback = (event: BundleStoreEvent) => void;

// ─── Options ────────────────────────────────────────────────────────────────────

export interface BundleStoreOptions {
  /** Parent directory of every bundle root */
  baseDir: string;
  /** Supported languages, in order */
  languages: LanguageKey[];
  /** Persisted "current root name" slot */
  pointer: KeyValueSlot;
  tableName?: string;
  /** Key used in the pointer slot */
  pointerKey?: string;
  fileSystem?: BundleFileSystem;
}

/** Attempts made by load() when a concurrent swap replaces the root mid-read */
const MAX_LOAD_ATTEMPTS = 3;

export interface BundleSnapshot {
  /** Root the table was read from */
  root: string;
  table: TranslationTable;
}

export function isLanguageKey(language: string): boolean {
  return LanguageCodeSchema.safeParse(language).success;
}

/**
 * @throws LocalizationError (`invalid-language`) when `language` cannot be
 * used as a directory name
 */
export function assertLanguageKey(language: string): LanguageKey {
  const result = LanguageCodeSchema.safeParse(language);
  if (!result.success) {
    const reason = result.error.issues.map(issue => issue.message).join('; ');
    throw LocalizationError.invalidLanguage(language, reason);
  }
  return result.data;
}

/**
 * Remove duplicates while keeping first-seen order
 */
export function uniqueLanguages(languages: Iterable<LanguageKey>): LanguageKey[] {
  return [...new Set(languages)];
}

// ─── BundleStore ────────────────────────────────────────────────────────────────

export class BundleStore {
  readonly baseDir: string;
  readonly tableName: string;
  readonly languages: readonly LanguageKey[];

  private readonly pointer: KeyValueSlot;
  private readonly pointerKey: string;
  private readonly fs: BundleFileSystem;
  private readonly listeners = new Set<BundleStoreEventCallback>();
  private readonly logger = getUnifiedLogger();

  private root: string | null = null;
  private initializing: Promise<void> | null = null;
  /** Serializes writes and every swap of `root` */
  private rootLock: Promise<void> = Promise.resolve();

  constructor(options: BundleStoreOptions) {
    this.baseDir = path.resolve(options.baseDir);
    this.tableName = options.tableName ?? STORE_DEFAULTS.TABLE_NAME;
    this.languages = uniqueLanguages(options.languages).map(assertLanguageKey);
    this.pointer = options.pointer;
    this.pointerKey = options.pointerKey ?? STORE_DEFAULTS.POINTER_KEY;
    this.fs = options.fileSystem ?? nodeFileSystem;

    if (this.tableName.includes('/') || this.tableName.includes('\\')) {
      throw new Error(`Invalid table name "${this.tableName}": path separators are not allowed`);
    }
  }

  // ── Private helpers ──────────────────────────────────────────────────────

  private async withRootLock<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.rootLock;
    let release!: () => void;

    this.rootLock = new Promise<void>(resolve => { release = resolve; });
    await previous;

    try {
      return await fn();
    } finally {
      release();
    }
  }

  private emit(type: BundleStoreEventType, root: string, extra: Partial<BundleStoreEvent> = {}): void {
    const event: BundleStoreEvent = {
      ...extra,
      type,
      root,
      timestamp: new Date().toISOString(),
    };
    for (const cb of this.listeners) {
      try {
        cb(event);
      } catch (error) {
        this.logger.error(LOG_SOURCES.BUNDLE_STORE, `Event listener threw on "${type}"`, toError(error));
      }
    }
  }

  private newRootPath(): string {
    return path.join(this.baseDir, `${randomUUID()}${STORE_DEFAULTS.BUNDLE_SUFFIX}`);
  }

  /**
   * Resolve a pointer value to a root path, or null if it is not a usable
   * bundle directory name.
   */
  private async resolvePointer(name: string | undefined): Promise<string | null> {
    if (!name || name !== path.basename(name) || !name.endsWith(STORE_DEFAULTS.BUNDLE_SUFFIX)) {
      return null;
    }
    const candidate = path.join(this.baseDir, name);
    return (await this.fs.isDirectory(candidate)) ? candidate : null;
  }

  private requireRoot(): string {
    if (this.root === null) {
      throw new Error('BundleStore used before initialize()');
    }
    return this.root;
  }

  private async readLanguage(root: string, language: LanguageKey): Promise<Map<string, string>> {
    const filePath = this.tableFilePath(language, root);
    try {
      return parseTable(await this.fs.readFile(filePath));
    } catch (error) {
      this.logger.debug(LOG_SOURCES.BUNDLE_STORE, 'Table file unreadable, using empty table', {
        language,
        path: filePath,
        error: extractErrorMessage(error),
      });
      return new Map();
    }
  }

  // ── Layout ───────────────────────────────────────────────────────────────

  languageDirectory(language: LanguageKey, root: string = this.requireRoot()): string {
    return path.join(root, `${assertLanguageKey(language)}${STORE_DEFAULTS.LANGUAGE_DIR_SUFFIX}`);
  }

  tableFilePath(language: LanguageKey, root: string = this.requireRoot(), tableName: string = this.tableName): string {
    return path.join(this.languageDirectory(language, root), `${tableName}${STORE_DEFAULTS.TABLE_EXTENSION}`);
  }

  /**
   * Ensure `root/`, every `root/<language>.lang/` and an empty
   * `<tableName>.table` in each exist. Existing files are left untouched.
   *
   * @throws LocalizationError (`io-failure`)
   */
  async createDirectoryLayout(
    root: string,
    tableName: string = this.tableName,
    languages: readonly LanguageKey[] = this.languages
  ): Promise<void> {
    try {
      await this.fs.mkdir(root);
      for (const language of languages) {
        await this.fs.mkdir(this.languageDirectory(language, root));
        await this.fs.touch(this.tableFilePath(language, root, tableName));
      }
    } catch (error) {
      throw LocalizationError.io('Create directory layout', root, error);
    }
  }

  // ── Lifecycle ────────────────────────────────────────────────────────────

  /**
   * Adopt the root named by the pointer slot, or create a fresh one.
   * Safe to call repeatedly.
   */
  async initialize(): Promise<void> {
    if (this.root !== null) return;
    if (!this.initializing) {
      this.initializing = this.doInitialize().finally(() => {
        this.initializing = null;
      });
    }
    await this.initializing;
  }

  private async doInitialize(): Promise<void> {
    const existing = await this.resolvePointer(await this.pointer.get(this.pointerKey));

    if (existing) {
      // Older roots may lack languages added since they were written
      await this.createDirectoryLayout(existing);
      this.root = existing;
      this.logger.debug(LOG_SOURCES.BUNDLE_STORE, 'Adopted persisted bundle', { root: existing });
      return;
    }

    const fresh = this.newRootPath();
    await this.createDirectoryLayout(fresh);
    await this.pointer.set(this.pointerKey, path.basename(fresh));
    this.root = fresh;
    this.emit('root-created', fresh);
    this.logger.info(LOG_SOURCES.BUNDLE_STORE, 'Created fresh bundle', { root: fresh });
  }

  get isInitialized(): boolean {
    return this.root !== null;
  }

  /** Absolute path of the current root */
  get currentRoot(): string {
    return this.requireRoot();
  }

  get currentRootName(): string {
    return path.basename(this.requireRoot());
  }

  // ── Reading ──────────────────────────────────────────────────────────────

  /**
   * Read the table for the given languages. Every requested language is
   * present in the result; missing or unparsable files read as empty.
   *
   * Without an explicit root the current root is used, and the read is
   * repeated if a concurrent write swapped the root while it ran.
   *
   * @throws LocalizationError (`invalid-language`)
   */
  async load(languages: readonly LanguageKey[] = this.languages, root?: string): Promise<TranslationTable> {
    if (root !== undefined) {
      return this.loadFrom(root, languages);
    }
    return (await this.loadSnapshot(languages)).table;
  }

  /**
   * Like load(), but also reports which root the table came from. After
   * MAX_LOAD_ATTEMPTS swaps the last read is returned; its `root` then no
   * longer equals `currentRoot`.
   */
  async loadSnapshot(languages: readonly LanguageKey[] = this.languages): Promise<BundleSnapshot> {
    await this.initialize();
    let snapshot: BundleSnapshot = { root: this.requireRoot(), table: new TranslationTable() };
    for (let attempt = 0; attempt < MAX_LOAD_ATTEMPTS; attempt++) {
      const root = this.requireRoot();
      snapshot = { root, table: await this.loadFrom(root, languages) };
      if (this.root === root) {
        return snapshot;
      }
      this.logger.debug(LOG_SOURCES.BUNDLE_STORE, 'Bundle swapped during read, retrying', { root, attempt });
    }
    return snapshot;
  }

  private async loadFrom(root: string, languages: readonly LanguageKey[]): Promise<TranslationTable> {
    const table = new TranslationTable();
    const requested = uniqueLanguages(languages).map(assertLanguageKey);
    const maps = await Promise.all(requested.map(async (language) => {
      return [language, await this.readLanguage(root, language)] as const;
    }));
    for (const [language, entries] of maps) {
      table.db.set(language, entries);
    }
    return table;
  }

  // ── Writing ──────────────────────────────────────────────────────────────

  /**
   * Persist `table` as a new root and make it current.
   *
   * Languages of the new layout that `table` does not cover are carried
   * over from the previous root. If encoding or any file write fails, the
   * previous root stays current and the partial root is removed.
   *
   * @returns absolute path of the new root
   * @throws LocalizationError (`invalid-language`, before anything is
   * written; `serialization-failure` or `io-failure`)
   */
  async writeAtomic(table: TranslationTable, languages: readonly LanguageKey[] = this.languages): Promise<string> {
    const layout = uniqueLanguages([...this.languages, ...languages, ...table.languages()]).map(assertLanguageKey);
    await this.initialize();

    return this.withRootLock(async () => {
      const previous = this.requireRoot();

      const carried = layout.filter(language => !table.db.has(language));
      const carriedTable = carried.length > 0 ? await this.loadFrom(previous, carried) : new TranslationTable();

      // Encode everything before touching the disk
      const files: Array<[LanguageKey, string]> = layout.map((language) => {
        const source = table.db.has(language) ? table : carriedTable;
        return [language, serializeTable(source.entries(language), language)];
      });

      const next = this.newRootPath();
      try {
        await this.createDirectoryLayout(next, this.tableName, layout);
        this.emit('root-created', next);
        for (const [language, contents] of files) {
          const filePath = this.tableFilePath(language, next);
          try {
            await this.fs.writeFile(filePath, contents);
          } catch (error) {
            throw LocalizationError.io('Write table file', filePath, error);
          }
        }
        await this.pointer.set(this.pointerKey, path.basename(next));
      } catch (error) {
        this.logger.error(LOG_SOURCES.BUNDLE_STORE, 'Bundle write failed, keeping previous root', toError(error), {
          previous,
          partial: next,
        });
        await this.delete(next);
        throw isLocalizationError(error) ? error : LocalizationError.io('Write bundle', next, error);
      }

      this.root = next;
      this.emit('root-swapped', next, { previousRoot: previous });
      this.logger.info(LOG_SOURCES.BUNDLE_STORE, 'Bundle replaced', {
        root: next,
        previous,
        languages: layout,
      });

      await this.delete(previous);
      return next;
    });
  }

  // ── Deleting ─────────────────────────────────────────────────────────────

  /**
   * Remove a root directory tree. Failure is reported through the
   * `delete-failed` event and resolves `false`; the store stays usable.
   */
  async delete(root: string): Promise<boolean> {
    try {
      await this.fs.rm(root);
      this.emit('root-deleted', root);
      return true;
    } catch (error) {
      const err = toError(error);
      this.logger.warn(LOG_SOURCES.BUNDLE_STORE, 'Could not delete bundle directory', {
        root,
        error: err.message,
      });
      this.emit('delete-failed', root, { error: err });
      return false;
    }
  }

  /**
   * Delete the current root and replace it with an empty layout
   */
  async clean(): Promise<void> {
    await this.initialize();

    await this.withRootLock(async () => {
      const previous = this.requireRoot();
      const fresh = this.newRootPath();

      await this.createDirectoryLayout(fresh);
      this.emit('root-created', fresh);
      try {
        await this.pointer.set(this.pointerKey, path.basename(fresh));
      } catch (error) {
        await this.delete(fresh);
        throw LocalizationError.io('Persist bundle pointer', fresh, error);
      }
      this.root = fresh;

      const removed = await this.delete(previous);
      if (!removed) {
        throw LocalizationError.io('Clean bundle', previous, new Error('previous bundle could not be removed'));
      }

      this.emit('cleaned', fresh, { previousRoot: previous });
      this.logger.info(LOG_SOURCES.BUNDLE_STORE, 'Bundle cleaned', { root: fresh, previous });
    });
  }

  /**
   * Absolute paths of every bundle root under the base directory
   */
  async listRoots(): Promise<string[]> {
    let names: string[];
    try {
      names = await this.fs.readdir(this.baseDir);
    } catch (error) {
      throw LocalizationError.io('List bundles', this.baseDir, error);
    }

    const roots: string[] = [];
    for (const name of names.sort()) {
      const candidate = path.join(this.baseDir, name);
      if (name.endsWith(STORE_DEFAULTS.BUNDLE_SUFFIX) && await this.fs.isDirectory(candidate)) {
        roots.push(candidate);
      }
    }
    return roots;
  }

  /**
   * Delete every root except the current one (left over from failed writes
   * or interrupted processes).
   *
   * @returns number of roots removed
   */
  async pruneStaleRoots(): Promise<number> {
    await this.initialize();

    return this.withRootLock(async () => {
      const current = this.requireRoot();
      let removed = 0;
      for (const root of await this.listRoots()) {
        if (root !== current && await this.delete(root)) {
          removed++;
        }
      }
      return removed;
    });
  }

  // ── Event system ─────────────────────────────────────────────────────────

  onEvent(callback: BundleStoreEventCallback): Unsubscribe {
    this.listeners.add(callback);
    return () => {
      this.listeners.delete(callback);
    };
  }

  removeAllListeners(): void {
    this.listeners.clear();
  }
}
