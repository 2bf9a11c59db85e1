/**
 * Pointer Store - the persisted "current bundle" slot
 *
 * A tiny string key/value dependency injected into the bundle store so the
 * current root survives process restarts.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { PointerFileSchema } from '../schemas/yaml-schemas.js';
import { getUnifiedLogger } from '../sdk/unified-logger.js';
import { LOG_SOURCES } from '../constants.js';
import { errorCode, extractErrorMessage, safeJsonParse } from '../utils/error-handler.js';

export interface KeyValueSlot {
  get(key: string): Promise<string | undefined>;
  set(key: string, value: string): Promise<void>;
  delete(key: string): Promise<void>;
}

/**
 * In-process slot, for tests and embedders that persist elsewhere
 */
export class MemoryKeyValueSlot implements KeyValueSlot {
  private readonly values = new Map<string, string>();

  constructor(initial?: Record<string, string>) {
    for (const [key, value] of Object.entries(initial ?? {})) {
      this.values.set(key, value);
    }
  }

  async get(key: string): Promise<string | undefined> {
    return this.values.get(key);
  }

  async set(key: string, value: string): Promise<void> {
    this.values.set(key, value);
  }

  async delete(key: string): Promise<void> {
    this.values.delete(key);
  }
}

/**
 * JSON-file-backed slot. A missing or corrupt file reads as empty.
 */
export class FileKeyValueSlot implements KeyValueSlot {
  private readonly filePath: string;
  /** Serialize read-modify-write cycles */
  private mutationLock: Promise<void> = Promise.resolve();

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  getPath(): string {
    return this.filePath;
  }

  private async withMutationLock<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.mutationLock;
    let release!: () => void;

    this.mutationLock = new Promise<void>(resolve => { release = resolve; });
    await previous;

    try {
      return await fn();
    } finally {
      release();
    }
  }

  private async readAll(): Promise<Record<string, string>> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        getUnifiedLogger().warn(LOG_SOURCES.POINTER, 'Pointer file unreadable, treating as empty', {
          path: this.filePath,
          error: extractErrorMessage(error),
        });
      }
      return {};
    }

    const parsed = safeJsonParse(raw);
    const validated = parsed.success ? PointerFileSchema.safeParse(parsed.data) : null;
    if (!validated?.success) {
      getUnifiedLogger().warn(LOG_SOURCES.POINTER, 'Pointer file is corrupt, treating as empty', {
        path: this.filePath,
      });
      return {};
    }
    return validated.data;
  }

  private async writeAll(values: Record<string, string>): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });

    // Atomic write: temp file in the same directory, then rename
    const tempPath = `${this.filePath}.tmp.${process.pid}.${Date.now()}`;
    try {
      await fs.writeFile(tempPath, JSON.stringify(values, null, 2), 'utf-8');
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }
  }

  async get(key: string): Promise<string | undefined> {
    await this.mutationLock;
    const values = await this.readAll();
    return Object.prototype.hasOwnProperty.call(values, key) ? values[key] : undefined;
  }

  async set(key: string, value: string): Promise<void> {
    await this.withMutationLock(async () => {
      const values = await this.readAll();
      values[key] = value;
      await this.writeAll(values);
    });
  }

  async delete(key: string): Promise<void> {
    await this.withMutationLock(async () => {
      const values = await this.readAll();
      if (!Object.prototype.hasOwnProperty.call(values, key)) {
        return;
      }
      delete values[key];
      await this.writeAll(values);
    });
  }
}
