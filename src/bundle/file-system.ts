/**
 * File-system seam used by the bundle store.
 *
 * The default implementation is `fs/promises`; tests substitute a wrapper
 * to inject failures at a precise point of a write.
 */

import * as fs from 'fs/promises';
import { errorCode } from '../utils/error-handler.js';

export interface BundleFileSystem {
  mkdir(dirPath: string): Promise<void>;
  writeFile(filePath: string, data: string): Promise<void>;
  /** Create the file empty unless it already exists */
  touch(filePath: string): Promise<void>;
  readFile(filePath: string): Promise<string>;
  readdir(dirPath: string): Promise<string[]>;
  isDirectory(targetPath: string): Promise<boolean>;
  rm(targetPath: string): Promise<void>;
}

export const nodeFileSystem: BundleFileSystem = {
  async mkdir(dirPath) {
    await fs.mkdir(dirPath, { recursive: true });
  },
  async writeFile(filePath, data) {
    await fs.writeFile(filePath, data, 'utf-8');
  },
  async touch(filePath) {
    try {
      await fs.writeFile(filePath, '', { encoding: 'utf-8', flag: 'wx' });
    } catch (error) {
      if (errorCode(error) !== 'EEXIST') {
        throw error;
      }
    }
  },
  async readFile(filePath) {
    return fs.readFile(filePath, 'utf-8');
  },
  async readdir(dirPath) {
    return fs.readdir(dirPath);
  },
  async isDirectory(targetPath) {
    try {
      const stat = await fs.stat(targetPath);
      return stat.isDirectory();
    } catch {
      return false;
    }
  },
  async rm(targetPath) {
    await fs.rm(targetPath, { recursive: true, force: true });
  },
};
