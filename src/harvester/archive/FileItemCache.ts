import fs from 'fs-extra';
import path from 'path';
import { FileUtils } from '../../utils/fileUtils';
import { logger } from '../../utils/logger';
import { CacheEntryExistsError } from '../../utils/errors';

/**
 * Storage capability used by the fetch path. Implementations must make
 * `write` atomic and must not overwrite an existing entry; a write that
 * loses to an existing entry rejects with CacheEntryExistsError.
 */
export interface ItemCache {
  exists(identifier: string): Promise<boolean>;
  read(identifier: string): Promise<Buffer | null>;
  write(identifier: string, data: Buffer): Promise<void>;
  /** Idempotent; used to discard the remains of a failed write. */
  delete(identifier: string): Promise<void>;
  /** Where the entry lives, for reporting. */
  entryPath(identifier: string): string;
}

export interface ClearCacheOptions {
  olderThanDays?: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/** One file per identifier under a cache root: `<root>/<identifier><extension>`. */
export class FileItemCache implements ItemCache {
  constructor(
    private readonly rootDir: string,
    private readonly extension = '.txt'
  ) {}

  get root(): string {
    return this.rootDir;
  }

  entryPath(identifier: string): string {
    return path.join(this.rootDir, `${identifier}${this.extension}`);
  }

  async exists(identifier: string): Promise<boolean> {
    return FileUtils.fileExists(this.entryPath(identifier));
  }

  async read(identifier: string): Promise<Buffer | null> {
    try {
      return await fs.readFile(this.entryPath(identifier));
    } catch (error) {
      if (isMissingFileError(error)) {
        return null;
      }
      throw error;
    }
  }

  async write(identifier: string, data: Buffer): Promise<void> {
    try {
      await FileUtils.writeFileAtomic(this.entryPath(identifier), data, { overwrite: false });
    } catch (error) {
      // The rename never lands on an existing file, so an entry present now
      // was written by someone else.
      if (await this.exists(identifier)) {
        throw new CacheEntryExistsError(identifier);
      }
      throw error;
    }
  }

  async delete(identifier: string): Promise<void> {
    await FileUtils.deleteFile(this.entryPath(identifier));
  }

  /** Identifiers with a cache entry, sorted. */
  async list(): Promise<string[]> {
    const files = await FileUtils.listFiles(this.rootDir, this.extension);
    return files.map(file => file.slice(0, file.length - this.extension.length)).sort();
  }

  /**
   * Maintenance operation, never called from the fetch path. Deletes entries
   * (optionally only those at least `olderThanDays` old by mtime) and
   * returns how many were removed.
   */
  async clear(options: ClearCacheOptions = {}): Promise<number> {
    const identifiers = await this.list();
    const now = Date.now();
    let deleted = 0;

    for (const identifier of identifiers) {
      const filePath = this.entryPath(identifier);
      try {
        if (options.olderThanDays !== undefined) {
          const stats = await fs.stat(filePath);
          if (now - stats.mtimeMs < options.olderThanDays * DAY_MS) {
            continue;
          }
        }
        await fs.remove(filePath);
        deleted++;
      } catch (error) {
        if (isMissingFileError(error)) {
          logger.debug(`${filePath} was removed before it could be cleared`);
          continue;
        }
        logger.error(`Error deleting ${filePath}:`, error);
      }
    }

    logger.info(`Cleared ${deleted} files from cache`);
    return deleted;
  }
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
