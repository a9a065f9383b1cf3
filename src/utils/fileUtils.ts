import fs from 'fs-extra';
import path from 'path';
import crypto from 'crypto';
import { logger } from './logger';

export class FileUtils {
  static async fileExists(filePath: string): Promise<boolean> {
    return fs.pathExists(filePath);
  }

  static async writeJSON(filePath: string, data: unknown): Promise<void> {
    try {
      await fs.ensureDir(path.dirname(filePath));
      await fs.writeJson(filePath, data, { spaces: 2 });
    } catch (error) {
      logger.error(`Failed to write JSON file: ${filePath}`, error);
      throw error;
    }
  }

  static async readJSON<T>(filePath: string): Promise<T | null> {
    try {
      if (await fs.pathExists(filePath)) {
        return await fs.readJson(filePath);
      }
      return null;
    } catch (error) {
      logger.error(`Failed to read JSON file: ${filePath}`, error);
      return null;
    }
  }

  /**
   * Writes `data` to a uniquely named sibling temp file, then renames it onto
   * `filePath`. Readers see either no file or the complete file. With
   * `overwrite: false` an existing target is left untouched and the call
   * rejects.
   */
  static async writeFileAtomic(
    filePath: string,
    data: Buffer | string,
    options: { overwrite?: boolean } = {}
  ): Promise<void> {
    const tempPath = `${filePath}.${FileUtils.generateUniqueId()}.tmp`;
    await fs.ensureDir(path.dirname(filePath));
    try {
      await fs.writeFile(tempPath, data);
      await fs.move(tempPath, filePath, { overwrite: options.overwrite ?? false });
    } catch (error) {
      await fs.remove(tempPath);
      throw error;
    }
  }

  static async deleteFile(filePath: string): Promise<void> {
    try {
      await fs.remove(filePath);
    } catch (error) {
      logger.error(`Failed to delete file: ${filePath}`, error);
      throw error;
    }
  }

  static async listFiles(dirPath: string, extension?: string): Promise<string[]> {
    if (!(await fs.pathExists(dirPath))) {
      return [];
    }

    const files = await fs.readdir(dirPath);
    if (extension) {
      return files.filter(file => file.toLowerCase().endsWith(extension.toLowerCase()));
    }
    return files;
  }

  static sanitizeFilename(filename: string): string {
    return filename
      .replace(/[<>:"/\\|?*]/g, '_')
      .replace(/\s+/g, '_')
      .replace(/_{2,}/g, '_')
      .replace(/^_|_$/g, '')
      .substring(0, 100);
  }

  static generateUniqueId(): string {
    return crypto.randomUUID();
  }
}
