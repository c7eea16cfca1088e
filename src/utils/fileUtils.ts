import fs from 'fs-extra';
import path from 'path';
import { logger } from './logger';

export class FileUtils {
  static async fileExists(filePath: string): Promise<boolean> {
    return fs.pathExists(filePath);
  }

  static async readText(filePath: string): Promise<string> {
    try {
      return await fs.readFile(filePath, 'utf8');
    } catch (error) {
      logger.debug(`Failed to read file: ${filePath}`);
      throw error;
    }
  }

  /**
   * Returns null when the file does not exist; a malformed file still throws.
   */
  static async readJSON<T>(filePath: string): Promise<T | null> {
    if (!(await fs.pathExists(filePath))) {
      return null;
    }
    const data: T = await fs.readJson(filePath);
    return data;
  }

  /**
   * Write a new file, creating parent directories. Refuses to replace an
   * existing file.
   */
  static async writeNewFile(filePath: string, content: string): Promise<void> {
    try {
      await fs.ensureDir(path.dirname(filePath));
      await fs.writeFile(filePath, content, { encoding: 'utf8', flag: 'wx' });
    } catch (error) {
      logger.debug(`Failed to write file: ${filePath}`);
      throw error;
    }
  }
}
