import fs from 'fs/promises';
import path from 'path';
import { errorMessage } from '../utils/errors';
import logger from '../utils/logger';

export async function readJSON<T = unknown>(filePath: string): Promise<T> {
  try {
    const data = await fs.readFile(filePath, 'utf-8');
    return JSON.parse(data);
  } catch (error) {
    logger.error(`Failed to read JSON file: ${filePath}`, { error: errorMessage(error) });
    throw error;
  }
}

export async function writeJSON<T>(filePath: string, data: T, indent = 2): Promise<void> {
  try {
    const dir = path.dirname(filePath);
    await ensureDirectoryExists(dir);

    const jsonData = JSON.stringify(data, null, indent);
    await fs.writeFile(filePath, jsonData, 'utf-8');

    logger.debug(`JSON file written successfully: ${filePath}`);
  } catch (error) {
    logger.error(`Failed to write JSON file: ${filePath}`, { error: errorMessage(error) });
    throw error;
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function ensureDirectoryExists(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (error) {
    logger.error(`Failed to create directory: ${dirPath}`, { error: errorMessage(error) });
    throw error;
  }
}

export async function listFilesRecursive(dirPath: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    const files: string[] = [];

    for (const entry of entries) {
      const entryPath = path.join(dirPath, entry.name);
      if (entry.isDirectory()) {
        files.push(...(await listFilesRecursive(entryPath)));
      } else if (entry.isFile()) {
        files.push(entryPath);
      }
    }

    return files.sort();
  } catch (error) {
    logger.error(`Failed to list files in directory: ${dirPath}`, { error: errorMessage(error) });
    throw error;
  }
}
