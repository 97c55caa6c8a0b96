import * as fs from 'fs';
import * as fsPromises from 'fs/promises';
import { errorCode, errorMessage } from './errors.js';

/**
 * Turn a content id into a safe file name stem
 */
export function toFileStem(id: string): string {
  return encodeURIComponent(id).replace(/\*/g, '%2A').replace(/^\./, '%2E');
}

export function ensureDir(dir: string): void {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

/**
 * Delete a file if it exists. Returns false when the delete failed.
 */
export function removeFile(filePath: string, tag = '[Files]'): boolean {
  try {
    fs.unlinkSync(filePath);
    return true;
  } catch (error) {
    if (errorCode(error) === 'ENOENT') return true;
    console.error(`${tag} Failed to delete ${filePath}: ${errorMessage(error)}`);
    return false;
  }
}

export async function removeFileAsync(filePath: string, tag = '[Files]'): Promise<void> {
  try {
    await fsPromises.unlink(filePath);
  } catch (error) {
    if (errorCode(error) === 'ENOENT') return;
    console.error(`${tag} Failed to delete ${filePath}: ${errorMessage(error)}`);
  }
}

/**
 * Move file with cross-device fallback
 */
export async function moveFileAsync(src: string, dest: string): Promise<void> {
  try {
    await fsPromises.rename(src, dest);
  } catch (error) {
    if (errorCode(error) === 'EXDEV') {
      console.log('[Files] Cross-device move, using copy+delete');
      await fsPromises.copyFile(src, dest);
      await fsPromises.unlink(src);
    } else {
      throw error;
    }
  }
}
