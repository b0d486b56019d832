import type { Stats } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { FileNotFoundError, isNotFoundError } from '../../utils/errors';
import { isSupportedExtension } from '../tagger/PhotoTagger';
import { BACKUP_DIR } from '../tagger/FileRenamer';

function isImageFile(filename: string): boolean {
  // Skip macOS metadata/resource files that start with "._"
  const basename = path.basename(filename);
  if (basename.startsWith('._')) {
    return false;
  }
  return isSupportedExtension(basename);
}

/**
 * Lists the images to process. A file input is returned as is (validation
 * happens in the job); a directory is scanned, optionally recursively,
 * skipping `backups/` folders. The result is sorted.
 */
export async function collectImages(input: string, recursive: boolean): Promise<string[]> {
  const root = path.resolve(input);
  let stats: Stats;
  try {
    stats = await fs.stat(root);
  } catch (error) {
    if (isNotFoundError(error)) {
      throw new FileNotFoundError(`Input path not found: ${root}`, root);
    }
    throw error;
  }

  if (!stats.isDirectory()) {
    return [root];
  }

  const files: string[] = [];

  async function scan(currentDir: string) {
    const entries = await fs.readdir(currentDir, { withFileTypes: true });

    for (const entry of entries) {
      const fullPath = path.join(currentDir, entry.name);
      if (entry.isDirectory()) {
        if (recursive && entry.name !== BACKUP_DIR) {
          await scan(fullPath);
        }
      } else if (entry.isFile() && isImageFile(entry.name)) {
        files.push(fullPath);
      }
    }
  }

  await scan(root);
  return files.sort();
}
