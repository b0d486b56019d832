import { existsSync } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { errorMessage, isNotFoundError } from '../../utils/errors';
import type { Logger } from '../../utils/logger';
import { slug, syntheticName } from '../../utils/slug';

export const BACKUP_DIR = 'backups';

/**
 * Renames images after their generated title.
 *
 * A renamer instance is shared by every job of a run: names handed out are
 * reserved synchronously, so two jobs producing the same title in the same
 * directory get `Title.jpg` and `Title_1.jpg` even before either rename lands.
 */
export class FileRenamer {
  private reserved = new Set<string>();

  constructor(private logger: Logger, private now: () => number = Date.now) {}

  /** First free `<stem><suffix><ext>` in the source directory; the source itself counts as free. */
  reserveTarget(sourcePath: string, title: string): string {
    const dir = path.dirname(sourcePath);
    const extension = path.extname(sourcePath).toLowerCase();
    const stem = slug(title) || syntheticName(this.now());
    const source = path.resolve(sourcePath);

    for (let counter = 0; ; counter++) {
      const name = counter === 0 ? `${stem}${extension}` : `${stem}_${counter}${extension}`;
      const candidate = path.resolve(dir, name);
      if (candidate === source) {
        this.reserved.add(candidate);
        return candidate;
      }
      if (!this.reserved.has(candidate) && !existsSync(candidate)) {
        this.reserved.add(candidate);
        return candidate;
      }
    }
  }

  /** Returns the path the file ends up at; the original path when it vanished mid-run. */
  async rename(sourcePath: string, title: string): Promise<string> {
    const target = this.reserveTarget(sourcePath, title);
    if (target === path.resolve(sourcePath)) {
      return target;
    }

    try {
      await fs.rename(sourcePath, target);
      this.logger.info(
        { from: path.basename(sourcePath), to: path.basename(target) },
        'Renamed image'
      );
      return target;
    } catch (error) {
      this.reserved.delete(target);
      if (isNotFoundError(error)) {
        this.logger.error(
          { path: sourcePath, error: errorMessage(error) },
          'File disappeared before rename, keeping original path'
        );
        return sourcePath;
      }
      throw error;
    }
  }

  /** Copies the untouched original into `backups/` beside it. */
  async backup(sourcePath: string): Promise<string> {
    const backupDir = path.join(path.dirname(sourcePath), BACKUP_DIR);
    await fs.mkdir(backupDir, { recursive: true });

    const extension = path.extname(sourcePath);
    const stem = path.basename(sourcePath, extension);
    let target = path.join(backupDir, path.basename(sourcePath));
    for (let counter = 1; existsSync(target); counter++) {
      target = path.join(backupDir, `${stem}_${counter}${extension}`);
    }

    await fs.copyFile(sourcePath, target);
    this.logger.debug({ path: sourcePath, backup: target }, 'Backup created');
    return target;
  }
}
