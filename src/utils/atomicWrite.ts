import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';

/** Sibling path in the same directory, so a rename over the target stays atomic. */
export function temporarySibling(filePath: string, extension = '.tmp'): string {
  const dir = path.dirname(filePath);
  const base = path.basename(filePath, path.extname(filePath));
  return path.join(dir, `.${base}.${uuidv4()}${extension}`);
}

export async function writeFileAtomic(filePath: string, data: string | Buffer): Promise<void> {
  const tmp = temporarySibling(filePath);
  try {
    await fs.writeFile(tmp, data);
    await fs.rename(tmp, filePath);
  } catch (error) {
    await fs.rm(tmp, { force: true });
    throw error;
  }
}
