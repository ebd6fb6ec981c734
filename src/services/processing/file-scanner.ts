/**
 * PDF file discovery
 *
 * @module services/processing/file-scanner
 */

import fs from 'fs';
import path from 'path';

function isPdfName(name: string): boolean {
  return name.endsWith('.pdf');
}

/**
 * All `*.pdf` files under a directory, recursively, as absolute paths,
 * sorted and without duplicates. A missing directory yields [].
 */
export async function findPdfFiles(directory: string): Promise<string[]> {
  const root = path.resolve(directory);
  const found = new Set<string>();

  async function walk(dir: string): Promise<void> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (dir === root && isMissing(error)) return;
      throw error;
    }

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
      } else if (entry.isFile() && isPdfName(entry.name)) {
        found.add(fullPath);
      }
    }
  }

  await walk(root);
  return [...found].sort();
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
