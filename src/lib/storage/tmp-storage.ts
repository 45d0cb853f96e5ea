/**
 * Temporary file storage for receipt images waiting on the queue.
 *
 * Files live under RECEIPT_TMP_DIR/{documentId}/ and are removed once the
 * job that reads them finishes, or by the stale-file sweep.
 */

import { promises as fs, type Stats } from 'fs';
import path from 'path';
import { getConfig } from '@/lib/config';

export interface TempStorage {
  save(key: string, buffer: Buffer): Promise<string>;
  read(key: string): Promise<Buffer>;
  remove(key: string): Promise<void>;
  cleanupStale(maxAgeMs?: number): Promise<number>;
}

const DAY_MS = 24 * 60 * 60 * 1000;

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function createTempStorage(root: string): TempStorage {
  const filePath = (key: string): string => {
    const resolved = path.resolve(root, key);
    if (!resolved.startsWith(path.resolve(root) + path.sep)) {
      throw new Error(`Storage key escapes temp root: ${key}`);
    }
    return resolved;
  };

  return {
    async save(key, buffer) {
      const dest = filePath(key);
      await fs.mkdir(path.dirname(dest), { recursive: true });
      await fs.writeFile(dest, buffer);
      return dest;
    },

    async read(key) {
      return fs.readFile(filePath(key));
    },

    /** Missing files are not an error */
    async remove(key) {
      await fs.rm(filePath(key), { force: true });
    },

    /**
     * Remove document directories older than maxAgeMs (default 24h).
     */
    async cleanupStale(maxAgeMs = DAY_MS) {
      const now = Date.now();
      let cleaned = 0;

      let entries: string[];
      try {
        entries = await fs.readdir(root);
      } catch (error) {
        if (isMissing(error)) return 0;
        throw error;
      }

      for (const entry of entries) {
        const entryPath = path.join(root, entry);
        let stat: Stats;
        try {
          stat = await fs.stat(entryPath);
        } catch (error) {
          // Removed by a finishing job since readdir
          if (isMissing(error)) continue;
          throw error;
        }
        if (!stat.isDirectory() || now - stat.mtimeMs <= maxAgeMs) continue;

        await fs.rm(entryPath, { recursive: true, force: true });
        cleaned++;
      }

      if (cleaned > 0) {
        console.log(`[TmpStorage] Cleaned ${cleaned} stale document directories`);
      }
      return cleaned;
    },
  };
}

let defaultStorage: TempStorage | null = null;

export function getTempStorage(): TempStorage {
  if (!defaultStorage) defaultStorage = createTempStorage(getConfig().RECEIPT_TMP_DIR);
  return defaultStorage;
}

/**
 * Generate a storage key for a document.
 */
export function generateStorageKey(documentId: string, filename: string): string {
  const sanitized = filename.replace(/[^a-zA-Z0-9._-]/g, '_');
  return `${documentId}/${sanitized}`;
}
