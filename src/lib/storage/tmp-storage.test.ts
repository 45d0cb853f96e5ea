import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { createTempStorage, generateStorageKey, type TempStorage } from './tmp-storage';

describe('generateStorageKey', () => {
  it('nests the sanitized filename under the document id', () => {
    expect(generateStorageKey('abc123', 'my receipt (1).png')).toBe('abc123/my_receipt__1_.png');
  });
});

describe('createTempStorage', () => {
  let root: string;
  let storage: TempStorage;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'receipt-storage-'));
    storage = createTempStorage(root);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(root, { recursive: true, force: true });
  });

  it('saves, reads and removes files', async () => {
    const saved = await storage.save('doc-1/receipt.png', Buffer.from('image bytes'));
    expect(saved).toBe(path.join(root, 'doc-1', 'receipt.png'));
    expect((await storage.read('doc-1/receipt.png')).toString()).toBe('image bytes');

    await storage.remove('doc-1/receipt.png');
    await expect(storage.read('doc-1/receipt.png')).rejects.toThrow();
  });

  it('ignores removal of missing files', async () => {
    await expect(storage.remove('nope/missing.png')).resolves.toBeUndefined();
  });

  it('refuses keys outside the root', async () => {
    await expect(storage.save('../escape.png', Buffer.from('x'))).rejects.toThrow(/escapes temp root/);
  });

  it('removes only stale document directories', async () => {
    await storage.save('old/receipt.png', Buffer.from('x'));
    await storage.save('fresh/receipt.png', Buffer.from('y'));
    const twoDaysAgo = new Date(Date.now() - 2 * 24 * 60 * 60 * 1000);
    await fs.utimes(path.join(root, 'old'), twoDaysAgo, twoDaysAgo);

    expect(await storage.cleanupStale()).toBe(1);
    expect(await fs.readdir(root)).toEqual(['fresh']);
  });

  it('skips entries that disappear during the sweep', async () => {
    await storage.save('first/receipt.png', Buffer.from('x'));
    await storage.save('second/receipt.png', Buffer.from('y'));
    const twoDaysAgo = new Date(Date.now() - 2 * 24 * 60 * 60 * 1000);
    await fs.utimes(path.join(root, 'first'), twoDaysAgo, twoDaysAgo);
    await fs.utimes(path.join(root, 'second'), twoDaysAgo, twoDaysAgo);

    const gone = Object.assign(new Error('no such file or directory'), { code: 'ENOENT' });
    vi.spyOn(fs, 'stat').mockRejectedValueOnce(gone);

    expect(await storage.cleanupStale()).toBe(1);
    expect(await fs.readdir(root)).toHaveLength(1);
  });

  it('still fails on other stat errors', async () => {
    await storage.save('doc/receipt.png', Buffer.from('x'));
    const denied = Object.assign(new Error('permission denied'), { code: 'EACCES' });
    vi.spyOn(fs, 'stat').mockRejectedValueOnce(denied);

    await expect(storage.cleanupStale()).rejects.toThrow('permission denied');
  });

  it('treats a missing root as empty', async () => {
    expect(await createTempStorage(path.join(root, 'absent')).cleanupStale()).toBe(0);
  });
});
