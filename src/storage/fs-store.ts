/**
 * Filesystem-backed object store. Keys map to paths under a root directory;
 * writes land through a temp file and an atomic rename, and hashes are always
 * recomputed from content.
 */

import { randomBytes } from 'node:crypto';
import { mkdir, rename, stat, writeFile } from 'node:fs/promises';
import { dirname, join, resolve, sep } from 'node:path';

import { sha256File } from '../lib/hash.js';
import type { ObjectStoreClient, StoredObject } from './object-store.js';

function isMissing(err: unknown): boolean {
  return (
    err instanceof Error &&
    'code' in err &&
    (err.code === 'ENOENT' || err.code === 'ENOTDIR')
  );
}

/** Create a store rooted at `root`. */
export function createFsObjectStore(root: string): ObjectStoreClient {
  const base = resolve(root);

  function pathFor(key: string): string {
    const target = resolve(join(base, ...key.split('/')));
    if (!target.startsWith(base + sep)) {
      throw new Error(`Object key escapes store root: ${key}`);
    }
    return target;
  }

  return {
    description: `file://${base}`,

    async headObject(key: string): Promise<StoredObject | null> {
      const path = pathFor(key);
      try {
        const info = await stat(path);
        if (!info.isFile()) return null;
        return { contentHash: await sha256File(path), sizeBytes: info.size };
      } catch (err: unknown) {
        if (isMissing(err)) return null;
        throw err;
      }
    },

    async putObject(key, body, _meta, options): Promise<void> {
      const path = pathFor(key);
      await mkdir(dirname(path), { recursive: true });
      const tmp = `${path}.${randomBytes(6).toString('hex')}.tmp`;
      await writeFile(tmp, body, { signal: options?.signal });
      await rename(tmp, path);
    },
  };
}
