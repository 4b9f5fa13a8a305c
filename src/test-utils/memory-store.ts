/**
 * In-memory object store for publisher and verifier tests.
 */

import { sha256 } from '../lib/hash.js';
import type {
  ObjectStoreClient,
  StoreCallOptions,
  StoredObject,
} from '../storage/object-store.js';

/** In-memory store with write accounting and failure injection. */
export interface MemoryStore extends ObjectStoreClient {
  /** Stored bodies by key. */
  objects: Map<string, Buffer>;
  /** Keys passed to putObject, in call order. */
  puts: string[];
  /** Keys whose putObject rejects. */
  failingKeys: Set<string>;
  /** Delay applied to every putObject, in milliseconds. */
  putDelayMs: number;
  /** Per-key putObject delays, overriding `putDelayMs`. */
  keyDelaysMs: Map<string, number>;
  /** Read a stored body as UTF-8, or undefined. */
  text(key: string): string | undefined;
}

function abortable(ms: number, options?: StoreCallOptions): Promise<void> {
  return new Promise((resolve, reject) => {
    const signal = options?.signal;
    if (signal?.aborted) {
      reject(new Error('aborted'));
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    function onAbort() {
      clearTimeout(timer);
      reject(new Error('aborted'));
    }
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/** Create an empty in-memory store. */
export function createMemoryStore(): MemoryStore {
  const objects = new Map<string, Buffer>();
  const puts: string[] = [];
  const failingKeys = new Set<string>();

  const store: MemoryStore = {
    description: 'memory://test',
    objects,
    puts,
    failingKeys,
    putDelayMs: 0,
    keyDelaysMs: new Map<string, number>(),

    headObject(key: string): Promise<StoredObject | null> {
      const body = objects.get(key);
      return Promise.resolve(
        body ? { contentHash: sha256(body), sizeBytes: body.length } : null,
      );
    },

    async putObject(key, body, _meta, options): Promise<void> {
      puts.push(key);
      const delay = store.keyDelaysMs.get(key) ?? store.putDelayMs;
      if (delay > 0) await abortable(delay, options);
      if (failingKeys.has(key)) throw new Error(`injected failure for ${key}`);
      objects.set(key, Buffer.from(body));
    },

    text(key: string): string | undefined {
      return objects.get(key)?.toString('utf-8');
    },
  };
  return store;
}
