/**
 * Object store client abstraction. Credentials and endpoint configuration are
 * the caller's concern; a client arrives ready to use.
 *
 * @module
 */

/** What the store knows about an existing object. */
export interface StoredObject {
  /** Lowercase hex sha256 of the stored content. */
  contentHash: string;
  sizeBytes: number;
}

/** Options accepted by every store call. */
export interface StoreCallOptions {
  /** Aborts the call when the caller's deadline passes. */
  signal?: AbortSignal;
}

/** Minimal object store surface used by the publisher and verifier. */
export interface ObjectStoreClient {
  /** Human-readable location, for logs (e.g. `s3://bucket`). */
  readonly description: string;
  /** Look up an object; `null` when the key does not exist. */
  headObject(
    key: string,
    options?: StoreCallOptions,
  ): Promise<StoredObject | null>;
  /** Write (or overwrite) an object. `contentHash` is the sha256 of `body`. */
  putObject(
    key: string,
    body: Buffer,
    meta: { contentHash: string; contentType: string },
    options?: StoreCallOptions,
  ): Promise<void>;
}

const CONTENT_TYPES: Record<string, string> = {
  '.json': 'application/json',
  '.csv': 'text/csv; charset=utf-8',
  '.md': 'text/markdown; charset=utf-8',
  '.markdown': 'text/markdown; charset=utf-8',
  '.html': 'text/html; charset=utf-8',
  '.htm': 'text/html; charset=utf-8',
  '.txt': 'text/plain; charset=utf-8',
};

/** Content type from a key's extension; octet-stream when unknown. */
export function contentTypeFor(key: string): string {
  const dot = key.lastIndexOf('.');
  const slash = key.lastIndexOf('/');
  if (dot <= slash) return 'application/octet-stream';
  return CONTENT_TYPES[key.slice(dot).toLowerCase()] ?? 'application/octet-stream';
}
