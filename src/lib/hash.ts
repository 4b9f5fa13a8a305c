/**
 * SHA-256 helpers. Content hashes are lowercase hex digests.
 */

import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';

/** Hash an in-memory buffer or string. */
export function sha256(data: Buffer | string): string {
  return createHash('sha256').update(data).digest('hex');
}

/** Hash a file by streaming it. */
export async function sha256File(path: string): Promise<string> {
  const hash = createHash('sha256');
  const stream = createReadStream(path);
  for await (const chunk of stream) {
    if (typeof chunk === 'string') hash.update(chunk);
    else if (Buffer.isBuffer(chunk)) hash.update(chunk);
  }
  return hash.digest('hex');
}
