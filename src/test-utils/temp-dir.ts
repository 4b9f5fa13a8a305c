/**
 * Shared test utilities for temporary directories.
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

/** Temporary directory context. */
export interface TempDir {
  /** Absolute path of the directory. */
  path: string;
  /** Write `content` at a POSIX relative path, creating parents. */
  write: (relativePath: string, content: string) => string;
  /** Remove the directory. */
  cleanup: () => void;
}

/** Create a temporary directory. */
export function createTempDir(prefix = 'jobintel-test-'): TempDir {
  const path = mkdtempSync(join(tmpdir(), prefix));
  return {
    path,
    write: (relativePath, content) => {
      const target = join(path, ...relativePath.split('/'));
      mkdirSync(dirname(target), { recursive: true });
      writeFileSync(target, content);
      return target;
    },
    cleanup: () => {
      rmSync(path, { recursive: true, force: true, maxRetries: 3, retryDelay: 100 });
    },
  };
}
