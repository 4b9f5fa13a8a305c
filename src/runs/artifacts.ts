/**
 * Artifact collection: lists the files a run produced, with their hashes.
 */

import { readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';

import { sha256File } from '../lib/hash.js';
import type { Artifact } from '../schemas/run-report.js';

async function walk(root: string, prefix: string[]): Promise<string[][]> {
  const entries = await readdir(join(root, ...prefix), { withFileTypes: true });
  const found: string[][] = [];
  for (const entry of entries) {
    if (entry.name.startsWith('.')) continue;
    const segments = [...prefix, entry.name];
    if (entry.isDirectory()) {
      found.push(...(await walk(root, segments)));
    } else if (entry.isFile()) {
      found.push(segments);
    }
  }
  return found;
}

/**
 * Collect every regular file under `outputDir` (dot-files skipped), sorted by
 * relative POSIX path so the list is reproducible.
 */
export async function collectArtifacts(outputDir: string): Promise<Artifact[]> {
  const files = (await walk(outputDir, []))
    .map((segments) => segments.join('/'))
    .sort();

  const artifacts: Artifact[] = [];
  for (const relativePath of files) {
    const path = join(outputDir, ...relativePath.split('/'));
    const info = await stat(path);
    artifacts.push({
      relativePath,
      contentHash: await sha256File(path),
      sizeBytes: info.size,
    });
  }
  return artifacts;
}
