/**
 * Tests for artifact collection.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { sha256 } from '../lib/hash.js';
import { createTempDir, type TempDir } from '../test-utils/temp-dir.js';
import { collectArtifacts } from './artifacts.js';

describe('collectArtifacts', () => {
  let dir: TempDir;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    dir.cleanup();
  });

  it('should list nested files sorted by relative path', async () => {
    dir.write('z.json', '{}');
    dir.write('reports/b.md', '# b');
    dir.write('a.csv', 'id\n');

    expect(await collectArtifacts(dir.path)).toEqual([
      { relativePath: 'a.csv', contentHash: sha256('id\n'), sizeBytes: 3 },
      { relativePath: 'reports/b.md', contentHash: sha256('# b'), sizeBytes: 3 },
      { relativePath: 'z.json', contentHash: sha256('{}'), sizeBytes: 2 },
    ]);
  });

  it('should skip dot-files', async () => {
    dir.write('.partial', 'x');
    dir.write('jobs.json', '[]');

    const artifacts = await collectArtifacts(dir.path);
    expect(artifacts.map((a) => a.relativePath)).toEqual(['jobs.json']);
  });

  it('should return nothing for an empty directory', async () => {
    expect(await collectArtifacts(dir.path)).toEqual([]);
  });
});
