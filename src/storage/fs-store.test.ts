/**
 * Tests for the filesystem object store.
 */

import { readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { sha256 } from '../lib/hash.js';
import { createTempDir, type TempDir } from '../test-utils/temp-dir.js';
import { createFsObjectStore } from './fs-store.js';
import { contentTypeFor } from './object-store.js';

describe('createFsObjectStore', () => {
  let root: TempDir;

  beforeEach(() => {
    root = createTempDir();
  });

  afterEach(() => {
    root.cleanup();
  });

  it('should return null for a missing key', async () => {
    const store = createFsObjectStore(root.path);
    expect(await store.headObject('jobintel/latest/a.json')).toBeNull();
  });

  it('should write through to disk and hash the content back', async () => {
    const store = createFsObjectStore(root.path);
    const body = Buffer.from('{"ok":true}\n');

    await store.putObject('jobintel/runs/r1/a.json', body, {
      contentHash: sha256(body),
      contentType: 'application/json',
    });

    expect(await store.headObject('jobintel/runs/r1/a.json')).toEqual({
      contentHash: sha256(body),
      sizeBytes: 12,
    });
    expect(
      readFileSync(join(root.path, 'jobintel', 'runs', 'r1', 'a.json'), 'utf-8'),
    ).toBe('{"ok":true}\n');
    expect(readdirSync(join(root.path, 'jobintel', 'runs', 'r1'))).toEqual([
      'a.json',
    ]);
  });

  it('should overwrite an existing object', async () => {
    const store = createFsObjectStore(root.path);
    const meta = { contentHash: sha256('x'), contentType: 'text/plain' };
    await store.putObject('k.txt', Buffer.from('first'), meta);
    await store.putObject('k.txt', Buffer.from('second'), meta);

    expect(await store.headObject('k.txt')).toEqual({
      contentHash: sha256('second'),
      sizeBytes: 6,
    });
  });

  it('should refuse keys that escape the root', async () => {
    const store = createFsObjectStore(root.path);
    await expect(store.headObject('../outside.txt')).rejects.toThrow(
      'Object key escapes store root: ../outside.txt',
    );
  });

  it('should describe itself by location', () => {
    expect(createFsObjectStore(root.path).description).toBe(
      `file://${root.path}`,
    );
  });
});

describe('contentTypeFor', () => {
  it('should map known extensions', () => {
    expect(contentTypeFor('a/b.json')).toBe('application/json');
    expect(contentTypeFor('a/b.CSV')).toBe('text/csv; charset=utf-8');
    expect(contentTypeFor('a/b.md')).toBe('text/markdown; charset=utf-8');
  });

  it('should fall back to octet-stream', () => {
    expect(contentTypeFor('a/b.bin')).toBe('application/octet-stream');
    expect(contentTypeFor('a.d/noext')).toBe('application/octet-stream');
  });
});
