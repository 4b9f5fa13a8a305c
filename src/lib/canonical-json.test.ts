/**
 * Tests for canonical JSON serialization.
 */

import { describe, expect, it } from 'vitest';

import { canonicalJson } from './canonical-json.js';

describe('canonicalJson', () => {
  it('should sort keys recursively and keep array order', () => {
    expect(canonicalJson({ b: 1, a: { d: [3, 1], c: null } })).toBe(
      '{\n  "a": {\n    "c": null,\n    "d": [\n      3,\n      1\n    ]\n  },\n  "b": 1\n}\n',
    );
  });

  it('should produce the same text regardless of insertion order', () => {
    expect(canonicalJson({ x: 1, y: 'z' })).toBe(canonicalJson({ y: 'z', x: 1 }));
  });

  it('should drop undefined properties', () => {
    expect(canonicalJson({ a: undefined, b: true })).toBe('{\n  "b": true\n}\n');
  });

  it('should refuse non-finite numbers', () => {
    expect(() => canonicalJson({ n: Number.NaN })).toThrow(TypeError);
  });
});
