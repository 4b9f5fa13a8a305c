/**
 * Tests for run id generation.
 */

import { describe, expect, it } from 'vitest';

import { createRunIdFactory, formatRunId, isRunId } from './run-id.js';

describe('formatRunId', () => {
  it('should format UTC milliseconds', () => {
    expect(formatRunId(Date.UTC(2026, 0, 2, 3, 4, 5, 67))).toBe(
      '20260102T030405067Z',
    );
  });
});

describe('isRunId', () => {
  it('should accept only the run id shape', () => {
    expect(isRunId('20260102T030405067Z')).toBe(true);
    expect(isRunId('2026-01-02')).toBe(false);
    expect(isRunId('../20260102T030405067Z')).toBe(false);
  });
});

describe('createRunIdFactory', () => {
  it('should keep ids strictly increasing when the clock stalls', () => {
    const t = Date.UTC(2026, 0, 1);
    const nextId = createRunIdFactory(() => t);
    expect([nextId(), nextId(), nextId()]).toEqual([
      '20260101T000000000Z',
      '20260101T000000001Z',
      '20260101T000000002Z',
    ]);
  });

  it('should not step back when the clock does', () => {
    const times = [Date.UTC(2026, 0, 1, 0, 0, 1), Date.UTC(2026, 0, 1)];
    const nextId = createRunIdFactory(() => times.shift() ?? 0);
    expect([nextId(), nextId()]).toEqual([
      '20260101T000001000Z',
      '20260101T000001001Z',
    ]);
  });
});
