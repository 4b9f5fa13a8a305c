/**
 * Timestamp-derived, monotonically sortable run identifiers.
 */

const RUN_ID_PATTERN = /^\d{8}T\d{9}Z$/;

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/** Format epoch milliseconds as `YYYYMMDDTHHmmssSSSZ` (UTC). */
export function formatRunId(epochMs: number): string {
  const d = new Date(epochMs);
  return (
    pad(d.getUTCFullYear(), 4) +
    pad(d.getUTCMonth() + 1, 2) +
    pad(d.getUTCDate(), 2) +
    'T' +
    pad(d.getUTCHours(), 2) +
    pad(d.getUTCMinutes(), 2) +
    pad(d.getUTCSeconds(), 2) +
    pad(d.getUTCMilliseconds(), 3) +
    'Z'
  );
}

/** Whether a string has the run id shape. */
export function isRunId(value: string): boolean {
  return RUN_ID_PATTERN.test(value);
}

/**
 * Create a run id factory. Ids strictly increase even if the clock stalls or
 * steps backwards: the next id is at least one millisecond past the last.
 */
export function createRunIdFactory(
  now: () => number = Date.now,
): () => string {
  let last = Number.NEGATIVE_INFINITY;
  return () => {
    const ms = Math.max(now(), last + 1);
    last = ms;
    return formatRunId(ms);
  };
}
