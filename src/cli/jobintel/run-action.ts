/**
 * Maps command failures to process exit codes.
 */

import {
  ConfigurationError,
  errorMessage,
  VerificationMismatch,
} from '../../lib/errors.js';

/** Process exit codes used by the CLI. */
export const EXIT_CODES = {
  ok: 0,
  config: 1,
  verifyMismatch: 2,
  unexpected: 3,
  runFailed: 4,
} as const;

/** Exit code for an error thrown out of a command. */
export function exitCodeFor(err: unknown): number {
  if (err instanceof ConfigurationError) return EXIT_CODES.config;
  if (err instanceof VerificationMismatch) return EXIT_CODES.verifyMismatch;
  return EXIT_CODES.unexpected;
}

/** Run a command body, reporting a thrown error on stderr and in `process.exitCode`. */
export async function runAction(
  body: () => void | Promise<void>,
): Promise<void> {
  try {
    await body();
  } catch (err: unknown) {
    console.error(`❌ ${errorMessage(err)}`);
    if (err instanceof ConfigurationError) {
      for (const issue of err.issues) console.error(`   ${issue}`);
    }
    process.exitCode = exitCodeFor(err);
  }
}
