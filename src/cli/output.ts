/**
 * Shared CLI output helpers
 */

import { EnsembleExhaustedError, GuardRejectionError, VaultError } from '../core/errors';

/**
 * Print an error the way every command does and exit with status 1.
 */
export function exitWithError(error: unknown, json?: boolean): never {
  const message = error instanceof Error ? error.message : 'Unknown error occurred';

  if (json) {
    const payload: Record<string, unknown> = { error: message };
    if (error instanceof VaultError) {
      payload.code = error.code;
    }
    if (error instanceof GuardRejectionError) {
      payload.state = error.state;
      payload.retryAfterSeconds = error.retryAfterSeconds;
    }
    if (error instanceof EnsembleExhaustedError) {
      payload.trace = error.trace;
    }
    console.log(JSON.stringify(payload, null, 2));
  } else if (error instanceof Error) {
    console.error('❌ Error:', message);
  } else {
    console.error('❌ Unknown error occurred');
  }

  process.exit(1);
}

export function formatDuration(seconds: number): string {
  if (seconds < 60) return `${seconds}s`;
  if (seconds < 3600) return `${Math.floor(seconds / 60)}m`;
  if (seconds < 86400) return `${Math.floor(seconds / 3600)}h`;
  return `${Math.floor(seconds / 86400)}d`;
}
