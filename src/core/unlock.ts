/**
 * Unlock gate
 * Checks a typed access code against configured SHA-256 hashes, with every
 * attempt going through the "unlock" abuse guard.
 */

import { digestsEqual, hashString } from './crypto';
import { AbuseGuard } from './guard';
import type { AuditSink } from './audit';

/**
 * Canonical form of an access code: "1st Jan, 2026" and "1-jan-2026"
 * both become "1jan2026".
 */
export function normalizeAccessCode(input: string): string {
  return input
    .trim()
    .toLowerCase()
    .replace(/(\d)(st|nd|rd|th)(?![a-z])/g, '$1')
    .replace(/[\s/,.\-_]+/g, '');
}

export function hashAccessCode(input: string): string {
  return hashString(normalizeAccessCode(input));
}

export interface UnlockGateOptions {
  /** SHA-256 hex digests of normalized accepted codes */
  acceptedHashes: string[];
  guard: AbuseGuard;
  audit?: AuditSink;
}

export class UnlockGate {
  private acceptedHashes: string[];
  private guard: AbuseGuard;
  private audit?: AuditSink;

  constructor(options: UnlockGateOptions) {
    this.acceptedHashes = options.acceptedHashes.map(h => h.trim().toLowerCase()).filter(Boolean);
    this.guard = options.guard;
    this.audit = options.audit;
  }

  get configured(): boolean {
    return this.acceptedHashes.length > 0;
  }

  /**
   * @returns whether the code was accepted
   * @throws TooFastError / RateLimitedError from the guard
   */
  async unlock(code: string): Promise<boolean> {
    const granted = await this.guard.attempt(async () => this.matches(code));
    this.audit?.log({
      kind: 'unlock',
      action: this.guard.action,
      outcome: granted ? 'granted' : 'denied',
    });
    return granted;
  }

  private matches(code: string): boolean {
    if (!code.trim()) {
      return false;
    }
    const digest = hashAccessCode(code);
    let matched = false;
    for (const accepted of this.acceptedHashes) {
      if (digestsEqual(digest, accepted)) {
        matched = true;
      }
    }
    return matched;
  }
}
